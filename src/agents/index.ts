import { BaseAgent } from './base/base-agent.js';
import { IntakeAgent } from './intake/intake.agent.js';
import { AcknowledgmentAgent } from './acknowledgment/acknowledgment.agent.js';
import { AutoQuoteAgent } from './auto-quote/auto-quote.agent.js';
import { AgentName } from '../shared/types/agent.types.js';

export { BaseAgent, IntakeAgent, AcknowledgmentAgent, AutoQuoteAgent };
export type { AgentOutput } from './base/base-agent.js';

// Agent factory registry
export const agentFactory: Record<AgentName, () => BaseAgent> = {
  intake: () => new IntakeAgent(),
  acknowledgment: () => new AcknowledgmentAgent(),
  'auto-quote': () => new AutoQuoteAgent(),
};

/**
 * Create an agent instance by name
 */
export function createAgent(name: AgentName): BaseAgent {
  const factory = agentFactory[name];
  if (!factory) {
    throw new Error(`Unknown agent: ${name}`);
  }
  return factory();
}
