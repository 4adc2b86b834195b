import { BaseAgent, AgentOutput } from '../base/base-agent.js';
import { AgentContext, NextAction, Quote } from '../../shared/types/index.js';
import { generateQuote } from '../../core/quoting/index.js';
import { AgentExecutionError } from '../../shared/utils/errors.js';

export class AutoQuoteAgent extends BaseAgent<Quote> {
  constructor() {
    super('auto-quote');
  }

  protected run(context: AgentContext): AgentOutput<Quote> {
    const { event } = context.currentState;
    if (!event) {
      throw new AgentExecutionError(this.agentName, 'no parsed event in state');
    }

    const { catalog, discountTiers, quoting } = context.settings;
    const quote = generateQuote(event, catalog, discountTiers, quoting, context.now);

    return { state: { quote }, output: quote };
  }

  protected determineNextAction(parsedOutput: AgentOutput<Quote>): NextAction {
    const { output } = parsedOutput;

    // A pending quote waits for the sender's answers
    if (output.status === 'pending') {
      return this.requireHumanIntervention(
        `Quote pending: ${output.pending_reasons.join(', ')}`,
        output.pending_reasons
      );
    }

    return { type: 'COMPLETE' };
  }
}
