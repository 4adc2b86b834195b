import { BaseAgent, AgentOutput } from '../base/base-agent.js';
import { AgentContext, NextAction, ParsedEvent } from '../../shared/types/index.js';
import { extract } from '../../core/extraction/index.js';

/**
 * Parses the raw email into a ParsedEvent. Never asks for a human: gaps are
 * carried forward to the acknowledgment and the quote.
 */
export class IntakeAgent extends BaseAgent<ParsedEvent> {
  constructor() {
    super('intake');
  }

  protected run(context: AgentContext): AgentOutput<ParsedEvent> {
    const event = extract(context.input.content, {
      knownProducts: Object.keys(context.settings.catalog),
      emailId: context.input.emailId,
      now: context.now,
    });

    return { state: { event }, output: event };
  }

  protected determineNextAction(): NextAction {
    return this.continueToNextAgent();
  }
}
