import { BaseAgent, AgentOutput } from '../base/base-agent.js';
import { Acknowledgment, AgentContext, NextAction } from '../../shared/types/index.js';
import { generateAcknowledgment } from '../../core/acknowledgment/acknowledgment.generator.js';
import { AgentExecutionError } from '../../shared/utils/errors.js';

export class AcknowledgmentAgent extends BaseAgent<Acknowledgment> {
  constructor() {
    super('acknowledgment');
  }

  protected run(context: AgentContext): AgentOutput<Acknowledgment> {
    const { event } = context.currentState;
    if (!event) {
      throw new AgentExecutionError(this.agentName, 'no parsed event in state');
    }

    const acknowledgment = generateAcknowledgment(
      event,
      context.settings.acknowledgment,
      context.now
    );

    return { state: { acknowledgment }, output: acknowledgment };
  }

  protected determineNextAction(): NextAction {
    return this.continueToNextAgent();
  }
}
