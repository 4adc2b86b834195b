import { v4 as uuidv4 } from 'uuid';
import {
  AgentContext,
  AgentResult,
  NextAction,
  DomainEvent,
  AgentName,
  AGENT_PIPELINE,
  EventType,
} from '../../shared/types/agent.types.js';
import { PipelineState } from '../../shared/types/pipeline.types.js';
import { logger } from '../../shared/utils/logger.js';

export interface AgentOutput<TOutput> {
  state: Partial<PipelineState>;
  output: TOutput;
}

export abstract class BaseAgent<TOutput = unknown> {
  protected agentName: AgentName;

  constructor(agentName: AgentName) {
    this.agentName = agentName;
  }

  get name(): AgentName {
    return this.agentName;
  }

  /**
   * Run the agent and report what happened. Errors never escape: they come
   * back as a FAIL action carrying the original error as `cause`.
   */
  execute(context: AgentContext): AgentResult<TOutput> {
    const events: DomainEvent[] = [];
    const startTime = Date.now();

    logger.debug(
      { executionId: context.executionId, agent: this.agentName },
      'Agent execution started'
    );

    try {
      events.push(this.createEvent('AGENT_STARTED', { agent: this.agentName }));

      const parsedOutput = this.run(context);
      const nextAction = this.determineNextAction(parsedOutput, context);

      const durationMs = Date.now() - startTime;

      events.push(
        this.createEvent('AGENT_COMPLETED', {
          agent: this.agentName,
          durationMs,
        })
      );

      if (nextAction.type === 'AWAIT_HUMAN') {
        events.push(
          this.createEvent('HUMAN_INTERVENTION_REQUIRED', {
            reason: nextAction.reason,
            requiredFields: nextAction.requiredFields,
          })
        );
      }

      logger.debug(
        { executionId: context.executionId, agent: this.agentName, durationMs },
        'Agent execution completed'
      );

      return {
        success: true,
        outputState: parsedOutput.state,
        events,
        nextAction,
        agentOutput: parsedOutput.output,
        metadata: { durationMs },
      };
    } catch (error) {
      const durationMs = Date.now() - startTime;
      const errorMessage = error instanceof Error ? error.message : String(error);

      events.push(
        this.createEvent('AGENT_FAILED', {
          agent: this.agentName,
          error: errorMessage,
          durationMs,
        })
      );

      logger.error(
        { executionId: context.executionId, agent: this.agentName, error: errorMessage },
        'Agent execution failed'
      );

      return {
        success: false,
        outputState: {},
        events,
        nextAction: { type: 'FAIL', error: errorMessage, cause: error },
        metadata: { durationMs },
      };
    }
  }

  /**
   * Get the next agent in the pipeline
   */
  protected getNextAgent(): AgentName | null {
    const currentIndex = AGENT_PIPELINE.indexOf(this.agentName);
    if (currentIndex === -1 || currentIndex === AGENT_PIPELINE.length - 1) {
      return null;
    }
    return AGENT_PIPELINE[currentIndex + 1];
  }

  /**
   * Helper: Continue to next agent in pipeline
   */
  protected continueToNextAgent(): NextAction {
    const nextAgent = this.getNextAgent();
    if (nextAgent) {
      return { type: 'CONTINUE', nextAgent };
    }
    return { type: 'COMPLETE' };
  }

  /**
   * Helper: Require human intervention
   */
  protected requireHumanIntervention(reason: string, requiredFields?: string[]): NextAction {
    return { type: 'AWAIT_HUMAN', reason, requiredFields };
  }

  protected createEvent(type: EventType, data: Record<string, unknown>): DomainEvent {
    return {
      id: uuidv4(),
      eventType: type,
      eventData: data,
      createdAt: new Date(),
    };
  }

  /**
   * Produce this agent's slice of the pipeline state
   */
  protected abstract run(context: AgentContext): AgentOutput<TOutput>;

  /**
   * Determine the next action based on output
   */
  protected abstract determineNextAction(
    parsedOutput: AgentOutput<TOutput>,
    context: AgentContext
  ): NextAction;
}
