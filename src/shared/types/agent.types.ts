import { EmailInput, PipelineState, WorkflowSettings } from './pipeline.types.js';

/**
 * Agent names in the pipeline
 */
export type AgentName = 'intake' | 'acknowledgment' | 'auto-quote';

/**
 * Ordered list of agents in the pipeline
 */
export const AGENT_PIPELINE: AgentName[] = ['intake', 'acknowledgment', 'auto-quote'];

/**
 * Context passed to each agent during execution
 */
export interface AgentContext {
  executionId: string;
  input: EmailInput;
  currentState: PipelineState;
  settings: WorkflowSettings;
  now: Date;
}

/**
 * Possible next actions after agent execution
 */
export type NextAction =
  | { type: 'CONTINUE'; nextAgent: AgentName }
  | { type: 'AWAIT_HUMAN'; reason: string; requiredFields?: string[] }
  | { type: 'COMPLETE' }
  | { type: 'FAIL'; error: string; cause?: unknown };

/**
 * Domain event for audit trail
 */
export interface DomainEvent {
  id: string;
  eventType: EventType;
  eventData: Record<string, unknown>;
  createdAt: Date;
}

/**
 * Result returned by agent execution
 */
export interface AgentResult<TOutput = unknown> {
  success: boolean;
  outputState: Partial<PipelineState>;
  events: DomainEvent[];
  nextAction: NextAction;
  agentOutput?: TOutput;
  metadata?: {
    durationMs?: number;
  };
}

/**
 * Event types for audit trail
 */
export const EVENT_TYPES = {
  AGENT_STARTED: 'AGENT_STARTED',
  AGENT_COMPLETED: 'AGENT_COMPLETED',
  AGENT_FAILED: 'AGENT_FAILED',
  HUMAN_INTERVENTION_REQUIRED: 'HUMAN_INTERVENTION_REQUIRED',
} as const;

export type EventType = (typeof EVENT_TYPES)[keyof typeof EVENT_TYPES];
