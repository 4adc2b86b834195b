import { Acknowledgment, AcknowledgmentSettings } from './acknowledgment.types.js';
import { ParsedEvent } from './event.types.js';
import { Catalog, DiscountTier, Quote, QuotingSettings } from './quote.types.js';

/**
 * Input data for one email run
 */
export interface EmailInput {
  emailId: string;
  content: string;
  source: string;
  receivedAt: Date;
}

/**
 * Accumulated state as an email progresses through the stages
 */
export interface PipelineState {
  // Intake output
  event?: ParsedEvent;

  // Acknowledgment output
  acknowledgment?: Acknowledgment;

  // Auto-quote output
  quote?: Quote;
}

/**
 * Read-only snapshot of everything loaded from the config directory for one run
 */
export interface WorkflowSettings {
  quoting: Readonly<QuotingSettings>;
  acknowledgment: Readonly<AcknowledgmentSettings>;
  catalog: Catalog;
  discountTiers: ReadonlyArray<Readonly<DiscountTier>>;
}
