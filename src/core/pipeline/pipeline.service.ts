import { readdir, readFile, stat } from 'fs/promises';
import { basename, join } from 'path';
import { v4 as uuidv4 } from 'uuid';
import { createAgent } from '../../agents/index.js';
import {
  AGENT_PIPELINE,
  Acknowledgment,
  AgentName,
  AgentResult,
  EmailInput,
  ParsedEvent,
  PipelineState,
  Quote,
  WorkflowSettings,
} from '../../shared/types/index.js';
import { createEmailId } from '../extraction/index.js';
import { FileArtifactStore } from '../storage/artifact.store.js';
import { TimelineService } from '../timeline/timeline.service.js';
import { logger } from '../../shared/utils/logger.js';
import {
  AgentExecutionError,
  AppError,
  EmptyInputError,
  NotFoundError,
} from '../../shared/utils/errors.js';

export interface ProcessEmailOptions {
  /** Label used in logs, e.g. the inbox file name. */
  source?: string;
  now?: Date;
}

export type EmailOutcome =
  | {
      status: 'processed';
      emailId: string;
      event: ParsedEvent;
      acknowledgment: Acknowledgment;
      quote: Quote;
    }
  | { status: 'skipped'; emailId: string };

export interface InboxResult {
  processed: number;
  failed: number;
  skipped: number;
  total: number;
}

const SYSTEM_ID = 'system';

export class PipelineService {
  // Ids being processed right now, so identical emails in one batch run once
  private readonly inFlight = new Set<string>();

  constructor(
    private readonly settings: WorkflowSettings,
    private readonly store: FileArtifactStore,
    private readonly timeline: TimelineService
  ) {}

  /**
   * Run one email through intake, acknowledgment and auto-quote, writing each
   * artifact as its stage finishes. Already processed emails are skipped.
   */
  async processEmail(content: string, options: ProcessEmailOptions = {}): Promise<EmailOutcome> {
    const source = options.source ?? 'api';
    const emailId = createEmailId(content);

    if (content.trim().length === 0) {
      await this.timeline.log('error', emailId, `Failed to process ${source}: empty email`);
      throw new EmptyInputError(source);
    }

    // Claimed before the first await so a concurrent copy sees it
    if (this.inFlight.has(emailId)) {
      return this.skip(emailId, source);
    }
    this.inFlight.add(emailId);

    try {
      if (await this.store.has('event', emailId)) {
        return await this.skip(emailId, source);
      }

      await this.timeline.log('start', emailId, `Processing: ${source}`);

      const state = await this.runStages({
        emailId,
        content,
        source,
        receivedAt: options.now ?? new Date(),
      });

      if (!state.event || !state.acknowledgment || !state.quote) {
        throw new AgentExecutionError('pipeline', 'stages finished without all artifacts');
      }

      return {
        status: 'processed',
        emailId,
        event: state.event,
        acknowledgment: state.acknowledgment,
        quote: state.quote,
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      await this.timeline.log('error', emailId, `Failed to process ${source}: ${message}`);
      throw error;
    } finally {
      this.inFlight.delete(emailId);
    }
  }

  /**
   * Process every .txt file in the inbox. Files run concurrently and one
   * failure never stops the others.
   */
  async processInbox(inboxDir: string): Promise<InboxResult> {
    const isDirectory = await stat(inboxDir).then(
      (stats) => stats.isDirectory(),
      () => false
    );
    if (!isDirectory) {
      throw new NotFoundError('Inbox directory', inboxDir);
    }

    const files = (await readdir(inboxDir))
      .filter((file) => file.toLowerCase().endsWith('.txt'))
      .sort();

    if (files.length === 0) {
      await this.timeline.log('info', SYSTEM_ID, `No .txt files found in ${inboxDir}`);
      return { processed: 0, failed: 0, skipped: 0, total: 0 };
    }

    await this.timeline.log(
      'start',
      SYSTEM_ID,
      `Processing ${files.length} emails from ${inboxDir}`
    );

    const outcomes = await Promise.allSettled(
      files.map(async (file) => {
        const content = await readFile(join(inboxDir, file), 'utf-8');
        return this.processEmail(content, { source: basename(file) });
      })
    );

    const result: InboxResult = { processed: 0, failed: 0, skipped: 0, total: files.length };
    outcomes.forEach((outcome, index) => {
      if (outcome.status === 'rejected') {
        result.failed += 1;
        logger.warn({ file: files[index], error: String(outcome.reason) }, 'Email failed');
      } else if (outcome.value.status === 'skipped') {
        result.skipped += 1;
      } else {
        result.processed += 1;
      }
    });

    await this.timeline.log(
      'complete',
      SYSTEM_ID,
      `Workflow complete: ${result.processed} processed, ${result.failed} failed, ${result.skipped} skipped`,
      { ...result }
    );

    logger.info({ inboxDir, ...result }, 'Inbox processed');
    return result;
  }

  private async skip(emailId: string, source: string): Promise<EmailOutcome> {
    await this.timeline.log('skip', emailId, `Already processed: ${source}`);
    return { status: 'skipped', emailId };
  }

  private async runStages(input: EmailInput): Promise<PipelineState> {
    const executionId = uuidv4();
    let state: PipelineState = {};
    let agentName: AgentName | null = AGENT_PIPELINE[0];

    while (agentName) {
      const agent = createAgent(agentName);
      const result: AgentResult = agent.execute({
        executionId,
        input,
        currentState: state,
        settings: this.settings,
        now: input.receivedAt,
      });

      for (const event of result.events) {
        logger.debug(
          { executionId, emailId: input.emailId, eventType: event.eventType, ...event.eventData },
          'Domain event'
        );
      }

      state = { ...state, ...result.outputState };
      await this.persistStageOutput(agentName, state);

      switch (result.nextAction.type) {
        case 'CONTINUE':
          agentName = result.nextAction.nextAgent;
          break;

        case 'AWAIT_HUMAN':
          logger.info(
            { executionId, emailId: input.emailId, reason: result.nextAction.reason },
            'Email awaiting sender input'
          );
          agentName = null;
          break;

        case 'COMPLETE':
          agentName = null;
          break;

        case 'FAIL': {
          const { cause, error } = result.nextAction;
          throw cause instanceof AppError ? cause : new AgentExecutionError(agentName, error);
        }
      }
    }

    return state;
  }

  private async persistStageOutput(agentName: AgentName, state: PipelineState): Promise<void> {
    const emailId = state.event?.email_id ?? 'unknown';

    switch (agentName) {
      case 'intake':
        if (state.event) {
          await this.store.saveEvent(state.event);
          await this.timeline.log(
            'parse',
            emailId,
            `Extracted ${state.event.products.length} products`,
            { gaps: state.event.gaps.length }
          );
        }
        break;

      case 'acknowledgment':
        if (state.acknowledgment) {
          await this.store.saveAcknowledgment(state.acknowledgment);
          await this.timeline.log(
            'ack',
            emailId,
            `Generated acknowledgment with ${state.acknowledgment.questions.length} questions`
          );
        }
        break;

      case 'auto-quote':
        if (state.quote) {
          const { quote } = state;
          await this.store.saveQuote(quote);
          await this.timeline.log(
            'quote',
            emailId,
            `Generated ${quote.status} quote: ${quote.currency} ${quote.total.toFixed(2)}`,
            quote.status === 'pending' ? { pendingReasons: quote.pending_reasons } : undefined
          );
        }
        break;
    }
  }
}
