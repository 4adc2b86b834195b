import { access, mkdir, readFile, writeFile } from 'fs/promises';
import { constants } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import { Acknowledgment, ParsedEvent, Quote } from '../../shared/types/index.js';
import {
  AcknowledgmentSchema,
  ParsedEventSchema,
  QuoteSchema,
} from '../../shared/schemas/records.schema.js';
import { logger } from '../../shared/utils/logger.js';
import { StorageError } from '../../shared/utils/errors.js';

export type ArtifactKind = 'event' | 'acknowledgment' | 'quote';

const ARTIFACT_DIRS: Record<ArtifactKind, string> = {
  event: 'events',
  acknowledgment: 'outbox',
  quote: 'quotes',
};

/**
 * JSON artifacts under the data directory:
 * events/{id}.json, outbox/{id}_ack.json and quotes/{id}.json
 */
export class FileArtifactStore {
  constructor(private readonly dataDir: string) {}

  get root(): string {
    return this.dataDir;
  }

  /**
   * Create the artifact directories if they don't exist
   */
  async initialize(): Promise<void> {
    try {
      await Promise.all(
        Object.values(ARTIFACT_DIRS).map((dir) =>
          mkdir(join(this.dataDir, dir), { recursive: true })
        )
      );
      logger.info({ dataDir: this.dataDir }, 'Artifact store initialized');
    } catch (error) {
      logger.error({ error, dataDir: this.dataDir }, 'Failed to initialize artifact store');
      throw new StorageError(`Failed to initialize artifact store: ${String(error)}`);
    }
  }

  pathFor(kind: ArtifactKind, emailId: string): string {
    const file = kind === 'acknowledgment' ? `${emailId}_ack.json` : `${emailId}.json`;
    return join(this.dataDir, ARTIFACT_DIRS[kind], file);
  }

  saveEvent(event: ParsedEvent): Promise<string> {
    return this.write('event', event.email_id, event);
  }

  saveAcknowledgment(acknowledgment: Acknowledgment): Promise<string> {
    return this.write('acknowledgment', acknowledgment.email_id, acknowledgment);
  }

  saveQuote(quote: Quote): Promise<string> {
    return this.write('quote', quote.email_id, quote);
  }

  getEvent(emailId: string): Promise<ParsedEvent | null> {
    return this.read('event', emailId, ParsedEventSchema);
  }

  getAcknowledgment(emailId: string): Promise<Acknowledgment | null> {
    return this.read('acknowledgment', emailId, AcknowledgmentSchema);
  }

  getQuote(emailId: string): Promise<Quote | null> {
    return this.read('quote', emailId, QuoteSchema);
  }

  /**
   * An email counts as processed once its parsed event is on disk
   */
  async has(kind: ArtifactKind, emailId: string): Promise<boolean> {
    try {
      await access(this.pathFor(kind, emailId), constants.F_OK);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Check that every artifact directory is writable
   */
  async healthCheck(): Promise<boolean> {
    try {
      await Promise.all(
        Object.values(ARTIFACT_DIRS).map((dir) =>
          access(join(this.dataDir, dir), constants.W_OK)
        )
      );
      return true;
    } catch (error) {
      logger.warn({ error, dataDir: this.dataDir }, 'Artifact store health check failed');
      return false;
    }
  }

  private async write(kind: ArtifactKind, emailId: string, record: object): Promise<string> {
    const path = this.pathFor(kind, emailId);
    try {
      await mkdir(join(this.dataDir, ARTIFACT_DIRS[kind]), { recursive: true });
      await writeFile(path, `${JSON.stringify(record, null, 2)}\n`, 'utf-8');
    } catch (error) {
      logger.error({ error, path }, 'Failed to write artifact');
      throw new StorageError(`Failed to write ${kind} for ${emailId}: ${String(error)}`);
    }

    logger.debug({ kind, emailId, path }, 'Artifact written');
    return path;
  }

  private async read<T>(
    kind: ArtifactKind,
    emailId: string,
    schema: z.ZodType<T>
  ): Promise<T | null> {
    const path = this.pathFor(kind, emailId);

    let content: string;
    try {
      content = await readFile(path, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return null;
      }
      throw new StorageError(`Failed to read ${kind} for ${emailId}: ${String(error)}`);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new StorageError(`Corrupt ${kind} artifact at ${path}: ${String(error)}`);
    }

    const result = schema.safeParse(raw);
    if (!result.success) {
      throw new StorageError(`Corrupt ${kind} artifact at ${path}: ${result.error.message}`);
    }
    return result.data;
  }
}
