import { appendFile, mkdir, readFile } from 'fs/promises';
import { dirname } from 'path';
import { z } from 'zod';
import { logger } from '../../shared/utils/logger.js';
import { StorageError } from '../../shared/utils/errors.js';

export const TIMELINE_ACTIONS = [
  'start',
  'parse',
  'ack',
  'quote',
  'skip',
  'error',
  'info',
  'complete',
] as const;

export type TimelineAction = (typeof TIMELINE_ACTIONS)[number];

/**
 * One line of the activity log. `email_id` is "system" for batch-level entries.
 */
export interface TimelineEntry {
  timestamp: string;
  action: string;
  email_id: string;
  message: string;
  details?: Record<string, unknown>;
}

export interface TimelineStats {
  totalEntries: number;
  actions: Record<string, number>;
  emailIds: string[];
  uniqueEmails: number;
  errors: number;
}

const TimelineEntrySchema = z.object({
  timestamp: z.string(),
  action: z.string(),
  email_id: z.string(),
  message: z.string(),
  details: z.record(z.unknown()).optional(),
});

type ParsedLine = { ok: true; entry: TimelineEntry } | { ok: false };

function parseLine(line: string): ParsedLine {
  try {
    const result = TimelineEntrySchema.safeParse(JSON.parse(line));
    return result.success ? { ok: true, entry: result.data } : { ok: false };
  } catch {
    return { ok: false };
  }
}

export class TimelineService {
  private directoryReady: Promise<string | undefined> | null = null;

  constructor(private readonly logFile: string) {}

  get path(): string {
    return this.logFile;
  }

  /**
   * Append an entry to the activity log
   */
  async log(
    action: TimelineAction,
    emailId: string,
    message: string,
    details?: Record<string, unknown>
  ): Promise<TimelineEntry> {
    const entry: TimelineEntry = {
      timestamp: new Date().toISOString(),
      action,
      email_id: emailId,
      message,
    };
    if (details) {
      entry.details = details;
    }

    try {
      this.directoryReady ??= mkdir(dirname(this.logFile), { recursive: true });
      await this.directoryReady;
      await appendFile(this.logFile, `${JSON.stringify(entry)}\n`, 'utf-8');
    } catch (error) {
      this.directoryReady = null;
      logger.error({ error, logFile: this.logFile }, 'Failed to write timeline entry');
      throw new StorageError(`Failed to write timeline entry: ${String(error)}`);
    }

    logger.debug({ action, emailId }, message);
    return entry;
  }

  /**
   * Last `limit` entries, oldest first
   */
  async getRecent(limit: number = 10): Promise<TimelineEntry[]> {
    if (limit <= 0) {
      return [];
    }
    const lines = await this.readLines();
    return this.parseEntries(lines.slice(-limit));
  }

  async getByEmail(emailId: string): Promise<TimelineEntry[]> {
    const entries = this.parseEntries(await this.readLines());
    return entries.filter((entry) => entry.email_id === emailId);
  }

  async getByAction(action: string): Promise<TimelineEntry[]> {
    const entries = this.parseEntries(await this.readLines());
    return entries.filter((entry) => entry.action === action);
  }

  /**
   * Counts over the whole log. Lines that do not parse count as errors.
   */
  async getSummaryStats(): Promise<TimelineStats> {
    const stats: TimelineStats = {
      totalEntries: 0,
      actions: {},
      emailIds: [],
      uniqueEmails: 0,
      errors: 0,
    };
    const seen = new Set<string>();

    for (const line of await this.readLines()) {
      const parsed = parseLine(line);
      if (!parsed.ok) {
        stats.errors += 1;
        continue;
      }

      const { entry } = parsed;
      stats.totalEntries += 1;
      stats.actions[entry.action] = (stats.actions[entry.action] ?? 0) + 1;
      seen.add(entry.email_id);
      if (entry.action === 'error') {
        stats.errors += 1;
      }
    }

    stats.emailIds = [...seen];
    stats.uniqueEmails = seen.size;
    return stats;
  }

  private parseEntries(lines: string[]): TimelineEntry[] {
    const entries: TimelineEntry[] = [];
    for (const line of lines) {
      const parsed = parseLine(line);
      if (parsed.ok) {
        entries.push(parsed.entry);
      }
    }
    return entries;
  }

  private async readLines(): Promise<string[]> {
    let content: string;
    try {
      content = await readFile(this.logFile, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return [];
      }
      throw new StorageError(`Failed to read timeline: ${String(error)}`);
    }

    return content.split('\n').filter((line) => line.trim().length > 0);
  }
}
