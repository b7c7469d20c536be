/**
 * Remediation Audit Trail
 *
 * Append-only log of every write the executor applied.
 * Format: {auditDir}/remediation-{YYYY-MM-DD}.ndjson, one entry per line.
 */

import { randomUUID } from 'node:crypto';
import { promises as fs } from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import { silentLogger, type Logger } from '@catalogsync/core';
import { SyncError } from '../errors/index.js';

export const REMEDIATION_OPERATIONS = [
  'create_person',
  'create_user',
  'link_person_to_post',
  'unlink_person_from_post',
  'update_person_name',
  'update_person_sk_id',
  'update_user_access_level',
  'update_user_person_link',
  'update_contact_details',
] as const;

export type RemediationOperation = (typeof REMEDIATION_OPERATIONS)[number];

export interface AuditEntry {
  id: string;
  timestamp: Date;
  database: string;
  operation: RemediationOperation;
  /** Id of the resource written */
  target: string;
  details: Record<string, unknown>;
  dryRun: boolean;
}

export type AuditInput = Omit<AuditEntry, 'id' | 'timestamp'> & { timestamp?: Date };

const auditLineSchema = z.object({
  id: z.string(),
  timestamp: z.coerce.date(),
  database: z.string(),
  operation: z.enum(REMEDIATION_OPERATIONS),
  target: z.string(),
  details: z.record(z.unknown()),
  dryRun: z.boolean(),
});

function dayOf(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export class AuditTrail {
  private static writeQueue = new Map<string, Promise<void>>();
  private readonly logger: Logger;

  constructor(
    private readonly auditDir: string,
    options: { logger?: Logger } = {}
  ) {
    this.logger = options.logger ?? silentLogger;
  }

  filePath(date: Date): string {
    return path.join(this.auditDir, `remediation-${dayOf(date)}.ndjson`);
  }

  async append(input: AuditInput): Promise<AuditEntry> {
    const entry: AuditEntry = { ...input, id: randomUUID(), timestamp: input.timestamp ?? new Date() };
    const filePath = this.filePath(entry.timestamp);
    const line = `${JSON.stringify(entry)}\n`;

    try {
      await fs.mkdir(this.auditDir, { recursive: true, mode: 0o700 });
      await this.enqueueWrite(filePath, () => fs.appendFile(filePath, line, { encoding: 'utf-8', mode: 0o600 }));
    } catch (err) {
      throw new SyncError({
        code: 'AUDIT_LOG_ERROR',
        message: `Failed to write audit entry to ${filePath}`,
        cause: err instanceof Error ? err : undefined,
      });
    }
    return entry;
  }

  /**
   * Entries between `from` and `to` inclusive, oldest first.
   */
  async read(range: { from: Date; to: Date }): Promise<AuditEntry[]> {
    const entries: AuditEntry[] = [];
    const lastDay = dayOf(range.to);

    const cursor = new Date(`${dayOf(range.from)}T00:00:00.000Z`);
    while (dayOf(cursor) <= lastDay) {
      for (const entry of await this.readFile(this.filePath(cursor))) {
        if (entry.timestamp >= range.from && entry.timestamp <= range.to) entries.push(entry);
      }
      cursor.setUTCDate(cursor.getUTCDate() + 1);
    }

    return entries.sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
  }

  private async readFile(filePath: string): Promise<AuditEntry[]> {
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (err) {
      if (isMissing(err)) return [];
      throw new SyncError({
        code: 'AUDIT_LOG_ERROR',
        message: `Failed to read audit log ${filePath}`,
        cause: err instanceof Error ? err : undefined,
      });
    }

    const entries: AuditEntry[] = [];
    for (const line of content.split('\n')) {
      if (!line.trim()) continue;
      let raw: unknown;
      try {
        raw = JSON.parse(line);
      } catch (err) {
        this.logger.warn('Skipping unreadable audit line', { filePath, error: err });
        continue;
      }
      const parsed = auditLineSchema.safeParse(raw);
      if (parsed.success) {
        entries.push(parsed.data);
      } else {
        this.logger.warn('Skipping invalid audit line', { filePath });
      }
    }
    return entries;
  }

  private enqueueWrite(filePath: string, op: () => Promise<void>): Promise<void> {
    const previous = AuditTrail.writeQueue.get(filePath) ?? Promise.resolve();
    const next = previous.then(op, op);
    const wrapped: Promise<void> = next.finally(() => {
      if (AuditTrail.writeQueue.get(filePath) === wrapped) {
        AuditTrail.writeQueue.delete(filePath);
      }
    });
    AuditTrail.writeQueue.set(filePath, wrapped);
    return wrapped;
  }
}
