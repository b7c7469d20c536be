/**
 * Report Store
 *
 * Saves run reports as pretty-printed JSON: {reportDir}/catalog_sync_{timestamp}.json
 */

import { promises as fs } from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import { SyncError } from '../errors/index.js';
import { CHECK_IDS, type RunReport } from '../types/index.js';

const FILE_PATTERN = /^catalog_sync_[0-9TZ_-]+\.json$/;

const statusSchema = z.enum(['success', 'warning', 'error']);

const reportSchema = z.object({
  id: z.string(),
  timestamp: z.coerce.date(),
  database: z.string(),
  dryRun: z.boolean(),
  summary: z.object({
    totalChecks: z.number(),
    successful: z.number(),
    warnings: z.number(),
    errors: z.number(),
    totalIssues: z.number(),
    remediatedIssues: z.number(),
    actualIssues: z.number(),
    overallStatus: statusSchema,
  }),
  checks: z.array(
    z.object({
      id: z.enum(CHECK_IDS),
      number: z.number(),
      title: z.string(),
      status: statusSchema,
      message: z.string(),
      issues: z.array(z.object({ type: z.string(), message: z.string() }).passthrough()),
      error: z.string().optional(),
      processingTimeMs: z.number(),
    })
  ),
  processingTimeMs: z.number(),
});

/** A stored report. Issues are kept as written, without per-variant validation. */
export type StoredReport = z.infer<typeof reportSchema>;

/** "2026-03-01T06:00:00.123Z" → "2026-03-01T06-00-00Z" */
export function reportFileName(timestamp: Date): string {
  const stamp = timestamp.toISOString().replace(/\.\d{3}Z$/, 'Z').replace(/:/g, '-');
  return `catalog_sync_${stamp}.json`;
}

export class ReportStore {
  constructor(private readonly reportDir: string = './reports') {}

  async save(report: RunReport): Promise<string> {
    const filePath = path.join(this.reportDir, reportFileName(report.timestamp));
    try {
      await fs.mkdir(this.reportDir, { recursive: true });
      await fs.writeFile(filePath, `${JSON.stringify(report, null, 2)}\n`, 'utf-8');
    } catch (err) {
      throw new SyncError({
        code: 'REPORT_ERROR',
        message: `Failed to save report to ${filePath}`,
        cause: err instanceof Error ? err : undefined,
      });
    }
    return filePath;
  }

  /** Report file names, oldest first */
  async list(): Promise<string[]> {
    let files: string[];
    try {
      files = await fs.readdir(this.reportDir);
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return [];
      throw err;
    }
    return files.filter((file) => FILE_PATTERN.test(file)).sort();
  }

  async load(fileName: string): Promise<StoredReport> {
    const filePath = path.join(this.reportDir, path.basename(fileName));

    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (err) {
      throw new SyncError({
        code: 'REPORT_ERROR',
        message: `Report '${fileName}' not found`,
        context: { filePath },
        cause: err instanceof Error ? err : undefined,
      });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (err) {
      throw new SyncError({
        code: 'REPORT_ERROR',
        message: `Failed to parse report '${fileName}'`,
        cause: err instanceof Error ? err : undefined,
      });
    }

    const parsed = reportSchema.safeParse(raw);
    if (!parsed.success) {
      throw new SyncError({
        code: 'REPORT_ERROR',
        message: `Report '${fileName}' has an unexpected shape`,
        context: { issues: parsed.error.issues.map((issue) => issue.message) },
      });
    }
    return parsed.data;
  }
}
