import { afterEach, describe, expect, it } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { AuditTrail } from '../src/audit/index.js';
import { ReportStore, formatRunReport, reportFileName } from '../src/report/index.js';
import type { RunReport } from '../src/types/index.js';

let tmpDir = '';

afterEach(() => {
  if (tmpDir) {
    rmSync(tmpDir, { recursive: true, force: true });
    tmpDir = '';
  }
});

function createTmpDir(): string {
  tmpDir = mkdtempSync(join(tmpdir(), 'catalog-sync-'));
  return tmpDir;
}

const report: RunReport = {
  id: 'run-1',
  timestamp: new Date('2026-03-01T06:00:00.123Z'),
  database: 'test-db',
  dryRun: false,
  summary: {
    totalChecks: 2,
    successful: 1,
    warnings: 1,
    errors: 0,
    totalIssues: 2,
    remediatedIssues: 1,
    actualIssues: 1,
    overallStatus: 'warning',
  },
  checks: [
    {
      id: 'post-assignment',
      number: 3,
      title: 'Post assignment',
      status: 'success',
      message: 'Check #3: Found 1 issue(s) (1 automatically fixed, 0 requiring attention)',
      issues: [
        {
          type: 'assignment_added',
          postId: 'p1',
          postLabel: 'Chair',
          personId: 'a',
          personName: 'Anna Beispiel',
          message: 'Assigned Anna Beispiel to post Chair',
          remediationAttempted: true,
          remediationSuccess: true,
        },
      ],
      processingTimeMs: 5,
    },
    {
      id: 'post-occupation',
      number: 4,
      title: 'Post occupation',
      status: 'warning',
      message: 'Check #4: Found 1 issue(s) (0 automatically fixed, 1 requiring attention)',
      issues: [
        {
          type: 'unoccupied_post',
          postId: 'p2',
          postLabel: 'Vacant',
          message: 'Post Vacant has no holder',
          remediationAttempted: false,
          remediationSuccess: false,
        },
      ],
      processingTimeMs: 2,
    },
  ],
  processingTimeMs: 7,
};

describe('ReportStore', () => {
  it('names files by run timestamp', () => {
    expect(reportFileName(report.timestamp)).toBe('catalog_sync_2026-03-01T06-00-00Z.json');
  });

  it('saves, lists and loads reports', async () => {
    const dir = createTmpDir();
    const store = new ReportStore(join(dir, 'reports'));

    expect(await store.list()).toEqual([]);
    const filePath = await store.save(report);

    expect(filePath).toBe(join(dir, 'reports', 'catalog_sync_2026-03-01T06-00-00Z.json'));
    expect(JSON.parse(readFileSync(filePath, 'utf-8')).summary.overallStatus).toBe('warning');
    expect(await store.list()).toEqual(['catalog_sync_2026-03-01T06-00-00Z.json']);

    const loaded = await store.load('catalog_sync_2026-03-01T06-00-00Z.json');
    expect(loaded.timestamp).toEqual(report.timestamp);
    expect(loaded.checks.map((check) => check.id)).toEqual(['post-assignment', 'post-occupation']);
  });
});

describe('formatRunReport', () => {
  it('lists only the issues that need attention', () => {
    const lines = formatRunReport(report).split('\n');

    expect(lines.slice(0, 4)).toEqual([
      '## Catalog Sync Report',
      'Database: test-db',
      'Generated: 2026-03-01T06:00:00.123Z',
      'Status: WARNING',
    ]);
    expect(lines).toContain('### #3 Post assignment [OK]');
    expect(lines).toContain('(1 fixed automatically)');
    expect(lines).toContain('- [open] Post Vacant has no holder');
    expect(lines).not.toContain('- [open] Assigned Anna Beispiel to post Chair');
    expect(lines[lines.length - 1]).toBe('Processing time: 7ms');
  });
});

describe('AuditTrail', () => {
  it('appends entries to one file per day and reads a range back', async () => {
    const dir = createTmpDir();
    const audit = new AuditTrail(dir);

    await Promise.all([
      audit.append({
        timestamp: new Date('2026-03-01T23:59:00.000Z'),
        database: 'test-db',
        operation: 'create_person',
        target: 'u1',
        details: { givenName: 'Anna' },
        dryRun: false,
      }),
      audit.append({
        timestamp: new Date('2026-03-02T00:01:00.000Z'),
        database: 'test-db',
        operation: 'link_person_to_post',
        target: 'u1',
        details: { postId: 'p1' },
        dryRun: false,
      }),
      audit.append({
        timestamp: new Date('2026-03-02T08:00:00.000Z'),
        database: 'test-db',
        operation: 'update_user_access_level',
        target: 'x1',
        details: { to: 'EDITOR' },
        dryRun: false,
      }),
    ]);

    expect(readFileSync(join(dir, 'remediation-2026-03-02.ndjson'), 'utf-8').trim().split('\n')).toHaveLength(2);

    const entries = await audit.read({
      from: new Date('2026-03-01T00:00:00.000Z'),
      to: new Date('2026-03-02T01:00:00.000Z'),
    });
    expect(entries.map((entry) => entry.operation)).toEqual(['create_person', 'link_person_to_post']);
    expect(entries[0]?.timestamp).toEqual(new Date('2026-03-01T23:59:00.000Z'));
  });

  it('reads nothing for days without a file', async () => {
    const audit = new AuditTrail(createTmpDir());
    expect(await audit.read({ from: new Date('2026-01-01T00:00:00Z'), to: new Date('2026-01-03T00:00:00Z') })).toEqual([]);
  });
});
