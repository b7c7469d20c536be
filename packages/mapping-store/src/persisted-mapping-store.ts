/**
 * Persisted identity mapping
 * One CSV file per database/scheme pair with the columns
 * external_id, type, uuid, container_path. Written on demand via save().
 */

import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';
import { ConnectorError, type Logger } from '@catalogsync/core';
import { MappingTable } from './mapping-table.js';

export const MAPPING_COLUMNS = ['external_id', 'type', 'uuid', 'container_path'] as const;

const mappingRowSchema = z.object({
  external_id: z.string(),
  type: z.string(),
  uuid: z.string(),
  container_path: z.string().optional(),
});

export interface PersistedMappingStoreConfig {
  /** Directory holding the mapping files */
  directory: string;
  database: string;
  scheme: string;
  /** Id space of the external ids, e.g. "directory-person" */
  idSpace: string;
  logger?: Logger;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

function sanitizeSegment(value: string): string {
  return value.replace(/[^a-zA-Z0-9_-]/g, '_');
}

export function mappingFileName(database: string, scheme: string, idSpace: string): string {
  return `${sanitizeSegment(database)}_${sanitizeSegment(scheme)}_${sanitizeSegment(idSpace)}-mapping.csv`;
}

export class PersistedMappingStore extends MappingTable {
  readonly filePath: string;
  private dirty = false;

  constructor(config: PersistedMappingStoreConfig) {
    super(config.logger);
    this.filePath = join(
      config.directory,
      mappingFileName(config.database, config.scheme, config.idSpace)
    );
  }

  /** True when entries changed since the last load or save */
  get isDirty(): boolean {
    return this.dirty;
  }

  /**
   * Replace the in-memory entries with the file contents. A missing file
   * yields an empty store; rows with an invalid uuid are skipped.
   */
  async load(): Promise<void> {
    let content: string;
    try {
      content = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        this.entries.clear();
        this.dirty = false;
        return;
      }
      throw new ConnectorError({
        code: 'READ_FAILED',
        message: `Failed to read mapping file: ${this.filePath}`,
        source: 'mapping-store',
        cause: error instanceof Error ? error : undefined,
      });
    }

    const rows: unknown = parse(content.replace(/^\uFEFF/, ''), {
      columns: true,
      skip_empty_lines: true,
      trim: true,
    });

    this.entries.clear();
    for (const row of Array.isArray(rows) ? rows : []) {
      const parsed = mappingRowSchema.safeParse(row);
      if (!parsed.success) {
        throw new ConnectorError({
          code: 'READ_FAILED',
          message: `Mapping file ${this.filePath} is missing one of the columns ${MAPPING_COLUMNS.join(', ')}`,
          source: 'mapping-store',
        });
      }
      const { external_id, type, uuid, container_path } = parsed.data;
      const containerPath = container_path ? container_path : null;
      const problem = this.validate(external_id, type, uuid, containerPath);
      if (problem) {
        this.logger.warn('Skipping mapping row', { externalId: external_id, reason: problem });
        continue;
      }
      this.entries.set(external_id, { type, uuid, containerPath });
    }
    this.dirty = false;
  }

  /**
   * Write all entries, sorted by external id. The file is replaced atomically.
   */
  async save(): Promise<void> {
    const rows = [...this.entries.entries()]
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([externalId, entry]) => ({
        external_id: externalId,
        type: entry.type,
        uuid: entry.uuid,
        container_path: entry.containerPath ?? '',
      }));

    const content = stringify(rows, { header: true, columns: [...MAPPING_COLUMNS] });
    const tmpPath = `${this.filePath}.tmp`;

    try {
      await mkdir(dirname(this.filePath), { recursive: true });
      await writeFile(tmpPath, content, 'utf-8');
      await rename(tmpPath, this.filePath);
    } catch (error) {
      throw new ConnectorError({
        code: 'WRITE_FAILED',
        message: `Failed to write mapping file: ${this.filePath}`,
        source: 'mapping-store',
        suggestion: 'Check that run.mappingDir is writable.',
        cause: error instanceof Error ? error : undefined,
      });
    }
    this.dirty = false;
  }

  protected override onChange(): void {
    this.dirty = true;
  }
}
