/**
 * Person Lookup Cache
 *
 * Lazily built index of catalog persons by directory id and by name, loaded with
 * a single bulk query. Mutations to persons make it stale: call invalidate().
 */

import { personNameKey, silentLogger, type Logger } from '@catalogsync/core';
import { InMemoryMappingStore } from '@catalogsync/mapping-store';
import type { CatalogState } from '../state/catalog-state.js';
import type { CatalogPersonRow } from '../types/index.js';

export class PersonLookupCache {
  private readonly byDirectoryId: InMemoryMappingStore;
  private byName = new Map<string, CatalogPersonRow[]>();
  private byId = new Map<string, CatalogPersonRow>();
  private loading: Promise<void> | null = null;
  private loads = 0;
  private readonly logger: Logger;

  constructor(
    private readonly state: Pick<CatalogState, 'listPersons'>,
    options: { logger?: Logger } = {}
  ) {
    this.logger = options.logger ?? silentLogger;
    this.byDirectoryId = new InMemoryMappingStore(() => this.download(), {
      idField: 'sk_person_id',
      logger: this.logger,
    });
  }

  /** Number of bulk loads so far */
  get loadCount(): number {
    return this.loads;
  }

  async findByDirectoryId(skPersonId: string): Promise<CatalogPersonRow | undefined> {
    await this.ensureLoaded();
    const entry = this.byDirectoryId.getEntry(skPersonId.trim());
    return entry ? this.byId.get(entry.uuid) : undefined;
  }

  /**
   * First catalog person named "Given Family", in catalog order. With a
   * directory id, only persons that carry no directory id or that very one match.
   */
  async findByName(
    givenName: string,
    familyName: string,
    claimableBy?: string | null
  ): Promise<CatalogPersonRow | undefined> {
    await this.ensureLoaded();
    const namesakes = this.byName.get(personNameKey(givenName, familyName)) ?? [];
    if (claimableBy === undefined) return namesakes[0];
    return namesakes.find(
      (row) => row.skPersonId === null || (claimableBy !== null && row.skPersonId === claimableBy)
    );
  }

  async getById(personId: string): Promise<CatalogPersonRow | undefined> {
    await this.ensureLoaded();
    return this.byId.get(personId);
  }

  invalidate(): void {
    this.loading = null;
  }

  private ensureLoaded(): Promise<void> {
    if (!this.loading) {
      const loading = this.byDirectoryId.refresh();
      this.loading = loading;
      loading.catch(() => {
        if (this.loading === loading) this.loading = null;
      });
    }
    return this.loading;
  }

  private async download(): Promise<Array<{ id: string; _type: string; sk_person_id: string | null }>> {
    const rows = await this.state.listPersons();
    this.loads += 1;

    const byId = new Map<string, CatalogPersonRow>();
    const byName = new Map<string, CatalogPersonRow[]>();
    for (const row of rows) {
      byId.set(row.id, row);
      if (row.givenName && row.familyName) {
        const key = personNameKey(row.givenName, row.familyName);
        const namesakes = byName.get(key);
        if (namesakes) namesakes.push(row);
        else byName.set(key, [row]);
      }
    }
    this.byId = byId;
    this.byName = byName;
    this.logger.debug('Person lookups loaded', { persons: rows.length });

    return rows.map((row) => ({ id: row.id, _type: 'Person', sk_person_id: row.skPersonId }));
  }
}
