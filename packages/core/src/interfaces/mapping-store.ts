/**
 * Identity Mapping Store Interface
 *
 * Maps an external identifier to the catalog-internal (type, uuid, container path)
 * triple. External ids are assumed unique within one store.
 */

import type { MappingEntry } from '../types/index.js';

export interface IMappingStore {
  /** Number of entries */
  readonly size: number;

  getEntry(externalId: string): MappingEntry | undefined;

  /**
   * Add or replace an entry.
   * @returns false when a field is empty or the uuid is malformed; the store is left unchanged
   */
  addEntry(
    externalId: string,
    type: string,
    uuid: string,
    containerPath: string | null
  ): boolean;

  /** @returns false when no entry existed */
  removeEntry(externalId: string): boolean;

  getContainerPath(externalId: string): string | null | undefined;

  getAllIds(): string[];
}
