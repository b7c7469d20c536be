/**
 * Base class for identity mapping stores
 * Holds the entries and enforces the add/remove contract; subclasses decide
 * where entries come from.
 */

import {
  isValidUuid,
  silentLogger,
  type IMappingStore,
  type Logger,
  type MappingEntry,
} from '@catalogsync/core';

export abstract class MappingTable implements IMappingStore {
  protected readonly entries = new Map<string, MappingEntry>();
  protected readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? silentLogger;
  }

  get size(): number {
    return this.entries.size;
  }

  getEntry(externalId: string): MappingEntry | undefined {
    const entry = this.entries.get(externalId.trim());
    return entry ? { ...entry } : undefined;
  }

  addEntry(
    externalId: string,
    type: string,
    uuid: string,
    containerPath: string | null
  ): boolean {
    const key = externalId.trim();
    const problem = this.validate(key, type, uuid, containerPath);
    if (problem) {
      this.logger.warn('Rejected mapping entry', { externalId, type, uuid, reason: problem });
      return false;
    }

    const current = this.entries.get(key);
    if (
      current &&
      current.type === type &&
      current.uuid === uuid &&
      current.containerPath === containerPath
    ) {
      return true;
    }

    this.entries.set(key, { type, uuid, containerPath });
    this.onChange();
    return true;
  }

  removeEntry(externalId: string): boolean {
    const removed = this.entries.delete(externalId.trim());
    if (removed) {
      this.onChange();
    } else {
      this.logger.debug('No mapping entry to remove', { externalId });
    }
    return removed;
  }

  getContainerPath(externalId: string): string | null | undefined {
    return this.entries.get(externalId.trim())?.containerPath;
  }

  getAllIds(): string[] {
    return [...this.entries.keys()];
  }

  /** Called after every mutation */
  protected onChange(): void {}

  protected validate(
    externalId: string,
    type: string,
    uuid: string,
    containerPath: string | null
  ): string | null {
    if (!externalId) return 'external id is empty';
    if (!type.trim()) return 'type is empty';
    if (!uuid.trim()) return 'uuid is empty';
    if (containerPath !== null && !containerPath.trim()) return 'container path is empty';
    if (!isValidUuid(uuid)) return 'uuid is not a canonical UUID';
    return null;
  }
}
