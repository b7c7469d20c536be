/**
 * In-memory identity mapping refreshed from the catalog
 * Built from one bulk download of a scheme; nothing is written to disk.
 */

import { cellText, type CatalogAsset, type ICatalogGateway, type Logger } from '@catalogsync/core';
import { MappingTable } from './mapping-table.js';

export type AssetSource = () => Promise<CatalogAsset[]>;

export interface InMemoryMappingOptions {
  /** Asset field holding the external id */
  idField: string;
  /** Keep only matching assets (default: assets with a non-empty idField) */
  filter?: (asset: CatalogAsset) => boolean;
  /** Asset field holding the container path (default: inCollection) */
  containerField?: string;
  logger?: Logger;
}

export class InMemoryMappingStore extends MappingTable {
  private readonly idField: string;
  private readonly containerField: string;
  private readonly filter: (asset: CatalogAsset) => boolean;

  constructor(
    private readonly source: AssetSource,
    options: InMemoryMappingOptions
  ) {
    super(options.logger);
    this.idField = options.idField;
    this.containerField = options.containerField ?? 'inCollection';
    this.filter = options.filter ?? ((asset) => cellText(asset[this.idField]) !== null);
  }

  /**
   * Download all assets of a scheme and build the mapping.
   */
  static async fromCatalog(
    gateway: Pick<ICatalogGateway, 'downloadAssets'>,
    scheme: string,
    options: InMemoryMappingOptions
  ): Promise<InMemoryMappingStore> {
    const store = new InMemoryMappingStore(() => gateway.downloadAssets(scheme), options);
    await store.refresh();
    return store;
  }

  /**
   * Clear and rebuild from the source. Download failures propagate and leave
   * the previous entries in place.
   */
  async refresh(): Promise<void> {
    const assets = await this.source();

    this.entries.clear();
    let skipped = 0;
    for (const asset of assets) {
      if (!this.filter(asset)) continue;

      const externalId = cellText(asset[this.idField]);
      const uuid = asset.id;
      const type = asset._type;
      if (!externalId || !uuid || !type) {
        skipped += 1;
        continue;
      }

      const containerPath = cellText(asset[this.containerField]);
      if (this.validate(externalId, type, uuid, containerPath)) {
        skipped += 1;
        continue;
      }
      this.entries.set(externalId, { type, uuid, containerPath });
    }

    this.logger.debug('Mapping refreshed', { idField: this.idField, entries: this.entries.size, skipped });
  }
}
