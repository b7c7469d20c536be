import { afterEach, describe, expect, it, vi } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { Logger, type CatalogAsset } from '@catalogsync/core';
import { InMemoryMappingStore, PersistedMappingStore, mappingFileName } from '../src/index.js';

const UUID_A = '0f8fad5b-d9cb-469f-a165-70867728950e';
const UUID_B = '7c9e6679-7425-40de-944b-e07fc1f90ae7';

let tmpDir = '';

afterEach(() => {
  if (tmpDir) {
    rmSync(tmpDir, { recursive: true, force: true });
    tmpDir = '';
  }
});

function createStore(logger?: Logger): PersistedMappingStore {
  tmpDir = mkdtempSync(join(tmpdir(), 'mapping-store-'));
  return new PersistedMappingStore({
    directory: tmpDir,
    database: 'prod',
    scheme: 'persons',
    idSpace: 'directory-person',
    logger,
  });
}

describe('PersistedMappingStore', () => {
  it('returns exactly what was added', () => {
    const store = createStore();

    expect(store.addEntry('4711', 'Person', UUID_A, 'Org/Department')).toBe(true);

    expect(store.getEntry('4711')).toEqual({ type: 'Person', uuid: UUID_A, containerPath: 'Org/Department' });
    expect(store.getContainerPath('4711')).toBe('Org/Department');
    expect(store.getAllIds()).toEqual(['4711']);
  });

  it('rejects malformed UUIDs without touching the store', () => {
    const lines: string[] = [];
    const store = createStore(new Logger({ sink: (line) => lines.push(line) }));
    store.addEntry('4711', 'Person', UUID_A, null);

    expect(store.addEntry('4711', 'Person', 'NOT-A-UUID', null)).toBe(false);
    expect(store.addEntry('4712', 'Person', UUID_A.toUpperCase(), null)).toBe(false);

    expect(store.getEntry('4711')).toEqual({ type: 'Person', uuid: UUID_A, containerPath: null });
    expect(store.getEntry('4712')).toBeUndefined();
    expect(store.size).toBe(1);
    expect(lines.filter((line) => line.includes('WARN Rejected mapping entry'))).toHaveLength(2);
  });

  it('rejects empty fields', () => {
    const store = createStore();

    expect(store.addEntry(' ', 'Person', UUID_A, null)).toBe(false);
    expect(store.addEntry('4711', '', UUID_A, null)).toBe(false);
    expect(store.addEntry('4711', 'Person', '', null)).toBe(false);
    expect(store.addEntry('4711', 'Person', UUID_A, '  ')).toBe(false);
    expect(store.size).toBe(0);
  });

  it('removes entries', () => {
    const store = createStore();
    store.addEntry('4711', 'Person', UUID_A, null);

    expect(store.removeEntry('4711')).toBe(true);
    expect(store.removeEntry('4711')).toBe(false);
    expect(store.getEntry('4711')).toBeUndefined();
  });

  it('persists only on save', async () => {
    const store = createStore();
    await store.load();
    store.addEntry('4711', 'Person', UUID_A, null);
    store.addEntry('0815', 'Person', UUID_B, 'Org/Finance');
    expect(store.isDirty).toBe(true);

    const file = join(tmpDir, 'prod_persons_directory-person-mapping.csv');
    expect(store.filePath).toBe(file);

    await store.save();

    expect(store.isDirty).toBe(false);
    expect(readFileSync(file, 'utf-8')).toBe(
      `external_id,type,uuid,container_path\n0815,Person,${UUID_B},Org/Finance\n4711,Person,${UUID_A},\n`
    );

    const reloaded = new PersistedMappingStore({
      directory: tmpDir,
      database: 'prod',
      scheme: 'persons',
      idSpace: 'directory-person',
    });
    await reloaded.load();
    expect(reloaded.getEntry('4711')).toEqual({ type: 'Person', uuid: UUID_A, containerPath: null });
    expect(reloaded.getEntry('0815')).toEqual({ type: 'Person', uuid: UUID_B, containerPath: 'Org/Finance' });
  });

  it('skips rows with invalid uuids when loading', async () => {
    const store = createStore();
    writeFileSync(
      store.filePath,
      `external_id,type,uuid,container_path\n1,Person,broken,\n2,Person,${UUID_A},\n`
    );

    await store.load();

    expect(store.getAllIds()).toEqual(['2']);
  });

  it('starts empty when no file exists', async () => {
    const store = createStore();
    await store.load();
    expect(store.size).toBe(0);
  });

  it('sanitizes file name segments', () => {
    expect(mappingFileName('prod', 'Org units', 'ods/id')).toBe('prod_Org_units_ods_id-mapping.csv');
  });
});

describe('InMemoryMappingStore', () => {
  const assets: CatalogAsset[] = [
    { id: UUID_A, _type: 'Dataset', odsId: '"100123"', inCollection: 'Open Data' },
    { id: UUID_B, _type: 'Dataset', odsId: null },
    { _type: 'Dataset', odsId: '100999' },
    { id: '7c9e6679-7425-40de-944b-e07fc1f90ae8', odsId: '100777' },
  ];

  it('keeps assets carrying the id field and skips incomplete ones', async () => {
    const gateway = { downloadAssets: vi.fn().mockResolvedValue(assets) };

    const store = await InMemoryMappingStore.fromCatalog(gateway, 'datasets', { idField: 'odsId' });

    expect(gateway.downloadAssets).toHaveBeenCalledWith('datasets');
    expect(store.getAllIds()).toEqual(['100123']);
    expect(store.getEntry('100123')).toEqual({ type: 'Dataset', uuid: UUID_A, containerPath: 'Open Data' });
  });

  it('honours a caller-supplied filter', async () => {
    const gateway = { downloadAssets: vi.fn().mockResolvedValue(assets) };

    const store = await InMemoryMappingStore.fromCatalog(gateway, 'datasets', {
      idField: 'odsId',
      filter: (asset) => asset.inCollection !== 'Open Data',
    });

    expect(store.size).toBe(0);
  });

  it('rebuilds on refresh and keeps entries when the download fails', async () => {
    const source = vi
      .fn<() => Promise<CatalogAsset[]>>()
      .mockResolvedValueOnce(assets)
      .mockResolvedValueOnce([{ id: UUID_B, _type: 'Dataset', odsId: '200' }])
      .mockRejectedValueOnce(new Error('catalog unavailable'));
    const store = new InMemoryMappingStore(source, { idField: 'odsId' });

    await store.refresh();
    expect(store.getAllIds()).toEqual(['100123']);

    await store.refresh();
    expect(store.getAllIds()).toEqual(['200']);

    await expect(store.refresh()).rejects.toThrow('catalog unavailable');
    expect(store.getAllIds()).toEqual(['200']);
  });
});
