import { describe, expect, it } from 'vitest';
import { SyncError } from '../src/errors/index.js';
import { DirectoryCache, PersonLookupCache, findPersonLink, parseDirectoryPerson } from '../src/cache/index.js';
import { FakeCatalog, FakeDirectory } from './fakes.js';

function expectSyncError(error: unknown, code: SyncError['code']): void {
  expect(error instanceof SyncError && error.code).toBe(code);
}

describe('DirectoryCache', () => {
  it('fetches a person once per run', async () => {
    const directory = new FakeDirectory();
    directory.addPerson('1001', { firstName: 'Alice', lastName: 'Exampleton', email: 'alice@example.test' });
    const cache = new DirectoryCache(directory);

    const first = await cache.getPersonById('1001');
    const second = await cache.getPersonById('1001');

    expect(second).toBe(first);
    expect(directory.calls).toEqual(['person:1001']);
    expect(cache.stats()).toEqual({ hits: 1, networkCalls: 1, memberships: 0, persons: 1 });
  });

  it('resolves a membership to its person through the person link', async () => {
    const directory = new FakeDirectory();
    directory.addMembership('M1', '1001');
    directory.addPerson('1001', { firstName: 'Alice', lastName: 'Exampleton', phone: '+41 61 000 00 00' });
    const cache = new DirectoryCache(directory);

    expect(await cache.getMembership(' M1 ')).toEqual({
      membershipId: 'M1',
      personId: '1001',
      personLink: 'https://directory.test/api/people/1001',
    });
    expect(await cache.getPersonByMembership('M1')).toMatchObject({ personId: '1001', givenName: 'Alice' });
    expect(await cache.getContactDetails('1001')).toEqual({ email: null, phone: '+41 61 000 00 00' });
    expect(directory.calls).toEqual(['membership:M1', 'person:1001']);
  });

  it('does not cache failures', async () => {
    const directory = new FakeDirectory();
    const cache = new DirectoryCache(directory);

    await expect(cache.getPersonById('1001')).rejects.toThrow('404');
    directory.addPerson('1001', { firstName: 'Alice', lastName: 'Exampleton' });

    expect((await cache.getPersonById('1001')).familyName).toBe('Exampleton');
    expect(directory.calls).toEqual(['person:1001', 'person:1001']);
  });

  it('rejects empty membership ids and memberships without a person', async () => {
    const directory = new FakeDirectory();
    directory.addMembership('M2', null);
    const cache = new DirectoryCache(directory);

    expectSyncError(await cache.getMembership('  ').catch((err: unknown) => err), 'INVALID_MEMBERSHIP');
    expectSyncError(await cache.getMembership('M2').catch((err: unknown) => err), 'MISSING_PERSON_LINK');
    expect(directory.calls).toEqual(['membership:M2']);
  });

  it('fetches again after invalidate', async () => {
    const directory = new FakeDirectory();
    directory.addPerson('1001', { firstName: 'Alice', lastName: 'Exampleton' });
    const cache = new DirectoryCache(directory);

    await cache.getPersonById('1001');
    cache.invalidate();
    await cache.getPersonById('1001');

    expect(directory.calls).toEqual(['person:1001', 'person:1001']);
  });
});

describe('parseDirectoryPerson', () => {
  it('splits the first name and keeps the first value of each field', () => {
    const person = parseDirectoryPerson('1001', {
      collection: {
        items: [
          {
            data: [
              { name: 'first_name', value: '  Anna Maria Luisa ' },
              { name: 'last_name', value: 'Beispiel' },
              { name: 'telephone', value: '061 000' },
              { name: 'phone_number', value: '061 999' },
              { name: 'email', value: '' },
            ],
          },
        ],
      },
    });

    expect(person).toEqual({
      personId: '1001',
      givenName: 'Anna',
      additionalName: 'Maria Luisa',
      familyName: 'Beispiel',
      email: null,
      phone: '061 000',
    });
  });

  it('rejects a document without items', () => {
    expectSyncError(
      (() => {
        try {
          return parseDirectoryPerson('1001', { collection: { items: [] } });
        } catch (err) {
          return err;
        }
      })(),
      'INCOMPLETE_PERSON_DATA'
    );
  });

  it('finds the person link by relation', () => {
    expect(
      findPersonLink({
        collection: {
          items: [
            { links: [{ rel: 'agency', href: '/api/agencies/3' }] },
            { links: [{ rel: 'person', href: '/api/people/42' }] },
          ],
        },
      })
    ).toBe('/api/people/42');
  });
});

describe('PersonLookupCache', () => {
  it('loads once and reloads after invalidate', async () => {
    const catalog = new FakeCatalog();
    const id = catalog.addPerson({ givenName: 'Anna', familyName: 'Beispiel', skPersonId: '2001' });
    const lookups = new PersonLookupCache(catalog);

    expect((await lookups.findByDirectoryId('2001'))?.id).toBe(id);
    expect((await lookups.findByName('Anna', 'Beispiel'))?.id).toBe(id);
    expect(await lookups.findByDirectoryId('9999')).toBeUndefined();
    expect(lookups.loadCount).toBe(1);

    const added = catalog.addPerson({ givenName: 'Bruno', familyName: 'Muster' });
    expect(await lookups.findByName('Bruno', 'Muster')).toBeUndefined();

    lookups.invalidate();
    expect((await lookups.getById(added))?.familyName).toBe('Muster');
    expect(lookups.loadCount).toBe(2);
  });

  it('only offers namesakes that are free for the directory id', async () => {
    const catalog = new FakeCatalog();
    const claimed = catalog.addPerson({ givenName: 'Anna', familyName: 'Muster', skPersonId: '1001' });
    const free = catalog.addPerson({ givenName: 'Anna', familyName: 'Muster' });
    const lookups = new PersonLookupCache(catalog);

    expect((await lookups.findByName('Anna', 'Muster'))?.id).toBe(claimed);
    expect((await lookups.findByName('Anna', 'Muster', '1001'))?.id).toBe(claimed);
    expect((await lookups.findByName('Anna', 'Muster', '1002'))?.id).toBe(free);
    expect((await lookups.findByName('Anna', 'Muster', null))?.id).toBe(free);
  });
});
