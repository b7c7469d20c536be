import { describe, expect, it, vi, type Mock } from 'vitest';
import { CatalogClient, HttpClient, type FetchFn } from '../src/index.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function createCatalog(fetchFn: FetchFn): CatalogClient {
  const http = new HttpClient({
    source: 'catalog',
    fetch: fetchFn,
    rateLimitDelayMs: 0,
    retry: { maxAttempts: 1, delayMs: 0 },
  });
  return new CatalogClient({ baseUrl: 'https://catalog.example/', database: 'prod' }, http);
}

function call(fetchFn: Mock<FetchFn>, index: number): { url: string; init: RequestInit } {
  const entry = fetchFn.mock.calls[index];
  if (!entry) throw new Error(`no fetch call #${index}`);
  return { url: entry[0], init: entry[1] };
}

describe('CatalogClient', () => {
  it('runs declarative queries through the download endpoint', async () => {
    const fetchFn = vi.fn<FetchFn>().mockResolvedValue(jsonResponse([{ id: 'p1' }]));
    const catalog = createCatalog(fetchFn);

    const rows = await catalog.executeQuery('SELECT id FROM person_view');

    expect(rows).toEqual([{ id: 'p1' }]);
    const { url, init } = call(fetchFn, 0);
    expect(url).toBe('https://catalog.example/api/prod/queries/download?format=JSON');
    expect(init.method).toBe('PUT');
    expect(init.body).toBe('{"sql":"SELECT id FROM person_view"}');
  });

  it('uploads records as multipart with operation and dry-run flags', async () => {
    const fetchFn = vi.fn<FetchFn>().mockResolvedValue(jsonResponse({ created: 1 }));
    const catalog = createCatalog(fetchFn);

    const result = await catalog.bulkUpload('datasets', [{ _type: 'Dataset', label: 'Trees' }], {
      operation: 'REPLACE',
      dryRun: true,
    });

    expect(result).toEqual({ operation: 'REPLACE', dryRun: true, response: { created: 1 } });
    const { url, init } = call(fetchFn, 0);
    expect(url).toBe('https://catalog.example/api/prod/schemes/datasets/upload?operation=REPLACE&dryRun=true');
    expect(init.body).toBeInstanceOf(FormData);
    const form = init.body instanceof FormData ? init.body : new FormData();
    const file = form.get('import.json');
    expect(file).toBeInstanceOf(Blob);
    expect(file instanceof Blob ? await file.text() : '').toBe('[{"_type":"Dataset","label":"Trees"}]');
  });

  it('sends no operation parameter for ADD', async () => {
    const fetchFn = vi.fn<FetchFn>().mockResolvedValue(jsonResponse({}));
    const catalog = createCatalog(fetchFn);

    await catalog.bulkUpload('datasets', []);

    expect(call(fetchFn, 0).url).toBe('https://catalog.example/api/prod/schemes/datasets/upload');
  });

  it('rejects unknown upload operations before calling the API', async () => {
    const fetchFn = vi.fn<FetchFn>();
    const catalog = createCatalog(fetchFn);

    await expect(catalog.bulkUpload('datasets', [], JSON.parse('{"operation":"MERGE"}'))).rejects.toThrow(
      'Invalid upload operation: MERGE'
    );
    expect(fetchFn).not.toHaveBeenCalled();
  });

  it('returns undefined for missing persons', async () => {
    const fetchFn = vi.fn<FetchFn>().mockResolvedValue(new Response('', { status: 410, statusText: 'Gone' }));
    const catalog = createCatalog(fetchFn);

    expect(await catalog.getPerson('0f8fad5b-d9cb-469f-a165-70867728950e')).toBeUndefined();
  });

  it('maps person resources and unquotes custom properties', async () => {
    const fetchFn = vi.fn<FetchFn>().mockResolvedValue(
      jsonResponse({
        id: 'p1',
        _type: 'Person',
        givenName: 'Alice',
        familyName: 'Exampleton',
        holdsPost: 'post-1',
        customProperties: { sk_person_id: '"4711"', phone: null },
      })
    );
    const catalog = createCatalog(fetchFn);

    const person = await catalog.getPerson('p1');

    expect(person).toEqual({
      id: 'p1',
      givenName: 'Alice',
      additionalName: null,
      familyName: 'Exampleton',
      skPersonId: '4711',
      holdsPost: ['post-1'],
      customProperties: { sk_person_id: '4711', phone: null },
    });
    expect(call(fetchFn, 0).url).toBe('https://catalog.example/rest/prod/persons/p1');
  });

  it('always sends the type discriminator on create', async () => {
    const fetchFn = vi.fn<FetchFn>().mockResolvedValue(jsonResponse({ id: 'new-person' }, 201));
    const catalog = createCatalog(fetchFn);

    const id = await catalog.createPerson({ givenName: 'Alice', familyName: 'Exampleton', skPersonId: '4711' });

    expect(id).toBe('new-person');
    expect(JSON.parse(String(call(fetchFn, 0).init.body))).toEqual({
      givenName: 'Alice',
      familyName: 'Exampleton',
      customProperties: { sk_person_id: '4711' },
      _type: 'Person',
    });
  });

  it('keeps the collection of a dataset on full replace', async () => {
    const fetchFn = vi
      .fn<FetchFn>()
      .mockResolvedValueOnce(jsonResponse({ id: 'd1', inCollection: 'col-1' }))
      .mockResolvedValueOnce(jsonResponse({ id: 'd1' }));
    const catalog = createCatalog(fetchFn);

    await catalog.updateResource('datasets', 'd1', { label: 'Trees' }, { replace: true });

    const { init } = call(fetchFn, 1);
    expect(init.method).toBe('PUT');
    expect(JSON.parse(String(init.body))).toEqual({
      label: 'Trees',
      _type: 'Dataset',
      status: 'WORKING',
      inCollection: 'col-1',
    });
  });

  it('marks resources for review with a status-only patch', async () => {
    const fetchFn = vi.fn<FetchFn>().mockResolvedValue(new Response(null, { status: 204 }));
    const catalog = createCatalog(fetchFn);

    await catalog.markForReview('datasets', 'd1');

    const { url, init } = call(fetchFn, 0);
    expect(url).toBe('https://catalog.example/rest/prod/datasets/d1');
    expect(init.method).toBe('PATCH');
    expect(JSON.parse(String(init.body))).toEqual({ _type: 'Dataset', status: 'REVIEW' });
  });

  it('escapes login ids in user lookups', async () => {
    const fetchFn = vi.fn<FetchFn>().mockResolvedValue(
      jsonResponse([
        { user_uuid: 'u1', email: "O'Neil@example.org", access_level: 'EDITOR', linked_person_uuid: 'p1' },
      ])
    );
    const catalog = createCatalog(fetchFn);

    const user = await catalog.findUserByLoginId("O'Neil@example.org");

    expect(user).toEqual({ id: 'u1', loginId: "o'neil@example.org", accessLevel: 'EDITOR', isPerson: 'p1' });
    const body: unknown = JSON.parse(String(call(fetchFn, 0).init.body));
    expect(JSON.stringify(body)).toContain("lower(u.login_id) = 'o''neil@example.org'");
  });

  it('builds web links to persons', () => {
    const catalog = createCatalog(vi.fn<FetchFn>());
    expect(catalog.personWebUrl('p1')).toBe('https://catalog.example/web/prod/persons/p1');
  });
});
