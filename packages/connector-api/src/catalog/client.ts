/**
 * Catalog API Client
 *
 * REST, query and bulk-upload access to one catalog database.
 * Resources live under /rest/{db}/{collection}/{uuid}; queries, scheme
 * downloads and uploads under /api/{db}/.
 */

import {
  ConnectorError,
  HttpError,
  assetListSchema,
  cellText,
  createdResourceSchema,
  personResourceSchema,
  queryResultSchema,
  toCatalogUser,
  uploadOperationSchema,
  urlJoin,
  type CatalogAsset,
  type CatalogPerson,
  type CatalogUser,
  type ICatalogGateway,
  type NewPerson,
  type NewUser,
  type PersonPatch,
  type QueryRow,
  type ResourceCollection,
  type UploadOptions,
  type UploadResult,
  type UserPatch,
} from '@catalogsync/core';
import type { HttpClient } from '../http/index.js';

export interface CatalogClientConfig {
  /** Catalog base URL, e.g. https://catalog.example.org */
  baseUrl: string;
  /** Database (tenant scheme) name */
  database: string;
  /** Status written by markForReview (default: REVIEW) */
  reviewStatus?: string;
}

export const RESOURCE_TYPES: Record<ResourceCollection, string> = {
  persons: 'Person',
  posts: 'Post',
  users: 'User',
  collections: 'Collection',
  datasets: 'Dataset',
};

const MISSING_STATUSES = [404, 410] as const;

function isMissing(err: unknown): boolean {
  return err instanceof HttpError && (err.status === 404 || err.status === 410);
}

function sqlLiteral(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

function toCatalogPerson(data: unknown): CatalogPerson {
  const parsed = personResourceSchema.safeParse(data);
  if (!parsed.success) {
    throw new ConnectorError({
      code: 'READ_FAILED',
      message: `Unexpected person payload: ${parsed.error.issues[0]?.message ?? 'invalid'}`,
      source: 'catalog',
    });
  }

  const resource = parsed.data;
  const customProperties: Record<string, string | null> = {};
  for (const [key, value] of Object.entries(resource.customProperties ?? {})) {
    customProperties[key] = cellText(value);
  }

  const holdsPost = resource.holdsPost ?? [];
  return {
    id: resource.id,
    givenName: resource.givenName ?? '',
    additionalName: resource.additionalName ?? null,
    familyName: resource.familyName ?? '',
    skPersonId: customProperties['sk_person_id'] ?? null,
    holdsPost: typeof holdsPost === 'string' ? [holdsPost] : holdsPost,
    customProperties,
  };
}

export class CatalogClient implements ICatalogGateway {
  private readonly baseUrl: string;

  constructor(
    private readonly config: CatalogClientConfig,
    private readonly http: HttpClient
  ) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
  }

  get database(): string {
    return this.config.database;
  }

  restUrl(collection: ResourceCollection, id?: string): string {
    return urlJoin(this.baseUrl, 'rest', this.config.database, collection, ...(id ? [id] : []));
  }

  apiUrl(...parts: string[]): string {
    return urlJoin(this.baseUrl, 'api', this.config.database, ...parts);
  }

  personWebUrl(personId: string): string {
    return urlJoin(this.baseUrl, 'web', this.config.database, 'persons', personId);
  }

  async executeQuery(sql: string): Promise<QueryRow[]> {
    const response = await this.http.put(this.apiUrl('queries', 'download'), {
      query: { format: 'JSON' },
      json: { sql },
    });
    const parsed = queryResultSchema.safeParse(response.data ?? []);
    if (!parsed.success) {
      throw new ConnectorError({
        code: 'READ_FAILED',
        message: 'Query endpoint did not return a row list',
        source: 'catalog',
        context: { sql },
      });
    }
    return parsed.data;
  }

  async downloadAssets(scheme: string): Promise<CatalogAsset[]> {
    const response = await this.http.get(this.apiUrl('schemes', scheme, 'download'), {
      query: { format: 'JSON' },
    });
    const parsed = assetListSchema.safeParse(response.data ?? []);
    if (!parsed.success) {
      throw new ConnectorError({
        code: 'READ_FAILED',
        message: `Download of scheme "${scheme}" did not return an asset list`,
        source: 'catalog',
      });
    }
    return parsed.data;
  }

  /**
   * @returns undefined when the resource does not exist (404 or 410)
   */
  async getResource(collection: ResourceCollection, id: string): Promise<unknown> {
    try {
      const response = await this.http.get(this.restUrl(collection, id), {
        silentStatusCodes: MISSING_STATUSES,
      });
      return response.data;
    } catch (err) {
      if (isMissing(err)) return undefined;
      throw err;
    }
  }

  /**
   * Create a resource. The type discriminator is always sent.
   * @returns UUID of the new resource
   */
  async createResource(
    collection: ResourceCollection,
    data: Record<string, unknown>,
    type: string = RESOURCE_TYPES[collection]
  ): Promise<string> {
    const response = await this.http.post(this.restUrl(collection), {
      json: { ...data, _type: type },
    });
    const parsed = createdResourceSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new ConnectorError({
        code: 'WRITE_FAILED',
        message: `Create ${type} returned no id`,
        source: 'catalog',
      });
    }
    return parsed.data.id;
  }

  /**
   * PATCH a resource, or PUT it when `replace` is set. A full replace resets the
   * status to WORKING; replacing a Dataset keeps its current collection.
   */
  async updateResource(
    collection: ResourceCollection,
    id: string,
    data: Record<string, unknown>,
    options: { replace?: boolean; type?: string } = {}
  ): Promise<void> {
    const type = options.type ?? RESOURCE_TYPES[collection];
    const payload: Record<string, unknown> = { ...data, _type: type };

    if (!options.replace) {
      await this.http.patch(this.restUrl(collection, id), { json: payload });
      return;
    }

    payload['status'] = 'WORKING';
    if (type === 'Dataset' && payload['inCollection'] === undefined) {
      const current = await this.getResource(collection, id);
      if (typeof current === 'object' && current !== null && 'inCollection' in current) {
        payload['inCollection'] = current.inCollection;
      }
    }
    await this.http.put(this.restUrl(collection, id), { json: payload });
  }

  async deleteResource(collection: ResourceCollection, id: string): Promise<void> {
    await this.http.delete(this.restUrl(collection, id));
  }

  async markForReview(collection: ResourceCollection, id: string): Promise<void> {
    await this.http.patch(this.restUrl(collection, id), {
      json: { _type: RESOURCE_TYPES[collection], status: this.config.reviewStatus ?? 'REVIEW' },
    });
  }

  /**
   * Upload typed records into a scheme as the multipart field `import.json`.
   */
  async bulkUpload(
    scheme: string,
    records: CatalogAsset[],
    options: UploadOptions = {}
  ): Promise<UploadResult> {
    const operation = uploadOperationSchema.safeParse(options.operation ?? 'ADD');
    if (!operation.success) {
      throw new ConnectorError({
        code: 'VALIDATION_ERROR',
        message: `Invalid upload operation: ${String(options.operation)}`,
        source: 'catalog',
        suggestion: 'Use one of ADD, REPLACE or FULL_LOAD.',
      });
    }

    const form = new FormData();
    form.append(
      'import.json',
      new Blob([JSON.stringify(records)], { type: 'application/json' }),
      'import.json'
    );

    const dryRun = options.dryRun ?? false;
    const response = await this.http.put(this.apiUrl('schemes', scheme, 'upload'), {
      body: form,
      query: {
        operation: operation.data === 'ADD' ? undefined : operation.data,
        dryRun: dryRun ? 'true' : undefined,
      },
    });

    return { operation: operation.data, dryRun, response: response.data };
  }

  async getPerson(personId: string): Promise<CatalogPerson | undefined> {
    const data = await this.getResource('persons', personId);
    return data === undefined ? undefined : toCatalogPerson(data);
  }

  async createPerson(person: NewPerson): Promise<string> {
    return this.createResource('persons', {
      givenName: person.givenName,
      familyName: person.familyName,
      ...(person.additionalName ? { additionalName: person.additionalName } : {}),
      ...(person.skPersonId ? { customProperties: { sk_person_id: person.skPersonId } } : {}),
    });
  }

  async updatePerson(personId: string, patch: PersonPatch): Promise<void> {
    await this.updateResource('persons', personId, { ...patch });
  }

  async findUserByLoginId(loginId: string): Promise<CatalogUser | undefined> {
    const rows = await this.executeQuery(`
      SELECT
        u.id AS user_uuid,
        u.login_id AS email,
        u.access_level,
        u.is_person AS linked_person_uuid
      FROM
        user_view u
      WHERE
        lower(u.login_id) = ${sqlLiteral(loginId.trim().toLowerCase())}
    `);
    for (const row of rows) {
      const user = toCatalogUser(row);
      if (user) return user;
    }
    return undefined;
  }

  async createUser(user: NewUser): Promise<string> {
    return this.createResource('users', {
      loginId: user.loginId,
      accessLevel: user.accessLevel,
      ...(user.name ? { name: user.name } : {}),
      ...(user.isPerson ? { isPerson: user.isPerson } : {}),
    });
  }

  async updateUser(userId: string, patch: UserPatch): Promise<void> {
    await this.updateResource('users', userId, { ...patch });
  }
}
