/**
 * Personnel directory client (collection+json API)
 */

import {
  ConnectorError,
  HttpError,
  collectionDocumentSchema,
  urlJoin,
  type CollectionDocument,
  type IDirectoryGateway,
} from '@catalogsync/core';
import type { HttpClient } from '../http/index.js';
import { DirectoryTokenAuth } from './auth.js';

export interface DirectoryClientConfig {
  /** Directory base URL, e.g. https://directory.example.org */
  baseUrl: string;
  accessKey: string;
}

export class DirectoryClient implements IDirectoryGateway {
  private readonly auth: DirectoryTokenAuth;

  constructor(
    private readonly config: DirectoryClientConfig,
    private readonly http: HttpClient
  ) {
    this.auth = new DirectoryTokenAuth(config.baseUrl, config.accessKey, http);
  }

  async fetchMembership(membershipId: string): Promise<CollectionDocument> {
    return this.getDocument(urlJoin(this.config.baseUrl, 'api', 'memberships', encodeURIComponent(membershipId)));
  }

  async fetchPerson(personId: string): Promise<CollectionDocument> {
    return this.getDocument(urlJoin(this.config.baseUrl, 'api', 'people', encodeURIComponent(personId)));
  }

  /**
   * A 401 means the cached token expired: re-authenticate once and repeat.
   */
  private async getDocument(url: string): Promise<CollectionDocument> {
    let data: unknown;
    try {
      data = (await this.http.get(url, { auth: this.auth, silentStatusCodes: [401] })).data;
    } catch (err) {
      if (!(err instanceof HttpError) || err.status !== 401) throw err;
      this.auth.invalidate();
      data = (await this.http.get(url, { auth: this.auth })).data;
    }

    const parsed = collectionDocumentSchema.safeParse(data);
    if (!parsed.success) {
      throw new ConnectorError({
        code: 'READ_FAILED',
        message: `Directory returned no collection document for ${url}`,
        source: 'directory',
      });
    }
    return parsed.data;
  }
}
