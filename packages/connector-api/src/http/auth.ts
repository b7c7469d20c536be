import { ConnectorError, oauthTokenSchema } from '@catalogsync/core';
import type { HttpClient } from './http-client.js';

/**
 * Supplies the Authorization header for a request.
 */
export interface IAuthProvider {
  headers(): Promise<Record<string, string>>;
  /** Drop any cached credential so the next call re-authenticates */
  invalidate(): void;
}

export function basicAuthHeader(username: string, password: string): string {
  return `Basic ${Buffer.from(`${username}:${password}`, 'utf-8').toString('base64')}`;
}

export class BearerTokenAuth implements IAuthProvider {
  constructor(private readonly token: string) {}

  async headers(): Promise<Record<string, string>> {
    return { Authorization: `Bearer ${this.token}` };
  }

  invalidate(): void {
    // static token, nothing cached
  }
}

export interface ClientCredentialsConfig {
  tokenUrl: string;
  clientId: string;
  clientSecret: string;
  scope?: string;
  /** Refresh this long before the token expires (default: 5 minutes) */
  refreshMarginMs?: number;
  now?: () => number;
}

/**
 * OAuth2 client-credentials grant with an in-memory token cache.
 */
export class ClientCredentialsAuth implements IAuthProvider {
  private token: string | null = null;
  private expiresAt = 0;

  constructor(
    private readonly config: ClientCredentialsConfig,
    private readonly http: HttpClient
  ) {}

  async headers(): Promise<Record<string, string>> {
    return { Authorization: `Bearer ${await this.getToken()}` };
  }

  invalidate(): void {
    this.token = null;
    this.expiresAt = 0;
  }

  private now(): number {
    return this.config.now?.() ?? Date.now();
  }

  private async getToken(): Promise<string> {
    if (this.token && this.now() < this.expiresAt) {
      return this.token;
    }

    const form = new URLSearchParams({
      grant_type: 'client_credentials',
      client_id: this.config.clientId,
      client_secret: this.config.clientSecret,
    });
    if (this.config.scope) {
      form.set('scope', this.config.scope);
    }

    const response = await this.http.request('POST', this.config.tokenUrl, {
      body: form,
      auth: null,
    });
    const parsed = oauthTokenSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new ConnectorError({
        code: 'AUTHENTICATION_FAILED',
        message: 'Token endpoint returned no access_token',
        source: 'catalog',
        suggestion: 'Check catalog.auth.tokenUrl and the client credentials.',
      });
    }

    const lifetimeMs = (parsed.data.expires_in ?? 3600) * 1000;
    const margin = this.config.refreshMarginMs ?? 5 * 60 * 1000;
    this.token = parsed.data.access_token;
    this.expiresAt = this.now() + Math.max(0, lifetimeMs - margin);
    return this.token;
  }
}
