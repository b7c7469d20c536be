import { ConnectorError, directoryTokenSchema, urlJoin } from '@catalogsync/core';
import { basicAuthHeader, type IAuthProvider } from '../http/auth.js';
import type { HttpClient } from '../http/http-client.js';

/**
 * Directory token authentication. The access key is exchanged for a token via
 * basic auth (key as username, empty password); the token is then sent the same way.
 */
export class DirectoryTokenAuth implements IAuthProvider {
  private token: string | null = null;

  constructor(
    private readonly baseUrl: string,
    private readonly accessKey: string,
    private readonly http: HttpClient
  ) {}

  async headers(): Promise<Record<string, string>> {
    return { Authorization: basicAuthHeader(await this.getToken(), '') };
  }

  invalidate(): void {
    this.token = null;
  }

  private async getToken(): Promise<string> {
    if (this.token) return this.token;

    const response = await this.http.get(urlJoin(this.baseUrl, 'api', 'authenticate'), {
      headers: { Authorization: basicAuthHeader(this.accessKey, '') },
      auth: null,
    });
    const parsed = directoryTokenSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new ConnectorError({
        code: 'AUTHENTICATION_FAILED',
        message: 'Directory authentication returned no token',
        source: 'directory',
        suggestion: 'Check directory.accessKey.',
      });
    }

    this.token = parsed.data.token;
    return this.token;
  }
}
