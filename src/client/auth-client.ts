import { z } from 'zod';

export interface AuthClientOptions {
  baseUrl: string;
  fetchImpl?: typeof fetch;
}

const BearerResponseSchema = z.string().regex(/^bearer \S+$/i, 'expected "bearer <token>"');

export class AuthClient {
  private readonly fetchImpl: typeof fetch;
  private token?: string;

  constructor(private readonly options: AuthClientOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  get currentToken(): string | undefined {
    return this.token;
  }

  async authenticate(username: string, password: string): Promise<string> {
    const response = await this.fetchImpl(this.url('/authenticate'), {
      method: 'PUT',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify({ user: { name: username }, secret: { password } }),
    });

    if (!response.ok) {
      const text = await response.text();
      throw new Error(`Authentication failed: ${response.status} ${text}`);
    }

    const parsed = BearerResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error('Authentication response is not a bearer token');
    }

    this.token = parsed.data.slice('bearer '.length);
    return this.token;
  }

  /** Calls a protected route. Each call spends one use of the current token. */
  async request(path: string, init: RequestInit = {}): Promise<Response> {
    if (!this.token) {
      throw new Error('Not authenticated; call authenticate() first');
    }

    const headers = new Headers(init.headers);
    headers.set('authorization', `Bearer ${this.token}`);
    return this.fetchImpl(this.url(path), { ...init, headers });
  }

  async logout(): Promise<void> {
    const response = await this.request('/authenticate', { method: 'DELETE' });
    this.token = undefined;
    if (!response.ok) {
      throw new Error(`Logout failed: ${response.status}`);
    }
  }

  private url(path: string): string {
    return new URL(path, this.options.baseUrl).toString();
  }
}
