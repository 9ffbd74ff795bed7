import * as crypto from 'crypto';
import { GitHubCredentials, GitHubSettings } from '../types';

/**
 * GitHub API authentication
 *
 * Handles:
 * - Personal or fine-grained access tokens
 * - GitHub App JWTs and installation access tokens (cached per owner)
 * - Authenticated requests against the REST API
 */

interface InstallationToken {
  token: string;
  expiresAt: Date;
  installationId: number;
}

/** The parts of fetch's Response the client reads */
export interface FetchResponse {
  ok: boolean;
  status: number;
  json(): Promise<unknown>;
  text(): Promise<string>;
}

export interface FetchInit {
  method: string;
  headers: Record<string, string>;
  body?: string;
}

export type FetchFn = (input: string, init: FetchInit) => Promise<FetchResponse>;

export interface GitHubRequestOptions {
  method?: 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';
  /** JSON-serializable request body */
  body?: unknown;
}

const API_HEADERS = {
  Accept: 'application/vnd.github+json',
  'X-GitHub-Api-Version': '2022-11-28',
};

/**
 * Non-2xx response from the GitHub API
 */
export class GitHubApiError extends Error {
  constructor(
    readonly status: number,
    readonly action: string,
    readonly responseText: string
  ) {
    super(`${action}: ${status}${responseText ? ` - ${responseText}` : ''}`);
    this.name = 'GitHubApiError';
  }
}

/**
 * Throw a GitHubApiError unless the response is 2xx
 */
export async function ensureOk(response: FetchResponse, action: string): Promise<FetchResponse> {
  if (!response.ok) {
    const text = await response.text();
    throw new GitHubApiError(response.status, action, text);
  }
  return response;
}

/**
 * Split an owner/repo identifier
 */
export function splitRepoName(repoName: string): { owner: string; repo: string } {
  const [owner, repo, ...rest] = repoName.split('/');
  if (!owner || !repo || rest.length > 0) {
    throw new Error(`Invalid repository name: ${repoName} (expected owner/repo)`);
  }
  return { owner, repo };
}

/**
 * Create a JWT for authenticating as the GitHub App
 *
 * @param expirationMinutes - How long the JWT should be valid (max 10 minutes)
 */
export function createAppJWT(appId: string, privateKey: string, expirationMinutes = 10): string {
  const now = Math.floor(Date.now() / 1000);

  const payload = {
    iat: now - 60, // clock drift
    exp: now + expirationMinutes * 60,
    iss: appId,
  };

  const header = Buffer.from(JSON.stringify({ alg: 'RS256', typ: 'JWT' })).toString('base64url');
  const body = Buffer.from(JSON.stringify(payload)).toString('base64url');
  const unsigned = `${header}.${body}`;

  const sign = crypto.createSign('RSA-SHA256');
  sign.update(unsigned);
  const signature = sign.sign(privateKey, 'base64url');

  return `${unsigned}.${signature}`;
}

export class GitHubAuth {
  private readonly tokenCache = new Map<string, InstallationToken>();
  private readonly apiUrl: string;
  private readonly credentials: GitHubCredentials;

  constructor(
    settings: GitHubSettings,
    private readonly fetchFn: FetchFn = fetch
  ) {
    this.apiUrl = settings.apiUrl.replace(/\/+$/, '');
    this.credentials = settings.credentials;
  }

  /**
   * Token to use for requests against repositories of `owner`
   */
  async getToken(owner: string): Promise<string> {
    if (this.credentials.type === 'token') {
      return this.credentials.token;
    }
    return this.getInstallationToken(owner, this.credentials.appId, this.credentials.privateKey);
  }

  /**
   * Make an authenticated request to the GitHub API
   *
   * @param repoName - Repository identifier (owner/repo)
   * @param endpoint - Path below the repository (e.g. '/branches/main'), or an absolute URL
   */
  async request(repoName: string, endpoint: string, options: GitHubRequestOptions = {}): Promise<FetchResponse> {
    const { owner, repo } = splitRepoName(repoName);
    const token = await this.getToken(owner);

    const url = endpoint.startsWith('https://')
      ? endpoint
      : `${this.apiUrl}/repos/${encodeURIComponent(owner)}/${encodeURIComponent(repo)}${endpoint}`;

    const hasBody = options.body !== undefined;
    return this.fetchFn(url, {
      method: options.method ?? 'GET',
      headers: {
        Authorization: `Bearer ${token}`,
        ...API_HEADERS,
        ...(hasBody ? { 'Content-Type': 'application/json' } : {}),
      },
      ...(hasBody ? { body: JSON.stringify(options.body) } : {}),
    });
  }

  private async getInstallationToken(owner: string, appId: string, privateKey: string): Promise<string> {
    const cacheKey = owner.toLowerCase();

    // Reuse while valid for at least another minute
    const cached = this.tokenCache.get(cacheKey);
    if (cached && cached.expiresAt > new Date(Date.now() + 60000)) {
      return cached.token;
    }

    const jwt = createAppJWT(appId, privateKey);
    const appHeaders = { Authorization: `Bearer ${jwt}`, ...API_HEADERS };

    const installationsResponse = await ensureOk(
      await this.fetchFn(`${this.apiUrl}/app/installations`, { method: 'GET', headers: appHeaders }),
      'Failed to get installations'
    );
    const installations = (await installationsResponse.json()) as Array<{
      id: number;
      account: { login: string } | null;
    }>;

    const installation = installations.find((i) => i.account?.login.toLowerCase() === cacheKey);
    if (!installation) {
      throw new Error(`GitHub App is not installed for owner: ${owner}`);
    }

    const tokenResponse = await ensureOk(
      await this.fetchFn(`${this.apiUrl}/app/installations/${installation.id}/access_tokens`, {
        method: 'POST',
        headers: appHeaders,
      }),
      'Failed to get installation token'
    );
    const tokenData = (await tokenResponse.json()) as { token: string; expires_at: string };

    this.tokenCache.set(cacheKey, {
      token: tokenData.token,
      expiresAt: new Date(tokenData.expires_at),
      installationId: installation.id,
    });

    return tokenData.token;
  }
}
