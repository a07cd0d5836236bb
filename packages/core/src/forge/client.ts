/**
 * Forge Actions HTTP client
 *
 * Gitea and GitHub expose nearly the same Actions API. They differ in four
 * places: the auth header, the API base, the raw file URL and the pagination
 * query. Everything else lives in the shared base class.
 */

import { GitPlatform } from '../config/index.js';
import { delay, type SleepFn } from '../utils/delay.js';
import { createLogger } from '../utils/logger.js';
import { ForgeError } from './errors.js';

const log = createLogger('forge:client');

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export const USER_AGENT = 'bridgeline';

export interface ForgeClientOptions {
  server: string;
  token: string;
  /** Injectable fetch implementation (tests) */
  fetch?: typeof fetch;
  /** Retries after the first attempt for 5xx and network failures */
  maxRetries?: number;
  retryDelayMs?: number;
  jsonTimeoutMs?: number;
  bytesTimeoutMs?: number;
  sleep?: SleepFn;
}

export interface ForgeClient {
  readonly platform: GitPlatform;
  readonly server: string;
  getAuthHeader(): string;
  getApiBase(repo: string): string;
  getRawFileUrl(repo: string, ref: string, path: string): string;
  getPaginationParams(limit: number, page: number): string;
  requestJSON(method: HttpMethod, url: string, body?: unknown): Promise<unknown>;
  requestBytes(method: HttpMethod, url: string): Promise<Uint8Array>;
}

/**
 * Strip a leading `Bearer ` or `token ` prefix pasted along with a token.
 */
export function sanitizeToken(token: string): string {
  const trimmed = token.trim();
  const match = /^(bearer|token)\s+/i.exec(trimmed);
  return match ? trimmed.slice(match[0].length).trim() : trimmed;
}

/**
 * Pull `message` or `error` out of a JSON error body.
 */
function extractDetail(text: string): string | undefined {
  if (!text) return undefined;
  try {
    const parsed: unknown = JSON.parse(text);
    if (parsed && typeof parsed === 'object') {
      const record: Record<string, unknown> = { ...parsed };
      const detail = record['message'] ?? record['error'];
      if (typeof detail === 'string' && detail) return detail;
    }
  } catch {
    return undefined;
  }
  return undefined;
}

/**
 * Some Gitea deployments answer 200 with `{ code: <non-zero>, message }`.
 */
function applicationErrorCode(body: unknown): { code: number; message: string } | null {
  if (!body || typeof body !== 'object' || Array.isArray(body)) return null;
  const record: Record<string, unknown> = { ...body };
  const code = record['code'];
  if (typeof code !== 'number' || code === 0) return null;
  const message = typeof record['message'] === 'string' ? record['message'] : 'unknown error';
  return { code, message };
}

export abstract class BaseForgeClient implements ForgeClient {
  abstract readonly platform: GitPlatform;
  readonly server: string;
  protected readonly token: string;
  private readonly fetchFn: typeof fetch;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly jsonTimeoutMs: number;
  private readonly bytesTimeoutMs: number;
  private readonly sleep: SleepFn;

  constructor(options: ForgeClientOptions) {
    this.server = options.server.replace(/\/+$/, '');
    this.token = sanitizeToken(options.token);
    this.fetchFn = options.fetch ?? fetch;
    this.maxRetries = options.maxRetries ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 2000;
    this.jsonTimeoutMs = options.jsonTimeoutMs ?? 60000;
    this.bytesTimeoutMs = options.bytesTimeoutMs ?? 120000;
    this.sleep = options.sleep ?? delay;
  }

  abstract getAuthHeader(): string;
  abstract getApiBase(repo: string): string;
  abstract getRawFileUrl(repo: string, ref: string, path: string): string;
  abstract getPaginationParams(limit: number, page: number): string;

  async requestJSON(method: HttpMethod, url: string, body?: unknown): Promise<unknown> {
    const response = await this.send(method, url, 'application/json', this.jsonTimeoutMs, body);
    const text = await response.text();
    if (!text) {
      return {};
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      throw new ForgeError(`Invalid JSON from ${url}`, { url, cause: error });
    }

    const appError = applicationErrorCode(parsed);
    if (appError) {
      throw new ForgeError(`API error ${appError.code} for ${url}: ${appError.message}`, {
        url,
      });
    }
    return parsed;
  }

  async requestBytes(method: HttpMethod, url: string): Promise<Uint8Array> {
    const response = await this.send(
      method,
      url,
      'application/octet-stream',
      this.bytesTimeoutMs
    );
    return new Uint8Array(await response.arrayBuffer());
  }

  private buildHeaders(accept: string, hasBody: boolean): Record<string, string> {
    const headers: Record<string, string> = {
      Authorization: this.getAuthHeader(),
      Accept: accept,
      'User-Agent': USER_AGENT,
    };
    if (hasBody) {
      headers['Content-Type'] = 'application/json';
    }
    return headers;
  }

  /**
   * Issue a request, retrying 5xx responses and network failures with linear
   * backoff. Resolves only with a 2xx response.
   */
  private async send(
    method: HttpMethod,
    url: string,
    accept: string,
    timeoutMs: number,
    body?: unknown
  ): Promise<Response> {
    const headers = this.buildHeaders(accept, body !== undefined);

    for (let attempt = 0; ; attempt++) {
      const canRetry = attempt < this.maxRetries;
      const controller = new AbortController();
      const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

      let response: Response;
      try {
        log.debug({ method, url, attempt: attempt + 1 }, 'Forge request');
        const init: RequestInit = { method, headers, signal: controller.signal };
        if (body !== undefined) {
          init.body = JSON.stringify(body);
        }
        response = await this.fetchFn(url, init);
      } catch (error) {
        clearTimeout(timeoutId);
        if (canRetry) {
          log.debug({ url, err: error, attempt: attempt + 1 }, 'Network failure, retrying');
          await this.sleep(this.retryDelayMs * (attempt + 1));
          continue;
        }
        const reason = error instanceof Error ? error.message : String(error);
        throw new ForgeError(`API request failed for ${url}: ${reason}`, { url, cause: error });
      }
      clearTimeout(timeoutId);

      if (response.ok) {
        return response;
      }

      const detail = extractDetail(await response.text().catch(() => ''));
      if (response.status >= 500 && canRetry) {
        log.debug({ url, status: response.status, attempt: attempt + 1 }, 'Server error, retrying');
        await this.sleep(this.retryDelayMs * (attempt + 1));
        continue;
      }

      const message = `API error ${response.status} for ${url}${detail ? `: ${detail}` : ''}`;
      throw new ForgeError(message, { statusCode: response.status, url });
    }
  }
}

export class GiteaClient extends BaseForgeClient {
  readonly platform = GitPlatform.GITEA;

  getAuthHeader(): string {
    return `token ${this.token}`;
  }

  getApiBase(repo: string): string {
    return `${this.server}/api/v1/repos/${repo}/actions`;
  }

  getRawFileUrl(repo: string, ref: string, path: string): string {
    return `${this.server}/api/v1/repos/${repo}/raw/${ref}/${path}`;
  }

  getPaginationParams(limit: number, page: number): string {
    return `limit=${limit}&page=${page}`;
  }
}

export class GitHubClient extends BaseForgeClient {
  readonly platform = GitPlatform.GITHUB;

  private get isPublicGitHub(): boolean {
    return this.server === 'https://github.com';
  }

  getAuthHeader(): string {
    return `Bearer ${this.token}`;
  }

  getApiBase(repo: string): string {
    if (this.isPublicGitHub) {
      return `https://api.github.com/repos/${repo}/actions`;
    }
    return `${this.server}/api/v3/repos/${repo}/actions`;
  }

  getRawFileUrl(repo: string, ref: string, path: string): string {
    const rawHost = this.isPublicGitHub
      ? 'https://raw.githubusercontent.com'
      : this.server.replace('https://', 'https://raw.');
    return `${rawHost}/${repo}/${ref}/${path}`;
  }

  getPaginationParams(limit: number, page: number): string {
    return `per_page=${limit}&page=${page}`;
  }
}

export function createForgeClient(platform: GitPlatform, options: ForgeClientOptions): ForgeClient {
  return platform === GitPlatform.GITHUB ? new GitHubClient(options) : new GiteaClient(options);
}
