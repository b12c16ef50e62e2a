/**
 * Base REST client for the GoodData API
 *
 * Shared request plumbing for the GoodData adapter:
 * - Bearer token authentication
 * - Request timeout through AbortController
 * - Mapping of non-2xx responses to AnalyticsPlatformError
 *
 * Requests are never retried; callers re-run the whole operation instead.
 */

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export const JSON_API_CONTENT_TYPE = 'application/vnd.gooddata.api+json';
export const JSON_CONTENT_TYPE = 'application/json';

/**
 * Configuration for a REST client
 */
export interface RestClientConfig {
  host: string;
  token: string;
  timeoutMs?: number;
}

/**
 * Error thrown when a GoodData request fails
 */
export class AnalyticsPlatformError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    public readonly statusCode?: number
  ) {
    super(message);
    this.name = 'AnalyticsPlatformError';
  }
}

export interface RequestOptions {
  body?: unknown;
  contentType?: string;
  query?: Record<string, string | number | boolean>;
}

export abstract class RestClient {
  protected readonly config: Required<RestClientConfig>;

  constructor(config: RestClientConfig) {
    this.config = {
      timeoutMs: 30000,
      ...config,
      host: config.host.replace(/\/+$/, '')
    };
  }

  getHost(): string {
    return this.config.host;
  }

  /**
   * Sends a request and parses the JSON response body
   */
  protected async requestJson<T>(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<T> {
    const response = await this.send(method, path, options);
    return await response.json() as T;
  }

  /**
   * Sends a request whose response body is not needed
   */
  protected async requestVoid(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<void> {
    const response = await this.send(method, path, options);
    // Drain the body so the connection can be reused
    await response.text();
  }

  /**
   * Like requestJson, but answers null when the resource does not exist
   */
  protected async requestOptional<T>(
    method: HttpMethod,
    path: string,
    options: RequestOptions = {}
  ): Promise<T | null> {
    try {
      return await this.requestJson<T>(method, path, options);
    } catch (error) {
      if (error instanceof AnalyticsPlatformError && error.statusCode === 404) {
        return null;
      }
      throw error;
    }
  }

  private async send(method: HttpMethod, path: string, options: RequestOptions): Promise<Response> {
    const url = this.buildUrl(path, options.query);
    const headers: Record<string, string> = {
      Authorization: `Bearer ${this.config.token}`,
      Accept: options.contentType ?? JSON_CONTENT_TYPE
    };
    if (options.body !== undefined) {
      headers['Content-Type'] = options.contentType ?? JSON_CONTENT_TYPE;
    }

    let response: Response;
    try {
      response = await this.fetchWithTimeout(url, {
        method,
        headers,
        body: options.body === undefined ? undefined : JSON.stringify(options.body)
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new AnalyticsPlatformError(`GoodData request ${method} ${path} failed: ${reason}`, path);
    }

    if (!response.ok) {
      const detail = await this.safeReadText(response);
      throw new AnalyticsPlatformError(
        `GoodData request ${method} ${path} failed with HTTP ${response.status}${detail ? `: ${detail}` : ''}`,
        path,
        response.status
      );
    }

    return response;
  }

  private buildUrl(path: string, query?: RequestOptions['query']): string {
    const url = new URL(this.config.host + path);
    if (query) {
      for (const [key, value] of Object.entries(query)) {
        url.searchParams.set(key, String(value));
      }
    }
    return url.toString();
  }

  /**
   * Fetch with timeout
   */
  private async fetchWithTimeout(url: string, options: RequestInit): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.timeoutMs);

    try {
      return await fetch(url, {
        ...options,
        signal: controller.signal
      });
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private async safeReadText(response: Response): Promise<string> {
    try {
      return (await response.text()).trim();
    } catch {
      return '';
    }
  }
}
