/**
 * Minimal JSON HTTP client built on native fetch.
 *
 * API surface:
 *   - HttpClient.create({ baseURL, timeout, headers })
 *   - instance.post(path, body?, config?) → { data }
 *   - instance.delete(path, config?) → { data }
 *   - isHttpClientError(err) type guard
 *
 * Response bodies come back as `unknown`; callers validate them.
 */

export interface HttpClientConfig {
    baseURL: string;
    timeout?: number;
    headers?: Record<string, string>;
}

export interface RequestConfig {
    headers?: Record<string, string>;
    /** Aborts the request when the caller gives up on it */
    signal?: AbortSignal;
}

export interface HttpResponse {
    data: unknown;
    status: number;
    headers: Record<string, string>;
}

export class HttpClientError extends Error {
    public response?: {
        data: unknown;
        status: number;
        headers: Record<string, string>;
    };
    public code?: string;

    constructor(message: string, options?: {
        response?: HttpClientError['response'];
        code?: string;
    }) {
        super(message);
        this.name = 'HttpClientError';
        this.response = options?.response;
        this.code = options?.code;
    }
}

export function isHttpClientError(error: unknown): error is HttpClientError {
    return error instanceof HttpClientError;
}

function errorCode(err: unknown): string | undefined {
    if (!(err instanceof Error)) return undefined;
    // Node's fetch reports system errors (ECONNREFUSED, ENOTFOUND, ...) on `cause`
    const cause: unknown = err.cause;
    if (typeof cause === 'object' && cause !== null && 'code' in cause && typeof cause.code === 'string') {
        return cause.code;
    }
    return undefined;
}

export class HttpClient {
    private baseURL: string;
    private timeout: number;
    private defaultHeaders: Record<string, string>;

    private constructor(config: HttpClientConfig) {
        this.baseURL = config.baseURL.replace(/\/$/, '');
        this.timeout = config.timeout ?? 30000;
        this.defaultHeaders = { ...config.headers };
    }

    static create(config: HttpClientConfig): HttpClient {
        return new HttpClient(config);
    }

    async post(path: string, body?: unknown, config?: RequestConfig): Promise<HttpResponse> {
        return this.request('POST', path, body, config);
    }

    async delete(path: string, config?: RequestConfig): Promise<HttpResponse> {
        return this.request('DELETE', path, undefined, config);
    }

    async request(
        method: string,
        path: string,
        body?: unknown,
        config?: RequestConfig,
    ): Promise<HttpResponse> {
        const url = `${this.baseURL}${path}`;
        const controller = new AbortController();
        let timedOut = false;
        const timer = setTimeout(() => {
            timedOut = true;
            controller.abort();
        }, this.timeout);

        const onCallerAbort = () => controller.abort();
        config?.signal?.addEventListener('abort', onCallerAbort, { once: true });
        if (config?.signal?.aborted) {
            controller.abort();
        }

        try {
            const fetchOptions: RequestInit = {
                method,
                headers: { ...this.defaultHeaders, ...(config?.headers || {}) },
                signal: controller.signal,
            };

            if (body !== undefined) {
                fetchOptions.body = JSON.stringify(body);
            }

            const res = await fetch(url, fetchOptions);

            const responseHeaders: Record<string, string> = {};
            res.headers.forEach((value, key) => {
                responseHeaders[key] = value;
            });

            // Parse body (handle empty responses)
            let data: unknown = null;
            const text = await res.text();
            if (text) {
                try {
                    data = JSON.parse(text);
                } catch {
                    data = text;
                }
            }

            if (!res.ok) {
                throw new HttpClientError(`Request failed with status ${res.status}`, {
                    response: { data, status: res.status, headers: responseHeaders },
                });
            }

            return { data, status: res.status, headers: responseHeaders };
        } catch (err: unknown) {
            if (err instanceof HttpClientError) throw err;

            if (err instanceof Error && err.name === 'AbortError') {
                throw timedOut
                    ? new HttpClientError('Request timed out', { code: 'ECONNABORTED' })
                    : new HttpClientError('Request aborted', { code: 'ERR_CANCELED' });
            }

            const message = err instanceof Error ? err.message : 'Network error';
            throw new HttpClientError(message, { code: errorCode(err) });
        } finally {
            clearTimeout(timer);
            config?.signal?.removeEventListener('abort', onCallerAbort);
        }
    }
}
