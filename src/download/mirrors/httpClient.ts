import fetch from 'node-fetch';

export interface HttpResponse {
    ok: boolean;
    status: number;
    json(): Promise<unknown>;
}

export interface HttpRequestOptions {
    signal: AbortSignal;
    headers?: Record<string, string>;
}

/**
 * Minimal GET capability the mirrors need
 */
export type HttpClient = (url: string, options: HttpRequestOptions) => Promise<HttpResponse>;

export const nodeFetchClient: HttpClient = async (url, options) => {
    const res = await fetch(url, {
        headers: options.headers,
        signal: options.signal,
    });

    return {
        ok: res.ok,
        status: res.status,
        json: async (): Promise<unknown> => res.json(),
    };
};
