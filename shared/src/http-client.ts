import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';

export interface HttpClientOptions {
    timeout?: number;
    headers?: Record<string, string>;
    adapter?: AxiosAdapter;
}

export interface RequestOptions {
    params?: Record<string, string | number>;
    timeout?: number;
    signal?: AbortSignal;
}

/**
 * Simple HTTP client wrapper for calls to external providers
 */
export class HttpClient {
    private client: AxiosInstance;

    constructor(baseURL: string, options: HttpClientOptions = {}) {
        this.client = axios.create({
            baseURL,
            timeout: options.timeout ?? 5000,
            headers: {
                'Content-Type': 'application/json',
                ...options.headers,
            },
            adapter: options.adapter,
        });
    }

    async post<T = unknown>(url: string, data: unknown, options: RequestOptions = {}): Promise<T> {
        const response = await this.client.post<T>(url, data, options);
        return response.data;
    }

    async get<T = unknown>(url: string, options: RequestOptions = {}): Promise<T> {
        const response = await this.client.get<T>(url, options);
        return response.data;
    }
}
