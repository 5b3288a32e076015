import axios, { type AxiosInstance } from 'axios';

/**
 * The slice of axios the adapters use. Tests pass an in-process fake.
 */
export type HttpClient = Pick<AxiosInstance, 'get' | 'post'>;

export interface HttpClientOptions {
  baseURL?: string;
  timeoutMs: number;
  headers?: Record<string, string>;
}

export function createHttpClient(options: HttpClientOptions): HttpClient {
  return axios.create({
    baseURL: options.baseURL,
    timeout: options.timeoutMs,
    headers: {
      'Content-Type': 'application/json',
      ...options.headers,
    },
  });
}
