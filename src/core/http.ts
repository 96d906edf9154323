import axios, { type AxiosInstance } from 'axios';

export const DEFAULT_TIMEOUT_MS = 30_000;

export interface HttpResponse<T> {
  status: number;
  data: T;
}

/**
 * Every status resolves; callers decide what a non-2xx means for their provider.
 * Network failures and timeouts still reject with an AxiosError.
 */
export const createHttpClient = (
  baseURL: string,
  timeoutMs = DEFAULT_TIMEOUT_MS,
  headers?: Record<string, string>
): AxiosInstance => {
  return axios.create({
    baseURL,
    timeout: timeoutMs,
    headers,
    validateStatus: () => true
  });
};

export const isSuccessStatus = (status: number): boolean => status >= 200 && status < 300;

export const postJson = async <TReq, TRes>(
  client: AxiosInstance,
  path: string,
  body: TReq,
  headers?: Record<string, string>
): Promise<HttpResponse<TRes>> => {
  const res = await client.post<TRes>(path, body, {
    headers: { 'Content-Type': 'application/json', ...headers }
  });
  return { status: res.status, data: res.data };
};

export const postForm = async <TRes>(
  client: AxiosInstance,
  path: string,
  fields: Record<string, string>,
  headers?: Record<string, string>
): Promise<HttpResponse<TRes>> => {
  const res = await client.post<TRes>(path, new URLSearchParams(fields).toString(), {
    headers: { 'Content-Type': 'application/x-www-form-urlencoded', ...headers }
  });
  return { status: res.status, data: res.data };
};

export const basicAuth = (username: string, password: string): string =>
  `Basic ${Buffer.from(`${username}:${password}`).toString('base64')}`;
