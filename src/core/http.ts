import axios, { type AxiosInstance } from 'axios';

export const USER_AGENT = 'serverchan-notify-node/0.1.0';

export interface HttpResult<T> {
  status: number;
  data: T;
}

export const createHttpClient = (timeoutMs = 10000): AxiosInstance => {
  return axios.create({
    timeout: timeoutMs,
    headers: { 'User-Agent': USER_AGENT }
  });
};

/**
 * POST url-encoded fields. Every HTTP status resolves; only transport
 * failures (DNS, refused connection, timeout) reject.
 */
export const postForm = async (
  client: AxiosInstance,
  url: string,
  fields: Record<string, string>,
  timeoutMs?: number
): Promise<HttpResult<unknown>> => {
  const res = await client.post<unknown>(url, new URLSearchParams(fields), {
    timeout: timeoutMs,
    validateStatus: () => true
  });
  return { status: res.status, data: res.data };
};
