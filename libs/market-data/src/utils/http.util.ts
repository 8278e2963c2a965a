import axios, { AxiosInstance } from 'axios';

export const createHttpClient = (baseURL: string, timeoutMs: number): AxiosInstance =>
  axios.create({
    baseURL,
    timeout: timeoutMs,
    headers: { 'User-Agent': 'stock-alert-engine/1.0', Accept: 'application/json' },
  });

/** Network failures, timeouts, 429 and 5xx are worth another attempt; 4xx are not. */
export const isRetryableHttpError = (error: unknown): boolean => {
  if (!axios.isAxiosError(error)) return false;
  const status = error.response?.status;
  if (status === undefined) return true;
  return status === 429 || status >= 500;
};
