// Axios instance pre-configured for the downstream AI scanning API
import axios, { AxiosInstance } from 'axios';

// Single attempt, bounded; a slow scanner must not pin caller connections
export const SCAN_TIMEOUT_MS = 30_000;

export function createScanClient(): AxiosInstance {
  return axios.create({
    timeout: SCAN_TIMEOUT_MS,
    headers: {
      'Content-Type': 'application/json',
      Accept: 'application/json',
    },
    // The body is parsed by the proxy so a malformed 2xx can be told apart
    responseType: 'text',
    transformResponse: [(data: unknown) => data],
    maxRedirects: 0,
    maxBodyLength: Infinity,
    maxContentLength: Infinity,
  });
}
