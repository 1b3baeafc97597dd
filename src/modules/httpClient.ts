import axios, { AxiosInstance } from 'axios';
import https from 'https';

const httpsAgent = new https.Agent({
  keepAlive: true,
  maxSockets: 10,
});

/**
 * Shared axios client. Every request is bounded by the configured timeout;
 * a request that exceeds it rejects with ECONNABORTED.
 */
export function createHttpClient(timeoutSeconds: number): AxiosInstance {
  return axios.create({
    timeout: timeoutSeconds * 1000,
    httpsAgent,
    headers: { 'User-Agent': 'kiosk-dashboard/1.0' },
  });
}

export function destroyHttpAgent(): void {
  httpsAgent.destroy();
}
