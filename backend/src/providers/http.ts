import http from 'node:http';
import https from 'node:https';
import axios, { type AxiosInstance, type CreateAxiosDefaults } from 'axios';

export interface HttpClient {
  client: AxiosInstance;
  close(): Promise<void>;
}

/** Axios instance on keep-alive agents that `close()` tears down. */
export function createHttpClient(defaults: CreateAxiosDefaults = {}): HttpClient {
  const httpAgent = new http.Agent({ keepAlive: true });
  const httpsAgent = new https.Agent({ keepAlive: true });
  const client = axios.create({ ...defaults, httpAgent, httpsAgent });

  return {
    client,
    close: async () => {
      httpAgent.destroy();
      httpsAgent.destroy();
    },
  };
}
