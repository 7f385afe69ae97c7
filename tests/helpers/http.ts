import axios, { type AxiosInstance, type InternalAxiosRequestConfig } from 'axios';

export interface StubResponse {
  status: number;
  data: unknown;
}

/**
 * An axios instance whose transport is a function instead of the network.
 * Every request config is recorded in `requests`.
 */
export function stubClient(respond: (config: InternalAxiosRequestConfig) => StubResponse | Promise<StubResponse>) {
  const requests: InternalAxiosRequestConfig[] = [];
  const client: AxiosInstance = axios.create({
    validateStatus: () => true,
    adapter: async (config: InternalAxiosRequestConfig) => {
      requests.push(config);
      const { status, data } = await respond(config);
      return { data, status, statusText: String(status), headers: {}, config };
    },
  });
  return { client, requests };
}
