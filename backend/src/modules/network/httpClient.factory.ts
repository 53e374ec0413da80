/**
 * HTTP Client Factory
 * ===================
 *
 * Creates axios clients with proxy configuration.
 * All quote providers MUST use this factory.
 *
 * No retry interceptor: a failed call is handed to the fallback provider
 * instead of being repeated against the same one.
 */

import axios, { AxiosInstance, AxiosRequestConfig } from 'axios';
import { HttpsProxyAgent } from 'https-proxy-agent';

export interface HttpClientOptions {
  baseURL: string;
  timeoutMs: number;
  proxyUrl?: string;
}

export function createHttpClient(options: HttpClientOptions): AxiosInstance {
  const axiosConfig: AxiosRequestConfig = {
    baseURL: options.baseURL,
    timeout: options.timeoutMs,
    headers: {
      accept: 'application/json',
      'User-Agent': 'Mozilla/5.0 (compatible; MarketRiskEngine/1.0)',
    },
  };

  if (options.proxyUrl) {
    const agent = new HttpsProxyAgent(options.proxyUrl);
    axiosConfig.httpsAgent = agent;
    axiosConfig.httpAgent = agent;
    axiosConfig.proxy = false; // agent handles it
  }

  return axios.create(axiosConfig);
}
