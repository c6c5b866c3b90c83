// src/common/utils/http-client.factory.ts

import axios, { AxiosInstance, AxiosRequestConfig } from 'axios';

export interface HttpClientConfig {
  baseURL?: string;
  timeout?: number;
  headers?: Record<string, string>;
}

/**
 * HTTP client factory
 *
 * Single place where upstream axios instances are configured.
 */
export class HttpClientFactory {
  static readonly DEFAULT_TIMEOUT_MS = 15000;

  static create(config: HttpClientConfig): AxiosInstance {
    const axiosConfig: AxiosRequestConfig = {
      timeout: config.timeout ?? HttpClientFactory.DEFAULT_TIMEOUT_MS,
      headers: {
        'Accept': 'application/json',
        'User-Agent': 'city-weather/1.0',
        ...config.headers,
      },
    };

    if (config.baseURL) {
      axiosConfig.baseURL = config.baseURL;
    }

    return axios.create(axiosConfig);
  }
}
