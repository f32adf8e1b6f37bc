/**
 * @fileoverview In-process HTTP stand-in for provider tests.
 */

import axios, { AxiosError, type AxiosInstance, type InternalAxiosRequestConfig } from 'axios';
import type { YahooChartResponse } from '../src/types.js';

export interface StubReply {
  status: number;
  data: unknown;
}

/**
 * Axios instance whose adapter answers from `handler` instead of the network.
 * Every request config is recorded in `requests`.
 */
export function createStubClient(handler: (config: InternalAxiosRequestConfig) => StubReply): {
  client: AxiosInstance;
  requests: InternalAxiosRequestConfig[];
} {
  const requests: InternalAxiosRequestConfig[] = [];

  const client = axios.create({
    baseURL: 'https://chart.example.test',
    adapter: async (config) => {
      requests.push(config);
      const { status, data } = handler(config);
      const response = { data, status, statusText: String(status), headers: {}, config };

      if (status >= 400) {
        throw new AxiosError(
          `Request failed with status code ${status}`,
          AxiosError.ERR_BAD_RESPONSE,
          config,
          undefined,
          response
        );
      }
      return response;
    },
  });

  return { client, requests };
}

/**
 * Chart response for consecutive sessions starting 2024-01-02 (New York).
 */
export function createChartResponse(
  quote: {
    open: Array<number | null>;
    high: Array<number | null>;
    low: Array<number | null>;
    close: Array<number | null>;
    volume: Array<number | null>;
  },
  timestamps?: number[]
): YahooChartResponse {
  const firstOpen = 1704205800; // 2024-01-02 09:30 New York
  return {
    chart: {
      result: [
        {
          meta: { symbol: 'TEST', currency: 'USD', gmtoffset: -18000 },
          timestamp: timestamps ?? quote.open.map((_, i) => firstOpen + i * 86_400),
          indicators: { quote: [quote] },
        },
      ],
      error: null,
    },
  };
}
