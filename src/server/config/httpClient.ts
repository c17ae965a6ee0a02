/**
 * Centralized HTTP Client Configuration
 *
 * Shared keep-alive agents and a factory for configured axios instances used
 * by the REST-based generation providers.
 */

import axios, { type AxiosError, type AxiosInstance, type AxiosRequestConfig, type InternalAxiosRequestConfig } from 'axios';
import https from 'https';
import http from 'http';
import { logger } from '../utils/logger.js';

// HTTP timeout constants for different scenarios
export const HTTP_TIMEOUTS = {
  SHORT: 5000,      // 5 seconds - quick API calls
  STANDARD: 30000,  // 30 seconds - standard operations
  LONG: 120000,     // 2 minutes - long-running operations
  VERY_LONG: 300000, // 5 minutes - generation over large contexts
} as const;

// Shared across all HTTP clients to maximize connection reuse
const httpAgent = new http.Agent({
  keepAlive: true,
  keepAliveMsecs: 30000,
  maxSockets: 50,
  maxFreeSockets: 10,
  timeout: 60000,
});

const httpsAgent = new https.Agent({
  keepAlive: true,
  keepAliveMsecs: 30000,
  maxSockets: 50,
  maxFreeSockets: 10,
  timeout: 60000,
});

export { httpAgent, httpsAgent };

// Request start times, keyed by the config object axios hands back on completion
const startTimes = new WeakMap<InternalAxiosRequestConfig, number>();

function logCompletion(config: InternalAxiosRequestConfig | undefined, error?: AxiosError): void {
  if (!config) {
    return;
  }
  const startTime = startTimes.get(config);
  if (startTime === undefined) {
    return;
  }
  startTimes.delete(config);

  const duration = Date.now() - startTime;
  const timeout = config.timeout || HTTP_TIMEOUTS.STANDARD;
  const percentageUsed = (duration / timeout) * 100;

  if (error?.code === 'ECONNABORTED') {
    logger.error(
      { url: config.url, method: config.method, duration, timeout, percentageUsed },
      'HTTP request timed out'
    );
  } else if (percentageUsed > 50) {
    logger.debug(
      { url: config.url, method: config.method, duration, timeout, percentageUsed },
      'HTTP request completed'
    );
  }
}

/**
 * Create a configured axios instance with connection pooling and default settings
 *
 * @param config - Optional axios configuration to merge with defaults
 */
export function createHttpClient(config?: AxiosRequestConfig): AxiosInstance {
  const client = axios.create({
    timeout: HTTP_TIMEOUTS.STANDARD,
    httpAgent,
    httpsAgent,
    ...config,
  });

  // Enforce a timeout on every request, even when a caller clears it
  client.interceptors.request.use((requestConfig) => {
    if (!requestConfig.timeout) {
      requestConfig.timeout = HTTP_TIMEOUTS.STANDARD;
      logger.debug(
        { url: requestConfig.url, method: requestConfig.method },
        'HTTP request without explicit timeout, using default STANDARD timeout (30s)'
      );
    }
    startTimes.set(requestConfig, Date.now());
    return requestConfig;
  });

  client.interceptors.response.use(
    (response) => {
      logCompletion(response.config);
      return response;
    },
    (error: unknown) => {
      if (axios.isAxiosError(error)) {
        logCompletion(error.config, error);
      }
      return Promise.reject(error);
    }
  );

  return client;
}

/**
 * Close HTTP agents and free up connections during graceful shutdown
 */
export function closeHttpAgents(): void {
  httpAgent.destroy();
  httpsAgent.destroy();
  logger.debug('HTTP agents destroyed');
}
