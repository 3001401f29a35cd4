import axios, { AxiosAdapter, AxiosInstance, InternalAxiosRequestConfig } from 'axios';
import { v4 as uuidv4 } from 'uuid';
import { Logger } from '../utils/Logger';
import { toServiceError } from '../errors/ServiceError';

/**
 * Configuration options for an external service's axios instance
 */
export interface ServiceAxiosOptions {
  /** Name used in logs and in the ServiceError raised on failure */
  serviceName: string;

  baseURL?: string;

  /** Sent as a bearer token when present */
  apiKey?: string;

  /** Request timeout in milliseconds; 0 keeps axios' default of no timeout */
  timeout?: number;

  headers?: Record<string, string>;

  /** Replaces the HTTP transport, e.g. with an in-process stand-in */
  adapter?: AxiosAdapter;

  logger?: Logger;
}

const startTimes = new WeakMap<InternalAxiosRequestConfig, number>();

/**
 * Creates an axios instance for one external service.
 *
 * Every request carries an X-Request-ID; every failure, whether a non-2xx status or a transport
 * error, is rejected as a ServiceError. Nothing is retried.
 */
export function createServiceAxios(options: ServiceAxiosOptions): AxiosInstance {
  const logger = options.logger || new Logger(`${options.serviceName}.http`);

  const headers: Record<string, string> = {
    'Content-Type': 'application/json',
    ...options.headers
  };
  if (options.apiKey) {
    headers.Authorization = `Bearer ${options.apiKey}`;
  }

  const api = axios.create({
    baseURL: options.baseURL,
    headers,
    timeout: options.timeout ?? 30000,
    adapter: options.adapter
  });

  api.interceptors.request.use((config: InternalAxiosRequestConfig) => {
    const requestId = uuidv4();
    config.headers.set('X-Request-ID', requestId);
    startTimes.set(config, Date.now());
    logger.debug(`Request ${requestId} started`, { method: config.method, url: config.url });
    return config;
  });

  api.interceptors.response.use(
    (response) => {
      const started = startTimes.get(response.config);
      logger.debug(`Request ${response.config.headers.get('X-Request-ID')} completed`, {
        status: response.status,
        durationMs: started !== undefined ? Date.now() - started : undefined
      });
      return response;
    },
    (error: unknown) => {
      const serviceError = toServiceError(error, options.serviceName);
      logger.warn(`Request failed: ${serviceError.message}`, { status: serviceError.status, category: serviceError.category });
      return Promise.reject(serviceError);
    }
  );

  return api;
}
