import axios, {
  type AxiosAdapter,
  type AxiosInstance,
  type AxiosRequestConfig,
  type AxiosError,
} from 'axios';
import axiosRetry from 'axios-retry';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('HttpClient');

const IDEMPOTENT_METHODS = new Set(['get', 'head', 'options', 'put', 'delete']);
// The connection was never established, so the server cannot have seen the request
const NOT_SENT_CODES = new Set(['ECONNREFUSED', 'EAI_AGAIN']);

// A POST that reached the server may have taken effect; only retry it when it never left
export function isSafeToRetry(error: AxiosError): boolean {
  const method = error.config?.method?.toLowerCase() ?? 'get';
  if (IDEMPOTENT_METHODS.has(method)) {
    return axiosRetry.isNetworkOrIdempotentRequestError(error);
  }
  return !error.response && error.code !== undefined && NOT_SENT_CODES.has(error.code);
}

export interface HttpClientOptions {
  baseURL?: string;
  timeout?: number;
  maxRetries?: number;
  retryDelay?: number;
  headers?: Record<string, string>;
  adapter?: AxiosAdapter;
}

export class HttpClient {
  private client: AxiosInstance;
  private name: string;

  constructor(name: string, options: HttpClientOptions = {}) {
    this.name = name;

    this.client = axios.create({
      baseURL: options.baseURL,
      timeout: options.timeout ?? 30000,
      adapter: options.adapter,
      headers: {
        'Content-Type': 'application/json',
        'User-Agent': 'FloorPriceBot/1.0',
        ...options.headers,
      },
    });

    const retries = options.maxRetries ?? 3;
    const baseDelay = options.retryDelay ?? 1000;

    // Idempotent requests retry on network errors and 5xx; others only when never sent
    axiosRetry(this.client, {
      retries,
      retryDelay: (retryCount) => {
        const delay = baseDelay * Math.pow(2, retryCount - 1);
        logger.debug(`${this.name}: Retry ${retryCount}, waiting ${delay}ms`);
        return delay;
      },
      retryCondition: isSafeToRetry,
      onRetry: (retryCount, error) => {
        logger.warn(`${this.name}: Retrying request (${retryCount})`, {
          url: error.config?.url,
          status: error.response?.status,
        });
      },
    });

    this.client.interceptors.request.use((config) => {
      logger.debug(`${this.name}: ${config.method?.toUpperCase()} ${config.url}`);
      return config;
    });

    this.client.interceptors.response.use(
      (response) => {
        logger.debug(`${this.name}: Response ${response.status} from ${response.config.url}`);
        return response;
      },
      (error: unknown) => {
        if (axios.isCancel(error)) {
          logger.debug(`${this.name}: Request cancelled`);
        } else if (axios.isAxiosError(error)) {
          this.logFailure(error);
        }
        return Promise.reject(error);
      }
    );
  }

  private logFailure(error: AxiosError): void {
    if (error.response) {
      // 4xx answers are expected outcomes for most callers
      const level = error.response.status >= 500 ? 'error' : 'warn';
      logger.log(level, `${this.name}: HTTP ${error.response.status}`, {
        url: error.config?.url,
      });
    } else if (error.request) {
      logger.error(`${this.name}: No response received`, {
        url: error.config?.url,
        code: error.code,
      });
    } else {
      logger.error(`${this.name}: Request setup error`, {
        message: error.message,
      });
    }
  }

  async get<T>(url: string, config?: AxiosRequestConfig): Promise<T> {
    const response = await this.client.get<T>(url, config);
    return response.data;
  }

  async post<T>(url: string, data?: unknown, config?: AxiosRequestConfig): Promise<T> {
    const response = await this.client.post<T>(url, data, config);
    return response.data;
  }
}

export default HttpClient;
