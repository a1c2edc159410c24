import axios, { AxiosInstance, AxiosRequestConfig, AxiosResponse } from 'axios';
import { ClientError } from '../../common/errors/client.error';

/**
 * HTTP client configuration options
 */
export interface ClientOptions {
  baseURL: string;
  timeout?: number;
  maxRetries?: number;
  retryDelay?: number;
  headers?: Record<string, string>;
}

interface HttpErrorLike {
  isAxiosError: true;
  code?: string;
  message: string;
  response?: { status: number; statusText?: string; data?: unknown };
  request?: unknown;
}

function isHttpError(error: unknown): error is HttpErrorLike {
  return typeof error === 'object' && error !== null && 'isAxiosError' in error;
}

/**
 * Base HTTP client shared by the search backend and the content server.
 * Network errors and 5xx responses are retried with a linear delay.
 */
export class HttpClient {
  private readonly client: AxiosInstance;
  private readonly maxRetries: number;
  private readonly retryDelay: number;

  constructor(options: ClientOptions) {
    const { baseURL, timeout = 10000, maxRetries = 3, retryDelay = 300, headers = {} } = options;

    this.maxRetries = maxRetries;
    this.retryDelay = retryDelay;

    this.client = axios.create({
      baseURL,
      timeout,
      headers: {
        'Content-Type': 'application/json',
        ...headers,
      },
    });
  }

  async get<T>(url: string, config?: AxiosRequestConfig): Promise<T> {
    return this.execute(() => this.client.get<T>(url, config));
  }

  async post<T>(url: string, data?: unknown, config?: AxiosRequestConfig): Promise<T> {
    return this.execute(() => this.client.post<T>(url, data, config));
  }

  async put<T>(url: string, data?: unknown, config?: AxiosRequestConfig): Promise<T> {
    return this.execute(() => this.client.put<T>(url, data, config));
  }

  async delete<T>(url: string, config?: AxiosRequestConfig): Promise<T> {
    return this.execute(() => this.client.delete<T>(url, config));
  }

  private async execute<T>(send: () => Promise<AxiosResponse<T>>): Promise<T> {
    let retryCount = 0;

    for (;;) {
      try {
        const response = await send();
        return response.data;
      } catch (error) {
        if (!this.shouldRetry(error) || retryCount >= this.maxRetries) {
          throw this.toClientError(error);
        }
        retryCount++;
        await new Promise(resolve => setTimeout(resolve, this.retryDelay * retryCount));
      }
    }
  }

  private shouldRetry(error: unknown): boolean {
    if (!isHttpError(error)) {
      return false;
    }
    if (error.response) {
      return error.response.status >= 500;
    }
    return error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT';
  }

  private toClientError(error: unknown): ClientError {
    if (error instanceof ClientError) {
      return error;
    }
    if (!isHttpError(error)) {
      return new ClientError(error instanceof Error ? error.message : String(error), 0);
    }

    if (error.response) {
      const { status, statusText, data } = error.response;
      if (data && typeof data === 'object') {
        const message =
          'message' in data && typeof data.message === 'string'
            ? data.message
            : 'An error occurred with the API request';
        const errorType =
          'error' in data && typeof data.error === 'string' ? data.error : undefined;
        return new ClientError(message, status, errorType);
      }
      return new ClientError(`${statusText || 'Error'} (${status})`, status);
    }

    if (error.request) {
      return new ClientError('No response received from server', 0);
    }
    return new ClientError(error.message, 0);
  }
}
