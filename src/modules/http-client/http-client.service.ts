import { Injectable, Logger } from "@nestjs/common";
import axios, { AxiosError, AxiosInstance, AxiosRequestConfig } from "axios";

export interface HttpClientConfig {
  baseURL?: string;
  timeout?: number;
  headers?: Record<string, string>;
  serviceName: string; // For logging purposes
}

export interface ErrorInfo {
  message: string;
  status?: number;
  code?: string;
  isNetworkError: boolean;
}

const DEFAULT_TIMEOUT_MS = 10_000;

@Injectable()
export class HttpClientService {
  private readonly logger = new Logger(HttpClientService.name);

  /**
   * Create a configured axios instance with interceptors for logging.
   * Query strings are left out of the log lines since some providers take
   * their credential as a query parameter.
   */
  createClient(config: HttpClientConfig): AxiosInstance {
    const axiosConfig: AxiosRequestConfig = {
      baseURL: config.baseURL,
      timeout: config.timeout ?? DEFAULT_TIMEOUT_MS,
      headers: {
        Accept: "application/json",
        ...config.headers,
      },
    };

    const client = axios.create(axiosConfig);

    client.interceptors.request.use(
      (requestConfig) => {
        this.logger.debug(
          `${config.serviceName} request: ${requestConfig.method?.toUpperCase()} ${requestConfig.url}`,
        );
        return requestConfig;
      },
      (error: unknown) => Promise.reject(toError(error)),
    );

    client.interceptors.response.use(
      (response) => {
        this.logger.debug(
          `${config.serviceName} response: ${response.config.method?.toUpperCase()} ${response.config.url} - Status: ${response.status}`,
        );
        return response;
      },
      (error: unknown) => Promise.reject(toError(error)),
    );

    return client;
  }

  /**
   * Turn whatever an axios call rejected with into loggable error info
   */
  handleError(error: unknown, operation: string, serviceName: string): ErrorInfo {
    const info = describeError(error);

    this.logger.warn(`${serviceName} ${operation} failed: ${info.message}`);

    return info;
  }
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function describeError(error: unknown): ErrorInfo {
  if (error instanceof AxiosError && error.response) {
    const { status, statusText, data } = error.response;
    return {
      message: readField(data, "message") ?? `HTTP ${status}: ${statusText}`,
      status,
      code: readField(data, "code"),
      isNetworkError: false,
    };
  }

  if (error instanceof AxiosError && error.code === AxiosError.ECONNABORTED) {
    return {
      message: `Request timed out: ${error.message}`,
      code: "TIMEOUT",
      isNetworkError: true,
    };
  }

  if (error instanceof AxiosError && error.request) {
    return {
      message: "Network error: Unable to reach server",
      code: "NETWORK_ERROR",
      isNetworkError: true,
    };
  }

  const errorMessage = error instanceof Error ? error.message : "Unknown error";
  return {
    message: `Unexpected error: ${errorMessage}`,
    code: "UNEXPECTED_ERROR",
    isNetworkError: false,
  };
}

function readField(data: unknown, field: string): string | undefined {
  if (typeof data !== "object" || data === null || !(field in data)) {
    return undefined;
  }
  const value: unknown = Reflect.get(data, field);
  return typeof value === "string" ? value : undefined;
}
