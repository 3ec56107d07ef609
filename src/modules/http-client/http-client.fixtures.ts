import { HttpStatus } from "@nestjs/common";
import { AxiosError, AxiosHeaders, type AxiosResponse, type InternalAxiosRequestConfig } from "axios";
import { vi } from "vitest";
import type { ErrorInfo, HttpClientConfig } from "./http-client.service";

export type MockAxiosInstance = ReturnType<typeof createMockAxiosInstance>;

/**
 * Create a mock AxiosInstance for testing
 */
export function createMockAxiosInstance() {
  return {
    get: vi.fn(),
    post: vi.fn(),
    interceptors: {
      request: { use: vi.fn(), eject: vi.fn(), clear: vi.fn() },
      response: { use: vi.fn(), eject: vi.fn(), clear: vi.fn() },
    },
  };
}

function handleErrorMock() {
  return vi.fn((error: unknown): ErrorInfo => {
    if (error instanceof AxiosError && error.response) {
      return {
        message: `HTTP ${error.response.status}`,
        status: error.response.status,
        isNetworkError: false,
      };
    }
    if (error instanceof AxiosError && error.request) {
      return { message: "Network error: Unable to reach server", code: "NETWORK_ERROR", isNetworkError: true };
    }
    const message = error instanceof Error ? error.message : "Unexpected error";
    return { message: `Unexpected error: ${message}`, code: "UNEXPECTED_ERROR", isNetworkError: false };
  });
}

/**
 * Create a mock HttpClientService handing out a separate instance per provider,
 * keyed by the `serviceName` each provider registers its client under
 */
export function createMockHttpClientServiceByName(instances: Record<string, MockAxiosInstance>) {
  return {
    createClient: vi.fn(
      (config: HttpClientConfig) => instances[config.serviceName] ?? createMockAxiosInstance(),
    ),
    handleError: handleErrorMock(),
  };
}

const HTTP_STATUS_TEXTS: Partial<Record<HttpStatus, string>> = {
  [HttpStatus.BAD_REQUEST]: "Bad Request",
  [HttpStatus.UNAUTHORIZED]: "Unauthorized",
  [HttpStatus.FORBIDDEN]: "Forbidden",
  [HttpStatus.NOT_FOUND]: "Not Found",
  [HttpStatus.TOO_MANY_REQUESTS]: "Too Many Requests",
  [HttpStatus.INTERNAL_SERVER_ERROR]: "Internal Server Error",
  [HttpStatus.BAD_GATEWAY]: "Bad Gateway",
  [HttpStatus.SERVICE_UNAVAILABLE]: "Service Unavailable",
};

/**
 * Create an AxiosError carrying a response, as axios rejects with for non-2xx statuses
 */
export function createAxiosErrorWithResponse<T>(status: HttpStatus, data: T): AxiosError<T> {
  const statusText = HTTP_STATUS_TEXTS[status] ?? "Error";
  const config: InternalAxiosRequestConfig = { headers: new AxiosHeaders() };
  const response: AxiosResponse<T> = {
    status,
    statusText,
    data,
    headers: {},
    config,
  };
  return new AxiosError<T>(statusText, AxiosError.ERR_BAD_RESPONSE, config, {}, response);
}

/**
 * Create an AxiosError with a request but no response (connection refused, DNS failure)
 */
export function createAxiosErrorWithRequest(message: string): AxiosError {
  const error = new AxiosError(message, AxiosError.ERR_NETWORK);
  error.request = {};
  return error;
}

/**
 * Create the AxiosError axios rejects with when the client timeout elapses
 */
export function createAxiosTimeoutError(timeoutMs: number): AxiosError {
  const error = new AxiosError(`timeout of ${timeoutMs}ms exceeded`, AxiosError.ECONNABORTED);
  error.request = {};
  return error;
}
