import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from "@nestjs/common";
import { HttpAdapterHost } from "@nestjs/core";
import type { Request } from "express";
import { AppException } from "../errors/app.exception";
import type { ProblemDetails } from "../errors/problem-details.interface";

/**
 * Catches everything thrown from a request handler and replies with RFC 7807
 * problem details. AppException bodies are passed through as built; other
 * HttpExceptions and unexpected errors are wrapped.
 */
@Catch()
export class GlobalExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(GlobalExceptionFilter.name);

  constructor(private readonly httpAdapterHost: HttpAdapterHost) {}

  catch(exception: unknown, host: ArgumentsHost): void {
    const { httpAdapter } = this.httpAdapterHost;
    const ctx = host.switchToHttp();
    const request = ctx.getRequest<Request>();
    const instance = String(httpAdapter.getRequestUrl(request));

    const status =
      exception instanceof HttpException ? exception.getStatus() : HttpStatus.INTERNAL_SERVER_ERROR;
    const body = { ...this.toProblem(exception, status), instance };

    this.logError(exception, request, status, body.type);

    httpAdapter.reply(ctx.getResponse(), body, status);
  }

  private toProblem(exception: unknown, status: number): ProblemDetails {
    if (exception instanceof AppException) {
      return exception.getProblem();
    }

    if (exception instanceof HttpException) {
      const response = exception.getResponse();
      const detail =
        typeof response === "string"
          ? response
          : this.readMessage(response) ?? exception.message;

      return {
        type: "HTTP_ERROR",
        title: exception.name,
        status,
        detail,
      };
    }

    return {
      type: "INTERNAL_ERROR",
      title: "Internal Server Error",
      status,
      detail: "An unexpected error occurred",
    };
  }

  private readMessage(response: object): string | undefined {
    if (!("message" in response)) {
      return undefined;
    }
    const { message } = response;
    if (Array.isArray(message)) {
      return message.map(String).join(", ");
    }
    return typeof message === "string" ? message : undefined;
  }

  private logError(exception: unknown, request: Request, status: number, type: string): void {
    const prefix = `[${type}] ${request.method ?? "unknown"} ${request.url ?? "unknown"}`;

    if (status >= 500) {
      if (exception instanceof Error) {
        this.logger.error(`${prefix} - ${exception.message}`, exception.stack);
      } else {
        this.logger.error(`${prefix} - Unknown error`, String(exception));
      }
      return;
    }

    const message = exception instanceof Error ? exception.message : String(exception);
    this.logger.warn(`${prefix} - ${message}`);
  }
}
