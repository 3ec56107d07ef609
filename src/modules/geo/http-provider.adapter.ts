import { Logger } from "@nestjs/common";
import type { AxiosInstance, AxiosResponse } from "axios";
import type { z } from "zod";
import type { HttpClientConfig, HttpClientService } from "../http-client/http-client.service";
import type { ProviderAdapter } from "./provider-chain";

/**
 * Base for providers backed by one third-party HTTP API. `fetchParsed` is the
 * adapter boundary: transport errors, non-2xx statuses and bodies that do not
 * match the schema all come back as null.
 */
export abstract class HttpProviderAdapter<TInput, TResult, TName extends string>
  implements ProviderAdapter<TInput, TResult, TName>
{
  abstract readonly name: TName;

  protected readonly logger: Logger;
  protected readonly httpClient: AxiosInstance;

  protected constructor(
    private readonly httpClientService: HttpClientService,
    private readonly clientConfig: HttpClientConfig,
  ) {
    this.logger = new Logger(new.target.name);
    this.httpClient = httpClientService.createClient(clientConfig);
  }

  abstract attempt(input: TInput): Promise<TResult | null>;

  protected async fetchParsed<T>(
    operation: string,
    request: (client: AxiosInstance) => Promise<AxiosResponse<unknown>>,
    schema: z.ZodType<T>,
  ): Promise<T | null> {
    const { serviceName } = this.clientConfig;

    try {
      const { data } = await request(this.httpClient);
      const parsed = schema.safeParse(data);

      if (!parsed.success) {
        this.logger.warn(`${serviceName} ${operation}: unexpected response shape`, {
          issues: parsed.error.issues.length,
        });
        return null;
      }

      return parsed.data;
    } catch (error) {
      this.httpClientService.handleError(error, operation, serviceName);
      return null;
    }
  }
}
