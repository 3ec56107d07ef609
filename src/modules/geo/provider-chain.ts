import { Logger } from "@nestjs/common";

/**
 * One step of an ordered fallback: answers with a result, or null to let the
 * next adapter try. Adapters are expected to contain their own failures.
 */
export interface ProviderAdapter<TInput, TResult, TName extends string = string> {
  readonly name: TName;
  attempt(input: TInput): Promise<TResult | null>;
}

export interface ChainResult<TResult, TName extends string = string> {
  provider: TName;
  result: TResult;
}

/**
 * Tries adapters strictly in order and returns the first non-null answer.
 * An adapter that throws anyway is logged and treated like one that returned null.
 */
export class ProviderChain<TInput, TResult, TName extends string = string> {
  private readonly logger: Logger;

  constructor(
    private readonly label: string,
    private readonly adapters: ReadonlyArray<ProviderAdapter<TInput, TResult, TName>>,
  ) {
    this.logger = new Logger(`${ProviderChain.name}:${label}`);
  }

  get providerNames(): TName[] {
    return this.adapters.map((adapter) => adapter.name);
  }

  async resolve(input: TInput): Promise<ChainResult<TResult, TName> | null> {
    for (const adapter of this.adapters) {
      const result = await this.tryAdapter(adapter, input);
      if (result !== null) {
        return { provider: adapter.name, result };
      }
    }

    this.logger.debug(`${this.label}: no provider produced a result`);
    return null;
  }

  private async tryAdapter(
    adapter: ProviderAdapter<TInput, TResult, TName>,
    input: TInput,
  ): Promise<TResult | null> {
    try {
      return await adapter.attempt(input);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`${this.label}: ${adapter.name} failed unexpectedly: ${message}`);
      return null;
    }
  }
}
