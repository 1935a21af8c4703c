/**
 * Base class for every error raised by this library
 */
export class RagError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Invalid input text or configuration values
 */
export class ValidationError extends RagError {}

/**
 * Unknown provider, strategy, model or metric, or missing credentials
 */
export class ConfigurationError extends RagError {}

/**
 * A client-backed component was used before `initialize()` succeeded
 */
export class NotInitializedError extends RagError {
  constructor(component: string) {
    super(`${component} is not initialized. Call initialize() first.`);
  }
}

export interface EmbeddingProviderErrorOptions {
  provider: string;
  retryable: boolean;
  cause?: unknown;
}

/**
 * An embedding provider call failed after the allowed attempts
 */
export class EmbeddingProviderError extends RagError {
  readonly provider: string;
  readonly retryable: boolean;

  constructor(message: string, options: EmbeddingProviderErrorOptions) {
    super(message, { cause: options.cause });
    this.provider = options.provider;
    this.retryable = options.retryable;
  }
}

/**
 * Render any thrown value as a message
 */
export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  try {
    const serialized: string | undefined = JSON.stringify(error);
    return serialized === undefined ? String(error) : serialized;
  } catch {
    return String(error);
  }
}

/**
 * Name of a thrown value, when it carries one (SDK errors are matched by name)
 */
export function errorName(error: unknown): string | undefined {
  if (error instanceof Error) {
    return error.name;
  }
  if (typeof error === 'object' && error !== null && 'name' in error && typeof error.name === 'string') {
    return error.name;
  }
  return undefined;
}
