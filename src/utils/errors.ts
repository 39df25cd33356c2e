/**
 * Error kinds shared across the bot.
 *
 * Configuration and storage errors are fatal for startup and for the
 * request in flight respectively; generation and delivery errors are
 * caught at the boundary nearest to where they happen.
 */

export class ConfigurationError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class StorageError extends Error {
  constructor(
    message: string,
    public readonly operation?: string,
    public readonly cause?: unknown
  ) {
    super(operation ? `${operation}: ${message}` : message);
    this.name = 'StorageError';
  }
}

export class GenerationError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = 'GenerationError';
  }
}

export class DeliveryError extends Error {
  constructor(
    message: string,
    public readonly chatId?: string | number,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'DeliveryError';
  }
}

/** Message of an unknown thrown value, for structured log fields */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
