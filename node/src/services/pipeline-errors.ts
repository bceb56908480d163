// Error taxonomy shared by every pipeline stage
import type { Leg } from '@/types/flights';

export type PipelineErrorKind = 'extraction' | 'validation' | 'search' | 'delivery' | 'config';

export abstract class PipelineError extends Error {
  abstract readonly kind: PipelineErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export type ExtractionFailure = 'unreachable' | 'malformed' | 'incomplete';

/** NLU service unreachable, returned unusable JSON, or left out a required field. */
export class ExtractionError extends PipelineError {
  readonly kind = 'extraction' as const;

  constructor(
    public readonly reason: ExtractionFailure,
    message: string,
    public readonly missingFields: string[] = [],
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export type ValidationRule =
  | 'same_airport'
  | 'bad_code'
  | 'bad_date'
  | 'past_departure'
  | 'missing_return'
  | 'return_not_after_departure';

export class ValidationError extends PipelineError {
  readonly kind = 'validation' as const;

  constructor(
    public readonly rule: ValidationRule,
    message: string,
  ) {
    super(message);
  }
}

export type SearchFailure = 'provider_failure' | 'no_options';

/** A provider call for `leg` errored, timed out, or came back with nothing usable. */
export class SearchError extends PipelineError {
  readonly kind = 'search' as const;

  constructor(
    public readonly leg: Leg,
    public readonly reason: SearchFailure,
    options?: { cause?: unknown },
  ) {
    super(
      reason === 'no_options'
        ? `No flight options for ${leg.toLowerCase()} leg`
        : `Provider call failed for ${leg.toLowerCase()} leg`,
      options,
    );
  }
}

export class DeliveryError extends PipelineError {
  readonly kind = 'delivery' as const;

  constructor(
    public readonly chatId: number | string,
    options?: { cause?: unknown },
  ) {
    super(`Reply could not be delivered to chat ${chatId}`, options);
  }
}

export class ConfigError extends PipelineError {
  readonly kind = 'config' as const;

  constructor(public readonly errors: Array<{ path: string; message: string }>) {
    super(`Invalid configuration: ${errors.map((e) => `${e.path} (${e.message})`).join(', ')}`);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
