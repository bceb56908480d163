// One message in, one reply out:
// RECEIVED → EXTRACTING → VALIDATING → SEARCHING → FORMATTING → REPLIED, or FAILED from any step.
import { randomUUID } from 'crypto';
import type { FlightProvider } from './providers/flights/flight-provider';
import type { NluClient } from './llm-client';
import { IntentExtractor } from './intent-extractor';
import { validateQuery } from './query-validator';
import { SearchDispatcher } from './search-dispatcher';
import { NO_OPTIONS_MESSAGE, formatSearchResult } from './result-formatter';
import {
  ExtractionError,
  PipelineError,
  SearchError,
  ValidationError,
  errorMessage,
} from './pipeline-errors';
import { retryWithBackoff } from '@/utils/retryWithBackoff';
import { toCalendarDate } from '@/utils/calendarDate';
import { logger } from './logger';

export type PipelineState =
  | 'RECEIVED'
  | 'EXTRACTING'
  | 'VALIDATING'
  | 'SEARCHING'
  | 'FORMATTING'
  | 'REPLIED'
  | 'FAILED';

export const REPLIES = {
  notUnderstood: 'I couldn\'t understand that request. Try something like "flight from HYD to BER on Oct 2".',
  invalidTrip: "That doesn't look like a valid trip (check your dates/cities).",
  searchFailed: "I couldn't find flights for that route/date.",
  generic: 'Something went wrong, please try again.',
} as const;

/** Fixed, user-safe reply per error kind. Error text itself never reaches the user. */
export function replyForError(err: unknown): string {
  if (err instanceof ExtractionError) return REPLIES.notUnderstood;
  if (err instanceof ValidationError) return REPLIES.invalidTrip;
  // "No inventory" is an answer, not a failure.
  if (err instanceof SearchError) {
    return err.reason === 'no_options' ? NO_OPTIONS_MESSAGE : REPLIES.searchFailed;
  }
  return REPLIES.generic;
}

export type PipelineOutcome =
  | { status: 'replied'; state: 'REPLIED' | 'FAILED'; reply: string }
  | { status: 'dropped'; state: PipelineState };

export interface RunOptions {
  /** Aborted when the chat session is gone; the run finishes its current stage and drops the result. */
  signal?: AbortSignal;
  correlationId?: string;
}

export interface OrchestratorDeps {
  nlu: NluClient;
  provider: FlightProvider;
  maxOptionsPerLeg: number;
  /** Total attempts for each NLU and provider call. */
  retryAttempts: number;
  retryDelayMs?: number;
  now?: () => Date;
  onStateChange?: (state: PipelineState, correlationId: string) => void;
}

export class Orchestrator {
  private readonly extractor: IntentExtractor;
  private readonly dispatcher: SearchDispatcher;
  private readonly now: () => Date;

  constructor(private readonly deps: OrchestratorDeps) {
    const retry = <T>(label: string, fn: () => Promise<T>): Promise<T> =>
      retryWithBackoff(fn, {
        attempts: deps.retryAttempts,
        ...(deps.retryDelayMs !== undefined && { initialDelay: deps.retryDelayMs }),
        label,
      });

    const nlu: NluClient = {
      classify: (rawText, schemaHint) => retry('nlu', () => deps.nlu.classify(rawText, schemaHint)),
    };
    const provider: FlightProvider = {
      name: deps.provider.name,
      search: (request) => retry('search', () => deps.provider.search(request)),
    };

    this.now = deps.now ?? (() => new Date());
    this.extractor = new IntentExtractor(nlu, this.now);
    this.dispatcher = new SearchDispatcher(provider);
  }

  /** Entry point for chat transports. Always resolves to a reply. */
  async handle(rawText: string): Promise<string> {
    const outcome = await this.run(rawText);
    return outcome.status === 'replied' ? outcome.reply : REPLIES.generic;
  }

  async run(rawText: string, options: RunOptions = {}): Promise<PipelineOutcome> {
    const correlationId = options.correlationId ?? randomUUID();
    const current: { state: PipelineState } = { state: 'RECEIVED' };
    const enter = (state: PipelineState): void => {
      current.state = state;
      logger.debug('pipeline:state', { correlationId, state });
      this.deps.onStateChange?.(state, correlationId);
    };
    const gone = (): boolean => options.signal?.aborted === true;
    const drop = (): PipelineOutcome => {
      logger.info('pipeline:dropped', { correlationId, state: current.state });
      return { status: 'dropped', state: current.state };
    };

    enter('RECEIVED');
    try {
      enter('EXTRACTING');
      const extracted = await this.extractor.extract(rawText);
      if (gone()) return drop();

      enter('VALIDATING');
      const query = validateQuery(extracted, toCalendarDate(this.now()));
      if (gone()) return drop();

      enter('SEARCHING');
      const result = await this.dispatcher.search(query);
      if (gone()) return drop();

      enter('FORMATTING');
      const reply = formatSearchResult(result, { maxOptionsPerLeg: this.deps.maxOptionsPerLeg });
      if (gone()) return drop();

      enter('REPLIED');
      logger.info('pipeline:replied', { correlationId, tripType: query.tripType });
      return { status: 'replied', state: 'REPLIED', reply };
    } catch (err) {
      const failedIn = current.state;
      enter('FAILED');
      const kind = err instanceof PipelineError ? err.kind : 'unexpected';
      if (kind === 'unexpected') {
        logger.error('pipeline:failed', { correlationId, failedIn, kind, error: errorMessage(err) });
      } else {
        logger.warn('pipeline:failed', { correlationId, failedIn, kind, error: errorMessage(err) });
      }
      if (gone()) return drop();
      return { status: 'replied', state: 'FAILED', reply: replyForError(err) };
    }
  }
}
