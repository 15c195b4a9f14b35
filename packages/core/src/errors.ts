/**
 * Error taxonomy for a report run.
 *
 * Every fatal error carries the stage it was raised in and, where one is
 * involved, the data source. The CLI prints the message as-is, so the
 * message itself is prefixed with `[stage/source]`.
 */

import type { SourceId } from './schema/vocabulary.js';

export type ReportStage = 'fetch' | 'normalize' | 'compose' | 'generate' | 'validate' | 'finalize';

function prefix(stage: ReportStage, source?: SourceId): string {
  return source ? `[${stage}/${source}]` : `[${stage}]`;
}

export class ReportError extends Error {
  constructor(
    message: string,
    public readonly stage: ReportStage,
    public readonly source?: SourceId,
  ) {
    super(`${prefix(stage, source)} ${message}`);
    this.name = 'ReportError';
  }
}

/** A required raw field is absent for a requested (source, dimension). */
export class SchemaMappingError extends ReportError {
  constructor(
    message: string,
    source: SourceId,
    public readonly dimension: string,
    public readonly field?: string,
  ) {
    super(message, 'normalize', source);
    this.name = 'SchemaMappingError';
  }
}

export class EmptyInputError extends ReportError {
  constructor(message = 'No data sections available to analyze') {
    super(message, 'compose');
    this.name = 'EmptyInputError';
  }
}

export class InvalidCitationError extends ReportError {
  constructor(public readonly invalidIds: string[]) {
    super(`Narrative cites unknown record IDs: ${invalidIds.join(', ')}`, 'validate');
    this.name = 'InvalidCitationError';
  }
}

export class ExternalCallError extends ReportError {
  constructor(
    message: string,
    public readonly category: string,
    public readonly cause?: unknown,
  ) {
    super(message, 'generate');
    this.name = 'ExternalCallError';
  }
}

export class SourceFetchError extends ReportError {
  constructor(message: string, source: SourceId, public readonly cause?: unknown) {
    super(message, 'fetch', source);
    this.name = 'SourceFetchError';
  }
}

export class PromptTooLargeError extends ReportError {
  constructor(
    public readonly estimatedTokens: number,
    public readonly contextWindow: number,
  ) {
    super(
      `Prompt needs ~${estimatedTokens} tokens but the model accepts ${contextWindow}`,
      'compose',
    );
    this.name = 'PromptTooLargeError';
  }
}

export class PeriodError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PeriodError';
  }
}

/**
 * Non-fatal: an optional source failed, was not configured, or one of its
 * dimensions could not be mapped. Recorded on the report, never thrown.
 */
export class DegradedSourceWarning {
  readonly name = 'DegradedSourceWarning';

  constructor(
    public readonly source: SourceId,
    public readonly reason: string,
    public readonly dimension?: string,
  ) {}

  get message(): string {
    const scope = this.dimension ? `${this.source}/${this.dimension}` : this.source;
    return `${scope}: ${this.reason}`;
  }
}
