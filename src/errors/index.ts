import { SessionError, SessionErrorKind } from '../types/index.js';

/**
 * Base class for the failures that end a transcription session.
 * Each subclass maps onto one `SessionErrorKind` shown in the GUI.
 */
export abstract class TranscriptionError extends Error {
  abstract readonly kind: SessionErrorKind;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }

  toSessionError(): SessionError {
    return { kind: this.kind, message: this.message };
  }
}

/** The audio file is missing, unreadable or in a format we cannot decode. */
export class InputError extends TranscriptionError {
  readonly kind = 'input';
}

/** The speech-to-text model failed to load or to transcribe. */
export class ModelError extends TranscriptionError {
  readonly kind = 'model';

  constructor(readonly reason: string, options?: ErrorOptions) {
    super(`Transcription failed: ${reason}`, options);
  }
}

export class OutputError extends TranscriptionError {
  readonly kind = 'output';
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Anything thrown out of the model adapter that is not already classified
 * is treated as a model failure.
 */
export function toTranscriptionError(error: unknown): TranscriptionError {
  if (error instanceof TranscriptionError) {
    return error;
  }
  return new ModelError(errorMessage(error), { cause: error });
}
