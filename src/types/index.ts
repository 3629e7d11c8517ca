export interface TranscriptSegment {
  readonly start: number;
  readonly end: number;
  readonly text: string;
}

/** Segments in the order the model emitted them. */
export type TranscriptDocument = readonly TranscriptSegment[];

export type ComputeDevice = 'cpu' | 'gpu-if-available';
export type ComputeType = 'int8' | 'float32';

export interface TranscriptionSettings {
  model: string;
  computeType: ComputeType;
  device: ComputeDevice;
  /** Whisper language code, or 'auto' to let the model detect it. */
  language: string;
}

export interface ProgressUpdate {
  progress: number;
  label: string;
}

export type SessionStatus = 'idle' | 'loading' | 'transcribing' | 'done' | 'failed';

export type SessionErrorKind = 'input' | 'model' | 'output';

export interface SessionError {
  kind: SessionErrorKind;
  message: string;
}

export interface SessionState {
  id: string | null;
  status: SessionStatus;
  inputFile: string | null;
  outputDir: string;
  outputPath: string | null;
  progress: number;
  label: string;
  segmentCount: number;
  error: SessionError | null;
  startedAt: Date | null;
  finishedAt: Date | null;
}

export type CommandResult =
  | { accepted: true; state: SessionState }
  | { accepted: false; reason: string; state: SessionState };

export type LogLevel = 'DEBUG' | 'INFO' | 'WARNING' | 'ERROR';

export interface LogEntry {
  level: LogLevel;
  scope: string;
  message: string;
  timestamp: Date;
}
