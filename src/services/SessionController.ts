import { EventEmitter } from 'events';
import fs from 'fs';
import path from 'path';
import { InputError, OutputError, TranscriptionError, errorMessage, toTranscriptionError } from '../errors/index.js';
import {
  CommandResult,
  ProgressUpdate,
  SessionState,
  SessionStatus,
  TranscriptSegment,
  TranscriptionSettings,
} from '../types/index.js';
import { Logger } from '../utils/logger.js';
import { assertReadableInput } from './AudioLoader.js';
import { TranscriptWriter, transcriptPathFor, writeTranscript } from './TranscriptFormatter.js';
import { ModelAdapter } from './WhisperService.js';

const TRANSITIONS: Record<SessionStatus, readonly SessionStatus[]> = {
  idle: ['loading', 'failed'],
  loading: ['loading', 'transcribing', 'idle', 'failed'],
  transcribing: ['done', 'failed', 'idle'],
  done: ['idle', 'loading', 'transcribing', 'failed'],
  failed: ['idle', 'loading', 'transcribing', 'failed'],
};

export interface SessionControllerOptions {
  adapter: ModelAdapter;
  logger: Logger;
  settings: TranscriptionSettings;
  outputDir: string;
  writer?: TranscriptWriter;
}

/**
 * Owns the single transcription session. GUI actions arrive as commands;
 * the model run happens in the background and reports back here, which is
 * the only place the session state changes.
 *
 * Emits `state` with a copy of the session after every change and
 * `progress` while the model runs.
 */
export class SessionController extends EventEmitter {
  private readonly adapter: ModelAdapter;
  private readonly logger: Logger;
  private readonly writer: TranscriptWriter;
  private settings: TranscriptionSettings;
  private state: SessionState;
  // Bumped on cancel so a late result from an abandoned run is ignored
  private generation = 0;
  private abortController: AbortController | null = null;
  private running: Promise<void> = Promise.resolve();

  constructor(options: SessionControllerOptions) {
    super();
    // One listener pair per open GUI page
    this.setMaxListeners(0);
    this.adapter = options.adapter;
    this.logger = options.logger;
    this.writer = options.writer ?? writeTranscript;
    this.settings = { ...options.settings };
    this.state = SessionController.initialState(options.outputDir);
  }

  private static initialState(outputDir: string): SessionState {
    return {
      id: null,
      status: 'idle',
      inputFile: null,
      outputDir,
      outputPath: null,
      progress: 0,
      label: 'Select an audio file',
      segmentCount: 0,
      error: null,
      startedAt: null,
      finishedAt: null,
    };
  }

  getState(): SessionState {
    return { ...this.state, error: this.state.error ? { ...this.state.error } : null };
  }

  getSettings(): TranscriptionSettings {
    return { ...this.settings };
  }

  isBusy(): boolean {
    return this.state.status === 'transcribing';
  }

  /** Resolves once every background run started so far, cancelled ones included, has finished. */
  whenSettled(): Promise<void> {
    return this.running;
  }

  async selectFile(filePath: string): Promise<CommandResult> {
    if (this.isBusy()) {
      return this.reject('A transcription is already running');
    }

    const inputFile = path.resolve(filePath);
    this.logger.debug(`Input file: ${inputFile}`);

    try {
      await assertReadableInput(inputFile);
    } catch (error) {
      if (!(error instanceof InputError)) throw error;
      // The session may have started while the file was being checked
      if (this.isBusy()) {
        return this.reject('A transcription is already running');
      }
      this.fail(error, { inputFile, outputPath: null, id: null, startedAt: null, segmentCount: 0 });
      return this.reject(error.message);
    }

    if (this.isBusy()) {
      return this.reject('A transcription is already running');
    }

    this.transition('loading', {
      id: null,
      inputFile,
      outputPath: null,
      progress: 0,
      label: `Selected ${path.basename(inputFile)}`,
      segmentCount: 0,
      error: null,
      startedAt: null,
      finishedAt: null,
    });
    this.logger.info(`Selected file: ${path.basename(inputFile)}`);
    return this.accept();
  }

  start(): CommandResult {
    if (this.isBusy()) {
      this.logger.warn('Start ignored: a transcription is already running');
      return this.reject('A transcription is already running');
    }

    const inputFile = this.state.inputFile;
    if (this.state.status === 'idle' || inputFile === null) {
      return this.reject('No input file selected');
    }

    const generation = ++this.generation;
    const abortController = new AbortController();
    this.abortController = abortController;

    const settings = { ...this.settings };
    const outputPath = transcriptPathFor(this.state.outputDir, inputFile);

    this.transition('transcribing', {
      id: `session_${Date.now()}_${Math.random().toString(36).substring(2, 15)}`,
      outputPath: null,
      progress: 0,
      label: 'Starting transcription...',
      segmentCount: 0,
      error: null,
      startedAt: new Date(),
      finishedAt: null,
    });
    this.logger.debug(`Settings: ${JSON.stringify(settings)}`);
    this.logger.debug(`Output folder: ${this.state.outputDir}`);

    const run = this.run(generation, inputFile, outputPath, settings, abortController.signal).catch(
      (error: unknown) => {
        this.logger.error(`Unexpected session failure: ${String(error)}`, error);
      }
    );
    this.running = Promise.all([this.running, run]).then(() => undefined);
    return this.accept();
  }

  /**
   * Stops waiting for the model. The library call itself keeps running to
   * completion; its result is thrown away.
   */
  cancel(): CommandResult {
    const { status } = this.state;
    if (status !== 'transcribing' && status !== 'loading') {
      return this.reject(`Nothing to cancel while ${status}`);
    }

    if (status === 'transcribing') {
      this.generation++;
      this.abortController?.abort();
      this.abortController = null;
      this.logger.warn('Transcription cancelled');
    }

    this.transition('idle', { ...SessionController.initialState(this.state.outputDir), label: 'Cancelled' });
    return this.accept();
  }

  dismiss(): CommandResult {
    const { status } = this.state;
    if (status !== 'done' && status !== 'failed') {
      return this.reject(`Nothing to dismiss while ${status}`);
    }
    this.transition('idle', SessionController.initialState(this.state.outputDir));
    return this.accept();
  }

  updateSettings(settings: TranscriptionSettings): CommandResult {
    if (this.isBusy()) {
      return this.reject('Settings cannot change while transcribing');
    }
    this.settings = { ...settings };
    this.logger.info(`Settings updated: ${JSON.stringify(this.settings)}`);
    return this.accept();
  }

  setOutputDir(outputDir: string): CommandResult {
    if (this.isBusy()) {
      return this.reject('Output folder cannot change while transcribing');
    }
    this.state = { ...this.state, outputDir: path.resolve(outputDir) };
    this.logger.info(`Output folder: ${this.state.outputDir}`);
    this.emit('state', this.getState());
    return this.accept();
  }

  private async run(
    generation: number,
    inputFile: string,
    outputPath: string,
    settings: TranscriptionSettings,
    signal: AbortSignal
  ): Promise<void> {
    const isCurrent = () => generation === this.generation;
    const segments: TranscriptSegment[] = [];

    const onProgress = (update: ProgressUpdate) => {
      if (!isCurrent()) return;
      this.state = { ...this.state, progress: update.progress, label: update.label };
      this.emit('progress', update);
      this.emit('state', this.getState());
    };

    try {
      for await (const segment of this.adapter.transcribe(inputFile, { settings, signal, onProgress })) {
        if (!isCurrent()) break;
        segments.push(segment);
        this.state = { ...this.state, segmentCount: segments.length };
      }

      if (!isCurrent()) {
        this.logger.debug(`Discarded result of cancelled run for ${path.basename(inputFile)}`);
        return;
      }

      // Only the current run moves its staging file to the output path
      const stagingPath = `${outputPath}.${generation}.pending`;
      this.logger.info(`Output file: ${outputPath}`);
      await this.writer(stagingPath, segments);

      if (!isCurrent()) {
        await fs.promises.rm(stagingPath, { force: true });
        this.logger.debug(`Discarded transcript of cancelled run: ${stagingPath}`);
        return;
      }

      try {
        await fs.promises.rename(stagingPath, outputPath);
      } catch (error) {
        await fs.promises.rm(stagingPath, { force: true });
        throw new OutputError(`Cannot write transcript to ${outputPath}: ${errorMessage(error)}`, { cause: error });
      }

      this.transition('done', {
        outputPath,
        progress: 1,
        label: 'Transcription complete',
        segmentCount: segments.length,
        finishedAt: new Date(),
      });
      this.logger.info('Transcription complete');
    } catch (error) {
      if (!isCurrent()) {
        this.logger.debug(`Ignored error from cancelled run: ${String(error)}`);
        return;
      }
      this.fail(toTranscriptionError(error), { segmentCount: segments.length });
    } finally {
      if (isCurrent()) {
        this.abortController = null;
      }
    }
  }

  private fail(error: TranscriptionError, patch: Partial<SessionState> = {}): void {
    this.logger.error(`Transcription error: ${error.message}`, error);
    this.transition('failed', {
      ...patch,
      outputPath: null,
      progress: 0,
      label: 'An error occurred',
      error: error.toSessionError(),
      finishedAt: new Date(),
    });
  }

  private transition(next: SessionStatus, patch: Partial<SessionState>): void {
    const current = this.state.status;
    if (!TRANSITIONS[current].includes(next)) {
      throw new Error(`Invalid session transition: ${current} -> ${next}`);
    }
    this.state = { ...this.state, ...patch, status: next };
    this.emit('state', this.getState());
  }

  private accept(): CommandResult {
    return { accepted: true, state: this.getState() };
  }

  private reject(reason: string): CommandResult {
    return { accepted: false, reason, state: this.getState() };
  }
}
