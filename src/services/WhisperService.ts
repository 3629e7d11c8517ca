import path from 'path';
import { ModelError, TranscriptionError, errorMessage } from '../errors/index.js';
import { ComputeType, ProgressUpdate, TranscriptSegment, TranscriptionSettings } from '../types/index.js';
import { Logger } from '../utils/logger.js';
import { AudioLoader, MODEL_SAMPLE_RATE, loadAudio } from './AudioLoader.js';

export interface TranscribeOptions {
  settings: TranscriptionSettings;
  signal?: AbortSignal;
  onProgress?: (update: ProgressUpdate) => void;
}

/**
 * Boundary around the speech-to-text library. Iterating the returned
 * sequence runs the model; it can be consumed once.
 */
export interface ModelAdapter {
  transcribe(audioPath: string, options: TranscribeOptions): AsyncIterable<TranscriptSegment>;
}

export type SpeechRecognizer = (audio: Float32Array, options: Record<string, unknown>) => Promise<unknown>;

export type PipelineDtype = 'q8' | 'fp32';

export interface PipelineOptions {
  dtype: PipelineDtype;
  cacheDir?: string;
}

export type PipelineLoader = (model: string, options: PipelineOptions) => Promise<SpeechRecognizer>;

const PIPELINE_DTYPES: Record<ComputeType, PipelineDtype> = {
  int8: 'q8',
  float32: 'fp32',
};

/**
 * Load an automatic-speech-recognition pipeline from Transformers.js. The
 * package is ESM-only, hence the dynamic import.
 */
export const loadTransformersPipeline: PipelineLoader = async (model, { dtype, cacheDir }) => {
  const transformers = await import('@huggingface/transformers');
  if (cacheDir) {
    transformers.env.cacheDir = cacheDir;
  }

  const recognizer: unknown = await transformers.pipeline('automatic-speech-recognition', model, {
    dtype,
    device: 'cpu',
  });

  if (typeof recognizer !== 'function') {
    throw new Error(`Pipeline for ${model} is not callable`);
  }

  return async (audio, options) => {
    const output: unknown = await recognizer(audio, options);
    return output;
  };
};

interface RecognizedChunk {
  timestamp: [number, number | null];
  text: string;
}

function isRecognizedChunk(value: unknown): value is RecognizedChunk {
  if (typeof value !== 'object' || value === null) return false;
  if (!('text' in value) || typeof value.text !== 'string') return false;
  if (!('timestamp' in value) || !Array.isArray(value.timestamp)) return false;
  const [start, end] = value.timestamp;
  return typeof start === 'number' && (typeof end === 'number' || end === null);
}

/**
 * Turn the pipeline output into segments. The final chunk's end timestamp
 * is left open by the library when the audio ends mid-chunk; it is closed
 * at the audio duration.
 */
export function toSegments(output: unknown, duration: number): TranscriptSegment[] {
  const result: unknown = Array.isArray(output) ? output[0] : output;
  if (typeof result !== 'object' || result === null) {
    throw new ModelError('model returned no result');
  }

  if (!('chunks' in result) || result.chunks === undefined) {
    // Without timestamps the whole text becomes one segment
    const text = 'text' in result && typeof result.text === 'string' ? result.text : '';
    return text.trim() === '' ? [] : [{ start: 0, end: duration, text }];
  }

  if (!Array.isArray(result.chunks)) {
    throw new ModelError('model returned malformed chunks');
  }

  return result.chunks.map((chunk: unknown): TranscriptSegment => {
    if (!isRecognizedChunk(chunk)) {
      throw new ModelError('model returned a malformed chunk');
    }
    const [start, end] = chunk.timestamp;
    return { start, end: end ?? Math.max(start, duration), text: chunk.text };
  });
}

export interface WhisperServiceOptions {
  logger: Logger;
  loadPipeline?: PipelineLoader;
  loadAudio?: AudioLoader;
  cacheDir?: string;
  /** Length of the audio windows handed to the pipeline one at a time. */
  windowSeconds?: number;
}

const DEFAULT_WINDOW_SECONDS = 120;

export class WhisperService implements ModelAdapter {
  private readonly logger: Logger;
  private readonly loadPipeline: PipelineLoader;
  private readonly loadAudio: AudioLoader;
  private readonly cacheDir?: string;
  private readonly windowSeconds: number;
  private recognizers: Map<string, Promise<SpeechRecognizer>> = new Map();

  constructor(options: WhisperServiceOptions) {
    this.logger = options.logger;
    this.loadPipeline = options.loadPipeline ?? loadTransformersPipeline;
    this.loadAudio = options.loadAudio ?? loadAudio;
    this.cacheDir = options.cacheDir;
    this.windowSeconds = options.windowSeconds ?? DEFAULT_WINDOW_SECONDS;
  }

  async *transcribe(audioPath: string, options: TranscribeOptions): AsyncGenerator<TranscriptSegment> {
    const { settings, signal } = options;
    const report = (progress: number, label: string) => options.onProgress?.({ progress, label });

    this.logger.info('Starting transcription');
    this.logger.debug(
      `Model: ${settings.model}, compute type: ${settings.computeType}, device: ${settings.device}`
    );
    if (settings.device === 'gpu-if-available') {
      this.logger.warn('No GPU backend is available to the ONNX runtime, running on CPU');
    }
    report(0, 'Loading model...');

    const recognizer = await this.getRecognizer(settings.model, settings.computeType);
    if (signal?.aborted) return;

    report(0, 'Reading audio...');
    const audio = await this.loadAudio(audioPath, MODEL_SAMPLE_RATE);
    const duration = audio.length / MODEL_SAMPLE_RATE;
    this.logger.debug(`Audio length: ${duration.toFixed(2)}s`);
    if (signal?.aborted) return;

    // Long recordings are recognized a window at a time so segments and
    // progress arrive while the rest of the file is still being processed
    const windowSize = Math.max(1, Math.round(this.windowSeconds * MODEL_SAMPLE_RATE));
    const windowCount = Math.max(1, Math.ceil(audio.length / windowSize));
    let segmentCount = 0;

    report(0, 'Transcribing...');
    for (let index = 0; index < windowCount; index++) {
      const window = audio.subarray(index * windowSize, (index + 1) * windowSize);
      const offset = (index * windowSize) / MODEL_SAMPLE_RATE;
      const windowEnd = offset + window.length / MODEL_SAMPLE_RATE;
      if (signal?.aborted) return;
      if (windowCount > 1) {
        this.logger.debug(
          `Processing window ${index + 1}/${windowCount} (${offset.toFixed(0)}s - ${windowEnd.toFixed(0)}s)`
        );
      }

      const segments = await this.recognize(recognizer, window, settings, window.length / MODEL_SAMPLE_RATE);
      if (signal?.aborted) return;

      for (const recognized of segments) {
        if (signal?.aborted) return;
        const segment: TranscriptSegment = {
          start: recognized.start + offset,
          end: recognized.end + offset,
          text: recognized.text,
        };
        this.logger.debug(`[${segment.start.toFixed(2)} -> ${segment.end.toFixed(2)}] ${segment.text.trim()}`);
        report(duration > 0 ? Math.min(segment.start / duration, 1) : 1, 'Transcribing...');
        segmentCount++;
        yield segment;
      }

      report(duration > 0 ? Math.min(windowEnd / duration, 1) : 1, 'Transcribing...');
    }

    this.logger.info(`Recognized ${segmentCount} segments from ${path.basename(audioPath)}`);
    report(1, 'Transcription finished');
  }

  /**
   * Pipelines are cached per model and precision for the life of the
   * process. A failed load is evicted so the next session retries it.
   */
  private getRecognizer(model: string, computeType: ComputeType): Promise<SpeechRecognizer> {
    const key = `${model}:${computeType}`;
    const cached = this.recognizers.get(key);
    if (cached) return cached;

    this.logger.info('Loading model (the first run downloads the weights and may take a while)...');
    const loading = this.loadPipeline(model, {
      dtype: PIPELINE_DTYPES[computeType],
      cacheDir: this.cacheDir,
    }).then(
      (recognizer) => {
        this.logger.info('Model loaded');
        return recognizer;
      },
      (error: unknown) => {
        this.recognizers.delete(key);
        throw new ModelError(`could not load ${model}: ${errorMessage(error)}`, { cause: error });
      }
    );

    this.recognizers.set(key, loading);
    return loading;
  }

  private async recognize(
    recognizer: SpeechRecognizer,
    audio: Float32Array,
    settings: TranscriptionSettings,
    duration: number
  ): Promise<TranscriptSegment[]> {
    const options: Record<string, unknown> = {
      return_timestamps: true,
      chunk_length_s: 30,
      stride_length_s: 5,
      task: 'transcribe',
    };
    if (settings.language !== 'auto') {
      options.language = settings.language;
    }

    try {
      const output = await recognizer(audio, options);
      return toSegments(output, duration);
    } catch (error) {
      if (error instanceof TranscriptionError) throw error;
      throw new ModelError(errorMessage(error), { cause: error });
    }
  }
}
