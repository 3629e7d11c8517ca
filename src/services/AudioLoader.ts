import { execFile } from 'child_process';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { promisify } from 'util';
import { WaveFile } from 'wavefile';
import { InputError, errorMessage } from '../errors/index.js';

const execFileAsync = promisify(execFile);

export const SUPPORTED_AUDIO_EXTENSIONS = ['mp3', 'wav', 'm4a', 'flac', 'aac', 'ogg', 'wma'];
export const SUPPORTED_VIDEO_EXTENSIONS = ['mp4', 'mov', 'avi', 'mkv', 'wmv', 'flv', 'webm'];
export const SUPPORTED_EXTENSIONS = [...SUPPORTED_AUDIO_EXTENSIONS, ...SUPPORTED_VIDEO_EXTENSIONS];

/** Whisper models expect 16kHz mono input. */
export const MODEL_SAMPLE_RATE = 16000;

export type AudioLoader = (filePath: string, sampleRate?: number) => Promise<Float32Array>;

export function extensionOf(filePath: string): string {
  return path.extname(filePath).toLowerCase().replace(/^\./, '');
}

export function isSupportedFile(filePath: string): boolean {
  return SUPPORTED_EXTENSIONS.includes(extensionOf(filePath));
}

/**
 * Throws an InputError unless `filePath` names an existing regular file with
 * one of the supported audio or video extensions.
 */
export async function assertReadableInput(filePath: string): Promise<void> {
  let stats: fs.Stats;
  try {
    stats = await fs.promises.stat(filePath);
  } catch (error) {
    throw new InputError(`Audio file not found: ${filePath}`, { cause: error });
  }

  if (!stats.isFile()) {
    throw new InputError(`Not a file: ${filePath}`);
  }

  if (!isSupportedFile(filePath)) {
    throw new InputError(`Unsupported file format: ${path.extname(filePath) || filePath}`);
  }
}

export function decodeWav(buffer: Uint8Array, sampleRate: number = MODEL_SAMPLE_RATE): Float32Array {
  const wav = new WaveFile(buffer);
  wav.toBitDepth('32f');

  const fmt: object = wav.fmt;
  const currentRate = 'sampleRate' in fmt && typeof fmt.sampleRate === 'number' ? fmt.sampleRate : undefined;
  if (currentRate !== sampleRate) {
    wav.toSampleRate(sampleRate);
  }

  const samples: unknown = wav.getSamples(false, Float32Array);
  if (samples instanceof Float32Array) {
    return samples;
  }

  const channels = Array.isArray(samples)
    ? samples.filter((channel): channel is Float32Array => channel instanceof Float32Array)
    : [];
  if (channels.length === 0) {
    throw new Error('WAV file has no audio channels');
  }

  // Average the channels down to mono
  const mono = new Float32Array(channels[0].length);
  for (const channel of channels) {
    for (let i = 0; i < mono.length; i++) {
      mono[i] += channel[i] / channels.length;
    }
  }
  return mono;
}

/**
 * Convert any ffmpeg-readable audio or video file to 16-bit PCM WAV at the
 * model sample rate.
 */
async function convertToWav(filePath: string, sampleRate: number): Promise<string> {
  const wavPath = path.join(
    os.tmpdir(),
    `transcript-desk-${Date.now()}-${Math.round(Math.random() * 1e9)}.wav`
  );

  try {
    await execFileAsync('ffmpeg', [
      '-y',
      '-i', filePath,
      '-vn',
      '-ar', sampleRate.toString(),
      '-ac', '1',
      '-acodec', 'pcm_s16le',
      '-f', 'wav',
      wavPath,
    ]);
  } catch (error) {
    await fs.promises.rm(wavPath, { force: true });
    throw new InputError(`Failed to convert ${path.basename(filePath)} to WAV: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  return wavPath;
}

export const loadAudio: AudioLoader = async (filePath, sampleRate = MODEL_SAMPLE_RATE) => {
  await assertReadableInput(filePath);

  const isWav = extensionOf(filePath) === 'wav';
  const wavPath = isWav ? filePath : await convertToWav(filePath, sampleRate);

  try {
    const buffer = await fs.promises.readFile(wavPath);
    return decodeWav(buffer, sampleRate);
  } catch (error) {
    throw new InputError(`Cannot decode audio from ${path.basename(filePath)}: ${errorMessage(error)}`, {
      cause: error,
    });
  } finally {
    if (!isWav) {
      await fs.promises.rm(wavPath, { force: true });
    }
  }
};
