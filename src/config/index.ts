import path from 'path';
import { ConfigError } from '../errors/index.js';
import { ComputeDevice, ComputeType, LogLevel, TranscriptionSettings } from '../types/index.js';
import { isLogLevel } from '../utils/logger.js';
import languages from './languages.json';

export const AVAILABLE_MODELS = [
  'onnx-community/whisper-tiny',
  'onnx-community/whisper-base',
  'onnx-community/whisper-small',
  'Xenova/whisper-medium',
  'onnx-community/whisper-large-v3-turbo',
] as const;

export const AVAILABLE_COMPUTE_TYPES: readonly ComputeType[] = ['int8', 'float32'];
export const AVAILABLE_DEVICES: readonly ComputeDevice[] = ['cpu', 'gpu-if-available'];

/** Whisper language codes mapped to their English names. */
export const LANGUAGE_NAMES: Readonly<Record<string, string>> = languages;

export const DEFAULT_SETTINGS: Readonly<TranscriptionSettings> = {
  model: 'onnx-community/whisper-small',
  computeType: 'int8',
  device: 'cpu',
  language: 'auto',
};

export interface AppConfig {
  port: number;
  host: string;
  outputDir: string;
  uploadDir: string;
  modelCacheDir?: string;
  logLevel: LogLevel;
  transcription: TranscriptionSettings;
}

export function isValidLanguage(language: string): boolean {
  return language === 'auto' || Object.prototype.hasOwnProperty.call(LANGUAGE_NAMES, language);
}

function isComputeType(value: string): value is ComputeType {
  return AVAILABLE_COMPUTE_TYPES.some((type) => type === value);
}

function isComputeDevice(value: string): value is ComputeDevice {
  return AVAILABLE_DEVICES.some((device) => device === value);
}

function readString(source: Record<string, unknown>, key: string): string | undefined {
  const value = source[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw new ConfigError(`Setting "${key}" must be a string`);
  }
  return value.trim();
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Merge a partial settings object (from the GUI or the environment) over
 * `base`, rejecting unknown models, compute types, devices and languages.
 */
export function validateSettings(
  input: unknown,
  base: TranscriptionSettings = DEFAULT_SETTINGS
): TranscriptionSettings {
  if (!isRecord(input)) {
    throw new ConfigError('Settings must be an object');
  }

  const settings: TranscriptionSettings = { ...base };

  const model = readString(input, 'model');
  if (model !== undefined) {
    if (!AVAILABLE_MODELS.some((available) => available === model)) {
      throw new ConfigError(`Unknown model: ${model}`);
    }
    settings.model = model;
  }

  const computeType = readString(input, 'computeType');
  if (computeType !== undefined) {
    if (!isComputeType(computeType)) {
      throw new ConfigError(`Unknown compute type: ${computeType}`);
    }
    settings.computeType = computeType;
  }

  const device = readString(input, 'device');
  if (device !== undefined) {
    if (!isComputeDevice(device)) {
      throw new ConfigError(`Unknown device: ${device}`);
    }
    settings.device = device;
  }

  const language = readString(input, 'language');
  if (language !== undefined) {
    const code = language.toLowerCase();
    if (!isValidLanguage(code)) {
      throw new ConfigError(`Invalid language code: ${language}`);
    }
    settings.language = code;
  }

  return settings;
}

function parsePort(raw: string | undefined): number {
  if (raw === undefined || raw === '') return 3001;
  const port = Number(raw);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigError(`Invalid PORT: ${raw}`);
  }
  return port;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const logLevel = (env.LOG_LEVEL ?? 'INFO').toUpperCase();
  if (!isLogLevel(logLevel)) {
    throw new ConfigError(`Invalid LOG_LEVEL: ${env.LOG_LEVEL}`);
  }

  // Empty variables fall back to the defaults.
  const overrides: Record<string, string> = {};
  const settingVariables: Array<[string, string | undefined]> = [
    ['model', env.WHISPER_MODEL],
    ['computeType', env.WHISPER_COMPUTE_TYPE],
    ['device', env.WHISPER_DEVICE],
    ['language', env.WHISPER_LANGUAGE],
  ];
  for (const [key, value] of settingVariables) {
    if (value) overrides[key] = value;
  }

  return {
    port: parsePort(env.PORT),
    host: env.HOST || '127.0.0.1',
    outputDir: path.resolve(env.TRANSCRIPT_OUTPUT_DIR || './data/transcriptions'),
    uploadDir: path.resolve(env.TRANSCRIPT_UPLOAD_DIR || './data/uploads'),
    modelCacheDir: env.TRANSCRIPT_MODEL_CACHE ? path.resolve(env.TRANSCRIPT_MODEL_CACHE) : undefined,
    logLevel,
    transcription: validateSettings(overrides),
  };
}
