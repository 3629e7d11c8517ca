#!/usr/bin/env node

import path from 'path';
import { startServer, createController } from './api/server.js';
import { AppConfig, loadConfig } from './config/index.js';
import { errorMessage } from './errors/index.js';
import { Logger } from './utils/logger.js';

function printUsage() {
  console.log('Usage:');
  console.log('  transcript-desk                                   - Start the GUI server');
  console.log('  transcript-desk --transcribe <file> [--output <dir>] - Transcribe a file and exit');
  console.log('  transcript-desk --help                            - Show this help');
  console.log('');
  console.log('Environment: PORT, HOST, TRANSCRIPT_OUTPUT_DIR, TRANSCRIPT_UPLOAD_DIR, TRANSCRIPT_MODEL_CACHE,');
  console.log('             WHISPER_MODEL, WHISPER_COMPUTE_TYPE, WHISPER_DEVICE, WHISPER_LANGUAGE, LOG_LEVEL');
}

async function main() {
  const args = process.argv.slice(2);

  if (args[0] === '--help') {
    printUsage();
    return;
  }

  const config = loadConfig();
  const logger = new Logger('App', config.logLevel);

  if (args[0] === '--transcribe') {
    if (!args[1]) {
      printUsage();
      process.exitCode = 1;
      return;
    }
    const outputIndex = args.indexOf('--output');
    const outputDir = outputIndex !== -1 ? args[outputIndex + 1] : undefined;
    await transcribeFile(config, logger, args[1], outputDir);
  } else {
    // Default: start the GUI server
    await startServer(config, logger);
  }
}

/**
 * Run a single session without the GUI
 */
async function transcribeFile(config: AppConfig, logger: Logger, filePath: string, outputDir?: string) {
  const controller = createController(
    outputDir ? { ...config, outputDir: path.resolve(outputDir) } : config,
    logger
  );

  const selected = await controller.selectFile(filePath);
  if (!selected.accepted) {
    console.error(`Cannot transcribe: ${selected.reason}`);
    process.exitCode = 1;
    return;
  }

  controller.start();
  await controller.whenSettled();

  const state = controller.getState();
  if (state.status === 'done' && state.outputPath) {
    console.log(`Transcript saved to: ${state.outputPath} (${state.segmentCount} segments)`);
  } else {
    console.error(`Transcription failed: ${state.error?.message ?? state.status}`);
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  console.error('Error:', errorMessage(error));
  process.exitCode = 1;
});
