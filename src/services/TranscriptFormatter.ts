import fs from 'fs';
import path from 'path';
import { OutputError, errorMessage } from '../errors/index.js';
import { TranscriptDocument, TranscriptSegment } from '../types/index.js';

/**
 * `[0.00s -> 5.00s] Hello, world!` — times with two decimals, text verbatim.
 * Times are not validated; whatever the model emitted is formatted as given.
 */
export function formatSegment(segment: TranscriptSegment): string {
  return `[${segment.start.toFixed(2)}s -> ${segment.end.toFixed(2)}s] ${segment.text}`;
}

export function formatTranscript(document: TranscriptDocument): string[] {
  return document.map(formatSegment);
}

export function renderTranscript(document: TranscriptDocument): string {
  return formatTranscript(document)
    .map((line) => `${line}\n`)
    .join('');
}

export function transcriptPathFor(outputDir: string, inputFile: string): string {
  const stem = path.basename(inputFile, path.extname(inputFile));
  return path.join(outputDir, `${stem}_transcription.txt`);
}

export type TranscriptWriter = (outputPath: string, document: TranscriptDocument) => Promise<void>;

/**
 * Lines go to `<outputPath>.part` and the file is renamed into place once
 * complete. On failure the partial file is removed, so `outputPath` never
 * holds a truncated transcript.
 */
export const writeTranscript: TranscriptWriter = async (outputPath, document) => {
  const partialPath = `${outputPath}.part`;
  let created = false;

  try {
    await fs.promises.mkdir(path.dirname(outputPath), { recursive: true });

    const handle = await fs.promises.open(partialPath, 'w');
    created = true;
    try {
      for (const line of formatTranscript(document)) {
        await handle.write(`${line}\n`, null, 'utf8');
      }
    } finally {
      await handle.close();
    }

    await fs.promises.rename(partialPath, outputPath);
  } catch (error) {
    if (created) {
      await fs.promises.rm(partialPath, { force: true });
    }
    throw new OutputError(`Cannot write transcript to ${outputPath}: ${errorMessage(error)}`, { cause: error });
  }
};
