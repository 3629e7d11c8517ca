import fs from 'fs';
import os from 'os';
import path from 'path';
import { ModelError, OutputError } from '../../errors/index.js';
import { SessionStatus, TranscriptSegment, TranscriptionSettings } from '../../types/index.js';
import { Logger } from '../../utils/logger.js';
import { SessionController } from '../SessionController.js';
import { TranscriptWriter, writeTranscript } from '../TranscriptFormatter.js';
import { ModelAdapter, TranscribeOptions } from '../WhisperService.js';

const settings: TranscriptionSettings = {
  model: 'onnx-community/whisper-base',
  computeType: 'int8',
  device: 'cpu',
  language: 'auto',
};

const example: TranscriptSegment[] = [
  { start: 0.0, end: 5.0, text: 'Hello, world!' },
  { start: 5.0, end: 10.0, text: 'This is a test.' },
];

/** Holds the fake model until the test lets it finish. */
class Gate {
  readonly opened: Promise<void>;
  private release: () => void = () => undefined;

  constructor() {
    this.opened = new Promise((resolve) => {
      this.release = resolve;
    });
  }

  open(): void {
    this.release();
  }
}

class FakeAdapter implements ModelAdapter {
  readonly calls: Array<{ audioPath: string; options: TranscribeOptions }> = [];

  constructor(
    private readonly segments: TranscriptSegment[],
    private readonly gate?: Gate,
    private readonly failure?: Error
  ) {}

  async *transcribe(audioPath: string, options: TranscribeOptions): AsyncGenerator<TranscriptSegment> {
    this.calls.push({ audioPath, options });
    options.onProgress?.({ progress: 0.5, label: 'Transcribing...' });
    if (this.gate) await this.gate.opened;
    if (this.failure) throw this.failure;
    yield* this.segments;
  }
}

describe('SessionController', () => {
  let dir: string;
  let outputDir: string;
  let inputFile: string;
  let transcriptPath: string;

  const createController = (adapter: ModelAdapter, writer?: TranscriptWriter) =>
    new SessionController({
      adapter,
      writer,
      settings,
      outputDir,
      logger: new Logger('Test', 'ERROR'),
    });

  beforeEach(async () => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'session-'));
    outputDir = path.join(dir, 'out');
    inputFile = path.join(dir, 'talk.wav');
    transcriptPath = path.join(outputDir, 'talk_transcription.txt');
    await fs.promises.writeFile(inputFile, '');
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await fs.promises.rm(dir, { recursive: true, force: true });
  });

  test('starts idle', () => {
    const state = createController(new FakeAdapter([])).getState();

    expect(state.status).toBe('idle');
    expect(state.inputFile).toBeNull();
    expect(state.outputDir).toBe(outputDir);
  });

  test('runs a session through to a written transcript', async () => {
    const adapter = new FakeAdapter(example);
    const controller = createController(adapter);
    const statuses: SessionStatus[] = [];
    controller.on('state', (state: { status: SessionStatus }) => {
      if (statuses[statuses.length - 1] !== state.status) statuses.push(state.status);
    });

    const selected = await controller.selectFile(inputFile);
    expect(selected.accepted).toBe(true);
    expect(selected.state.status).toBe('loading');
    expect(selected.state.inputFile).toBe(inputFile);

    const started = controller.start();
    expect(started.accepted).toBe(true);
    expect(started.state.status).toBe('transcribing');

    await controller.whenSettled();

    const state = controller.getState();
    expect(state.status).toBe('done');
    expect(state.outputPath).toBe(transcriptPath);
    expect(state.segmentCount).toBe(2);
    expect(state.progress).toBe(1);
    expect(statuses).toEqual(['loading', 'transcribing', 'done']);
    expect(await fs.promises.readFile(transcriptPath, 'utf8')).toBe(
      '[0.00s -> 5.00s] Hello, world!\n[5.00s -> 10.00s] This is a test.\n'
    );
    expect(adapter.calls).toHaveLength(1);
    expect(adapter.calls[0].audioPath).toBe(inputFile);
  });

  test('reports progress from the model', async () => {
    const controller = createController(new FakeAdapter(example));
    const progress: number[] = [];
    controller.on('progress', (update: { progress: number }) => progress.push(update.progress));

    await controller.selectFile(inputFile);
    controller.start();
    await controller.whenSettled();

    expect(progress).toEqual([0.5]);
  });

  test('rejects start while transcribing without invoking the model again', async () => {
    const gate = new Gate();
    const adapter = new FakeAdapter(example, gate);
    const controller = createController(adapter);

    await controller.selectFile(inputFile);
    controller.start();
    const second = controller.start();

    expect(second).toMatchObject({ accepted: false, reason: 'A transcription is already running' });
    expect(controller.getState().status).toBe('transcribing');

    gate.open();
    await controller.whenSettled();

    expect(adapter.calls).toHaveLength(1);
    expect(controller.getState().status).toBe('done');
  });

  test('rejects start when no file is selected', () => {
    const adapter = new FakeAdapter(example);
    const result = createController(adapter).start();

    expect(result).toMatchObject({ accepted: false, reason: 'No input file selected' });
    expect(adapter.calls).toHaveLength(0);
  });

  test('fails on a model error without leaving a transcript', async () => {
    const controller = createController(new FakeAdapter(example, undefined, new ModelError('out of memory')));

    await controller.selectFile(inputFile);
    controller.start();
    await controller.whenSettled();

    const state = controller.getState();
    expect(state.status).toBe('failed');
    expect(state.outputPath).toBeNull();
    expect(state.error).toEqual({ kind: 'model', message: 'Transcription failed: out of memory' });
    expect(fs.existsSync(transcriptPath)).toBe(false);
  });

  test('treats unclassified adapter failures as model errors', async () => {
    const controller = createController(new FakeAdapter([], undefined, new Error('backend unavailable')));

    await controller.selectFile(inputFile);
    controller.start();
    await controller.whenSettled();

    expect(controller.getState().error).toEqual({
      kind: 'model',
      message: 'Transcription failed: backend unavailable',
    });
  });

  test('fails when the transcript cannot be written', async () => {
    const writer: TranscriptWriter = async () => {
      throw new OutputError('disk full');
    };
    const controller = createController(new FakeAdapter(example), writer);

    await controller.selectFile(inputFile);
    controller.start();
    await controller.whenSettled();

    const state = controller.getState();
    expect(state.status).toBe('failed');
    expect(state.error).toEqual({ kind: 'output', message: 'disk full' });
    expect(state.segmentCount).toBe(2);
  });

  test('writes an empty transcript for an empty segment sequence', async () => {
    const controller = createController(new FakeAdapter([]));

    await controller.selectFile(inputFile);
    controller.start();
    await controller.whenSettled();

    expect(controller.getState().status).toBe('done');
    expect((await fs.promises.stat(transcriptPath)).size).toBe(0);
  });

  test('fails on a missing input file', async () => {
    const missing = path.join(dir, 'missing.wav');
    const controller = createController(new FakeAdapter(example));

    const result = await controller.selectFile(missing);

    expect(result).toMatchObject({ accepted: false, reason: `Audio file not found: ${missing}` });
    expect(controller.getState()).toMatchObject({
      status: 'failed',
      inputFile: missing,
      error: { kind: 'input', message: `Audio file not found: ${missing}` },
    });
  });

  test('fails on an unsupported file type', async () => {
    const notes = path.join(dir, 'notes.txt');
    await fs.promises.writeFile(notes, 'not audio');
    const controller = createController(new FakeAdapter(example));

    await controller.selectFile(notes);

    expect(controller.getState().error).toEqual({ kind: 'input', message: 'Unsupported file format: .txt' });
  });

  test('discards the result of a cancelled run', async () => {
    const gate = new Gate();
    const adapter = new FakeAdapter(example, gate);
    const controller = createController(adapter);

    await controller.selectFile(inputFile);
    controller.start();
    const cancelled = controller.cancel();

    expect(cancelled.accepted).toBe(true);
    expect(cancelled.state).toMatchObject({ status: 'idle', inputFile: null, label: 'Cancelled' });

    gate.open();
    await controller.whenSettled();

    expect(adapter.calls[0].options.signal?.aborted).toBe(true);
    expect(controller.getState().status).toBe('idle');
    expect(fs.existsSync(transcriptPath)).toBe(false);
  });

  test('keeps the transcript of a new run when a cancelled run finishes writing later', async () => {
    const writing = new Gate();
    const finishWrite = new Gate();
    let writes = 0;
    const writer: TranscriptWriter = async (outputPath, document) => {
      writes++;
      if (writes === 1) {
        writing.open();
        await finishWrite.opened;
      }
      await writeTranscript(outputPath, document);
    };
    const controller = createController(new FakeAdapter(example), writer);
    const secondDone = new Promise<void>((resolve) => {
      controller.on('state', (state: { status: SessionStatus }) => {
        if (state.status === 'done') resolve();
      });
    });

    await controller.selectFile(inputFile);
    controller.start();
    await writing.opened;
    controller.cancel();
    await controller.selectFile(inputFile);
    controller.start();
    await secondDone;

    finishWrite.open();
    await controller.whenSettled();

    expect(writes).toBe(2);
    expect(controller.getState()).toMatchObject({ status: 'done', outputPath: transcriptPath });
    expect(await fs.promises.readdir(outputDir)).toEqual(['talk_transcription.txt']);
    expect(await fs.promises.readFile(transcriptPath, 'utf8')).toBe(
      '[0.00s -> 5.00s] Hello, world!\n[5.00s -> 10.00s] This is a test.\n'
    );
  });

  test('settles only after a cancelled run and its replacement have both finished', async () => {
    const firstGate = new Gate();
    const secondGate = new Gate();
    let calls = 0;
    const adapter: ModelAdapter = {
      async *transcribe() {
        calls++;
        await (calls === 1 ? firstGate : secondGate).opened;
        yield* example;
      },
    };
    const controller = createController(adapter);
    let settled = false;
    const secondDone = new Promise<void>((resolve) => {
      controller.on('state', (state: { status: SessionStatus }) => {
        if (state.status === 'done') resolve();
      });
    });

    await controller.selectFile(inputFile);
    controller.start();
    controller.cancel();
    await controller.selectFile(inputFile);
    controller.start();
    const settling = controller.whenSettled().then(() => {
      settled = true;
    });

    secondGate.open();
    await secondDone;
    expect(settled).toBe(false);

    firstGate.open();
    await settling;
    expect(settled).toBe(true);
  });

  test('accepts any number of state listeners', () => {
    const controller = createController(new FakeAdapter(example));

    expect(controller.getMaxListeners()).toBe(0);
  });

  test('ignores a failure from a cancelled run', async () => {
    const gate = new Gate();
    const controller = createController(new FakeAdapter(example, gate, new ModelError('late failure')));

    await controller.selectFile(inputFile);
    controller.start();
    controller.cancel();
    gate.open();
    await controller.whenSettled();

    expect(controller.getState()).toMatchObject({ status: 'idle', error: null });
  });

  test('only cancels a loading or transcribing session', async () => {
    const controller = createController(new FakeAdapter(example));

    expect(controller.cancel()).toMatchObject({ accepted: false, reason: 'Nothing to cancel while idle' });

    await controller.selectFile(inputFile);
    expect(controller.cancel().state.status).toBe('idle');
  });

  test('dismisses a finished session back to idle', async () => {
    const controller = createController(new FakeAdapter(example));

    expect(controller.dismiss()).toMatchObject({ accepted: false, reason: 'Nothing to dismiss while idle' });

    await controller.selectFile(inputFile);
    controller.start();
    await controller.whenSettled();
    const result = controller.dismiss();

    expect(result.accepted).toBe(true);
    expect(result.state).toMatchObject({ status: 'idle', inputFile: null, outputPath: null, error: null });
  });

  test('re-runs the last file when started again after it finished', async () => {
    const adapter = new FakeAdapter(example);
    const controller = createController(adapter);

    await controller.selectFile(inputFile);
    controller.start();
    await controller.whenSettled();
    const firstId = controller.getState().id;

    expect(controller.start().accepted).toBe(true);
    await controller.whenSettled();

    expect(adapter.calls).toHaveLength(2);
    expect(controller.getState().status).toBe('done');
    expect(controller.getState().id).not.toBe(firstId);
  });

  test('starts a new session by selecting a file after a failure', async () => {
    const controller = createController(new FakeAdapter(example));

    await controller.selectFile(path.join(dir, 'missing.wav'));
    const result = await controller.selectFile(inputFile);

    expect(result.accepted).toBe(true);
    expect(result.state).toMatchObject({ status: 'loading', error: null, inputFile });
  });

  test('refuses new files, settings and folders while transcribing', async () => {
    const gate = new Gate();
    const controller = createController(new FakeAdapter(example, gate));

    await controller.selectFile(inputFile);
    controller.start();

    expect((await controller.selectFile(inputFile)).accepted).toBe(false);
    expect(controller.updateSettings({ ...settings, language: 'ja' }).accepted).toBe(false);
    expect(controller.setOutputDir(dir).accepted).toBe(false);

    gate.open();
    await controller.whenSettled();
  });

  test('hands a snapshot of the settings to the model', async () => {
    const adapter = new FakeAdapter(example);
    const controller = createController(adapter);

    controller.updateSettings({ ...settings, language: 'ja', computeType: 'float32' });
    await controller.selectFile(inputFile);
    controller.start();
    await controller.whenSettled();

    expect(adapter.calls[0].options.settings).toEqual({ ...settings, language: 'ja', computeType: 'float32' });
  });

  test('writes into a newly chosen output folder', async () => {
    const controller = createController(new FakeAdapter(example));
    const elsewhere = path.join(dir, 'elsewhere');

    expect(controller.setOutputDir(elsewhere).state.outputDir).toBe(elsewhere);
    await controller.selectFile(inputFile);
    controller.start();
    await controller.whenSettled();

    expect(controller.getState().outputPath).toBe(path.join(elsewhere, 'talk_transcription.txt'));
  });
});
