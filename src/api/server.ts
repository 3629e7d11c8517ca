import express, { NextFunction, Request, Response } from 'express';
import cors from 'cors';
import multer from 'multer';
import fs from 'fs';
import path from 'path';
import { AppConfig, AVAILABLE_COMPUTE_TYPES, AVAILABLE_DEVICES, AVAILABLE_MODELS, LANGUAGE_NAMES, validateSettings } from '../config/index.js';
import { ConfigError, errorMessage } from '../errors/index.js';
import { SessionController } from '../services/SessionController.js';
import { WhisperService } from '../services/WhisperService.js';
import { SUPPORTED_EXTENSIONS, isSupportedFile } from '../services/AudioLoader.js';
import { CommandResult, LogEntry, ProgressUpdate, SessionState } from '../types/index.js';
import { Logger } from '../utils/logger.js';
import { UploadStore } from './uploads.js';

const publicPath = path.resolve(__dirname, '../../public');

function sendCommandResult(res: Response, result: CommandResult) {
  if (result.accepted) {
    res.json(result.state);
  } else {
    res.status(400).json({ error: result.reason, state: result.state });
  }
}

function readBodyString(req: Request, key: string): string | undefined {
  const body: unknown = req.body;
  if (typeof body !== 'object' || body === null || !(key in body)) return undefined;
  const value: unknown = Reflect.get(body, key);
  return typeof value === 'string' && value.trim() !== '' ? value.trim() : undefined;
}

function isSameHost(origin: string, host: string | undefined): boolean {
  try {
    return host !== undefined && new URL(origin).host === host;
  } catch {
    return false;
  }
}

export function createApp(controller: SessionController, config: AppConfig, logger: Logger) {
  const app = express();
  const log = logger.child('Server');
  const uploads = new UploadStore(log);

  // Only the page this server hands out may drive the session
  const allowedOrigins = [
    ...new Set([
      `http://${config.host}:${config.port}`,
      `http://localhost:${config.port}`,
      `http://127.0.0.1:${config.port}`,
    ]),
  ];

  app.use((req: Request, res: Response, next: NextFunction) => {
    const origin = req.get('origin');
    if (origin !== undefined && !allowedOrigins.includes(origin) && !isSameHost(origin, req.get('host'))) {
      log.warn(`Rejected ${req.method} ${req.path} from ${origin}`);
      return res.status(403).json({ error: 'Origin not allowed' });
    }
    next();
  });
  app.use(cors({ origin: allowedOrigins }));
  app.use(express.json());
  app.use(express.static(publicPath, { etag: true, lastModified: true }));

  fs.mkdirSync(config.uploadDir, { recursive: true });

  // Uploaded files and in-browser recordings keep their original extension
  const storage = multer.diskStorage({
    destination: config.uploadDir,
    filename: (req, file, cb) => {
      const uniqueSuffix = Date.now() + '-' + Math.round(Math.random() * 1e9);
      const ext = path.extname(file.originalname).toLowerCase() || '.webm';
      const stem = path.basename(file.originalname, path.extname(file.originalname)) || file.fieldname;
      cb(null, `${stem}-${uniqueSuffix}${ext}`);
    },
  });

  const upload = multer({
    storage,
    limits: {
      fileSize: 1024 * 1024 * 1024, // 1GB
    },
    fileFilter: (req, file, cb) => {
      cb(null, isSupportedFile(file.originalname) || path.extname(file.originalname) === '');
    },
  });

  /**
   * Health check endpoint
   */
  app.get('/health', (req: Request, res: Response) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  /**
   * Choices offered by the settings panel
   */
  app.get('/api/models', (req: Request, res: Response) => {
    res.json({
      models: AVAILABLE_MODELS,
      computeTypes: AVAILABLE_COMPUTE_TYPES,
      devices: AVAILABLE_DEVICES,
      languages: LANGUAGE_NAMES,
      extensions: SUPPORTED_EXTENSIONS,
    });
  });

  app.get('/api/settings', (req: Request, res: Response) => {
    res.json(controller.getSettings());
  });

  app.put('/api/settings', (req: Request, res: Response) => {
    try {
      const settings = validateSettings(req.body, controller.getSettings());
      const result = controller.updateSettings(settings);
      if (!result.accepted) {
        return res.status(400).json({ error: result.reason });
      }
      res.json(controller.getSettings());
    } catch (error) {
      const status = error instanceof ConfigError ? 400 : 500;
      res.status(status).json({ error: errorMessage(error) });
    }
  });

  /**
   * Current session state
   */
  app.get('/api/session', (req: Request, res: Response) => {
    res.json(controller.getState());
  });

  /**
   * Select a file already on this machine
   */
  app.post('/api/session/select', async (req: Request, res: Response) => {
    const filePath = readBodyString(req, 'path');
    if (!filePath) {
      return res.status(400).json({ error: 'No file path provided' });
    }

    try {
      const result = await controller.selectFile(filePath);
      await uploads.release(result.state);
      sendCommandResult(res, result);
    } catch (error) {
      log.error(`Failed to select file: ${errorMessage(error)}`, error);
      res.status(500).json({ error: errorMessage(error) });
    }
  });

  /**
   * Upload a file or a recording made in the browser, then select it
   */
  app.post('/api/session/upload', upload.single('audio'), async (req: Request, res: Response) => {
    if (!req.file) {
      return res.status(400).json({ error: 'No supported audio file provided' });
    }

    log.info(`Received ${req.file.originalname} (${req.file.size} bytes)`);
    const uploaded = req.file.path;
    try {
      const result = await controller.selectFile(uploaded);
      await uploads.release(result.state);
      if (result.accepted) {
        uploads.adopt(uploaded);
      } else {
        await uploads.discard(uploaded);
      }
      sendCommandResult(res, result);
    } catch (error) {
      await uploads.discard(uploaded).catch((cleanupError: unknown) => {
        log.warn(`Could not remove upload: ${errorMessage(cleanupError)}`);
      });
      log.error(`Failed to select uploaded file: ${errorMessage(error)}`, error);
      res.status(500).json({ error: errorMessage(error) });
    }
  });

  app.post('/api/session/start', (req: Request, res: Response) => {
    sendCommandResult(res, controller.start());
  });

  /**
   * Cancel and dismiss return the session to idle, which releases its upload
   */
  app.post('/api/session/cancel', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const result = controller.cancel();
      await uploads.release(result.state);
      sendCommandResult(res, result);
    } catch (error) {
      next(error);
    }
  });

  app.post('/api/session/dismiss', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const result = controller.dismiss();
      await uploads.release(result.state);
      sendCommandResult(res, result);
    } catch (error) {
      next(error);
    }
  });

  app.put('/api/session/output-dir', (req: Request, res: Response) => {
    const dir = readBodyString(req, 'dir');
    if (!dir) {
      return res.status(400).json({ error: 'No output folder provided' });
    }
    sendCommandResult(res, controller.setOutputDir(dir));
  });

  /**
   * Download the finished transcript
   */
  app.get('/api/session/transcript', (req: Request, res: Response) => {
    const { status, outputPath } = controller.getState();
    if (status !== 'done' || !outputPath) {
      return res.status(404).json({ error: 'No finished transcript' });
    }
    res.download(outputPath, path.basename(outputPath));
  });

  /**
   * Server-sent events: the page re-renders on every `state` event
   */
  app.get('/api/session/events', (req: Request, res: Response) => {
    res.set({
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive',
    });
    res.flushHeaders();

    const send = (event: string, data: unknown) => {
      res.write(`event: ${event}\ndata: ${JSON.stringify(data)}\n\n`);
    };

    const onState = (state: SessionState) => send('state', state);
    const onProgress = (update: ProgressUpdate) => send('progress', update);
    const unsubscribe = logger.hub.subscribe((entry: LogEntry) => send('log', entry));

    controller.on('state', onState);
    controller.on('progress', onProgress);
    send('state', controller.getState());

    req.on('close', () => {
      controller.off('state', onState);
      controller.off('progress', onProgress);
      unsubscribe();
    });
  });

  app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      return next(error);
    }
    const status = error instanceof multer.MulterError ? 400 : 500;
    log.error(`Request failed: ${errorMessage(error)}`, error);
    res.status(status).json({ error: errorMessage(error) });
  });

  return app;
}

export function createController(config: AppConfig, logger: Logger): SessionController {
  const adapter = new WhisperService({
    logger: logger.child('Whisper'),
    cacheDir: config.modelCacheDir,
  });

  return new SessionController({
    adapter,
    logger: logger.child('Session'),
    settings: config.transcription,
    outputDir: config.outputDir,
  });
}

/**
 * Start server
 */
export function startServer(config: AppConfig, logger: Logger): Promise<void> {
  const controller = createController(config, logger);
  const app = createApp(controller, config, logger);
  const log = logger.child('Server');

  return new Promise((resolve, reject) => {
    const server = app.listen(config.port, config.host, () => {
      log.info(`Transcript desk running on http://${config.host}:${config.port}`);
      log.info(`Transcripts are saved to ${config.outputDir}`);
      resolve();
    });
    server.once('error', reject);
  });
}
