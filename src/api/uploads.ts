import fs from 'fs';
import path from 'path';
import { SessionState } from '../types/index.js';
import { Logger } from '../utils/logger.js';

/**
 * Files uploaded through the GUI belong to the server. The one the session
 * refers to stays on disk; it is deleted as soon as the session moves on to
 * another file or back to idle.
 */
export class UploadStore {
  private current: string | null = null;

  constructor(private readonly logger: Logger) {}

  adopt(filePath: string): void {
    this.current = path.resolve(filePath);
  }

  async release(state: SessionState): Promise<void> {
    if (this.current === null || state.inputFile === this.current) return;
    const stale = this.current;
    this.current = null;
    await this.discard(stale);
  }

  async discard(filePath: string): Promise<void> {
    await fs.promises.rm(filePath, { force: true });
    this.logger.debug(`Removed upload ${path.basename(filePath)}`);
  }
}
