import * as fs from 'fs';
import * as path from 'path';
import { mkdirpSync } from 'mkdirp';
import { errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('RunStorageService');

/**
 * Service for storing the captured output of stage attempts, one directory per run
 */
export class RunStorageService {
  private baseStorageDir: string;

  constructor(baseStorageDir: string) {
    this.baseStorageDir = baseStorageDir;
    this.ensureStorageDir();
  }

  private ensureStorageDir(): void {
    try {
      mkdirpSync(this.baseStorageDir);
      logger.debug(`Ensured run storage directory exists: ${this.baseStorageDir}`);
    } catch (error) {
      logger.error(`Error creating storage directory: ${errorMessage(error)}`);
    }
  }

  getRunPath(runId: string): string {
    return path.join(this.baseStorageDir, runId);
  }

  /** Percent-encodes the stage name, dots included, so distinct stages never share a file. */
  private stageFileName(stage: string, attempt: number): string {
    const encoded = encodeURIComponent(stage).replace(
      /[!'()*.~]/g,
      char => `%${char.charCodeAt(0).toString(16).toUpperCase()}`
    );
    return `${encoded}.${attempt}.log`;
  }

  /**
   * Store one attempt's output and return the path, used as the stage's output reference
   */
  storeStageOutput(runId: string, stage: string, attempt: number, content: string): string {
    const runPath = this.getRunPath(runId);
    mkdirpSync(runPath);
    const filePath = path.join(runPath, this.stageFileName(stage, attempt));
    fs.writeFileSync(filePath, content);
    return filePath;
  }

  readStageOutput(runId: string, stage: string, attempt: number): string | undefined {
    const filePath = path.join(this.getRunPath(runId), this.stageFileName(stage, attempt));
    return fs.existsSync(filePath) ? fs.readFileSync(filePath, 'utf8') : undefined;
  }
}
