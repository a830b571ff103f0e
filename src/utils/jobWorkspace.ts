import * as path from 'path';
import * as fse from 'fs-extra';
import logger from './logger';

/**
 * Output directory owned by a single job (`<rootDir>/<jobId>/`).
 * Writes are best-effort: failures are logged and reported as `undefined`.
 */
export class JobWorkspace {
  readonly dir: string;

  constructor(readonly rootDir: string, readonly jobId: string) {
    this.dir = path.join(rootDir, jobId);
  }

  // Path relative to the output root, as exposed to result consumers
  relativePath(fileName: string): string {
    return path.posix.join(this.jobId, fileName);
  }

  absolutePath(fileName: string): string {
    return path.join(this.dir, fileName);
  }

  async writeFile(fileName: string, content: Buffer | string): Promise<string | undefined> {
    const target = this.absolutePath(fileName);
    try {
      await fse.ensureDir(this.dir);
      await fse.writeFile(target, content);
      return target;
    } catch (error) {
      logger.error({ err: error, jobId: this.jobId }, `Failed to write ${target}`);
      return undefined;
    }
  }

  async writeJson(fileName: string, data: unknown): Promise<string | undefined> {
    return this.writeFile(fileName, JSON.stringify(data, null, 2));
  }
}
