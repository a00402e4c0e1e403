import { mkdir, readFile, writeFile } from 'fs/promises';
import { dirname, isAbsolute, join, normalize } from 'path';

import { config } from '../utils/config.js';
import { logger } from '../utils/logger.js';

/** True for a relative path that stays inside the directory it is joined to. */
export function isContainedPath(name: string): boolean {
  if (name.length === 0 || isAbsolute(name)) {
    return false;
  }
  return !normalize(name)
    .split(/[\\/]/)
    .some(segment => segment === '..');
}

/**
 * Reference and output files a workflow's steps read from and write to,
 * kept under `<baseDir>/<workflowId>/`.
 */
export class WorkflowFiles {
  constructor(private readonly baseDir: string = config.paths.filesDir) {}

  path(workflowId: string, name: string): string {
    if (!isContainedPath(workflowId) || !isContainedPath(name)) {
      throw new Error(`Invalid workflow file path: '${workflowId}/${name}'`);
    }
    return join(this.baseDir, workflowId, name);
  }

  /** Returns null, with a warning, when the file does not exist. */
  async read(workflowId: string, name: string): Promise<string | null> {
    const filePath = this.path(workflowId, name);
    try {
      return await readFile(filePath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        logger.warn('Reference file not found', { workflowId, file: name });
        return null;
      }
      throw error;
    }
  }

  async write(workflowId: string, name: string, content: string): Promise<string> {
    const filePath = this.path(workflowId, name);
    await mkdir(dirname(filePath), { recursive: true });
    await writeFile(filePath, content, 'utf-8');
    logger.debug('Wrote workflow file', { workflowId, file: name });
    return filePath;
  }
}
