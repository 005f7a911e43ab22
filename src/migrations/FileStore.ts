/**
 * FileStore backed by the local filesystem
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { FileStore } from './types';
import { errorCode, toError } from '../database/types';
import { MigrationIOError } from './errors';

function wrap(action: string, target: string, error: unknown): MigrationIOError {
  const cause = toError(error);
  return new MigrationIOError(`Failed to ${action} ${target}: ${cause.message}`, target, cause);
}

export class NodeFileStore implements FileStore {
  async listFiles(directory: string): Promise<string[]> {
    try {
      const entries = await fs.readdir(directory, { withFileTypes: true });
      return entries.filter(entry => entry.isFile()).map(entry => entry.name);
    } catch (error) {
      throw wrap('list migration directory', directory, error);
    }
  }

  async readFile(filePath: string): Promise<string> {
    try {
      return await fs.readFile(filePath, 'utf8');
    } catch (error) {
      throw wrap('read migration file', filePath, error);
    }
  }

  async exists(filePath: string): Promise<boolean> {
    try {
      const stats = await fs.stat(filePath);
      return stats.isFile();
    } catch (error) {
      const code = errorCode(error);
      if (code === 'ENOENT' || code === 'ENOTDIR') {
        return false;
      }
      throw wrap('check migration file', filePath, error);
    }
  }

  async writeFile(filePath: string, content: string): Promise<void> {
    try {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      // wx: never overwrite an existing migration
      await fs.writeFile(filePath, content, { encoding: 'utf8', flag: 'wx' });
    } catch (error) {
      throw wrap('write migration file', filePath, error);
    }
  }
}
