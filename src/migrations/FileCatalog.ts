import * as path from 'path';
import { FileStore } from './types';
import { NodeFileStore } from './FileStore';

/**
 * Read-only view of the migration scripts in a directory.
 */
export class FileCatalog {
  constructor(private store: FileStore = new NodeFileStore()) {}

  /**
   * Files directly inside `directory` whose name ends with `suffix`.
   */
  async listCandidates(directory: string, suffix: string): Promise<Set<string>> {
    const files = await this.store.listFiles(directory);
    return new Set(files.filter(file => file.endsWith(suffix)));
  }

  exists(directory: string, filename: string): Promise<boolean> {
    return this.store.exists(path.join(directory, filename));
  }

  read(directory: string, filename: string): Promise<string> {
    return this.store.readFile(path.join(directory, filename));
  }

  write(directory: string, filename: string, content: string): Promise<void> {
    return this.store.writeFile(path.join(directory, filename), content);
  }
}
