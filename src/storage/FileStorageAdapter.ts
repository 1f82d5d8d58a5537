import fs from 'node:fs/promises';
import path from 'node:path';
import { StorageAdapter } from './StorageAdapter';

type BoxContents = Record<string, unknown>;

const isBoxContents = (value: unknown): value is BoxContents =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isMissingFileError = (error: unknown) =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

const readBoxFile = async (filePath: string): Promise<BoxContents> => {
  try {
    const jsonString = await fs.readFile(filePath, 'utf-8');
    const parsed: unknown = JSON.parse(jsonString);

    if (!isBoxContents(parsed)) {
      console.warn(`Invalid storage box at ${filePath}, starting empty`);
      return {};
    }

    return parsed;
  } catch (error) {
    if (isMissingFileError(error)) {
      return {};
    }
    if (error instanceof SyntaxError) {
      console.warn(`Corrupt storage box at ${filePath}, starting empty`, error);
      return {};
    }
    throw error;
  }
};

/**
 * Keeps a box in memory and writes the whole box to `<directory>/<name>.json`
 * after every change.
 */
export class FileStorageAdapter implements StorageAdapter {
  private entries: BoxContents;
  private pendingWrite: Promise<void> = Promise.resolve();

  private constructor(private readonly filePath: string, entries: BoxContents) {
    this.entries = entries;
  }

  static async open(directory: string, name: string): Promise<FileStorageAdapter> {
    await fs.mkdir(directory, { recursive: true });
    const filePath = path.join(directory, `${name}.json`);
    const entries = await readBoxFile(filePath);
    return new FileStorageAdapter(filePath, entries);
  }

  async get(key: string): Promise<unknown> {
    return this.entries[key];
  }

  async put(key: string, value: unknown): Promise<void> {
    this.entries = { ...this.entries, [key]: value };
    await this.flush();
  }

  async delete(key: string): Promise<void> {
    if (!(key in this.entries)) return;
    const { [key]: _removed, ...rest } = this.entries;
    this.entries = rest;
    await this.flush();
  }

  async clear(): Promise<void> {
    this.entries = {};
    await this.flush();
  }

  getFilePath(): string {
    return this.filePath;
  }

  // Writes are chained so an older snapshot never lands after a newer one.
  private flush(): Promise<void> {
    const snapshot = JSON.stringify(this.entries);
    const write = this.pendingWrite
      .catch(() => undefined)
      .then(() => fs.writeFile(this.filePath, snapshot, 'utf-8'));
    this.pendingWrite = write;
    return write;
  }
}
