/**
 * JSON File Storage
 * Reads JSON files and replaces them atomically (temp file, then rename)
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { PersistenceError, ScrapingErrorType } from '../scraping/errors';

export interface JsonFileSystem {
  mkdir(dirPath: string, options: { recursive: true }): Promise<unknown>;
  writeFile(filePath: string, data: string, encoding: 'utf-8'): Promise<void>;
  rename(oldPath: string, newPath: string): Promise<void>;
  rm(filePath: string, options: { force: true }): Promise<void>;
  readFile(filePath: string, encoding: 'utf-8'): Promise<string>;
}

export type ReadJsonResult =
  | { status: 'missing' }
  | { status: 'ok'; value: unknown }
  | { status: 'invalid'; reason: string };

const nodeFileSystem: JsonFileSystem = {
  mkdir: (dirPath, options) => fs.mkdir(dirPath, options),
  writeFile: (filePath, data, encoding) => fs.writeFile(filePath, data, encoding),
  rename: (oldPath, newPath) => fs.rename(oldPath, newPath),
  rm: (filePath, options) => fs.rm(filePath, options),
  readFile: (filePath, encoding) => fs.readFile(filePath, encoding),
};

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined;
  }
  return undefined;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class JsonFileStorage {
  private tempCounter = 0;

  constructor(private readonly fileSystem: JsonFileSystem = nodeFileSystem) {}

  /**
   * Read and parse a JSON file. A missing file is `missing`; a file that
   * cannot be read or parsed is `invalid`. Nothing is thrown.
   */
  async read(filePath: string): Promise<ReadJsonResult> {
    let content: string;
    try {
      content = await this.fileSystem.readFile(filePath, 'utf-8');
    } catch (error: unknown) {
      if (errorCode(error) === 'ENOENT') {
        return { status: 'missing' };
      }
      return { status: 'invalid', reason: errorMessage(error) };
    }

    try {
      return { status: 'ok', value: JSON.parse(content) as unknown };
    } catch (error: unknown) {
      return { status: 'invalid', reason: errorMessage(error) };
    }
  }

  /**
   * Serialize `data` and move it into place. The previous file stays intact
   * until the rename succeeds.
   */
  async write(filePath: string, data: unknown): Promise<void> {
    const tempPath = `${filePath}.${process.pid}.${++this.tempCounter}.tmp`;

    try {
      await this.fileSystem.mkdir(path.dirname(filePath), { recursive: true });
      await this.fileSystem.writeFile(tempPath, `${JSON.stringify(data, null, 2)}\n`, 'utf-8');
      await this.fileSystem.rename(tempPath, filePath);
    } catch (error: unknown) {
      await this.fileSystem.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        console.error(`[JsonFileStorage] Failed to remove ${tempPath}:`, errorMessage(cleanupError));
      });
      throw new PersistenceError(
        ScrapingErrorType.WRITE_FAILED,
        filePath,
        `Failed to write ${filePath}: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }
}
