/**
 * File operations used by the backup manager and the applier.
 * Injectable so tests can fail a single step without touching permissions.
 */

import * as fs from 'node:fs/promises';

export interface PatchFileSystem {
  copyFile(source: string, destination: string): Promise<void>;
  writeFile(filePath: string, content: string): Promise<void>;
  rename(from: string, to: string): Promise<void>;
  unlink(filePath: string): Promise<void>;
  /** Create a directory and its parents */
  mkdir(dirPath: string): Promise<void>;
}

export const nodePatchFileSystem: PatchFileSystem = {
  copyFile: (source, destination) => fs.copyFile(source, destination),
  writeFile: (filePath, content) => fs.writeFile(filePath, content, 'utf-8'),
  rename: (from, to) => fs.rename(from, to),
  unlink: (filePath) => fs.unlink(filePath),
  mkdir: async (dirPath) => {
    await fs.mkdir(dirPath, { recursive: true });
  },
};
