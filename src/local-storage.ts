import { readFile, stat } from 'node:fs/promises';
import type { LocalFileStat, LocalStorage } from './types';

/**
 * Local storage backed by node:fs
 */
export const nodeFileStorage: LocalStorage = {
  async stat(path: string): Promise<LocalFileStat> {
    const st = await stat(path);
    return { size: st.size, isFile: st.isFile() };
  },

  async readFile(path: string): Promise<Uint8Array> {
    return readFile(path);
  },
};

/**
 * Node error code of a failed fs call, if it carries one
 */
export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
