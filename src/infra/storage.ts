import { appendFileSync, existsSync, readFileSync, renameSync, unlinkSync, writeFileSync } from 'fs';
import type { IStorage } from '../types/interfaces.js';

export class FileStorage implements IStorage {
  readFile(path: string, encoding: BufferEncoding): string {
    return readFileSync(path, encoding);
  }

  writeFile(path: string, data: string): void {
    writeFileSync(path, data, 'utf-8');
  }

  appendFile(path: string, data: string): void {
    appendFileSync(path, data, 'utf-8');
  }

  exists(path: string): boolean {
    return existsSync(path);
  }

  rename(from: string, to: string): void {
    renameSync(from, to);
  }

  unlink(path: string): void {
    unlinkSync(path);
  }
}
