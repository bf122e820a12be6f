import { access, readFile } from 'node:fs/promises';

export interface FileSystem {
  readText(path: string): Promise<string>;
  readJSON<T>(path: string): Promise<T>;
  exists(path: string): Promise<boolean>;
}

export class NodeFileSystem implements FileSystem {
  async readText(path: string): Promise<string> {
    return readFile(path, 'utf8');
  }

  async readJSON<T>(path: string): Promise<T> {
    return JSON.parse(await this.readText(path)) as T;
  }

  async exists(path: string): Promise<boolean> {
    try {
      await access(path);
      return true;
    } catch {
      return false;
    }
  }
}

export class MockFileSystem implements FileSystem {
  private files = new Map<string, string>();
  private unreadable = new Set<string>();

  async readText(path: string): Promise<string> {
    if (this.unreadable.has(path)) throw new Error(`EACCES: ${path}`);
    const content = this.files.get(path);
    if (content === undefined) throw new Error(`ENOENT: ${path}`);
    return content;
  }

  async readJSON<T>(path: string): Promise<T> {
    return JSON.parse(await this.readText(path)) as T;
  }

  async exists(path: string): Promise<boolean> {
    return this.files.has(path) || this.unreadable.has(path);
  }

  setFile(path: string, content: string): void {
    this.files.set(path, content);
  }

  /** Registers a path that exists but fails on read. */
  setUnreadable(path: string): void {
    this.unreadable.add(path);
  }

  getFiles(): Map<string, string> {
    return new Map(this.files);
  }
}
