// src/core/storage/page-store.ts
import { promises as fs } from "fs";
import path from "node:path";
import { IoError } from "../errors/index";
import type { PageCapture } from "../types/product";

/**
 * Persists rendered listing pages under one root directory so they can be
 * mined again without re-fetching them.
 */
export class PageStore {
  readonly rootDir: string;

  constructor(rootDir: string) {
    this.rootDir = path.resolve(rootDir);
  }

  pathFor(fileName: string): string {
    return path.join(this.rootDir, fileName);
  }

  /** Writes the capture, replacing any earlier capture of the same page */
  async write(capture: PageCapture): Promise<string> {
    const file = this.pathFor(capture.fileName);
    try {
      await fs.writeFile(file, capture.rawBytes);
    } catch (e) {
      throw new IoError(
        `Failed to write page ${capture.sourceUrl} to ${file}`,
        "write-failed",
        file,
        e,
      );
    }
    return file;
  }

  /** Absolute paths of all stored captures, sorted by file name */
  async list(): Promise<string[]> {
    await assertDirectory(this.rootDir);
    const entries = await fs.readdir(this.rootDir, { withFileTypes: true });
    return entries
      .filter((e) => e.isFile() && e.name.endsWith(".html"))
      .map((e) => e.name)
      .sort()
      .map((name) => this.pathFor(name));
  }

  async read(file: string): Promise<Buffer> {
    try {
      return await fs.readFile(file);
    } catch (e) {
      throw new IoError(`Failed to read capture ${file}`, "read-failed", file, e);
    }
  }
}

/**
 * @throws IoError("not-a-directory") if `dir` is missing or not a directory
 */
export async function assertDirectory(dir: string): Promise<void> {
  const stat = await fs.stat(dir).catch(() => null);
  if (!stat?.isDirectory()) {
    throw new IoError(
      `${dir} is not a directory or does not exist on disk`,
      "not-a-directory",
      dir,
    );
  }
}
