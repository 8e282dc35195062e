/**
 * Local filesystem sink: one file per identifier under a directory.
 */

import { randomUUID } from "node:crypto";
import { mkdir, rename, rm, writeFile } from "node:fs/promises";
import { join, resolve } from "node:path";
import { errorMessage } from "../errors.js";
import type { ResultSink, StoreResult } from "./types.js";
import { toStorageName } from "./types.js";

export interface FileSystemSinkOptions {
  dir: string;
  /** Appended to every file name (default: ".xml") */
  extension?: string;
}

export class FileSystemSink implements ResultSink {
  public readonly target: string;
  private readonly extension: string;
  private ready: Promise<void> | undefined;

  constructor(options: FileSystemSinkOptions) {
    this.target = resolve(options.dir);
    this.extension = options.extension ?? ".xml";
  }

  private ensureDirectory(): Promise<void> {
    if (!this.ready) {
      this.ready = mkdir(this.target, { recursive: true }).then(() => undefined);
      // A failed mkdir is retried on the next store
      this.ready.catch(() => {
        this.ready = undefined;
      });
    }
    return this.ready;
  }

  /**
   * Write through a temporary file and rename it into place, so a reader never
   * sees a half-written document and a repeat store replaces the old file.
   */
  async store(identifier: string, content: string): Promise<StoreResult> {
    const finalPath = join(this.target, toStorageName(identifier, this.extension));
    const tempPath = `${finalPath}.${randomUUID().slice(0, 8)}.part`;

    try {
      await this.ensureDirectory();
      await writeFile(tempPath, content, "utf-8");
      await rename(tempPath, finalPath);
      return { ok: true, location: finalPath };
    } catch (err) {
      await rm(tempPath, { force: true }).catch(() => undefined);
      return { ok: false, error: errorMessage(err) };
    }
  }
}
