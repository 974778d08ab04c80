import { randomUUID } from "node:crypto";
import { readFile, rename, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { TransportError } from "@meshbridge/core";
import type { ClipboardTransport } from "./types.js";

export const TEMP_FILE_NAME = "meshbridge_clipboard.json";

export function defaultTempFilePath(): string {
  return join(tmpdir(), TEMP_FILE_NAME);
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class TempFileTransport implements ClipboardTransport {
  readonly kind = "TemporaryFile";
  readonly path: string;

  constructor(path: string = defaultTempFilePath()) {
    this.path = path;
  }

  async write(text: string): Promise<void> {
    const staging = `${this.path}.${randomUUID()}.tmp`;
    try {
      await writeFile(staging, text, "utf8");
      await rename(staging, this.path);
    } catch (error) {
      await rm(staging, { force: true });
      throw new TransportError(`Could not write ${this.path}: ${describeError(error)}`);
    }
  }

  async read(): Promise<string> {
    let text: string;
    try {
      text = await readFile(this.path, "utf8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        throw new TransportError(`Nothing to paste: ${this.path} does not exist.`);
      }
      throw new TransportError(`Could not read ${this.path}: ${describeError(error)}`);
    }
    if (text.trim().length === 0) {
      throw new TransportError(`Nothing to paste: ${this.path} is empty.`);
    }
    return text;
  }
}
