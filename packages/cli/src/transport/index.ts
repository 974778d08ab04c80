import type { TransportMode } from "../config.js";
import { OSClipboardTransport, type ClipboardBackend } from "./osClipboard.js";
import { TempFileTransport } from "./tempFile.js";
import type { ClipboardTransport } from "./types.js";

export interface TransportOptions {
  /** Overrides the well-known temp file location. */
  tempFilePath?: string;
  /** Overrides the platform clipboard. */
  clipboard?: ClipboardBackend;
}

export function createTransport(mode: TransportMode, options: TransportOptions = {}): ClipboardTransport {
  if (mode === "OSClipboard") {
    return new OSClipboardTransport(options.clipboard);
  }
  return new TempFileTransport(options.tempFilePath);
}

export { OSClipboardTransport, TempFileTransport };
export { TEMP_FILE_NAME, defaultTempFilePath } from "./tempFile.js";
export type { ClipboardBackend, ClipboardTransport };
