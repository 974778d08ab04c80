import clipboard from "clipboardy";
import { TransportError } from "@meshbridge/core";
import type { ClipboardTransport } from "./types.js";

/** The subset of the platform clipboard the transport needs. */
export interface ClipboardBackend {
  read(): Promise<string>;
  write(text: string): Promise<void>;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class OSClipboardTransport implements ClipboardTransport {
  readonly kind = "OSClipboard";
  private readonly backend: ClipboardBackend;

  constructor(backend: ClipboardBackend = clipboard) {
    this.backend = backend;
  }

  async write(text: string): Promise<void> {
    try {
      await this.backend.write(text);
    } catch (error) {
      throw new TransportError(`Could not write to the system clipboard: ${describeError(error)}`);
    }
  }

  async read(): Promise<string> {
    let text: string;
    try {
      text = await this.backend.read();
    } catch (error) {
      throw new TransportError(`Could not read the system clipboard: ${describeError(error)}`);
    }
    if (text.trim().length === 0) {
      throw new TransportError("Nothing to paste: the system clipboard is empty.");
    }
    return text;
  }
}
