import type { TransportMode } from "../config.js";

/**
 * Where an encoded snapshot lives between Copy/Cut and Paste. A write fully
 * replaces the previous payload or fails leaving it untouched.
 */
export interface ClipboardTransport {
  readonly kind: TransportMode;
  /** @throws TransportError */
  write(text: string): Promise<void>;
  /** @throws TransportError when nothing readable is stored */
  read(): Promise<string>;
}
