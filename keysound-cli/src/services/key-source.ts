import { emitKeypressEvents, type Key } from 'readline';
import type { KeyId } from '../types/soundboard.js';

/**
 * Non-blocking source of key presses.
 */
export interface KeySource {
  /** Next pending key, or null when nothing was pressed. */
  poll(): KeyId | null;
  close(): void;
}

/**
 * Stream the terminal source reads from; raw mode is only switched on a TTY.
 */
export interface KeyInput extends NodeJS.ReadableStream {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
}

/**
 * Map a readline keypress to a key id. Ctrl+C is treated as escape.
 *
 * readline flags a lone Esc with `meta`, so it is matched before modified
 * keys are dropped.
 */
export function normalizeKeypress(str: string | undefined, key: Key | undefined): KeyId | null {
  if (key?.name === 'escape') return 'escape';
  if (key?.ctrl && key.name === 'c') return 'escape';
  if (key?.ctrl || key?.meta) return null;
  if (key?.name) return key.name.toLowerCase();
  if (str && str.length === 1) return str.toLowerCase();
  return null;
}

/**
 * FIFO of key ids; polling never waits.
 */
export class QueuedKeySource implements KeySource {
  private readonly pending: KeyId[] = [];
  protected closed = false;

  push(...keys: KeyId[]): void {
    if (this.closed) return;
    this.pending.push(...keys);
  }

  poll(): KeyId | null {
    return this.pending.shift() ?? null;
  }

  close(): void {
    this.closed = true;
    this.pending.length = 0;
  }
}

/**
 * Reads raw keypresses from a TTY stream (stdin by default) into the queue.
 */
export class TerminalKeySource extends QueuedKeySource {
  private readonly onKeypress = (str: string | undefined, key: Key | undefined) => {
    const id = normalizeKeypress(str, key);
    if (id) this.push(id);
  };

  constructor(private readonly input: KeyInput = process.stdin) {
    super();
    emitKeypressEvents(this.input);
    if (this.input.isTTY) this.input.setRawMode?.(true);
    this.input.on('keypress', this.onKeypress);
    this.input.resume();
  }

  close(): void {
    if (this.closed) return;
    super.close();
    this.input.off('keypress', this.onKeypress);
    if (this.input.isTTY) this.input.setRawMode?.(false);
    this.input.pause();
  }
}
