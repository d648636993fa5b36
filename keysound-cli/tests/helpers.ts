import type { PlayerAdapter, SoundHandle } from '../src/player/player-adapter.js';
import type { ILogger, LogLevel, LogMetadata } from '../src/utils/logger.js';
import type { SoundFileDescriptor } from '../src/types/soundboard.js';
import { PlaybackError } from '../src/utils/errors.js';
import { parseSoundFilename } from '../src/services/sound-files.js';

/**
 * Test helper utilities
 */

export type FakeCall = 'play' | 'stop' | 'seek' | 'release';

export class FakeSoundHandle implements SoundHandle {
  playing = false;
  ended = false;
  ready = true;
  failed = false;
  released = false;
  offsetMs = 0;
  failOn: FakeCall | null = null;
  readonly calls: FakeCall[] = [];

  constructor(readonly path: string) {}

  play(): void {
    this.record('play');
    this.playing = true;
    this.ended = false;
  }

  stop(): void {
    this.record('stop');
    this.playing = false;
    this.offsetMs = 0;
  }

  seek(positionMs: number): void {
    this.record('seek');
    this.offsetMs = positionMs;
    this.ended = false;
  }

  position(): number {
    return this.offsetMs;
  }

  duration(): number | null {
    return 1000;
  }

  isAtStart(): boolean {
    return this.offsetMs === 0;
  }

  isAtEnd(): boolean {
    return this.ended;
  }

  isReady(): boolean {
    return this.ready;
  }

  hasFailed(): boolean {
    return this.failed;
  }

  isPlaying(): boolean {
    return this.playing;
  }

  release(): void {
    this.record('release');
    this.released = true;
    this.playing = false;
  }

  /** Simulate playback running out on its own. */
  finish(): void {
    this.playing = false;
    this.ended = true;
    this.offsetMs = 1000;
  }

  private record(call: FakeCall): void {
    if (this.failOn === call) {
      throw new PlaybackError(`fake ${call} failure`, { path: this.path });
    }
    if (this.released && call !== 'release') {
      throw new PlaybackError(`Cannot ${call} a released sound`, { path: this.path });
    }
    this.calls.push(call);
  }
}

export class FakePlayerAdapter implements PlayerAdapter {
  readonly name = 'fake';
  readonly handles: FakeSoundHandle[] = [];
  failOpenFor = new Set<string>();
  startReady = true;

  open(path: string): FakeSoundHandle {
    if (this.failOpenFor.has(path)) {
      throw new PlaybackError('cannot open', { path });
    }
    const handle = new FakeSoundHandle(path);
    handle.ready = this.startReady;
    this.handles.push(handle);
    return handle;
  }

  handle(path: string): FakeSoundHandle {
    const found = this.handles.find(h => h.path === path);
    if (!found) throw new Error(`No handle for ${path}`);
    return found;
  }
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  meta?: LogMetadata;
}

/**
 * Logger that keeps entries in memory instead of printing them.
 */
export class RecordingLogger implements ILogger {
  constructor(readonly entries: LogEntry[] = []) {}

  error(message: string, error?: Error, meta?: LogMetadata): void {
    this.entries.push({ level: 'error', message, meta: error ? { ...meta, error: error.message } : meta });
  }

  warn(message: string, meta?: LogMetadata): void {
    this.entries.push({ level: 'warn', message, meta });
  }

  info(message: string, meta?: LogMetadata): void {
    this.entries.push({ level: 'info', message, meta });
  }

  debug(message: string, meta?: LogMetadata): void {
    this.entries.push({ level: 'debug', message, meta });
  }

  child(): ILogger {
    return new RecordingLogger(this.entries);
  }

  setLevel(): void {}

  messages(level: LogLevel): string[] {
    return this.entries.filter(e => e.level === level).map(e => e.message);
  }
}

export function descriptors(...paths: string[]): SoundFileDescriptor[] {
  return paths.map((path) => {
    const descriptor = parseSoundFilename(path);
    if (!descriptor) throw new Error(`Not a sound filename: ${path}`);
    return descriptor;
  });
}

/** Strip ANSI escape codes */
export function stripAnsi(str: string): string {
  return str.replace(/\x1b\[[0-9;]*m/g, '');
}
