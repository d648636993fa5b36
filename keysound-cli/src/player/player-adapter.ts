/**
 * Playback primitive used by the soundboard core.
 *
 * Implementations own decoding and output; the core only drives them through
 * these calls. Any call may throw a PlaybackError (for example on a released
 * handle) and callers are expected to catch and report it.
 */
export interface SoundHandle {
  readonly path: string;

  play(): void;
  /** Halts playback and rewinds to the start. */
  stop(): void;
  /** Moves the playhead, in milliseconds. */
  seek(positionMs: number): void;

  position(): number;
  /** Total length in milliseconds, or null while unknown. */
  duration(): number | null;

  isAtStart(): boolean;
  /** True once playback ran to its natural end (not after `stop`). */
  isAtEnd(): boolean;
  isReady(): boolean;
  /** True once loading failed for good; the handle will never become ready. */
  hasFailed(): boolean;
  isPlaying(): boolean;

  /** Stops and invalidates the handle; later calls throw. */
  release(): void;
}

export interface PlayerAdapter {
  readonly name: string;
  open(path: string): SoundHandle;
}
