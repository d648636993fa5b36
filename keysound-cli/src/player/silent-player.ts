import type { PlayerAdapter, SoundHandle } from './player-adapter.js';
import { PlaybackError } from '../utils/errors.js';

class SilentSoundHandle implements SoundHandle {
  private playing = false;
  private offsetMs = 0;
  private released = false;

  constructor(readonly path: string) {}

  play(): void {
    this.check('play');
    this.playing = true;
  }

  stop(): void {
    this.check('stop');
    this.playing = false;
    this.offsetMs = 0;
  }

  seek(positionMs: number): void {
    this.check('seek');
    this.offsetMs = Math.max(0, positionMs);
  }

  position(): number {
    return this.offsetMs;
  }

  duration(): number | null {
    return null;
  }

  isAtStart(): boolean {
    return this.offsetMs === 0;
  }

  isAtEnd(): boolean {
    return false;
  }

  isReady(): boolean {
    return true;
  }

  hasFailed(): boolean {
    return false;
  }

  isPlaying(): boolean {
    return this.playing;
  }

  release(): void {
    this.playing = false;
    this.released = true;
  }

  private check(operation: string): void {
    if (this.released) {
      throw new PlaybackError(`Cannot ${operation} a released sound`, { path: this.path });
    }
  }
}

/**
 * Adapter that produces no audio. Handles are ready at once and never end,
 * so looping groups never restart. Backs `keysound list` and `--mute`.
 */
export class SilentPlayerAdapter implements PlayerAdapter {
  readonly name = 'silent';

  open(path: string): SoundHandle {
    return new SilentSoundHandle(path);
  }
}
