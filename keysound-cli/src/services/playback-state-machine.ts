import type { GlobalState, Group } from '../types/soundboard.js';
import type { SoundHandle } from '../player/player-adapter.js';
import type { ILogger } from '../utils/logger.js';
import { ValidationError } from '../utils/errors.js';
import { snapshotInto } from './global-state.js';

export type TriggerResult =
  | { kind: 'played'; index: number }
  | { kind: 'completed' }
  | { kind: 'empty' };

export type HandleOperation = 'play' | 'stop' | 'seek' | 'inspect';

/**
 * Per-group playback transitions.
 *
 * A group is idle while `lastPlayedIndex` is -1 and playing sound `i` once it
 * is `i`. Every call into a handle is guarded: a failing handle is logged and
 * skipped, never thrown back to the caller.
 */
export class PlaybackStateMachine {
  constructor(private readonly logger: ILogger) {}

  /**
   * Default key action: advance one sound through the group.
   *
   * When `globals` is given its flags are snapshotted into the group first.
   * Triggering the last sound's successor stops (unless stacking), reports the
   * sequence as complete and returns the group to idle without playing; the
   * following trigger starts again from the first sound.
   */
  triggerSequential(group: Group, globals?: GlobalState): TriggerResult {
    if (globals) snapshotInto(group, globals);
    if (group.sounds.length === 0) {
      this.logger.warn('Group has no sounds', { group: group.name });
      return { kind: 'empty' };
    }

    const current = group.lastPlayedIndex;
    if (current >= 0 && !group.stackEnabled) {
      this.stopHandle(group, current);
    }

    if (current === group.sounds.length - 1) {
      group.lastPlayedIndex = -1;
      this.logger.info('Sequence complete', { group: group.name, sounds: group.sounds.length });
      return { kind: 'completed' };
    }

    const next = current + 1;
    group.lastPlayedIndex = next;
    this.startHandle(group, next);
    return { kind: 'played', index: next };
  }

  /**
   * Play one sound directly, bypassing sequence advance.
   */
  triggerSpecific(group: Group, index: number): TriggerResult {
    if (!Number.isInteger(index) || index < 0 || index >= group.sounds.length) {
      throw new ValidationError(`Sound index ${index} is out of range for group '${group.name}'`, {
        group: group.name,
        index,
        sounds: group.sounds.length,
      });
    }

    const current = group.lastPlayedIndex;
    if (current >= 0 && !group.stackEnabled) {
      this.stopHandle(group, current);
    }

    group.lastPlayedIndex = index;
    this.startHandle(group, index);
    return { kind: 'played', index };
  }

  /**
   * Restart looping sounds that reached their natural end. Stacked groups
   * check every sound up to the last played one; others only the last one.
   *
   * @returns number of sounds restarted
   */
  loopTick(groups: Iterable<Group>): number {
    let restarted = 0;
    for (const group of groups) {
      if (!group.loopEnabled || group.lastPlayedIndex < 0) continue;

      const first = group.stackEnabled ? 0 : group.lastPlayedIndex;
      for (let index = first; index <= group.lastPlayedIndex; index++) {
        if (this.hasEnded(group, index)) {
          this.logger.debug('Restarting looped sound', { group: group.name, index });
          this.startHandle(group, index);
          restarted++;
        }
      }
    }
    return restarted;
  }

  /**
   * Halt every sound of every group. Group state is left as is, so the next
   * sequential trigger continues after the last played sound.
   */
  stopAll(groups: Iterable<Group>): void {
    for (const group of groups) {
      for (let index = 0; index < group.sounds.length; index++) {
        this.stopHandle(group, index);
      }
    }
  }

  private startHandle(group: Group, index: number): void {
    // stop already rewinds a running sound; seeking it would relaunch it twice.
    if (this.guard(group, index, 'inspect', (handle) => handle.isPlaying()) === true) {
      this.stopHandle(group, index);
    } else {
      this.guard(group, index, 'seek', (handle) => handle.seek(0));
    }
    this.guard(group, index, 'play', (handle) => handle.play());
  }

  private stopHandle(group: Group, index: number): void {
    this.guard(group, index, 'stop', (handle) => handle.stop());
  }

  private hasEnded(group: Group, index: number): boolean {
    return this.guard(group, index, 'inspect', (handle) => handle.isAtEnd()) === true;
  }

  private guard<T>(
    group: Group,
    index: number,
    operation: HandleOperation,
    action: (handle: SoundHandle) => T
  ): T | undefined {
    const handle = group.sounds[index];
    if (!handle) return undefined;
    try {
      return action(handle);
    } catch (err) {
      this.logger.error(`Sound ${operation} failed`, err instanceof Error ? err : undefined, {
        group: group.name,
        index,
        path: handle.path,
      });
      return undefined;
    }
  }
}
