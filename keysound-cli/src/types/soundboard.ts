/**
 * Domain shapes shared by the catalog, binding table, state machine and dispatcher.
 */

import type { SoundHandle } from '../player/player-adapter.js';

/**
 * How the last trigger of a group treated earlier sounds.
 * `random` is reserved: selectable, but plays exactly like `sequential`.
 */
export type PlaybackMode = 'sequential' | 'parallel' | 'random';

/** Normalised key name, e.g. `'1'`, `'q'`, `'space'`, `'escape'`. */
export type KeyId = string;

/** One parsed `PPP_NAME (N).ext` file. */
export interface SoundFileDescriptor {
  prefix: string;
  name: string;
  index: string;
  extension: 'mp3' | 'wav';
  path: string;
}

export interface Group {
  readonly orderIndex: number;
  readonly name: string;
  readonly sounds: SoundHandle[];
  /** -1 while idle. */
  lastPlayedIndex: number;
  loopEnabled: boolean;
  stackEnabled: boolean;
  mode: PlaybackMode;
}

/** Process-wide toggles copied into a group at trigger time. */
export interface GlobalState {
  loopFlag: boolean;
  stackFlag: boolean;
}

export type CommandAction =
  | 'exit'
  | 'stop-all'
  | 'show-bindings'
  | 'toggle-loop'
  | 'toggle-stack';

export interface BindingRow {
  key: KeyId;
  group: string;
  sounds: number;
  orderIndex: number;
}
