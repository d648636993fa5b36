import type { BindingRow, CommandAction, Group, KeyId } from '../types/soundboard.js';
import type { ILogger } from '../utils/logger.js';
import { ConfigError } from '../utils/errors.js';

/** Digits in keyboard-row order, then letters alphabetically. */
export const DEFAULT_KEY_SET: readonly KeyId[] = [
  ...'1234567890'.split(''),
  ...'abcdefghijklmnopqrstuvwxyz'.split(''),
];

/**
 * Reserved keys, listed in dispatch precedence order.
 */
export const COMMAND_KEYS: ReadonlyArray<readonly [KeyId, CommandAction]> = [
  ['escape', 'exit'],
  ['space', 'stop-all'],
  ['f1', 'show-bindings'],
  ['f2', 'toggle-loop'],
  ['f3', 'toggle-stack'],
];

/**
 * Assigns groups to keys of a fixed ordered key set, first come first served.
 *
 * Groups are indexed by key and by name; both maps point at the same Group
 * object, so state mutated through one lookup is visible through the other.
 */
export class KeyBindingTable {
  private readonly keys: readonly KeyId[];
  private readonly byKey = new Map<KeyId, Group>();
  private readonly byName = new Map<string, KeyId>();

  constructor(
    private readonly logger: ILogger,
    keys: readonly KeyId[] = DEFAULT_KEY_SET,
    commandKeys: ReadonlyArray<readonly [KeyId, CommandAction]> = COMMAND_KEYS
  ) {
    if (keys.length === 0) {
      throw new ConfigError('Key set is empty');
    }
    const seen = new Set<KeyId>();
    for (const key of keys) {
      if (seen.has(key)) {
        throw new ConfigError(`Key '${key}' appears twice in the key set`, { key });
      }
      seen.add(key);
    }
    for (const [key, action] of commandKeys) {
      if (seen.has(key)) {
        throw new ConfigError(`Key '${key}' is reserved for ${action} and cannot be bound`, { key, action });
      }
    }
    this.keys = [...keys];
  }

  get capacity(): number {
    return this.keys.length;
  }

  get size(): number {
    return this.byKey.size;
  }

  hasCapacity(): boolean {
    return this.byKey.size < this.keys.length;
  }

  /**
   * Bind a group to the next unused key. A group that is already bound keeps
   * its key. Returns null when the key set is exhausted.
   */
  assign(group: Group): KeyId | null {
    const existing = this.byName.get(group.name);
    if (existing !== undefined) return existing;

    const key = this.keys.find((candidate) => !this.byKey.has(candidate));
    if (key === undefined) {
      this.logger.warn('No key left for group', { group: group.name, capacity: this.keys.length });
      return null;
    }

    this.byKey.set(key, group);
    this.byName.set(group.name, key);
    this.logger.debug('Bound group', { key, group: group.name });
    return key;
  }

  lookup(key: KeyId): Group | undefined {
    return this.byKey.get(key);
  }

  lookupGroup(name: string): Group | undefined {
    const key = this.byName.get(name);
    return key === undefined ? undefined : this.byKey.get(key);
  }

  /**
   * Key bound to a group name, or null (reported) when the name is unbound.
   */
  lookupByName(name: string): KeyId | null {
    const key = this.byName.get(name);
    if (key === undefined) {
      this.logger.warn('Group not found', { group: name });
      return null;
    }
    return key;
  }

  /** Bound groups in key-set order. */
  groups(): Group[] {
    return this.entries().map(([, group]) => group);
  }

  entries(): Array<[KeyId, Group]> {
    const result: Array<[KeyId, Group]> = [];
    for (const key of this.keys) {
      const group = this.byKey.get(key);
      if (group) result.push([key, group]);
    }
    return result;
  }

  rows(): BindingRow[] {
    return this.entries().map(([key, group]) => ({
      key,
      group: group.name,
      sounds: group.sounds.length,
      orderIndex: group.orderIndex,
    }));
  }
}
