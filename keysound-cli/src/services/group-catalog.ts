import type { Group, SoundFileDescriptor } from '../types/soundboard.js';
import type { PlayerAdapter, SoundHandle } from '../player/player-adapter.js';
import type { ILogger } from '../utils/logger.js';
import type { KeyBindingTable } from './key-binding-table.js';

export function createGroup(orderIndex: number, name: string, sounds: SoundHandle[] = []): Group {
  return {
    orderIndex,
    name,
    sounds,
    lastPlayedIndex: -1,
    loopEnabled: false,
    stackEnabled: false,
    mode: 'sequential',
  };
}

/**
 * Sound groups built from parsed files, in creation order.
 */
export class GroupCatalog {
  private readonly byName = new Map<string, Group>();
  private readonly droppedGroups = new Map<string, number>();

  private constructor(private readonly logger: ILogger) {}

  /**
   * Build the catalog from files already sorted by path.
   *
   * A file joins the group carrying its name; the first file of a name fixes
   * the group's order index and claims the next key. Once the key set is
   * exhausted, files of new names are dropped. Every admitted sound is opened
   * and rewound to zero.
   */
  static build(
    files: SoundFileDescriptor[],
    bindings: KeyBindingTable,
    player: PlayerAdapter,
    logger: ILogger
  ): GroupCatalog {
    const catalog = new GroupCatalog(logger);
    for (const file of files) {
      catalog.admit(file, bindings, player);
    }

    if (catalog.byName.size === 0) {
      logger.warn('No sound groups found, every key is unbound');
    }
    for (const [name, count] of catalog.droppedGroups) {
      logger.debug('Dropped group summary', { group: name, files: count });
    }
    return catalog;
  }

  get groups(): Group[] {
    return [...this.byName.values()];
  }

  /** Names of groups that found no free key. */
  get dropped(): string[] {
    return [...this.droppedGroups.keys()];
  }

  get(name: string): Group | undefined {
    return this.byName.get(name);
  }

  handles(): SoundHandle[] {
    return this.groups.flatMap((group) => group.sounds);
  }

  private admit(file: SoundFileDescriptor, bindings: KeyBindingTable, player: PlayerAdapter): void {
    const existing = this.byName.get(file.name);
    if (!existing) {
      const droppedFiles = this.droppedGroups.get(file.name);
      if (droppedFiles !== undefined) {
        this.droppedGroups.set(file.name, droppedFiles + 1);
        return;
      }
      if (!bindings.hasCapacity()) {
        this.droppedGroups.set(file.name, 1);
        this.logger.warn('Too many groups, dropping group', {
          group: file.name,
          capacity: bindings.capacity,
          path: file.path,
        });
        return;
      }
    }

    const handle = this.open(file, player);
    if (!handle) return;

    if (existing) {
      existing.sounds.push(handle);
      return;
    }

    const group = createGroup(parseInt(file.prefix, 10), file.name, [handle]);
    if (bindings.assign(group) === null) {
      handle.release();
      this.droppedGroups.set(file.name, 1);
      return;
    }
    this.byName.set(group.name, group);
  }

  private open(file: SoundFileDescriptor, player: PlayerAdapter): SoundHandle | null {
    try {
      const handle = player.open(file.path);
      handle.seek(0);
      return handle;
    } catch (err) {
      this.logger.error('Could not open sound', err instanceof Error ? err : undefined, { path: file.path });
      return null;
    }
  }
}
