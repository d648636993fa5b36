import chalk from 'chalk';
import type { GlobalState, KeyId } from '../types/soundboard.js';
import type { PlayerAdapter } from '../player/player-adapter.js';
import type { ILogger } from '../utils/logger.js';
import type { KeySource } from './key-source.js';
import { KeyBindingTable, COMMAND_KEYS, DEFAULT_KEY_SET } from './key-binding-table.js';
import { GroupCatalog } from './group-catalog.js';
import { PlaybackStateMachine } from './playback-state-machine.js';
import { EventDispatcher, DEFAULT_TICK_MS, sleep } from './event-dispatcher.js';
import { createGlobalState } from './global-state.js';
import { listAudioFiles, parseSoundFiles } from './sound-files.js';
import { waitForReady, type ReadinessReport } from './readiness.js';
import { renderBindingTable } from '../utils/formatter.js';

/**
 * Anything that can show progress while sounds load; an ora spinner fits.
 */
export interface ProgressIndicator {
  start(text?: string): unknown;
  succeed(text?: string): unknown;
  warn(text?: string): unknown;
}

export interface SessionOptions {
  dir: string;
  tickMs?: number;
  readyTimeoutMs?: number;
  /** Mark every group with the reserved random mode */
  random?: boolean;
  keys?: readonly KeyId[];
}

export interface SessionDeps {
  player: PlayerAdapter;
  logger: ILogger;
  createKeySource: () => KeySource;
  progress?: ProgressIndicator;
  output?: (text: string) => void;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export const DEFAULT_READY_TIMEOUT_MS = 10_000;

/**
 * One soundboard run: startup, the dispatcher loop, teardown.
 *
 * Startup order: scan, catalog, bind, open and rewind every sound, wait for
 * readiness, stop everything, print the bindings.
 */
export class SoundboardSession {
  readonly globals: GlobalState = createGlobalState();
  readonly machine: PlaybackStateMachine;
  private released = false;

  private constructor(
    readonly bindings: KeyBindingTable,
    readonly catalog: GroupCatalog,
    readonly readiness: ReadinessReport,
    private readonly options: SessionOptions,
    private readonly deps: SessionDeps
  ) {
    this.machine = new PlaybackStateMachine(deps.logger.child({ component: 'playback' }));
  }

  static async start(options: SessionOptions, deps: SessionDeps): Promise<SoundboardSession> {
    const { logger } = deps;
    const output = deps.output ?? ((text: string) => console.log(text));

    const paths = listAudioFiles(options.dir, logger);
    const files = parseSoundFiles(paths);
    logger.debug('Using player', { player: deps.player.name });
    logger.debug('Scanned sound directory', { dir: options.dir, audioFiles: paths.length, matching: files.length });

    // Throws ConfigError on an unusable key set; nothing else is fatal.
    const bindings = new KeyBindingTable(logger.child({ component: 'bindings' }), options.keys ?? DEFAULT_KEY_SET, COMMAND_KEYS);
    const catalog = GroupCatalog.build(files, bindings, deps.player, logger.child({ component: 'catalog' }));

    if (options.random) {
      logger.info('Random mode is reserved and plays sequentially');
      for (const group of catalog.groups) group.mode = 'random';
    }

    const handles = catalog.handles();
    deps.progress?.start(`Loading ${handles.length} sounds...`);
    const readiness = await waitForReady(handles, {
      timeoutMs: options.readyTimeoutMs ?? DEFAULT_READY_TIMEOUT_MS,
      sleep: deps.sleep ?? sleep,
      now: deps.now,
    }, logger);
    if (readiness.unready.length > 0) {
      deps.progress?.warn(`${readiness.ready} of ${handles.length} sounds ready`);
    } else {
      deps.progress?.succeed(`${handles.length} sounds ready`);
    }

    const session = new SoundboardSession(bindings, catalog, readiness, options, deps);
    session.machine.stopAll(bindings.groups());
    output(renderBindingTable(bindings.rows(), session.globals));
    return session;
  }

  /**
   * Run the dispatcher until the exit key, then tear down.
   */
  async run(): Promise<void> {
    const keys = this.deps.createKeySource();
    const dispatcher = new EventDispatcher(this.bindings, this.machine, this.globals, keys, this.deps.logger, {
      tickMs: this.options.tickMs ?? DEFAULT_TICK_MS,
      sleep: this.deps.sleep,
      output: this.deps.output,
    });

    try {
      await dispatcher.run();
    } finally {
      keys.close();
      this.shutdown();
    }
  }

  /**
   * Stop everything and release every sound. Safe to call twice.
   */
  shutdown(): void {
    if (this.released) return;
    this.released = true;

    this.machine.stopAll(this.catalog.groups);
    let failures = 0;
    for (const handle of this.catalog.handles()) {
      try {
        handle.release();
      } catch (err) {
        failures++;
        this.deps.logger.error('Could not release sound', err instanceof Error ? err : undefined, { path: handle.path });
      }
    }

    const output = this.deps.output ?? ((text: string) => console.log(text));
    output(chalk.green(`Released ${this.catalog.handles().length - failures} sounds. Bye.`));
  }
}
