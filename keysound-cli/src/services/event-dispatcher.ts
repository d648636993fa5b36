import chalk from 'chalk';
import type { CommandAction, GlobalState, KeyId } from '../types/soundboard.js';
import type { ILogger } from '../utils/logger.js';
import type { KeySource } from './key-source.js';
import type { KeyBindingTable } from './key-binding-table.js';
import type { PlaybackStateMachine, TriggerResult } from './playback-state-machine.js';
import { COMMAND_KEYS } from './key-binding-table.js';
import { toggleLoop, toggleStack } from './global-state.js';
import { onOff, renderBindingTable } from '../utils/formatter.js';

export type DispatchOutcome =
  | { type: 'idle' }
  | { type: 'command'; key: KeyId; action: CommandAction }
  | { type: 'trigger'; key: KeyId; group: string; result: TriggerResult }
  | { type: 'unbound'; key: KeyId };

export interface DispatcherOptions {
  /** Sleep between iterations, also the loop tick period */
  tickMs?: number;
  commandKeys?: ReadonlyArray<readonly [KeyId, CommandAction]>;
  sleep?: (ms: number) => Promise<void>;
  /** Where user-facing lines go (default console.log) */
  output?: (text: string) => void;
}

export const DEFAULT_TICK_MS = 100;

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Single-threaded poll loop: one key per iteration, then a short sleep, then
 * a loop tick over every bound group. Only the exit key ends the loop.
 */
export class EventDispatcher {
  private readonly tickMs: number;
  private readonly commandKeys: ReadonlyArray<readonly [KeyId, CommandAction]>;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly output: (text: string) => void;
  private running = false;
  private iterations = 0;

  constructor(
    private readonly bindings: KeyBindingTable,
    private readonly machine: PlaybackStateMachine,
    private readonly globals: GlobalState,
    private readonly keys: KeySource,
    private readonly logger: ILogger,
    options: DispatcherOptions = {}
  ) {
    this.tickMs = options.tickMs ?? DEFAULT_TICK_MS;
    this.commandKeys = options.commandKeys ?? COMMAND_KEYS;
    this.sleep = options.sleep ?? sleep;
    this.output = options.output ?? ((text) => console.log(text));
  }

  get isRunning(): boolean {
    return this.running;
  }

  get iterationCount(): number {
    return this.iterations;
  }

  commandFor(key: KeyId): CommandAction | undefined {
    return this.commandKeys.find(([candidate]) => candidate === key)?.[1];
  }

  /**
   * Apply one key press.
   */
  dispatchKey(key: KeyId): DispatchOutcome {
    const action = this.commandFor(key);
    if (action) {
      this.runCommand(action);
      return { type: 'command', key, action };
    }

    const group = this.bindings.lookup(key);
    if (!group) {
      this.logger.warn('No binding for key', { key });
      return { type: 'unbound', key };
    }

    const result = this.machine.triggerSequential(group, this.globals);
    if (result.kind === 'played') {
      this.logger.info('Playing', { key, group: group.name, index: result.index, loop: group.loopEnabled, stack: group.stackEnabled });
    }
    return { type: 'trigger', key, group: group.name, result };
  }

  /**
   * Poll once and dispatch whatever arrived.
   */
  step(): DispatchOutcome {
    const key = this.keys.poll();
    if (key === null) return { type: 'idle' };
    return this.dispatchKey(key);
  }

  tick(): number {
    return this.machine.loopTick(this.bindings.groups());
  }

  async run(): Promise<void> {
    this.running = true;
    this.logger.debug('Dispatcher started', { tickMs: this.tickMs });

    while (this.running) {
      this.iterations++;
      try {
        this.step();
      } catch (err) {
        this.logger.error('Key dispatch failed', err instanceof Error ? err : undefined);
      }
      if (!this.running) break;

      await this.sleep(this.tickMs);

      try {
        this.tick();
      } catch (err) {
        this.logger.error('Loop tick failed', err instanceof Error ? err : undefined);
      }
    }

    this.logger.debug('Dispatcher stopped', { iterations: this.iterations });
  }

  private runCommand(action: CommandAction): void {
    switch (action) {
      case 'exit':
        this.machine.stopAll(this.bindings.groups());
        this.running = false;
        this.logger.info('Exit requested');
        break;
      case 'stop-all':
        this.machine.stopAll(this.bindings.groups());
        this.output(chalk.red('All sounds stopped'));
        break;
      case 'show-bindings':
        this.output(renderBindingTable(this.bindings.rows(), this.globals));
        break;
      case 'toggle-loop':
        this.output(`${chalk.bold('Loop')}: ${onOff(toggleLoop(this.globals))}`);
        break;
      case 'toggle-stack':
        this.output(`${chalk.bold('Stack')}: ${onOff(toggleStack(this.globals))}`);
        break;
    }
  }
}
