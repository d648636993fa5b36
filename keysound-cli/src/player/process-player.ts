import { spawn, execFile } from 'child_process';
import { promisify } from 'util';
import type { PlayerAdapter, SoundHandle } from './player-adapter.js';
import type { ILogger } from '../utils/logger.js';
import { PlaybackError } from '../utils/errors.js';

const execFileAsync = promisify(execFile);

export interface PlayerExit {
  code: number | null;
  error?: Error;
}

/**
 * Minimal view of a spawned player process.
 */
export interface PlayerProcess {
  onExit(listener: (exit: PlayerExit) => void): void;
  kill(): void;
}

export type SpawnPlayer = (command: string, args: string[]) => PlayerProcess;
export type ProbeDuration = (probeCommand: string, path: string) => Promise<number>;

export interface ProcessPlayerOptions {
  /** Player executable (default `ffplay`) */
  command?: string;
  /** Duration probe executable (default `ffprobe`) */
  probeCommand?: string;
  /** Builds the player arguments for a file and start offset in seconds */
  buildArgs?: (path: string, startSeconds: number) => string[];
  spawnPlayer?: SpawnPlayer;
  probeDuration?: ProbeDuration;
  /** Probes allowed to run at the same time (default 4) */
  maxConcurrentProbes?: number;
  now?: () => number;
}

export const DEFAULT_MAX_CONCURRENT_PROBES = 4;

export function ffplayArgs(path: string, startSeconds: number): string[] {
  return ['-nodisp', '-autoexit', '-loglevel', 'quiet', '-ss', startSeconds.toFixed(3), path];
}

export const spawnPlayerProcess: SpawnPlayer = (command, args) => {
  const child = spawn(command, args, { stdio: 'ignore' });
  return {
    onExit(listener) {
      let settled = false;
      child.once('exit', (code) => {
        if (settled) return;
        settled = true;
        listener({ code });
      });
      child.once('error', (error) => {
        if (settled) return;
        settled = true;
        listener({ code: null, error });
      });
    },
    kill() {
      child.kill('SIGTERM');
    },
  };
};

/**
 * Reads the container duration with ffprobe, in milliseconds.
 */
export const probeWithFfprobe: ProbeDuration = async (probeCommand, path) => {
  const { stdout } = await execFileAsync(probeCommand, [
    '-v', 'error',
    '-show_entries', 'format=duration',
    '-of', 'default=noprint_wrappers=1:nokey=1',
    path,
  ]);
  const seconds = parseFloat(stdout.toString().trim());
  if (!Number.isFinite(seconds) || seconds < 0) {
    throw new PlaybackError(`Could not read duration of ${path}`, { output: stdout.toString() });
  }
  return Math.round(seconds * 1000);
};

class ProcessSoundHandle implements SoundHandle {
  private offsetMs = 0;
  private startedAt = 0;
  private current: PlayerProcess | null = null;
  private ended = false;
  private released = false;
  private ready = false;
  private failed = false;
  private durationMs: number | null = null;

  constructor(
    readonly path: string,
    private readonly adapter: ProcessPlayerAdapter,
    private readonly logger: ILogger
  ) {}

  markReady(durationMs: number): void {
    this.durationMs = durationMs;
    this.ready = true;
  }

  markFailed(): void {
    this.failed = true;
  }

  play(): void {
    this.assertLive('play');
    if (this.ended) {
      this.offsetMs = 0;
      this.ended = false;
    }
    this.launch();
  }

  stop(): void {
    this.assertLive('stop');
    this.halt();
    this.offsetMs = 0;
    this.ended = false;
  }

  seek(positionMs: number): void {
    this.assertLive('seek');
    const wasPlaying = this.current !== null;
    this.halt();
    this.offsetMs = Math.max(0, positionMs);
    this.ended = false;
    if (wasPlaying) this.launch();
  }

  position(): number {
    if (this.current) {
      const elapsed = this.offsetMs + (this.adapter.now() - this.startedAt);
      return this.durationMs === null ? elapsed : Math.min(elapsed, this.durationMs);
    }
    if (this.ended) return this.durationMs ?? this.offsetMs;
    return this.offsetMs;
  }

  duration(): number | null {
    return this.durationMs;
  }

  isAtStart(): boolean {
    return this.position() === 0;
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
    return this.current !== null;
  }

  release(): void {
    if (this.released) return;
    this.halt();
    this.released = true;
  }

  private launch(): void {
    this.halt();
    const proc = this.adapter.spawn(this.path, this.offsetMs / 1000);
    this.current = proc;
    this.startedAt = this.adapter.now();
    proc.onExit((exit) => {
      // A replaced or stopped process exiting is not a natural end.
      if (this.current !== proc) return;
      this.current = null;
      if (exit.error) {
        this.logger.error('Player process failed', exit.error, { path: this.path });
        return;
      }
      // A non-zero exit is a failure, not a natural end.
      if (exit.code !== null && exit.code !== 0) {
        this.logger.error('Player exited with an error', undefined, { path: this.path, code: exit.code });
        return;
      }
      this.ended = true;
    });
  }

  private halt(): void {
    const proc = this.current;
    if (!proc) return;
    this.current = null;
    proc.kill();
  }

  private assertLive(operation: string): void {
    if (this.released) {
      throw new PlaybackError(`Cannot ${operation} a released sound`, { path: this.path });
    }
  }
}

/**
 * Plays every handle through its own external player process (ffplay by default).
 *
 * Natural end is the player exiting on its own; `stop` and `seek` kill the
 * running process first so their exits are ignored.
 */
export class ProcessPlayerAdapter implements PlayerAdapter {
  readonly name = 'process';
  private readonly command: string;
  private readonly probeCommand: string;
  private readonly buildArgs: (path: string, startSeconds: number) => string[];
  private readonly spawnPlayer: SpawnPlayer;
  private readonly probeDuration: ProbeDuration;
  private readonly maxConcurrentProbes: number;
  private readonly pendingProbes: ProcessSoundHandle[] = [];
  private activeProbes = 0;
  readonly now: () => number;

  constructor(private readonly logger: ILogger, options: ProcessPlayerOptions = {}) {
    this.command = options.command || 'ffplay';
    this.probeCommand = options.probeCommand || 'ffprobe';
    this.buildArgs = options.buildArgs || ffplayArgs;
    this.spawnPlayer = options.spawnPlayer || spawnPlayerProcess;
    this.probeDuration = options.probeDuration || probeWithFfprobe;
    this.maxConcurrentProbes = Math.max(1, options.maxConcurrentProbes ?? DEFAULT_MAX_CONCURRENT_PROBES);
    this.now = options.now || Date.now;
  }

  open(path: string): SoundHandle {
    const handle = new ProcessSoundHandle(path, this, this.logger);
    this.pendingProbes.push(handle);
    this.drainProbes();
    return handle;
  }

  spawn(path: string, startSeconds: number): PlayerProcess {
    this.logger.debug('Spawning player', { command: this.command, path, startSeconds });
    return this.spawnPlayer(this.command, this.buildArgs(path, startSeconds));
  }

  private drainProbes(): void {
    while (this.activeProbes < this.maxConcurrentProbes) {
      const handle = this.pendingProbes.shift();
      if (!handle) return;
      this.activeProbes++;
      void this.probe(handle).finally(() => {
        this.activeProbes--;
        this.drainProbes();
      });
    }
  }

  /** Never rejects: a failed probe marks the handle instead. */
  private async probe(handle: ProcessSoundHandle): Promise<void> {
    try {
      handle.markReady(await this.probeDuration(this.probeCommand, handle.path));
    } catch (err) {
      handle.markFailed();
      this.logger.warn('Could not probe sound, it stays unready', {
        path: handle.path,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }
}
