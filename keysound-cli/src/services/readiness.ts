import type { SoundHandle } from '../player/player-adapter.js';
import type { ILogger } from '../utils/logger.js';

export interface ReadinessOptions {
  /** Bound per handle, in milliseconds */
  timeoutMs: number;
  pollMs?: number;
  sleep: (ms: number) => Promise<void>;
  now?: () => number;
}

export interface ReadinessReport {
  ready: number;
  unready: SoundHandle[];
}

/**
 * Wait, handle by handle, until each reports ready, fails to load, or its
 * bound runs out. Handles that never become ready are reported and kept.
 */
export async function waitForReady(
  handles: SoundHandle[],
  options: ReadinessOptions,
  logger: ILogger
): Promise<ReadinessReport> {
  const pollMs = options.pollMs ?? 50;
  const now = options.now ?? Date.now;
  const unready: SoundHandle[] = [];

  for (const handle of handles) {
    const deadline = now() + options.timeoutMs;
    while (!handle.isReady() && !handle.hasFailed() && now() < deadline) {
      await options.sleep(pollMs);
    }
    if (handle.isReady()) continue;

    if (handle.hasFailed()) {
      logger.warn('Sound failed to load, playing it anyway', { path: handle.path });
    } else {
      logger.warn('Sound not ready in time, playing it anyway', { path: handle.path, timeoutMs: options.timeoutMs });
    }
    unready.push(handle);
  }

  return { ready: handles.length - unready.length, unready };
}
