import dotenv from 'dotenv';
import path from 'path';
import os from 'os';
import { isLogLevel, type LogLevel } from './utils/logger.js';

// Load env vars from CWD .env, then the per-user config file
dotenv.config();
dotenv.config({ path: path.join(os.homedir(), '.keysound', 'config') });

/**
 * Parse a positive integer, falling back when the value is missing or unusable.
 */
export function positiveInt(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  return Number.isInteger(value) && value > 0 ? value : fallback;
}

export const config = {
  get soundsDir() {
    return process.env.KEYSOUND_SOUNDS_DIR || './sounds';
  },
  get tickMs() {
    return positiveInt(process.env.KEYSOUND_TICK_MS, 100);
  },
  get readyTimeoutMs() {
    return positiveInt(process.env.KEYSOUND_READY_TIMEOUT_MS, 10_000);
  },
  get player() {
    return process.env.KEYSOUND_PLAYER || 'ffplay';
  },
  get probe() {
    return process.env.KEYSOUND_PROBE || 'ffprobe';
  },
  get debug() {
    return process.env.KEYSOUND_DEBUG === 'true';
  },
  get logLevel(): LogLevel {
    if (this.debug) return 'debug';
    const level = process.env.KEYSOUND_LOG_LEVEL;
    return level && isLogLevel(level) ? level : 'info';
  }
};
