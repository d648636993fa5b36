import { existsSync, readdirSync, statSync } from 'fs';
import { basename, join } from 'path';
import type { SoundFileDescriptor } from '../types/soundboard.js';
import type { ILogger } from '../utils/logger.js';

/** `PPP_NAME (N).ext`: order prefix, group name, informational index. */
export const SOUND_FILENAME_PATTERN = /^(\d{3})_(.+?) \(\d+\)\.(mp3|wav)$/;

const INDEX_PATTERN = / \((\d+)\)\.(?:mp3|wav)$/;
const AUDIO_EXTENSIONS = ['.wav', '.mp3'];

/**
 * Parse one file path against the sound filename grammar.
 * Returns null for names that do not conform.
 */
export function parseSoundFilename(path: string): SoundFileDescriptor | null {
  const fileName = basename(path);
  const match = SOUND_FILENAME_PATTERN.exec(fileName);
  if (!match) return null;

  const [, prefix, name, extension] = match;
  const index = INDEX_PATTERN.exec(fileName)?.[1] ?? '';
  if (extension !== 'mp3' && extension !== 'wav') return null;

  return { prefix, name, index, extension, path };
}

/**
 * List `.wav` and `.mp3` files of a directory, sorted by name.
 * A missing directory is reported and yields an empty list.
 */
export function listAudioFiles(dir: string, logger: ILogger): string[] {
  if (!existsSync(dir)) {
    logger.warn('Sound directory does not exist', { dir });
    return [];
  }

  let entries: string[];
  try {
    entries = readdirSync(dir);
  } catch (err) {
    logger.error('Could not read sound directory', err instanceof Error ? err : undefined, { dir });
    return [];
  }

  const files = entries
    .filter((entry) => AUDIO_EXTENSIONS.some((ext) => entry.toLowerCase().endsWith(ext)))
    .sort()
    .map((entry) => join(dir, entry))
    .filter((path) => {
      try {
        return statSync(path).isFile();
      } catch {
        return false;
      }
    });

  if (files.length === 0) {
    logger.warn('No audio files found', { dir });
  }
  return files;
}

/**
 * Parse listed files in order, silently skipping non-conforming names.
 */
export function parseSoundFiles(paths: string[]): SoundFileDescriptor[] {
  const descriptors: SoundFileDescriptor[] = [];
  for (const path of paths) {
    const descriptor = parseSoundFilename(path);
    if (descriptor) descriptors.push(descriptor);
  }
  return descriptors;
}
