#!/usr/bin/env node
import { Command } from 'commander';
import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { registerBoardCommands } from './commands/board.js';

function readVersion(): string {
  if (process.env.KEYSOUND_CLI_VERSION) return process.env.KEYSOUND_CLI_VERSION;
  const __dirname = dirname(fileURLToPath(import.meta.url));
  const pkg: unknown = JSON.parse(readFileSync(join(__dirname, '../package.json'), 'utf-8'));
  if (pkg && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

const program = new Command();

program
  .name('keysound')
  .description('Keyboard-driven soundboard for the terminal')
  .version(readVersion())
  .option('--json', 'Output results as JSON');

registerBoardCommands(program);

await program.parseAsync(process.argv);
