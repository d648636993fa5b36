import { Command } from 'commander';
import ora from 'ora';
import { config } from '../config.js';
import { ConsoleLogger } from '../utils/logger.js';
import { handleError } from '../utils/errors.js';
import { validateLogLevel, validateMilliseconds, validateRequired } from '../utils/validation.js';
import { outputJSON, outputTable, commandLegendRows, renderBindingTable } from '../utils/formatter.js';
import { ProcessPlayerAdapter } from '../player/process-player.js';
import { SilentPlayerAdapter } from '../player/silent-player.js';
import type { PlayerAdapter } from '../player/player-adapter.js';
import { SoundboardSession } from '../services/soundboard-session.js';
import { TerminalKeySource } from '../services/key-source.js';
import { KeyBindingTable, COMMAND_KEYS } from '../services/key-binding-table.js';
import { GroupCatalog } from '../services/group-catalog.js';
import { listAudioFiles, parseSoundFiles } from '../services/sound-files.js';

interface PlayCommandOptions {
    tick?: string;
    readyTimeout?: string;
    player?: string;
    probe?: string;
    mute?: boolean;
    random?: boolean;
    logLevel?: string;
}

interface ListCommandOptions {
    logLevel?: string;
}

export function registerBoardCommands(program: Command) {
    program.command('play [dir]', { isDefault: true })
        .description('Load a sound directory and play it from the keyboard')
        .option('--tick <ms>', 'Poll interval and loop tick period')
        .option('--ready-timeout <ms>', 'How long to wait for each sound to load')
        .option('--player <cmd>', 'Player executable')
        .option('--probe <cmd>', 'Duration probe executable')
        .option('--mute', 'Run without audio output')
        .option('--random', 'Use the reserved random mode (plays sequentially)')
        .option('--log-level <level>', 'error, warn, info or debug')
        .action(async (dir: string | undefined, cmdOpts: PlayCommandOptions) => {
            const isJson = Boolean(program.opts().json);

            try {
                const soundsDir = validateRequired(dir ?? config.soundsDir, 'dir');
                const tickMs = validateMilliseconds(cmdOpts.tick, 'tick', config.tickMs);
                const readyTimeoutMs = validateMilliseconds(cmdOpts.readyTimeout, 'ready-timeout', config.readyTimeoutMs);
                const logger = new ConsoleLogger(validateLogLevel(cmdOpts.logLevel, config.logLevel));

                const player: PlayerAdapter = cmdOpts.mute
                    ? new SilentPlayerAdapter()
                    : new ProcessPlayerAdapter(logger.child({ component: 'player' }), {
                        command: cmdOpts.player || config.player,
                        probeCommand: cmdOpts.probe || config.probe,
                    });

                const session = await SoundboardSession.start(
                    { dir: soundsDir, tickMs, readyTimeoutMs, random: cmdOpts.random },
                    {
                        player,
                        logger,
                        createKeySource: () => new TerminalKeySource(),
                        progress: isJson ? undefined : ora(),
                    }
                );

                process.once('SIGTERM', () => {
                    session.shutdown();
                    process.exit(0);
                });

                await session.run();
                process.exit(0);
            } catch (err) {
                handleError(err, isJson);
            }
        });

    program.command('list [dir]')
        .description('Show which key each sound group is bound to')
        .option('--log-level <level>', 'error, warn, info or debug')
        .action((dir: string | undefined, cmdOpts: ListCommandOptions) => {
            const isJson = Boolean(program.opts().json);

            try {
                const soundsDir = validateRequired(dir ?? config.soundsDir, 'dir');
                const logger = new ConsoleLogger(validateLogLevel(cmdOpts.logLevel, isJson ? 'error' : config.logLevel));
                const bindings = new KeyBindingTable(logger);
                const catalog = GroupCatalog.build(
                    parseSoundFiles(listAudioFiles(soundsDir, logger)),
                    bindings,
                    new SilentPlayerAdapter(),
                    logger
                );

                if (isJson) {
                    outputJSON({ bindings: bindings.rows(), dropped: catalog.dropped });
                } else {
                    console.log(renderBindingTable(bindings.rows()));
                    if (catalog.dropped.length > 0) {
                        console.log(`Unbound groups: ${catalog.dropped.join(', ')}`);
                    }
                }
            } catch (err) {
                handleError(err, isJson);
            }
        });

    program.command('keys')
        .description('List the command keys')
        .action(() => {
            const isJson = Boolean(program.opts().json);
            if (isJson) {
                outputJSON(COMMAND_KEYS.map(([key, action]) => ({ key, action })));
            } else {
                outputTable(['Key', 'Action'], commandLegendRows(COMMAND_KEYS));
            }
        });
}
