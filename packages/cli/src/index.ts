/**
 * Main entry point of the bazelify CLI.
 *
 * Wires argument parsing to the command runner and turns its result into
 * the process exit code.
 */

import { createProgram } from './cli.js';
import { Logger } from './logger.js';
import { runCommand } from './run-command.js';

export { createProgram } from './cli.js';
export type { CommandMode, CommandOptions, CommandRunner } from './cli.js';
export { runCommand, type RunContext } from './run-command.js';
export {
    loadConfig,
    validateConfig,
    ConfigError,
    CONFIG_FILE_NAME,
    DEFAULT_CONFIG,
    type BazelifyConfig,
} from './config.js';
export {
    findRepoRoot,
    discoverManifests,
    toRepoRelative,
    ROOT_MARKERS,
    MANIFEST_FILE_NAME,
} from './discovery.js';
export { Logger, type LoggerOptions } from './logger.js';

/**
 * Runs the CLI.
 *
 * @param argv - Full argument vector, `process.argv` style
 */
export async function main(argv: readonly string[] = process.argv): Promise<void> {
    const program = createProgram(async (mode, options) => {
        const logger = new Logger({ verbose: options.verbose });
        logger.setupSignalHandlers();
        try {
            process.exitCode = await runCommand(mode, options, {
                cwd: process.cwd(),
                logger,
            });
        } finally {
            logger.cleanup();
        }
    });
    await program.parseAsync(argv);
}
