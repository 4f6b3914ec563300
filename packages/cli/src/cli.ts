/**
 * Command line argument parsing and CLI setup for bazelify.
 *
 * This module defines the CLI commands and their options using commander.js.
 * It exports the parsed option type the command runner consumes.
 */

import { Command } from 'commander';
import { VERSION } from '@bazelify/utils';

/**
 * What a command does with the translated manifests.
 *
 * - `generate`: write the build files
 * - `check`: compare the build files against regeneration, write nothing
 * - `print`: write the build file of one manifest to stdout
 */
export type CommandMode = 'generate' | 'check' | 'print';

/**
 * Parsed options shared by every command.
 */
export interface CommandOptions {
    /** Manifests (or package directories) given on the command line. */
    manifests: string[];
    /** Repository root. Found from the working directory when omitted. */
    repoRoot?: string;
    /** Configuration file. Defaults to `bazelify.config.json` at the root. */
    config?: string;
    /** Features to enable in addition to `default`. */
    features: string[];
    /** Whether the `default` feature is enabled. */
    defaultFeatures: boolean;
    /** Enable verbose logging. */
    verbose: boolean;
}

/**
 * Options as commander hands them over, before normalization.
 */
interface RawCommandOptions {
    repoRoot?: string;
    config?: string;
    features?: string[];
    defaultFeatures?: boolean;
    verbose?: boolean;
}

/**
 * Runs a command once its arguments are parsed.
 */
export type CommandRunner = (
    mode: CommandMode,
    options: CommandOptions,
) => Promise<void>;

/**
 * Splits `--features a,b --features c` into `['a', 'b', 'c']`.
 */
function splitFeatures(values: readonly string[] | undefined): string[] {
    return (values ?? [])
        .flatMap((value) => value.split(/[\s,]+/))
        .filter((feature) => feature.length > 0);
}

function normalizeOptions(
    manifests: string[],
    options: RawCommandOptions,
): CommandOptions {
    return {
        manifests,
        repoRoot: options.repoRoot,
        config: options.config,
        features: splitFeatures(options.features),
        defaultFeatures: options.defaultFeatures !== false,
        verbose: options.verbose || false,
    };
}

function withSharedOptions(command: Command): Command {
    return command
        .option(
            '-r, --repo-root <dir>',
            'Repository root (default: nearest directory with MODULE.bazel, WORKSPACE.bazel or WORKSPACE)',
        )
        .option(
            '-c, --config <file>',
            'Configuration file (default: <repo-root>/bazelify.config.json)',
        )
        .option(
            '--features <names...>',
            'Features to enable, space or comma separated',
        )
        .option('--no-default-features', 'Do not enable the default feature')
        .option('-v, --verbose', 'Enable verbose logging', false);
}

/**
 * Creates the `bazelify` program.
 *
 * @param run - Invoked with the parsed options of the selected command
 *
 * @example
 * ```typescript
 * const program = createProgram(async (mode, options) => {
 *     process.exitCode = await runCommand(mode, options, {
 *         cwd: process.cwd(),
 *         logger: new Logger(),
 *     });
 * });
 * await program.parseAsync(process.argv);
 * ```
 */
export function createProgram(run: CommandRunner): Command {
    const program = new Command();

    program
        .name('bazelify')
        .description('Generate Bazel rules_rust BUILD files from Cargo manifests')
        .version(VERSION);

    withSharedOptions(
        program
            .command('generate')
            .description('Write the build file of every manifest')
            .argument(
                '[manifests...]',
                'Manifests or package directories (default: every Cargo.toml under the repository root)',
            ),
    ).action(async (manifests: string[], options: RawCommandOptions) => {
        await run('generate', normalizeOptions(manifests, options));
    });

    withSharedOptions(
        program
            .command('check')
            .description(
                'Check that every build file matches its manifest, without writing',
            )
            .argument(
                '[manifests...]',
                'Manifests or package directories (default: every Cargo.toml under the repository root)',
            ),
    ).action(async (manifests: string[], options: RawCommandOptions) => {
        await run('check', normalizeOptions(manifests, options));
    });

    withSharedOptions(
        program
            .command('print')
            .description('Print the build file of one manifest to stdout')
            .argument('<manifest>', 'Manifest or package directory'),
    ).action(async (manifest: string, options: RawCommandOptions) => {
        await run('print', normalizeOptions([manifest], options));
    });

    return program;
}
