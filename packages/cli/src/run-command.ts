/**
 * Command implementation
 *
 * Shared by `generate`, `check` and `print`: find the repository, load
 * the configuration, translate every manifest, then write, check or print.
 * Every manifest is translated before anything is written, so a failing
 * manifest leaves every build file untouched.
 */

import chalk from 'chalk';
import { readFile } from 'fs/promises';
import { basename, join, posix, resolve } from 'path';
import {
    BazelifyError,
    BazelifyErrorCode,
    DEPENDENCY_ROLES,
    type ResolvedDependencies,
} from '@bazelify/types';
import { dependencyKey } from '@bazelify/manifest';
import {
    checkBuildFile,
    translateManifest,
    writeBuildFile,
    type DriftDetectedError,
    type WriteOutcome,
} from '@bazelify/generator';
import type { CommandMode, CommandOptions } from './cli.js';
import { loadConfig, type BazelifyConfig } from './config.js';
import {
    MANIFEST_FILE_NAME,
    ROOT_MARKERS,
    discoverManifests,
    findRepoRoot,
    toRepoRelative,
} from './discovery.js';
import type { Logger } from './logger.js';

// ============================================================================
// TYPES
// ============================================================================

/**
 * Environment of a command run.
 */
export interface RunContext {
    /** Directory relative paths on the command line resolve against. */
    cwd: string;
    logger: Logger;
}

/**
 * A translated manifest, ready to be written or checked.
 */
interface PendingBuildFile {
    /** Manifest path relative to the repository root. */
    readonly manifestPath: string;
    readonly buildFilePath: string;
    readonly content: string;
}

// ============================================================================
// HELPERS
// ============================================================================

function toManifestPath(cwd: string, argument: string): string {
    const path = resolve(cwd, argument);
    return basename(path) === MANIFEST_FILE_NAME
        ? path
        : join(path, MANIFEST_FILE_NAME);
}

function packageDirOf(manifestPath: string): string {
    const dir = posix.dirname(manifestPath);
    return dir === '.' ? '' : dir;
}

async function readManifestText(
    absolutePath: string,
    manifestPath: string,
): Promise<string> {
    try {
        return await readFile(absolutePath, 'utf-8');
    } catch (error) {
        throw new BazelifyError(
            BazelifyErrorCode.MANIFEST_PARSE,
            `Cannot read manifest ${absolutePath}`,
            {
                manifestPath,
                cause: error instanceof Error ? error : undefined,
            },
        );
    }
}

function logDependencies(
    manifestPath: string,
    dependencies: ResolvedDependencies,
    logger: Logger,
): void {
    for (const role of DEPENDENCY_ROLES) {
        for (const resolved of dependencies[role]) {
            const { dependency } = resolved;
            const requirement = dependency.requirement ?? resolved.resolution;
            logger.verbose(
                `  ${manifestPath} [${role}] ${dependencyKey(dependency)} ${requirement} -> ${resolved.label}${resolved.isMacro ? ' (macro)' : ''}`,
            );
        }
    }
}

async function translateAll(
    repoRoot: string,
    manifestPaths: readonly string[],
    packageDirs: ReadonlySet<string>,
    config: BazelifyConfig,
    options: CommandOptions,
    logger: Logger,
): Promise<PendingBuildFile[]> {
    const pending: PendingBuildFile[] = [];

    for (const absolutePath of manifestPaths) {
        const manifestPath = toRepoRelative(repoRoot, absolutePath);
        if (manifestPath === undefined) {
            throw new BazelifyError(
                BazelifyErrorCode.UNRESOLVED_PATH,
                `Manifest ${absolutePath} is outside the repository root ${repoRoot}`,
                { manifestPath: absolutePath },
            );
        }

        const text = await readManifestText(absolutePath, manifestPath);
        const manifestDir = packageDirOf(manifestPath);
        const result = translateManifest(text, {
            manifestDir,
            manifestPath,
            externals: config.externals,
            packages: packageDirs,
            isMacro: config.isMacro,
            precedence: config.sourcePrecedence,
            labelStyle: config.labelStyle,
            rulesRepository: config.rulesRepository,
            features: {
                features: options.features,
                defaultFeatures: options.defaultFeatures,
            },
            onUnknownKey: (field) =>
                logger.verbose(`  ${manifestPath}: ignoring ${field}`),
        });

        logDependencies(manifestPath, result.dependencies, logger);
        pending.push({
            manifestPath,
            buildFilePath: join(
                repoRoot,
                manifestDir,
                config.buildFileName,
            ),
            content: result.content,
        });
    }

    return pending;
}

async function writeAll(
    pending: readonly PendingBuildFile[],
    logger: Logger,
): Promise<number> {
    const counts: Record<WriteOutcome, number> = {
        created: 0,
        updated: 0,
        unchanged: 0,
    };
    for (const file of pending) {
        const outcome = await writeBuildFile(file.buildFilePath, file.content);
        counts[outcome]++;
        logger.verbose(`  ${outcome}: ${file.buildFilePath}`);
    }
    logger.success(
        `Generated ${pending.length} build files (${counts.created} created, ${counts.updated} updated, ${counts.unchanged} unchanged)`,
    );
    return 0;
}

async function checkAll(
    pending: readonly PendingBuildFile[],
    logger: Logger,
): Promise<number> {
    const drifted: DriftDetectedError[] = [];
    for (const file of pending) {
        const result = await checkBuildFile(
            file.buildFilePath,
            file.content,
            file.manifestPath,
        );
        if (!result.ok) {
            drifted.push(result.error);
        }
    }

    if (drifted.length === 0) {
        logger.success(`All ${pending.length} build files are up to date`);
        return 0;
    }

    for (const drift of drifted) {
        logger.raw(drift.diff);
    }
    logger.error(
        `${drifted.length} of ${pending.length} build files are out of date:`,
    );
    for (const drift of drifted) {
        logger.error(
            `  ${drift.buildFilePath}${drift.missing ? ' (missing)' : ''}`,
        );
    }
    logger.info('Run `bazelify generate` to update them.');
    return 1;
}

// ============================================================================
// MAIN
// ============================================================================

/**
 * Runs one command.
 *
 * @returns The process exit code: 0 on success, 1 on any error or drift
 */
export async function runCommand(
    mode: CommandMode,
    options: CommandOptions,
    { cwd, logger }: RunContext,
): Promise<number> {
    const repoRoot =
        options.repoRoot !== undefined
            ? resolve(cwd, options.repoRoot)
            : findRepoRoot(cwd);
    if (repoRoot === undefined) {
        logger.error(
            `No repository root found above ${cwd} (looked for ${ROOT_MARKERS.join(', ')}); pass --repo-root`,
        );
        return 1;
    }

    try {
        const config = await loadConfig(
            repoRoot,
            options.config !== undefined
                ? resolve(cwd, options.config)
                : undefined,
        );

        const allManifests = await discoverManifests(repoRoot);
        const packageDirs = new Set(
            allManifests.flatMap((path) => {
                const relativePath = toRepoRelative(repoRoot, path);
                return relativePath === undefined
                    ? []
                    : [packageDirOf(relativePath)];
            }),
        );
        const manifestPaths =
            options.manifests.length > 0
                ? options.manifests.map((argument) =>
                      toManifestPath(cwd, argument),
                  )
                : allManifests;

        if (manifestPaths.length === 0) {
            logger.warn(`No ${MANIFEST_FILE_NAME} found under ${repoRoot}`);
            return 0;
        }

        logger.verbose(`Repository root: ${repoRoot}`);
        const spinner =
            mode === 'print'
                ? undefined
                : logger.spinner(
                      `Translating ${chalk.bold(manifestPaths.length)} manifests...`,
                  );
        let pending: PendingBuildFile[];
        try {
            pending = await translateAll(
                repoRoot,
                manifestPaths,
                packageDirs,
                config,
                options,
                logger,
            );
        } catch (error) {
            if (spinner) {
                logger.stopSpinner(spinner, {
                    status: 'fail',
                    text: 'Translation failed',
                });
            }
            throw error;
        }
        if (spinner) {
            logger.stopSpinner(spinner, {
                status: 'succeed',
                text: `Translated ${chalk.bold(pending.length)} manifests`,
            });
        }

        switch (mode) {
            case 'generate':
                return await writeAll(pending, logger);
            case 'check':
                return await checkAll(pending, logger);
            case 'print':
                for (const file of pending) {
                    logger.raw(file.content.replace(/\n$/, ''));
                }
                return 0;
        }
    } catch (error) {
        if (error instanceof BazelifyError) {
            logger.error(error.toDetailedString());
            return 1;
        }
        throw error;
    }
}
