/**
 * Repository configuration (`bazelify.config.json`).
 *
 * The configuration carries the external name-to-label mapping and the
 * policies the pipeline leaves open. It is read once per invocation and
 * turned into immutable values before any manifest is translated.
 */

import { readFile } from 'fs/promises';
import { join } from 'path';
import { BazelifyError, BazelifyErrorCode } from '@bazelify/types';
import {
    ExternalLabelIndex,
    createMacroPredicate,
    type LabelStyle,
    type MacroPredicate,
    type SourcePrecedence,
} from '@bazelify/resolver';
import { DEFAULT_RULES_REPOSITORY } from '@bazelify/generator';

/** Name of the configuration file at the repository root. */
export const CONFIG_FILE_NAME = 'bazelify.config.json';

const SOURCE_PRECEDENCES: readonly SourcePrecedence[] = ['path-wins', 'strict'];
const LABEL_STYLES: readonly LabelStyle[] = ['full', 'compact'];

/**
 * Error thrown when the configuration file cannot be read or is invalid.
 */
export class ConfigError extends BazelifyError {
    readonly name = 'ConfigError';

    /**
     * @param configPath - Path of the configuration file
     * @param problems - Every problem found, one per entry
     * @param cause - Underlying read or parse error, if any
     */
    constructor(
        public readonly configPath: string,
        public readonly problems: readonly string[],
        cause?: Error,
    ) {
        super(
            BazelifyErrorCode.INVALID_CONFIG,
            `Invalid configuration ${configPath}: ${problems.join('; ')}`,
            { cause },
        );
    }
}

/**
 * Configuration as written in the file, before validation.
 */
interface RawConfig {
    externalPrefix?: unknown;
    crates?: unknown;
    labels?: unknown;
    macroCrates?: unknown;
    sourcePrecedence?: unknown;
    labelStyle?: unknown;
    buildFileName?: unknown;
    rulesRepository?: unknown;
    [key: string]: unknown;
}

const KNOWN_KEYS = new Set([
    'externalPrefix',
    'crates',
    'labels',
    'macroCrates',
    'sourcePrecedence',
    'labelStyle',
    'buildFileName',
    'rulesRepository',
]);

/**
 * Validated configuration.
 */
export interface BazelifyConfig {
    /** External crate names to labels. */
    readonly externals: ExternalLabelIndex;
    readonly isMacro: MacroPredicate;
    readonly sourcePrecedence: SourcePrecedence;
    readonly labelStyle: LabelStyle;
    /** File name of generated build files. */
    readonly buildFileName: string;
    readonly rulesRepository: string;
}

/**
 * Configuration used when no configuration file exists: no external
 * crates, only path dependencies resolve.
 */
export const DEFAULT_CONFIG: BazelifyConfig = {
    externals: ExternalLabelIndex.fromEntries([]),
    isMacro: createMacroPredicate([]),
    sourcePrecedence: 'path-wins',
    labelStyle: 'full',
    buildFileName: 'BUILD.bazel',
    rulesRepository: DEFAULT_RULES_REPOSITORY,
};

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
    return (
        Array.isArray(value) && value.every((item) => typeof item === 'string')
    );
}

function readOptionalString(
    raw: RawConfig,
    key: keyof RawConfig & string,
    problems: string[],
): string | undefined {
    const value = raw[key];
    if (value === undefined) return undefined;
    if (typeof value === 'string' && value.length > 0) return value;
    problems.push(`${key} must be a non-empty string`);
    return undefined;
}

function readOptionalChoice<T extends string>(
    raw: RawConfig,
    key: keyof RawConfig & string,
    choices: readonly T[],
    problems: string[],
): T | undefined {
    const value = raw[key];
    if (value === undefined) return undefined;
    const choice = choices.find((candidate) => candidate === value);
    if (choice === undefined) {
        problems.push(`${key} must be one of ${choices.join(', ')}`);
    }
    return choice;
}

function readOptionalNames(
    raw: RawConfig,
    key: keyof RawConfig & string,
    problems: string[],
): string[] {
    const value = raw[key];
    if (value === undefined) return [];
    if (isStringArray(value)) return value;
    problems.push(`${key} must be an array of strings`);
    return [];
}

function readLabels(
    raw: RawConfig,
    problems: string[],
): Array<[string, string]> {
    const value = raw.labels;
    if (value === undefined) return [];
    if (!isRecord(value)) {
        problems.push('labels must be an object mapping crate names to labels');
        return [];
    }
    const entries: Array<[string, string]> = [];
    for (const [name, label] of Object.entries(value)) {
        if (typeof label === 'string' && label.length > 0) {
            entries.push([name, label]);
        } else {
            problems.push(`labels.${name} must be a non-empty string`);
        }
    }
    return entries;
}

/**
 * Validates parsed configuration JSON.
 *
 * Every problem is collected before failing, so one run reports them all.
 *
 * @param raw - Parsed JSON
 * @param configPath - Path of the configuration file, for error messages
 * @throws {ConfigError} When the configuration is invalid
 */
export function validateConfig(raw: unknown, configPath: string): BazelifyConfig {
    if (!isRecord(raw)) {
        throw new ConfigError(configPath, ['expected a JSON object']);
    }
    const config: RawConfig = raw;
    const problems: string[] = [];

    for (const key of Object.keys(config)) {
        if (!KNOWN_KEYS.has(key)) {
            problems.push(`unknown key "${key}"`);
        }
    }

    const externalPrefix = readOptionalString(config, 'externalPrefix', problems);
    const crates = readOptionalNames(config, 'crates', problems);
    const labels = readLabels(config, problems);
    const macroCrates = readOptionalNames(config, 'macroCrates', problems);
    const sourcePrecedence = readOptionalChoice(
        config,
        'sourcePrecedence',
        SOURCE_PRECEDENCES,
        problems,
    );
    const labelStyle = readOptionalChoice(
        config,
        'labelStyle',
        LABEL_STYLES,
        problems,
    );
    const buildFileName = readOptionalString(config, 'buildFileName', problems);
    const rulesRepository = readOptionalString(
        config,
        'rulesRepository',
        problems,
    );

    if (crates.length > 0 && externalPrefix === undefined) {
        problems.push('crates requires externalPrefix');
    }
    if (buildFileName !== undefined && /[\\/]/.test(buildFileName)) {
        problems.push('buildFileName must be a file name, not a path');
    }

    if (problems.length > 0) {
        throw new ConfigError(configPath, problems);
    }

    const externals = ExternalLabelIndex.fromPrefix(
        externalPrefix ?? '',
        crates,
    ).merge(ExternalLabelIndex.fromEntries(labels));

    return {
        externals,
        isMacro: createMacroPredicate(macroCrates),
        sourcePrecedence: sourcePrecedence ?? DEFAULT_CONFIG.sourcePrecedence,
        labelStyle: labelStyle ?? DEFAULT_CONFIG.labelStyle,
        buildFileName: buildFileName ?? DEFAULT_CONFIG.buildFileName,
        rulesRepository: rulesRepository ?? DEFAULT_CONFIG.rulesRepository,
    };
}

/**
 * Loads the configuration of a repository.
 *
 * @param repoRoot - Repository root directory
 * @param configPath - Explicit configuration file; when given it must exist
 * @returns The validated configuration, or {@link DEFAULT_CONFIG} when the
 *          default file does not exist
 * @throws {ConfigError} When the file cannot be read or is invalid
 */
export async function loadConfig(
    repoRoot: string,
    configPath?: string,
): Promise<BazelifyConfig> {
    const path = configPath ?? join(repoRoot, CONFIG_FILE_NAME);

    let text: string;
    try {
        text = await readFile(path, 'utf-8');
    } catch (error) {
        const missing =
            error instanceof Error && 'code' in error && error.code === 'ENOENT';
        if (missing && configPath === undefined) {
            return DEFAULT_CONFIG;
        }
        throw new ConfigError(
            path,
            [missing ? 'file not found' : 'file cannot be read'],
            error instanceof Error ? error : undefined,
        );
    }

    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch (error) {
        throw new ConfigError(
            path,
            [`malformed JSON (${error instanceof Error ? error.message : String(error)})`],
            error instanceof Error ? error : undefined,
        );
    }
    return validateConfig(raw, path);
}
