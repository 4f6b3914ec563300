/**
 * Manifest Reader
 *
 * Parses `Cargo.toml` text into a validated {@link Manifest}. Keys the
 * reader does not understand are ignored (and reported through
 * `onUnknownKey`); forms that would change the generated build graph but
 * cannot be interpreted fail with {@link ManifestSchemaError}.
 */

import { readFile } from 'fs/promises';
import { parse, TomlError } from 'smol-toml';
import {
    EDITIONS,
    type Dependency,
    type DeclaredTargetKind,
    type Edition,
    type Manifest,
    type TargetDeclaration,
} from '@bazelify/types';
import { ManifestParseError, ManifestSchemaError } from './errors.js';
import { readDependencySection } from './dependency.js';
import {
    isWorkspaceInherited,
    joinField,
    readBoolean,
    readRequiredString,
    readString,
    readStringArray,
    readTable,
    readTableArray,
    reportUnknownKeys,
    type RawTable,
    type SchemaContext,
} from './fields.js';

/**
 * Options for {@link parseManifest}.
 */
export interface ParseManifestOptions {
    /** Path of the manifest, included in every error. */
    manifestPath?: string;
    /** Called with the dotted path of every key the reader ignores. */
    onUnknownKey?: (field: string) => void;
}

const DEV_SECTIONS = ['dev-dependencies', 'dev_dependencies'] as const;
const BUILD_SECTIONS = ['build-dependencies', 'build_dependencies'] as const;

const ROOT_KEYS = new Set([
    'package',
    'lib',
    'bin',
    'test',
    'bench',
    'example',
    'dependencies',
    ...DEV_SECTIONS,
    ...BUILD_SECTIONS,
    'target',
    'features',
    'workspace',
    'patch',
    'replace',
    'profile',
    'badges',
    'lints',
]);

const PACKAGE_KEYS = new Set([
    'name',
    'version',
    'edition',
    'build',
    'autolib',
    'authors',
    'description',
    'documentation',
    'homepage',
    'repository',
    'readme',
    'license',
    'license-file',
    'keywords',
    'categories',
    'workspace',
    'links',
    'exclude',
    'include',
    'publish',
    'metadata',
    'default-run',
    'autobins',
    'autoexamples',
    'autotests',
    'autobenches',
    'resolver',
    'rust-version',
]);

const TARGET_KEYS = new Set([
    'name',
    'path',
    'proc-macro',
    'proc_macro',
    'crate-type',
    'required-features',
    'edition',
    'test',
    'doctest',
    'bench',
    'doc',
    'harness',
    'plugin',
]);

/**
 * Parses and validates manifest text.
 *
 * @param text - The `Cargo.toml` content
 * @param options - Error context and unknown-key reporting
 * @returns The validated manifest
 * @throws {ManifestParseError} When the text is not valid TOML
 * @throws {ManifestSchemaError} When a field is missing, mistyped, or unsupported
 *
 * @example
 * ```typescript
 * const manifest = parseManifest(text, { manifestPath: 'rs/replica/Cargo.toml' });
 * console.log(manifest.dependencies.normal.map((dep) => dep.name));
 * ```
 */
export function parseManifest(
    text: string,
    options: ParseManifestOptions = {},
): Manifest {
    const ctx: SchemaContext = {
        manifestPath: options.manifestPath,
        onUnknownKey: options.onUnknownKey,
    };
    const root = parseToml(text, options.manifestPath);
    reportUnknownKeys(root, ROOT_KEYS, '', ctx);

    const pkg = readTable(root, 'package', '', ctx);
    if (!pkg) {
        throw new ManifestSchemaError(
            'package',
            'missing required table',
            ctx.manifestPath,
        );
    }
    reportUnknownKeys(pkg, PACKAGE_KEYS, 'package', ctx);

    const name = readRequiredString(pkg, 'name', 'package', ctx);
    const version = isWorkspaceInherited(pkg.version)
        ? undefined
        : readString(pkg, 'version', 'package', ctx);
    const edition =
        readEdition(pkg.edition, 'package.edition', ctx) ?? '2015';

    rejectPlatformDependencies(root, ctx);

    return {
        name,
        version,
        edition,
        targets: readTargets(root, name, pkg, ctx),
        dependencies: {
            normal: readSections(root, ['dependencies'], 'normal', ctx),
            dev: readSections(root, DEV_SECTIONS, 'dev', ctx),
            build: readSections(root, BUILD_SECTIONS, 'build', ctx),
        },
        features: readFeatures(root, ctx),
        buildScript: readBuildScript(pkg, ctx),
        manifestPath: options.manifestPath,
    };
}

/**
 * Reads and parses a manifest from disk.
 *
 * @param manifestPath - Path of the `Cargo.toml` file
 * @param options - Unknown-key reporting
 */
export async function readManifest(
    manifestPath: string,
    options: Omit<ParseManifestOptions, 'manifestPath'> = {},
): Promise<Manifest> {
    const text = await readFile(manifestPath, 'utf-8');
    return parseManifest(text, { ...options, manifestPath });
}

function parseToml(text: string, manifestPath?: string): RawTable {
    try {
        return parse(text);
    } catch (error) {
        if (error instanceof TomlError) {
            // smol-toml appends a code excerpt after the first line
            const [summary] = error.message.split('\n');
            throw new ManifestParseError(
                summary,
                manifestPath,
                error.line,
                error.column,
                error,
            );
        }
        throw error;
    }
}

function readEdition(
    value: unknown,
    field: string,
    ctx: SchemaContext,
): Edition | undefined {
    if (value === undefined) return undefined;
    if (isWorkspaceInherited(value)) {
        throw new ManifestSchemaError(
            field,
            'inheriting the edition from the workspace is not supported',
            ctx.manifestPath,
        );
    }
    const edition = EDITIONS.find((candidate) => candidate === value);
    if (edition === undefined) {
        throw new ManifestSchemaError(
            field,
            `unsupported edition ${JSON.stringify(value)} (expected one of ${EDITIONS.join(', ')})`,
            ctx.manifestPath,
        );
    }
    return edition;
}

function readBuildScript(
    pkg: RawTable,
    ctx: SchemaContext,
): string | undefined {
    const value = pkg.build;
    if (value === undefined || value === false) return undefined;
    if (value === true) return 'build.rs';
    if (typeof value === 'string') return value;
    throw new ManifestSchemaError(
        'package.build',
        'expected a path or a boolean',
        ctx.manifestPath,
    );
}

function readTargets(
    root: RawTable,
    packageName: string,
    pkg: RawTable,
    ctx: SchemaContext,
): TargetDeclaration[] {
    const targets: TargetDeclaration[] = [];

    const lib = readTable(root, 'lib', '', ctx);
    if (lib) {
        reportUnknownKeys(lib, TARGET_KEYS, 'lib', ctx);
        targets.push({
            kind: 'library',
            name: packageName,
            path: readString(lib, 'path', 'lib', ctx),
            procMacro:
                readBoolean(lib, 'proc-macro', 'lib', ctx) ??
                readBoolean(lib, 'proc_macro', 'lib', ctx) ??
                false,
            crateName: readString(lib, 'name', 'lib', ctx),
            requiredFeatures: [],
            edition: readEdition(lib.edition, 'lib.edition', ctx),
        });
    } else if (readBoolean(pkg, 'autolib', 'package', ctx) !== false) {
        targets.push({
            kind: 'library',
            name: packageName,
            procMacro: false,
            requiredFeatures: [],
        });
    }

    const declared: ReadonlyArray<[string, DeclaredTargetKind]> = [
        ['bin', 'binary'],
        ['test', 'test'],
        ['bench', 'bench'],
    ];
    for (const [key, kind] of declared) {
        const tables = readTableArray(root, key, '', ctx) ?? [];
        tables.forEach((table, index) => {
            const field = `${key}[${index}]`;
            reportUnknownKeys(table, TARGET_KEYS, field, ctx);
            targets.push({
                kind,
                name: readRequiredString(table, 'name', field, ctx),
                path: readString(table, 'path', field, ctx),
                procMacro: false,
                requiredFeatures:
                    readStringArray(table, 'required-features', field, ctx) ??
                    [],
                edition: readEdition(
                    table.edition,
                    joinField(field, 'edition'),
                    ctx,
                ),
            });
        });
    }

    return targets;
}

function readSections(
    root: RawTable,
    sections: readonly string[],
    role: Dependency['role'],
    ctx: SchemaContext,
): Dependency[] {
    return sections.flatMap((section) => {
        const table = readTable(root, section, '', ctx);
        return table ? readDependencySection(table, section, role, ctx) : [];
    });
}

function rejectPlatformDependencies(root: RawTable, ctx: SchemaContext): void {
    const target = readTable(root, 'target', '', ctx);
    if (!target) return;

    for (const platform of Object.keys(target)) {
        const platformField = joinField('target', platform);
        const table = readTable(target, platform, 'target', ctx);
        if (!table) continue;
        for (const section of [
            'dependencies',
            ...DEV_SECTIONS,
            ...BUILD_SECTIONS,
        ]) {
            if (table[section] !== undefined) {
                throw new ManifestSchemaError(
                    joinField(platformField, section),
                    'platform-specific dependencies are not supported',
                    ctx.manifestPath,
                );
            }
        }
    }
}

function readFeatures(
    root: RawTable,
    ctx: SchemaContext,
): Map<string, readonly string[]> {
    const features = new Map<string, readonly string[]>();
    const table = readTable(root, 'features', '', ctx);
    if (!table) return features;

    for (const name of Object.keys(table)) {
        const entries = readStringArray(table, name, 'features', ctx);
        features.set(name, entries ?? []);
    }
    return features;
}
