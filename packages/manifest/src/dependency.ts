/**
 * Dependency entry parsing.
 *
 * A dependency entry is either a bare version requirement
 * (`serde = "1.0"`) or a table (`serde = { version = "1.0", ... }`).
 * Both are first read into a tagged {@link DependencySpec}, then normalized
 * into the single {@link Dependency} shape every later stage consumes.
 */

import type { Dependency, DependencyRole, GitSource } from '@bazelify/types';
import { ManifestSchemaError } from './errors.js';
import {
    isTable,
    isWorkspaceInherited,
    joinField,
    readBoolean,
    readString,
    readStringArray,
    reportUnknownKeys,
    type RawTable,
    type SchemaContext,
} from './fields.js';

/**
 * A dependency entry as written in the manifest.
 */
export type DependencySpec =
    | { readonly form: 'requirement'; readonly requirement: string }
    | { readonly form: 'table'; readonly table: RawTable };

/**
 * Keys of a dependency table the reader interprets.
 */
const DEPENDENCY_TABLE_KEYS = new Set([
    'version',
    'path',
    'git',
    'branch',
    'tag',
    'rev',
    'registry',
    'package',
    'features',
    'default-features',
    'default_features',
    'optional',
    'proc-macro',
    'bazel-target',
    'public',
]);

/**
 * Reads a raw dependency entry into its tagged form.
 *
 * @param value - The raw TOML value
 * @param field - Dotted path of the entry (e.g. `dependencies.serde`)
 * @param key - Declared dependency name
 * @throws {ManifestSchemaError} When the entry is neither a string nor a table
 */
export function toDependencySpec(
    value: unknown,
    field: string,
    key: string,
    ctx: SchemaContext,
): DependencySpec {
    if (typeof value === 'string') {
        return { form: 'requirement', requirement: value };
    }
    if (isTable(value)) {
        return { form: 'table', table: value };
    }
    throw new ManifestSchemaError(
        field,
        'expected a version requirement string or a dependency table',
        ctx.manifestPath,
        key,
    );
}

/**
 * Normalizes a dependency entry.
 *
 * @param key - Declared dependency name (the TOML key)
 * @param spec - The tagged entry
 * @param role - The section the entry was declared in
 * @param field - Dotted path of the entry, for error messages
 * @throws {ManifestSchemaError} When the entry uses a form that cannot be translated
 */
export function normalizeDependency(
    key: string,
    spec: DependencySpec,
    role: DependencyRole,
    field: string,
    ctx: SchemaContext,
): Dependency {
    if (spec.form === 'requirement') {
        return {
            name: key,
            role,
            requirement: spec.requirement,
            features: [],
            defaultFeatures: true,
            optional: false,
            procMacro: false,
        };
    }

    const table = spec.table;
    const entryCtx: SchemaContext = { ...ctx, dependency: key };
    const fail = (subField: string, problem: string): never => {
        throw new ManifestSchemaError(
            joinField(field, subField),
            problem,
            ctx.manifestPath,
            key,
        );
    };

    // Workspace inheritance hides the real source, so the label cannot be known
    if (isWorkspaceInherited(table)) {
        fail(
            'workspace',
            'inheriting a dependency from the workspace is not supported',
        );
    }
    reportUnknownKeys(table, DEPENDENCY_TABLE_KEYS, field, entryCtx);

    const packageName = readString(table, 'package', field, entryCtx);
    const git = readGitSource(table, field, entryCtx, fail);
    const defaultFeatures =
        readBoolean(table, 'default-features', field, entryCtx) ??
        readBoolean(table, 'default_features', field, entryCtx) ??
        true;

    return {
        name: packageName ?? key,
        rename: packageName !== undefined ? key : undefined,
        role,
        requirement: readString(table, 'version', field, entryCtx),
        path: readString(table, 'path', field, entryCtx),
        git,
        registry: readString(table, 'registry', field, entryCtx),
        features: readStringArray(table, 'features', field, entryCtx) ?? [],
        defaultFeatures,
        optional: readBoolean(table, 'optional', field, entryCtx) ?? false,
        procMacro: readBoolean(table, 'proc-macro', field, entryCtx) ?? false,
        bazelTarget: readString(table, 'bazel-target', field, entryCtx),
    };
}

function readGitSource(
    table: RawTable,
    field: string,
    ctx: SchemaContext,
    fail: (subField: string, problem: string) => never,
): GitSource | undefined {
    const url = readString(table, 'git', field, ctx);
    const branch = readString(table, 'branch', field, ctx);
    const tag = readString(table, 'tag', field, ctx);
    const rev = readString(table, 'rev', field, ctx);

    if (url === undefined) {
        const orphan = [
            branch !== undefined ? 'branch' : undefined,
            tag !== undefined ? 'tag' : undefined,
            rev !== undefined ? 'rev' : undefined,
        ].find((name) => name !== undefined);
        if (orphan !== undefined) {
            fail(orphan, 'is only valid together with `git`');
        }
        return undefined;
    }

    const refs = [branch, tag, rev].filter((ref) => ref !== undefined);
    if (refs.length > 1) {
        fail('git', 'at most one of `branch`, `tag` or `rev` may be given');
    }
    return { url, branch, tag, rev };
}

/**
 * Reads every entry of a dependency section.
 *
 * @param section - The raw section table (e.g. `[dev-dependencies]`)
 * @param sectionField - Name of the section, for error messages
 * @param role - Role of every dependency in the section
 */
export function readDependencySection(
    section: RawTable,
    sectionField: string,
    role: DependencyRole,
    ctx: SchemaContext,
): Dependency[] {
    return Object.entries(section).map(([key, value]) => {
        const field = joinField(sectionField, key);
        const spec = toDependencySpec(value, field, key, ctx);
        return normalizeDependency(key, spec, role, field, ctx);
    });
}
