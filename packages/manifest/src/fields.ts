/**
 * Manifest Field Readers
 *
 * Typed accessors over the raw TOML document. Every reader takes the
 * dotted path of the parent table so that a failure names the exact field.
 */

import { ManifestSchemaError } from './errors.js';

/**
 * A TOML table before validation.
 */
export type RawTable = Readonly<Record<string, unknown>>;

/**
 * Shared state for one manifest validation pass.
 */
export interface SchemaContext {
    /** Path of the manifest, included in every error. */
    readonly manifestPath?: string;
    /** Called with the dotted path of every key the reader does not understand. */
    readonly onUnknownKey?: (field: string) => void;
    /** Declared name of the dependency being read, for dependency fields. */
    readonly dependency?: string;
}

/**
 * Checks whether a value is a TOML table (not an array or a datetime).
 */
export function isTable(value: unknown): value is RawTable {
    return (
        typeof value === 'object' &&
        value !== null &&
        !Array.isArray(value) &&
        !(value instanceof Date)
    );
}

/**
 * Checks for the `{ workspace = true }` inheritance form.
 */
export function isWorkspaceInherited(value: unknown): boolean {
    return isTable(value) && value.workspace === true;
}

/**
 * Joins a parent field path and a key (`dependencies` + `serde`).
 */
export function joinField(parent: string, key: string): string {
    return parent ? `${parent}.${key}` : key;
}

function describe(value: unknown): string {
    if (Array.isArray(value)) return 'an array';
    if (value instanceof Date) return 'a datetime';
    if (isTable(value)) return 'a table';
    return `a ${typeof value}`;
}

/**
 * Reads an optional string field.
 *
 * @throws {ManifestSchemaError} When the field is present but not a string
 */
export function readString(
    table: RawTable,
    key: string,
    parent: string,
    ctx: SchemaContext,
): string | undefined {
    const value = table[key];
    if (value === undefined) return undefined;
    if (typeof value !== 'string') {
        throw new ManifestSchemaError(
            joinField(parent, key),
            `expected a string, found ${describe(value)}`,
            ctx.manifestPath,
            ctx.dependency,
        );
    }
    return value;
}

/**
 * Reads a required, non-empty string field.
 *
 * @throws {ManifestSchemaError} When the field is missing, empty, or not a string
 */
export function readRequiredString(
    table: RawTable,
    key: string,
    parent: string,
    ctx: SchemaContext,
): string {
    const value = readString(table, key, parent, ctx);
    if (value === undefined || value.trim() === '') {
        throw new ManifestSchemaError(
            joinField(parent, key),
            'missing required field',
            ctx.manifestPath,
            ctx.dependency,
        );
    }
    return value;
}

/**
 * Reads an optional boolean field.
 *
 * @throws {ManifestSchemaError} When the field is present but not a boolean
 */
export function readBoolean(
    table: RawTable,
    key: string,
    parent: string,
    ctx: SchemaContext,
): boolean | undefined {
    const value = table[key];
    if (value === undefined) return undefined;
    if (typeof value !== 'boolean') {
        throw new ManifestSchemaError(
            joinField(parent, key),
            `expected a boolean, found ${describe(value)}`,
            ctx.manifestPath,
            ctx.dependency,
        );
    }
    return value;
}

/**
 * Reads an optional array of strings.
 *
 * @throws {ManifestSchemaError} When the field is not an array, or holds a non-string
 */
export function readStringArray(
    table: RawTable,
    key: string,
    parent: string,
    ctx: SchemaContext,
): string[] | undefined {
    const value = table[key];
    if (value === undefined) return undefined;
    const field = joinField(parent, key);
    if (!Array.isArray(value)) {
        throw new ManifestSchemaError(
            field,
            `expected an array of strings, found ${describe(value)}`,
            ctx.manifestPath,
            ctx.dependency,
        );
    }
    return value.map((item: unknown, index) => {
        if (typeof item !== 'string') {
            throw new ManifestSchemaError(
                `${field}[${index}]`,
                `expected a string, found ${describe(item)}`,
                ctx.manifestPath,
                ctx.dependency,
            );
        }
        return item;
    });
}

/**
 * Reads an optional sub-table.
 *
 * @throws {ManifestSchemaError} When the field is present but not a table
 */
export function readTable(
    table: RawTable,
    key: string,
    parent: string,
    ctx: SchemaContext,
): RawTable | undefined {
    const value = table[key];
    if (value === undefined) return undefined;
    if (!isTable(value)) {
        throw new ManifestSchemaError(
            joinField(parent, key),
            `expected a table, found ${describe(value)}`,
            ctx.manifestPath,
            ctx.dependency,
        );
    }
    return value;
}

/**
 * Reads an optional array of tables (`[[bin]]`).
 *
 * @throws {ManifestSchemaError} When the field is not an array of tables
 */
export function readTableArray(
    table: RawTable,
    key: string,
    parent: string,
    ctx: SchemaContext,
): RawTable[] | undefined {
    const value = table[key];
    if (value === undefined) return undefined;
    const field = joinField(parent, key);
    if (!Array.isArray(value)) {
        throw new ManifestSchemaError(
            field,
            `expected an array of tables, found ${describe(value)}`,
            ctx.manifestPath,
            ctx.dependency,
        );
    }
    return value.map((item: unknown, index) => {
        if (!isTable(item)) {
            throw new ManifestSchemaError(
                `${field}[${index}]`,
                `expected a table, found ${describe(item)}`,
                ctx.manifestPath,
                ctx.dependency,
            );
        }
        return item;
    });
}

/**
 * Reports every key of `table` that is not in `known`.
 */
export function reportUnknownKeys(
    table: RawTable,
    known: ReadonlySet<string>,
    parent: string,
    ctx: SchemaContext,
): void {
    if (!ctx.onUnknownKey) return;
    for (const key of Object.keys(table)) {
        if (!known.has(key)) {
            ctx.onUnknownKey(joinField(parent, key));
        }
    }
}
