/**
 * `@bazelify/types`
 *
 * Shared TypeScript types for bazelify packages.
 * This module provides the manifest model, the intermediate records each
 * pipeline stage produces, error codes, and the base error class.
 *
 * @packageDocumentation
 */

// ============================================================================
// ERROR CODES
// ============================================================================

/**
 * Stable error codes for every failure the translator can report.
 *
 * Use these codes for programmatic error handling instead of matching on
 * class names or messages.
 *
 * @example
 * ```typescript
 * import { BazelifyErrorCode } from '@bazelify/types';
 *
 * if (error.code === BazelifyErrorCode.DRIFT_DETECTED) {
 *     staleFiles.push(error.buildFilePath);
 * }
 * ```
 */
export const BazelifyErrorCode = {
    // Manifest Errors
    MANIFEST_PARSE: 'MANIFEST_PARSE',
    MANIFEST_SCHEMA: 'MANIFEST_SCHEMA',

    // Resolution Errors
    AMBIGUOUS_DEPENDENCY_SOURCE: 'AMBIGUOUS_DEPENDENCY_SOURCE',
    UNRESOLVED_PATH: 'UNRESOLVED_PATH',
    UNKNOWN_EXTERNAL_DEPENDENCY: 'UNKNOWN_EXTERNAL_DEPENDENCY',

    // Generation Errors
    ALIAS_CONFLICT: 'ALIAS_CONFLICT',
    DRIFT_DETECTED: 'DRIFT_DETECTED',

    // Configuration Errors
    INVALID_CONFIG: 'INVALID_CONFIG',
} as const;

export type BazelifyErrorCode =
    (typeof BazelifyErrorCode)[keyof typeof BazelifyErrorCode];

/**
 * Context attached to a {@link BazelifyError} to locate the fix.
 */
export interface ErrorContext {
    /** Path of the manifest being translated. */
    readonly manifestPath?: string;
    /** Dotted path of the offending manifest field (e.g. `dependencies.serde`). */
    readonly field?: string;
    /** Declared name of the dependency involved. */
    readonly dependency?: string;
    /** The underlying error, if any. */
    readonly cause?: Error;
}

/**
 * Base class for every error raised by bazelify packages.
 *
 * @example
 * ```typescript
 * try {
 *     translateManifest(text, options);
 * } catch (error) {
 *     if (error instanceof BazelifyError) {
 *         console.error(error.toDetailedString());
 *     }
 * }
 * ```
 */
export class BazelifyError extends Error {
    public readonly name: string = 'BazelifyError';
    public readonly manifestPath?: string;
    public readonly field?: string;
    public readonly dependency?: string;

    /**
     * @param code - The structured error code for programmatic handling
     * @param message - Human-readable error message
     * @param context - Manifest path, field and dependency locating the problem
     */
    constructor(
        public readonly code: BazelifyErrorCode,
        message: string,
        context: ErrorContext = {},
    ) {
        super(message, context.cause ? { cause: context.cause } : undefined);
        this.manifestPath = context.manifestPath;
        this.field = context.field;
        this.dependency = context.dependency;
        Error.captureStackTrace?.(this, new.target);
    }

    /**
     * Create a detailed, formatted error message with all context.
     *
     * @returns A multi-line string with error code, message, and location
     */
    toDetailedString(): string {
        const parts = [`[${this.code}] ${this.message}`];
        if (this.manifestPath) parts.push(`  Manifest: ${this.manifestPath}`);
        if (this.field) parts.push(`  Field: ${this.field}`);
        if (this.dependency) parts.push(`  Dependency: ${this.dependency}`);
        if (this.cause instanceof Error) {
            parts.push(`  Cause: ${this.cause.message}`);
        }
        return parts.join('\n');
    }
}

// ============================================================================
// RESULT TYPE
// ============================================================================

/**
 * A discriminated union representing either success or failure.
 *
 * @example
 * ```typescript
 * const result = await checkBuildFile(path, content);
 * if (result.ok) {
 *     console.log('up to date');
 * } else {
 *     console.error(result.error.diff);
 * }
 * ```
 */
export type Result<T, E = string> =
    | { readonly ok: true; readonly value: T }
    | { readonly ok: false; readonly error: E };

/**
 * Creates a successful Result wrapping the given value.
 *
 * @typeParam T - The type of the success value
 */
export function Ok<T>(value: T): Result<T, never> {
    return { ok: true, value };
}

/**
 * Creates a failed Result wrapping the given error.
 *
 * @typeParam E - The type of the error value
 */
export function Err<E>(error: E): Result<never, E> {
    return { ok: false, error };
}

// ============================================================================
// MANIFEST MODEL
// ============================================================================

/**
 * Rust language editions the translator can emit.
 */
export const EDITIONS = ['2015', '2018', '2021', '2024'] as const;

export type Edition = (typeof EDITIONS)[number];

/**
 * Roles a dependency can be declared under.
 *
 * - `normal`: `[dependencies]`, available to every target
 * - `dev`: `[dev-dependencies]`, test and bench targets only
 * - `build`: `[build-dependencies]`, the build script only
 */
export const DEPENDENCY_ROLES = ['normal', 'dev', 'build'] as const;

export type DependencyRole = (typeof DEPENDENCY_ROLES)[number];

/**
 * Kinds of build target a manifest can declare.
 */
export type DeclaredTargetKind = 'library' | 'binary' | 'test' | 'bench';

/**
 * A build target declared (or implied) by a manifest.
 */
export interface TargetDeclaration {
    readonly kind: DeclaredTargetKind;
    /** Target name; the package name for the library. */
    readonly name: string;
    /** Explicit source entry point, relative to the manifest directory. */
    readonly path?: string;
    /** `[lib] proc-macro = true`. Always false for other kinds. */
    readonly procMacro: boolean;
    /** `[lib] name`, overriding the crate identifier of the library. */
    readonly crateName?: string;
    /** Features that must all be enabled for the target to be built. */
    readonly requiredFeatures: readonly string[];
    /** Per-target edition, overriding the package edition. */
    readonly edition?: Edition;
}

/**
 * A version-control source locator.
 */
export interface GitSource {
    readonly url: string;
    readonly branch?: string;
    readonly tag?: string;
    readonly rev?: string;
}

/**
 * A normalized dependency declaration.
 *
 * Both manifest forms (`serde = "1.0"` and `serde = { ... }`) are
 * normalized into this one shape by the manifest reader.
 */
export interface Dependency {
    /** Registry name: the `package` key when present, else the declared key. */
    readonly name: string;
    /** Declared key, set only when a `package` key renames the crate. */
    readonly rename?: string;
    readonly role: DependencyRole;
    /** Semantic version requirement. */
    readonly requirement?: string;
    /** Filesystem path, relative to the manifest directory. */
    readonly path?: string;
    readonly git?: GitSource;
    /** Alternative registry name. */
    readonly registry?: string;
    readonly features: readonly string[];
    readonly defaultFeatures: boolean;
    readonly optional: boolean;
    /** Explicitly flagged as a procedural macro (`proc-macro = true`). */
    readonly procMacro: boolean;
    /** Build-graph target name for path dependencies (`bazel-target`). */
    readonly bazelTarget?: string;
}

/**
 * Dependencies of a manifest, grouped by role in declaration order.
 */
export type DependenciesByRole = {
    readonly [R in DependencyRole]: readonly Dependency[];
};

/**
 * The parsed and validated package manifest.
 */
export interface Manifest {
    readonly name: string;
    readonly version?: string;
    readonly edition: Edition;
    /** Library first (when present), then binaries, tests and benches. */
    readonly targets: readonly TargetDeclaration[];
    readonly dependencies: DependenciesByRole;
    /** `[features]` table: feature name to its entries. */
    readonly features: ReadonlyMap<string, readonly string[]>;
    /** Build script path from `package.build`. */
    readonly buildScript?: string;
    /** Where the manifest was read from, for error messages. */
    readonly manifestPath?: string;
}

// ============================================================================
// CLASSIFICATION & RESOLUTION
// ============================================================================

/**
 * How a dependency is resolved to a label.
 */
export type ResolutionKind = 'registry' | 'path' | 'vcs';

/**
 * Output of the dependency classifier.
 */
export interface ClassifiedDependency {
    readonly dependency: Dependency;
    readonly resolution: ResolutionKind;
    readonly isMacro: boolean;
}

/**
 * Classified dependencies, per role, in declaration order.
 */
export type ClassifiedDependencies = {
    readonly [R in DependencyRole]: readonly ClassifiedDependency[];
};

/**
 * A string unambiguously identifying a build-graph target, such as
 * `@crate_index//:serde` or `//rs/types/types:ic-types`.
 */
export type ResolvedLabel = string;

/**
 * Output of the label resolver.
 */
export interface ResolvedDependency extends ClassifiedDependency {
    readonly label: ResolvedLabel;
    /** Crate identifier the dependency is resolved under. */
    readonly resolvedCrateName: string;
}

/**
 * Resolved dependencies, per role, in declaration order.
 */
export type ResolvedDependencies = {
    readonly [R in DependencyRole]: readonly ResolvedDependency[];
};

// ============================================================================
// TARGET CONTEXT
// ============================================================================

/**
 * Kinds of target the synthesizer emits.
 */
export type TargetKind =
    | 'library'
    | 'proc-macro'
    | 'binary'
    | 'test'
    | 'bench'
    | 'build-script';

/**
 * Sources of a target: a glob over a directory, or explicit files.
 */
export type SourceSpec =
    | { readonly kind: 'glob'; readonly include: readonly string[] }
    | { readonly kind: 'files'; readonly files: readonly string[] };

/**
 * Render-ready description of one build target.
 */
export interface TargetContext {
    readonly kind: TargetKind;
    /** Build-graph target name. */
    readonly name: string;
    /** Identifier naming the compiled crate inside Rust source. */
    readonly crateName: string;
    readonly edition: Edition;
    readonly srcs: SourceSpec;
    readonly crateRoot?: string;
    /** Ordinary dependency labels, declaration order, no duplicates. */
    readonly deps: readonly ResolvedLabel[];
    /** Procedural macro dependency labels. */
    readonly procMacroDeps: readonly ResolvedLabel[];
    /** Crate identifier of a rename to its label, for renamed dependencies only. */
    readonly aliases: ReadonlyMap<string, ResolvedLabel>;
    /** Enabled features of the package itself, sorted. */
    readonly crateFeatures: readonly string[];
}
