/**
 * Dependency Classifier
 *
 * Assigns each dependency exactly one resolution kind and a macro tag.
 * Each role is classified independently, so a crate declared under both
 * `[dependencies]` and `[dev-dependencies]` yields two records.
 */

import type {
    ClassifiedDependencies,
    ClassifiedDependency,
    DependenciesByRole,
    Dependency,
    ResolutionKind,
} from '@bazelify/types';
import { AmbiguousDependencySourceError } from './errors.js';

/**
 * Decides whether a dependency is consumed as a procedural macro.
 */
export type MacroPredicate = (dependency: Dependency) => boolean;

/**
 * Policy for a dependency declaring both a path and a registry version.
 *
 * - `path-wins`: the path is a local override and is used for resolution
 * - `strict`: the combination is rejected as ambiguous
 */
export type SourcePrecedence = 'path-wins' | 'strict';

/**
 * Options for {@link classifyDependencies}.
 */
export interface ClassifyOptions {
    isMacro?: MacroPredicate;
    precedence?: SourcePrecedence;
    /** Path of the manifest, for error context. */
    manifestPath?: string;
}

/**
 * Macro predicate honouring only the explicit `proc-macro = true` flag.
 */
export const declaredMacroPredicate: MacroPredicate = (dependency) =>
    dependency.procMacro;

/**
 * Creates a macro predicate that also treats the given registry names as
 * macro crates, for crates whose manifests cannot be annotated.
 *
 * @param macroCrates - Registry names of known procedural macro crates
 */
export function createMacroPredicate(
    macroCrates: Iterable<string>,
): MacroPredicate {
    const known = new Set(macroCrates);
    return (dependency) => dependency.procMacro || known.has(dependency.name);
}

/**
 * Determines the resolution kind of a single dependency.
 *
 * @throws {AmbiguousDependencySourceError} When the sources conflict under the policy
 */
export function resolutionKindOf(
    dependency: Dependency,
    precedence: SourcePrecedence = 'path-wins',
    manifestPath?: string,
): ResolutionKind {
    const declared = dependency.rename ?? dependency.name;
    const hasRegistry =
        dependency.requirement !== undefined ||
        dependency.registry !== undefined;

    if (dependency.path !== undefined) {
        if (dependency.git !== undefined) {
            throw new AmbiguousDependencySourceError(
                declared,
                ['path', 'git'],
                manifestPath,
            );
        }
        if (hasRegistry && precedence === 'strict') {
            throw new AmbiguousDependencySourceError(
                declared,
                ['path', 'registry version'],
                manifestPath,
            );
        }
        return 'path';
    }
    if (dependency.git !== undefined) {
        return 'vcs';
    }
    return 'registry';
}

/**
 * Classifies one dependency.
 */
export function classifyDependency(
    dependency: Dependency,
    options: ClassifyOptions = {},
): ClassifiedDependency {
    const isMacro = options.isMacro ?? declaredMacroPredicate;
    return {
        dependency,
        resolution: resolutionKindOf(
            dependency,
            options.precedence,
            options.manifestPath,
        ),
        isMacro: isMacro(dependency),
    };
}

/**
 * Classifies every dependency of a manifest, role by role.
 *
 * @example
 * ```typescript
 * const classified = classifyDependencies(manifest.dependencies, {
 *     isMacro: createMacroPredicate(['serde_derive']),
 * });
 * classified.normal[0].resolution; // 'registry'
 * ```
 */
export function classifyDependencies(
    dependencies: DependenciesByRole,
    options: ClassifyOptions = {},
): ClassifiedDependencies {
    const classify = (deps: readonly Dependency[]) =>
        deps.map((dep) => classifyDependency(dep, options));
    return {
        normal: classify(dependencies.normal),
        dev: classify(dependencies.dev),
        build: classify(dependencies.build),
    };
}
