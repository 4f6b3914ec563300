/**
 * `@bazelify/resolver` - Error definitions
 *
 * Every resolution failure is fatal: a manifest that cannot be fully
 * resolved must not produce a build file.
 */

import { BazelifyError, BazelifyErrorCode } from '@bazelify/types';

/**
 * Error thrown when a dependency names two source kinds with no defined
 * precedence between them (e.g. both `path` and `git`).
 */
export class AmbiguousDependencySourceError extends BazelifyError {
    readonly name = 'AmbiguousDependencySourceError';

    /**
     * @param dependency - Declared name of the dependency
     * @param sources - The conflicting source kinds
     * @param manifestPath - Path of the manifest declaring it
     */
    constructor(
        dependency: string,
        public readonly sources: readonly string[],
        manifestPath?: string,
    ) {
        super(
            BazelifyErrorCode.AMBIGUOUS_DEPENDENCY_SOURCE,
            `Dependency '${dependency}' declares conflicting sources: ${sources.join(' and ')}`,
            { manifestPath, dependency },
        );
    }
}

/**
 * Error thrown when a path dependency cannot be expressed as a label:
 * the path leaves the repository root, is absolute, or names no known
 * package.
 */
export class UnresolvedPathError extends BazelifyError {
    readonly name = 'UnresolvedPathError';

    /**
     * @param dependency - Declared name of the dependency
     * @param dependencyPath - The path as written in the manifest
     * @param reason - Why it cannot be resolved
     * @param manifestPath - Path of the manifest declaring it
     */
    constructor(
        dependency: string,
        public readonly dependencyPath: string,
        reason: string,
        manifestPath?: string,
    ) {
        super(
            BazelifyErrorCode.UNRESOLVED_PATH,
            `Cannot resolve path '${dependencyPath}' of dependency '${dependency}': ${reason}`,
            { manifestPath, dependency },
        );
    }
}

/**
 * Error thrown when an external dependency is missing from the external
 * name-to-label mapping.
 */
export class UnknownExternalDependencyError extends BazelifyError {
    readonly name = 'UnknownExternalDependencyError';

    /**
     * @param dependency - Registry name that was looked up
     * @param manifestPath - Path of the manifest declaring it
     */
    constructor(dependency: string, manifestPath?: string) {
        super(
            BazelifyErrorCode.UNKNOWN_EXTERNAL_DEPENDENCY,
            `External dependency '${dependency}' has no label in the external mapping`,
            { manifestPath, dependency },
        );
    }
}
