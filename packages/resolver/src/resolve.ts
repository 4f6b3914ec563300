/**
 * Label Resolver
 *
 * Turns classified dependencies into build-graph labels: path
 * dependencies by repository-relative location, registry and VCS
 * dependencies by name against the {@link ExternalLabelIndex}.
 */

import type {
    ClassifiedDependencies,
    ClassifiedDependency,
    ResolvedDependencies,
    ResolvedDependency,
    ResolvedLabel,
} from '@bazelify/types';
import { toCrateIdentifier } from '@bazelify/utils';
import {
    UnknownExternalDependencyError,
    UnresolvedPathError,
} from './errors.js';
import type { ExternalLabelIndex } from './external-index.js';
import { formatLabel, toPackagePath, type LabelStyle } from './labels.js';

/**
 * Set of repository packages that path dependencies may point at.
 */
export interface PackageIndex {
    /**
     * @param packagePath - Repository-relative package path (empty for the root)
     */
    has(packagePath: string): boolean;
}

/**
 * Everything the resolver needs besides the dependencies themselves.
 */
export interface ResolutionContext {
    /** Directory of the manifest, relative to the repository root. */
    manifestDir: string;
    externals: ExternalLabelIndex;
    /** When given, path dependencies must point at one of these packages. */
    packages?: PackageIndex;
    labelStyle?: LabelStyle;
    /** Path of the manifest, for error context. */
    manifestPath?: string;
}

function resolvePathLabel(
    classified: ClassifiedDependency,
    dependencyPath: string,
    context: ResolutionContext,
): ResolvedLabel {
    const { dependency } = classified;
    const declared = dependency.rename ?? dependency.name;

    const packagePath = toPackagePath(context.manifestDir, dependencyPath);
    if (!packagePath.ok) {
        throw new UnresolvedPathError(
            declared,
            dependencyPath,
            packagePath.error,
            context.manifestPath,
        );
    }
    if (context.packages && !context.packages.has(packagePath.value)) {
        throw new UnresolvedPathError(
            declared,
            dependencyPath,
            `no package found at '${packagePath.value || '.'}'`,
            context.manifestPath,
        );
    }
    return formatLabel(
        packagePath.value,
        dependency.bazelTarget ?? dependency.name,
        context.labelStyle,
    );
}

/**
 * Resolves a single classified dependency.
 *
 * @throws {UnresolvedPathError} When a path dependency has no legal label
 * @throws {UnknownExternalDependencyError} When an external crate is not in the mapping
 */
export function resolveDependency(
    classified: ClassifiedDependency,
    context: ResolutionContext,
): ResolvedDependency {
    const { dependency } = classified;

    let label: ResolvedLabel;
    if (classified.resolution === 'path' && dependency.path !== undefined) {
        label = resolvePathLabel(classified, dependency.path, context);
    } else {
        const external = context.externals.lookup(dependency.name);
        if (external === undefined) {
            throw new UnknownExternalDependencyError(
                dependency.name,
                context.manifestPath,
            );
        }
        label = external;
    }

    return {
        ...classified,
        label,
        resolvedCrateName: toCrateIdentifier(dependency.name),
    };
}

/**
 * Resolves every classified dependency, role by role, keeping order.
 *
 * @example
 * ```typescript
 * const resolved = resolveDependencies(classified, {
 *     manifestDir: 'rs/replica',
 *     externals: ExternalLabelIndex.fromPrefix('@crate_index//:', ['serde']),
 * });
 * resolved.normal.map((dep) => dep.label);
 * ```
 */
export function resolveDependencies(
    classified: ClassifiedDependencies,
    context: ResolutionContext,
): ResolvedDependencies {
    const resolve = (deps: readonly ClassifiedDependency[]) =>
        deps.map((dep) => resolveDependency(dep, context));
    return {
        normal: resolve(classified.normal),
        dev: resolve(classified.dev),
        build: resolve(classified.build),
    };
}
