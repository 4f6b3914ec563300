/**
 * Feature selection for the package being translated.
 *
 * Expands the package's own `[features]` table from the requested features
 * to decide which optional dependencies and which feature-gated targets
 * take part in the build. Features of dependencies are not interpreted.
 */

import type { Dependency, Manifest, TargetDeclaration } from '@bazelify/types';
import { compareCodeUnits } from '@bazelify/utils';
import { ManifestSchemaError } from './errors.js';

/**
 * Which features to enable.
 */
export interface FeatureRequest {
    /** Features to enable in addition to `default`. */
    features?: readonly string[];
    /** Whether the `default` feature is enabled. Defaults to true. */
    defaultFeatures?: boolean;
}

/**
 * Outcome of feature selection.
 */
export interface FeatureSelection {
    /** Enabled features of the package, sorted. */
    readonly enabledFeatures: readonly string[];
    /** Keys of the optional dependencies the enabled features pull in. */
    readonly enabledOptionalDependencies: ReadonlySet<string>;
}

/**
 * Name a dependency is referred to by inside the manifest (its TOML key).
 */
export function dependencyKey(dependency: Dependency): string {
    return dependency.rename ?? dependency.name;
}

/**
 * Resolves the enabled features of a manifest.
 *
 * @throws {ManifestSchemaError} When a requested or referenced feature does not exist
 *
 * @example
 * ```typescript
 * const selection = selectFeatures(manifest, { features: ['profiler'] });
 * selection.enabledFeatures; // ['default', 'profiler']
 * ```
 */
export function selectFeatures(
    manifest: Manifest,
    request: FeatureRequest = {},
): FeatureSelection {
    const optionalKeys = new Set(
        Object.values(manifest.dependencies)
            .flat()
            .filter((dep) => dep.optional)
            .map(dependencyKey),
    );

    // An optional dependency named with `dep:` anywhere loses its implicit feature
    const explicitDepRefs = new Set(
        Array.from(manifest.features.values())
            .flat()
            .filter((entry) => entry.startsWith('dep:'))
            .map((entry) => entry.slice('dep:'.length)),
    );
    const hasImplicitFeature = (key: string) =>
        optionalKeys.has(key) &&
        !explicitDepRefs.has(key) &&
        !manifest.features.has(key);

    const enabledFeatures = new Set<string>();
    const enabledDeps = new Set<string>();

    const enableFeature = (feature: string, referencedFrom: string): void => {
        if (enabledFeatures.has(feature)) return;

        const entries = manifest.features.get(feature);
        if (entries !== undefined) {
            enabledFeatures.add(feature);
            for (const entry of entries) {
                enableEntry(entry, `features.${feature}`);
            }
            return;
        }
        if (hasImplicitFeature(feature)) {
            enabledFeatures.add(feature);
            enabledDeps.add(feature);
            return;
        }
        throw new ManifestSchemaError(
            referencedFrom,
            `unknown feature "${feature}"`,
            manifest.manifestPath,
        );
    };

    const enableEntry = (entry: string, field: string): void => {
        if (entry.startsWith('dep:')) {
            enableDependency(entry.slice('dep:'.length));
            return;
        }
        const slash = entry.indexOf('/');
        if (slash === -1) {
            enableFeature(entry, field);
            return;
        }
        const target = entry.slice(0, slash);
        // `dep?/feature` only applies when the dependency is enabled elsewhere
        if (target.endsWith('?')) return;
        enableDependency(target);
        if (hasImplicitFeature(target)) {
            enabledFeatures.add(target);
        }
    };

    const enableDependency = (key: string): void => {
        if (optionalKeys.has(key)) {
            enabledDeps.add(key);
        }
    };

    if (request.defaultFeatures !== false && manifest.features.has('default')) {
        enableFeature('default', 'features');
    }
    for (const feature of request.features ?? []) {
        enableFeature(feature, 'features');
    }

    return {
        enabledFeatures: Array.from(enabledFeatures).sort(compareCodeUnits),
        enabledOptionalDependencies: enabledDeps,
    };
}

/**
 * Checks whether a dependency takes part in the build under a selection.
 */
export function isDependencyEnabled(
    dependency: Dependency,
    selection: FeatureSelection,
): boolean {
    return (
        !dependency.optional ||
        selection.enabledOptionalDependencies.has(dependencyKey(dependency))
    );
}

/**
 * Checks whether all `required-features` of a target are enabled.
 */
export function isTargetEnabled(
    target: TargetDeclaration,
    selection: FeatureSelection,
): boolean {
    return target.requiredFeatures.every((feature) =>
        selection.enabledFeatures.includes(feature),
    );
}
