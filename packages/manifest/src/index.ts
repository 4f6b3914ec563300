/**
 * @module @bazelify/manifest
 *
 * Reads `Cargo.toml` manifests into the validated {@link Manifest} model.
 *
 * This module provides:
 * - The manifest reader (`parseManifest`, `readManifest`)
 * - Normalization of both dependency entry forms into one shape
 * - Feature selection over the package's own `[features]` table
 *
 * @example
 * ```typescript
 * import { parseManifest, selectFeatures } from '@bazelify/manifest';
 *
 * const manifest = parseManifest(text, { manifestPath: 'rs/replica/Cargo.toml' });
 * const selection = selectFeatures(manifest, { features: ['profiler'] });
 * ```
 */

export type { Manifest } from '@bazelify/types';

export {
    parseManifest,
    readManifest,
    type ParseManifestOptions,
} from './reader.js';

export {
    toDependencySpec,
    normalizeDependency,
    readDependencySection,
    type DependencySpec,
} from './dependency.js';

export {
    selectFeatures,
    dependencyKey,
    isDependencyEnabled,
    isTargetEnabled,
    type FeatureRequest,
    type FeatureSelection,
} from './features.js';

export { ManifestParseError, ManifestSchemaError } from './errors.js';
