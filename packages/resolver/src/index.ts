/**
 * `@bazelify/resolver`
 *
 * Classifies manifest dependencies and resolves them to build-graph labels.
 */

// Classification
export {
    classifyDependencies,
    classifyDependency,
    resolutionKindOf,
    createMacroPredicate,
    declaredMacroPredicate,
} from './classifier.js';

// Resolution
export { resolveDependencies, resolveDependency } from './resolve.js';
export { toPackagePath, formatLabel, pathToLabel } from './labels.js';
export { ExternalLabelIndex } from './external-index.js';

// Errors
export {
    AmbiguousDependencySourceError,
    UnresolvedPathError,
    UnknownExternalDependencyError,
} from './errors.js';

// Types
export type {
    ClassifyOptions,
    MacroPredicate,
    SourcePrecedence,
} from './classifier.js';
export type { PackageIndex, ResolutionContext } from './resolve.js';
export type { LabelStyle } from './labels.js';
