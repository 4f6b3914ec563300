/**
 * @module @bazelify/generator
 *
 * Turns resolved manifests into `BUILD.bazel` files.
 *
 * This module provides:
 * - Target synthesis from manifest declarations
 * - Deterministic rendering of build files
 * - Atomic writing and drift checking of build files
 * - `translateManifest`, the whole pipeline as one pure function
 */

export {
    synthesizeTargets,
    defaultEntryPoint,
    sourcesFor,
    BUILD_SCRIPT_TARGET,
} from './synthesizer.js';

export {
    renderBuildFile,
    renderTarget,
    quote,
    DEFAULT_RULES_REPOSITORY,
    type RenderOptions,
} from './renderer.js';

export {
    writeBuildFile,
    checkBuildFile,
    readExistingBuildFile,
    type WriteOutcome,
} from './writer.js';

export {
    translateManifest,
    type TranslateOptions,
    type TranslationResult,
} from './translate.js';

export { AliasConflictError, DriftDetectedError } from './errors.js';
