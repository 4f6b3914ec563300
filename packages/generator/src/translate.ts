/**
 * Translation pipeline.
 *
 * Composes reader, feature selection, classifier, resolver, synthesizer
 * and renderer into one pure function from manifest text to build file
 * text. Nothing here touches the filesystem.
 */

import {
    isDependencyEnabled,
    parseManifest,
    selectFeatures,
    type FeatureRequest,
    type FeatureSelection,
} from '@bazelify/manifest';
import {
    classifyDependencies,
    resolveDependencies,
    type ExternalLabelIndex,
    type LabelStyle,
    type MacroPredicate,
    type PackageIndex,
    type SourcePrecedence,
} from '@bazelify/resolver';
import type {
    DependenciesByRole,
    Manifest,
    ResolvedDependencies,
    TargetContext,
} from '@bazelify/types';
import { renderBuildFile } from './renderer.js';
import { synthesizeTargets } from './synthesizer.js';

/**
 * Inputs of {@link translateManifest} besides the manifest text.
 */
export interface TranslateOptions {
    /** Directory of the manifest, relative to the repository root. */
    manifestDir: string;
    /** Path of the manifest, for error context. */
    manifestPath?: string;
    externals: ExternalLabelIndex;
    /** Packages path dependencies may point at; unchecked when omitted. */
    packages?: PackageIndex;
    isMacro?: MacroPredicate;
    precedence?: SourcePrecedence;
    labelStyle?: LabelStyle;
    features?: FeatureRequest;
    rulesRepository?: string;
    /** Called with the dotted path of every manifest key that is ignored. */
    onUnknownKey?: (field: string) => void;
}

/**
 * Everything a translation produced, stage by stage.
 */
export interface TranslationResult {
    readonly manifest: Manifest;
    readonly selection: FeatureSelection;
    readonly dependencies: ResolvedDependencies;
    readonly targets: readonly TargetContext[];
    /** Rendered build file text. */
    readonly content: string;
}

function enabledDependencies(
    manifest: Manifest,
    selection: FeatureSelection,
): DependenciesByRole {
    const enabled = (role: keyof DependenciesByRole) =>
        manifest.dependencies[role].filter((dep) =>
            isDependencyEnabled(dep, selection),
        );
    return {
        normal: enabled('normal'),
        dev: enabled('dev'),
        build: enabled('build'),
    };
}

/**
 * Translates manifest text into build file text.
 *
 * Optional dependencies that no enabled feature pulls in are dropped
 * before resolution, so they need no external label.
 *
 * @throws {BazelifyError} The first error of any stage
 *
 * @example
 * ```typescript
 * const { content } = translateManifest(text, {
 *     manifestDir: 'path/to/widgets',
 *     externals: ExternalLabelIndex.fromPrefix('@crates//:', ['serde']),
 * });
 * ```
 */
export function translateManifest(
    text: string,
    options: TranslateOptions,
): TranslationResult {
    const { manifestPath } = options;

    const manifest = parseManifest(text, {
        manifestPath,
        onUnknownKey: options.onUnknownKey,
    });
    const selection = selectFeatures(manifest, options.features);

    const classified = classifyDependencies(
        enabledDependencies(manifest, selection),
        {
            isMacro: options.isMacro,
            precedence: options.precedence,
            manifestPath,
        },
    );
    const dependencies = resolveDependencies(classified, {
        manifestDir: options.manifestDir,
        externals: options.externals,
        packages: options.packages,
        labelStyle: options.labelStyle,
        manifestPath,
    });

    const targets = synthesizeTargets(manifest, dependencies, selection);
    const content = renderBuildFile(targets, {
        rulesRepository: options.rulesRepository,
    });

    return { manifest, selection, dependencies, targets, content };
}
