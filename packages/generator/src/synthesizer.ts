/**
 * Target Synthesizer
 *
 * Decides which build targets a manifest produces and assembles the
 * render-ready {@link TargetContext} of each one.
 *
 * Dependency roles map onto targets as Cargo defines them:
 * - normal dependencies reach every target except the build script
 * - dev dependencies reach tests and benches only
 * - build dependencies reach the build script only
 */

import type { FeatureSelection } from '@bazelify/manifest';
import { isTargetEnabled } from '@bazelify/manifest';
import type {
    Manifest,
    ResolvedDependencies,
    ResolvedDependency,
    ResolvedLabel,
    SourceSpec,
    TargetContext,
    TargetDeclaration,
    TargetKind,
} from '@bazelify/types';
import { toCrateIdentifier, toPosixPath, uniqueInOrder } from '@bazelify/utils';
import { AliasConflictError } from './errors.js';

/** Target name of the build script. */
export const BUILD_SCRIPT_TARGET = 'build_script';

/** Names the rendered file always defines itself. */
const RESERVED_NAMES = ['sources'];

const NAME_SUFFIXES: Record<TargetKind, string> = {
    library: 'lib',
    'proc-macro': 'lib',
    binary: 'bin',
    test: 'test',
    bench: 'bench',
    'build-script': 'build',
};

/**
 * Labels a target depends on beyond its declared dependencies.
 */
interface LocalDeps {
    readonly deps: readonly ResolvedLabel[];
    readonly procMacroDeps: readonly ResolvedLabel[];
}

/**
 * Hands out unique target names within one build file.
 */
class TargetNamer {
    private readonly used = new Set<string>(RESERVED_NAMES);

    claim(name: string, kind: TargetKind): string {
        let candidate = name;
        for (let attempt = 1; this.used.has(candidate); attempt++) {
            const suffixed = `${name}_${NAME_SUFFIXES[kind]}`;
            candidate = attempt === 1 ? suffixed : `${suffixed}_${attempt}`;
        }
        this.used.add(candidate);
        return candidate;
    }
}

/**
 * Default source entry point of a declared target, relative to the
 * manifest directory.
 */
export function defaultEntryPoint(
    target: TargetDeclaration,
    packageName: string,
): string {
    switch (target.kind) {
        case 'library':
            return 'src/lib.rs';
        case 'binary':
            return target.name === packageName
                ? 'src/main.rs'
                : `src/bin/${target.name}.rs`;
        case 'test':
            return `tests/${target.name}.rs`;
        case 'bench':
            return `benches/${target.name}.rs`;
    }
}

function normalizeEntryPoint(path: string): string {
    return toPosixPath(path).replace(/^\.\//, '');
}

/**
 * Sources of a target: everything under the top directory of its entry
 * point, or the entry point alone when it sits beside the manifest.
 *
 * @example
 * ```typescript
 * sourcesFor('src/bin/replica.rs'); // { kind: 'glob', include: ['src/**'] }
 * sourcesFor('build.rs');           // { kind: 'files', files: ['build.rs'] }
 * ```
 */
export function sourcesFor(entryPoint: string): SourceSpec {
    const normalized = normalizeEntryPoint(entryPoint);
    const slash = normalized.indexOf('/');
    if (slash === -1) {
        return { kind: 'files', files: [normalized] };
    }
    return { kind: 'glob', include: [`${normalized.slice(0, slash)}/**`] };
}

/**
 * Splits resolved dependencies into ordinary and macro labels and derives
 * the alias map of one target.
 *
 * @throws {AliasConflictError} When the aliases of the target collide
 */
function assembleDependencies(
    targetName: string,
    dependencies: readonly ResolvedDependency[],
    local: LocalDeps,
    manifestPath: string | undefined,
): Pick<TargetContext, 'deps' | 'procMacroDeps' | 'aliases'> {
    const deps: ResolvedLabel[] = [...local.deps];
    const procMacroDeps: ResolvedLabel[] = [...local.procMacroDeps];
    const aliases = new Map<string, ResolvedLabel>();
    const aliasByLabel = new Map<ResolvedLabel, string>();

    for (const resolved of dependencies) {
        (resolved.isMacro ? procMacroDeps : deps).push(resolved.label);

        const rename = resolved.dependency.rename;
        if (rename === undefined) {
            continue;
        }
        // Aliases are the identifier the crate's source refers to
        const alias = toCrateIdentifier(rename);
        if (alias === resolved.resolvedCrateName) {
            continue;
        }

        const existingAlias = aliasByLabel.get(resolved.label);
        if (existingAlias !== undefined && existingAlias !== alias) {
            throw new AliasConflictError(
                targetName,
                alias,
                `'${resolved.label}' is renamed to both '${existingAlias}' and '${alias}'`,
                manifestPath,
            );
        }
        const existingLabel = aliases.get(alias);
        if (existingLabel !== undefined && existingLabel !== resolved.label) {
            throw new AliasConflictError(
                targetName,
                alias,
                `'${alias}' names both '${existingLabel}' and '${resolved.label}'`,
                manifestPath,
            );
        }
        aliases.set(alias, resolved.label);
        aliasByLabel.set(resolved.label, alias);
    }

    // A label flagged as a macro in any role is a macro everywhere
    const macroLabels = new Set(procMacroDeps);
    return {
        deps: uniqueInOrder(deps).filter((label) => !macroLabels.has(label)),
        procMacroDeps: uniqueInOrder(procMacroDeps),
        aliases,
    };
}

/**
 * Builds one {@link TargetContext} per enabled build target of a manifest.
 *
 * The build script (when `package.build` names one) comes first, then the
 * library, then binaries, tests and benches in declaration order. Targets
 * whose `required-features` are not all enabled are skipped.
 *
 * @param manifest - The parsed manifest
 * @param resolved - Resolved dependencies of the enabled dependency set
 * @param selection - Enabled features of the package
 * @throws {AliasConflictError} When a target's aliases collide
 *
 * @example
 * ```typescript
 * const targets = synthesizeTargets(manifest, resolved, selectFeatures(manifest));
 * targets.map((target) => target.name); // ['widgets', 'widgets_bin']
 * ```
 */
export function synthesizeTargets(
    manifest: Manifest,
    resolved: ResolvedDependencies,
    selection: FeatureSelection,
): TargetContext[] {
    const namer = new TargetNamer();
    const contexts: TargetContext[] = [];
    const crateFeatures = selection.enabledFeatures;
    const declared = manifest.targets.filter((target) =>
        isTargetEnabled(target, selection),
    );

    let buildScriptLabels: readonly ResolvedLabel[] = [];
    if (manifest.buildScript !== undefined) {
        const name = namer.claim(BUILD_SCRIPT_TARGET, 'build-script');
        const entryPoint = normalizeEntryPoint(manifest.buildScript);
        contexts.push({
            kind: 'build-script',
            name,
            crateName: 'build_script_build',
            edition: manifest.edition,
            srcs: sourcesFor(entryPoint),
            crateRoot: entryPoint,
            crateFeatures,
            ...assembleDependencies(
                name,
                resolved.build,
                { deps: [], procMacroDeps: [] },
                manifest.manifestPath,
            ),
        });
        buildScriptLabels = [`:${name}`];
    }

    const libraryLocal: LocalDeps = {
        deps: buildScriptLabels,
        procMacroDeps: [],
    };
    let ownLibrary = libraryLocal;
    for (const target of declared) {
        const isLibrary = target.kind === 'library';
        const kind: TargetKind = isLibrary
            ? target.procMacro
                ? 'proc-macro'
                : 'library'
            : target.kind;
        const name = namer.claim(target.name, kind);
        const entryPoint = normalizeEntryPoint(
            target.path ?? defaultEntryPoint(target, manifest.name),
        );
        const roleDependencies =
            target.kind === 'test' || target.kind === 'bench'
                ? [...resolved.normal, ...resolved.dev]
                : resolved.normal;

        contexts.push({
            kind,
            name,
            crateName: target.crateName ?? toCrateIdentifier(target.name),
            edition: target.edition ?? manifest.edition,
            srcs: sourcesFor(entryPoint),
            crateRoot:
                isLibrary && entryPoint === 'src/lib.rs'
                    ? undefined
                    : entryPoint,
            crateFeatures,
            ...assembleDependencies(
                name,
                roleDependencies,
                isLibrary ? libraryLocal : ownLibrary,
                manifest.manifestPath,
            ),
        });

        // Other targets link the package's own library, as Cargo does
        if (isLibrary) {
            const label = `:${name}`;
            ownLibrary =
                kind === 'proc-macro'
                    ? { deps: buildScriptLabels, procMacroDeps: [label] }
                    : { deps: [...buildScriptLabels, label], procMacroDeps: [] };
        }
    }

    return contexts;
}
