/**
 * Template Renderer
 *
 * Renders target contexts into `BUILD.bazel` text. The layout matches a
 * buildifier-formatted, hand-written build file so generated and
 * hand-written files read the same.
 */

import type { SourceSpec, TargetContext, TargetKind } from '@bazelify/types';
import { compareCodeUnits } from '@bazelify/utils';

/**
 * Options for {@link renderBuildFile}.
 */
export interface RenderOptions {
    /** Repository providing the Rust rules. Defaults to `@rules_rust`. */
    rulesRepository?: string;
}

/** Default repository providing the Rust rules. */
export const DEFAULT_RULES_REPOSITORY = '@rules_rust';

interface RuleSource {
    readonly rule: string;
    /** `.bzl` file inside the rules repository. */
    readonly file: string;
}

const RULES: Record<TargetKind, RuleSource> = {
    library: { rule: 'rust_library', file: '//rust:defs.bzl' },
    'proc-macro': { rule: 'rust_proc_macro', file: '//rust:defs.bzl' },
    binary: { rule: 'rust_binary', file: '//rust:defs.bzl' },
    test: { rule: 'rust_test', file: '//rust:defs.bzl' },
    bench: { rule: 'rust_benchmark', file: '//rust:defs.bzl' },
    'build-script': {
        rule: 'cargo_build_script',
        file: '//cargo:cargo_build_script.bzl',
    },
};

const INDENT = '    ';

const SOURCES_FILEGROUP = `filegroup(
    name = "sources",
    srcs = glob(
        ["**"],
        exclude = ["target/**"],
    ),
)`;

/**
 * Quotes a value as a Starlark string literal.
 *
 * @example
 * ```typescript
 * quote('say "hi"'); // '"say \\"hi\\""'
 * ```
 */
export function quote(value: string): string {
    const escaped = value
        .replaceAll('\\', '\\\\')
        .replaceAll('"', '\\"')
        .replaceAll('\n', '\\n')
        .replaceAll('\r', '\\r')
        .replaceAll('\t', '\\t');
    return `"${escaped}"`;
}

/**
 * Renders a list of strings. Empty and single-item lists stay on one
 * line; longer lists put one item per line with a trailing comma.
 */
function renderList(items: readonly string[], indent: string): string {
    if (items.length === 0) return '[]';
    if (items.length === 1) return `[${quote(items[0])}]`;
    const lines = items.map((item) => `${indent}${INDENT}${quote(item)},`);
    return ['[', ...lines, `${indent}]`].join('\n');
}

function renderSources(srcs: SourceSpec, indent: string): string {
    if (srcs.kind === 'files') {
        return renderList(srcs.files, indent);
    }
    return `glob(${renderList(srcs.include, indent)})`;
}

/**
 * Renders the alias dict, keyed by label as the rules expect.
 */
function renderAliases(
    aliases: ReadonlyMap<string, string>,
    indent: string,
): string {
    const entries = Array.from(aliases, ([alias, label]) => ({
        alias,
        label,
    })).sort((a, b) => compareCodeUnits(a.label, b.label));
    const lines = entries.map(
        ({ alias, label }) =>
            `${indent}${INDENT}${quote(label)}: ${quote(alias)},`,
    );
    return ['{', ...lines, `${indent}}`].join('\n');
}

/**
 * Renders one rule call.
 */
export function renderTarget(target: TargetContext): string {
    const attributes: Array<[string, string]> = [
        ['name', quote(target.name)],
        ['srcs', renderSources(target.srcs, INDENT)],
    ];
    if (target.aliases.size > 0) {
        attributes.push(['aliases', renderAliases(target.aliases, INDENT)]);
    }
    if (target.crateFeatures.length > 0) {
        attributes.push([
            'crate_features',
            renderList(target.crateFeatures, INDENT),
        ]);
    }
    if (target.kind !== 'build-script') {
        attributes.push(['crate_name', quote(target.crateName)]);
    }
    if (target.crateRoot !== undefined) {
        attributes.push(['crate_root', quote(target.crateRoot)]);
    }
    attributes.push(['edition', quote(target.edition)]);
    if (target.procMacroDeps.length > 0) {
        attributes.push([
            'proc_macro_deps',
            renderList(target.procMacroDeps, INDENT),
        ]);
    }
    attributes.push(['deps', renderList(target.deps, INDENT)]);

    const body = attributes.map(
        ([key, value]) => `${INDENT}${key} = ${value},`,
    );
    return [`${RULES[target.kind].rule}(`, ...body, ')'].join('\n');
}

/**
 * Renders the `load()` statements for the rules the targets use, one per
 * `.bzl` file, sorted by file and then by rule.
 */
function renderLoads(
    targets: readonly TargetContext[],
    rulesRepository: string,
): string[] {
    const rulesByFile = new Map<string, Set<string>>();
    for (const target of targets) {
        const { rule, file } = RULES[target.kind];
        const path = `${rulesRepository}${file}`;
        const rules = rulesByFile.get(path) ?? new Set<string>();
        rules.add(rule);
        rulesByFile.set(path, rules);
    }

    return Array.from(rulesByFile.keys())
        .sort(compareCodeUnits)
        .map((path) => {
            const rules = Array.from(rulesByFile.get(path) ?? [])
                .sort(compareCodeUnits)
                .map(quote);
            return `load(${[quote(path), ...rules].join(', ')})`;
        });
}

/**
 * Renders a complete build file.
 *
 * Output depends only on `targets`, so identical input renders identical
 * bytes.
 *
 * @example
 * ```typescript
 * const content = renderBuildFile(synthesizeTargets(manifest, resolved, selection));
 * ```
 */
export function renderBuildFile(
    targets: readonly TargetContext[],
    options: RenderOptions = {},
): string {
    const rulesRepository =
        options.rulesRepository ?? DEFAULT_RULES_REPOSITORY;
    const loads = renderLoads(targets, rulesRepository);

    const sections = [
        ...(loads.length > 0 ? [loads.join('\n')] : []),
        'package(default_visibility = ["//visibility:public"])',
        SOURCES_FILEGROUP,
        ...targets.map(renderTarget),
    ];
    return `${sections.join('\n\n')}\n`;
}
