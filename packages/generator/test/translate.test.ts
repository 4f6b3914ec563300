import { describe, it, expect, vi, afterEach } from 'vitest';
import { ManifestSchemaError } from '@bazelify/manifest';
import {
    AmbiguousDependencySourceError,
    ExternalLabelIndex,
    UnknownExternalDependencyError,
    UnresolvedPathError,
    createMacroPredicate,
} from '@bazelify/resolver';
import { translateManifest, type TranslateOptions } from '../src/index.js';

const WIDGETS = `
[package]
name = "widgets"
version = "0.1.0"
edition = "2021"

[dependencies]
serde = "1.0"
core_utils = { path = "../core_utils" }

[dev-dependencies]
assert_matches = "1.5"
`;

const OPTIONS: TranslateOptions = {
    manifestDir: 'path/to/widgets',
    manifestPath: 'path/to/widgets/Cargo.toml',
    externals: ExternalLabelIndex.fromEntries([
        ['serde', '@crates//:serde'],
        ['assert_matches', '@crates//:assert_matches'],
    ]),
};

const WIDGETS_BUILD = `load("@rules_rust//rust:defs.bzl", "rust_library")

package(default_visibility = ["//visibility:public"])

filegroup(
    name = "sources",
    srcs = glob(
        ["**"],
        exclude = ["target/**"],
    ),
)

rust_library(
    name = "widgets",
    srcs = glob(["src/**"]),
    crate_name = "widgets",
    edition = "2021",
    deps = [
        "@crates//:serde",
        "//path/to/core_utils:core_utils",
    ],
)
`;

describe('translateManifest', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('should translate the widgets package', () => {
        const result = translateManifest(WIDGETS, OPTIONS);

        expect(result.content).toBe(WIDGETS_BUILD);
        expect(result.targets).toHaveLength(1);
        expect(result.content).not.toContain('assert_matches');
    });

    it('should expose every stage of the translation', () => {
        const result = translateManifest(WIDGETS, OPTIONS);

        expect(result.manifest.name).toBe('widgets');
        expect(result.selection.enabledFeatures).toEqual([]);
        expect(result.dependencies.dev.map((dep) => dep.label)).toEqual([
            '@crates//:assert_matches',
        ]);
    });

    it('should be deterministic', () => {
        expect(translateManifest(WIDGETS, OPTIONS).content).toBe(
            translateManifest(WIDGETS, OPTIONS).content,
        );
    });

    it('should not depend on the working directory', () => {
        const expected = translateManifest(WIDGETS, OPTIONS).content;
        vi.spyOn(process, 'cwd').mockReturnValue('/somewhere/else');

        expect(translateManifest(WIDGETS, OPTIONS).content).toBe(expected);
    });

    it('should render the alias of a hyphenated rename as an identifier', () => {
        const text = `
[package]
name = "widgets"

[dependencies]
my-serde = { package = "serde", version = "1" }
`;

        expect(translateManifest(text, OPTIONS).content).toContain(
            '    aliases = {\n        "@crates//:serde": "my_serde",\n    },\n',
        );
    });

    it('should fail on a path dependency escaping the repository', () => {
        const text = `
[package]
name = "widgets"

[dependencies]
outside = { path = "../../../../outside" }
`;

        expect(() => translateManifest(text, OPTIONS)).toThrow(
            UnresolvedPathError,
        );
    });

    it('should fail on a path dependency naming no known package', () => {
        expect(() =>
            translateManifest(WIDGETS, {
                ...OPTIONS,
                packages: new Set(['path/to/widgets']),
            }),
        ).toThrow(
            "Cannot resolve path '../core_utils' of dependency 'core_utils': no package found at 'path/to/core_utils'",
        );
    });

    it('should fail on an external dependency missing from the mapping', () => {
        expect(() =>
            translateManifest(WIDGETS, {
                ...OPTIONS,
                externals: ExternalLabelIndex.fromEntries([
                    ['serde', '@crates//:serde'],
                ]),
            }),
        ).toThrow(UnknownExternalDependencyError);
    });

    it('should reject path and version together under strict precedence', () => {
        const text = `
[package]
name = "widgets"

[dependencies]
core_utils = { path = "../core_utils", version = "0.1" }
`;

        expect(translateManifest(text, OPTIONS).content).toContain(
            '"//path/to/core_utils:core_utils"',
        );
        expect(() =>
            translateManifest(text, { ...OPTIONS, precedence: 'strict' }),
        ).toThrow(AmbiguousDependencySourceError);
    });

    it('should route configured macro crates to proc_macro_deps', () => {
        const text = `
[package]
name = "widgets"

[dependencies]
serde = "1.0"
serde_derive = "1.0"
`;
        const result = translateManifest(text, {
            ...OPTIONS,
            externals: ExternalLabelIndex.fromPrefix('@crates//:', [
                'serde',
                'serde_derive',
            ]),
            isMacro: createMacroPredicate(['serde_derive']),
        });

        expect(result.targets[0]?.deps).toEqual(['@crates//:serde']);
        expect(result.targets[0]?.procMacroDeps).toEqual([
            '@crates//:serde_derive',
        ]);
        expect(result.content).toContain(
            '    proc_macro_deps = ["@crates//:serde_derive"],\n    deps = ["@crates//:serde"],\n',
        );
    });

    describe('optional dependencies', () => {
        const text = `
[package]
name = "widgets"

[dependencies]
serde = "1.0"
jemalloc = { version = "0.3", optional = true }
`;

        it('should drop optional dependencies no feature enables', () => {
            const result = translateManifest(text, OPTIONS);

            expect(result.targets[0]?.deps).toEqual(['@crates//:serde']);
        });

        it('should include them once their feature is enabled', () => {
            const result = translateManifest(text, {
                ...OPTIONS,
                externals: ExternalLabelIndex.fromPrefix('@crates//:', [
                    'serde',
                    'jemalloc',
                ]),
                features: { features: ['jemalloc'] },
            });

            expect(result.targets[0]?.deps).toEqual([
                '@crates//:serde',
                '@crates//:jemalloc',
            ]);
            expect(result.targets[0]?.crateFeatures).toEqual(['jemalloc']);
        });

        it('should reject unknown requested features', () => {
            expect(() =>
                translateManifest(text, {
                    ...OPTIONS,
                    features: { features: ['turbo'] },
                }),
            ).toThrow(ManifestSchemaError);
        });
    });

    it('should report ignored manifest keys', () => {
        const ignored: string[] = [];
        translateManifest(
            `
[package]
name = "widgets"
frobnicate = true

[dependencies]
serde = { version = "1.0", frobnicate = true }
`,
            { ...OPTIONS, onUnknownKey: (field) => ignored.push(field) },
        );

        expect(ignored).toEqual([
            'package.frobnicate',
            'dependencies.serde.frobnicate',
        ]);
    });
});
