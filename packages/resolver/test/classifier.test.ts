import { describe, it, expect } from 'vitest';
import type { Dependency } from '@bazelify/types';
import {
    AmbiguousDependencySourceError,
    classifyDependencies,
    classifyDependency,
    createMacroPredicate,
    declaredMacroPredicate,
    resolutionKindOf,
} from '../src/index.js';

function dep(overrides: Partial<Dependency> & { name: string }): Dependency {
    return {
        role: 'normal',
        features: [],
        defaultFeatures: true,
        optional: false,
        procMacro: false,
        ...overrides,
    };
}

describe('resolutionKindOf', () => {
    it('should classify a version requirement as registry', () => {
        expect(resolutionKindOf(dep({ name: 'serde', requirement: '1.0' }))).toBe(
            'registry',
        );
    });

    it('should classify an alternative registry as registry', () => {
        expect(
            resolutionKindOf(dep({ name: 'internal', registry: 'corp' })),
        ).toBe('registry');
    });

    it('should classify a path dependency', () => {
        expect(resolutionKindOf(dep({ name: 'core', path: '../core' }))).toBe(
            'path',
        );
    });

    it('should classify a git dependency as vcs', () => {
        expect(
            resolutionKindOf(
                dep({
                    name: 'lmdb-rkv',
                    git: { url: 'https://example.com/lmdb-rs', rev: 'abc123' },
                }),
            ),
        ).toBe('vcs');
    });

    it('should let a path win over a registry version by default', () => {
        expect(
            resolutionKindOf(
                dep({ name: 'core', path: '../core', requirement: '0.1' }),
            ),
        ).toBe('path');
    });

    it('should reject path and registry version under strict precedence', () => {
        const attempt = () =>
            resolutionKindOf(
                dep({ name: 'core', path: '../core', requirement: '0.1' }),
                'strict',
                'rs/app/Cargo.toml',
            );

        expect(attempt).toThrow(AmbiguousDependencySourceError);
        expect(attempt).toThrow(
            "Dependency 'core' declares conflicting sources: path and registry version",
        );
    });

    it('should always reject path and git together', () => {
        try {
            resolutionKindOf(
                dep({
                    name: 'core',
                    rename: 'core_alias',
                    path: '../core',
                    git: { url: 'https://example.com/core' },
                }),
            );
            expect.unreachable();
        } catch (error) {
            expect(error).toBeInstanceOf(AmbiguousDependencySourceError);
            if (error instanceof AmbiguousDependencySourceError) {
                expect(error.sources).toEqual(['path', 'git']);
                expect(error.dependency).toBe('core_alias');
                expect(error.code).toBe('AMBIGUOUS_DEPENDENCY_SOURCE');
            }
        }
    });
});

describe('macro predicates', () => {
    it('should honour only the declared flag by default', () => {
        expect(declaredMacroPredicate(dep({ name: 'serde_derive' }))).toBe(
            false,
        );
        expect(
            declaredMacroPredicate(dep({ name: 'my_macros', procMacro: true })),
        ).toBe(true);
    });

    it('should recognise configured macro crates by registry name', () => {
        const isMacro = createMacroPredicate(['serde_derive']);

        expect(isMacro(dep({ name: 'serde_derive' }))).toBe(true);
        expect(
            isMacro(dep({ name: 'serde_derive', rename: 'derive' })),
        ).toBe(true);
        expect(isMacro(dep({ name: 'serde' }))).toBe(false);
        expect(isMacro(dep({ name: 'local', procMacro: true }))).toBe(true);
    });
});

describe('classifyDependency', () => {
    it('should attach resolution kind and macro tag', () => {
        const serde = dep({ name: 'serde', requirement: '1.0' });

        expect(
            classifyDependency(serde, {
                isMacro: createMacroPredicate(['serde']),
            }),
        ).toEqual({ dependency: serde, resolution: 'registry', isMacro: true });
    });
});

describe('classifyDependencies', () => {
    it('should classify each role independently and keep order', () => {
        const tokio = dep({ name: 'tokio', requirement: '1' });
        const devTokio = dep({ name: 'tokio', role: 'dev', requirement: '1' });
        const cc = dep({ name: 'cc', role: 'build', requirement: '1.0' });
        const core = dep({ name: 'core', path: '../core' });

        const classified = classifyDependencies({
            normal: [tokio, core],
            dev: [devTokio],
            build: [cc],
        });

        expect(classified.normal.map((c) => c.dependency)).toEqual([tokio, core]);
        expect(classified.normal.map((c) => c.resolution)).toEqual([
            'registry',
            'path',
        ]);
        expect(classified.dev).toEqual([
            { dependency: devTokio, resolution: 'registry', isMacro: false },
        ]);
        expect(classified.build).toEqual([
            { dependency: cc, resolution: 'registry', isMacro: false },
        ]);
    });
});
