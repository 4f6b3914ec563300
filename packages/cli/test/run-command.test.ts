/**
 * Tests for the generate, check and print commands
 */

import { describe, it, expect, beforeAll, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, readFile, realpath, rm, writeFile } from 'fs/promises';
import { existsSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import chalk from 'chalk';
import { ExternalLabelIndex } from '@bazelify/resolver';
import { translateManifest } from '@bazelify/generator';
import {
    Logger,
    runCommand,
    type CommandMode,
    type CommandOptions,
} from '../src/index.js';

const CORE_UTILS = `
[package]
name = "core_utils"
version = "0.1.0"
edition = "2021"
`;

const WIDGETS = `
[package]
name = "widgets"
version = "0.1.0"
edition = "2021"

[dependencies]
serde = "1.0"
core_utils = { path = "../core_utils" }
`;

function expectedBuildFile(text: string, manifestDir: string): string {
    return translateManifest(text, {
        manifestDir,
        manifestPath: `${manifestDir}/Cargo.toml`,
        externals: ExternalLabelIndex.fromPrefix('@crates//:', ['serde']),
        packages: new Set(['core_utils', 'widgets']),
    }).content;
}

describe('runCommand', () => {
    let root: string;
    let out: string[];
    let err: string[];

    beforeAll(() => {
        chalk.level = 0;
    });

    beforeEach(async () => {
        root = await realpath(await mkdtemp(join(tmpdir(), 'run-command-test-')));
        out = [];
        err = [];
        await writeFile(join(root, 'MODULE.bazel'), '');
        await writeFile(
            join(root, 'bazelify.config.json'),
            JSON.stringify({ externalPrefix: '@crates//:', crates: ['serde'] }),
        );
        await mkdir(join(root, 'core_utils'));
        await writeFile(join(root, 'core_utils', 'Cargo.toml'), CORE_UTILS);
        await mkdir(join(root, 'widgets'));
        await writeFile(join(root, 'widgets', 'Cargo.toml'), WIDGETS);
    });

    afterEach(async () => {
        await rm(root, { recursive: true, force: true });
    });

    function run(
        mode: CommandMode,
        overrides: Partial<CommandOptions> = {},
        cwd = root,
    ): Promise<number> {
        const logger = new Logger({
            spinners: false,
            out: (line) => out.push(line),
            err: (line) => err.push(line),
        });
        return runCommand(
            mode,
            {
                manifests: [],
                features: [],
                defaultFeatures: true,
                verbose: false,
                ...overrides,
            },
            { cwd, logger },
        );
    }

    describe('generate', () => {
        it('should write a build file beside every manifest', async () => {
            expect(await run('generate')).toBe(0);

            const widgets = await readFile(
                join(root, 'widgets', 'BUILD.bazel'),
                'utf-8',
            );
            expect(widgets).toBe(expectedBuildFile(WIDGETS, 'widgets'));
            expect(widgets).toContain('        "//core_utils:core_utils",\n');
            expect(
                await readFile(join(root, 'core_utils', 'BUILD.bazel'), 'utf-8'),
            ).toBe(expectedBuildFile(CORE_UTILS, 'core_utils'));
            expect(out).toEqual([
                'Generated 2 build files (2 created, 0 updated, 0 unchanged)',
            ]);
            expect(err).toEqual([]);
        });

        it('should leave up-to-date build files unchanged', async () => {
            await run('generate');
            out = [];

            expect(await run('generate')).toBe(0);
            expect(out).toEqual([
                'Generated 2 build files (0 created, 0 updated, 2 unchanged)',
            ]);
        });

        it('should only translate the named manifests', async () => {
            const cwd = join(root, 'widgets');

            expect(await run('generate', { manifests: ['.'] }, cwd)).toBe(0);
            expect(existsSync(join(root, 'widgets', 'BUILD.bazel'))).toBe(true);
            expect(existsSync(join(root, 'core_utils', 'BUILD.bazel'))).toBe(
                false,
            );
            expect(out).toEqual([
                'Generated 1 build files (1 created, 0 updated, 0 unchanged)',
            ]);
        });

        it('should write nothing when any manifest fails', async () => {
            await writeFile(
                join(root, 'widgets', 'Cargo.toml'),
                `${WIDGETS}outside = { path = "../../outside" }\n`,
            );

            expect(await run('generate')).toBe(1);
            expect(existsSync(join(root, 'core_utils', 'BUILD.bazel'))).toBe(
                false,
            );
            expect(existsSync(join(root, 'widgets', 'BUILD.bazel'))).toBe(false);
            expect(err[0]).toMatch(
                /^\[UNRESOLVED_PATH\] Cannot resolve path '\.\.\/\.\.\/outside' of dependency 'outside'/,
            );
        });

        it('should fail without a repository root', async () => {
            const elsewhere = await mkdtemp(join(tmpdir(), 'no-root-test-'));
            try {
                expect(await run('generate', {}, elsewhere)).toBe(1);
                expect(err[0]).toMatch(/^No repository root found above /);
            } finally {
                await rm(elsewhere, { recursive: true, force: true });
            }
        });
    });

    describe('check', () => {
        it('should pass when every build file is up to date', async () => {
            await run('generate');
            out = [];

            expect(await run('check')).toBe(0);
            expect(out).toEqual(['All 2 build files are up to date']);
        });

        it('should report drift without touching the build file', async () => {
            await run('generate');
            out = [];
            const stale = join(root, 'widgets', 'BUILD.bazel');
            await writeFile(stale, 'stale\n');

            expect(await run('check')).toBe(1);
            expect(await readFile(stale, 'utf-8')).toBe('stale\n');
            expect(err).toEqual([
                '1 of 2 build files are out of date:',
                `  ${stale}`,
            ]);
            expect(out[0]).toContain('-stale');
            expect(out[1]).toBe('Run `bazelify generate` to update them.');
        });

        it('should report missing build files', async () => {
            expect(await run('check')).toBe(1);
            expect(err).toEqual([
                '2 of 2 build files are out of date:',
                `  ${join(root, 'core_utils', 'BUILD.bazel')} (missing)`,
                `  ${join(root, 'widgets', 'BUILD.bazel')} (missing)`,
            ]);
        });
    });

    describe('print', () => {
        it('should print one build file without writing it', async () => {
            expect(await run('print', { manifests: ['widgets'] })).toBe(0);

            expect(out).toEqual([
                expectedBuildFile(WIDGETS, 'widgets').replace(/\n$/, ''),
            ]);
            expect(existsSync(join(root, 'widgets', 'BUILD.bazel'))).toBe(false);
        });
    });
});
