/**
 * Tests for writing and drift-checking build files
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { existsSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import {
    DriftDetectedError,
    checkBuildFile,
    readExistingBuildFile,
    writeBuildFile,
} from '../src/index.js';

const CONTENT = `rust_library(
    name = "widgets",
    deps = [
        "@crates//:serde",
        "//path/to/core_utils:core_utils",
    ],
)
`;

describe('writer', () => {
    let tempDir: string;
    let buildFile: string;

    beforeEach(async () => {
        tempDir = await mkdtemp(join(tmpdir(), 'writer-test-'));
        buildFile = join(tempDir, 'BUILD.bazel');
    });

    afterEach(async () => {
        await rm(tempDir, { recursive: true, force: true });
    });

    describe('readExistingBuildFile', () => {
        it('should return undefined for a missing file', async () => {
            expect(await readExistingBuildFile(buildFile)).toBeUndefined();
        });

        it('should return the content of an existing file', async () => {
            await writeFile(buildFile, CONTENT, 'utf-8');

            expect(await readExistingBuildFile(buildFile)).toBe(CONTENT);
        });
    });

    describe('writeBuildFile', () => {
        it('should create a missing build file', async () => {
            expect(await writeBuildFile(buildFile, CONTENT)).toBe('created');
            expect(await readFile(buildFile, 'utf-8')).toBe(CONTENT);
            expect(existsSync(`${buildFile}.tmp`)).toBe(false);
        });

        it('should leave identical content alone', async () => {
            await writeBuildFile(buildFile, CONTENT);

            expect(await writeBuildFile(buildFile, CONTENT)).toBe('unchanged');
        });

        it('should replace stale content', async () => {
            await writeFile(buildFile, 'stale\n', 'utf-8');

            expect(await writeBuildFile(buildFile, CONTENT)).toBe('updated');
            expect(await readFile(buildFile, 'utf-8')).toBe(CONTENT);
        });

        it('should fail without creating anything when the directory is missing', async () => {
            const nested = join(tempDir, 'missing', 'BUILD.bazel');

            await expect(writeBuildFile(nested, CONTENT)).rejects.toThrow();
            expect(existsSync(nested)).toBe(false);
            expect(existsSync(`${nested}.tmp`)).toBe(false);
        });
    });

    describe('checkBuildFile', () => {
        it('should accept an up-to-date build file', async () => {
            await writeFile(buildFile, CONTENT, 'utf-8');

            expect(await checkBuildFile(buildFile, CONTENT)).toEqual({
                ok: true,
                value: undefined,
            });
        });

        it('should report a hand-edited build file with a diff', async () => {
            const edited = CONTENT.replace('        "@crates//:serde",\n', '');
            await writeFile(buildFile, edited, 'utf-8');

            const result = await checkBuildFile(
                buildFile,
                CONTENT,
                'path/to/widgets/Cargo.toml',
            );

            expect(result.ok).toBe(false);
            if (!result.ok) {
                expect(result.error).toBeInstanceOf(DriftDetectedError);
                expect(result.error.code).toBe('DRIFT_DETECTED');
                expect(result.error.missing).toBe(false);
                expect(result.error.buildFilePath).toBe(buildFile);
                expect(result.error.manifestPath).toBe(
                    'path/to/widgets/Cargo.toml',
                );
                expect(result.error.message).toBe(
                    `Build file ${buildFile} is out of date with its manifest`,
                );
                expect(result.error.diff.split('\n')).toContain(
                    '+        "@crates//:serde",',
                );
            }
            expect(await readFile(buildFile, 'utf-8')).toBe(edited);
        });

        it('should report a missing build file as drift', async () => {
            const result = await checkBuildFile(buildFile, CONTENT);

            expect(result.ok).toBe(false);
            if (!result.ok) {
                expect(result.error.missing).toBe(true);
                expect(result.error.message).toBe(
                    `Build file ${buildFile} does not exist`,
                );
            }
            expect(existsSync(buildFile)).toBe(false);
        });
    });
});
