/**
 * Output Writer
 *
 * Writes generated build files, or compares them against what is checked
 * in. A build file is either fully replaced or left untouched.
 */

import { readFile, rename, rm, writeFile } from 'fs/promises';
import { createTwoFilesPatch } from 'diff';
import { Err, Ok, type Result } from '@bazelify/types';
import { DriftDetectedError } from './errors.js';

/**
 * What {@link writeBuildFile} did.
 */
export type WriteOutcome = 'created' | 'updated' | 'unchanged';

function isMissingFileError(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Reads a build file, returning `undefined` when it does not exist.
 */
export async function readExistingBuildFile(
    buildFilePath: string,
): Promise<string | undefined> {
    try {
        return await readFile(buildFilePath, 'utf-8');
    } catch (error) {
        if (isMissingFileError(error)) {
            return undefined;
        }
        throw error;
    }
}

/**
 * Writes a build file atomically.
 *
 * The content goes to a temporary file beside the destination, which is
 * then renamed over it. A file whose content already matches is not
 * rewritten.
 *
 * @param buildFilePath - Destination build file
 * @param content - Rendered build file text
 */
export async function writeBuildFile(
    buildFilePath: string,
    content: string,
): Promise<WriteOutcome> {
    const existing = await readExistingBuildFile(buildFilePath);
    if (existing === content) {
        return 'unchanged';
    }

    const tempPath = `${buildFilePath}.tmp`;
    try {
        await writeFile(tempPath, content, 'utf-8');
        await rename(tempPath, buildFilePath);
    } catch (error) {
        await rm(tempPath, { force: true });
        throw error;
    }
    return existing === undefined ? 'created' : 'updated';
}

/**
 * Compares a build file byte-for-byte against freshly rendered content.
 *
 * Drift is returned rather than thrown so a caller can check every
 * manifest before reporting. The build file is never modified.
 *
 * @param buildFilePath - Checked-in build file
 * @param content - Rendered build file text
 * @param manifestPath - Manifest the build file is generated from
 *
 * @example
 * ```typescript
 * const result = await checkBuildFile('rs/replica/BUILD.bazel', content);
 * if (!result.ok) {
 *     console.log(result.error.diff);
 * }
 * ```
 */
export async function checkBuildFile(
    buildFilePath: string,
    content: string,
    manifestPath?: string,
): Promise<Result<void, DriftDetectedError>> {
    const existing = await readExistingBuildFile(buildFilePath);
    if (existing === content) {
        return Ok(undefined);
    }

    const diff = createTwoFilesPatch(
        buildFilePath,
        buildFilePath,
        existing ?? '',
        content,
        'checked in',
        'generated',
    );
    return Err(
        new DriftDetectedError(
            buildFilePath,
            diff,
            existing === undefined,
            manifestPath,
        ),
    );
}
