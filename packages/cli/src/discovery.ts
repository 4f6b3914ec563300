/**
 * Repository root and manifest discovery.
 */

import { existsSync } from 'fs';
import { readdir } from 'fs/promises';
import { dirname, join, relative, resolve } from 'path';
import { compareCodeUnits, toPosixPath } from '@bazelify/utils';

/** Files marking the root of a build repository. */
export const ROOT_MARKERS = ['MODULE.bazel', 'WORKSPACE.bazel', 'WORKSPACE'];

/** Manifest file name. */
export const MANIFEST_FILE_NAME = 'Cargo.toml';

const SKIPPED_DIRECTORIES = new Set(['target', '.git', 'node_modules']);

function isSkippedDirectory(name: string): boolean {
    return SKIPPED_DIRECTORIES.has(name) || name.startsWith('bazel-');
}

/**
 * Finds the nearest ancestor of `startDir` (itself included) that holds a
 * root marker file.
 *
 * @returns The absolute repository root, or `undefined` if none is found
 */
export function findRepoRoot(startDir: string): string | undefined {
    let current = resolve(startDir);
    for (;;) {
        if (ROOT_MARKERS.some((marker) => existsSync(join(current, marker)))) {
            return current;
        }
        const parent = dirname(current);
        if (parent === current) {
            return undefined;
        }
        current = parent;
    }
}

/**
 * Finds every manifest under the repository root.
 *
 * Build output (`target`, `bazel-*`), VCS metadata and `node_modules` are
 * not searched.
 *
 * @param repoRoot - Repository root directory
 * @returns Absolute manifest paths, sorted
 */
export async function discoverManifests(repoRoot: string): Promise<string[]> {
    const manifests: string[] = [];

    async function walk(dir: string): Promise<void> {
        const entries = await readdir(dir, { withFileTypes: true });
        for (const entry of entries) {
            if (entry.isDirectory()) {
                if (!isSkippedDirectory(entry.name)) {
                    await walk(join(dir, entry.name));
                }
            } else if (entry.isFile() && entry.name === MANIFEST_FILE_NAME) {
                manifests.push(join(dir, entry.name));
            }
        }
    }

    await walk(resolve(repoRoot));
    return manifests.sort(compareCodeUnits);
}

/**
 * Expresses a path relative to the repository root with `/` separators.
 *
 * @returns The relative path (empty for the root itself), or `undefined`
 *          when the path lies outside the repository
 */
export function toRepoRelative(
    repoRoot: string,
    path: string,
): string | undefined {
    const relativePath = toPosixPath(relative(resolve(repoRoot), resolve(path)));
    if (relativePath === '..' || relativePath.startsWith('../')) {
        return undefined;
    }
    if (relativePath.startsWith('/') || /^[A-Za-z]:/.test(relativePath)) {
        return undefined;
    }
    return relativePath;
}
