/**
 * Path-to-label conversion.
 *
 * Pure string arithmetic over POSIX paths: no filesystem access, and no
 * dependency on the current working directory, so the same manifest
 * location always yields the same label.
 */

import { posix } from 'path';
import { Err, Ok, type ResolvedLabel, type Result } from '@bazelify/types';
import { toPosixPath } from '@bazelify/utils';

/**
 * How local labels are spelled.
 *
 * - `full`: always `//pkg/path:target`
 * - `compact`: `//pkg/path` when the target equals the last path segment
 */
export type LabelStyle = 'full' | 'compact';

const WINDOWS_DRIVE = /^[A-Za-z]:\//;

function isAbsolute(path: string): boolean {
    return path.startsWith('/') || WINDOWS_DRIVE.test(path);
}

function escapesRoot(path: string): boolean {
    return path === '..' || path.startsWith('../');
}

/**
 * Computes the repository-relative package path of a path dependency.
 *
 * @param manifestDir - Directory of the depending manifest, relative to the repository root
 * @param dependencyPath - The dependency path as written, relative to `manifestDir`
 * @returns The package path (empty string for the root package), or the reason it has none
 *
 * @example
 * ```typescript
 * toPackagePath('rs/replica', '../types/types'); // Ok('rs/types/types')
 * toPackagePath('rs', '../../elsewhere');        // Err('path escapes the repository root')
 * ```
 */
export function toPackagePath(
    manifestDir: string,
    dependencyPath: string,
): Result<string, string> {
    const dir = toPosixPath(manifestDir);
    const target = toPosixPath(dependencyPath);

    if (isAbsolute(target)) {
        return Err('absolute paths cannot be expressed as labels');
    }
    if (isAbsolute(dir) || escapesRoot(posix.normalize(dir || '.'))) {
        return Err('the manifest directory is not inside the repository root');
    }

    const joined = posix.join(dir || '.', target).replace(/\/+$/, '');
    if (escapesRoot(joined)) {
        return Err('path escapes the repository root');
    }
    return Ok(joined === '.' ? '' : joined);
}

/**
 * Spells a label for a target in a repository package.
 *
 * @param packagePath - Repository-relative package path (empty for the root)
 * @param targetName - Target inside the package
 */
export function formatLabel(
    packagePath: string,
    targetName: string,
    style: LabelStyle = 'full',
): ResolvedLabel {
    const lastSegment = packagePath.slice(packagePath.lastIndexOf('/') + 1);
    if (style === 'compact' && packagePath !== '' && lastSegment === targetName) {
        return `//${packagePath}`;
    }
    return `//${packagePath}:${targetName}`;
}

/**
 * Converts a path dependency into a label.
 *
 * @param manifestDir - Directory of the depending manifest, relative to the repository root
 * @param dependencyPath - The dependency path as written in the manifest
 * @param targetName - Target name inside the dependency's package
 * @returns The label, or the reason the path cannot be expressed as one
 *
 * @example
 * ```typescript
 * pathToLabel('path/to/widgets', '../core_utils', 'core_utils');
 * // Ok('//path/to/core_utils:core_utils')
 * ```
 */
export function pathToLabel(
    manifestDir: string,
    dependencyPath: string,
    targetName: string,
    style: LabelStyle = 'full',
): Result<ResolvedLabel, string> {
    const packagePath = toPackagePath(manifestDir, dependencyPath);
    if (!packagePath.ok) {
        return packagePath;
    }
    return Ok(formatLabel(packagePath.value, targetName, style));
}
