/**
 * @bazelify/utils
 *
 * Shared utility functions for bazelify packages
 */

/**
 * The current version of bazelify
 *
 * Used for displaying version information in the CLI.
 */
export const VERSION = '0.1.0';

/**
 * Converts a file path to use POSIX-style forward slashes.
 * Build-graph labels always use forward slashes, whatever the host.
 *
 * @param filePath - The file path to normalize
 * @returns The path with all backslashes replaced with forward slashes
 */
export function toPosixPath(filePath: string): string {
    return filePath.replaceAll('\\', '/');
}

/**
 * Converts a package or target name into the identifier rustc uses for
 * the crate (`ic-types` becomes `ic_types`).
 */
export function toCrateIdentifier(name: string): string {
    return name.replaceAll('-', '_');
}

/**
 * Removes duplicates while keeping the first occurrence of each item.
 *
 * @example
 * ```ts
 * uniqueInOrder(['b', 'a', 'b']); // ['b', 'a']
 * ```
 */
export function uniqueInOrder<T>(items: Iterable<T>): T[] {
    return Array.from(new Set(items));
}

/**
 * Compares strings by UTF-16 code units, independent of the host locale.
 */
export function compareCodeUnits(a: string, b: string): number {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
}
