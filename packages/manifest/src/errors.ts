/**
 * `@bazelify/manifest` - Error definitions
 *
 * Custom error classes for manifest reading and validation.
 */

import { BazelifyError, BazelifyErrorCode } from '@bazelify/types';

/**
 * Error thrown when the manifest is not well-formed TOML.
 */
export class ManifestParseError extends BazelifyError {
    readonly name = 'ManifestParseError';

    /**
     * @param message - Description of the syntax error
     * @param manifestPath - Path of the manifest, when read from disk
     * @param line - Line of the syntax error (1-based), when known
     * @param column - Column of the syntax error (1-based), when known
     * @param cause - The error raised by the TOML parser
     */
    constructor(
        message: string,
        manifestPath?: string,
        public readonly line?: number,
        public readonly column?: number,
        cause?: Error,
    ) {
        const location =
            line !== undefined ? ` at line ${line}, column ${column ?? 1}` : '';
        super(
            BazelifyErrorCode.MANIFEST_PARSE,
            `Malformed manifest${location}: ${message}`,
            { manifestPath, cause },
        );
    }
}

/**
 * Error thrown when the manifest is valid TOML but a field is missing, has
 * the wrong shape, or uses a form the translator cannot interpret.
 */
export class ManifestSchemaError extends BazelifyError {
    readonly name = 'ManifestSchemaError';

    /**
     * @param field - Dotted path of the offending field
     * @param problem - What is wrong with it
     * @param manifestPath - Path of the manifest, when read from disk
     * @param dependency - Declared name of the dependency, for dependency fields
     */
    constructor(
        field: string,
        problem: string,
        manifestPath?: string,
        dependency?: string,
    ) {
        super(BazelifyErrorCode.MANIFEST_SCHEMA, `${field}: ${problem}`, {
            manifestPath,
            field,
            dependency,
        });
    }
}
