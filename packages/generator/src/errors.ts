/**
 * `@bazelify/generator` - Error definitions
 */

import { BazelifyError, BazelifyErrorCode } from '@bazelify/types';

/**
 * Error thrown when one target would need two different aliases for the
 * same label, or one alias for two labels.
 */
export class AliasConflictError extends BazelifyError {
    readonly name = 'AliasConflictError';

    /**
     * @param target - Name of the target being synthesized
     * @param alias - The rename involved in the conflict
     * @param detail - What collided
     * @param manifestPath - Path of the manifest, for error context
     */
    constructor(
        public readonly target: string,
        public readonly alias: string,
        detail: string,
        manifestPath?: string,
    ) {
        super(
            BazelifyErrorCode.ALIAS_CONFLICT,
            `Alias conflict in target '${target}': ${detail}`,
            { manifestPath, dependency: alias },
        );
    }
}

/**
 * Reported (not thrown) by check mode when a build file differs from what
 * regeneration would produce.
 */
export class DriftDetectedError extends BazelifyError {
    readonly name = 'DriftDetectedError';

    /**
     * @param buildFilePath - The stale build file
     * @param diff - Unified diff from the checked-in content to the generated one
     * @param missing - Whether the build file does not exist at all
     * @param manifestPath - Manifest the build file is generated from
     */
    constructor(
        public readonly buildFilePath: string,
        public readonly diff: string,
        public readonly missing: boolean,
        manifestPath?: string,
    ) {
        super(
            BazelifyErrorCode.DRIFT_DETECTED,
            missing
                ? `Build file ${buildFilePath} does not exist`
                : `Build file ${buildFilePath} is out of date with its manifest`,
            { manifestPath },
        );
    }
}
