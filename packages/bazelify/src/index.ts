#!/usr/bin/env node
/**
 * Entry point for the bazelify CLI application.
 *
 * This module serves as the executable wrapper that bootstraps the CLI by
 * importing and invoking the main function from `@bazelify/cli`. It reports
 * any fatal error that escapes the CLI's own error handling.
 *
 * @packageDocumentation
 */

import { main } from '@bazelify/cli';

main().catch((error: unknown) => {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`\n[bazelify] A fatal, unhandled error occurred: ${message}`);
    if (process.env.DEBUG && error instanceof Error) {
        console.error(error.stack);
    }
    process.exit(1);
});
