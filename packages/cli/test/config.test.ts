/**
 * Tests for repository configuration
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import type { Dependency } from '@bazelify/types';
import {
    CONFIG_FILE_NAME,
    ConfigError,
    DEFAULT_CONFIG,
    loadConfig,
    validateConfig,
} from '../src/index.js';

function dependency(name: string, procMacro = false): Dependency {
    return {
        name,
        role: 'normal',
        requirement: '1.0',
        features: [],
        defaultFeatures: true,
        optional: false,
        procMacro,
    };
}

describe('validateConfig', () => {
    it('should build the external mapping from a prefix and explicit labels', () => {
        const config = validateConfig(
            {
                externalPrefix: '@crates//:',
                crates: ['serde', 'tokio'],
                labels: { tokio: '//third_party/tokio:tokio' },
            },
            'bazelify.config.json',
        );

        expect(config.externals.lookup('serde')).toBe('@crates//:serde');
        expect(config.externals.lookup('tokio')).toBe(
            '//third_party/tokio:tokio',
        );
        expect(config.externals.lookup('rand')).toBeUndefined();
    });

    it('should apply defaults for omitted keys', () => {
        const config = validateConfig({}, 'bazelify.config.json');

        expect(config.sourcePrecedence).toBe('path-wins');
        expect(config.labelStyle).toBe('full');
        expect(config.buildFileName).toBe('BUILD.bazel');
        expect(config.rulesRepository).toBe('@rules_rust');
        expect(config.externals.size).toBe(0);
    });

    it('should honour the configured policies', () => {
        const config = validateConfig(
            {
                sourcePrecedence: 'strict',
                labelStyle: 'compact',
                buildFileName: 'BUILD',
                rulesRepository: '@rust_rules',
            },
            'bazelify.config.json',
        );

        expect(config.sourcePrecedence).toBe('strict');
        expect(config.labelStyle).toBe('compact');
        expect(config.buildFileName).toBe('BUILD');
        expect(config.rulesRepository).toBe('@rust_rules');
    });

    it('should treat listed crates and flagged dependencies as macros', () => {
        const config = validateConfig(
            { macroCrates: ['serde_derive'] },
            'bazelify.config.json',
        );

        expect(config.isMacro(dependency('serde_derive'))).toBe(true);
        expect(config.isMacro(dependency('my_macros', true))).toBe(true);
        expect(config.isMacro(dependency('serde'))).toBe(false);
    });

    it('should report every problem at once', () => {
        let caught: unknown;
        try {
            validateConfig(
                {
                    crates: ['serde'],
                    labelStyle: 'short',
                    labels: { tokio: '' },
                    buildFileName: 'rust/BUILD',
                    extra: true,
                },
                'repo/bazelify.config.json',
            );
        } catch (error) {
            caught = error;
        }

        expect(caught).toBeInstanceOf(ConfigError);
        if (!(caught instanceof ConfigError)) return;
        expect(caught.code).toBe('INVALID_CONFIG');
        expect(caught.problems).toEqual([
            'unknown key "extra"',
            'labels.tokio must be a non-empty string',
            'labelStyle must be one of full, compact',
            'crates requires externalPrefix',
            'buildFileName must be a file name, not a path',
        ]);
    });

    it('should reject a configuration that is not an object', () => {
        expect(() => validateConfig(['serde'], 'bazelify.config.json')).toThrow(
            'Invalid configuration bazelify.config.json: expected a JSON object',
        );
    });

    it('should reject mistyped lists', () => {
        expect(() =>
            validateConfig({ macroCrates: 'serde_derive' }, 'c.json'),
        ).toThrow(
            'Invalid configuration c.json: macroCrates must be an array of strings',
        );
    });
});

describe('loadConfig', () => {
    let tempDir: string;

    beforeEach(async () => {
        tempDir = await mkdtemp(join(tmpdir(), 'config-test-'));
    });

    afterEach(async () => {
        await rm(tempDir, { recursive: true, force: true });
    });

    it('should fall back to the defaults without a configuration file', async () => {
        await expect(loadConfig(tempDir)).resolves.toBe(DEFAULT_CONFIG);
    });

    it('should read the default configuration file', async () => {
        await writeFile(
            join(tempDir, CONFIG_FILE_NAME),
            JSON.stringify({ externalPrefix: '@crates//:', crates: ['serde'] }),
        );

        const config = await loadConfig(tempDir);

        expect(config.externals.lookup('serde')).toBe('@crates//:serde');
    });

    it('should require an explicit configuration file to exist', async () => {
        const path = join(tempDir, 'custom.json');

        await expect(loadConfig(tempDir, path)).rejects.toThrow(
            `Invalid configuration ${path}: file not found`,
        );
    });

    it('should report malformed JSON', async () => {
        const path = join(tempDir, CONFIG_FILE_NAME);
        await writeFile(path, '{ "crates": [');

        const error: unknown = await loadConfig(tempDir).catch(
            (reason: unknown) => reason,
        );

        expect(error).toBeInstanceOf(ConfigError);
        if (!(error instanceof ConfigError)) return;
        expect(error.problems).toHaveLength(1);
        expect(error.problems[0]).toMatch(/^malformed JSON \(/);
    });
});
