import { describe, it, expect } from 'vitest';
import { ExternalLabelIndex } from '../src/index.js';

describe('ExternalLabelIndex', () => {
    it('should map names under a prefix', () => {
        const index = ExternalLabelIndex.fromPrefix('@crate_index//:', [
            'serde',
            'tokio',
        ]);

        expect(index.lookup('serde')).toBe('@crate_index//:serde');
        expect(index.lookup('tokio')).toBe('@crate_index//:tokio');
        expect(index.size).toBe(2);
    });

    it('should return undefined for unknown names', () => {
        const index = ExternalLabelIndex.fromEntries([
            ['serde', '@crates//:serde'],
        ]);

        expect(index.lookup('left-pad')).toBeUndefined();
    });

    it('should let merged entries take precedence', () => {
        const base = ExternalLabelIndex.fromPrefix('@crate_index//:', [
            'serde',
            'tokio',
        ]);
        const overrides = ExternalLabelIndex.fromEntries([
            ['tokio', '//third_party/tokio'],
        ]);

        const merged = base.merge(overrides);

        expect(merged.lookup('serde')).toBe('@crate_index//:serde');
        expect(merged.lookup('tokio')).toBe('//third_party/tokio');
        expect(base.lookup('tokio')).toBe('@crate_index//:tokio');
    });

    it('should be frozen', () => {
        const index = ExternalLabelIndex.fromEntries([]);

        expect(Object.isFrozen(index)).toBe(true);
    });
});
