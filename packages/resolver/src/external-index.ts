/**
 * External name-to-label mapping.
 *
 * Loaded once from the external registry configuration and never
 * mutated. All "which version was selected" questions live behind this
 * mapping; the translator only looks names up.
 */

import type { ResolvedLabel } from '@bazelify/types';

/**
 * Immutable mapping from registry crate names to external labels.
 *
 * @example
 * ```typescript
 * const externals = ExternalLabelIndex.fromPrefix('@crate_index//:', ['serde', 'tokio']);
 * externals.lookup('serde'); // '@crate_index//:serde'
 * externals.lookup('left-pad'); // undefined
 * ```
 */
export class ExternalLabelIndex {
    private readonly labels: ReadonlyMap<string, ResolvedLabel>;

    private constructor(labels: Map<string, ResolvedLabel>) {
        this.labels = labels;
        Object.freeze(this);
    }

    /**
     * Creates an index from explicit name/label pairs.
     */
    static fromEntries(
        entries: Iterable<readonly [string, ResolvedLabel]>,
    ): ExternalLabelIndex {
        return new ExternalLabelIndex(new Map(entries));
    }

    /**
     * Creates an index where every name maps to `<prefix><name>`.
     *
     * @param prefix - Label prefix of the external repository (e.g. `@crate_index//:`)
     * @param names - Registry crate names the repository provides
     */
    static fromPrefix(
        prefix: string,
        names: Iterable<string>,
    ): ExternalLabelIndex {
        return new ExternalLabelIndex(
            new Map(
                Array.from(names, (name): [string, ResolvedLabel] => [
                    name,
                    `${prefix}${name}`,
                ]),
            ),
        );
    }

    /**
     * Returns a new index with the entries of `other` taking precedence.
     */
    merge(other: ExternalLabelIndex): ExternalLabelIndex {
        return new ExternalLabelIndex(new Map([...this.labels, ...other.labels]));
    }

    /**
     * Looks up the label of a registry crate.
     */
    lookup(name: string): ResolvedLabel | undefined {
        return this.labels.get(name);
    }

    /** Number of crates in the index. */
    get size(): number {
        return this.labels.size;
    }
}
