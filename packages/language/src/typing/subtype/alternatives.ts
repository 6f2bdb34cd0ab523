import { Deferred } from 'langium';
import { InvariantViolation } from '../report.js';
import type { Speculation } from '../runtime/check-runtime.js';

/**
 * Shared state of one proof-search tree: whether a branch has already
 * succeeded, and a signal raised whenever the set of live branches changes.
 */
class AlternativeTree {
    private change = new Deferred<void>();
    concluded = false;

    nextChange(): Promise<void> {
        return this.change.promise;
    }

    changed(): void {
        const current = this.change;
        this.change = new Deferred<void>();
        current.resolve();
    }
}

/**
 * A node in the tree of candidate derivations for one obligation.
 *
 * A node is required when it and every ancestor is the only live child of
 * its parent. Required nodes impose hard constraints (which makes inference
 * stronger); other nodes only test. A child stays live until it is released,
 * so callers release in a `finally` block.
 */
export class Alternative {
    private liveChildren = 0;
    private hasSpawned = false;
    private released = false;

    private constructor(
        private readonly tree: AlternativeTree,
        private readonly parent: Alternative | undefined,
    ) { }

    static root(): Alternative {
        return new Alternative(new AlternativeTree(), undefined);
    }

    /**
     * Creates `count` children at once, so that none of them counts as
     * required before its siblings exist.
     */
    spawnChildren(count: number): Alternative[] {
        if (this.hasSpawned) {
            throw new InvariantViolation('alternative already has children');
        }
        this.hasSpawned = true;
        this.liveChildren = count;
        return Array.from({ length: count }, () => new Alternative(this.tree, this));
    }

    get isRequired(): boolean {
        if (this.tree.concluded) {
            return false;
        }
        if (this.parent === undefined) {
            return true;
        }
        return this.parent.liveChildren === 1 && this.parent.isRequired;
    }

    release(): void {
        if (this.released || this.parent === undefined) {
            return;
        }
        this.released = true;
        this.parent.liveChildren--;
        this.tree.changed();
    }

    /** Marks the obligation as proven; no remaining branch will commit anything. */
    conclude(): void {
        this.tree.concluded = true;
        this.tree.changed();
    }

    /**
     * Runs `required` if this node is required, otherwise `speculative`.
     * The choice is revisited whenever a sibling is released, so a test that
     * is still waiting when its siblings fail is replaced by the requirement.
     * An abandoned test is marked through its {@link Speculation} so that the
     * runtime stops waking it.
     */
    async ifRequired(required: () => Promise<void>, speculative: (speculation: Speculation) => Promise<boolean>): Promise<boolean> {
        for (;;) {
            if (this.isRequired) {
                await required();
                return true;
            }
            const change = this.tree.nextChange().then(() => undefined);
            const speculation = { abandoned: false };
            const test = speculative(speculation);
            const outcome = await Promise.race([test, change]);
            if (outcome !== undefined) {
                return outcome;
            }
            speculation.abandoned = true;
            // a later failure has nothing left to report to
            test.catch(() => undefined);
        }
    }
}
