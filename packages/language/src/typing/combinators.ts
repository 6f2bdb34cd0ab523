/**
 * Concurrent boolean and requirement combinators.
 *
 * All children start at once. The boolean forms settle as soon as the answer
 * is known (`exists` on the first `true`, `forAll` on the first `false`) and
 * otherwise wait for every child. Any child rejecting rejects the whole.
 */

import type { OrElse } from './or-else.js';
import { JUST_SO } from './or-else.js';
import type { Reporter } from './report.js';

export type Test = () => Promise<boolean>;

export function exists<T>(items: readonly T[], test: (item: T) => Promise<boolean>): Promise<boolean> {
    return race(items, test, true);
}

export function forAll<T>(items: readonly T[], test: (item: T) => Promise<boolean>): Promise<boolean> {
    return race(items, test, false);
}

export function either(a: Test, b: Test): Promise<boolean> {
    return exists([a, b], test => test());
}

export function both(a: Test, b: Test): Promise<boolean> {
    return forAll([a, b], test => test());
}

/** Resolves to `decisive` as soon as one child does, otherwise to its negation. */
function race<T>(items: readonly T[], test: (item: T) => Promise<boolean>, decisive: boolean): Promise<boolean> {
    if (items.length === 0) {
        return Promise.resolve(!decisive);
    }
    return new Promise<boolean>((resolve, reject) => {
        let remaining = items.length;
        for (const item of items) {
            test(item).then(result => {
                if (result === decisive) {
                    resolve(decisive);
                } else if (--remaining === 0) {
                    resolve(!decisive);
                }
            }, reject);
        }
    });
}

export async function requireBoth(a: () => Promise<void>, b: () => Promise<void>): Promise<void> {
    await Promise.all([a(), b()]);
}

export async function requireForAll<T>(items: readonly T[], require: (item: T) => Promise<void>): Promise<void> {
    await Promise.all(items.map(item => require(item)));
}

/** Fails with `orElse` (for no deeper reason) unless `test` holds. */
export async function require(reporter: Reporter, test: Promise<boolean>, orElse: OrElse): Promise<void> {
    if (!(await test)) {
        throw orElse.report(reporter, JUST_SO);
    }
}
