/** Properties of types and permissions that where-clauses and obligations can ask for. */
export enum Predicate {
    Copy = 'copy',
    Move = 'move',
    Owned = 'owned',
    Lent = 'lent',
}

/** Predicates no permission can satisfy together. */
export function opposite(predicate: Predicate): Predicate {
    switch (predicate) {
        case Predicate.Copy: return Predicate.Move;
        case Predicate.Move: return Predicate.Copy;
        case Predicate.Owned: return Predicate.Lent;
        case Predicate.Lent: return Predicate.Owned;
    }
}
