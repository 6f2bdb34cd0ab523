/**
 * Universes order the scopes in which universal variables are introduced.
 *
 * Each time a binder is opened universally the checker enters the next
 * universe. An inference variable created in universe U may only be bound to
 * terms whose universal variables live in U or an enclosing universe.
 */
export class Universe {
    static readonly ROOT = new Universe(1);

    private constructor(readonly level: number) { }

    next(): Universe {
        return new Universe(this.level + 1);
    }

    /** True when this universe can see variables introduced in `other`. */
    canSee(other: Universe): boolean {
        return other.level <= this.level;
    }

    toString(): string {
        return `U${this.level}`;
    }
}
