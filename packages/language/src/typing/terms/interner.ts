/**
 * Hash-consing table: structurally equal values built through the same
 * interner are the same object, so `===` is structural equality.
 */
export class Interner<T> {
    private readonly table = new Map<string, T>();

    intern(key: string, create: (id: number) => T): T {
        const existing = this.table.get(key);
        if (existing !== undefined) {
            return existing;
        }
        const value = create(this.table.size);
        this.table.set(key, value);
        return value;
    }
}
