/**
 * Key/value store shared by the nodes of one tree instance.
 * The engine never reads it; it only hands a copy to every clone.
 */
export class Blackboard<TSchema extends object = Record<string, unknown>> {
    private readonly values: Partial<TSchema>;

    constructor(initial: Partial<TSchema> = {}) {
        this.values = { ...initial };
    }

    get<K extends keyof TSchema>(key: K): TSchema[K] | undefined {
        return this.values[key];
    }

    set<K extends keyof TSchema>(key: K, value: TSchema[K]): void {
        this.values[key] = value;
    }

    has<K extends keyof TSchema>(key: K): boolean {
        return this.values[key] !== undefined;
    }

    delete<K extends keyof TSchema>(key: K): boolean {
        const existed = this.has(key);
        delete this.values[key];
        return existed;
    }

    keys(): string[] {
        return Object.keys(this.values);
    }

    get size(): number {
        return this.keys().length;
    }

    /** Independent copy; values are copied by reference. */
    clone(): Blackboard<TSchema> {
        return new Blackboard<TSchema>(this.values);
    }
}
