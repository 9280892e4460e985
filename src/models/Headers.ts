/**
 * Ordered multi-map of header values. Names are case-insensitive and stored
 * lower-case; values keep the order in which they were added.
 */
export default class Headers implements Iterable<[string, string[]]> {
    private readonly map = new Map<string, string[]>();

    constructor(init?: Iterable<[string, string | string[]]>) {
        if (init) {
            for (const [name, value] of init) this.append(name, value);
        }
    }

    get(name: string): string | undefined {
        return this.map.get(name.toLowerCase())?.[0];
    }

    getAll(name: string): string[] {
        return [...(this.map.get(name.toLowerCase()) ?? [])];
    }

    has(name: string): boolean {
        return this.map.has(name.toLowerCase());
    }

    set(name: string, value: string | string[]): this {
        const values = Array.isArray(value) ? [...value] : [value];
        if (values.length === 0) {
            this.map.delete(name.toLowerCase());
        } else {
            this.map.set(name.toLowerCase(), values);
        }
        return this;
    }

    append(name: string, value: string | string[]): this {
        const key = name.toLowerCase();
        const values = this.map.get(key) ?? [];
        values.push(...(Array.isArray(value) ? value : [value]));
        if (values.length > 0) this.map.set(key, values);
        return this;
    }

    delete(name: string): boolean {
        return this.map.delete(name.toLowerCase());
    }

    names(): string[] {
        return [...this.map.keys()];
    }

    clone(): Headers {
        const copy = new Headers();
        for (const [name, values] of this.map) copy.map.set(name, [...values]);
        return copy;
    }

    [Symbol.iterator](): Iterator<[string, string[]]> {
        return this.map.entries();
    }
}
