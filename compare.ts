/**
 * Three-way comparison: negative if a sorts before b, positive if after,
 * zero if they are equal.
 */
export type Comparator<T> = (a: T, b: T) => number;

export type Ordered = number | string | bigint;

export function compareOrdered<T extends Ordered>(a: T, b: T): -1 | 0 | 1 {
    if (a < b) return -1;
    if (a > b) return 1;
    if (a === b) return 0;
    // Only NaN reaches here: it equals itself and sorts before other numbers.
    const aNaN = a !== a, bNaN = b !== b;
    if (aNaN && bNaN) return 0;
    return aNaN ? -1 : 1;
}

export interface Person {
    name: string;
    age: number;
}

export function comparePerson(a: Person, b: Person): -1 | 0 | 1 {
    const order = compareOrdered(a.name, b.name);
    return order === 0 ? compareOrdered(a.age, b.age) : order;
}
