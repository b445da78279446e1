export type Numeric = number | bigint;

export function double(n: number): number;
export function double(n: bigint): bigint;
export function double(n: Numeric): Numeric {
    return typeof n === 'bigint' ? 2n * n : 2 * n;
}
