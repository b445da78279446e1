/**
 * A number that knows how to render itself.
 */
export interface Printable {
    valueOf(): number;
    toString(): string;
}

export class PrintableFloat implements Printable {
    constructor(readonly value: number) { }

    valueOf(): number {
        return this.value;
    }

    toString(): string {
        return this.value.toFixed(2);
    }
}

export function printPrintable(p: Printable): void {
    console.log(p.toString());
}
