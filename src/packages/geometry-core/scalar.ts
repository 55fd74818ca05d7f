/**
 * What side offsets need from their scalar type: a zero and an addition.
 * Overflow or saturation is whatever `add` does; callers see it unchanged.
 *
 * `equals` and `format` default to `===` and `String`; object scalars
 * (decimals, fixed-point wrappers) should supply their own.
 */
export type Scalar<T> = {
    zero: () => T;
    add: (a: T, b: T) => T;
    equals?: (a: T, b: T) => boolean;
    format?: (v: T) => string;
};

export function scalarEquals<T>(scalar: Scalar<T>, a: T, b: T): boolean {
    return scalar.equals ? scalar.equals(a, b) : a === b;
}

export function formatScalar<T>(scalar: Scalar<T>, v: T): string {
    return scalar.format ? scalar.format(v) : String(v);
}

export const numberScalar: Scalar<number> = {
    zero: () => 0,
    add: (a, b) => a + b,
};

export const bigintScalar: Scalar<bigint> = {
    zero: () => 0n,
    add: (a, b) => a + b,
};

/** Integer arithmetic that refuses to leave the safe-integer range. */
export const safeIntegerScalar: Scalar<number> = {
    zero: () => 0,
    add: (a, b) => {
        const sum = a + b;
        if (!Number.isSafeInteger(sum)) {
            throw new RangeError(`safeIntegerScalar.add: ${a} + ${b} is not a safe integer`);
        }
        return sum;
    },
};
