import { freeze, produce, type Draft } from "immer";
import type { Length, Side, SideOffsets, SidesPatch, UnknownUnit } from "./schema";
import { SIDE_ORDER } from "./schema";
import { length, lengthValue } from "./length";
import { formatScalar, numberScalar, scalarEquals, type Scalar } from "./scalar";

export function newSideOffsets<T, U = UnknownUnit>(top: T, right: T, bottom: T, left: T): SideOffsets<T, U> {
    return freeze({ top, right, bottom, left });
}

/** Same as `newSideOffsets`, but the unit comes from the lengths passed in. */
export function sideOffsetsFromLengths<T, U>(
    top: Length<T, U>,
    right: Length<T, U>,
    bottom: Length<T, U>,
    left: Length<T, U>
): SideOffsets<T, U> {
    return newSideOffsets<T, U>(lengthValue(top), lengthValue(right), lengthValue(bottom), lengthValue(left));
}

export function newSideOffsetsAllSame<T, U = UnknownUnit>(all: T): SideOffsets<T, U> {
    return newSideOffsets<T, U>(all, all, all, all);
}

export function sideOffsetsAllSameFromLength<T, U>(all: Length<T, U>): SideOffsets<T, U> {
    return newSideOffsetsAllSame<T, U>(lengthValue(all));
}

// typed access: re-attach the unit to a raw side

export function topTyped<T, U>(o: SideOffsets<T, U>): Length<T, U> {
    return length<T, U>(o.top);
}

export function rightTyped<T, U>(o: SideOffsets<T, U>): Length<T, U> {
    return length<T, U>(o.right);
}

export function bottomTyped<T, U>(o: SideOffsets<T, U>): Length<T, U> {
    return length<T, U>(o.bottom);
}

export function leftTyped<T, U>(o: SideOffsets<T, U>): Length<T, U> {
    return length<T, U>(o.left);
}

/**
 * Replace some sides, keep the rest.
 * `undefined` entries are skipped so a sparse patch can't blank a side.
 */
export function withSides<T, U>(o: SideOffsets<T, U>, patch: SidesPatch<T>): SideOffsets<T, U> {
    const pick = (side: Side): T => {
        const v = patch[side];
        return v === undefined ? o[side] : v;
    };
    return newSideOffsets<T, U>(pick("top"), pick("right"), pick("bottom"), pick("left"));
}

/**
 * Copy-on-write update through an immer draft.
 * Returns `o` itself when the recipe changes nothing.
 */
export function updateSideOffsets<T, U>(
    o: SideOffsets<T, U>,
    recipe: (draft: Draft<SideOffsets<T, U>>) => void
): SideOffsets<T, U> {
    return produce(o, recipe);
}

/**
 * Arithmetic that depends on the scalar type.
 *
 * ```ts
 * const { add, horizontal } = createSideOffsetsOps(bigintScalar);
 * horizontal(add(a, b));
 * ```
 */
export function createSideOffsetsOps<T>(scalar: Scalar<T>) {
    function zero<U = UnknownUnit>(): SideOffsets<T, U> {
        return newSideOffsets<T, U>(scalar.zero(), scalar.zero(), scalar.zero(), scalar.zero());
    }

    function horizontal<U>(o: SideOffsets<T, U>): T {
        return scalar.add(o.left, o.right);
    }

    function vertical<U>(o: SideOffsets<T, U>): T {
        return scalar.add(o.top, o.bottom);
    }

    function horizontalTyped<U>(o: SideOffsets<T, U>): Length<T, U> {
        return length<T, U>(horizontal(o));
    }

    function verticalTyped<U>(o: SideOffsets<T, U>): Length<T, U> {
        return length<T, U>(vertical(o));
    }

    // both operands must share T and U; mixing units fails to compile
    function add<U>(a: SideOffsets<T, U>, b: SideOffsets<T, U>): SideOffsets<T, U> {
        return newSideOffsets<T, U>(
            scalar.add(a.top, b.top),
            scalar.add(a.right, b.right),
            scalar.add(a.bottom, b.bottom),
            scalar.add(a.left, b.left)
        );
    }

    function equal<U>(a: SideOffsets<T, U>, b: SideOffsets<T, U>): boolean {
        return SIDE_ORDER.every((side) => scalarEquals(scalar, a[side], b[side]));
    }

    /** Debug text, `(top,right,bottom,left)`. */
    function format<U>(o: SideOffsets<T, U>): string {
        return `(${SIDE_ORDER.map((side) => formatScalar(scalar, o[side])).join(",")})`;
    }

    return { zero, horizontal, vertical, horizontalTyped, verticalTyped, add, equal, format };
}

export const {
    zero,
    horizontal,
    vertical,
    horizontalTyped,
    verticalTyped,
    add,
    equal: sideOffsetsEqual,
    format: formatSideOffsets,
} = createSideOffsetsOps(numberScalar);
