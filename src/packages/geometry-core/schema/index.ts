declare const unitName: unique symbol;
declare const unitTag: unique symbol;

/**
 * Compile-time unit marker. Declare units as `type Px = Unit<"px">`;
 * different names never assign to each other.
 */
export type Unit<Name extends string> = {
    readonly [unitName]: Name;
};

/** Unit for values that don't carry a specific unit. */
export type UnknownUnit = Unit<"unknown">;

/**
 * Phantom slot for the unit tag. The key is never written at runtime,
 * it only exists so `U` takes part in assignability.
 */
export type UnitTagged<U> = {
    readonly [unitTag]?: U;
};

/** A scalar tagged with a unit. */
export type Length<T, U = UnknownUnit> = UnitTagged<U> & {
    readonly value: T;
};

// debug text + iteration order
export const SIDE_ORDER = ["top", "right", "bottom", "left"] as const;

export type Side = (typeof SIDE_ORDER)[number];

/**
 * Four independent offsets, as used by CSS border/padding/margin boxes.
 * No sign or magnitude rules between sides.
 */
export type SideOffsets<T, U = UnknownUnit> = UnitTagged<U> & {
    readonly top: T;
    readonly right: T;
    readonly bottom: T;
    readonly left: T;
};

export type UntypedSideOffsets<T = number> = SideOffsets<T, UnknownUnit>;

export type SidesPatch<T> = Partial<Record<Side, T>>;
