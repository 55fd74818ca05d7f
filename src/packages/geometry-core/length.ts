import { freeze } from "immer";
import type { Length, UnknownUnit } from "./schema";

export function length<T, U = UnknownUnit>(value: T): Length<T, U> {
    return freeze({ value });
}

export function lengthValue<T, U>(l: Length<T, U>): T {
    return l.value;
}
