export * from "./schema";
export * from "./scalar";
export * from "./length";
export * from "./sideOffsets";
