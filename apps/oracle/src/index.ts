export * from "./abis.js";
export * from "./aggregator.js";
export * from "./bindings.js";
export * from "./capper.js";
export * from "./errors.js";
export * from "./governance.js";
export * from "./math.js";
export * from "./oracle.js";
export * from "./ownership.js";
export * from "./sources.js";
export * from "./store.js";
