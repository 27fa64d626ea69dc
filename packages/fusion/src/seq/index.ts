export * from "./create.js";
export * from "./transform.js";
export * from "./reorder.js";
export * from "./consume.js";
