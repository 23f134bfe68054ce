export * from "./schema.js";
export * from "./dates.js";
