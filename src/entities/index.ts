export * from "./people.js";
export { isValidId } from "./types.js";
export type { Entity, EntityType } from "./types.js";
