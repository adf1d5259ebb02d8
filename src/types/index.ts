export * from "./entities.js";
export * from "./sparql.js";
