"use strict";

export * from "./constants.js";
export * from "./encoding.js";
export * from "./elf.js";
export * from "./gnu.js";
export * from "./got.js";
export * from "./queries.js";
export * from "./range.js";
export * from "./regions.js";
export * from "./sections.js";
export * from "./segments.js";
export * from "./symbols.js";
export * from "./traversal.js";
export * from "./validate.js";
export * from "./width.js";
