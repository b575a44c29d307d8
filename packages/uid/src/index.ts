export * from "./domain/checksum.js";
export * from "./domain/nibble.js";
export * from "./domain/uid-error.js";
export * from "./domain/uid-format.js";
export * from "./domain/value/swiss-uid.js";
export * from "./validation/uid-schema.js";
