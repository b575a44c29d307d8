export * from "./error/domain-error.js";
export * from "./i18n/index.js";
