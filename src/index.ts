export * from "./book/index.ts";
export * from "./config/index.ts";
export * from "./format/index.ts";
export * from "./helpers/index.ts";
export * from "./html/index.ts";
export * from "./i18n/index.ts";
export * from "./page/index.ts";
export * from "./recipe/index.ts";
export * from "./registry/index.ts";
export * from "./resource/index.ts";
export * from "./texture/index.ts";
