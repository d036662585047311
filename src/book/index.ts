export { createBookRenderer } from "./book.ts";
export type { BookRenderer, BookRendererOptions } from "./book.ts";
export { loadBook } from "./load.ts";
export type { LoadBookOptions, LoadedBook } from "./load.ts";
