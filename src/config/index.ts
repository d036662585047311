export { loadProperties, parseProperties, propertiesSchema } from "./config.ts";
export type { Properties } from "./config.ts";
