export * as json from "./json/index.js";
export { JsonObject, parse, stringify } from "./json/index.js";
export type { Value } from "./json/index.js";
export * from "./protocols/jsonrpc/index.js";
export { JsonAccessError } from "./shared/errors.js";
