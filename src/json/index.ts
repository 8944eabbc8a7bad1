export { JsonObject } from "./object.js";
export { JsonParser, parse } from "./parser.js";
export { quote, stringify } from "./serializer.js";
export {
  array,
  asArray,
  asBool,
  asNumber,
  asObject,
  asString,
  bool,
  equals,
  fromNative,
  isArray,
  isBool,
  isNull,
  isNumber,
  isObject,
  isString,
  nullValue,
  number,
  object,
  string,
  toNative,
  tryInteger,
} from "./value.js";
export type {
  JsonArray,
  JsonBool,
  JsonNull,
  JsonNumber,
  JsonObjectValue,
  JsonString,
  NativeJson,
  Value,
  ValueKind,
} from "./value.js";
