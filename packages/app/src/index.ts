export * as JsonArray from "./core/array.js"
export type { ConversionTarget, ConversionTargets, IntegerTarget } from "./core/conversion.js"
export { convert, convertOr, isConversionTarget } from "./core/conversion.js"
export type { Entry } from "./core/entries.js"
export type {
  AppError,
  BadConversion,
  ConversionError,
  NotImplemented,
  StringifyError,
  UnsupportedValue
} from "./core/errors.js"
export { formatAppError } from "./core/errors.js"
export type { FromJsonOptions, Json, JsonRecord, OrderedJson } from "./core/json.js"
export { fromJson, toJson, toOrderedJson } from "./core/json.js"
export * as JsonObject from "./core/object.js"
export type { JsonParseError, ParseOptions } from "./core/parse.js"
export { parseJson, parseObject } from "./core/parse.js"
export type { OutputSink, StringSink } from "./core/stringify.js"
export { makeStringSink, stringify, toText } from "./core/stringify.js"
export * as Var from "./core/var.js"
