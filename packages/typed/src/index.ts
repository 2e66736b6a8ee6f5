// @inispan/typed
//
// Typed value coercion with explicit literal sets.

export { FALSE_LITERALS, TRUE_LITERALS, toBoolean, toFloat, toInteger, toList, type ListOptions } from "./coerce.js";
export { CoercionError, TypedReader, type Typed, type ValueKind } from "./reader.js";
