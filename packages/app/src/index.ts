// CHANGE: expose the literal value library surface
// WHY: parser, executor and transport code import one entry point
// QUOTE(TZ): "one entry point for values, the AST bridge, marshalling and serialization"
// REF: req-public-api-1
// SOURCE: n/a
// FORMAT THEOREM: ∀m ∈ exports: m ∈ core
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: only pure modules are re-exported
// COMPLEXITY: O(1)/O(1)

export { astEquals, astToValue, printValue, valueToAST } from "./core/ast.js"
export type { Json, JsonObject } from "./core/json.js"
export { parseLiteral } from "./core/literal.js"
export * as Marshal from "./core/marshal.js"
export type { EmptyList, FromValue, FromValueError, ToValue, WrongType } from "./core/marshal.js"
export * as OrderedMap from "./core/ordered-map.js"
export { roundtripFromAST, roundtripFromValue, roundtripValue } from "./core/properties.js"
export { GraphQLString, Int32, Name } from "./core/scalars.js"
export {
  fromJson,
  jsonDecodeError,
  objectToJson,
  serializeObject,
  serializeValue,
  toJson
} from "./core/serialize.js"
export type { JsonDecodeError } from "./core/serialize.js"
export {
  childValues,
  emptyObject,
  lookupField,
  makeList,
  makeObject,
  objectField,
  objectFields,
  objectFromList,
  toObject,
  unionObjects,
  valueBoolean,
  valueEnum,
  valueFloat,
  valueInt,
  valueList,
  valueNull,
  valueObject,
  valueString
} from "./core/value.js"
export type {
  List,
  ObjectField,
  ObjectValue,
  Value,
  ValueBoolean,
  ValueEnum,
  ValueFloat,
  ValueInt,
  ValueList,
  ValueNull,
  ValueObject,
  ValueString
} from "./core/value.js"
export { equals, ValueEquivalence, ValueOrder } from "./core/value-order.js"
