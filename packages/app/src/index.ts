export {
  asArray,
  asBoolean,
  asInteger,
  asNumber,
  asObject,
  asString,
  at,
  equals,
  getIndex,
  getMember,
  isNull,
  size,
  toNative,
  typeOf
} from "./core/access.js"
export type { PathSegment } from "./core/access.js"
export { boundedAllocator, systemAllocator } from "./core/allocator.js"
export type { Allocator, AllocatorUsage, BoundedAllocatorOptions } from "./core/allocator.js"
export {
  append,
  destroy,
  fromNative,
  makeArray,
  makeBoolean,
  makeNull,
  makeNumber,
  makeObject,
  makeString,
  removeMember,
  setMember
} from "./core/construct.js"
export type { BuildError } from "./core/construct.js"
export type {
  AllocationError,
  DepthLimitError,
  EngineError,
  JsonSyntaxError,
  OwnershipError,
  ParseError,
  Position,
  TrailingDataError,
  TypeMismatchError
} from "./core/errors.js"
export { makeHeap, MAX_TREE_DEPTH } from "./core/heap.js"
export type { Heap, HeapOptions, HeapUsage } from "./core/heap.js"
export type { Json, JsonRecord } from "./core/json.js"
export { DEFAULT_MAX_DEPTH, parse } from "./core/parser.js"
export type { ParseOptions } from "./core/parser.js"
export type { Conformance } from "./core/scanner.js"
export { DEFAULT_INDENT, serialize, serializeLine, serializeWith } from "./core/serializer.js"
export type { SerializeOptions } from "./core/serializer.js"
export type {
  JsonArray,
  JsonBoolean,
  JsonContainer,
  JsonMember,
  JsonNull,
  JsonNumber,
  JsonObject,
  JsonString,
  JsonValue,
  ValueTag
} from "./core/value.js"
export { isContainer } from "./core/value.js"
