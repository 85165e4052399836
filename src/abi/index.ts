/**
 * ABI layer
 * Type model, word codec, descriptors, bindings and event decoding
 */

// Type model
export {
  WORD_SIZE,
  uintType,
  intType,
  boolType,
  addressType,
  fixedBytesType,
  bytesType,
  stringType,
  fixedArrayType,
  arrayType,
  tupleType,
  canonicalType,
  headSizeOf,
  parseAbiType,
  parseParameter,
} from './types.js';
export type {
  AbiType,
  AbiTypeKind,
  UintType,
  IntType,
  BoolType,
  AddressType,
  FixedBytesType,
  BytesType,
  StringType,
  FixedArrayType,
  ArrayType,
  TupleComponent,
  TupleType,
} from './types.js';
export { assertValueMatches, integerBounds } from './value.js';
export type { AbiValue } from './value.js';

// Codec
export { Word, wordsToBytes, wordsToHex, wordsFromBytes } from './word.js';
export {
  encode as encodeWords,
  decode as decodeWords,
  encodeParameters,
  decodeParameters,
  decodeWord,
} from './codec.js';
export { toAbiValue, fromAbiValue, toAbiValues, usesNumber, hasNamedComponents, MAX_NUMBER_BITS } from './native.js';
export type { NativeValue } from './native.js';

// Descriptors
export { formatSignature, parseSignature, normalizeSignature, isSignature } from './signature.js';
export type { ParsedSignature } from './signature.js';
export {
  ContractDescriptor,
  isReadOnly,
  readAbiJson,
  parseContractDescriptor,
  tryParseContractDescriptor,
} from './descriptor.js';
export type {
  Param,
  EventParam,
  FunctionDescriptor,
  EventDescriptor,
  ErrorDescriptor,
  ConstructorDescriptor,
} from './descriptor.js';
export { DescriptorCache } from './descriptor-cache.js';
export type { DescriptorCacheOptions } from './descriptor-cache.js';

// Bindings
export {
  ContractBindings,
  generateBindings,
  describeNativeType,
  overloadName,
  overloadsConflict,
  typesOverlap,
} from './binding.js';
export type { BindingOptions, FunctionBinding, EventBinding, OverloadGroup, NativeParam } from './binding.js';
export { renderBindings } from './render.js';
export type { RenderOptions } from './render.js';
export { defineAbi } from './abi-types.js';
export type {
  TypedAbi,
  TypedAbiItem,
  TypedAbiFunction,
  TypedAbiEvent,
  TypedAbiParameter,
  AbiAliases,
  AbiSignature,
  CanonicalType,
  CallableName,
  AbiParameterInput,
  AbiParameterOutput,
  AbiFunctionInputs,
  AbiFunctionOutputs,
  AbiEventArgs,
  AbiFunctions,
  AbiEvents,
  AbiReadFunctions,
  AbiWriteFunctions,
  FunctionByCallable,
} from './abi-types.js';

// Events
export {
  decodeEventLog,
  decodeLogs,
  scanLogs,
  encodeEventTopics,
  eventArgsToRecord,
  eventArgToNative,
  isHashedWhenIndexed,
} from './events.js';
export type { RawLog, DecodedEvent, EventArgValue, TopicFilter, EventFilterArgs } from './events.js';

// Reverts
export { decodeRevertData, describePanic, ERROR_STRING_SELECTOR, PANIC_SELECTOR } from './revert.js';

// Linking
export { Bytecode, Linker } from './bytecode.js';
export type { PendingLibrary, LinkedDeployment } from './bytecode.js';
