/**
 * ABI type inference
 *
 * Infers the native TypeScript surface of an ABI declared `as const`, using
 * the same mapping and callable naming as the runtime binding generator:
 *
 * ```typescript
 * const abi = defineAbi([...]);
 * type Balance = AbiFunctionOutputs<FunctionByCallable<typeof abi, 'balanceOf'>>; // bigint
 * ```
 *
 * Type-level aliases must be keyed by canonical signature.
 */

import type { Address, Hash, Hex, StateMutability } from '../core/types.js';

// ============ ABI shapes ============

export interface TypedAbiParameter {
  readonly name?: string;
  readonly type: string;
  readonly indexed?: boolean;
  readonly components?: readonly TypedAbiParameter[];
}

export interface TypedAbiFunction {
  readonly type: 'function';
  readonly name: string;
  readonly inputs: readonly TypedAbiParameter[];
  readonly outputs?: readonly TypedAbiParameter[];
  readonly stateMutability?: StateMutability;
  readonly constant?: boolean;
  readonly payable?: boolean;
}

export interface TypedAbiEvent {
  readonly type: 'event';
  readonly name: string;
  readonly inputs: readonly TypedAbiParameter[];
  readonly anonymous?: boolean;
}

export type TypedAbiItem =
  | TypedAbiFunction
  | TypedAbiEvent
  | { readonly type: 'constructor'; readonly inputs: readonly TypedAbiParameter[]; readonly stateMutability?: StateMutability }
  | { readonly type: 'fallback'; readonly stateMutability?: StateMutability }
  | { readonly type: 'receive'; readonly stateMutability?: StateMutability }
  | { readonly type: 'error'; readonly name: string; readonly inputs: readonly TypedAbiParameter[] };

export type TypedAbi = readonly TypedAbiItem[];

// ============ Helpers ============

type Join<T extends readonly string[], S extends string> = T extends readonly []
  ? ''
  : T extends readonly [infer F extends string]
    ? F
    : T extends readonly [infer F extends string, ...infer R extends readonly string[]]
      ? `${F}${S}${Join<R, S>}`
      : string;

type IsUnion<T, U = T> = T extends unknown ? ([U] extends [T] ? false : true) : never;

/**
 * Split `T[k]` / `T[]` at its last bracket: `['uint256[2]', '']` for `uint256[2][]`
 */
type SplitArray<T extends string, Prefix extends string = ''> = T extends `${infer Head}[${infer Tail}`
  ? Tail extends `${string}[${string}`
    ? SplitArray<Tail, `${Prefix}${Head}[`>
    : Tail extends `${infer Length}]`
      ? [`${Prefix}${Head}`, Length]
      : never
  : never;

type Components<P> = P extends { readonly components: infer C extends readonly TypedAbiParameter[] } ? C : readonly [];

/** Bit widths that map to `number` */
type NumberBits = '8' | '16' | '24' | '32' | '40' | '48';

// ============ Canonical types and names ============

type CanonicalBase<T extends string, C extends readonly TypedAbiParameter[]> = T extends 'tuple'
  ? `(${Join<CanonicalTypes<C>, ','>})`
  : T extends 'uint'
    ? 'uint256'
    : T extends 'int'
      ? 'int256'
      : T;

type CanonicalOf<T extends string, C extends readonly TypedAbiParameter[]> = T extends `${string}]`
  ? SplitArray<T> extends [infer Base extends string, infer Length extends string]
    ? `${CanonicalOf<Base, C>}[${Length}]`
    : T
  : CanonicalBase<T, C>;

export type CanonicalType<P extends TypedAbiParameter> = CanonicalOf<P['type'], Components<P>>;

type CanonicalTypes<P extends readonly TypedAbiParameter[]> = {
  readonly [K in keyof P]: P[K] extends TypedAbiParameter ? CanonicalType<P[K]> : never;
};

export type AbiSignature<F extends { name: string; inputs: readonly TypedAbiParameter[] }> =
  `${F['name']}(${Join<CanonicalTypes<F['inputs']>, ','>})`;

type SuffixOf<T extends string, C extends readonly TypedAbiParameter[]> = T extends `${string}]`
  ? SplitArray<T> extends [infer Base extends string, infer Length extends string]
    ? `${SuffixOf<Base, C>}Array${Length}`
    : T
  : T extends 'tuple'
    ? `${Join<Suffixes<C>, '_'>}Tuple`
    : CanonicalBase<T, C>;

type Suffixes<P extends readonly TypedAbiParameter[]> = {
  readonly [K in keyof P]: P[K] extends TypedAbiParameter ? SuffixOf<P[K]['type'], Components<P[K]>> : never;
};

type OverloadName<F extends TypedAbiFunction | TypedAbiEvent> = F['inputs'] extends readonly []
  ? `${F['name']}_noArgs`
  : `${F['name']}_${Join<Suffixes<F['inputs']>, '_'>}`;

type ReservedName = 'constructor' | '__proto__' | 'prototype' | 'then' | 'toString' | 'valueOf' | 'hasOwnProperty';
type SafeName<N extends string> = N extends ReservedName ? `${N}_` : N;

export type AbiAliases = Readonly<Record<string, string>>;

type NamedItem<TAbi extends TypedAbi, F extends TypedAbiFunction | TypedAbiEvent, TAliases extends AbiAliases> =
  AbiSignature<F> extends keyof TAliases
    ? TAliases[AbiSignature<F>]
    : true extends IsUnion<Extract<TAbi[number], { type: F['type']; name: F['name'] }>>
      ? SafeName<OverloadName<F>>
      : SafeName<F['name']>;

/**
 * Callable name the binding generator gives `F`
 */
export type CallableName<
  TAbi extends TypedAbi,
  F extends TypedAbiFunction | TypedAbiEvent,
  TAliases extends AbiAliases = {},
> = NamedItem<TAbi, F, TAliases>;

// ============ Native mapping ============

type InputPrimitive<T extends string> = T extends 'address'
  ? Address
  : T extends 'bool'
    ? boolean
    : T extends 'string'
      ? string
      : T extends 'bytes' | `bytes${string}` | 'function'
        ? Hex | Uint8Array
        : T extends `uint${string}` | `int${string}`
          ? number | bigint
          : unknown;

type OutputPrimitive<T extends string> = T extends 'address'
  ? Address
  : T extends 'bool'
    ? boolean
    : T extends 'string'
      ? string
      : T extends 'bytes' | `bytes${string}` | 'function'
        ? Hex
        : T extends `uint${infer N}` | `int${infer N}`
          ? N extends NumberBits
            ? number
            : bigint
          : unknown;

type AllNamed<C extends readonly TypedAbiParameter[]> = C extends readonly []
  ? false
  : [Extract<C[number], { name: '' }> | Exclude<C[number], { name: string }>] extends [never]
    ? true
    : false;

type TupleNative<C extends readonly TypedAbiParameter[], D extends 'input' | 'output'> =
  AllNamed<C> extends true
    ? { [P in C[number] as P['name'] extends string ? P['name'] : never]: NativeOf<P['type'], Components<P>, D> }
    : NativeList<C, D>;

type NativeOf<T extends string, C extends readonly TypedAbiParameter[], D extends 'input' | 'output'> =
  T extends `${string}]`
    ? SplitArray<T> extends [infer Base extends string, string]
      ? readonly NativeOf<Base, C, D>[]
      : unknown
    : T extends 'tuple'
      ? TupleNative<C, D>
      : D extends 'input'
        ? InputPrimitive<T>
        : OutputPrimitive<T>;

type NativeList<P extends readonly TypedAbiParameter[], D extends 'input' | 'output'> = P extends readonly []
  ? readonly []
  : P extends readonly [infer F extends TypedAbiParameter, ...infer R extends readonly TypedAbiParameter[]]
    ? readonly [NativeOf<F['type'], Components<F>, D>, ...NativeList<R, D>]
    : readonly unknown[];

export type AbiParameterInput<P extends TypedAbiParameter> = NativeOf<P['type'], Components<P>, 'input'>;
export type AbiParameterOutput<P extends TypedAbiParameter> = NativeOf<P['type'], Components<P>, 'output'>;

/**
 * Argument list of a function
 */
export type AbiFunctionInputs<F extends TypedAbiFunction> = F['inputs'] extends infer I extends readonly TypedAbiParameter[]
  ? I extends readonly []
    ? []
    : I extends readonly [infer First extends TypedAbiParameter, ...infer Rest extends readonly TypedAbiParameter[]]
      ? [AbiParameterInput<First>, ...AbiFunctionInputs<{ type: 'function'; name: F['name']; inputs: Rest }>]
      : unknown[]
  : never;

/**
 * Decoded result of a call: nothing, the single value, a record or a list
 */
export type AbiFunctionOutputs<F extends TypedAbiFunction> = F['outputs'] extends infer O extends readonly TypedAbiParameter[]
  ? O extends readonly []
    ? undefined
    : O extends readonly [infer Only extends TypedAbiParameter]
      ? AbiParameterOutput<Only>
      : TupleNative<O, 'output'>
  : undefined;

type IsHashedIndexed<T extends string> = T extends 'string' | 'bytes' | 'tuple' | `${string}]` ? true : false;

/**
 * Record of decoded event arguments; hashed indexed parameters surface as their topic
 */
export type AbiEventArgs<E extends TypedAbiEvent> = {
  [P in E['inputs'][number] as P['name'] extends string ? P['name'] : never]: P['indexed'] extends true
    ? IsHashedIndexed<P['type']> extends true
      ? Hash
      : AbiParameterOutput<P>
    : AbiParameterOutput<P>;
};

// ============ Extraction ============

export type AbiFunctions<TAbi extends TypedAbi> = Extract<TAbi[number], TypedAbiFunction>;
export type AbiEvents<TAbi extends TypedAbi> = Extract<TAbi[number], TypedAbiEvent>;

type IsRead<F extends TypedAbiFunction> = F extends { stateMutability: 'view' | 'pure' }
  ? true
  : F extends { stateMutability: StateMutability }
    ? false
    : F extends { constant: true }
      ? true
      : false;

export type AbiReadFunctions<TAbi extends TypedAbi> = AbiFunctions<TAbi> extends infer F
  ? F extends TypedAbiFunction
    ? IsRead<F> extends true
      ? F
      : never
    : never
  : never;

export type AbiWriteFunctions<TAbi extends TypedAbi> = Exclude<AbiFunctions<TAbi>, AbiReadFunctions<TAbi>>;

export type FunctionByCallable<TAbi extends TypedAbi, TName extends string, TAliases extends AbiAliases = {}> =
  AbiFunctions<TAbi> extends infer F
    ? F extends TypedAbiFunction
      ? CallableName<TAbi, F, TAliases> extends TName
        ? F
        : never
      : never
    : never;

// ============ Helpers ============

/**
 * Identity that keeps an ABI literal narrowly typed
 */
export function defineAbi<const TAbi extends TypedAbi>(abi: TAbi): TAbi {
  return abi;
}
