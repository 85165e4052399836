/**
 * Transaction requests, signing and raw serialization
 * Supports legacy (with or without EIP-155 replay protection) and EIP-1559 transactions
 */

import type {
  Address,
  Hash,
  Hex,
  Signature,
  Transaction,
  TransactionType,
  LegacyTransaction,
  EIP1559Transaction,
  SignedTransaction,
} from '../core/types.js';
import type { RLPDecoded, RLPInput } from '../core/rlp.js';
import { encode as rlpEncode, decode as rlpDecode, bytesToInteger } from '../core/rlp.js';
import { keccak256 } from '../core/hash.js';
import { bytesToHex, concatBytes, hexToBytes } from '../core/hex.js';
import { addressFromBytes } from '../core/address.js';
import { recoverAddress } from '../core/signature.js';
import { MalformedEncodingError, ValidationError } from '../core/errors.js';
import type { Account } from './account.js';
import type { CallRequest } from './rpc.js';

export interface TransactionFields {
  from?: Address;
  /** Absent for contract creation */
  to?: Address;
  data?: Hex;
  value?: bigint;
  nonce?: number;
  chainId?: number;
  gasLimit?: bigint;
  // Legacy
  gasPrice?: bigint;
  // EIP-1559
  maxFeePerGas?: bigint;
  maxPriorityFeePerGas?: bigint;
  type?: TransactionType;
}

/**
 * Mutable request. Every field stays optional until `finalize()`, which the
 * pipeline calls once estimation and node queries have filled the gaps.
 */
export class TransactionRequest implements TransactionFields {
  from?: Address;
  to?: Address;
  data?: Hex;
  value?: bigint;
  nonce?: number;
  chainId?: number;
  gasLimit?: bigint;
  gasPrice?: bigint;
  maxFeePerGas?: bigint;
  maxPriorityFeePerGas?: bigint;
  type?: TransactionType;

  constructor(fields: TransactionFields = {}) {
    this.set(fields);
  }

  /**
   * Merge `fields` into the request; undefined values are ignored
   */
  set(fields: TransactionFields): this {
    if (fields.from !== undefined) this.from = fields.from;
    if (fields.to !== undefined) this.to = fields.to;
    if (fields.data !== undefined) this.data = fields.data;
    if (fields.value !== undefined) this.value = fields.value;
    if (fields.nonce !== undefined) this.nonce = fields.nonce;
    if (fields.chainId !== undefined) this.chainId = fields.chainId;
    if (fields.gasLimit !== undefined) this.gasLimit = fields.gasLimit;
    if (fields.gasPrice !== undefined) this.gasPrice = fields.gasPrice;
    if (fields.maxFeePerGas !== undefined) this.maxFeePerGas = fields.maxFeePerGas;
    if (fields.maxPriorityFeePerGas !== undefined) this.maxPriorityFeePerGas = fields.maxPriorityFeePerGas;
    if (fields.type !== undefined) this.type = fields.type;
    return this;
  }

  get isContractCreation(): boolean {
    return this.to === undefined;
  }

  /**
   * Explicit type, else EIP-1559 when fee-market fields are present
   */
  get transactionType(): TransactionType {
    if (this.type) return this.type;
    if (this.maxFeePerGas !== undefined || this.maxPriorityFeePerGas !== undefined) {
      return 'eip1559';
    }
    return 'legacy';
  }

  hasFees(): boolean {
    return this.transactionType === 'eip1559'
      ? this.maxFeePerGas !== undefined && this.maxPriorityFeePerGas !== undefined
      : this.gasPrice !== undefined;
  }

  /**
   * Fields still missing before the request can be signed
   */
  missing(): string[] {
    const missing: string[] = [];
    if (this.nonce === undefined) missing.push('nonce');
    if (this.gasLimit === undefined) missing.push('gasLimit');
    if (this.transactionType === 'eip1559') {
      if (this.maxFeePerGas === undefined) missing.push('maxFeePerGas');
      if (this.maxPriorityFeePerGas === undefined) missing.push('maxPriorityFeePerGas');
      if (this.chainId === undefined) missing.push('chainId');
    } else if (this.gasPrice === undefined) {
      missing.push('gasPrice');
    }
    return missing;
  }

  /**
   * Immutable transaction ready for signing. A legacy request without chainId
   * signs without replay protection.
   */
  finalize(): Transaction {
    const missing = this.missing();
    if (missing.length > 0) {
      throw new ValidationError(`Transaction request is missing ${missing.join(', ')}`, { missing });
    }
    const base = {
      ...(this.to !== undefined ? { to: this.to } : {}),
      value: this.value ?? 0n,
      data: this.data ?? '0x',
      nonce: this.nonce,
      chainId: this.chainId,
      gasLimit: this.gasLimit,
    };
    if (this.transactionType === 'eip1559') {
      const tx: EIP1559Transaction = {
        ...base,
        type: 'eip1559',
        maxFeePerGas: this.maxFeePerGas,
        maxPriorityFeePerGas: this.maxPriorityFeePerGas,
      };
      return Object.freeze(tx);
    }
    const tx: LegacyTransaction = { ...base, type: 'legacy', gasPrice: this.gasPrice };
    return Object.freeze(tx);
  }

  /**
   * Shape used for eth_call / eth_estimateGas
   */
  toCallRequest(): CallRequest {
    const request: CallRequest = {};
    if (this.from !== undefined) request.from = this.from;
    if (this.to !== undefined) request.to = this.to;
    if (this.data !== undefined) request.data = this.data;
    if (this.value !== undefined) request.value = this.value;
    return request;
  }
}

// ============ Signing ============

function quantity(value: bigint | number | undefined): Uint8Array | bigint {
  return value === undefined ? new Uint8Array() : BigInt(value);
}

function legacyFields(tx: LegacyTransaction): RLPInput[] {
  return [
    quantity(tx.nonce),
    quantity(tx.gasPrice),
    quantity(tx.gasLimit),
    tx.to ? hexToBytes(tx.to) : new Uint8Array(),
    quantity(tx.value),
    tx.data ? hexToBytes(tx.data) : new Uint8Array(),
  ];
}

function eip1559Fields(tx: EIP1559Transaction): RLPInput[] {
  return [
    quantity(tx.chainId),
    quantity(tx.nonce),
    quantity(tx.maxPriorityFeePerGas),
    quantity(tx.maxFeePerGas),
    quantity(tx.gasLimit),
    tx.to ? hexToBytes(tx.to) : new Uint8Array(),
    quantity(tx.value),
    tx.data ? hexToBytes(tx.data) : new Uint8Array(),
    // Access list
    [],
  ];
}

const EIP1559_PREFIX = new Uint8Array([0x02]);

/**
 * Hash the account signs
 */
export function signingHash(tx: Transaction): Hash {
  if (tx.type === 'eip1559') {
    return keccak256(concatBytes(EIP1559_PREFIX, rlpEncode(eip1559Fields(tx))));
  }
  const fields = legacyFields(tx);
  // EIP-155: chainId, 0, 0
  const payload = tx.chainId !== undefined ? [...fields, BigInt(tx.chainId), new Uint8Array(), new Uint8Array()] : fields;
  return keccak256(rlpEncode(payload));
}

/**
 * Serialize a transaction with its signature
 */
export function serializeTransaction(tx: Transaction, signature: Signature): Hex {
  const r = stripZeros(hexToBytes(signature.r));
  const s = stripZeros(hexToBytes(signature.s));
  if (tx.type === 'eip1559') {
    const body = rlpEncode([...eip1559Fields(tx), BigInt(signature.yParity), r, s]);
    return bytesToHex(concatBytes(EIP1559_PREFIX, body));
  }
  return bytesToHex(rlpEncode([...legacyFields(tx), BigInt(signature.v), r, s]));
}

function stripZeros(bytes: Uint8Array): Uint8Array {
  let start = 0;
  while (start < bytes.length && bytes[start] === 0) start++;
  return bytes.subarray(start);
}

/**
 * Sign a finalized transaction with an account
 */
export async function signTransaction(tx: Transaction, account: Account): Promise<SignedTransaction> {
  const signature = await account.sign(signingHash(tx));
  const v =
    tx.type === 'eip1559'
      ? signature.yParity
      : tx.chainId !== undefined
        ? tx.chainId * 2 + 35 + signature.yParity // EIP-155
        : 27 + signature.yParity;
  const applied: Signature = { ...signature, v };
  const raw = serializeTransaction(tx, applied);
  return Object.freeze({ raw, hash: keccak256(raw), transaction: tx, signature: applied });
}

// ============ Parsing ============

function listOf(decoded: RLPDecoded, length: number, what: string): RLPDecoded[] {
  if (!Array.isArray(decoded) || decoded.length !== length) {
    throw new MalformedEncodingError(`invalid ${what} transaction`);
  }
  return decoded;
}

function bytesAt(list: RLPDecoded[], index: number): Uint8Array {
  const item = list[index];
  if (!(item instanceof Uint8Array)) {
    throw new MalformedEncodingError(`transaction field ${index} is not a byte string`);
  }
  return item;
}

function integerAt(list: RLPDecoded[], index: number): bigint {
  return bytesToInteger(bytesAt(list, index));
}

function smallIntegerAt(list: RLPDecoded[], index: number): number {
  const value = integerAt(list, index);
  if (value > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw new MalformedEncodingError(`transaction field ${index} is out of range`);
  }
  return Number(value);
}

function toAt(list: RLPDecoded[], index: number): Address | undefined {
  const bytes = bytesAt(list, index);
  if (bytes.length === 0) return undefined;
  if (bytes.length !== 20) {
    throw new MalformedEncodingError('transaction recipient is not 20 bytes');
  }
  return addressFromBytes(bytes);
}

function word(bytes: Uint8Array): Hex {
  const padded = new Uint8Array(32);
  padded.set(bytes, 32 - bytes.length);
  return bytesToHex(padded);
}

/**
 * Decode a raw signed transaction back into its parts
 */
export function parseSignedTransaction(raw: Hex): SignedTransaction {
  const bytes = hexToBytes(raw);

  if (bytes[0] === 0x02) {
    const list = listOf(rlpDecode(bytes.subarray(1)), 12, 'EIP-1559');
    const to = toAt(list, 5);
    const parity = integerAt(list, 9);
    if (parity > 1n) {
      throw new MalformedEncodingError('invalid signature parity');
    }
    const yParity = parity === 1n ? 1 : 0;
    const tx: EIP1559Transaction = {
      type: 'eip1559',
      chainId: smallIntegerAt(list, 0),
      nonce: smallIntegerAt(list, 1),
      maxPriorityFeePerGas: integerAt(list, 2),
      maxFeePerGas: integerAt(list, 3),
      gasLimit: integerAt(list, 4),
      ...(to !== undefined ? { to } : {}),
      value: integerAt(list, 6),
      data: bytesToHex(bytesAt(list, 7)),
    };
    const signature: Signature = { yParity, v: yParity, r: word(bytesAt(list, 10)), s: word(bytesAt(list, 11)) };
    return { raw, hash: keccak256(raw), transaction: tx, signature };
  }

  const list = listOf(rlpDecode(bytes), 9, 'legacy');
  const v = smallIntegerAt(list, 6);
  let chainId: number | undefined;
  let yParity: 0 | 1;
  if (v >= 35) {
    chainId = Math.floor((v - 35) / 2);
    yParity = (v - 35) % 2 === 0 ? 0 : 1;
  } else if (v === 27 || v === 28) {
    yParity = v === 27 ? 0 : 1;
  } else {
    throw new MalformedEncodingError(`invalid signature v value ${v}`);
  }
  const to = toAt(list, 3);
  const tx: LegacyTransaction = {
    type: 'legacy',
    nonce: smallIntegerAt(list, 0),
    gasPrice: integerAt(list, 1),
    gasLimit: integerAt(list, 2),
    ...(to !== undefined ? { to } : {}),
    value: integerAt(list, 4),
    data: bytesToHex(bytesAt(list, 5)),
    ...(chainId !== undefined ? { chainId } : {}),
  };
  const signature: Signature = { v, yParity, r: word(bytesAt(list, 7)), s: word(bytesAt(list, 8)) };
  return { raw, hash: keccak256(raw), transaction: tx, signature };
}

/**
 * Address that signed `signed`
 */
export function recoverTransactionSender(signed: SignedTransaction): Address {
  return recoverAddress(signingHash(signed.transaction), signed.signature);
}
