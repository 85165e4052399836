/**
 * Revert data decoding: Error(string), Panic(uint256) and custom errors
 */

import type { Hex } from '../core/types.js';
import { hexToBytes, bytesToHex } from '../core/hex.js';
import { MalformedEncodingError } from '../core/errors.js';
import type { RevertInfo } from '../core/errors.js';
import { decodeParameters } from './codec.js';
import { stringType, uintType } from './types.js';
import type { ContractDescriptor } from './descriptor.js';
import { fromAbiValue } from './native.js';

export const ERROR_STRING_SELECTOR = '0x08c379a0';
export const PANIC_SELECTOR = '0x4e487b71';

const PANIC_REASONS = new Map<number, string>([
  [0x00, 'generic compiler panic'],
  [0x01, 'assertion failed'],
  [0x11, 'arithmetic overflow or underflow'],
  [0x12, 'division or modulo by zero'],
  [0x21, 'invalid enum value'],
  [0x22, 'corrupt storage byte array'],
  [0x31, 'pop on empty array'],
  [0x32, 'array index out of bounds'],
  [0x41, 'out of memory'],
  [0x51, 'call to uninitialized function'],
]);

export function describePanic(code: bigint): string {
  const known = code <= 0xffn ? PANIC_REASONS.get(Number(code)) : undefined;
  return `panic 0x${code.toString(16).padStart(2, '0')}${known ? `: ${known}` : ''}`;
}

/**
 * Turn raw revert data into a readable reason. Undecodable payloads still
 * produce a RevertInfo carrying the raw data.
 */
export function decodeRevertData(data: Hex | undefined, descriptor?: ContractDescriptor): RevertInfo {
  if (data === undefined || data === '0x') {
    return { reason: 'execution reverted without data' };
  }
  const bytes = hexToBytes(data);
  if (bytes.length < 4) {
    return { reason: 'execution reverted with malformed data', data };
  }
  const selector = bytesToHex(bytes.subarray(0, 4));
  const payload = bytes.subarray(4);

  try {
    if (selector === ERROR_STRING_SELECTOR) {
      const [message] = decodeParameters([stringType], payload);
      if (typeof message === 'string') {
        return { reason: message, data, errorName: 'Error', args: [message] };
      }
    }

    if (selector === PANIC_SELECTOR) {
      const [code] = decodeParameters([uintType(256)], payload);
      if (typeof code === 'bigint') {
        return { reason: describePanic(code), data, errorName: 'Panic', args: [code], panicCode: code };
      }
    }

    const custom = descriptor?.errorBySelector(selector);
    if (custom) {
      const values = decodeParameters(
        custom.inputs.map((p) => p.type),
        payload
      );
      const args = custom.inputs.map((p, i) => {
        const value = values[i];
        if (value === undefined) throw new MalformedEncodingError(`missing ${custom.name} argument ${i}`);
        return fromAbiValue(p.type, value, p.name || String(i));
      });
      return {
        reason: `${custom.name}(${args.map(formatArg).join(', ')})`,
        data,
        errorName: custom.name,
        args,
      };
    }
  } catch (error) {
    if (!(error instanceof MalformedEncodingError)) throw error;
    return { reason: `execution reverted with undecodable data for selector ${selector}`, data };
  }

  return { reason: `execution reverted with unknown error ${selector}`, data };
}

function formatArg(value: unknown): string {
  if (typeof value === 'string') return JSON.stringify(value);
  if (typeof value === 'bigint') return value.toString();
  if (Array.isArray(value)) return `[${value.map(formatArg).join(', ')}]`;
  if (typeof value === 'object' && value !== null) {
    return `{${Object.entries(value).map(([k, v]) => `${k}: ${formatArg(v)}`).join(', ')}}`;
  }
  return String(value);
}
