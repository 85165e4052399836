/**
 * ECDSA signature handling
 * Wrapper around @noble/secp256k1 for Ethereum signatures
 */

import * as secp256k1 from '@noble/secp256k1';
import { hmac } from '@noble/hashes/hmac';
import { sha256 } from '@noble/hashes/sha256';
import type { Address, Hash, Hex, Signature } from './types.js';
import { bytesToHex, hexToBytes, padHex } from './hex.js';
import { keccak256 } from './hash.js';
import { toChecksumAddress } from './address.js';
import { ValidationError } from './errors.js';

// Synchronous RFC 6979 nonces for secp256k1.sign
secp256k1.etc.hmacSha256Sync = (key: Uint8Array, ...messages: Uint8Array[]) => {
  const h = hmac.create(sha256, key);
  for (const msg of messages) {
    h.update(msg);
  }
  return h.digest();
};

export function isValidPrivateKey(privateKey: Uint8Array): boolean {
  return privateKey.length === 32 && secp256k1.utils.isValidPrivateKey(privateKey);
}

/**
 * Derive the address of a private key
 */
export function privateKeyToAddress(privateKey: Uint8Array): Address {
  return publicKeyToAddress(secp256k1.getPublicKey(privateKey, false));
}

/**
 * Address of an uncompressed (65-byte) or compressed (33-byte) public key
 */
export function publicKeyToAddress(publicKey: Uint8Array): Address {
  const uncompressed =
    publicKey.length === 33
      ? secp256k1.ProjectivePoint.fromHex(publicKey).toRawBytes(false)
      : publicKey;
  const hash = keccak256(uncompressed.subarray(1));
  return toChecksumAddress(`0x${hash.slice(-40)}`);
}

/**
 * Sign a 32-byte hash. `v` is 27 + recovery; callers applying EIP-155 recompute it.
 */
export function sign(hash: Hash, privateKey: Uint8Array): Signature {
  const hashBytes = hexToBytes(hash);
  if (hashBytes.length !== 32) {
    throw new ValidationError(`Hash must be 32 bytes, got ${hashBytes.length}`);
  }

  const sig = secp256k1.sign(hashBytes, privateKey);
  const compact = sig.toCompactRawBytes();
  const yParity = sig.recovery === 1 ? 1 : 0;

  return {
    r: padHex(bytesToHex(compact.slice(0, 32)), 32),
    s: padHex(bytesToHex(compact.slice(32, 64)), 32),
    v: 27 + yParity,
    yParity,
  };
}

export function recoverAddress(hash: Hash, signature: Signature): Address {
  const compact = new Uint8Array(64);
  compact.set(hexToBytes(padHex(signature.r, 32)), 0);
  compact.set(hexToBytes(padHex(signature.s, 32)), 32);

  const publicKey = secp256k1.Signature.fromCompact(compact)
    .addRecoveryBit(signature.yParity)
    .recoverPublicKey(hexToBytes(hash));
  return publicKeyToAddress(publicKey.toRawBytes(false));
}

/**
 * Recovery parity from a raw `v`: 27/28, 0/1, or EIP-155 (chainId * 2 + 35 + parity)
 */
export function parityFromV(v: number): 0 | 1 {
  if (v === 0 || v === 27) return 0;
  if (v === 1 || v === 28) return 1;
  if (v >= 35) return (v - 35) % 2 === 0 ? 0 : 1;
  throw new ValidationError(`Invalid signature v value: ${v}`);
}

export function signatureToHex(signature: Signature): Hex {
  return `0x${signature.r.slice(2)}${signature.s.slice(2)}${signature.v.toString(16).padStart(2, '0')}`;
}
