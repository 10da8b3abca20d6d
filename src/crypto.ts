/**
 * Cryptographic primitives for bookgossip
 */

import { sha256 } from '@noble/hashes/sha256';
import { bytesToHex, hexToBytes } from '@noble/hashes/utils';
import { randomBytes } from 'crypto';
import { ed25519 } from '@noble/curves/ed25519';

export interface SigningKeyPair {
  readonly publicKey: Uint8Array;
  readonly privateKey: Uint8Array;
}

export class Crypto {
  /**
   * Generate cryptographically secure random bytes
   */
  static randomBytes(length: number): Uint8Array {
    return new Uint8Array(randomBytes(length));
  }

  static toHex(bytes: Uint8Array): string {
    return bytesToHex(bytes);
  }

  static fromHex(hex: string): Uint8Array {
    return hexToBytes(hex);
  }

  /**
   * SHA-256 of a UTF-8 string, hex encoded
   */
  static hashString(input: string): string {
    return bytesToHex(sha256(new TextEncoder().encode(input)));
  }

  /**
   * SHA-256 of the canonical JSON form of a value
   *
   * Object keys are sorted so that structurally equal values hash equally
   * regardless of property order.
   */
  static hashObject(value: unknown): string {
    return Crypto.hashString(Crypto.canonicalJson(value));
  }

  /**
   * JSON with object keys sorted recursively; undefined members dropped
   */
  static canonicalJson(value: unknown): string {
    return JSON.stringify(sortKeys(value));
  }

  /**
   * Validate a hex-encoded Ed25519 public key (64 hex characters)
   */
  static isValidPublicKeyHex(publicKeyHex: string): boolean {
    return /^[0-9a-fA-F]{64}$/.test(publicKeyHex);
  }

  static generateKeyPair(): SigningKeyPair {
    const privateKey = ed25519.utils.randomPrivateKey();
    return { privateKey, publicKey: ed25519.getPublicKey(privateKey) };
  }

  static getPublicKey(privateKey: Uint8Array): Uint8Array {
    return ed25519.getPublicKey(privateKey);
  }

  static sign(message: Uint8Array, privateKey: Uint8Array): Uint8Array {
    return ed25519.sign(message, privateKey);
  }

  /**
   * Verify an Ed25519 signature; malformed keys or signatures verify false
   */
  static verify(message: Uint8Array, signature: Uint8Array, publicKey: Uint8Array): boolean {
    try {
      return ed25519.verify(signature, message, publicKey);
    } catch {
      return false;
    }
  }
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (value !== null && typeof value === 'object') {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      const member: unknown = Reflect.get(value, key);
      if (member !== undefined) {
        sorted[key] = sortKeys(member);
      }
    }
    return sorted;
  }
  return value;
}
