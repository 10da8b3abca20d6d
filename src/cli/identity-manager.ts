/**
 * Identity management for the node
 *
 * A peer's identity is one Ed25519 keypair kept in <dataDir>/identity.json.
 * Its hex public key is the peer id, so reviews written before a restart
 * stay attributed to the same peer.
 */

import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'fs';
import { join, dirname } from 'path';
import { Crypto, type SigningKeyPair } from '../crypto.js';
import { ConfigError } from '../errors.js';
import { getDataDir } from '../store/file-store.js';

export interface IdentityData {
  version: string;
  publicKey: string;
  privateKey: string;
  created: number;
}

const IDENTITY_VERSION = '1.0';

export class IdentityManager {
  readonly identityPath: string;
  private readonly clock: () => number;

  constructor(customPath?: string, clock: () => number = Date.now) {
    this.identityPath = customPath || join(getDataDir(), 'identity.json');
    this.clock = clock;
  }

  /**
   * Load the stored keypair, creating and saving one on first run
   * @throws ConfigError if the file exists but does not hold a valid keypair
   */
  loadOrCreate(): SigningKeyPair {
    if (existsSync(this.identityPath)) {
      return this.load();
    }

    const keyPair = Crypto.generateKeyPair();
    const identity: IdentityData = {
      version: IDENTITY_VERSION,
      publicKey: Crypto.toHex(keyPair.publicKey),
      privateKey: Crypto.toHex(keyPair.privateKey),
      created: this.clock()
    };

    this.ensureIdentityDir();
    writeFileSync(this.identityPath, JSON.stringify(identity, null, 2), { encoding: 'utf-8', mode: 0o600 });
    console.log(`[Identity] Created identity ${identity.publicKey.slice(0, 8)} at ${this.identityPath}`);
    return keyPair;
  }

  exists(): boolean {
    return existsSync(this.identityPath);
  }

  private load(): SigningKeyPair {
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(this.identityPath, 'utf-8'));
    } catch (error) {
      throw new ConfigError(`Cannot read identity file ${this.identityPath}: ${String(error)}`, 'identity');
    }

    if (raw === null || typeof raw !== 'object') {
      throw new ConfigError(`Identity file ${this.identityPath} is not an object`, 'identity');
    }

    const privateKeyHex: unknown = Reflect.get(raw, 'privateKey');
    if (typeof privateKeyHex !== 'string' || !/^[0-9a-fA-F]{64}$/.test(privateKeyHex)) {
      throw new ConfigError(`Identity file ${this.identityPath} has no valid private key`, 'identity');
    }

    const privateKey = Crypto.fromHex(privateKeyHex);
    const publicKey = Crypto.getPublicKey(privateKey);

    const storedPublicKey: unknown = Reflect.get(raw, 'publicKey');
    if (typeof storedPublicKey === 'string' && storedPublicKey.toLowerCase() !== Crypto.toHex(publicKey)) {
      throw new ConfigError(`Identity file ${this.identityPath} public key does not match its private key`, 'identity');
    }

    return { publicKey, privateKey };
  }

  /**
   * Ensure identity directory exists
   */
  private ensureIdentityDir(): void {
    const dir = dirname(this.identityPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }
}
