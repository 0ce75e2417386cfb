/**
 * Key rotation for VAPID signing.
 *
 * A RotatingSigner holds one current key, used for every new signature, and previous keys ordered most
 * recently retired first. Browser subscriptions are bound to the applicationServerKey they were created
 * with, so retired keys stay available (getSignerForKey) until their subscribers have resubscribed, and
 * removeUnusedKeys drops the ones no stored subscription references any more.
 *
 * The key set is an immutable value swapped in one assignment, so synchronous queries always see a whole
 * state. Mutations and in-flight signatures are ordered by a reader/writer lock.
 */

import { encodeBase64Url, tryDecodeBase64Url } from '../base64';
import { CannotRemoveCurrentKeyError, KeyNotFoundError, NoPreviousKeysError } from '../errors';
import type { SignOptions, Signer } from '../signer';
import { equalBytes } from '../utils';
import { ReadWriteLock } from './rw-lock';

/**
 * A public key given either as raw bytes or as its base64url encoding
 */
export type KeyInput = Uint8Array | string;

export interface UsageOracleOptions {
  signal?: AbortSignal;
}

/**
 * Resolves a base64url public key to the number of stored subscriptions that reference it
 */
export interface UsageOracle {
  countByKey(key: string, options?: UsageOracleOptions): Promise<number>;
}

export interface RemoveUnusedKeysResult {
  removedKeys: string[];
  retainedKeys: string[];
}

interface KeyEntry {
  readonly signer: Signer;
  readonly publicKey: Uint8Array;
  readonly encoded: string;
}

interface RotationState {
  readonly current: KeyEntry;
  readonly previous: readonly KeyEntry[];
}

function toEntry(signer: Signer): KeyEntry {
  const publicKey = signer.publicKey().slice();
  return { signer, publicKey, encoded: encodeBase64Url(publicKey) };
}

function toBytes(key: KeyInput): Uint8Array | undefined {
  return typeof key === 'string' ? tryDecodeBase64Url(key) : key;
}

export class RotatingSigner implements Signer {
  #state: RotationState;
  readonly #lock = new ReadWriteLock();

  /**
   * @param previous - keys retired before this process started, most recently retired first
   */
  constructor(current: Signer, previous: readonly Signer[] = []) {
    const currentEntry = toEntry(current);
    const entries: KeyEntry[] = [];
    for (const signer of previous) {
      const entry = toEntry(signer);
      const known = [currentEntry, ...entries].some((e) => equalBytes(e.publicKey, entry.publicKey));
      if (!known) {
        entries.push(entry);
      }
    }
    this.#state = { current: currentEntry, previous: entries };
  }

  /**
   * Sign with the current key. A rotation requested meanwhile waits until this signature is done.
   */
  async sign(digest: Uint8Array, options?: SignOptions): Promise<Uint8Array> {
    return this.#lock.read(() => this.#state.current.signer.sign(digest, options));
  }

  publicKey(): Uint8Array {
    return this.#state.current.publicKey.slice();
  }

  publicKeyBase64(): string {
    return this.#state.current.encoded;
  }

  /**
   * Sign with a specific known key, current or previous
   */
  async signWithKey(key: KeyInput, digest: Uint8Array, options?: SignOptions): Promise<Uint8Array> {
    return this.#lock.read(() => {
      const entry = this.#find(key);
      if (!entry) {
        throw new KeyNotFoundError();
      }
      return entry.signer.sign(digest, options);
    });
  }

  /**
   * Make `newKey` current and retire the current key to the front of the previous keys.
   * Rotating to a retired key brings it back as current; rotating to the current key changes nothing.
   */
  async rotate(newKey: Signer): Promise<void> {
    const entry = toEntry(newKey);
    await this.#lock.write(() => {
      const { current, previous } = this.#state;
      if (equalBytes(current.publicKey, entry.publicKey)) {
        return;
      }
      this.#state = {
        current: entry,
        previous: [current, ...previous.filter((e) => !equalBytes(e.publicKey, entry.publicKey))],
      };
    });
  }

  /**
   * Append a key as the oldest previous key. Keys that are already known are ignored.
   */
  async addPreviousKey(signer: Signer): Promise<boolean> {
    const entry = toEntry(signer);
    return this.#lock.write(() => {
      if (this.#find(entry.publicKey)) {
        return false;
      }
      this.#state = { current: this.#state.current, previous: [...this.#state.previous, entry] };
      return true;
    });
  }

  async removeKey(key: KeyInput): Promise<void> {
    await this.#lock.write(() => {
      const bytes = toBytes(key);
      const { current, previous } = this.#state;
      if (bytes && equalBytes(current.publicKey, bytes)) {
        throw new CannotRemoveCurrentKeyError();
      }
      const index = bytes ? previous.findIndex((e) => equalBytes(e.publicKey, bytes)) : -1;
      if (index === -1) {
        throw new KeyNotFoundError();
      }
      this.#state = { current, previous: previous.filter((_, i) => i !== index) };
    });
  }

  async removeOldestKey(): Promise<void> {
    await this.#lock.write(() => {
      const { current, previous } = this.#state;
      if (previous.length === 0) {
        throw new NoPreviousKeysError();
      }
      this.#state = { current, previous: previous.slice(0, -1) };
    });
  }

  async clearPreviousKeys(): Promise<void> {
    await this.#lock.write(() => {
      this.#state = { current: this.#state.current, previous: [] };
    });
  }

  /**
   * Drop every previous key that no stored subscription references.
   *
   * Keys are checked one at a time and the first oracle failure aborts the whole operation; the key set
   * is only replaced once every count is known. The current key is never considered.
   */
  async removeUnusedKeys(oracle: UsageOracle, options?: UsageOracleOptions): Promise<RemoveUnusedKeysResult> {
    return this.#lock.write(async () => {
      const { current, previous } = this.#state;
      const retained: KeyEntry[] = [];
      const result: RemoveUnusedKeysResult = { removedKeys: [], retainedKeys: [] };

      for (const entry of previous) {
        options?.signal?.throwIfAborted();
        const count = await oracle.countByKey(entry.encoded, { signal: options?.signal });
        if (!Number.isInteger(count) || count < 0) {
          throw new RangeError(`Usage count for ${entry.encoded} must be a non-negative integer, got ${count}`);
        }
        if (count > 0) {
          retained.push(entry);
          result.retainedKeys.push(entry.encoded);
        } else {
          result.removedKeys.push(entry.encoded);
        }
      }

      this.#state = { current, previous: retained };
      return result;
    });
  }

  isCurrentKey(key: KeyInput): boolean {
    const bytes = toBytes(key);
    return bytes !== undefined && equalBytes(this.#state.current.publicKey, bytes);
  }

  isKnownKey(key: KeyInput): boolean {
    return this.#find(key) !== undefined;
  }

  /**
   * Signer for a current or retired key, so messages to not-yet-migrated subscribers can still be sent
   */
  getSignerForKey(key: KeyInput): Signer | undefined {
    return this.#find(key)?.signer;
  }

  /**
   * Previous public keys, most recently retired first
   */
  previousKeys(): Uint8Array[] {
    return this.#state.previous.map((e) => e.publicKey.slice());
  }

  previousKeysBase64(): string[] {
    return this.#state.previous.map((e) => e.encoded);
  }

  /**
   * Current key first, then previous keys
   */
  allKeys(): Uint8Array[] {
    const { current, previous } = this.#state;
    return [current, ...previous].map((e) => e.publicKey.slice());
  }

  allKeysBase64(): string[] {
    const { current, previous } = this.#state;
    return [current, ...previous].map((e) => e.encoded);
  }

  keyCount(): number {
    return 1 + this.#state.previous.length;
  }

  #find(key: KeyInput): KeyEntry | undefined {
    const bytes = toBytes(key);
    if (!bytes) {
      return undefined;
    }
    const { current, previous } = this.#state;
    return [current, ...previous].find((e) => equalBytes(e.publicKey, bytes));
  }
}
