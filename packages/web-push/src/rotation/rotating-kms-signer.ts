/**
 * Rotating signer whose keys live in a key management service.
 *
 * Keys are addressed by key-version name. Public keys are fetched before the key set changes, so a failed
 * lookup leaves the rotation state untouched.
 */

import type { Signer } from '../signer';
import { KmsSigner, type KmsCallOptions, type KmsClient } from '../signers/kms-signer';
import { RotatingSigner } from './rotating-signer';

export class RotatingKmsSigner extends RotatingSigner {
  readonly #client: KmsClient;

  constructor(client: KmsClient, current: KmsSigner, previous: readonly KmsSigner[] = []) {
    super(current, previous);
    this.#client = client;
  }

  static async create(client: KmsClient, keyName: string, options?: KmsCallOptions): Promise<RotatingKmsSigner> {
    const current = await KmsSigner.create(client, keyName, options);
    return new RotatingKmsSigner(client, current);
  }

  /**
   * Rotate to a signer, or to the KMS key version named by `key`
   */
  override async rotate(key: Signer | string, options?: KmsCallOptions): Promise<void> {
    const signer = typeof key === 'string' ? await KmsSigner.create(this.#client, key, options) : key;
    await super.rotate(signer);
  }

  /**
   * Keep accepting a retired KMS key version, for example one used by a previous deployment
   */
  override async addPreviousKey(key: Signer | string, options?: KmsCallOptions): Promise<boolean> {
    const signer = typeof key === 'string' ? await KmsSigner.create(this.#client, key, options) : key;
    return super.addPreviousKey(signer);
  }

  /**
   * Key-version name of the current key, when it is a KMS key
   */
  currentKeyName(): string | undefined {
    const signer = this.getSignerForKey(this.publicKey());
    return signer instanceof KmsSigner ? signer.keyName : undefined;
  }
}
