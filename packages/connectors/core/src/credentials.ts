import { ok, err, type Result } from '@payroute/kernel';
import type { ConnectorAuthType } from '@payroute/domain';
import { valueNotFound, type StorageError } from '@payroute/errors';

/**
 * Where merchant connector credentials live. Production backs this with
 * the merchant-account database; tests use the in-memory store.
 */
export interface CredentialStore {
  findConnectorAuth(merchantId: string, connector: string): Promise<Result<ConnectorAuthType, StorageError>>;
}

export class InMemoryCredentialStore implements CredentialStore {
  private readonly entries = new Map<string, ConnectorAuthType>();

  private static key(merchantId: string, connector: string): string {
    return `${merchantId}:${connector}`;
  }

  set(merchantId: string, connector: string, auth: ConnectorAuthType): this {
    this.entries.set(InMemoryCredentialStore.key(merchantId, connector), auth);
    return this;
  }

  async findConnectorAuth(merchantId: string, connector: string): Promise<Result<ConnectorAuthType, StorageError>> {
    const auth = this.entries.get(InMemoryCredentialStore.key(merchantId, connector));
    return auth ? ok(auth) : err(valueNotFound(`connector account ${connector} for merchant ${merchantId}`));
  }
}
