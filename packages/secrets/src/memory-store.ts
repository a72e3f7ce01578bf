import type { CredentialHandle, SecretStore } from '@coffee-chat/core';

/**
 * Process-local secret store for tests and hosts without a keychain.
 * Secrets are lost on exit.
 */
export class MemorySecretStore implements SecretStore {
  private secrets = new Map<string, string>();

  async get(handle: CredentialHandle): Promise<string | null> {
    return this.secrets.get(keyOf(handle)) ?? null;
  }

  async set(handle: CredentialHandle, secret: string): Promise<void> {
    this.secrets.set(keyOf(handle), secret);
  }

  async delete(handle: CredentialHandle): Promise<boolean> {
    return this.secrets.delete(keyOf(handle));
  }
}

function keyOf(handle: CredentialHandle): string {
  return `${handle.serviceId}\u0000${handle.accountId}`;
}
