/**
 * Secret store backed by the operating system keychain
 * (macOS Keychain, Windows Credential Manager, Secret Service on Linux)
 */

import { Entry } from '@napi-rs/keyring';
import type { CredentialHandle, SecretStore } from '@coffee-chat/core';

export interface KeyringEntry {
  getPassword(): string | null | undefined;
  setPassword(password: string): void;
  deletePassword(): boolean;
}

export type KeyringEntryFactory = (serviceId: string, accountId: string) => KeyringEntry;

export class KeyringSecretStore implements SecretStore {
  private createEntry: KeyringEntryFactory;

  constructor(createEntry: KeyringEntryFactory = (serviceId, accountId) => new Entry(serviceId, accountId)) {
    this.createEntry = createEntry;
  }

  async get(handle: CredentialHandle): Promise<string | null> {
    return this.entryFor(handle).getPassword() ?? null;
  }

  async set(handle: CredentialHandle, secret: string): Promise<void> {
    this.entryFor(handle).setPassword(secret);
    console.log(`[Secrets] Stored secret for ${handle.serviceId}/${handle.accountId}`);
  }

  async delete(handle: CredentialHandle): Promise<boolean> {
    const removed = this.entryFor(handle).deletePassword();
    if (removed) {
      console.log(`[Secrets] Removed secret for ${handle.serviceId}/${handle.accountId}`);
    }
    return removed;
  }

  private entryFor(handle: CredentialHandle): KeyringEntry {
    return this.createEntry(handle.serviceId, handle.accountId);
  }
}
