import { KeyringSecretStore } from './keyring-store.js';
import { MemorySecretStore } from './memory-store.js';
import type { SecretStore } from '@coffee-chat/core';

export { KeyringSecretStore, MemorySecretStore };
export type { KeyringEntry, KeyringEntryFactory } from './keyring-store.js';

export type SecretBackend = 'keyring' | 'memory';

export function createSecretStore(backend: SecretBackend): SecretStore {
  return backend === 'memory' ? new MemorySecretStore() : new KeyringSecretStore();
}
