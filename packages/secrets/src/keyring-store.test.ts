import { describe, it, expect, vi } from 'vitest';
import { KeyringSecretStore, type KeyringEntry } from './keyring-store.js';
import { MemorySecretStore } from './memory-store.js';

const handle = { serviceId: 'coffee-chat.smtp', accountId: 'me@example.com' };

function fakeKeychain() {
  const saved = new Map<string, string>();
  const factory = vi.fn((serviceId: string, accountId: string): KeyringEntry => {
    const key = `${serviceId}/${accountId}`;
    return {
      getPassword: () => saved.get(key) ?? null,
      setPassword: (password: string) => {
        saved.set(key, password);
      },
      deletePassword: () => saved.delete(key),
    };
  });
  return { saved, factory };
}

describe('KeyringSecretStore', () => {
  it('addresses keychain entries by service and account', async () => {
    const { saved, factory } = fakeKeychain();
    const store = new KeyringSecretStore(factory);

    await store.set(handle, 'test-secret');

    expect(factory).toHaveBeenCalledWith('coffee-chat.smtp', 'me@example.com');
    expect(saved.get('coffee-chat.smtp/me@example.com')).toBe('test-secret');
    expect(await store.get(handle)).toBe('test-secret');
  });

  it('returns null for a missing entry and reports deletions', async () => {
    const { factory } = fakeKeychain();
    const store = new KeyringSecretStore(factory);

    expect(await store.get(handle)).toBeNull();
    expect(await store.delete(handle)).toBe(false);
    await store.set(handle, 'test-secret');
    expect(await store.delete(handle)).toBe(true);
    expect(await store.get(handle)).toBeNull();
  });
});

describe('MemorySecretStore', () => {
  it('keeps accounts of the same service apart', async () => {
    const store = new MemorySecretStore();
    await store.set(handle, 'first');
    await store.set({ ...handle, accountId: 'other@example.com' }, 'second');

    expect(await store.get(handle)).toBe('first');
    expect(await store.get({ ...handle, accountId: 'other@example.com' })).toBe('second');
  });
});
