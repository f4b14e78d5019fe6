/**
 * Abstract interface for persistent, asynchronous secure storage.
 * The trust cache mirrors itself through it; the host decides where the
 * bytes actually live (filesystem, keychain, browser storage).
 */
export interface SecureStorage {
  /**
   * Loads the value stored under `key`.
   * @returns the stored bytes, or null if the key is not found.
   */
  get(key: string): Promise<Uint8Array | null>;

  /**
   * Stores `data` under `key`, replacing any previous value.
   */
  set(key: string, data: Uint8Array): Promise<void>;

  /**
   * Removes `key`. Deleting a missing key is not an error.
   */
  delete(key: string): Promise<void>;
}

/**
 * In-memory storage, used by tests and short-lived tools.
 */
export class MemorySecureStorage implements SecureStorage {
  private readonly entries = new Map<string, Uint8Array>();

  async get(key: string): Promise<Uint8Array | null> {
    const value = this.entries.get(key);
    return value ? value.slice() : null;
  }

  async set(key: string, data: Uint8Array): Promise<void> {
    this.entries.set(key, data.slice());
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }
}
