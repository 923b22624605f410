import { EventEmitter } from 'events';
import { IKeyValueStore, KeyValueEntry } from '../types';

/**
 * In-process key/value store for tests and single-process deployments.
 *
 * Note: state lives in this process only; it does not coordinate with other writers.
 */
export class InMemoryKeyValueStore extends EventEmitter implements IKeyValueStore {
  private store = new Map<string, string>();

  async get(key: string): Promise<string | undefined> {
    return this.store.get(key);
  }

  async set(key: string, value: string): Promise<void> {
    this.store.set(key, value);
    this.emit('key:set', { key, value });
  }

  async delete(key: string): Promise<boolean> {
    const existed = this.store.delete(key);
    if (existed) {
      this.emit('key:deleted', { key });
    }
    return existed;
  }

  async list(prefix: string): Promise<KeyValueEntry[]> {
    const base = prefix.endsWith('/') ? prefix : `${prefix}/`;
    const entries: KeyValueEntry[] = [];
    for (const [key, value] of this.store) {
      if (key.startsWith(base) && key.length > base.length && !key.slice(base.length).includes('/')) {
        entries.push({ key, value });
      }
    }
    return entries.sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0));
  }

  clear(): void {
    this.store.clear();
  }

  snapshot(): Record<string, string> {
    return Object.fromEntries(this.store);
  }
}
