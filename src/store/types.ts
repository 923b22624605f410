/**
 * Port to the coordination store the summaries live in (an etcd-style key/value service)
 */

export interface KeyValueEntry {
  key: string;
  value: string;
}

export interface IKeyValueStore {
  /**
   * Read a key; undefined when it does not exist
   */
  get(key: string): Promise<string | undefined>;

  /**
   * Create or overwrite a key
   */
  set(key: string, value: string): Promise<void>;

  /**
   * Remove a key; resolves false when there was nothing to remove
   */
  delete(key: string): Promise<boolean>;

  /**
   * Entries directly under a prefix, sorted by key
   */
  list(prefix: string): Promise<KeyValueEntry[]>;
}
