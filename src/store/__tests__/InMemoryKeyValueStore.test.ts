import { InMemoryKeyValueStore } from '../memory/InMemoryKeyValueStore';

describe('InMemoryKeyValueStore', () => {
  let store: InMemoryKeyValueStore;

  beforeEach(() => {
    store = new InMemoryKeyValueStore();
  });

  describe('basic operations', () => {
    it('should set and get values', async () => {
      await store.set('monitoring/summary/nodes/n1', '{"node_id":"n1"}');
      expect(await store.get('monitoring/summary/nodes/n1')).toBe('{"node_id":"n1"}');
    });

    it('should return undefined for non-existent keys', async () => {
      expect(await store.get('nonexistent')).toBeUndefined();
    });

    it('should delete values and report whether they existed', async () => {
      await store.set('foo', 'bar');
      expect(await store.delete('foo')).toBe(true);
      expect(await store.delete('foo')).toBe(false);
      expect(await store.get('foo')).toBeUndefined();
    });

    it('should clear all values', async () => {
      await store.set('foo', 'bar');
      await store.set('baz', 'qux');
      store.clear();
      expect(store.snapshot()).toEqual({});
    });
  });

  describe('list', () => {
    beforeEach(async () => {
      await store.set('monitoring/summary/nodes/n2', 'two');
      await store.set('monitoring/summary/nodes/n1', 'one');
      await store.set('monitoring/summary/nodes/n1/history', 'nested');
      await store.set('monitoring/summary/nodes', 'listing');
      await store.set('monitoring/summary/nodes-archive/n3', 'other');
    });

    it('should return direct children sorted by key', async () => {
      expect(await store.list('monitoring/summary/nodes')).toEqual([
        { key: 'monitoring/summary/nodes/n1', value: 'one' },
        { key: 'monitoring/summary/nodes/n2', value: 'two' }
      ]);
    });

    it('should accept a prefix with a trailing slash', async () => {
      const entries = await store.list('monitoring/summary/nodes/');
      expect(entries.map(entry => entry.key)).toEqual(['monitoring/summary/nodes/n1', 'monitoring/summary/nodes/n2']);
    });

    it('should return an empty list for an unknown prefix', async () => {
      expect(await store.list('monitoring/summary/clusters')).toEqual([]);
    });
  });

  describe('events', () => {
    it('should emit key:set and key:deleted', async () => {
      const setSpy = jest.fn();
      const deletedSpy = jest.fn();
      store.on('key:set', setSpy);
      store.on('key:deleted', deletedSpy);

      await store.set('foo', 'bar');
      await store.delete('foo');
      await store.delete('foo');

      expect(setSpy).toHaveBeenCalledWith({ key: 'foo', value: 'bar' });
      expect(deletedSpy).toHaveBeenCalledTimes(1);
      expect(deletedSpy).toHaveBeenCalledWith({ key: 'foo' });
    });
  });
});
