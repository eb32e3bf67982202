import { describe, it, expect, vi, beforeEach } from 'vitest';
import { SchemaSnapshotProvider } from '../src/lib/schema/provider';
import { FakeStore } from './helpers';

describe('SchemaSnapshotProvider', () => {
  let store: FakeStore;
  let now: number;
  let provider: SchemaSnapshotProvider;

  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    store = new FakeStore();
    now = 0;
    provider = new SchemaSnapshotProvider(store, 1000, () => now);
  });

  it('serves the same snapshot until it goes stale', async () => {
    const first = await provider.get();
    now = 999;
    expect(await provider.get()).toBe(first);
    expect(store.columnCalls).toBe(1);

    now = 1000;
    const second = await provider.get();
    expect(second).not.toBe(first);
    expect(second.refreshedAt).toBe(1000);
    expect(store.columnCalls).toBe(2);
  });

  it('keeps only catalog columns', async () => {
    store.columns = ['float_id', 'Timestamp', 'temperature', 'qc_flag'];
    const snapshot = await provider.get();
    expect(snapshot.schema.columns).toEqual(['float_id', 'timestamp', 'temperature']);
    expect(snapshot.range).toBe(store.range);
  });

  it('shares one load between concurrent callers', async () => {
    const [a, b] = await Promise.all([provider.get(), provider.get()]);
    expect(a).toBe(b);
    expect(store.columnCalls).toBe(1);
  });

  it('does not mutate a snapshot already handed out', async () => {
    const first = await provider.get();
    store.columns = ['float_id', 'timestamp'];
    await provider.refresh();

    expect(first.schema.has('temperature')).toBe(true);
    expect(Object.isFrozen(first)).toBe(true);
  });

  it('serves the previous snapshot when a refresh fails', async () => {
    const first = await provider.get();
    store.failColumns = true;
    now = 5000;
    expect(await provider.get()).toBe(first);
  });

  it('fails when there is nothing to fall back to', async () => {
    store.failColumns = true;
    await expect(provider.get()).rejects.toThrow('connection refused');
  });
});
