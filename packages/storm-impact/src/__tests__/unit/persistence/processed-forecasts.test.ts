import { describe, it, expect } from 'vitest';
import { ProcessedForecastLog } from '../../../persistence/processed-forecasts.js';
import { InMemoryStorage, type StorageBackend } from '../../../persistence/storage.js';

const key = { stormId: 'STORM-A', issuedAt: '2025-11-09T18:00:00Z' };

describe('ProcessedForecastLog', () => {
  it('should persist marked forecasts across loads', async () => {
    const storage = new InMemoryStorage();
    const log = await ProcessedForecastLog.load(storage);

    log.mark(key, new Date('2025-11-09T20:00:00.000Z'));
    expect(await log.save()).toBe(true);

    const reloaded = await ProcessedForecastLog.load(storage);
    expect(reloaded.has({ stormId: 'STORM-A', issuedAt: '2025-11-09T18:00:00.000Z' })).toBe(true);
    expect(reloaded.has({ stormId: 'STORM-B', issuedAt: key.issuedAt })).toBe(false);
  });

  it('should start empty when the file is unreadable', async () => {
    const storage = new InMemoryStorage();
    await storage.writeText('state/processed-forecasts.json', 'not json');

    expect((await ProcessedForecastLog.load(storage)).list()).toEqual([]);
  });

  it('should report a failed save without throwing', async () => {
    const readOnly: StorageBackend = {
      description: 'read-only',
      exists: async () => false,
      readText: async () => null,
      writeText: async () => {
        throw new Error('EROFS');
      },
      list: async () => [],
    };
    const log = await ProcessedForecastLog.load(readOnly);
    log.mark(key, new Date('2025-11-09T20:00:00.000Z'));

    expect(await log.save()).toBe(false);
  });
});
