import { describe, it, expect } from 'vitest';
import { InvalidConfigurationError } from '../src/errors';
import { loadServiceSettings } from '../src/settings';

describe('loadServiceSettings', () => {
  it('falls back to defaults', () => {
    expect(loadServiceSettings({})).toEqual({
      port: 3000,
      corsOrigin: '*',
      wordListPath: '?en.gz',
      randomSeed: undefined,
      maxBatchSize: 100,
    });
  });

  it('reads every variable', () => {
    expect(
      loadServiceSettings({
        PORT: '8080',
        CORS_ORIGIN: 'https://example.test',
        WORD_LIST_PATH: '/srv/words.txt',
        RANDOM_SEED: '42',
        MAX_BATCH_SIZE: '10',
      })
    ).toEqual({
      port: 8080,
      corsOrigin: 'https://example.test',
      wordListPath: '/srv/words.txt',
      randomSeed: 42,
      maxBatchSize: 10,
    });
  });

  it('treats a blank seed as unset', () => {
    expect(loadServiceSettings({ RANDOM_SEED: ' ' }).randomSeed).toBeUndefined();
  });

  it('names the variable that failed', () => {
    expect(() => loadServiceSettings({ PORT: 'eighty' })).toThrow(
      'Invalid value for PORT: must be an integer of at least 0'
    );
  });

  it('rejects a zero batch size', () => {
    expect(() => loadServiceSettings({ MAX_BATCH_SIZE: '0' })).toThrow(InvalidConfigurationError);
  });
});
