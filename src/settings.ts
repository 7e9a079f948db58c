import { DEFAULT_WORD_LIST_PATH } from './config';
import { InvalidConfigurationError } from './errors';

export interface ServiceSettings {
  port: number;
  corsOrigin: string;
  wordListPath: string;
  /** When set, the service draws from a SeededRandom instead of the CSPRNG. */
  randomSeed?: number;
  maxBatchSize: number;
}

function parseInteger(env: NodeJS.ProcessEnv, name: string, fallback: number, minimum: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < minimum) {
    throw new InvalidConfigurationError(name, raw, `must be an integer of at least ${minimum}`);
  }
  return value;
}

export function loadServiceSettings(env: NodeJS.ProcessEnv = process.env): ServiceSettings {
  const seed = env.RANDOM_SEED;

  return {
    port: parseInteger(env, 'PORT', 3000, 0),
    corsOrigin: env.CORS_ORIGIN || '*',
    wordListPath: env.WORD_LIST_PATH || DEFAULT_WORD_LIST_PATH,
    randomSeed: seed === undefined || seed.trim() === '' ? undefined : parseInteger(env, 'RANDOM_SEED', 0, 0),
    maxBatchSize: parseInteger(env, 'MAX_BATCH_SIZE', 100, 1),
  };
}
