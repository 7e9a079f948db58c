import express, { type Express } from 'express';
import cors from 'cors';
import { metrics } from '@opentelemetry/api';
import { PassphraseConfig } from './config';
import { logWithTrace } from './logger';
import { PassphraseGenerator } from './passphrase';
import { notFoundHandler, errorHandler } from './problemJson';
import { CryptoRandom, SeededRandom } from './random';
import { toPassphraseOptions, zGeneratePassphrasesRequest } from './schema';
import type { ServiceSettings } from './settings';
import type {
  GeneratePassphraseResponse,
  GeneratePassphrasesResponse,
  HealthResponse,
  PassphraseOptionsSnapshot,
  RandomSource,
  WordSource,
} from './types';

const meter = metrics.getMeter('wordpass-backend', '1.0.0');
const passphrasesGenerated = meter.createCounter('passphrases_generated', {
  description: 'Number of passphrases returned by the HTTP service',
});

export interface AppDependencies {
  settings: ServiceSettings;
  /** Overrides the random source picked from settings. */
  random?: RandomSource;
  /** Overrides settings.wordListPath. */
  wordSource?: WordSource;
}

export function createApp({ settings, random, wordSource }: AppDependencies): Express {
  const app = express();
  const rng = random ?? (settings.randomSeed !== undefined ? new SeededRandom(settings.randomSeed) : new CryptoRandom());
  const defaults = new PassphraseConfig({ wordListPath: settings.wordListPath });
  const requestBody = zGeneratePassphrasesRequest(settings.maxBatchSize);

  const generatorFor = (config: PassphraseConfig): PassphraseGenerator =>
    new PassphraseGenerator({ config, random: rng, wordSource });

  app.use(cors({ origin: settings.corsOrigin }));
  app.use(express.json());

  // Health check endpoint
  app.get('/health', (_req, res) => {
    const body: HealthResponse = { status: 'ok', timestamp: new Date().toISOString() };
    res.json(body);
  });

  app.get('/passphrase/config', (_req, res) => {
    const body: PassphraseOptionsSnapshot = defaults.toOptions();
    res.json(body);
  });

  app.get('/passphrase', (_req, res) => {
    const passphrase = generatorFor(defaults.clone()).generate();
    passphrasesGenerated.add(1, { route: 'GET /passphrase' });

    const body: GeneratePassphraseResponse = { passphrase };
    res.json(body);
  });

  app.post('/passphrase', (req, res) => {
    const { count, options } = requestBody.parse(req.body ?? {});
    const config = defaults.clone().apply(toPassphraseOptions(options));

    const passphrases = [...generatorFor(config).generateMany(count)];
    passphrasesGenerated.add(passphrases.length, { route: 'POST /passphrase' });
    logWithTrace('info', 'Generated passphrases', {
      count: passphrases.length,
      wordCount: config.wordCount,
      paddingType: config.paddingType,
    });

    const body: GeneratePassphrasesResponse = { passphrases };
    res.json(body);
  });

  app.use(notFoundHandler());
  app.use(errorHandler());

  return app;
}
