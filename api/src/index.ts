import { serve } from '@hono/node-server';
import { createApp } from './app';
import { ConfigError, loadConfig, loadEnvFile } from './config';
import { PgMeasurementStore, createPool } from './lib/db/client';
import { getGazetteer } from './lib/gazetteer';
import { OllamaClient } from './lib/llm';
import { QuestionAnswerer } from './lib/orchestrator/answer';
import { SchemaSnapshotProvider } from './lib/schema/provider';
import { setAnswerer as setChatAnswerer } from './routes/chat';
import { setAnswerer as setFloatsAnswerer } from './routes/floats';
import { setGazetteer } from './routes/locations';
import { setAnswerer as setPeriodsAnswerer } from './routes/periods';
import { setAnswerer as setQueryAnswerer } from './routes/query';
import { setStatusSources } from './routes/status';

async function startServer(): Promise<void> {
  loadEnvFile();
  const config = loadConfig();
  if (!config.DATABASE_URL) {
    throw new ConfigError(['DATABASE_URL: required to start the server']);
  }

  const gazetteer = getGazetteer();
  console.log(`✓ Gazetteer loaded (${gazetteer.size} locations)`);

  const store = new PgMeasurementStore(createPool(config.DATABASE_URL));
  const snapshots = new SchemaSnapshotProvider(store, config.SCHEMA_REFRESH_MS);
  const { schema, range } = await snapshots.refresh();
  console.log(`✓ Measurement table: ${schema.columns.join(', ')}`);
  console.log(
    `  Data range: ${range.min?.toISOString() ?? 'empty'} to ${range.max?.toISOString() ?? 'empty'}`
  );

  const llm = new OllamaClient(config.OLLAMA_BASE_URL, config.OLLAMA_MODEL);
  if (!(await llm.healthCheck())) {
    console.warn(`⚠ Ollama not reachable at ${config.OLLAMA_BASE_URL}; using keyword drafts`);
  }

  const answerer = new QuestionAnswerer(
    { llm, store, snapshots, gazetteer },
    {
      parseCacheSize: config.PARSE_CACHE_SIZE,
      responseCacheSize: config.RESPONSE_CACHE_SIZE,
      responseCacheTtlMs: config.RESPONSE_CACHE_TTL_MS,
      showIntentDebug: config.SHOW_INTENT_DEBUG,
      narrate: true,
    }
  );
  setChatAnswerer(answerer);
  setQueryAnswerer(answerer);
  setFloatsAnswerer(answerer);
  setPeriodsAnswerer(answerer);
  setGazetteer(gazetteer);
  setStatusSources({ store, snapshots, llm, model: config.OLLAMA_MODEL });

  const app = createApp(config.CORS_ORIGINS);
  serve({ fetch: app.fetch, port: config.PORT });
  console.log(`Server is running on port ${config.PORT}`);

  const shutdown = (signal: string): void => {
    console.log(`${signal} received, closing database pool`);
    store.close().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error('Failed to close database pool:', error);
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

startServer().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    console.error(error.message);
  } else {
    console.error('Failed to start server:', error);
  }
  process.exit(1);
});
