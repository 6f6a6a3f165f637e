/**
 * Serverless entry point. The store is opened and seeded on the first
 * event and reused for the lifetime of the container.
 */

import { config, validateConfig } from './config';
import { createEventHandler } from './adapters/event-handler';
import { initializeGeneStore } from './services/dataset-loader';
import { openGeneStore } from './services/gene-store';
import { GeneQueryService } from './services/query-service';

export const handler = createEventHandler(async () => {
  validateConfig();
  const store = openGeneStore(config.database.url);
  try {
    await initializeGeneStore(store, { dataFile: config.dataset.file });
  } catch (error) {
    await store.close();
    throw error;
  }
  return new GeneQueryService(store);
});

export default handler;
