import path from 'node:path';
import { getAdminAuthSettings, type AdminAuthSettings } from './config/adminAuth';
import { getFxSettings } from './config/fx';
import { getQuoteDefaults } from './config/quoteDefaults';
import { createPool } from './db';
import { getDefaultRecipeBook, type RecipeBook } from './domains/pricing';
import { LocalBomSource, RemoteBomSource, type BomSource } from './services/bomSource.service';
import { FxRateProvider } from './services/fxRates.service';
import {
  InMemoryMaterialCostStore,
  loadMaterialSeed,
  PgMaterialCostStore,
  type MaterialCostStore
} from './services/materials.service';
import { QuoteLogSink } from './services/quoteSinks.service';
import { QuoteService } from './services/quotes.service';

export type ServiceContainer = {
  quotes: QuoteService;
  materials: MaterialCostStore;
  recipeBook: RecipeBook;
  adminAuth: AdminAuthSettings;
  close(): Promise<void>;
};

/**
 * Builds every long-lived collaborator once. The caller owns the returned
 * container and must `close()` it on shutdown.
 */
export async function createServices(env: NodeJS.ProcessEnv = process.env): Promise<ServiceContainer> {
  const defaults = getQuoteDefaults(env);
  const recipeBook = getDefaultRecipeBook();

  const materials: MaterialCostStore = defaults.databaseUrl
    ? new PgMaterialCostStore(createPool(defaults.databaseUrl))
    : InMemoryMaterialCostStore.fromSeedRows(await loadMaterialSeed());
  if (!defaults.databaseUrl) {
    console.warn('DATABASE_URL not set; serving materials from the in-memory seed table');
  }

  const bomSource: BomSource = defaults.bomApiUrl
    ? new RemoteBomSource(defaults.bomApiUrl)
    : new LocalBomSource(recipeBook);

  const quotes = new QuoteService({
    bomSource,
    materials,
    fx: new FxRateProvider(getFxSettings(env)),
    defaults,
    sinks: [new QuoteLogSink(path.join(defaults.outputDir, 'quotes.log'))]
  });

  return {
    quotes,
    materials,
    recipeBook,
    adminAuth: getAdminAuthSettings(env),
    close: () => materials.close()
  };
}
