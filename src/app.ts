import express from 'express';
import cors from 'cors';

import type { AppConfig } from './config';
import { SearchController, errorHandler } from './controllers/searchController';
import { createSearchRouter } from './routes/searchRoutes';
import { AddressLookupCache } from './services/addressLookupCache';
import { CredentialStore, FileCredentialStore } from './services/credentialStore';
import { EmbeddingModelFactory, EmbeddingModelLoader } from './services/imageEmbeddingService';
import { MapThumbnailService } from './services/mapThumbnailService';
import { AddressLookup, OverpassAddressService } from './services/overpassAddressService';
import { SearchPresenter } from './services/searchPresenter';
import type { FetchLike } from './utils/http';
import { createLogger } from './utils/logger';

const logger = createLogger('App');

export interface CivicEyeDependencies {
  fetchImpl?: FetchLike;
  credentialStore?: CredentialStore;
  embeddingModelFactory?: EmbeddingModelFactory;
  addressLookup?: AddressLookup;
}

export interface CivicEye {
  presenter: SearchPresenter;
  modelLoader: EmbeddingModelLoader;
  cache: AddressLookupCache;
}

/**
 * Builds the search pipeline. The stored API key is read once here; an
 * environment key takes precedence over the stored one.
 */
export async function createCivicEye(config: AppConfig, deps: CivicEyeDependencies = {}): Promise<CivicEye> {
  const credentialStore = deps.credentialStore ?? new FileCredentialStore(config.maps.credentialFile);
  const apiKey = config.maps.apiKey ?? (await credentialStore.read());

  const lookup =
    deps.addressLookup ??
    new OverpassAddressService({
      endpoint: config.addressQuery.endpoint,
      timeoutMs: config.requestTimeoutMs,
      userAgent: config.userAgent,
      fetchImpl: deps.fetchImpl,
    });
  const cache = new AddressLookupCache(lookup, { ttlMs: config.addressQuery.cacheTtlMs });

  const thumbnails = new MapThumbnailService({
    viewport: { zoom: config.maps.zoom, size: config.maps.size },
    timeoutMs: config.requestTimeoutMs,
    userAgent: config.userAgent,
    apiKey,
    fetchImpl: deps.fetchImpl,
  });

  const modelLoader = new EmbeddingModelLoader(config.embedding, deps.embeddingModelFactory);

  const presenter = new SearchPresenter({
    addressLookup: cache,
    cache,
    thumbnails,
    postalCodePattern: config.addressQuery.postalCodePattern,
    modelLoader,
    credentialStore,
  });

  logger.info('CivicEye pipeline ready', {
    mapCredential: Boolean(apiKey),
    modelId: config.embedding.modelId,
    cacheTtlMs: config.addressQuery.cacheTtlMs,
  });

  return { presenter, modelLoader, cache };
}

export function createHttpApp(civicEye: CivicEye): express.Express {
  const app = express();

  app.use(cors({ origin: true, credentials: true }));
  app.use(express.json({ limit: '64kb' }));

  const controller = new SearchController(civicEye.presenter);

  app.get('/', (_req, res) => {
    res.json({ status: 'ok', service: 'civiceye', docs: '/api/health' });
  });
  app.use('/api', createSearchRouter(controller));
  app.use(errorHandler);

  return app;
}
