import { ValidatorConfig } from '../types';
import { TtlCache } from './cache';
import { Logger, defaultLogger } from './logger';
import { SchemaRegistry, createDefaultRegistry } from './schemas';
import { FetchLike, UpstreamClient } from './upstream-client';
import { Fetcher } from './pipeline';

/**
 * Process-lifetime collaborators, built once and passed by reference
 */
export interface ValidatorServices {
  config: ValidatorConfig;
  cache: TtlCache;
  registry: SchemaRegistry;
  fetcher: Fetcher;
  logger: Logger;
}

export interface ServiceOverrides {
  logger?: Logger;
  fetchImpl?: FetchLike;
  /** Replace the upstream client entirely, e.g. with a fake in tests */
  fetcher?: Fetcher;
  registry?: SchemaRegistry;
  cache?: TtlCache;
}

export function createServices(config: ValidatorConfig, overrides: ServiceOverrides = {}): ValidatorServices {
  const logger = overrides.logger || defaultLogger;
  const cache = overrides.cache || new TtlCache();
  const registry = overrides.registry || createDefaultRegistry();
  const fetcher =
    overrides.fetcher ||
    new UpstreamClient({
      baseUrl: config.baseUrl,
      timeoutMs: config.timeoutMs,
      retries: config.retries,
      backoffMs: config.backoffMs,
      cacheTtlMs: config.cacheTtlMs,
      cache,
      logger,
      fetchImpl: overrides.fetchImpl,
    });

  return { config, cache, registry, fetcher, logger };
}
