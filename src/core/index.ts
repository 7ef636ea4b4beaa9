export { TtlCache } from './cache';
export { UpstreamError } from './errors';
export { Logger, ConsoleLogger, defaultLogger } from './logger';
export { normalize, filterRows, tableToJson, toCell, fromCell } from './normalizer';
export { validate } from './validator';
export { SchemaRegistry, createDefaultRegistry } from './schemas';
export { UpstreamClient, computeCacheKey, FetchResult, FetchLike } from './upstream-client';
export { runPipeline, tabulate, toEnvelope, Fetcher, PipelineResult, Envelope } from './pipeline';
export { createServices, ValidatorServices } from './services';
