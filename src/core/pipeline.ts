import {
  JsonDocument,
  QueryParams,
  Table,
  TableJson,
  TableRow,
  ValidationReport,
} from '../types';
import { UpstreamError } from './errors';
import { Logger, defaultLogger } from './logger';
import { NormalizeOptions, normalize, filterRows, tableToJson } from './normalizer';
import { SchemaRegistry } from './schemas';
import { FetchResult } from './upstream-client';
import { validate } from './validator';

/**
 * Anything that can fetch an upstream document; UpstreamClient in production
 */
export interface Fetcher {
  fetch(path: string, params?: QueryParams): Promise<FetchResult>;
}

export interface PipelineDeps {
  fetcher: Fetcher;
  registry: SchemaRegistry;
  logger?: Logger;
}

export interface TabulateOptions {
  /** Pick the records to tabulate out of the upstream document */
  select?: (document: JsonDocument) => JsonDocument;
  normalize?: NormalizeOptions;
  /** Keep only matching rows before validation */
  rowFilter?: (row: TableRow) => boolean;
}

export interface PipelineRequest extends TabulateOptions {
  schemaName: string;
  path: string;
  params?: QueryParams;
}

export interface TableOutcome {
  table: Table;
  report: ValidationReport;
}

export type PipelineResult =
  | ({ ok: true; cached: boolean } & TableOutcome)
  | { ok: false; error: UpstreamError };

export interface Envelope {
  data: TableJson;
  validation: ValidationReport;
}

/**
 * Normalize a fetched document and validate it against a registered schema.
 * An unknown schema name is a programming error and throws.
 */
export function tabulate(
  registry: SchemaRegistry,
  schemaName: string,
  document: JsonDocument,
  options: TabulateOptions = {}
): TableOutcome {
  const schema = registry.get(schemaName);
  if (!schema) {
    throw new Error(`Unknown schema: ${schemaName}`);
  }

  const selected = options.select ? options.select(document) : document;
  let table = normalize(selected, options.normalize);
  if (options.rowFilter) {
    table = filterRows(table, options.rowFilter);
  }

  return { table, report: validate(table, schema) };
}

/**
 * Fetch → normalize → validate.
 *
 * Fetch failures come back as `{ ok: false }`; validation failures are part
 * of a successful result.
 */
export async function runPipeline(deps: PipelineDeps, request: PipelineRequest): Promise<PipelineResult> {
  const logger = deps.logger || defaultLogger;
  const fetched = await deps.fetcher.fetch(request.path, request.params);

  if (!fetched.ok) {
    logger.warn('pipeline fetch failed', {
      event: 'pipeline_error',
      schema: request.schemaName,
      kind: fetched.error.kind,
    });
    return { ok: false, error: fetched.error };
  }

  const outcome = tabulate(deps.registry, request.schemaName, fetched.payload, request);
  logger.debug('pipeline completed', {
    event: 'pipeline',
    schema: request.schemaName,
    rows: outcome.table.rows.length,
    passed: outcome.report.passed,
    issues: outcome.report.issues.length,
    cached: fetched.cached,
  });

  return { ok: true, cached: fetched.cached, ...outcome };
}

export function toEnvelope(outcome: TableOutcome): Envelope {
  return {
    data: tableToJson(outcome.table),
    validation: outcome.report,
  };
}
