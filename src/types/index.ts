/**
 * Any value a JSON document can hold.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/**
 * Upstream documents are always an object or an array at the top level
 */
export type JsonDocument = JsonObject | JsonValue[];

/**
 * Column types a schema rule can demand
 */
export enum ColumnType {
  String = 'string',
  Integer = 'integer',
  Float = 'float',
  Boolean = 'boolean',
}

/**
 * A single table cell.
 *
 * Nested objects and arrays are kept whole as `structured` cells; they are
 * never decomposed into further columns unless explicitly expanded.
 */
export type CellValue =
  | { kind: 'string'; value: string }
  | { kind: 'number'; value: number }
  | { kind: 'boolean'; value: boolean }
  | { kind: 'null' }
  | { kind: 'structured'; value: JsonValue[] | JsonObject };

export type TableRow = Readonly<Record<string, CellValue>>;

/**
 * Normalized tabular view of an upstream document
 */
export interface Table {
  readonly columns: readonly string[];
  readonly rows: readonly TableRow[];
}

/**
 * Plain JSON rendering of a table, as returned to HTTP clients
 */
export interface TableJson {
  columns: string[];
  rows: Record<string, JsonValue>[];
}

export interface NumericRange {
  min: number;
  max: number;
}

/**
 * Contract for one column
 */
export interface SchemaRule {
  column: string;
  type: ColumnType;
  nullable: boolean;
  required: boolean;
  /** Inclusive bounds, only meaningful for numeric columns */
  range?: NumericRange;
}

/**
 * A named table contract
 */
export interface Schema {
  readonly name: string;
  readonly rules: readonly SchemaRule[];
  /** Always true: columns the schema does not declare are accepted */
  readonly allowExtraColumns: true;
  /** A table without rows passes without column checks */
  readonly allowEmpty?: boolean;
}

export enum SchemaName {
  GeneAnnotation = 'gene_annotation',
  Transcripts = 'transcripts',
  VariantSummary = 'variant_summary',
  VariantMappings = 'variant_mappings',
  Orthologs = 'orthologs',
}

export type ValidationRule = 'missing_column' | 'type' | 'nullable' | 'range';

export interface ValidationIssue {
  column: string;
  rule: ValidationRule;
  rowIndex: number | 'schema-level';
  message: string;
}

export interface ValidationReport {
  schemaName: string;
  passed: boolean;
  issues: ValidationIssue[];
}

/**
 * Classification of fetch-layer failures
 */
export enum UpstreamErrorKind {
  Unavailable = 'UpstreamUnavailable',
  ClientError = 'UpstreamClientError',
  Malformed = 'UpstreamMalformed',
}

/**
 * Query parameters sent upstream. Values are stringified before sending.
 */
export type QueryParams = Record<string, string | number | boolean>;

/**
 * Service configuration, read once at start-up
 */
export interface ValidatorConfig {
  /** Upstream REST base URL */
  baseUrl: string;
  /** Overall deadline for one fetch, retries included */
  timeoutMs: number;
  cacheTtlMs: number;
  /** Total attempts per fetch */
  retries: number;
  /** Backoff unit; attempt n waits n × backoffMs before the next try */
  backoffMs: number;
  port: number;
  logLevel: LogLevel;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
