/**
 * Table contracts for the Ensembl REST payloads.
 *
 * Every schema accepts columns it does not declare, so upstream additions
 * never fail validation. Only the columns downstream consumers rely on are
 * listed here.
 */

import { ColumnType, Schema, SchemaName, SchemaRule } from '../types';

function column(
  name: string,
  type: ColumnType,
  options: Partial<Omit<SchemaRule, 'column' | 'type'>> = {}
): SchemaRule {
  return {
    column: name,
    type,
    nullable: options.nullable ?? false,
    required: options.required ?? true,
    ...(options.range ? { range: { ...options.range } } : {}),
  };
}

function defineSchema(name: string, rules: SchemaRule[], options: { allowEmpty?: boolean } = {}): Schema {
  return Object.freeze({
    name,
    rules: Object.freeze(rules.map((rule) => Object.freeze(rule))),
    allowExtraColumns: true as const,
    ...(options.allowEmpty ? { allowEmpty: true } : {}),
  });
}

// Gene record from /lookup/id/{id}, one row
export const GeneAnnotationSchema = defineSchema(SchemaName.GeneAnnotation, [
  column('id', ColumnType.String),
  column('display_name', ColumnType.String, { nullable: true }),
  column('biotype', ColumnType.String, { nullable: true }),
  column('seq_region_name', ColumnType.String, { nullable: true }),
  column('start', ColumnType.Integer, { nullable: true }),
  column('end', ColumnType.Integer, { nullable: true }),
  column('strand', ColumnType.Integer, { nullable: true }),
]);

// Transcript[] from /lookup/id/{id}?expand=1
export const TranscriptsSchema = defineSchema(SchemaName.Transcripts, [
  column('id', ColumnType.String),
  column('biotype', ColumnType.String, { nullable: true }),
  column('start', ColumnType.Integer, { nullable: true }),
  column('end', ColumnType.Integer, { nullable: true }),
  column('strand', ColumnType.Integer, { nullable: true }),
]);

// Top-level fields of /variation/{species}/{id}, one row
export const VariantSummarySchema = defineSchema(SchemaName.VariantSummary, [
  column('id', ColumnType.String, { nullable: true }),
  column('most_severe_consequence', ColumnType.String, { nullable: true }),
  column('minor_allele', ColumnType.String, { nullable: true }),
  column('minor_allele_freq', ColumnType.Float, { nullable: true, range: { min: 0, max: 1 } }),
]);

// mappings[] of /variation/{species}/{id}; a variant without mappings is fine
export const VariantMappingsSchema = defineSchema(
  SchemaName.VariantMappings,
  [
    column('seq_region_name', ColumnType.String),
    column('start', ColumnType.Integer),
    column('end', ColumnType.Integer),
    column('strand', ColumnType.Integer),
    column('allele_string', ColumnType.String),
  ],
  { allowEmpty: true }
);

// data[0].homologies[] of /homology/id/{id}?type=orthologues, target expanded
export const OrthologsSchema = defineSchema(SchemaName.Orthologs, [
  column('type', ColumnType.String, { nullable: true }),
  column('target.id', ColumnType.String, { nullable: true }),
  column('target.species', ColumnType.String, { nullable: true }),
  column('target.perc_id', ColumnType.Float, { nullable: true, range: { min: 0, max: 100 } }),
  column('target.perc_pos', ColumnType.Float, { nullable: true, range: { min: 0, max: 100 } }),
]);

/**
 * Immutable lookup of schemas by name, built once per process
 */
export class SchemaRegistry {
  private schemas: ReadonlyMap<string, Schema>;

  constructor(schemas: Schema[]) {
    const map = new Map<string, Schema>();
    for (const schema of schemas) {
      if (map.has(schema.name)) {
        throw new Error(`Duplicate schema name: ${schema.name}`);
      }
      map.set(schema.name, schema);
    }
    this.schemas = map;
  }

  get(name: string): Schema | undefined {
    return this.schemas.get(name);
  }

  has(name: string): boolean {
    return this.schemas.has(name);
  }

  names(): string[] {
    return [...this.schemas.keys()];
  }
}

export function createDefaultRegistry(): SchemaRegistry {
  return new SchemaRegistry([
    GeneAnnotationSchema,
    TranscriptsSchema,
    VariantSummarySchema,
    VariantMappingsSchema,
    OrthologsSchema,
  ]);
}
