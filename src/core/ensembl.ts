import { JsonDocument, JsonValue, SchemaName } from '../types';
import { isJsonObject } from './normalizer';
import { PipelineRequest } from './pipeline';

function field(document: JsonDocument, name: string): JsonValue | undefined {
  return isJsonObject(document) ? document[name] : undefined;
}

function listField(document: JsonDocument, name: string): JsonValue[] {
  const value = field(document, name);
  return Array.isArray(value) ? value : [];
}

/**
 * `Transcript[]` of an expanded gene lookup
 */
export function selectTranscripts(document: JsonDocument): JsonDocument {
  return listField(document, 'Transcript');
}

/**
 * Single summary record of a variant. `name` wins over `id`.
 */
export function selectVariantSummary(document: JsonDocument): JsonDocument {
  return {
    id: field(document, 'name') ?? field(document, 'id') ?? null,
    most_severe_consequence: field(document, 'most_severe_consequence') ?? null,
    minor_allele: field(document, 'minor_allele') ?? null,
    minor_allele_freq: field(document, 'minor_allele_freq') ?? null,
  };
}

export function selectVariantMappings(document: JsonDocument): JsonDocument {
  return listField(document, 'mappings');
}

/**
 * `data[0].homologies[]` of a homology lookup
 */
export function selectHomologies(document: JsonDocument): JsonDocument {
  const [first] = listField(document, 'data');
  return isJsonObject(first) ? listField(first, 'homologies') : [];
}

const encode = (segment: string): string => encodeURIComponent(segment);

export function geneAnnotationRequest(geneId: string): PipelineRequest {
  return {
    schemaName: SchemaName.GeneAnnotation,
    path: `/lookup/id/${encode(geneId)}`,
  };
}

export function transcriptsRequest(geneId: string): PipelineRequest {
  return {
    schemaName: SchemaName.Transcripts,
    path: `/lookup/id/${encode(geneId)}`,
    params: { expand: 1 },
    select: selectTranscripts,
  };
}

export function variationPath(species: string, variantId: string): string {
  return `/variation/${encode(species)}/${encode(variantId)}`;
}

export function orthologsRequest(geneId: string, targetSpecies?: string): PipelineRequest {
  const request: PipelineRequest = {
    schemaName: SchemaName.Orthologs,
    path: `/homology/id/${encode(geneId)}`,
    params: { type: 'orthologues' },
    select: selectHomologies,
    normalize: { expand: ['source', 'target'] },
  };
  if (targetSpecies) {
    request.rowFilter = (row) => {
      const species = row['target.species'];
      return species !== undefined && species.kind === 'string' && species.value === targetSpecies;
    };
  }
  return request;
}
