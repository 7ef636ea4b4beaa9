import {
  geneAnnotationRequest,
  orthologsRequest,
  selectHomologies,
  selectTranscripts,
  selectVariantMappings,
  selectVariantSummary,
  transcriptsRequest,
  variationPath,
} from './ensembl';
import { normalize } from './normalizer';

describe('record selection', () => {
  it('selects transcripts, or nothing when absent', () => {
    expect(selectTranscripts({ id: 'G', Transcript: [{ id: 'T1' }] })).toEqual([{ id: 'T1' }]);
    expect(selectTranscripts({ id: 'G' })).toEqual([]);
    expect(selectTranscripts([])).toEqual([]);
  });

  it('builds the variant summary, preferring name over id', () => {
    expect(selectVariantSummary({ name: 'rs699', id: 'other', minor_allele: 'T', mappings: [] })).toEqual({
      id: 'rs699',
      most_severe_consequence: null,
      minor_allele: 'T',
      minor_allele_freq: null,
    });
    expect(selectVariantSummary({ id: 'rs1' })).toEqual({
      id: 'rs1',
      most_severe_consequence: null,
      minor_allele: null,
      minor_allele_freq: null,
    });
  });

  it('selects variant mappings', () => {
    expect(selectVariantMappings({ mappings: [{ start: 1 }] })).toEqual([{ start: 1 }]);
    expect(selectVariantMappings({ mappings: 'bad' })).toEqual([]);
  });

  it('selects homologies of the first data entry', () => {
    expect(selectHomologies({ data: [{ homologies: [{ type: 'o' }] }, { homologies: [{ type: 'x' }] }] })).toEqual([
      { type: 'o' },
    ]);
    expect(selectHomologies({ data: [] })).toEqual([]);
    expect(selectHomologies({})).toEqual([]);
  });
});

describe('endpoint requests', () => {
  it('encodes path segments', () => {
    expect(geneAnnotationRequest('ENSG 1/2').path).toBe('/lookup/id/ENSG%201%2F2');
    expect(variationPath('homo sapiens', 'rs699')).toBe('/variation/homo%20sapiens/rs699');
  });

  it('asks for the expanded lookup for transcripts', () => {
    const request = transcriptsRequest('ENSG1');
    expect(request.schemaName).toBe('transcripts');
    expect(request.params).toEqual({ expand: 1 });
  });

  it('filters orthologs by target species only when asked', () => {
    expect(orthologsRequest('ENSG1').rowFilter).toBeUndefined();

    const request = orthologsRequest('ENSG1', 'mouse');
    const table = normalize(
      [
        { target: { species: 'mouse' } },
        { target: { species: 'rat' } },
        { target: {} },
      ],
      request.normalize
    );
    const filter = request.rowFilter;
    expect(filter).toBeDefined();
    if (filter) {
      expect(table.rows.map((row) => filter(row))).toEqual([true, false, false]);
    }
  });
});
