#!/usr/bin/env node

import { Command } from 'commander';
import { loadConfig, validateConfig } from '../config';
import { startServer } from '../api';
import { defaultLogger } from '../core/logger';
import { createServices, ValidatorServices } from '../core/services';
import {
  geneAnnotationRequest,
  orthologsRequest,
  selectVariantMappings,
  selectVariantSummary,
  transcriptsRequest,
  variationPath,
} from '../core/ensembl';
import { PipelineRequest, TableOutcome, runPipeline, tabulate } from '../core/pipeline';
import { SchemaName, ValidationReport } from '../types';

const program = new Command();

let services: ValidatorServices;

function getServices(): ValidatorServices {
  if (!services) {
    const config = loadConfig();
    const errors = validateConfig(config);
    if (errors.length > 0) {
      errors.forEach((e) => console.error(`Config error: ${e}`));
      process.exit(1);
    }
    defaultLogger.setLevel(config.logLevel);
    services = createServices(config, { logger: defaultLogger });
  }
  return services;
}

export function formatReport(label: string, outcome: TableOutcome): string {
  const report: ValidationReport = outcome.report;
  const lines = [
    `=== ${label} (${report.schemaName}) ===`,
    `Rows:    ${outcome.table.rows.length}`,
    `Columns: ${outcome.table.columns.length}`,
    `Result:  ${report.passed ? 'PASSED' : `FAILED (${report.issues.length} issue(s))`}`,
  ];
  for (const issue of report.issues) {
    const where = issue.rowIndex === 'schema-level' ? 'schema' : `row ${issue.rowIndex}`;
    lines.push(`  • [${issue.rule}] ${where}: ${issue.message}`);
  }
  return lines.join('\n');
}

program
  .name('ensembl-validator')
  .description('Fetch Ensembl REST payloads and validate them as tables')
  .version('0.4.0');

/**
 * Server command
 */
program
  .command('serve')
  .description('Start the HTTP server')
  .option('-p, --port <port>', 'Port to listen on')
  .action(async (options: { port?: string }) => {
    const svc = getServices();
    const port = options.port !== undefined ? parseInt(options.port, 10) : svc.config.port;
    if (isNaN(port)) {
      console.log(`\n❌ Invalid port: ${options.port}\n`);
      process.exitCode = 1;
      return;
    }
    await startServer(svc, port);
  });

/**
 * Schemas command
 */
program
  .command('schemas')
  .description('List registered table schemas')
  .action(() => {
    const { registry } = getServices();

    console.log('\n=== Schemas ===\n');
    for (const name of registry.names()) {
      const schema = registry.get(name);
      if (!schema) continue;
      console.log(`${schema.name}${schema.allowEmpty ? ' (empty allowed)' : ''}`);
      for (const rule of schema.rules) {
        const flags = [rule.required ? 'required' : 'optional', rule.nullable ? 'nullable' : 'not null'];
        if (rule.range) flags.push(`[${rule.range.min}, ${rule.range.max}]`);
        console.log(`  ${rule.column}: ${rule.type} (${flags.join(', ')})`);
      }
      console.log('');
    }
  });

/**
 * Check command - run one pipeline against the live upstream
 */
program
  .command('check')
  .description('Fetch and validate one endpoint')
  .argument('<endpoint>', 'gene-annotation, gene-transcripts, variation or orthologs')
  .option('-g, --gene-id <id>', 'Stable gene ID')
  .option('-s, --species <species>', 'Species, e.g. human', 'human')
  .option('-v, --variant-id <id>', 'Variant ID')
  .option('-t, --target-species <species>', 'Ortholog target species filter')
  .action(
    async (
      endpoint: string,
      options: { geneId?: string; species: string; variantId?: string; targetSpecies?: string }
    ) => {
      const svc = getServices();

      if (endpoint === 'variation') {
        if (!options.variantId) {
          console.log('\n❌ --variant-id is required for variation.\n');
          process.exitCode = 1;
          return;
        }
        const fetched = await svc.fetcher.fetch(variationPath(options.species, options.variantId));
        if (!fetched.ok) {
          console.log(`\n❌ ${fetched.error.kind}: ${fetched.error.message}\n`);
          process.exitCode = 1;
          return;
        }
        const summary = tabulate(svc.registry, SchemaName.VariantSummary, fetched.payload, {
          select: selectVariantSummary,
        });
        const mappings = tabulate(svc.registry, SchemaName.VariantMappings, fetched.payload, {
          select: selectVariantMappings,
        });
        console.log(`\n${formatReport('Summary', summary)}\n\n${formatReport('Mappings', mappings)}\n`);
        return;
      }

      if (!options.geneId) {
        console.log(`\n❌ --gene-id is required for ${endpoint}.\n`);
        process.exitCode = 1;
        return;
      }

      let request: PipelineRequest;
      switch (endpoint) {
        case 'gene-annotation':
          request = geneAnnotationRequest(options.geneId);
          break;
        case 'gene-transcripts':
          request = transcriptsRequest(options.geneId);
          break;
        case 'orthologs':
          request = orthologsRequest(options.geneId, options.targetSpecies);
          break;
        default:
          console.log(`\n❌ Unknown endpoint: ${endpoint}\n`);
          process.exitCode = 1;
          return;
      }

      const result = await runPipeline(svc, request);
      if (!result.ok) {
        console.log(`\n❌ ${result.error.kind}: ${result.error.message}\n`);
        process.exitCode = 1;
        return;
      }
      console.log(`\n${formatReport(endpoint, result)}\n`);
    }
  );

if (require.main === module) {
  program.parseAsync().catch((error: unknown) => {
    console.error(error);
    process.exit(1);
  });
}
