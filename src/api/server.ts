import express, { Request, Response, Router, NextFunction, RequestHandler } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { SchemaName, UpstreamErrorKind } from '../types';
import { UpstreamError } from '../core/errors';
import {
  geneAnnotationRequest,
  orthologsRequest,
  selectVariantMappings,
  selectVariantSummary,
  transcriptsRequest,
  variationPath,
} from '../core/ensembl';
import { PipelineRequest, runPipeline, tabulate, toEnvelope } from '../core/pipeline';
import { ValidatorServices } from '../core/services';

const SERVICE_NAME = 'ensembl-validator';
const VERSION = '0.4.0';

/**
 * Read a required query parameter, or answer 400 and return null
 */
function requireQuery(req: Request, res: Response, name: string): string | null {
  const value = req.query[name];
  if (typeof value === 'string' && value.trim() !== '') {
    return value.trim();
  }
  res.status(400).json({
    error: 'Invalid request',
    message: `Query parameter '${name}' is required`,
  });
  return null;
}

function optionalQuery(req: Request, name: string): string | undefined {
  const value = req.query[name];
  return typeof value === 'string' && value.trim() !== '' ? value.trim() : undefined;
}

/**
 * HTTP status for a fetch-layer failure. Only these failures leave the
 * 200 path; validation problems never do.
 */
export function statusForUpstreamError(error: UpstreamError): number {
  switch (error.kind) {
    case UpstreamErrorKind.ClientError:
      return error.status ?? 400;
    case UpstreamErrorKind.Malformed:
      return 502;
    case UpstreamErrorKind.Unavailable:
      return error.timedOut ? 504 : 502;
  }
}

function sendUpstreamError(res: Response, error: UpstreamError): void {
  res.status(statusForUpstreamError(error)).json({
    error: error.kind,
    message: error.message,
    upstreamStatus: error.status ?? null,
  });
}

/**
 * Create the Ensembl validation router
 */
export function createApiRouter(services: ValidatorServices): Router {
  const router = Router();

  const runAndRespond = async (res: Response, request: PipelineRequest): Promise<void> => {
    const result = await runPipeline(services, request);
    if (!result.ok) {
      sendUpstreamError(res, result.error);
      return;
    }
    res.json(toEnvelope(result));
  };

  /**
   * GET /ensembl/gene-annotation?gene_id=
   */
  const geneAnnotationHandler: RequestHandler = async (
    req: Request,
    res: Response,
    next: NextFunction
  ): Promise<void> => {
    try {
      const geneId = requireQuery(req, res, 'gene_id');
      if (geneId === null) return;
      await runAndRespond(res, geneAnnotationRequest(geneId));
    } catch (error) {
      next(error);
    }
  };
  router.get('/gene-annotation', geneAnnotationHandler);

  /**
   * GET /ensembl/gene-transcripts?gene_id=
   */
  const transcriptsHandler: RequestHandler = async (
    req: Request,
    res: Response,
    next: NextFunction
  ): Promise<void> => {
    try {
      const geneId = requireQuery(req, res, 'gene_id');
      if (geneId === null) return;
      await runAndRespond(res, transcriptsRequest(geneId));
    } catch (error) {
      next(error);
    }
  };
  router.get('/gene-transcripts', transcriptsHandler);

  /**
   * GET /ensembl/variation?species=&variant_id=
   * One upstream fetch, two tables: the summary row and the mappings.
   */
  const variationHandler: RequestHandler = async (
    req: Request,
    res: Response,
    next: NextFunction
  ): Promise<void> => {
    try {
      const species = requireQuery(req, res, 'species');
      if (species === null) return;
      const variantId = requireQuery(req, res, 'variant_id');
      if (variantId === null) return;

      const fetched = await services.fetcher.fetch(variationPath(species, variantId));
      if (!fetched.ok) {
        sendUpstreamError(res, fetched.error);
        return;
      }

      const summary = tabulate(services.registry, SchemaName.VariantSummary, fetched.payload, {
        select: selectVariantSummary,
      });
      const mappings = tabulate(services.registry, SchemaName.VariantMappings, fetched.payload, {
        select: selectVariantMappings,
      });

      res.json({
        summary: toEnvelope(summary),
        mappings: toEnvelope(mappings),
      });
    } catch (error) {
      next(error);
    }
  };
  router.get('/variation', variationHandler);

  /**
   * GET /ensembl/orthologs?gene_id=&target_species=
   */
  const orthologsHandler: RequestHandler = async (
    req: Request,
    res: Response,
    next: NextFunction
  ): Promise<void> => {
    try {
      const geneId = requireQuery(req, res, 'gene_id');
      if (geneId === null) return;
      await runAndRespond(res, orthologsRequest(geneId, optionalQuery(req, 'target_species')));
    } catch (error) {
      next(error);
    }
  };
  router.get('/orthologs', orthologsHandler);

  /**
   * GET /ensembl/schemas
   * Registered table contracts
   */
  const schemasHandler: RequestHandler = (_req: Request, res: Response): void => {
    const schemas = services.registry.names().map((name) => services.registry.get(name));
    res.json({ schemas, count: schemas.length });
  };
  router.get('/schemas', schemasHandler);

  return router;
}

/**
 * One JSON log line per request, with timing and a correlation id
 */
function requestTiming(services: ValidatorServices): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const start = process.hrtime.bigint();
    const requestId = req.get('x-request-id') || uuidv4();
    // Routers strip their mount prefix from req.path
    const path = req.originalUrl.split('?')[0];
    res.setHeader('X-Request-ID', requestId);

    res.on('finish', () => {
      const durationMs = Number(process.hrtime.bigint() - start) / 1e6;
      services.logger.log('request', {
        event: 'request',
        method: req.method,
        path,
        status: res.statusCode,
        duration_ms: Math.round(durationMs * 100) / 100,
        request_id: requestId,
      });
    });

    next();
  };
}

/**
 * Create a full Express application with the validation API
 */
export function createApp(services: ValidatorServices): express.Application {
  const app = express();

  app.use(requestTiming(services));

  // Mount the API router
  app.use('/ensembl', createApiRouter(services));

  // Health check endpoint
  const healthHandler: RequestHandler = (_req: Request, res: Response): void => {
    res.json({ status: 'ok', service: SERVICE_NAME });
  };
  app.get('/health', healthHandler);

  // Root endpoint with info
  const rootHandler: RequestHandler = (_req: Request, res: Response): void => {
    res.json({
      name: 'Ensembl Table Validator',
      version: VERSION,
      endpoints: {
        geneAnnotation: 'GET /ensembl/gene-annotation?gene_id=',
        geneTranscripts: 'GET /ensembl/gene-transcripts?gene_id=',
        variation: 'GET /ensembl/variation?species=&variant_id=',
        orthologs: 'GET /ensembl/orthologs?gene_id=&target_species=',
        schemas: 'GET /ensembl/schemas',
      },
    });
  };
  app.get('/', rootHandler);

  // Error handling middleware
  const errorHandler = (err: Error, _req: Request, res: Response, _next: NextFunction): void => {
    services.logger.error(`Unhandled error: ${err.message}`, { event: 'error' });
    // In production, don't expose internal error details
    const isDevelopment = process.env.NODE_ENV !== 'production';
    res.status(500).json({
      error: 'Internal server error',
      message: isDevelopment ? err.message : 'An unexpected error occurred',
    });
  };
  app.use(errorHandler);

  return app;
}

/**
 * Start the validation server
 */
export function startServer(
  services: ValidatorServices,
  port: number = services.config.port
): Promise<ReturnType<express.Application['listen']>> {
  return new Promise((resolve, reject) => {
    const app = createApp(services);
    const server = app.listen(port, () => {
      services.logger.log(`Server running at http://localhost:${port}`, { event: 'listening', port });
      resolve(server);
    });
    server.once('error', reject);
  });
}
