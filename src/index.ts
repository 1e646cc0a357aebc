/**
 * HTTP entry point of the travel optimizer. Loads the solver configuration once, then serves G-code
 * uploads under `/api/optimize` with the API reference at `/docs`.
 */
import path from 'node:path';
import cors from 'cors';
import express, { NextFunction, Request, Response } from 'express';
import multer from 'multer';
import swaggerJsdoc from 'swagger-jsdoc';
import swaggerUi from 'swagger-ui-express';
import { loadOptimizerConfig, serverConfig } from './config';
import { OptimizerError, describeError, type OptimizerErrorKind } from './errors';
import { ConsoleLogger } from './logger';
import { createOptimizeRouter } from './routes/optimize';
import { ProcessSolver } from './services/solver';

const STATUS_BY_KIND: Record<OptimizerErrorKind, number> = {
  parse: 422,
  config: 500,
  input: 422,
  'solver-invocation': 502,
  'tour-validation': 502,
  'resource-exhaustion': 503,
  output: 500,
};

/** Maps thrown values onto an HTTP status code. */
export const statusForError = (error: unknown): number => {
  if (error instanceof OptimizerError) {
    return STATUS_BY_KIND[error.kind];
  }
  if (error instanceof multer.MulterError) {
    return error.code === 'LIMIT_FILE_SIZE' ? 413 : 400;
  }
  return 500;
};

async function start(): Promise<void> {
  const logger = new ConsoleLogger({ level: serverConfig.logLevel });
  const optimizerConfig = await loadOptimizerConfig(serverConfig.optimizerConfigPath);
  const solver = ProcessSolver.fromConfig(optimizerConfig);

  const app = express();

  app.use(cors({ origin: serverConfig.corsOrigins, credentials: true }));
  app.use(express.json());

  const swaggerSpec = swaggerJsdoc({
    definition: {
      openapi: '3.1.0',
      info: {
        title: 'G-code Travel Optimizer API',
        version: '0.1.0',
        description: 'Endpoints for reordering the print paths of sliced G-code to shorten non-printing travel.',
      },
    },
    apis: [path.resolve(__dirname, 'index.{ts,js}'), path.resolve(__dirname, 'routes/*.{ts,js}')],
  });

  app.use('/docs', swaggerUi.serve, swaggerUi.setup(swaggerSpec));

  /**
   * @openapi
   * /health:
   *   get:
   *     summary: Reports that the optimizer accepts uploads and names the configured route solver.
   *     tags:
   *       - System
   *     responses:
   *       '200':
   *         description: Solver configuration loaded; `solver` is the executable's file name.
   */
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', solver: path.basename(optimizerConfig.program) });
  });

  app.use('/api/optimize', createOptimizeRouter({ config: optimizerConfig, solver, logger }));

  // optimizer errors map to a status by kind; 5xx failures are also logged
  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = statusForError(error);
    if (status >= 500) {
      logger.error(`Request failed: ${describeError(error)}`);
    }
    res.status(status).json({ error: describeError(error) });
  });

  app.listen(serverConfig.port, () => {
    logger.info(`Optimizer API listening on port ${serverConfig.port}`);
  });
}

if (require.main === module) {
  start().catch((error: unknown) => {
    // eslint-disable-next-line no-console
    console.error(`Unable to start the optimizer API: ${describeError(error)}`);
    process.exitCode = 1;
  });
}
