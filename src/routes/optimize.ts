/**
 * Express router exposing the optimizer. Accepts G-code uploads, runs the travel optimizer and keeps
 * each result in the job store for later retrieval.
 */
import { Router } from 'express';
import multer from 'multer';
import type { OptimizerConfig } from '../config';
import { InputError } from '../errors';
import { MemoryUnsupportedCommandSink, type Logger } from '../logger';
import { getJob, saveJob } from '../services/jobStore';
import { optimizeGcode } from '../services/optimizer';
import type { Solver } from '../services/solver';

/** Multer instance that buffers uploads in memory for further processing. */
const upload = multer({
  storage: multer.memoryStorage(),
  limits: {
    files: 1,
    fileSize: 50 * 1024 * 1024, // 50MB upload limit
  },
});

export interface OptimizeRouterOptions {
  config: OptimizerConfig;
  solver: Solver;
  logger: Logger;
}

export function createOptimizeRouter({ config, solver, logger }: OptimizeRouterOptions): Router {
  const router = Router();

  /**
   * @openapi
   * /api/optimize:
   *   post:
   *     summary: Reorder the islands of every layer of an uploaded G-code file to shorten travel.
   *     tags:
   *       - Optimizer
   *     requestBody:
   *       required: true
   *       content:
   *         multipart/form-data:
   *           schema:
   *             type: object
   *             properties:
   *               gcode:
   *                 type: string
   *                 format: binary
   *                 description: Sliced G-code program.
   *     responses:
   *       '200':
   *         description: Optimized program generated.
   *         content:
   *           application/json:
   *             schema:
   *               type: object
   *               properties:
   *                 jobId:
   *                   type: string
   *                 metadata:
   *                   type: object
   *                 unsupported:
   *                   type: array
   *                   items:
   *                     type: object
   *                 program:
   *                   type: string
   *       '400':
   *         description: No file was provided in the `gcode` field.
   *       '422':
   *         description: The uploaded file is empty or not text.
   *       '503':
   *         description: The server ran out of operating-system resources while solving.
   */
  router.post('/', upload.single('gcode'), async (req, res, next) => {
    if (!req.file) {
      res.status(400).json({ error: 'No G-code file provided under field "gcode".' });
      return;
    }

    try {
      const text = req.file.buffer.toString('utf8');
      if (text.trim() === '') {
        throw new InputError(`Uploaded file ${req.file.originalname} is empty.`);
      }
      if (text.includes('\u0000')) {
        throw new InputError(`Uploaded file ${req.file.originalname} is not a text file.`);
      }

      const sink = new MemoryUnsupportedCommandSink();
      const result = await optimizeGcode(text, {
        config,
        solver,
        logger,
        sink,
        sourceName: req.file.originalname,
      });
      saveJob(result);

      res.json({
        jobId: result.jobId,
        metadata: result.metadata,
        unsupported: sink.entries,
        program: result.program,
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * @openapi
   * /api/optimize/{jobId}:
   *   get:
   *     summary: Fetch the report of a previous optimization run.
   *     tags:
   *       - Optimizer
   *     parameters:
   *       - in: path
   *         name: jobId
   *         required: true
   *         schema:
   *           type: string
   *     responses:
   *       '200':
   *         description: Job report.
   *       '404':
   *         description: Unknown or evicted job.
   */
  router.get('/:jobId', (req, res) => {
    const job = getJob(req.params.jobId);
    if (!job) {
      res.status(404).json({ error: `Job ${req.params.jobId} not found.` });
      return;
    }
    res.json({ jobId: job.jobId, createdAt: job.createdAt, metadata: job.result.metadata });
  });

  /**
   * @openapi
   * /api/optimize/{jobId}/program:
   *   get:
   *     summary: Download the optimized program of a previous run.
   *     tags:
   *       - Optimizer
   *     parameters:
   *       - in: path
   *         name: jobId
   *         required: true
   *         schema:
   *           type: string
   *     responses:
   *       '200':
   *         description: Optimized G-code as plain text.
   *       '404':
   *         description: Unknown or evicted job.
   */
  router.get('/:jobId/program', (req, res) => {
    const job = getJob(req.params.jobId);
    if (!job) {
      res.status(404).json({ error: `Job ${req.params.jobId} not found.` });
      return;
    }
    const source = job.result.metadata.sourceName ?? `${job.jobId}.gcode`;
    const fileName = source.replace(/\.gcode$/i, '') + '_optimized.gcode';
    res.type('text/plain').attachment(fileName).send(job.result.program);
  });

  return router;
}
