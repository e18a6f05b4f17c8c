import cors from 'cors';
import express, { type Request, type Response } from 'express';
import fs from 'node:fs/promises';
import path from 'node:path';

import { AnalyzeJobManager, toSseDataLine } from './analyzeJobManager.js';
import { CALLTREE_FILES } from './analyzer/defaults.js';
import { AnalyzeRequestError, ProgramLoadError, asErrorText } from './analyzer/errors.js';
import { readJsonFile } from './analyzer/io.js';
import { runBatchAnalysis, runCallStackAnalysis } from './analyzer/runAnalysis.js';
import type { RunRegistry } from './analyzer/runRegistry.js';
import type { AnalyzeHooks, AnalyzeRequest, BatchAnalyzeRequest } from './analyzer/types.js';
import type { CallTreeEntry } from './analyzer/callTree/types.js';

export type AppContext = {
  registry: RunRegistry;
  jobs?: AnalyzeJobManager;
};

function bodyOf(req: Request): Record<string, unknown> {
  return req.body && typeof req.body === 'object' && !Array.isArray(req.body) ? (req.body as Record<string, unknown>) : {};
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function optionalLimit(value: unknown): number | string | undefined {
  return typeof value === 'number' || typeof value === 'string' ? value : undefined;
}

function toAnalyzeRequest(body: Record<string, unknown>): AnalyzeRequest {
  return {
    programPath: optionalString(body.programPath),
    className: optionalString(body.className),
    methodName: optionalString(body.methodName),
    resolution: optionalString(body.resolution),
    maxNodes: optionalLimit(body.maxNodes),
    maxDepth: optionalLimit(body.maxDepth),
  };
}

function toBatchRequest(body: Record<string, unknown>): BatchAnalyzeRequest {
  if (!Array.isArray(body.entries)) throw new AnalyzeRequestError('entries 必须是数组');
  const entries: CallTreeEntry[] = body.entries.map((item: unknown) => {
    const rec = item && typeof item === 'object' ? (item as Record<string, unknown>) : {};
    return { className: optionalString(rec.className) ?? '', methodName: optionalString(rec.methodName) ?? '' };
  });
  return { ...toAnalyzeRequest(body), entries };
}

function statusForAnalyzeError(error: unknown): number {
  return error instanceof AnalyzeRequestError || error instanceof ProgramLoadError ? 400 : 500;
}

function sendError(res: Response, status: number, error: unknown): void {
  res.status(status).json({ ok: false, error: asErrorText(error) });
}

function runIdParam(req: Request): string | undefined {
  return typeof req.query.runId === 'string' && req.query.runId ? req.query.runId : undefined;
}

export function createApp(ctx: AppContext): express.Express {
  const app = express();
  const registry = ctx.registry;
  const analyzeJobs = ctx.jobs ?? new AnalyzeJobManager();

  app.use(cors());
  app.use(express.json({ limit: '5mb' }));

  app.get('/api/health', (_req, res) => {
    res.json({ ok: true });
  });

  app.get('/api/runs', async (_req, res) => {
    try {
      res.json(await registry.list());
    } catch (error) {
      sendError(res, 500, error);
    }
  });

  app.post('/api/analyze', async (req, res) => {
    try {
      res.json(await runCallStackAnalysis(toAnalyzeRequest(bodyOf(req)), registry));
    } catch (error) {
      sendError(res, statusForAnalyzeError(error), error);
    }
  });

  app.post('/api/analyze/batch', async (req, res) => {
    try {
      res.json(await runBatchAnalysis(toBatchRequest(bodyOf(req)), registry));
    } catch (error) {
      sendError(res, statusForAnalyzeError(error), error);
    }
  });

  app.post('/api/analyze/jobs', (req, res) => {
    try {
      if (analyzeJobs.hasRunningJob()) {
        res.status(409).json({ ok: false, error: '已有分析任务运行中，请稍后再试' });
        return;
      }

      const body = bodyOf(req);
      const batch = Array.isArray(body.entries) ? toBatchRequest(body) : null;
      const single = batch ? null : toAnalyzeRequest(body);
      const snapshot = batch
        ? analyzeJobs.createJob('batch', `${batch.entries.length} entries`)
        : analyzeJobs.createJob('single', `${single?.className ?? ''}.${single?.methodName ?? ''}`);
      const hooks: AnalyzeHooks = {
        onProgress: (p) => {
          analyzeJobs.updateJob(snapshot.jobId, { stage: p.stage, percent: p.percent, status: 'running' });
        },
      };

      void (async () => {
        try {
          const result = batch
            ? await runBatchAnalysis(batch, registry, hooks)
            : await runCallStackAnalysis(single ?? {}, registry, hooks);
          analyzeJobs.completeJob(snapshot.jobId, result);
        } catch (error) {
          analyzeJobs.failJob(snapshot.jobId, asErrorText(error));
        }
      })();

      res.json({ ok: true, jobId: snapshot.jobId });
    } catch (error) {
      sendError(res, 400, error);
    }
  });

  app.get('/api/analyze/jobs/:jobId', (req, res) => {
    const jobId = req.params.jobId ?? '';
    const job = analyzeJobs.getJob(jobId);
    if (!job) {
      res.status(404).json({ ok: false, error: `未知 jobId=${jobId}` });
      return;
    }
    res.json({ ok: true, job });
  });

  app.get('/api/analyze/jobs/:jobId/events', (req, res) => {
    const jobId = req.params.jobId ?? '';
    if (!analyzeJobs.getJob(jobId)) {
      res.status(404).json({ ok: false, error: `未知 jobId=${jobId}` });
      return;
    }

    res.status(200);
    res.setHeader('Content-Type', 'text/event-stream; charset=utf-8');
    res.setHeader('Cache-Control', 'no-cache, no-transform');
    res.setHeader('Connection', 'keep-alive');
    res.flushHeaders();

    const unsubscribe = analyzeJobs.addSubscriber(jobId, res);
    const latest = analyzeJobs.getJob(jobId);
    if (!unsubscribe || !latest) {
      res.end();
      return;
    }

    res.write(toSseDataLine(latest));
    if (latest.status !== 'running') {
      unsubscribe();
      res.end();
      return;
    }

    const ping = setInterval(() => {
      if (!res.writableEnded) res.write(': ping\n\n');
    }, 15_000);
    ping.unref();

    req.on('close', () => {
      clearInterval(ping);
      unsubscribe();
    });
  });

  app.get('/api/results/calltree', async (req, res) => {
    try {
      const outputDir = await registry.resolveOutputDir(runIdParam(req));
      res.json(await readJsonFile(path.join(outputDir, CALLTREE_FILES.json)));
    } catch (error) {
      sendError(res, 404, error);
    }
  });

  app.get('/api/results/calltree.txt', async (req, res) => {
    try {
      const outputDir = await registry.resolveOutputDir(runIdParam(req));
      const text = await fs.readFile(path.join(outputDir, CALLTREE_FILES.text), 'utf8');
      res.type('text/plain; charset=utf-8').send(text);
    } catch (error) {
      sendError(res, 404, error);
    }
  });

  return app;
}
