import type { Response } from 'express';
import { randomUUID } from 'node:crypto';

import type { AnalyzeResponse, BatchAnalyzeResponse } from './analyzer/types.js';

export type AnalyzeJobStatus = 'running' | 'done' | 'error';

export type AnalyzeJobKind = 'single' | 'batch';

export type AnalyzeJobResult = AnalyzeResponse | BatchAnalyzeResponse;

export type AnalyzeJobSnapshot = {
  jobId: string;
  kind: AnalyzeJobKind;
  label: string; // entry method, or the number of entries of a batch
  status: AnalyzeJobStatus;
  stage: string;
  percent: number;
  result?: AnalyzeJobResult;
  error?: string;
};

type AnalyzeJobInternal = {
  snapshot: AnalyzeJobSnapshot;
  subscribers: Set<Response>;
  updatedAt: number;
};

const JOB_TTL_MS = 60 * 60 * 1000;

function clampPercent(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.max(0, Math.min(100, Math.floor(value)));
}

export function toSseDataLine(snapshot: AnalyzeJobSnapshot): string {
  return `data: ${JSON.stringify(snapshot)}\n\n`;
}

/**
 * In-memory registry of background analyses. Subscribers are server-sent
 * event responses that receive every snapshot change.
 */
export class AnalyzeJobManager {
  private jobs = new Map<string, AnalyzeJobInternal>();
  private cleanupTimer: NodeJS.Timeout;

  constructor(private ttlMs: number = JOB_TTL_MS) {
    this.cleanupTimer = setInterval(() => this.cleanup(), 5 * 60 * 1000);
    this.cleanupTimer.unref();
  }

  dispose(): void {
    clearInterval(this.cleanupTimer);
  }

  hasRunningJob(): boolean {
    for (const job of this.jobs.values()) {
      if (job.snapshot.status === 'running') return true;
    }
    return false;
  }

  createJob(kind: AnalyzeJobKind, label: string): AnalyzeJobSnapshot {
    const jobId = randomUUID();
    const snapshot: AnalyzeJobSnapshot = {
      jobId,
      kind,
      label,
      status: 'running',
      stage: '任务已创建',
      percent: 0,
    };
    this.jobs.set(jobId, { snapshot, subscribers: new Set(), updatedAt: Date.now() });
    return { ...snapshot };
  }

  getJob(jobId: string): AnalyzeJobSnapshot | null {
    const job = this.jobs.get(jobId);
    return job ? { ...job.snapshot } : null;
  }

  addSubscriber(jobId: string, res: Response): (() => void) | null {
    const job = this.jobs.get(jobId);
    if (!job) return null;
    job.subscribers.add(res);
    return () => {
      job.subscribers.delete(res);
    };
  }

  updateJob(jobId: string, patch: Partial<Omit<AnalyzeJobSnapshot, 'jobId'>>): AnalyzeJobSnapshot | null {
    const job = this.jobs.get(jobId);
    if (!job) return null;

    const next: AnalyzeJobSnapshot = {
      ...job.snapshot,
      ...patch,
      percent: patch.percent === undefined ? job.snapshot.percent : clampPercent(patch.percent),
    };
    job.snapshot = next;
    job.updatedAt = Date.now();

    this.broadcast(job);
    return { ...next };
  }

  completeJob(jobId: string, result: AnalyzeJobResult): AnalyzeJobSnapshot | null {
    const snapshot = this.updateJob(jobId, {
      status: 'done',
      stage: '完成',
      percent: 100,
      result,
      error: undefined,
    });
    this.endAllSubscribers(jobId);
    return snapshot;
  }

  failJob(jobId: string, error: string): AnalyzeJobSnapshot | null {
    const snapshot = this.updateJob(jobId, {
      status: 'error',
      error: error || '分析失败',
    });
    this.endAllSubscribers(jobId);
    return snapshot;
  }

  private broadcast(job: AnalyzeJobInternal): void {
    const payload = toSseDataLine(job.snapshot);
    for (const res of job.subscribers) {
      if (res.writableEnded) {
        job.subscribers.delete(res);
        continue;
      }
      res.write(payload);
    }
  }

  private endAllSubscribers(jobId: string): void {
    const job = this.jobs.get(jobId);
    if (!job) return;
    for (const res of job.subscribers) {
      if (!res.writableEnded) res.end();
    }
    job.subscribers.clear();
  }

  cleanup(now: number = Date.now()): void {
    for (const [jobId, job] of this.jobs.entries()) {
      if (job.snapshot.status === 'running') continue;
      if (now - job.updatedAt < this.ttlMs) continue;
      this.jobs.delete(jobId);
    }
  }
}
