/**
 * SCHEDULER — Daily jobs
 *
 * Two node-cron tasks in the configured timezone, each posting to the
 * default chat. Jobs share nothing: a throw in one callback is caught and
 * logged there and never reaches the other. Missed triggers are not
 * replayed.
 */

import cron from 'node-cron';
import { errorMessage } from '../../common/errors.js';
import {
  runComponentsPipeline,
  runFearGreedPipeline,
  type Pipeline,
  type PipelineContext,
  type PipelineResult,
} from '../pipeline/index.js';

// ═══════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════

export type JobId = 'daily_feargreed' | 'daily_components';

export interface ScheduledTaskHandle {
  stop(): unknown;
}

export type ScheduleFn = (
  expression: string,
  callback: () => void,
  options: { timezone: string }
) => ScheduledTaskHandle;

export interface JobStatus {
  id: JobId;
  cron: string;
  timezone: string;
  running: boolean;
  lastRunAt: string | null;
  lastStatus: 'NEVER' | 'SUCCESS' | 'FAILED' | 'SKIPPED';
  lastRunId: string | null;
  lastError: string | null;
}

export interface DailySchedulerOptions {
  ctx: PipelineContext;
  schedule?: ScheduleFn;
  pipelines?: Partial<Record<JobId, Pipeline>>;
}

interface JobDefinition {
  id: JobId;
  cron: string;
  pipeline: Pipeline;
}

const cronSchedule: ScheduleFn = (expression, callback, options) =>
  cron.schedule(expression, callback, {
    scheduled: true,
    timezone: options.timezone,
    recoverMissedExecutions: false,
  });

// ═══════════════════════════════════════════════════════════════
// SERVICE
// ═══════════════════════════════════════════════════════════════

export class DailyScheduler {
  private readonly ctx: PipelineContext;
  private readonly schedule: ScheduleFn;
  private readonly jobs: JobDefinition[];
  private readonly status = new Map<JobId, JobStatus>();
  private tasks: ScheduledTaskHandle[] = [];

  constructor(opts: DailySchedulerOptions) {
    this.ctx = opts.ctx;
    this.schedule = opts.schedule ?? cronSchedule;

    const { schedule } = opts.ctx.config;
    this.jobs = [
      {
        id: 'daily_feargreed',
        cron: schedule.fearGreedCron,
        pipeline: opts.pipelines?.daily_feargreed ?? runFearGreedPipeline,
      },
      {
        id: 'daily_components',
        cron: schedule.componentsCron,
        pipeline: opts.pipelines?.daily_components ?? runComponentsPipeline,
      },
    ];

    for (const job of this.jobs) {
      this.status.set(job.id, {
        id: job.id,
        cron: job.cron,
        timezone: schedule.timezone,
        running: false,
        lastRunAt: null,
        lastStatus: 'NEVER',
        lastRunId: null,
        lastError: null,
      });
    }
  }

  get isStarted(): boolean {
    return this.tasks.length > 0;
  }

  start(): void {
    if (this.isStarted) return;

    const { timezone } = this.ctx.config.schedule;
    this.tasks = this.jobs.map(job =>
      this.schedule(
        job.cron,
        () => {
          this.runJob(job.id).catch(err => {
            this.ctx.logger.error({ jobId: job.id, error: errorMessage(err) }, 'Scheduled job crashed');
          });
        },
        { timezone }
      )
    );

    this.ctx.logger.info(
      { timezone, jobs: this.jobs.map(j => ({ id: j.id, cron: j.cron })) },
      'Scheduler started'
    );
  }

  stop(): void {
    for (const task of this.tasks) {
      task.stop();
    }
    if (this.tasks.length > 0) {
      this.ctx.logger.info({ jobs: this.tasks.length }, 'Scheduler stopped');
    }
    this.tasks = [];
  }

  /**
   * Run one job now against the default chat. Overlapping runs of the same
   * job are skipped. Resolves to null when skipped or when the pipeline
   * itself threw.
   */
  async runJob(id: JobId): Promise<PipelineResult | null> {
    const job = this.jobs.find(j => j.id === id);
    const state = this.status.get(id);
    if (!job || !state) return null;

    if (state.running) {
      this.ctx.logger.warn({ jobId: id }, 'Previous run still in progress, skipping');
      state.lastStatus = 'SKIPPED';
      return null;
    }

    state.running = true;
    state.lastRunAt = new Date().toISOString();

    try {
      const result = await job.pipeline(this.ctx, this.ctx.config.telegram.defaultChatId, 'SCHEDULE');
      state.lastStatus = result.ok ? 'SUCCESS' : 'FAILED';
      state.lastRunId = result.runId;
      state.lastError = result.error?.message ?? null;
      return result;
    } catch (err) {
      state.lastStatus = 'FAILED';
      state.lastError = errorMessage(err);
      this.ctx.logger.error({ jobId: id, error: state.lastError }, 'Scheduled job failed');
      return null;
    } finally {
      state.running = false;
    }
  }

  getStatus(): JobStatus[] {
    return this.jobs.flatMap(job => {
      const state = this.status.get(job.id);
      return state ? [{ ...state }] : [];
    });
  }
}
