/**
 * Digest Scheduler
 *
 * Holds cron job definitions by id and runs them on croner timers while
 * started. Registering an id that already exists replaces it, so jobs can
 * be rebuilt after a settings change without restarting the process.
 *
 * Integrates with the bot lifecycle: start() when polling begins, stop()
 * on shutdown.
 */

import { Cron } from "croner";
import type { DigestJob } from "./jobs.ts";

export interface SchedulerOptions {
  /** IANA zone; undefined uses the system zone */
  timezone?: string;
}

export interface JobInfo {
  id: string;
  pattern: string;
  nextRun: Date | null;
}

export class DigestScheduler {
  private readonly jobs = new Map<string, DigestJob>();
  private readonly timers = new Map<string, Cron>();
  private running = false;

  constructor(private readonly options: SchedulerOptions = {}) {}

  /**
   * Add or replace a job. Throws if the pattern is not a valid cron expression.
   */
  register(id: string, pattern: string, run: () => Promise<void>): void {
    // Fail on a bad pattern now, not when the scheduler starts
    this.createTimer(pattern, { paused: true }).stop();

    const job: DigestJob = { id, pattern, run };
    const replaced = this.jobs.has(id);
    this.jobs.set(id, job);

    if (this.running) {
      this.timers.get(id)?.stop();
      this.timers.set(id, this.schedule(job));
    }

    console.log(`[DigestScheduler] ${replaced ? "Replaced" : "Registered"} ${id} (${pattern})`);
  }

  unregister(id: string): boolean {
    this.timers.get(id)?.stop();
    this.timers.delete(id);
    return this.jobs.delete(id);
  }

  start(): void {
    if (this.running) {
      console.log("[DigestScheduler] Already running");
      return;
    }

    this.running = true;
    for (const job of this.jobs.values()) {
      this.timers.set(job.id, this.schedule(job));
    }

    console.log(`[DigestScheduler] Started with ${this.jobs.size} job(s)`);
  }

  stop(): void {
    if (!this.running) return;

    this.running = false;
    for (const timer of this.timers.values()) {
      timer.stop();
    }
    this.timers.clear();

    console.log("[DigestScheduler] Stopped");
  }

  isRunning(): boolean {
    return this.running;
  }

  nextRun(id: string): Date | null {
    const active = this.timers.get(id);
    if (active) return active.nextRun();

    const job = this.jobs.get(id);
    if (!job) return null;

    const preview = this.createTimer(job.pattern, { paused: true });
    const next = preview.nextRun();
    preview.stop();
    return next;
  }

  listJobs(): JobInfo[] {
    return [...this.jobs.values()].map((job) => ({
      id: job.id,
      pattern: job.pattern,
      nextRun: this.nextRun(job.id),
    }));
  }

  /**
   * Run a job immediately, outside its schedule. False if the id is unknown
   * or the job failed.
   */
  async runNow(id: string): Promise<boolean> {
    const job = this.jobs.get(id);
    if (!job) return false;
    return this.execute(job);
  }

  private schedule(job: DigestJob): Cron {
    return this.createTimer(job.pattern, { name: `quote-keeper:${job.id}` }, async () => {
      await this.execute(job);
    });
  }

  private createTimer(
    pattern: string,
    extra: { paused?: boolean; name?: string },
    run?: () => Promise<void>
  ): Cron {
    const options = {
      ...extra,
      timezone: this.options.timezone,
      // Skip a tick while the previous run of the same job is still going
      protect: true,
    };
    return run ? new Cron(pattern, options, run) : new Cron(pattern, options);
  }

  private async execute(job: DigestJob): Promise<boolean> {
    const started = Date.now();
    console.log(`[DigestScheduler] Running ${job.id}`);

    try {
      await job.run();
      console.log(`[DigestScheduler] ${job.id} finished in ${Date.now() - started}ms`);
      return true;
    } catch (err) {
      console.error(`[DigestScheduler] ${job.id} failed:`, err);
      return false;
    }
  }
}
