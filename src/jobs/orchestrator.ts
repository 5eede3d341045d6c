/**
 * Ingest orchestrator
 *
 * Drives each job through pending → acquiring → transcoding → publishing →
 * completed, recording every transition in the registry so pollers can follow
 * along. Submission only resolves the source and enqueues; the pipeline itself
 * runs in a worker slot via run().
 */

import { randomUUID } from 'node:crypto';
import { mkdir, rm, stat } from 'node:fs/promises';
import * as path from 'node:path';
import { resolveSource, type CanonicalSourceId } from '../urls/resolver.js';
import { entryIdForFile, entryIdForSource } from '../media/identifier.js';
import { getExtension, moveFile, type MediaLayout } from '../media/organization.js';
import { describeError, JobCancelledError, JobNotFoundError } from './errors.js';
import { KeyedMutex, Mutex } from './locks.js';
import { isTerminal } from './types.js';
import type { MediaAcquirer } from '../media/acquirer.js';
import type { Transcoder } from '../media/transcoder.js';
import type { FeedStore } from '../feed/store.js';
import type { FeedEntry } from '../feed/types.js';
import type { AcquiredMedia, AcquisitionProgress, SourceReference } from '../media/types.js';
import type { JobRegistry } from './registry.js';
import type { IngestJob, JobStatusView, JobUpdate, SubmitOptions } from './types.js';

/**
 * Hands a stored job to whatever executes run() (the BullMQ queue in production)
 */
export interface JobDispatcher {
  dispatch(jobId: string): Promise<void>;
}

export interface JobNotifier {
  jobCompleted(job: IngestJob, entry: FeedEntry | undefined): Promise<void>;
  jobFailed(job: IngestJob): Promise<void>;
}

export interface OrchestratorDeps {
  registry: JobRegistry;
  dispatcher: JobDispatcher;
  acquirer: MediaAcquirer;
  transcoder: Transcoder;
  store: FeedStore;
  layout: MediaLayout;
  /** Public base URL the media directory is served under */
  mediaBaseUrl: string;
  notifier?: JobNotifier;
}

export type SourceInput =
  | { kind: 'remote'; url: string }
  | { kind: 'upload'; path: string; originalName: string };

interface ActiveRun {
  controller: AbortController;
  /** Set once publishing starts; cancellation is refused from then on */
  committed: boolean;
}

interface PipelineOutcome {
  entryId: string;
  duplicate: boolean;
}

/**
 * Serializes registry writes for one job and coalesces progress events, so
 * a slow progress write never lands after a later state transition
 */
class JobUpdater {
  private readonly writes = new Mutex();
  private latestProgress: AcquisitionProgress | null = null;
  private progressFlush: Promise<void> | null = null;
  private acceptingProgress = true;

  constructor(
    private readonly registry: JobRegistry,
    private readonly jobId: string
  ) {}

  update(update: JobUpdate): Promise<IngestJob | null> {
    return this.writes.runExclusive(() => this.registry.update(this.jobId, update));
  }

  progress(progress: AcquisitionProgress): void {
    if (!this.acceptingProgress) return;
    this.latestProgress = progress;
    if (this.progressFlush) return;

    this.progressFlush = this.writes.runExclusive(async () => {
      this.progressFlush = null;
      const latest = this.latestProgress;
      this.latestProgress = null;
      if (!latest || !this.acceptingProgress) return;

      await this.registry.update(this.jobId, {
        progress: latest,
        message: `Downloading: ${latest.percentComplete.toFixed(1)}%`,
      });
    }).catch((error: unknown) => {
      console.warn(JSON.stringify({
        event: 'job_progress_write_failed',
        jobId: this.jobId,
        error: error instanceof Error ? error.message : String(error),
        timestamp: new Date().toISOString(),
      }));
    });
  }

  stopProgress(): void {
    this.acceptingProgress = false;
    this.latestProgress = null;
  }
}

/**
 * Record a pipeline transition; a job finished elsewhere (cancelled while
 * queued) stops the pipeline instead of being revived
 */
async function advance(updater: JobUpdater, update: JobUpdate): Promise<void> {
  const record = await updater.update(update);
  if (!record || isTerminal(record.state)) {
    throw new JobCancelledError();
  }
}

function throwIfCancelled(signal: AbortSignal): void {
  if (signal.aborted) {
    throw new JobCancelledError();
  }
}

/**
 * Whole seconds; pubDate carries no sub-second precision
 */
function publishedNow(): string {
  return new Date(Math.floor(Date.now() / 1000) * 1000).toISOString();
}

export function toStatusView(job: IngestJob): JobStatusView {
  return {
    jobId: job.id,
    state: job.state,
    message: job.message,
    progress: job.progress,
    resultEntryId: job.resultEntryId,
    duplicate: job.duplicate,
    errorCategory: job.errorCategory,
    errorMessage: job.errorMessage,
    warnings: job.warnings,
    createdAt: job.createdAt,
    updatedAt: job.updatedAt,
  };
}

export class IngestOrchestrator {
  private readonly active = new Map<string, ActiveRun>();
  private readonly publishLock = new KeyedMutex();

  constructor(private readonly deps: OrchestratorDeps) {}

  /**
   * Store a pending job and enqueue it
   *
   * @throws InvalidSourceError for an unresolvable URL; no job is created
   */
  async submit(input: SourceInput, options: SubmitOptions = {}): Promise<{ jobId: string }> {
    let source: SourceReference;
    let canonicalSourceId: CanonicalSourceId | undefined;
    if (input.kind === 'remote') {
      canonicalSourceId = resolveSource(input.url);
      source = { kind: 'remote', value: input.url };
    } else {
      source = { kind: 'upload', path: input.path, originalName: input.originalName };
    }

    const now = new Date().toISOString();
    const job: IngestJob = {
      id: randomUUID(),
      source,
      canonicalSourceId,
      title: options.title,
      description: options.description,
      state: 'pending',
      message: 'Queued',
      warnings: [],
      createdAt: now,
      updatedAt: now,
    };

    await this.deps.registry.create(job);

    try {
      await this.deps.dispatcher.dispatch(job.id);
    } catch (error) {
      const { message } = describeError(error);
      await this.deps.registry.update(job.id, {
        state: 'failed',
        message: 'Could not be queued',
        errorCategory: 'Internal',
        errorMessage: message,
      });
      throw error;
    }

    console.log(JSON.stringify({
      event: 'job_submitted',
      jobId: job.id,
      sourceKind: source.kind,
      canonicalSourceId,
      timestamp: now,
    }));

    return { jobId: job.id };
  }

  /**
   * @throws JobNotFoundError for unknown or expired ids
   */
  async getStatus(jobId: string): Promise<JobStatusView> {
    const job = await this.deps.registry.get(jobId);
    if (!job) {
      throw new JobNotFoundError(jobId);
    }
    return toStatusView(job);
  }

  /**
   * Abort a job that has not started publishing
   *
   * A running job fails with category Cancelled once its subprocess exits.
   * Terminal and publishing jobs are left alone.
   *
   * @throws JobNotFoundError for unknown or expired ids
   */
  async cancel(jobId: string): Promise<{ cancelled: boolean }> {
    const running = this.active.get(jobId);
    if (running) {
      return this.abortRun(jobId, running);
    }

    const job = await this.deps.registry.get(jobId);
    if (!job) {
      throw new JobNotFoundError(jobId);
    }
    if (isTerminal(job.state)) {
      return { cancelled: false };
    }

    // A worker may have picked the job up while the record was being read
    const started = this.active.get(jobId);
    if (started) {
      return this.abortRun(jobId, started);
    }

    await this.deps.registry.update(jobId, {
      state: 'failed',
      message: 'Job cancelled',
      errorCategory: 'Cancelled',
      errorMessage: 'Job cancelled',
      progress: undefined,
    });
    console.log(JSON.stringify({ event: 'job_cancelled', jobId, state: job.state, timestamp: new Date().toISOString() }));
    return { cancelled: true };
  }

  private abortRun(jobId: string, run: ActiveRun): { cancelled: boolean } {
    if (run.committed) {
      return { cancelled: false };
    }
    run.controller.abort();
    console.log(JSON.stringify({ event: 'job_cancel_requested', jobId, timestamp: new Date().toISOString() }));
    return { cancelled: true };
  }

  listEntries(): FeedEntry[] {
    return this.deps.store.listEntries();
  }

  /**
   * Remove an entry and its artifact, serialized with any publish of the same id
   */
  deleteEntry(entryId: string): Promise<{ found: boolean }> {
    return this.publishLock.runExclusive(entryId, () => this.deps.store.deleteEntry(entryId));
  }

  /** Jobs currently executing in this process */
  get activeCount(): number {
    return this.active.size;
  }

  /**
   * Execute the pipeline for a stored job
   * Failures are recorded on the job; this only rejects when the registry
   * itself cannot be written.
   */
  async run(jobId: string): Promise<void> {
    // Registered before the first await so a concurrent cancel() finds it
    const activeRun: ActiveRun = { controller: new AbortController(), committed: false };
    this.active.set(jobId, activeRun);
    const workDir = path.join(this.deps.layout.scratchDir, jobId);
    let job: IngestJob | null = null;

    try {
      job = await this.deps.registry.get(jobId);
      if (!job) {
        console.warn(JSON.stringify({ event: 'job_missing', jobId, timestamp: new Date().toISOString() }));
        return;
      }
      if (isTerminal(job.state)) {
        console.log(JSON.stringify({ event: 'job_skipped', jobId, state: job.state, timestamp: new Date().toISOString() }));
        return;
      }

      await this.execute(job, workDir, activeRun);
    } finally {
      this.active.delete(jobId);
      await rm(workDir, { recursive: true, force: true });
      if (job?.source.kind === 'upload') {
        await rm(job.source.path, { force: true });
      }
    }
  }

  private async execute(job: IngestJob, workDir: string, activeRun: ActiveRun): Promise<void> {
    const updater = new JobUpdater(this.deps.registry, job.id);
    const warnings = [...job.warnings];
    const startedAt = Date.now();

    console.log(JSON.stringify({ event: 'job_started', jobId: job.id, sourceKind: job.source.kind, timestamp: new Date().toISOString() }));

    try {
      await mkdir(workDir, { recursive: true });
      const outcome = await this.pipeline(job, workDir, activeRun, updater, warnings);

      const finished = await updater.update({
        state: 'completed',
        message: outcome.duplicate ? 'Already in feed' : 'Published to feed',
        resultEntryId: outcome.entryId,
        duplicate: outcome.duplicate,
        progress: undefined,
        warnings,
      });
      if (finished?.state !== 'completed') {
        console.warn(JSON.stringify({ event: 'job_already_finished', jobId: job.id, state: finished?.state, timestamp: new Date().toISOString() }));
        return;
      }

      console.log(JSON.stringify({
        event: 'job_completed',
        jobId: job.id,
        entryId: outcome.entryId,
        duplicate: outcome.duplicate,
        warnings: warnings.length,
        durationMs: Date.now() - startedAt,
        timestamp: new Date().toISOString(),
      }));

      await this.notify('completed', () =>
        this.deps.notifier?.jobCompleted(finished, this.deps.store.getEntry(outcome.entryId)));
    } catch (error) {
      updater.stopProgress();
      const { category, message } = describeError(error);

      const failed = await updater.update({
        state: 'failed',
        message,
        errorCategory: category,
        errorMessage: message,
        progress: undefined,
        warnings,
      });

      console.error(JSON.stringify({
        event: 'job_failed',
        jobId: job.id,
        category,
        error: message,
        durationMs: Date.now() - startedAt,
        timestamp: new Date().toISOString(),
      }));

      if (failed) {
        await this.notify('failed', () => this.deps.notifier?.jobFailed(failed));
      }
    }
  }

  private async pipeline(
    job: IngestJob,
    workDir: string,
    activeRun: ActiveRun,
    updater: JobUpdater,
    warnings: string[]
  ): Promise<PipelineOutcome> {
    const { signal } = activeRun.controller;
    const { store, transcoder } = this.deps;
    throwIfCancelled(signal);

    // A known remote source needs no download
    const knownId = job.source.kind === 'remote' ? entryIdForSource(this.sourceIdOf(job)) : undefined;
    if (knownId && store.hasEntry(knownId)) {
      return { entryId: knownId, duplicate: true };
    }

    await advance(updater, {
      state: 'acquiring',
      message: job.source.kind === 'remote' ? 'Downloading media' : 'Processing upload',
    });
    const acquired = await this.acquire(job, workDir, signal, updater);
    updater.stopProgress();

    const entryId = knownId ?? await entryIdForFile(acquired.filePath);

    throwIfCancelled(signal);
    await advance(updater, { state: 'transcoding', message: 'Converting audio', progress: undefined });
    const transcoded = await transcoder.transcode(acquired.filePath, path.join(workDir, entryId), { signal });
    if (transcoded.warning) {
      warnings.push(transcoded.warning);
    }

    const durationSeconds = acquired.metadata.durationSeconds ?? await transcoder.probeDuration(transcoded.filePath);

    throwIfCancelled(signal);
    activeRun.committed = true;
    await advance(updater, { state: 'publishing', message: 'Publishing to feed', warnings });

    return this.publishLock.runExclusive(entryId, async () => {
      if (store.hasEntry(entryId)) {
        await rm(transcoded.filePath, { force: true });
        return { entryId, duplicate: true };
      }

      const fileName = `${entryId}.${getExtension(transcoded.filePath)}`;
      const destination = path.join(this.deps.layout.mediaDir, fileName);
      await moveFile(transcoded.filePath, destination);

      try {
        const { size } = await stat(destination);
        await store.addEntry({
          id: entryId,
          title: acquired.metadata.title,
          description: acquired.metadata.description,
          durationSeconds,
          mediaUrl: `${this.deps.mediaBaseUrl}/${fileName}`,
          mimeType: transcoded.mimeType,
          fileSizeBytes: size,
          publishedAt: acquired.metadata.publishedAt ?? publishedNow(),
          sourceLink: acquired.metadata.webpageUrl,
          imageUrl: acquired.metadata.thumbnailUrl,
        });
      } catch (error) {
        await rm(destination, { force: true });
        throw error;
      }

      return { entryId, duplicate: false };
    });
  }

  private async acquire(
    job: IngestJob,
    workDir: string,
    signal: AbortSignal,
    updater: JobUpdater
  ): Promise<AcquiredMedia> {
    const overrides = { title: job.title, description: job.description };

    if (job.source.kind === 'upload') {
      return this.deps.acquirer.acquireUpload(job.source, overrides);
    }

    const acquired = await this.deps.acquirer.acquireRemote(this.sourceIdOf(job), {
      workDir,
      signal,
      onProgress: (progress) => updater.progress(progress),
    });
    return {
      ...acquired,
      metadata: {
        ...acquired.metadata,
        title: overrides.title || acquired.metadata.title,
        description: overrides.description || acquired.metadata.description,
      },
    };
  }

  private sourceIdOf(job: IngestJob): CanonicalSourceId {
    if (job.canonicalSourceId) return job.canonicalSourceId;
    if (job.source.kind !== 'remote') {
      throw new Error(`Job ${job.id} has no remote source`);
    }
    return resolveSource(job.source.value);
  }

  private async notify(kind: string, send: () => Promise<void> | undefined): Promise<void> {
    try {
      await send();
    } catch (error) {
      console.error(JSON.stringify({
        event: 'notification_failed',
        kind,
        error: error instanceof Error ? error.message : String(error),
        timestamp: new Date().toISOString(),
      }));
    }
  }
}
