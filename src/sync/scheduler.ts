import * as cron from 'node-cron';
import { GuideIndex } from '../epg/guideIndex';
import type { GuideFetchResult } from '../epg/fetcher';
import { type ErrorKind, TvGridError } from '../errors';
import { createLogger, errorMessage } from '../log';
import type { PlaylistFetchResult } from '../playlist/types';
import { createSnapshot, type GuideSnapshot, type SnapshotStore } from './snapshot';

const log = createLogger('sync');

export interface PlaylistSource {
  fetch(): Promise<PlaylistFetchResult>;
}

export interface GuideSource {
  fetch(): Promise<GuideFetchResult>;
}

export type SyncState = 'idle' | 'syncing';
export type SyncReason = 'boot' | 'timer' | 'manual';

export interface SyncFailure {
  at: number;
  kind: ErrorKind | 'unexpected';
  message: string;
}

export type SyncOutcome =
  // guideFailure: the playlist was refreshed but the guide kept its previous data (or none)
  | { status: 'published'; snapshot: GuideSnapshot; guideFailure?: SyncFailure }
  | { status: 'failed'; failure: SyncFailure }
  // the scheduler was stopped while the cycle ran; nothing was published
  | { status: 'abandoned' };

export interface SyncStatus {
  state: SyncState;
  scheduled: boolean;
  cycles: number;
  failures: number;
  lastSuccessAt: number | null;
  lastFailure: SyncFailure | null;
}

export interface SyncSchedulerOptions {
  playlist: PlaylistSource;
  guide: GuideSource;
  store: SnapshotStore;
  cron?: string;
  timeZone?: string;
  now?: () => number;
}

/**
 * Two states: idle (last good snapshot published) and syncing (one cycle in flight).
 * Triggers while syncing join the running cycle. A failed playlist fetch leaves the
 * published snapshot untouched; a failed guide fetch publishes the new channels
 * against the previous guide.
 */
export class SyncScheduler {
  private inflight: Promise<SyncOutcome> | null = null;
  private task: cron.ScheduledTask | null = null;
  private generation = 0;
  private stopped = false;
  private cycles = 0;
  private failures = 0;
  private lastSuccessAt: number | null = null;
  private lastFailure: SyncFailure | null = null;
  private readonly now: () => number;

  constructor(private readonly opts: SyncSchedulerOptions) {
    this.now = opts.now || Date.now;
  }

  get state(): SyncState {
    return this.inflight ? 'syncing' : 'idle';
  }

  status(): SyncStatus {
    return {
      state: this.state,
      scheduled: this.task !== null,
      cycles: this.cycles,
      failures: this.failures,
      lastSuccessAt: this.lastSuccessAt,
      lastFailure: this.lastFailure,
    };
  }

  trigger(reason: SyncReason = 'manual'): Promise<SyncOutcome> {
    if (this.stopped) return Promise.resolve({ status: 'abandoned' });
    if (this.inflight) {
      log.debug('Sync already running, coalescing trigger', { reason });
      return this.inflight;
    }
    const cycle: Promise<SyncOutcome> = this.runCycle(reason, this.generation).finally(() => {
      if (this.inflight === cycle) this.inflight = null;
    });
    this.inflight = cycle;
    return cycle;
  }

  start(): void {
    this.stopped = false;
    if (this.task || !this.opts.cron) return;
    const options: cron.ScheduleOptions = this.opts.timeZone ? { timezone: this.opts.timeZone } : {};
    this.task = cron.schedule(this.opts.cron, () => { void this.trigger('timer'); }, options);
    log.debug('Sync scheduled', { cron: this.opts.cron, timeZone: this.opts.timeZone || 'local' });
  }

  /** Cancels the timer; a cycle still in flight finishes without publishing. */
  stop(): void {
    this.stopped = true;
    this.generation++;
    // a later start() must not join the abandoned cycle
    this.inflight = null;
    if (this.task) {
      this.task.stop();
      this.task = null;
    }
  }

  private failureOf(e: unknown, at: number): SyncFailure {
    return {
      at,
      kind: e instanceof TvGridError ? e.kind : 'unexpected',
      message: errorMessage(e),
    };
  }

  private record(failure: SyncFailure, what: string): void {
    this.failures++;
    this.lastFailure = failure;
    log.error(`${what}:`, failure.kind, failure.message);
  }

  private async runCycle(reason: SyncReason, generation: number): Promise<SyncOutcome> {
    const startedAt = this.now();
    this.cycles++;
    log.debug('Sync start', { reason, cycle: this.cycles });
    // wait for both fetches so none outlives its cycle
    const [playlist, guide] = await Promise.allSettled([this.opts.playlist.fetch(), this.opts.guide.fetch()]);
    if (generation !== this.generation) {
      log.info('Sync abandoned after stop');
      return { status: 'abandoned' };
    }
    const settledAt = this.now();
    if (playlist.status === 'rejected') {
      const failure = this.failureOf(playlist.reason, settledAt);
      this.record(failure, 'Sync failed, keeping previous snapshot');
      return { status: 'failed', failure };
    }

    const previous = this.opts.store.current();
    let guideFailure: SyncFailure | undefined;
    let guideIndex: GuideIndex;
    let guideFetchedAt: number | null;
    let guideSource: string | null;
    if (guide.status === 'fulfilled') {
      guideIndex = GuideIndex.fromParsed(guide.value.guide);
      guideFetchedAt = guide.value.fetchedAt;
      guideSource = guide.value.source;
    } else {
      guideFailure = this.failureOf(guide.reason, settledAt);
      this.record(guideFailure, 'Guide sync failed, keeping previous guide');
      guideIndex = previous ? previous.guide : GuideIndex.empty();
      guideFetchedAt = previous ? previous.guideFetchedAt : null;
      guideSource = previous ? previous.guideSource : null;
    }

    let snapshot: GuideSnapshot;
    try {
      snapshot = createSnapshot({
        channels: playlist.value.channels,
        guide: guideIndex,
        syncedAt: settledAt,
        playlistFetchedAt: playlist.value.fetchedAt,
        guideFetchedAt,
        guideSource,
      });
    } catch (e) {
      const failure = this.failureOf(e, settledAt);
      this.record(failure, 'Sync failed, keeping previous snapshot');
      return { status: 'failed', failure };
    }
    this.opts.store.publish(snapshot);
    this.lastSuccessAt = snapshot.syncedAt;
    log.info('Snapshot published', {
      reason,
      channels: snapshot.channels.length,
      matched: snapshot.guideKeys.size,
      programmes: snapshot.guide.programmeCount,
      ms: snapshot.syncedAt - startedAt,
    });
    return guideFailure ? { status: 'published', snapshot, guideFailure } : { status: 'published', snapshot };
  }
}
