import type { NowNextResult, Programme } from '../epg/types';
import type { Channel } from '../playlist/types';
import { wrapStreamUrl } from '../proxy/build';
import type { ProxyConfig } from '../proxy/config';
import type { SyncStatus } from '../sync/scheduler';
import { nowNextFor, type SnapshotStore } from '../sync/snapshot';

export type NotFound = { found: false; channelId: string };

export type NowNextLookup = NotFound | { found: true; channel: Channel; at: number; result: NowNextResult };
export type StreamLookup = NotFound | { found: true; channel: Channel; stream: string; original: string };
export type ScheduleLookup = NotFound | { found: true; channel: Channel; programmes: Programme[] };

export interface GridRow {
  channel: Channel;
  result: NowNextResult;
}

export interface Health {
  status: 'healthy' | 'degraded' | 'empty';
  now: number;
  syncedAt: number | null;
  playlistFetchedAt: number | null;
  guideFetchedAt: number | null;
  guideSource: string | null;
  channels: number;
  matchedChannels: number;
  programmes: number;
  sync: SyncStatus | null;
}

export interface PresentationOptions {
  store: SnapshotStore;
  sync?: { status(): SyncStatus };
  proxy?: ProxyConfig | null;
  // radio channels play through /api/channels/:id/relay
  relayAudio?: boolean;
  now?: () => number;
}

export function relayPath(channelId: string): string {
  return `/api/channels/${encodeURIComponent(channelId)}/relay`;
}

/**
 * Read-only view over the latest published snapshot. Every call reads the store
 * once, so a call never mixes two snapshots. "Now" is always the server clock.
 */
export class PresentationService {
  private readonly now: () => number;

  constructor(private readonly opts: PresentationOptions) {
    this.now = opts.now || Date.now;
  }

  hasData(): boolean {
    return this.opts.store.current() !== undefined;
  }

  /** Sorted by LCN, then name. Undefined until the first sync has published. */
  listChannels(): readonly Channel[] | undefined {
    return this.opts.store.current()?.channels;
  }

  nowNext(channelId: string): NowNextLookup {
    const snap = this.opts.store.current();
    const channel = snap?.byId.get(channelId);
    if (!snap || !channel) return { found: false, channelId };
    const at = this.now();
    return { found: true, channel, at, result: nowNextFor(snap, channelId, at) };
  }

  grid(): { at: number; rows: GridRow[] } | undefined {
    const snap = this.opts.store.current();
    if (!snap) return undefined;
    const at = this.now();
    return { at, rows: snap.channels.map(channel => ({ channel, result: nowNextFor(snap, channel.id, at) })) };
  }

  resolveStream(channelId: string): StreamLookup {
    const channel = this.opts.store.current()?.byId.get(channelId);
    if (!channel) return { found: false, channelId };
    let stream: string;
    if (this.opts.relayAudio && channel.kind === 'radio') stream = relayPath(channel.id);
    else stream = wrapStreamUrl(channel.stream, this.opts.proxy ?? null);
    return { found: true, channel, stream, original: channel.stream };
  }

  schedule(channelId: string, limit = 12): ScheduleLookup {
    const snap = this.opts.store.current();
    const channel = snap?.byId.get(channelId);
    if (!snap || !channel) return { found: false, channelId };
    const key = snap.guideKeys.get(channelId);
    const programmes = key ? snap.guide.schedule(key, this.now(), limit) ?? [] : [];
    return { found: true, channel, programmes };
  }

  health(): Health {
    const snap = this.opts.store.current();
    const sync = this.opts.sync ? this.opts.sync.status() : null;
    let status: Health['status'] = 'empty';
    if (snap) status = sync?.lastFailure && sync.lastFailure.at >= snap.syncedAt ? 'degraded' : 'healthy';
    return {
      status,
      now: this.now(),
      syncedAt: snap ? snap.syncedAt : null,
      playlistFetchedAt: snap ? snap.playlistFetchedAt : null,
      guideFetchedAt: snap ? snap.guideFetchedAt : null,
      guideSource: snap ? snap.guideSource : null,
      channels: snap ? snap.channels.length : 0,
      matchedChannels: snap ? snap.guideKeys.size : 0,
      programmes: snap ? snap.guide.programmeCount : 0,
      sync,
    };
  }
}
