import { describe, it, expect } from 'vitest';
import type { SyncStatus } from '../sync/scheduler';
import { GuideIndex } from '../epg/guideIndex';
import { createSnapshot, SnapshotStore } from '../sync/snapshot';
import { buildTiles } from '../ui/channelGrid';
import { ABC, at, FILM, NEWS, sampleSnapshot, TRIPLE_J, WEATHER } from '../testing/fixtures';
import { PresentationService, relayPath } from './service';

const PROXY = {
  baseUrl: 'https://proxy.example',
  path: '/proxy/hls/manifest.m3u8',
  password: 'test-secret',
  dataParam: 'd',
  passwordParam: 'api_password',
};

function idleStatus(partial: Partial<SyncStatus> = {}): SyncStatus {
  return { state: 'idle', scheduled: true, cycles: 1, failures: 0, lastSuccessAt: at(12), lastFailure: null, ...partial };
}

function service(opts: { published?: boolean; now?: number; relayAudio?: boolean; proxy?: boolean; status?: SyncStatus } = {}) {
  const store = new SnapshotStore();
  if (opts.published !== false) store.publish(sampleSnapshot());
  const status = opts.status || idleStatus();
  return new PresentationService({
    store,
    sync: { status: () => status },
    proxy: opts.proxy ? PROXY : null,
    relayAudio: opts.relayAudio,
    now: () => opts.now ?? at(18, 30),
  });
}

describe('PresentationService', () => {
  it('has no data until a snapshot is published', () => {
    const svc = service({ published: false });
    expect(svc.hasData()).toBe(false);
    expect(svc.listChannels()).toBeUndefined();
    expect(svc.grid()).toBeUndefined();
    expect(svc.nowNext('abc-tv')).toEqual({ found: false, channelId: 'abc-tv' });
    expect(svc.health().status).toBe('empty');
  });

  it('lists channels in playlist order from the snapshot', () => {
    expect(service().listChannels()).toEqual([ABC, TRIPLE_J]);
  });

  it('answers now/next at the server clock', () => {
    expect(service().nowNext('abc-tv')).toEqual({
      found: true,
      channel: ABC,
      at: at(18, 30),
      result: { status: 'ok', current: NEWS, next: WEATHER, progress: 0.5 },
    });
    expect(service().nowNext('nope')).toEqual({ found: false, channelId: 'nope' });
  });

  it('builds one grid row per channel', () => {
    expect(service().grid()).toEqual({
      at: at(18, 30),
      rows: [
        { channel: ABC, result: { status: 'ok', current: NEWS, next: WEATHER, progress: 0.5 } },
        { channel: TRIPLE_J, result: { status: 'unknown-channel', channelId: 'triple-j' } },
      ],
    });
  });

  it('resolves streams through the proxy and the audio relay', () => {
    const plain = service().resolveStream('abc-tv');
    expect(plain).toEqual({ found: true, channel: ABC, stream: ABC.stream, original: ABC.stream });

    const proxied = service({ proxy: true }).resolveStream('abc-tv');
    expect(proxied.found && proxied.stream).toBe(
      'https://proxy.example/proxy/hls/manifest.m3u8?d=https%3A%2F%2Fstreams.example%2Fabc-tv.m3u8&api_password=test-secret',
    );

    const relayed = service({ relayAudio: true, proxy: true }).resolveStream('triple-j');
    expect(relayed).toEqual({ found: true, channel: TRIPLE_J, stream: '/api/channels/triple-j/relay', original: TRIPLE_J.stream });
    expect(service().resolveStream('missing')).toEqual({ found: false, channelId: 'missing' });
  });

  it('returns upcoming programmes', () => {
    const svc = service({ now: at(19, 45) });
    expect(svc.schedule('abc-tv')).toEqual({ found: true, channel: ABC, programmes: [FILM] });
    expect(svc.schedule('triple-j')).toEqual({ found: true, channel: TRIPLE_J, programmes: [] });
    expect(service().schedule('abc-tv', 1)).toEqual({ found: true, channel: ABC, programmes: [NEWS] });
  });

  it('reports health from the snapshot and the scheduler', () => {
    expect(service().health()).toEqual({
      status: 'healthy',
      now: at(18, 30),
      syncedAt: at(12),
      playlistFetchedAt: at(12),
      guideFetchedAt: at(12),
      guideSource: 'https://epg.example/guide.xml',
      channels: 2,
      matchedChannels: 1,
      programmes: 3,
      sync: idleStatus(),
    });
    const failure = { at: at(13), kind: 'guide-unavailable' as const, message: 'down' };
    expect(service({ status: idleStatus({ failures: 1, lastFailure: failure }) }).health().status).toBe('degraded');
  });
});

describe('PresentationService without guide data', () => {
  it('lists channels with no-guide rows when only the playlist synced', () => {
    const store = new SnapshotStore();
    store.publish(
      createSnapshot({
        channels: [ABC, TRIPLE_J],
        guide: GuideIndex.empty(),
        syncedAt: at(12),
        playlistFetchedAt: at(12),
        guideFetchedAt: null,
        guideSource: null,
      }),
    );
    const failure = { at: at(12), kind: 'guide-unavailable' as const, message: 'No guide source reachable' };
    const svc = new PresentationService({
      store,
      sync: { status: () => idleStatus({ failures: 1, lastFailure: failure }) },
      now: () => at(18, 30),
    });

    expect(svc.listChannels()).toEqual([ABC, TRIPLE_J]);
    const grid = svc.grid();
    expect(grid?.rows.map(r => r.result)).toEqual([
      { status: 'unknown-channel', channelId: 'abc-tv' },
      { status: 'unknown-channel', channelId: 'triple-j' },
    ]);
    const tiles = buildTiles(grid?.rows ?? [], at(18, 30), 'UTC');
    expect(tiles.map(t => [t.id, t.state, t.title])).toEqual([
      ['abc-tv', 'no-guide', 'No guide data'],
      ['triple-j', 'no-guide', 'No guide data'],
    ]);
    expect(svc.health()).toMatchObject({ status: 'degraded', guideFetchedAt: null, guideSource: null, programmes: 0 });
  });
});

describe('relayPath', () => {
  it('encodes the channel id', () => {
    expect(relayPath('a b/c')).toBe('/api/channels/a%20b%2Fc/relay');
  });
});
