import { GuideIndex } from '../epg/guideIndex';
import { buildNameIndex, normalizeChannelName } from '../epg/nameMap';
import type { NowNextResult } from '../epg/types';
import type { Channel } from '../playlist/types';

export interface GuideSnapshot {
  readonly channels: readonly Channel[];
  readonly byId: ReadonlyMap<string, Channel>;
  readonly guide: GuideIndex;
  // playlist channel id -> XMLTV channel id
  readonly guideKeys: ReadonlyMap<string, string>;
  readonly syncedAt: number;
  readonly playlistFetchedAt: number;
  // null until a guide fetch has succeeded
  readonly guideFetchedAt: number | null;
  readonly guideSource: string | null;
}

export interface SnapshotInput {
  channels: readonly Channel[];
  guide: GuideIndex;
  syncedAt: number;
  playlistFetchedAt: number;
  guideFetchedAt: number | null;
  guideSource: string | null;
}

/**
 * Pairs each playlist channel with a guide channel: the playlist's tvg-id first
 * (exact, then case-insensitive), then the guide's <lcn>, then a normalized
 * display-name match. Only guide channels that carry programmes are candidates.
 */
export function matchGuideKeys(channels: readonly Channel[], guide: GuideIndex): Map<string, string> {
  const keys = new Map<string, string>();
  const byLowerId = new Map<string, string>();
  for (const id of guide.channelIds()) byLowerId.set(id.toLowerCase(), id);

  const withProgrammes = guide.channels().filter(c => guide.has(c.id));
  const byLcn = new Map<number, string[]>();
  for (const c of withProgrammes) {
    if (c.lcn === undefined) continue;
    byLcn.set(c.lcn, [...(byLcn.get(c.lcn) ?? []), c.id]);
  }
  const byName = buildNameIndex(withProgrammes);

  for (const ch of channels) {
    let key: string | undefined;
    if (ch.guideId) key = guide.has(ch.guideId) ? ch.guideId : byLowerId.get(ch.guideId.toLowerCase());
    if (!key && ch.lcn !== null) {
      const ids = byLcn.get(ch.lcn);
      if (ids && ids.length === 1) key = ids[0];
    }
    if (!key) key = byName.get(normalizeChannelName(ch.name))?.[0];
    if (key) keys.set(ch.id, key);
  }
  return keys;
}

export function createSnapshot(input: SnapshotInput): GuideSnapshot {
  const channels = Object.freeze([...input.channels]);
  const byId = new Map<string, Channel>();
  for (const ch of channels) byId.set(ch.id, ch);
  return Object.freeze({
    channels,
    byId,
    guide: input.guide,
    guideKeys: matchGuideKeys(channels, input.guide),
    syncedAt: input.syncedAt,
    playlistFetchedAt: input.playlistFetchedAt,
    guideFetchedAt: input.guideFetchedAt,
    guideSource: input.guideSource,
  });
}

/** Now/next for a playlist channel; channels with no guide match read as unknown to the guide. */
export function nowNextFor(snapshot: GuideSnapshot, channelId: string, at: number): NowNextResult {
  const key = snapshot.guideKeys.get(channelId);
  if (!key) return { status: 'unknown-channel', channelId };
  return snapshot.guide.query(key, at);
}

/**
 * Holds the published snapshot. Publishing is a single reference swap, so a
 * reader sees either the previous snapshot or the new one, never a mix.
 */
export class SnapshotStore {
  private published: GuideSnapshot | undefined;

  current(): GuideSnapshot | undefined {
    return this.published;
  }

  publish(next: GuideSnapshot): void {
    this.published = next;
  }
}
