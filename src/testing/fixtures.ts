import { GuideIndex } from '../epg/guideIndex';
import type { GuideChannel, ParsedGuide, Programme } from '../epg/types';
import type { Channel } from '../playlist/types';
import { createSnapshot, type GuideSnapshot } from '../sync/snapshot';

// 2024-08-01 hh:mm UTC
export const at = (hh: number, mm = 0): number => Date.UTC(2024, 7, 1, hh, mm);

export function programme(channelId: string, title: string, start: number, end: number): Programme {
  return { channelId, title, start, end };
}

export function channel(partial: Partial<Channel> & { id: string; name: string }): Channel {
  return { lcn: null, stream: `https://streams.example/${partial.id}.m3u8`, kind: 'video', ...partial };
}

export const NEWS = programme('abc.au', 'News', at(18), at(19));
export const WEATHER = programme('abc.au', 'Weather', at(19), at(19, 30));
export const FILM = programme('abc.au', 'Film', at(20), at(21));

export function parsedGuide(programmes: Programme[], channels: GuideChannel[] = []): ParsedGuide {
  const byChannel = new Map<string, Programme[]>();
  for (const p of programmes) byChannel.set(p.channelId, [...(byChannel.get(p.channelId) ?? []), p]);
  return {
    programmes: byChannel,
    channels,
    stats: { programmes: programmes.length, skippedIncomplete: 0, droppedInverted: 0, droppedOverlapping: 0 },
  };
}

export const ABC = channel({ id: 'abc-tv', name: 'ABC TV', lcn: 2, guideId: 'abc.au' });
export const TRIPLE_J = channel({ id: 'triple-j', name: 'Triple J', lcn: 28, kind: 'radio', stream: 'https://streams.example/triplej.aac' });

export function sampleSnapshot(syncedAt = at(12)): GuideSnapshot {
  return createSnapshot({
    channels: [ABC, TRIPLE_J],
    guide: GuideIndex.fromParsed(parsedGuide([NEWS, WEATHER, FILM])),
    syncedAt,
    playlistFetchedAt: syncedAt,
    guideFetchedAt: syncedAt,
    guideSource: 'https://epg.example/guide.xml',
  });
}

export function deferred<T>() {
  let resolve: (v: T) => void = () => undefined;
  let reject: (e: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}
