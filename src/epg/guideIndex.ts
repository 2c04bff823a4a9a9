import type { GuideChannel, NowNextResult, ParsedGuide, Programme } from './types';

export function progressAt(p: Programme, at: number): number {
  const f = (at - p.start) / (p.end - p.start);
  // guide source and server clocks drift; keep the bar inside [0, 1]
  return Math.min(1, Math.max(0, f));
}

/**
 * Read-only programme store keyed by XMLTV channel id. Lists are ordered by start
 * and non-overlapping (the parser guarantees both), so end times are ordered too.
 */
export class GuideIndex {
  private readonly byChannel: ReadonlyMap<string, readonly Programme[]>;
  private readonly guideChannels: readonly GuideChannel[];
  readonly programmeCount: number;

  constructor(programmes: ReadonlyMap<string, readonly Programme[]>, channels: readonly GuideChannel[] = []) {
    this.byChannel = programmes;
    this.guideChannels = channels;
    let n = 0;
    for (const list of programmes.values()) n += list.length;
    this.programmeCount = n;
  }

  static empty(): GuideIndex {
    return new GuideIndex(new Map());
  }

  static fromParsed(parsed: ParsedGuide): GuideIndex {
    return new GuideIndex(parsed.programmes, parsed.channels);
  }

  has(channelId: string): boolean {
    return this.byChannel.has(channelId);
  }

  channelIds(): string[] {
    return Array.from(this.byChannel.keys());
  }

  channels(): readonly GuideChannel[] {
    return this.guideChannels;
  }

  query(channelId: string, at: number): NowNextResult {
    const list = this.byChannel.get(channelId);
    if (!list) return { status: 'unknown-channel', channelId };
    // last programme starting at or before `at`
    const idx = upperBound(list, at) - 1;
    const candidate = idx >= 0 ? list[idx] : undefined;
    if (candidate && at < candidate.end) {
      return { status: 'ok', current: candidate, next: list[idx + 1], progress: progressAt(candidate, at) };
    }
    // gap (or before the first / after the last programme): no current, next is whatever starts after `at`
    return { status: 'ok', next: list[idx + 1] };
  }

  /** Programmes still running or upcoming at `from`, at most `limit`. */
  schedule(channelId: string, from: number, limit = 12): Programme[] | undefined {
    const list = this.byChannel.get(channelId);
    if (!list) return undefined;
    let lo = 0;
    let hi = list.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (list[mid].end <= from) lo = mid + 1;
      else hi = mid;
    }
    return list.slice(lo, lo + Math.max(0, limit));
  }
}

// index of the first programme with start > at
function upperBound(list: readonly Programme[], at: number): number {
  let lo = 0;
  let hi = list.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (list[mid].start <= at) lo = mid + 1;
    else hi = mid;
  }
  return lo;
}
