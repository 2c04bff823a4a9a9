import { PlaylistUnavailableError } from '../errors';
import { defaultFetch, fetchText, type FetchFn } from '../fetch';
import { createLogger, errorMessage } from '../log';
import { normalizeChannels } from './channels';
import { looksLikeJson, parseJsonPlaylist } from './json';
import { looksLikeM3U, parseM3U } from './m3u';
import type { ChannelDraft, PlaylistFetchResult } from './types';

const log = createLogger('playlist');

export interface PlaylistFetcherOptions {
  url: string;
  timeoutMs: number;
  userAgent: string;
  fetch?: FetchFn;
  now?: () => number;
}

export function parsePlaylist(raw: string): ChannelDraft[] {
  const text = raw.replace(/^\uFEFF/, '');
  if (looksLikeJson(text)) return parseJsonPlaylist(text);
  if (looksLikeM3U(text)) return parseM3U(text);
  throw new Error('Unrecognised playlist format (expected M3U or JSON)');
}

export class PlaylistFetcher {
  private readonly fetchFn: FetchFn;
  private readonly now: () => number;

  constructor(private readonly opts: PlaylistFetcherOptions) {
    this.fetchFn = opts.fetch || defaultFetch;
    this.now = opts.now || Date.now;
  }

  async fetch(): Promise<PlaylistFetchResult> {
    const { url } = this.opts;
    let drafts: ChannelDraft[];
    try {
      const res = await fetchText(this.fetchFn, url, {
        timeoutMs: this.opts.timeoutMs,
        userAgent: this.opts.userAgent,
        accept: 'application/json,audio/x-mpegurl,application/vnd.apple.mpegurl,*/*',
      });
      drafts = parsePlaylist(res.text);
    } catch (e) {
      throw new PlaylistUnavailableError(`Playlist unavailable from ${url}: ${errorMessage(e)}`, { cause: e });
    }
    const { channels, dropped } = normalizeChannels(drafts);
    if (!channels.length) {
      throw new PlaylistUnavailableError(`Playlist from ${url} has no valid channels (${dropped} dropped)`);
    }
    log.debug('Playlist fetched', { url, channels: channels.length, dropped });
    return { channels, dropped, fetchedAt: this.now() };
  }
}
