import { createLogger } from '../log';
import type { Channel, ChannelDraft } from './types';

const log = createLogger('playlist');

const STREAM_PROTOCOLS = new Set(['http:', 'https:', 'rtmp:', 'rtmps:', 'rtsp:', 'rtp:', 'udp:']);
const LOGO_PROTOCOLS = new Set(['http:', 'https:', 'data:']);

function parseUrl(raw: string | undefined, protocols: Set<string>): string | null {
  if (!raw) return null;
  let u: URL;
  try {
    u = new URL(raw);
  } catch {
    return null;
  }
  return protocols.has(u.protocol) ? u.toString() : null;
}

export function isStreamUrl(raw: string): boolean {
  return parseUrl(raw, STREAM_PROTOCOLS) !== null;
}

function parseLcn(v: ChannelDraft['lcn']): number | null {
  if (typeof v === 'number') return Number.isInteger(v) && v >= 0 ? v : null;
  if (typeof v === 'string' && /^\d+$/.test(v.trim())) return parseInt(v.trim(), 10);
  return null;
}

// "ABC News 24/7" -> "abc-news-24-7"
export function channelKey(name: string): string {
  return name
    .toLowerCase()
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/['’]/g, '')
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '')
    .slice(0, 50) || 'channel';
}

export function compareChannels(a: Channel, b: Channel): number {
  if (a.lcn !== b.lcn) {
    if (a.lcn === null) return 1;
    if (b.lcn === null) return -1;
    return a.lcn - b.lcn;
  }
  return a.name.localeCompare(b.name, 'en', { sensitivity: 'base' });
}

/**
 * Validates playlist drafts into channels. Entries without a name or with a stream
 * that is not an absolute media URL are dropped with a warning; an unusable logo is
 * discarded but the channel kept. Ids are unique: collisions get `-2`, `-3`, … in
 * playlist order. The result is sorted by LCN (missing last), then name.
 */
export function normalizeChannels(drafts: readonly ChannelDraft[]): { channels: Channel[]; dropped: number } {
  const channels: Channel[] = [];
  const taken = new Set<string>();
  let dropped = 0;
  drafts.forEach((d, i) => {
    const name = d.name.trim();
    const stream = parseUrl(d.stream.trim(), STREAM_PROTOCOLS);
    if (!name || !stream) {
      dropped++;
      log.warn('Dropping playlist entry', { index: i, name: name || null, stream: d.stream || null, reason: name ? 'invalid stream URL' : 'missing name' });
      return;
    }
    const base = d.id ? d.id.trim() : channelKey(name);
    let id = base;
    for (let n = 2; taken.has(id); n++) id = `${base}-${n}`;
    if (id !== base) log.debug('Channel id collision', { base, assigned: id });
    taken.add(id);

    const ch: Channel = { id, lcn: parseLcn(d.lcn), name, stream, kind: d.kind };
    const logo = parseUrl(d.logo?.trim(), LOGO_PROTOCOLS);
    if (logo) ch.logo = logo;
    else if (d.logo) log.debug('Ignoring invalid logo', { id, logo: d.logo });
    if (d.guideId) ch.guideId = d.guideId;
    if (d.group) ch.group = d.group;
    channels.push(ch);
  });
  channels.sort(compareChannels);
  return { channels, dropped };
}
