import type { ChannelDraft } from './types';

const ATTR = /([A-Za-z0-9_-]+)="([^"]*)"/g;

// Index of the comma that separates the attribute list from the display name
function nameSeparator(line: string): number {
  let inQuote = false;
  for (let i = 0; i < line.length; i++) {
    const c = line[i];
    if (c === '"') inQuote = !inQuote;
    else if (c === ',' && !inQuote) return i;
  }
  return -1;
}

function parseExtinf(line: string): ChannelDraft {
  const sep = nameSeparator(line);
  const head = sep >= 0 ? line.slice(0, sep) : line;
  const title = sep >= 0 ? line.slice(sep + 1).trim() : '';
  const attrs: Record<string, string> = {};
  for (const m of head.matchAll(ATTR)) attrs[m[1].toLowerCase()] = m[2].trim();
  const draft: ChannelDraft = {
    name: title || attrs['tvg-name'] || '',
    stream: '',
    kind: (attrs.radio || '').toLowerCase() === 'true' ? 'radio' : 'video',
    lcn: attrs['tvg-chno'] || attrs['channel-number'] || null,
  };
  if (attrs['tvg-id']) draft.guideId = attrs['tvg-id'];
  if (attrs['tvg-logo']) draft.logo = attrs['tvg-logo'];
  if (attrs['group-title']) draft.group = attrs['group-title'];
  return draft;
}

/**
 * Reads an extended M3U playlist:
 *
 *   #EXTM3U
 *   #EXTINF:-1 tvg-id="abc.au" tvg-chno="2" tvg-logo="https://…/abc.png" group-title="News",ABC TV
 *   https://example.com/abc.m3u8
 *
 * Entries whose URL line never arrives are returned with an empty stream.
 */
export function parseM3U(text: string): ChannelDraft[] {
  const out: ChannelDraft[] = [];
  let pending: ChannelDraft | null = null;
  for (const raw of text.split(/\r?\n/)) {
    const line = raw.trim();
    if (!line) continue;
    if (line.startsWith('#EXTINF')) {
      if (pending) out.push(pending);
      pending = parseExtinf(line);
      continue;
    }
    if (line.startsWith('#')) continue;
    if (pending) {
      pending.stream = line;
      out.push(pending);
      pending = null;
    }
  }
  if (pending) out.push(pending);
  return out;
}

export function looksLikeM3U(text: string): boolean {
  const head = text.replace(/^\uFEFF/, '').trimStart();
  return head.startsWith('#EXTM3U') || /^#EXTINF/m.test(head);
}
