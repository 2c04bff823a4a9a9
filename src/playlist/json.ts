import type { ChannelDraft } from './types';

type Entry = Record<string, unknown>;

function isEntry(v: unknown): v is Entry {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function str(e: Entry, ...keys: string[]): string | undefined {
  for (const k of keys) {
    const v = e[k];
    if (typeof v === 'string' && v.trim()) return v.trim();
    if (typeof v === 'number' && Number.isFinite(v)) return String(v);
  }
  return undefined;
}

function toDraft(raw: unknown): ChannelDraft {
  if (!isEntry(raw)) return { name: '', stream: '', kind: 'video' };
  const radio = raw.isAudioOnly === true || raw.radio === true || raw.kind === 'radio' || raw.kind === 'audio';
  const lcn = raw.lcn ?? raw.number ?? raw.chno;
  const draft: ChannelDraft = {
    name: str(raw, 'name', 'title') || '',
    stream: str(raw, 'stream', 'url') || '',
    kind: radio ? 'radio' : 'video',
    lcn: typeof lcn === 'number' || typeof lcn === 'string' ? lcn : null,
  };
  const id = str(raw, 'id');
  if (id) draft.id = id;
  const guideId = str(raw, 'guideId', 'tvgId', 'epgId');
  if (guideId) draft.guideId = guideId;
  const logo = str(raw, 'logo', 'icon');
  if (logo) draft.logo = logo;
  const group = str(raw, 'group', 'category');
  if (group) draft.group = group;
  return draft;
}

/**
 * Reads a JSON channel list. Accepted shapes: an array of entries, an object map
 * keyed by channel number (`{ "2": { lcn, name, stream, isAudioOnly } }`), or
 * `{ channels: [...] }`. Throws on invalid JSON or any other shape.
 */
export function parseJsonPlaylist(text: string): ChannelDraft[] {
  const doc: unknown = JSON.parse(text);
  if (Array.isArray(doc)) return doc.map(toDraft);
  if (isEntry(doc)) {
    if (Array.isArray(doc.channels)) return doc.channels.map(toDraft);
    return Object.values(doc).map(toDraft);
  }
  throw new Error('Unsupported JSON playlist: expected an array or an object of channels');
}

export function looksLikeJson(text: string): boolean {
  const head = text.replace(/^\uFEFF/, '').trimStart();
  return head.startsWith('{') || head.startsWith('[');
}
