import * as sax from 'sax';
import { MalformedGuideError } from '../errors';
import { createLogger, errorMessage } from '../log';
import { xmltvToMs } from './time';
import type { GuideChannel, ParsedGuide, ParseGuideOptions, ParseStats, Programme } from './types';

const log = createLogger('epg');

type Draft = {
  channel: string;
  startRaw: string;
  stopRaw: string;
  title?: string;
  desc?: string;
  category?: string;
};

function attr(node: sax.Tag | sax.QualifiedTag, name: string): string {
  const v = node.attributes[name];
  if (v === undefined) return '';
  return (typeof v === 'string' ? v : v.value).trim();
}

/**
 * Parses an XMLTV document into per-channel programme lists.
 *
 * The whole parse fails with {@link MalformedGuideError} when the markup is not
 * well-formed or the root element is not `<tv>`. Individual programmes that are
 * incomplete, inverted (stop <= start) or overlap an earlier programme of the same
 * channel are dropped and counted in `stats`.
 */
export function parseGuide(xml: string, opts: ParseGuideOptions = {}): ParsedGuide {
  const fallbackTz = opts.fallbackTimeZone || 'UTC';
  const parser = sax.parser(true, { trim: false, normalize: false });
  const drafts: Draft[] = [];
  const channels: GuideChannel[] = [];
  const stats: ParseStats = { programmes: 0, skippedIncomplete: 0, droppedInverted: 0, droppedOverlapping: 0 };

  // root is assigned from the sax callbacks
  const doc = { root: '' };
  let failure: Error | null = null;
  let curProg: Draft | null = null;
  let curChannel: GuideChannel | null = null;
  let curText = '';

  parser.onerror = (e: Error) => {
    if (!failure) failure = e;
  };

  parser.onopentag = (node: sax.Tag | sax.QualifiedTag) => {
    curText = '';
    if (!doc.root) doc.root = node.name;
    if (node.name === 'programme') {
      curProg = { channel: attr(node, 'channel'), startRaw: attr(node, 'start'), stopRaw: attr(node, 'stop') };
    } else if (node.name === 'channel') {
      curChannel = { id: attr(node, 'id'), names: [] };
    } else if (node.name === 'icon' && curChannel && !curChannel.icon) {
      const src = attr(node, 'src');
      if (src) curChannel.icon = src;
    }
  };

  parser.ontext = (t: string) => { curText += t; };
  parser.oncdata = (t: string) => { curText += t; };

  parser.onclosetag = (name: string) => {
    const text = curText.trim();
    if (curProg) {
      if (name === 'title' && curProg.title === undefined) curProg.title = text;
      else if (name === 'desc' && curProg.desc === undefined) curProg.desc = text;
      else if (name === 'category' && curProg.category === undefined) curProg.category = text;
      else if (name === 'programme') {
        drafts.push(curProg);
        curProg = null;
      }
    } else if (curChannel) {
      if (name === 'display-name' && text) curChannel.names.push(text);
      else if (name === 'lcn' && /^\d+$/.test(text)) curChannel.lcn = parseInt(text, 10);
      else if (name === 'channel') {
        if (curChannel.id) channels.push(curChannel);
        curChannel = null;
      }
    }
    curText = '';
  };

  try {
    parser.write(xml).close();
  } catch (e) {
    if (!failure) failure = e instanceof Error ? e : new Error(errorMessage(e));
  }
  if (failure) {
    throw new MalformedGuideError(`XMLTV document is not well-formed: ${errorMessage(failure)}`, { cause: failure });
  }
  if (doc.root !== 'tv') {
    throw new MalformedGuideError(doc.root ? `Unexpected root element <${doc.root}>, expected <tv>` : 'XMLTV document is empty');
  }

  const byChannel = new Map<string, Programme[]>();
  for (const d of drafts) {
    const start = d.startRaw ? xmltvToMs(d.startRaw, fallbackTz) : null;
    const end = d.stopRaw ? xmltvToMs(d.stopRaw, fallbackTz) : null;
    if (!d.channel || !d.title || start === null || end === null) {
      stats.skippedIncomplete++;
      log.warn('Skipping incomplete programme', { channel: d.channel || null, start: d.startRaw || null, stop: d.stopRaw || null, title: d.title || null });
      continue;
    }
    if (end <= start) {
      stats.droppedInverted++;
      log.debug('Dropping programme with stop <= start', { channel: d.channel, title: d.title, start: d.startRaw, stop: d.stopRaw });
      continue;
    }
    const p: Programme = { channelId: d.channel, start, end, title: d.title };
    if (d.desc) p.description = d.desc;
    if (d.category) p.category = d.category;
    const list = byChannel.get(p.channelId);
    if (list) list.push(p);
    else byChannel.set(p.channelId, [p]);
  }

  const programmes = new Map<string, Programme[]>();
  for (const [ch, arr] of byChannel) {
    arr.sort((a, b) => a.start - b.start || a.end - b.end);
    const kept: Programme[] = [];
    for (const p of arr) {
      const prev = kept[kept.length - 1];
      if (prev && p.start < prev.end) {
        stats.droppedOverlapping++;
        log.debug('Dropping overlapping programme', { channel: ch, title: p.title, overlaps: prev.title });
        continue;
      }
      kept.push(p);
    }
    programmes.set(ch, kept);
    stats.programmes += kept.length;
  }

  return { programmes, channels, stats };
}
