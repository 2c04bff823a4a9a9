import { GuideUnavailableError, MalformedGuideError } from '../errors';
import { defaultFetch, fetchText, type FetchFn } from '../fetch';
import { createLogger, errorMessage } from '../log';
import { parseGuide } from './parser';
import type { ParsedGuide } from './types';

const log = createLogger('epg');

export interface GuideFetcherOptions {
  // tried in order; the first that answers with a usable guide wins
  urls: string[];
  timeoutMs: number;
  userAgent: string;
  fallbackTimeZone?: string;
  fetch?: FetchFn;
  now?: () => number;
}

export interface GuideFetchResult {
  guide: ParsedGuide;
  source: string;
  fetchedAt: number;
}

export class GuideFetcher {
  private readonly fetchFn: FetchFn;
  private readonly now: () => number;

  constructor(private readonly opts: GuideFetcherOptions) {
    this.fetchFn = opts.fetch || defaultFetch;
    this.now = opts.now || Date.now;
  }

  async fetch(): Promise<GuideFetchResult> {
    let malformed: MalformedGuideError | null = null;
    const failures: string[] = [];
    for (const url of this.opts.urls) {
      let xml: string;
      try {
        const res = await fetchText(this.fetchFn, url, {
          timeoutMs: this.opts.timeoutMs,
          userAgent: this.opts.userAgent,
          accept: 'application/xml,text/xml,*/*',
        });
        xml = res.text;
      } catch (e) {
        failures.push(`${url}: ${errorMessage(e)}`);
        log.warn('Guide fetch failed', url, errorMessage(e));
        continue;
      }
      try {
        const guide = parseGuide(xml, { fallbackTimeZone: this.opts.fallbackTimeZone });
        if (guide.stats.programmes === 0) {
          throw new MalformedGuideError('XMLTV document contains no usable programmes');
        }
        log.debug('Guide parsed', { url, channels: guide.programmes.size, ...guide.stats });
        return { guide, source: url, fetchedAt: this.now() };
      } catch (e) {
        if (!(e instanceof MalformedGuideError)) throw e;
        malformed = e;
        failures.push(`${url}: ${e.message}`);
        log.warn('Guide rejected', url, e.message);
      }
    }
    if (malformed) throw malformed;
    throw new GuideUnavailableError(`No guide source reachable (${failures.join('; ') || 'no URLs configured'})`);
  }
}
