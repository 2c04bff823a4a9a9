import { DateTime } from 'luxon';
import type { NowNextResult } from '../epg/types';
import type { Channel, ChannelKind } from '../playlist/types';
import type { GridRow } from '../presentation/service';

export type TileState = 'live' | 'gap' | 'no-guide';

export interface Tile {
  id: string;
  lcn: number | null;
  name: string;
  logo?: string;
  kind: ChannelKind;
  state: TileState;
  title: string;
  timeLabel?: string;
  progressPercent?: number;
  remainingMinutes?: number;
  nextTitle?: string;
  nextLabel?: string;
}

export const GRID_PLACEHOLDER = '<!--GRID-->';

export function formatClock(ms: number, zone: string): string {
  return DateTime.fromMillis(ms, { zone, locale: 'en-US' }).toFormat('h:mm a');
}

/**
 * Tile for one channel at `now`. A schedule gap (nothing airing, something later)
 * shows the upcoming programme instead of leaving the previous one on screen.
 */
export function buildTile(channel: Channel, result: NowNextResult, now: number, zone: string): Tile {
  const tile: Tile = { id: channel.id, lcn: channel.lcn, name: channel.name, kind: channel.kind, state: 'no-guide', title: 'No guide data' };
  if (channel.logo) tile.logo = channel.logo;
  if (result.status !== 'ok') return tile;

  const { current, next } = result;
  if (next) {
    tile.nextTitle = next.title;
    tile.nextLabel = formatClock(next.start, zone);
  }
  if (current) {
    tile.state = 'live';
    tile.title = current.title;
    tile.timeLabel = `${formatClock(current.start, zone)} - ${formatClock(current.end, zone)}`;
    tile.progressPercent = Math.round((result.progress ?? 0) * 100);
    tile.remainingMinutes = Math.max(0, Math.floor((current.end - now) / 60000));
  } else if (next) {
    tile.state = 'gap';
    tile.title = `Up next at ${formatClock(next.start, zone)}`;
  }
  return tile;
}

export function buildTiles(rows: readonly GridRow[], now: number, zone: string): Tile[] {
  return rows.map(r => buildTile(r.channel, r.result, now, zone));
}

export function escapeHtml(s: string): string {
  return s
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

export function renderTile(t: Tile): string {
  const lines = [
    `<li class="tile tile--${t.state}" data-id="${escapeHtml(t.id)}" data-kind="${t.kind}">`,
    `<span class="lcn">${t.lcn === null ? '' : t.lcn}</span>`,
  ];
  if (t.logo) lines.push(`<img class="logo" src="${escapeHtml(t.logo)}" alt="" loading="lazy">`);
  lines.push(`<span class="name">${escapeHtml(t.name)}</span>`);
  lines.push(`<span class="title">${escapeHtml(t.title)}</span>`);
  if (t.timeLabel) lines.push(`<span class="time">${escapeHtml(t.timeLabel)}</span>`);
  if (t.progressPercent !== undefined) {
    lines.push(`<div class="progress"><div class="bar" style="width:${t.progressPercent}%"></div></div>`);
  }
  if (t.remainingMinutes !== undefined) lines.push(`<span class="remaining">${t.remainingMinutes} min left</span>`);
  if (t.nextTitle && t.state === 'live') {
    lines.push(`<span class="next">Next: ${escapeHtml(t.nextLabel || '')} ${escapeHtml(t.nextTitle)}</span>`);
  } else if (t.nextTitle) {
    lines.push(`<span class="next">${escapeHtml(t.nextTitle)}</span>`);
  }
  lines.push('</li>');
  return lines.join('\n');
}

export function renderGrid(tiles: readonly Tile[]): string {
  if (!tiles.length) return '<p class="empty">No channels</p>';
  return ['<ul class="grid">', ...tiles.map(renderTile), '</ul>'].join('\n');
}

export const UNAVAILABLE_FRAGMENT = '<p class="empty">Guide unavailable, retrying shortly</p>';

export function renderPage(template: string, fragment: string): string {
  return template.replace(GRID_PLACEHOLDER, () => fragment);
}
