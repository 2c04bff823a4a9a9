import * as cron from 'node-cron';
import { DateTime } from 'luxon';
import { ConfigError } from './errors';
import { type Env, envBool, getProxyConfig, type ProxyConfig } from './proxy/config';

export type AppConfig = {
  port: number;
  playlistUrl: string;
  epgUrls: string[];
  fetchTimeoutMs: number;
  syncCron: string;
  syncTimeZone: string;
  // Zone applied to XMLTV timestamps that carry no UTC offset
  epgFallbackTimeZone: string;
  displayTimeZone: string;
  relayAudio: boolean;
  userAgent: string;
  proxy: ProxyConfig | null;
};

export const DEFAULTS = {
  port: 7019,
  fetchTimeoutMs: 8000,
  syncCron: '0 * * * *',
  timeZone: 'UTC',
  userAgent: 'tvgrid/1.0',
} as const;

function intVar(env: Env, name: string, fallback: number, min: number): number {
  const raw = (env[name] || '').trim();
  if (!raw) return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < min) throw new ConfigError(`${name} must be an integer >= ${min}, got "${raw}"`);
  return n;
}

function zoneVar(env: Env, name: string): string {
  const zone = (env[name] || '').trim() || DEFAULTS.timeZone;
  if (!DateTime.now().setZone(zone).isValid) throw new ConfigError(`${name} is not a known time zone: "${zone}"`);
  return zone;
}

function urlVar(env: Env, name: string, raw: string): string {
  try {
    return new URL(raw).toString();
  } catch (e) {
    throw new ConfigError(`${name} contains an invalid URL: "${raw}"`, { cause: e });
  }
}

export function loadConfig(env: Env = process.env): AppConfig {
  const playlistRaw = (env.PLAYLIST_URL || '').trim();
  if (!playlistRaw) throw new ConfigError('PLAYLIST_URL is required');
  const epgList = (env.EPG_URLS || env.EPG_URL || '').split(',').map(s => s.trim()).filter(Boolean);
  if (!epgList.length) throw new ConfigError('EPG_URLS is required');

  const syncCron = (env.SYNC_CRON || '').trim() || DEFAULTS.syncCron;
  if (!cron.validate(syncCron)) throw new ConfigError(`SYNC_CRON is not a valid cron expression: "${syncCron}"`);

  return {
    port: intVar(env, 'PORT', DEFAULTS.port, 0),
    playlistUrl: urlVar(env, 'PLAYLIST_URL', playlistRaw),
    epgUrls: epgList.map(u => urlVar(env, 'EPG_URLS', u)),
    fetchTimeoutMs: intVar(env, 'FETCH_TIMEOUT_MS', DEFAULTS.fetchTimeoutMs, 1),
    syncCron,
    syncTimeZone: zoneVar(env, 'SYNC_TIMEZONE'),
    epgFallbackTimeZone: zoneVar(env, 'EPG_FALLBACK_TZ'),
    displayTimeZone: zoneVar(env, 'DISPLAY_TIMEZONE'),
    relayAudio: envBool(env.RELAY_AUDIO),
    userAgent: (env.USER_AGENT || '').trim() || DEFAULTS.userAgent,
    proxy: getProxyConfig(env),
  };
}
