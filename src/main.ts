import fs from 'fs';
import path from 'path';
import { loadConfig } from './config';
import { GuideFetcher } from './epg/fetcher';
import { createLogger, errorMessage } from './log';
import { PlaylistFetcher } from './playlist/fetcher';
import { PresentationService } from './presentation/service';
import { createApp } from './server';
import { SnapshotStore } from './sync/snapshot';
import { SyncScheduler } from './sync/scheduler';
import { GRID_PLACEHOLDER } from './ui/channelGrid';

const log = createLogger('main');

// Log and survive unexpected errors
process.on('uncaughtException', (err: unknown) => { log.error('uncaughtException', err); });
process.on('unhandledRejection', (reason: unknown) => { log.error('unhandledRejection', reason); });

function readPageTemplate(): string {
  const candidates = [
    path.resolve(__dirname, '../public/index.html'),
    path.join(__dirname, 'public', 'index.html'),
  ];
  for (const p of candidates) {
    if (fs.existsSync(p)) return fs.readFileSync(p, 'utf8');
  }
  log.warn('Page template not found, serving a bare grid');
  return `<!DOCTYPE html><html><body>${GRID_PLACEHOLDER}</body></html>`;
}

async function main(): Promise<void> {
  const config = loadConfig();
  const store = new SnapshotStore();
  const scheduler = new SyncScheduler({
    store,
    playlist: new PlaylistFetcher({ url: config.playlistUrl, timeoutMs: config.fetchTimeoutMs, userAgent: config.userAgent }),
    guide: new GuideFetcher({
      urls: config.epgUrls,
      timeoutMs: config.fetchTimeoutMs,
      userAgent: config.userAgent,
      fallbackTimeZone: config.epgFallbackTimeZone,
    }),
    cron: config.syncCron,
    timeZone: config.syncTimeZone,
  });
  const presentation = new PresentationService({
    store,
    sync: scheduler,
    proxy: config.proxy,
    relayAudio: config.relayAudio,
  });
  const app = createApp({
    presentation,
    sync: scheduler,
    pageTemplate: readPageTemplate(),
    displayTimeZone: config.displayTimeZone,
    userAgent: config.userAgent,
  });

  // Sync once before serving; with no data the API answers 503 until a later cycle succeeds
  const boot = await scheduler.trigger('boot');
  if (boot.status !== 'published') {
    log.error('Initial sync did not publish a snapshot; serving without data until the next cycle');
  }
  scheduler.start();

  const server = app.listen(config.port, '0.0.0.0', () => log.info(`tvgrid on http://localhost:${config.port}/`));
  const shutdown = (signal: string) => {
    log.info('Shutting down on', signal);
    scheduler.stop();
    server.close(err => {
      if (err) log.error('Server close failed:', errorMessage(err));
      process.exit(err ? 1 : 0);
    });
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch(e => {
  log.error('Startup failed:', errorMessage(e));
  process.exit(1);
});
