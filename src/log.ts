export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

// Debug output is on unless TVGRID_DEBUG=0
function debugEnabled(): boolean {
  return process.env.TVGRID_DEBUG !== '0';
}

export function createLogger(tag: string): Logger {
  const prefix = `[tvgrid:${tag}]`;
  return {
    debug: (...args: unknown[]) => { if (debugEnabled()) console.log(prefix, ...args); },
    info: (...args: unknown[]) => console.log(prefix, ...args),
    warn: (...args: unknown[]) => console.warn(prefix, ...args),
    error: (...args: unknown[]) => console.error(prefix, ...args),
  };
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}
