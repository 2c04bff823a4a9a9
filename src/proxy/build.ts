import type { ProxyConfig } from './config';

// `${baseUrl}${path}?d=<original>&api_password=<password>`
export function buildProxyUrl(originalUrl: string, cfg: ProxyConfig): string {
  const base = cfg.baseUrl.endsWith('/') ? cfg.baseUrl : cfg.baseUrl + '/';
  const u = new URL(cfg.path.replace(/^\//, ''), base);
  u.searchParams.set(cfg.dataParam, originalUrl);
  u.searchParams.set(cfg.passwordParam, cfg.password);
  return u.toString();
}

export function wrapStreamUrl(originalUrl: string, cfg: ProxyConfig | null): string {
  if (!cfg) return originalUrl;
  return buildProxyUrl(originalUrl, cfg);
}
