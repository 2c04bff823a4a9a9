import { describe, it, expect } from 'vitest';
import { buildProxyUrl, wrapStreamUrl } from './build';
import type { ProxyConfig } from './config';

const CFG: ProxyConfig = {
  baseUrl: 'https://proxy.example',
  path: '/proxy/hls/manifest.m3u8',
  password: 'test-secret',
  dataParam: 'd',
  passwordParam: 'api_password',
};

describe('buildProxyUrl', () => {
  it('carries the original URL and password as query parameters', () => {
    expect(buildProxyUrl('https://streams.example/abc.m3u8', CFG)).toBe(
      'https://proxy.example/proxy/hls/manifest.m3u8?d=https%3A%2F%2Fstreams.example%2Fabc.m3u8&api_password=test-secret',
    );
  });

  it('keeps a base path on the proxy host', () => {
    const url = buildProxyUrl('https://streams.example/a.m3u8?x=1', { ...CFG, baseUrl: 'https://proxy.example/mfp/', dataParam: 'url' });
    expect(url).toBe('https://proxy.example/mfp/proxy/hls/manifest.m3u8?url=https%3A%2F%2Fstreams.example%2Fa.m3u8%3Fx%3D1&api_password=test-secret');
  });
});

describe('wrapStreamUrl', () => {
  it('returns the original URL when no proxy is configured', () => {
    expect(wrapStreamUrl('https://streams.example/abc.m3u8', null)).toBe('https://streams.example/abc.m3u8');
  });
});
