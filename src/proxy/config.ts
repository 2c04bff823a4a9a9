export type ProxyConfig = {
  baseUrl: string; // e.g. https://proxy.example.org
  path: string; // e.g. /proxy/hls/manifest.m3u8
  password: string;
  dataParam: string; // query param carrying the original URL (default: d)
  passwordParam: string; // query param carrying the password (default: api_password)
};

export type Env = Record<string, string | undefined>;

export function envBool(val?: string): boolean {
  if (!val) return false;
  const v = val.trim().toLowerCase();
  return v === '1' || v === 'true' || v === 'yes' || v === 'on';
}

// Proxy wrapping only applies when enabled and both base URL and password are present
export function getProxyConfig(env: Env = process.env): ProxyConfig | null {
  if (!envBool(env.PROXY_ENABLED)) return null;
  const baseUrl = (env.PROXY_BASE_URL || '').trim();
  const password = (env.PROXY_PASSWORD || '').trim();
  if (!baseUrl || !password) return null;
  return {
    baseUrl,
    password,
    path: (env.PROXY_PATH || '/proxy/hls/manifest.m3u8').trim(),
    dataParam: (env.PROXY_DATA_PARAM || 'd').trim(),
    passwordParam: (env.PROXY_PASSWORD_PARAM || 'api_password').trim(),
  };
}
