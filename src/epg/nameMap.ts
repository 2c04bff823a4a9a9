// Lowercase, strip quality/format suffixes and punctuation so "ABC TV HD" and "abc tv" meet
export function normalizeChannelName(name: string): string {
  return (name || '')
    .toLowerCase()
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/&/g, ' and ')
    .replace(/\b(?:hd|uhd|fhd|sd|4k)\b/g, ' ')
    .replace(/[^a-z0-9]+/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

// Normalized display name -> guide channel ids carrying that name
export function buildNameIndex(channels: ReadonlyArray<{ id: string; names: string[] }>): Map<string, string[]> {
  const out = new Map<string, string[]>();
  for (const ch of channels) {
    for (const nm of ch.names) {
      const k = normalizeChannelName(nm);
      if (!k) continue;
      const ids = out.get(k) ?? [];
      if (!ids.includes(ch.id)) ids.push(ch.id);
      out.set(k, ids);
    }
  }
  return out;
}
