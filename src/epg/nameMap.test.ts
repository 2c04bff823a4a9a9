import { describe, it, expect } from 'vitest';
import { buildNameIndex, normalizeChannelName } from './nameMap';

describe('normalizeChannelName', () => {
  it('drops quality suffixes, accents and punctuation', () => {
    expect(normalizeChannelName('ABC TV HD')).toBe('abc tv');
    expect(normalizeChannelName('Télé-Québec')).toBe('tele quebec');
    expect(normalizeChannelName('Food & Travel 4K')).toBe('food and travel');
  });
});

describe('buildNameIndex', () => {
  it('maps every display name to the guide channels carrying it', () => {
    const index = buildNameIndex([
      { id: 'abc.au', names: ['ABC TV', 'ABC HD'] },
      { id: 'abc2.au', names: ['ABC'] },
    ]);
    expect(index.get('abc tv')).toEqual(['abc.au']);
    expect(index.get('abc')).toEqual(['abc.au', 'abc2.au']);
  });
});
