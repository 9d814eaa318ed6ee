import { describe, it, expect } from 'vitest';
import { normalizeTitle, cleanDisplayTitle } from '../title.js';

describe('normalizeTitle', () => {
  it('should trim and lowercase', () => {
    expect(normalizeTitle('  Inception ')).toBe('inception');
  });

  it('should collapse inner whitespace', () => {
    expect(normalizeTitle('The\tGrand   Budapest\nHotel')).toBe('the grand budapest hotel');
  });

  it('should fold full-width characters', () => {
    expect(normalizeTitle('ＤＵＮＥ')).toBe('dune');
  });

  it('should be idempotent', () => {
    const titles = ['  Fack ju Göhte ', 'Thelma & Louise', 'APOCALYPSE NOW!', 'De Boezemvriend'];
    for (const title of titles) {
      const once = normalizeTitle(title);
      expect(normalizeTitle(once)).toBe(once);
    }
  });
});

describe('cleanDisplayTitle', () => {
  it('should keep casing', () => {
    expect(cleanDisplayTitle('  De   Boezemvriend ')).toBe('De Boezemvriend');
  });
});
