import { describe, it, expect } from 'vitest';
import { cleanDisplayText, normalizeForKey, stripDecorativeGlyphs } from './text';

describe('text helpers', () => {
  it('strips emoji, flags and joiners', () => {
    expect(stripDecorativeGlyphs('Acme \u{1F1FA}\u{1F1F8} Labs \u{1F525}')).toBe('Acme  Labs ');
    expect(stripDecorativeGlyphs('Team \u{1F468}\u200d\u{1F4BB}')).toBe('Team ');
  });

  it('keeps case in the display form', () => {
    expect(cleanDisplayText('  \u{1F680} Rocket   Labs  ')).toBe('Rocket Labs');
  });

  it('case-folds the key form', () => {
    expect(normalizeForKey(' Rocket\tLABS ')).toBe('rocket labs');
  });
});
