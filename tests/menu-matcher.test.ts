import { describe, it, expect } from 'vitest';
import { MenuMatcher } from '../src/services/menu-matcher.js';
import type { Menu, MenuEntry } from '../src/models/menu.js';

function entry(partial: Pick<MenuEntry, 'id' | 'name' | 'category' | 'price'> & Partial<MenuEntry>): MenuEntry {
  return { aliases: [], description: '', available: true, ...partial };
}

const menu: Menu = {
  restaurantName: 'Test Kitchen',
  currency: 'CAD',
  items: [
    entry({ id: 'STEAK', name: 'Steak', category: 'mainCourse', price: 12.3, aliases: ['ribeye'] }),
    entry({ id: 'STEAK-SANDWICH', name: 'Steak Sandwich', category: 'mainCourse', price: 10 }),
    entry({ id: 'FRIES', name: 'Fries', category: 'sideDishes', price: 4.2, aliases: ['french fries', 'chips'] }),
    entry({ id: 'TRUFFLE-FRIES', name: 'Truffle Fries', category: 'sideDishes', price: 6.5, available: false }),
    entry({ id: 'BEER', name: 'Beer', category: 'beverages', price: 3.5 }),
  ],
};

describe('MenuMatcher', () => {
  const matcher = new MenuMatcher(menu);

  it('matches names exactly, ignoring case and punctuation', () => {
    const result = matcher.findItem('Beer!');
    expect(result.match?.id).toBe('BEER');
    expect(result.confidence).toBe(1);
  });

  it('matches aliases', () => {
    const result = matcher.findItem('Ribeye');
    expect(result.match?.id).toBe('STEAK');
    expect(result.confidence).toBe(1);
  });

  it('scores containment at 0.9', () => {
    const result = matcher.findItem('large fries please');
    expect(result.match?.id).toBe('FRIES');
    expect(result.confidence).toBe(0.9);
  });

  it('lists weaker candidates as alternatives', () => {
    const result = matcher.findItem('steak');
    expect(result.match?.id).toBe('STEAK');
    expect(result.alternatives.map((e) => e.id)).toEqual(['STEAK-SANDWICH']);
  });

  it('skips unavailable entries', () => {
    const result = matcher.findItem('fries');
    expect(result.match?.id).toBe('FRIES');
    expect(result.alternatives).toEqual([]);
  });

  it('restricts matching to a category when given', () => {
    expect(matcher.findItem('steak', 'beverages')).toEqual({ match: null, confidence: 0, alternatives: [] });
  });

  it('returns no match for unknown names', () => {
    expect(matcher.findItem('pizza').match).toBeNull();
    expect(matcher.findItem('').match).toBeNull();
  });

  it('lists available entries by category', () => {
    expect(matcher.getItemsByCategory('sideDishes').map((e) => e.name)).toEqual(['Fries']);
    expect(matcher.getItemsByCategory('starters')).toEqual([]);
  });
});
