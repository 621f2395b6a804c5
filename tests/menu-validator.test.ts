import { describe, it, expect } from 'vitest';
import { menuValidator } from '../src/services/menu-validator.js';
import { createMenuItem } from '../src/models/menu.js';

describe('menuValidator.parseMenu', () => {
  it('narrows valid data and fills defaults', () => {
    const { menu, errors } = menuValidator.parseMenu({
      restaurantName: 'Test Kitchen',
      currency: 'CAD',
      items: [{ id: 'SOUP-1', name: 'Soup', category: 'starters', price: 5 }],
    });
    expect(errors).toEqual([]);
    expect(menu).toEqual({
      restaurantName: 'Test Kitchen',
      currency: 'CAD',
      items: [
        {
          id: 'SOUP-1',
          name: 'Soup',
          category: 'starters',
          price: 5,
          aliases: [],
          description: '',
          available: true,
        },
      ],
    });
  });

  it('rejects a non-object', () => {
    expect(menuValidator.parseMenu([])).toEqual({
      errors: [{ field: '', message: 'Menu must be an object' }],
    });
  });

  it('reports every field error by path', () => {
    const { menu, errors } = menuValidator.parseMenu({
      restaurantName: 'Test Kitchen',
      currency: 'CAD',
      items: [
        { id: 'A-1', name: 'Soup', category: 'starters', price: 5 },
        { id: 'A-1', name: 'Soup', category: 'starters', price: -1 },
        { id: 'b', name: 'Tea', category: 'dessert', price: 2 },
      ],
    });
    expect(menu).toBeUndefined();
    expect(errors.map((e) => e.field)).toEqual([
      'items[1].id',
      'items[1].name',
      'items[1].price',
      'items[2].id',
      'items[2].category',
    ]);
    expect(errors[1].message).toBe('Duplicate name "Soup" in starters');
  });

  it('checks header fields', () => {
    const { errors } = menuValidator.parseMenu({ restaurantName: ' ', currency: 'cad', items: {} });
    expect(errors).toEqual([
      { field: 'restaurantName', message: 'Restaurant name is required' },
      { field: 'currency', message: 'Currency must be a three-letter code' },
      { field: 'items', message: 'Items must be an array' },
    ]);
  });

  it('checks optional field types', () => {
    const { errors } = menuValidator.parseMenu({
      restaurantName: 'Test Kitchen',
      currency: 'CAD',
      items: [{ id: 'X', name: 'Tea', category: 'beverages', price: 2, aliases: [1], available: 'yes' }],
    });
    expect(errors.map((e) => e.field)).toEqual(['items[0].aliases', 'items[0].available']);
  });
});

describe('menuValidator.validateItem', () => {
  it('accepts a priced, named item', () => {
    expect(menuValidator.validateItem(createMenuItem('Tea', 2))).toEqual({ valid: true, errors: [] });
  });

  it('rejects a blank name and negative price', () => {
    const result = menuValidator.validateItem(createMenuItem('', -1));
    expect(result.valid).toBe(false);
    expect(result.errors.map((e) => e.field)).toEqual(['name', 'price']);
  });
});

describe('menuValidator.countByCategory', () => {
  it('counts entries in every category', () => {
    const { menu } = menuValidator.parseMenu({
      restaurantName: 'Test Kitchen',
      currency: 'CAD',
      items: [
        { id: 'A', name: 'Soup', category: 'starters', price: 5 },
        { id: 'B', name: 'Tea', category: 'beverages', price: 2 },
        { id: 'C', name: 'Coffee', category: 'beverages', price: 2.5 },
      ],
    });
    if (!menu) throw new Error('expected a menu');
    expect(menuValidator.countByCategory(menu)).toEqual({
      starters: 1,
      mainCourse: 0,
      sideDishes: 0,
      beverages: 2,
    });
  });
});
