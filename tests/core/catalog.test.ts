import { describe, it, expect } from 'vitest';
import { Catalog } from '../../src/core/catalog';

describe('Catalog', () => {
  const catalog = new Catalog([
    { id: 1, name: 'Torch' },
    { id: 2, name: 'Rope' },
    { id: 1, name: 'Lantern' },
  ]);

  it('should find items by identifier', () => {
    expect(catalog.find(2)?.name).toBe('Rope');
  });

  it('should return the first match for duplicate identifiers', () => {
    expect(catalog.find(1)?.name).toBe('Torch');
  });

  it('should return undefined for unknown identifiers', () => {
    expect(catalog.find(99)).toBeUndefined();
  });

  it('should preserve input order', () => {
    expect([...catalog].map((item) => item.name)).toEqual(['Torch', 'Rope', 'Lantern']);
    expect(catalog.size).toBe(3);
  });

  it('should hand out the same frozen item on every lookup', () => {
    const item = catalog.find(2);
    expect(catalog.find(2)).toBe(item);
    expect(Object.isFrozen(item)).toBe(true);
    expect(Object.isFrozen(catalog.list())).toBe(true);
  });

  it('should not be affected by later changes to the source array', () => {
    const source = [{ id: 5, name: 'Bucket' }];
    const copy = new Catalog(source);
    source.push({ id: 6, name: 'Shovel' });
    source[0] = { id: 5, name: 'Changed' };

    expect(copy.size).toBe(1);
    expect(copy.find(5)?.name).toBe('Bucket');
  });
});
