import { describe, expect, it } from 'vitest';
import { extractPriceFilters } from '../priceFilters.js';

describe('extractPriceFilters', () => {
  it('reads an upper bound with a currency word', () => {
    expect(extractPriceFilters('cleaning spray under 10 dollars')).toEqual({
      query: 'cleaning spray',
      maxPrice: 10,
    });
  });

  it('reads comparison operators', () => {
    expect(extractPriceFilters('detergent > 20')).toEqual({ query: 'detergent', minPrice: 20 });
    expect(extractPriceFilters('vacuum <= 200 usd')).toEqual({ query: 'vacuum', maxPrice: 200 });
  });

  it('reads "between X and Y" and dashed ranges', () => {
    expect(extractPriceFilters('towels between 5 and 15')).toEqual({
      query: 'towels',
      minPrice: 5,
      maxPrice: 15,
    });
    expect(extractPriceFilters('microfiber cloths 5-10')).toEqual({
      query: 'microfiber cloths',
      minPrice: 5,
      maxPrice: 10,
    });
  });

  it('orders reversed range bounds', () => {
    expect(extractPriceFilters('towels from 30 to 20')).toEqual({
      query: 'towels',
      minPrice: 20,
      maxPrice: 30,
    });
  });

  it('accepts a leading dollar sign and thousands separators', () => {
    expect(extractPriceFilters('desk under $1,250.50')).toEqual({ query: 'desk', maxPrice: 1250.5 });
    expect(extractPriceFilters('sofa up to 1500')).toEqual({ query: 'sofa', maxPrice: 1500 });
  });

  it('tightens repeated constraints', () => {
    expect(extractPriceFilters('blender over 40 under 100 and at least 50')).toEqual({
      query: 'blender and',
      minPrice: 50,
      maxPrice: 100,
    });
  });

  it('turns "around" into a 10% band and "exactly" into a point', () => {
    const around = extractPriceFilters('speaker around 50');
    expect(around.query).toBe('speaker');
    expect(around.minPrice).toBeCloseTo(45);
    expect(around.maxPrice).toBeCloseTo(55);

    expect(extractPriceFilters('lamp exactly 20')).toEqual({ query: 'lamp', minPrice: 20, maxPrice: 20 });
  });

  it('maps budget and premium words to soft bounds', () => {
    expect(extractPriceFilters('premium detergent')).toEqual({ query: 'detergent', minPrice: 100 });
    expect(extractPriceFilters('high-end vacuum')).toEqual({ query: 'vacuum', minPrice: 100 });
    expect(extractPriceFilters('budget towels')).toEqual({ query: 'towels', maxPrice: 15 });
  });

  it('lets an explicit bound win over a budget word', () => {
    expect(extractPriceFilters('cheap towels under 8')).toEqual({ query: 'towels', maxPrice: 8 });
  });

  it('keeps the original query when only price words were given', () => {
    expect(extractPriceFilters('Cheap')).toEqual({ query: 'Cheap', maxPrice: 15 });
  });

  it('leaves queries without prices alone apart from case and spacing', () => {
    expect(extractPriceFilters('  Wireless   Headphones ')).toEqual({ query: 'wireless headphones' });
  });
});
