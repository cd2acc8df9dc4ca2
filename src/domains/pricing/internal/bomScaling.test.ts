import { describe, expect, it } from 'vitest';
import { UnknownJobTypeError } from '../../../lib/errors';
import { listJobTypes, loadRecipeBook, roundBomQuantity, scaleBom, type RecipeBook } from './bomScaling';

const book = loadRecipeBook();

describe('recipe book', () => {
  it('lists the shipped job types', () => {
    expect(listJobTypes(book)).toEqual(['cupcakes', 'cake', 'pastry_box']);
  });
});

describe('scaleBom', () => {
  it('doubles labor hours when the quantity doubles', () => {
    for (const jobType of listJobTypes(book)) {
      for (const quantity of [1, 7, 40]) {
        const single = scaleBom(book, jobType, quantity).laborHours;
        expect(scaleBom(book, jobType, quantity * 2).laborHours).toBeCloseTo(2 * single, 3);
      }
    }
  });

  it('scales cupcakes linearly and rounds per unit', () => {
    const estimate = scaleBom(book, 'cupcakes', 100);
    expect(estimate.jobType).toBe('cupcakes');
    expect(estimate.quantity).toBe(100);
    expect(estimate.laborHours).toBe(5);
    expect(estimate.materials).toEqual([
      { name: 'flour', unit: 'kg', qty: 8 },
      { name: 'sugar', unit: 'kg', qty: 6 },
      { name: 'butter', unit: 'kg', qty: 4 },
      { name: 'eggs', unit: 'each', qty: 50 },
      { name: 'milk', unit: 'L', qty: 5 },
      { name: 'vanilla', unit: 'ml', qty: 100 },
      { name: 'baking_powder', unit: 'kg', qty: 0.1 }
    ]);
  });

  it('keeps half units for a single cupcake', () => {
    const estimate = scaleBom(book, 'cupcakes', 1);
    const eggs = estimate.materials.find((material) => material.name === 'eggs');
    expect(eggs?.qty).toBe(0.5);
    expect(estimate.laborHours).toBe(0.05);
  });

  it('rejects unknown job types with the known list', () => {
    expect(() => scaleBom(book, 'bagels', 10)).toThrow(UnknownJobTypeError);
    expect(() => scaleBom(book, 'bagels', 10)).toThrow(
      'Unknown job_type "bagels" (expected one of: cupcakes, cake, pastry_box)'
    );
  });

  it('does not treat inherited object keys as job types', () => {
    expect(() => scaleBom(book, 'toString', 1)).toThrow(UnknownJobTypeError);
  });

  it('scales a custom book', () => {
    const custom: RecipeBook = {
      bread: { materials: [{ name: 'flour', unit: 'kg', qty: 0.3333 }], labor_hours: 0.1234 }
    };
    const estimate = scaleBom(custom, 'bread', 3);
    expect(estimate.materials).toEqual([{ name: 'flour', unit: 'kg', qty: 1 }]);
    expect(estimate.laborHours).toBe(0.37);
  });
});

describe('roundBomQuantity', () => {
  it('uses three decimals for kg and L and one otherwise', () => {
    expect(roundBomQuantity(0.12345, 'kg')).toBe(0.123);
    expect(roundBomQuantity(1.23456, 'L')).toBe(1.235);
    expect(roundBomQuantity(12.34, 'ml')).toBe(12.3);
    expect(roundBomQuantity(2.26, 'each')).toBe(2.3);
  });
});
