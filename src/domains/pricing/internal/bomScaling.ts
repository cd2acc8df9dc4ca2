import fs from 'node:fs';
import path from 'node:path';
import type { z } from 'zod';
import { UnknownJobTypeError } from '../../../lib/errors';
import { roundTo } from '../../../lib/numbers';
import { recipeBookSchema } from '../../../schemas/recipes.schema';
import type { BomEstimate, BomLine, JobType } from '../types';

export type RecipeBook = z.infer<typeof recipeBookSchema>;

export const DEFAULT_RECIPES_PATH = path.join('data', 'recipes.json');

// kg and L keep gram/millilitre precision; ml and counted units keep one decimal
// (half an egg is a valid per-unit amount).
const THREE_DECIMAL_UNITS = new Set(['kg', 'L']);

export function loadRecipeBook(filePath: string = DEFAULT_RECIPES_PATH): RecipeBook {
  const raw: unknown = JSON.parse(fs.readFileSync(path.resolve(filePath), 'utf-8'));
  return recipeBookSchema.parse(raw);
}

let defaultBook: RecipeBook | null = null;

export function getDefaultRecipeBook(): RecipeBook {
  if (!defaultBook) {
    defaultBook = loadRecipeBook();
  }
  return defaultBook;
}

export function listJobTypes(book: RecipeBook): JobType[] {
  return Object.keys(book);
}

export function roundBomQuantity(quantity: number, unit: string): number {
  return roundTo(quantity, THREE_DECIMAL_UNITS.has(unit) ? 3 : 1);
}

/**
 * Scales a per-unit recipe linearly. Quantities are rounded here, before any
 * costing, so totals are computed from the rounded figures.
 */
export function scaleBom(book: RecipeBook, jobType: JobType, quantity: number): BomEstimate {
  const recipe = Object.prototype.hasOwnProperty.call(book, jobType) ? book[jobType] : undefined;
  if (!recipe) {
    throw new UnknownJobTypeError(jobType, listJobTypes(book));
  }

  const materials: BomLine[] = recipe.materials.map((material) => ({
    name: material.name,
    unit: material.unit,
    qty: roundBomQuantity(material.qty * quantity, material.unit)
  }));

  return {
    jobType,
    quantity,
    materials,
    laborHours: roundTo(recipe.labor_hours * quantity, 3)
  };
}
