import { z } from 'zod';

export const recipeMaterialSchema = z.object({
  name: z.string().min(1),
  unit: z.string().min(1),
  qty: z.number().nonnegative()
});

export const recipeSchema = z.object({
  materials: z.array(recipeMaterialSchema).min(1),
  labor_hours: z.number().nonnegative()
});

export const recipeBookSchema = z.record(z.string().min(1), recipeSchema);
