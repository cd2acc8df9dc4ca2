import { z } from 'zod';

export const materialSchema = z.object({
  name: z.string().min(1).max(128),
  unit: z.string().min(1).max(16),
  unit_cost: z.number().nonnegative(),
  currency: z.string().length(3).toUpperCase()
});

export const materialSeedSchema = z.array(materialSchema);

export const materialCostUpdateSchema = z.object({
  unitCost: z.preprocess((val) => {
    const num = typeof val === 'string' && val.trim() !== '' ? Number(val) : val;
    return num;
  }, z.number().nonnegative())
});

export const materialNameParamSchema = z.string().min(1).max(128);
