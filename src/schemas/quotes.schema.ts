import { z } from 'zod';

const percentUnitSchema = z.enum(['fraction', 'percent']);

const numeric = (schema: z.ZodNumber) =>
  z.preprocess((val) => (typeof val === 'string' && val.trim() !== '' ? Number(val) : val), schema);

export const quoteRequestSchema = z.object({
  jobType: z.string().min(1).max(64),
  quantity: numeric(z.number().int().positive()),
  dueDate: z.string().min(1).max(64).optional(),
  companyName: z.string().min(1).max(255).optional(),
  customerName: z.string().min(1).max(255).optional(),
  customerEmail: z.string().email().max(255).optional(),
  currency: z.string().length(3).toUpperCase().optional(),
  laborRate: numeric(z.number().nonnegative()).optional(),
  markupPct: numeric(z.number().nonnegative()).optional(),
  markupUnit: percentUnitSchema.optional(),
  vatPct: numeric(z.number().nonnegative()).optional(),
  vatUnit: percentUnitSchema.optional(),
  notes: z.string().max(2000).optional()
});

export type QuoteRequest = z.infer<typeof quoteRequestSchema>;

export const estimateRequestSchema = z.object({
  job_type: z.string().min(1),
  quantity: z.number().int().positive()
});

export const downloadParamSchema = z
  .string()
  .min(1)
  .max(255)
  .regex(/^[A-Za-z0-9._-]+$/, 'Invalid file name')
  .refine((name) => !name.startsWith('.'), 'Invalid file name');
