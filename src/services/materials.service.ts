import fs from 'node:fs/promises';
import path from 'node:path';
import type { Pool } from 'pg';
import type { z } from 'zod';
import type { MaterialCost } from '../domains/pricing';
import { MaterialNotFoundError } from '../lib/errors';
import { toNumber } from '../lib/numbers';
import { materialSeedSchema, type materialSchema } from '../schemas/materials.schema';

export type MaterialSeedRow = z.infer<typeof materialSchema>;

/**
 * Lookup surface the pricing flow needs. Materials are provisioned out of band;
 * the only write is a price change on an existing row.
 */
export interface MaterialCostStore {
  /** Names that do not exist are simply absent from the result. */
  batchGet(names: Iterable<string>): Promise<Map<string, MaterialCost>>;
  get(name: string): Promise<MaterialCost | null>;
  /** Ordered by name. */
  list(): Promise<MaterialCost[]>;
  updateCost(name: string, unitCost: number): Promise<MaterialCost>;
  close(): Promise<void>;
}

type MaterialRow = {
  name: string;
  unit: string;
  unit_cost: string | number;
  currency: string;
};

export function mapMaterial(row: MaterialRow): MaterialCost {
  return {
    name: row.name,
    unit: row.unit,
    unitCost: toNumber(row.unit_cost),
    currency: row.currency.trim().toUpperCase()
  };
}

export const DEFAULT_MATERIAL_SEED_PATH = path.join('data', 'materials.seed.json');

export async function loadMaterialSeed(filePath: string = DEFAULT_MATERIAL_SEED_PATH): Promise<MaterialSeedRow[]> {
  const raw: unknown = JSON.parse(await fs.readFile(path.resolve(filePath), 'utf-8'));
  return materialSeedSchema.parse(raw);
}

export class PgMaterialCostStore implements MaterialCostStore {
  constructor(private readonly pool: Pool) {}

  async batchGet(names: Iterable<string>): Promise<Map<string, MaterialCost>> {
    const unique = Array.from(new Set(names));
    if (unique.length === 0) {
      return new Map();
    }
    const { rows } = await this.pool.query<MaterialRow>(
      `SELECT name, unit, unit_cost, currency
         FROM materials
        WHERE name = ANY($1::text[])`,
      [unique]
    );
    return new Map(rows.map((row) => [row.name, mapMaterial(row)]));
  }

  async get(name: string): Promise<MaterialCost | null> {
    const { rows } = await this.pool.query<MaterialRow>(
      `SELECT name, unit, unit_cost, currency
         FROM materials
        WHERE name = $1`,
      [name]
    );
    return rows[0] ? mapMaterial(rows[0]) : null;
  }

  async list(): Promise<MaterialCost[]> {
    const { rows } = await this.pool.query<MaterialRow>(
      `SELECT name, unit, unit_cost, currency
         FROM materials
        ORDER BY name`
    );
    return rows.map(mapMaterial);
  }

  async updateCost(name: string, unitCost: number): Promise<MaterialCost> {
    const { rows } = await this.pool.query<MaterialRow>(
      `UPDATE materials
          SET unit_cost = $2,
              updated_at = NOW()
        WHERE name = $1
        RETURNING name, unit, unit_cost, currency`,
      [name, unitCost]
    );
    if (!rows[0]) {
      throw new MaterialNotFoundError(name);
    }
    return mapMaterial(rows[0]);
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}

/**
 * Process-local store for development without Postgres and for tests.
 */
export class InMemoryMaterialCostStore implements MaterialCostStore {
  private readonly materials = new Map<string, MaterialCost>();

  constructor(seed: Iterable<MaterialCost> = []) {
    for (const material of seed) {
      this.materials.set(material.name, { ...material });
    }
  }

  static fromSeedRows(rows: MaterialSeedRow[]): InMemoryMaterialCostStore {
    return new InMemoryMaterialCostStore(rows.map(mapMaterial));
  }

  async batchGet(names: Iterable<string>): Promise<Map<string, MaterialCost>> {
    const result = new Map<string, MaterialCost>();
    for (const name of names) {
      const material = this.materials.get(name);
      if (material) result.set(name, { ...material });
    }
    return result;
  }

  async get(name: string): Promise<MaterialCost | null> {
    const material = this.materials.get(name);
    return material ? { ...material } : null;
  }

  async list(): Promise<MaterialCost[]> {
    return Array.from(this.materials.values())
      .map((material) => ({ ...material }))
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  }

  async updateCost(name: string, unitCost: number): Promise<MaterialCost> {
    const material = this.materials.get(name);
    if (!material) {
      throw new MaterialNotFoundError(name);
    }
    const updated = { ...material, unitCost };
    this.materials.set(name, updated);
    return { ...updated };
  }

  async close(): Promise<void> {
    this.materials.clear();
  }
}
