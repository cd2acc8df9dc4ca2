import 'dotenv/config';
import { createPool, withTransaction } from '../src/db';
import { DEFAULT_MATERIAL_SEED_PATH, loadMaterialSeed } from '../src/services/materials.service';

async function seed() {
  const connectionString = process.env.DATABASE_URL;
  if (!connectionString) {
    console.error('DATABASE_URL is required to seed materials');
    process.exit(1);
  }

  const seedPath = process.argv[2] ?? DEFAULT_MATERIAL_SEED_PATH;
  const rows = await loadMaterialSeed(seedPath);
  const pool = createPool(connectionString);

  try {
    await withTransaction(pool, async (client) => {
      for (const row of rows) {
        await client.query(
          `INSERT INTO materials (name, unit, unit_cost, currency, created_at, updated_at)
           VALUES ($1, $2, $3, $4, now(), now())
           ON CONFLICT (name) DO UPDATE
              SET unit = EXCLUDED.unit,
                  unit_cost = EXCLUDED.unit_cost,
                  currency = EXCLUDED.currency,
                  updated_at = now()`,
          [row.name, row.unit, row.unit_cost, row.currency]
        );
      }
    });
    console.log(`✓ Seeded ${rows.length} materials from ${seedPath}`);
  } catch (error: unknown) {
    console.error('Seed error:', error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  } finally {
    await pool.end();
  }
}

seed().catch((error: unknown) => {
  console.error('Seed error:', error instanceof Error ? error.message : String(error));
  process.exit(1);
});
