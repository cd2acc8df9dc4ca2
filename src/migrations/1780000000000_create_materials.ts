import type { MigrationBuilder } from 'node-pg-migrate';

export async function up(pgm: MigrationBuilder): Promise<void> {
  pgm.createTable('materials', {
    name: {
      type: 'text',
      primaryKey: true,
      comment: 'Material key as referenced by recipes (e.g., flour, baking_powder)'
    },
    unit: {
      type: 'text',
      notNull: true,
      comment: 'Unit the cost is quoted per (kg, L, ml, each)'
    },
    unit_cost: {
      type: 'numeric(18,6)',
      notNull: true
    },
    currency: {
      type: 'char(3)',
      notNull: true,
      comment: 'ISO 4217 code the unit cost is stored in'
    },
    created_at: { type: 'timestamptz', notNull: true, default: pgm.func('now()') },
    updated_at: { type: 'timestamptz', notNull: true, default: pgm.func('now()') }
  });

  pgm.addConstraint('materials', 'chk_materials_unit_cost_non_negative', 'CHECK (unit_cost >= 0)');
}

export async function down(pgm: MigrationBuilder): Promise<void> {
  pgm.dropTable('materials');
}
