import type { MigrationBuilder } from 'node-pg-migrate';

export async function up(pgm: MigrationBuilder): Promise<void> {
  // Owned by the catalogue, order and inventory systems; created here only when absent
  // so a standalone deployment has something to read.
  pgm.createTable(
    'product_variants',
    {
      sku: { type: 'text', primaryKey: true },
      category: { type: 'text' },
      launch_date: { type: 'date' },
      unit_price: { type: 'numeric(18,4)' },
      is_active: { type: 'boolean', notNull: true, default: true },
      created_at: { type: 'timestamptz', notNull: true, default: pgm.func('now()') }
    },
    { ifNotExists: true }
  );

  pgm.createTable(
    'historical_sales_daily',
    {
      sku: { type: 'text', notNull: true },
      sale_date: { type: 'date', notNull: true },
      quantity: { type: 'numeric(18,4)', notNull: true, default: 0 }
    },
    { ifNotExists: true, constraints: { primaryKey: ['sku', 'sale_date'] } }
  );

  pgm.createTable(
    'inventory_levels',
    {
      sku: { type: 'text', primaryKey: true },
      quantity: { type: 'numeric(18,4)', notNull: true, default: 0 },
      updated_at: { type: 'timestamptz', notNull: true, default: pgm.func('now()') }
    },
    { ifNotExists: true }
  );

  pgm.createTable('external_signals', {
    id: { type: 'uuid', primaryKey: true },
    signal_type: { type: 'text', notNull: true },
    location_code: { type: 'text', notNull: true },
    product_code: { type: 'text', notNull: true },
    signal_date: { type: 'date', notNull: true },
    value: { type: 'numeric(18,4)' },
    payload: { type: 'jsonb', notNull: true, default: pgm.func("'{}'::jsonb") },
    source: { type: 'text', notNull: true },
    created_at: { type: 'timestamptz', notNull: true, default: pgm.func('now()') },
    updated_at: { type: 'timestamptz', notNull: true, default: pgm.func('now()') }
  });
  pgm.addConstraint(
    'external_signals',
    'uq_external_signals_key',
    'UNIQUE (signal_type, location_code, product_code, signal_date)'
  );
  pgm.addConstraint(
    'external_signals',
    'chk_external_signals_type',
    "CHECK (signal_type IN ('weather', 'weather_forecast', 'trends', 'festival'))"
  );
  pgm.createIndex('external_signals', ['signal_type', 'product_code', 'signal_date'], {
    name: 'idx_external_signals_product_date'
  });

  pgm.createTable('demand_forecasts', {
    id: { type: 'uuid', primaryKey: true },
    run_id: { type: 'uuid', notNull: true },
    sku: { type: 'text', notNull: true },
    forecast_date: { type: 'date', notNull: true },
    days_ahead: { type: 'integer', notNull: true },
    predicted_quantity: { type: 'integer', notNull: true },
    lower_bound: { type: 'integer', notNull: true },
    upper_bound: { type: 'integer', notNull: true },
    model_type: { type: 'text', notNull: true },
    model_version: { type: 'text', notNull: true },
    factors: { type: 'jsonb', notNull: true, default: pgm.func("'[]'::jsonb") },
    degraded: { type: 'boolean', notNull: true, default: false },
    generated_at: { type: 'timestamptz', notNull: true },
    actual_quantity: { type: 'numeric(18,4)' }
  });
  pgm.addConstraint(
    'demand_forecasts',
    'chk_demand_forecasts_bounds',
    'CHECK (predicted_quantity >= 0 AND lower_bound <= predicted_quantity AND predicted_quantity <= upper_bound)'
  );
  pgm.createIndex('demand_forecasts', ['forecast_date'], { name: 'idx_demand_forecasts_forecast_date' });
  pgm.createIndex('demand_forecasts', ['sku', 'forecast_date'], { name: 'idx_demand_forecasts_sku_date' });
  pgm.createIndex('demand_forecasts', ['run_id'], { name: 'idx_demand_forecasts_run_id' });

  pgm.createTable('inventory_alerts', {
    id: { type: 'uuid', primaryKey: true },
    sku: { type: 'text', notNull: true },
    alert_type: { type: 'text', notNull: true },
    severity: { type: 'text', notNull: true },
    status: { type: 'text', notNull: true, default: 'active' },
    current_stock: { type: 'numeric(18,4)', notNull: true },
    predicted_daily_demand: { type: 'numeric(18,4)', notNull: true },
    days_until_stockout: { type: 'integer', notNull: true },
    recommended_reorder_quantity: { type: 'integer', notNull: true },
    created_at: { type: 'timestamptz', notNull: true, default: pgm.func('now()') },
    updated_at: { type: 'timestamptz', notNull: true, default: pgm.func('now()') },
    resolved_at: { type: 'timestamptz' }
  });
  pgm.addConstraint(
    'inventory_alerts',
    'chk_inventory_alerts_enums',
    `CHECK (
      alert_type IN ('low_stock', 'stockout_warning')
      AND severity IN ('info', 'warning', 'critical')
      AND status IN ('active', 'acknowledged', 'resolved')
    )`
  );
  pgm.createIndex('inventory_alerts', ['sku'], {
    name: 'uq_inventory_alerts_open_sku',
    unique: true,
    where: "status IN ('active', 'acknowledged')"
  });

  pgm.createTable('forecast_accuracy', {
    sku: { type: 'text', notNull: true },
    forecast_date: { type: 'date', notNull: true },
    days_ahead: { type: 'integer', notNull: true },
    model_type: { type: 'text', notNull: true },
    model_version: { type: 'text', notNull: true },
    metric_date: { type: 'date', notNull: true },
    predicted_quantity: { type: 'numeric(18,4)', notNull: true },
    actual_quantity: { type: 'numeric(18,4)', notNull: true },
    absolute_error: { type: 'numeric(18,4)', notNull: true },
    percentage_error: { type: 'numeric(18,4)', notNull: true },
    squared_error: { type: 'numeric(18,4)', notNull: true },
    created_at: { type: 'timestamptz', notNull: true, default: pgm.func('now()') },
    updated_at: { type: 'timestamptz', notNull: true, default: pgm.func('now()') }
  });
  pgm.addConstraint(
    'forecast_accuracy',
    'pk_forecast_accuracy',
    'PRIMARY KEY (sku, forecast_date, days_ahead, model_type)'
  );
  pgm.createIndex('forecast_accuracy', ['forecast_date'], { name: 'idx_forecast_accuracy_forecast_date' });
}

export async function down(pgm: MigrationBuilder): Promise<void> {
  pgm.dropTable('forecast_accuracy');
  pgm.dropTable('inventory_alerts');
  pgm.dropTable('demand_forecasts');
  pgm.dropTable('external_signals');
}
