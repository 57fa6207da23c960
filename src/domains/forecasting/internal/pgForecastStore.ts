import type { PoolClient } from 'pg';
import { v4 as uuidv4 } from 'uuid';
import { query, withTransaction } from '../../../db';
import type { IsoDate } from '../../../lib/dates';
import type { AlertUpsert, ForecastStore, LatestSignalLookup, SignalLookup, SkuPage } from '../store';
import type {
  AccuracyRecord,
  AlertSeverity,
  AlertStatus,
  AlertType,
  DailySales,
  DemandForecastRow,
  ExternalSignal,
  InventoryAlert,
  SignalType,
  SkuProfile
} from '../types';

type SkuProfileRow = {
  sku: string;
  category: string | null;
  launch_date: string | null;
  unit_price: number | null;
  is_active: boolean;
};

type DailySalesRow = {
  sku: string;
  sale_date: string;
  quantity: number;
};

type SignalRow = {
  signal_type: SignalType;
  location_code: string;
  product_code: string;
  signal_date: string;
  value: number | null;
  payload: Record<string, unknown> | null;
  source: string;
};

type ForecastRow = {
  run_id: string;
  sku: string;
  forecast_date: string;
  days_ahead: number;
  predicted_quantity: number;
  lower_bound: number;
  upper_bound: number;
  model_type: string;
  model_version: string;
  factors: string[] | null;
  degraded: boolean;
  generated_at: Date;
  actual_quantity: number | null;
};

type AccuracyRow = {
  sku: string;
  forecast_date: string;
  days_ahead: number;
  model_type: string;
  model_version: string;
  metric_date: string;
  predicted_quantity: number;
  actual_quantity: number;
  absolute_error: number;
  percentage_error: number;
  squared_error: number;
};

type AlertRow = {
  id: string;
  sku: string;
  alert_type: AlertType;
  severity: AlertSeverity;
  status: AlertStatus;
  current_stock: number;
  predicted_daily_demand: number;
  days_until_stockout: number;
  recommended_reorder_quantity: number;
  created_at: Date;
  updated_at: Date;
  resolved_at: Date | null;
};

const SIGNAL_COLUMNS = 'signal_type, location_code, product_code, signal_date, value, payload, source';
const FORECAST_COLUMNS = `run_id, sku, forecast_date, days_ahead, predicted_quantity, lower_bound, upper_bound,
       model_type, model_version, factors, degraded, generated_at, actual_quantity`;
const ACCURACY_COLUMNS = `sku, forecast_date, days_ahead, model_type, model_version, metric_date,
       predicted_quantity, actual_quantity, absolute_error, percentage_error, squared_error`;
const ALERT_COLUMNS = `id, sku, alert_type, severity, status, current_stock, predicted_daily_demand,
       days_until_stockout, recommended_reorder_quantity, created_at, updated_at, resolved_at`;

function mapSkuProfile(row: SkuProfileRow): SkuProfile {
  return {
    sku: row.sku,
    category: row.category,
    launchedOn: row.launch_date,
    unitPrice: row.unit_price,
    isActive: row.is_active
  };
}

function mapSignal(row: SignalRow): ExternalSignal {
  return {
    signalType: row.signal_type,
    locationCode: row.location_code,
    productCode: row.product_code,
    signalDate: row.signal_date,
    value: row.value,
    payload: row.payload ?? {},
    source: row.source
  };
}

function mapForecast(row: ForecastRow): DemandForecastRow {
  return {
    runId: row.run_id,
    sku: row.sku,
    forecastDate: row.forecast_date,
    daysAhead: row.days_ahead,
    predictedQuantity: row.predicted_quantity,
    lowerBound: row.lower_bound,
    upperBound: row.upper_bound,
    modelType: row.model_type,
    modelVersion: row.model_version,
    factors: row.factors ?? [],
    degraded: row.degraded,
    generatedAt: row.generated_at.toISOString(),
    actualQuantity: row.actual_quantity
  };
}

function mapAccuracy(row: AccuracyRow): AccuracyRecord {
  return {
    sku: row.sku,
    forecastDate: row.forecast_date,
    daysAhead: row.days_ahead,
    modelType: row.model_type,
    modelVersion: row.model_version,
    metricDate: row.metric_date,
    predictedQuantity: row.predicted_quantity,
    actualQuantity: row.actual_quantity,
    absoluteError: row.absolute_error,
    percentageError: row.percentage_error,
    squaredError: row.squared_error
  };
}

function mapAlert(row: AlertRow): InventoryAlert {
  return {
    id: row.id,
    sku: row.sku,
    alertType: row.alert_type,
    severity: row.severity,
    status: row.status,
    currentStock: row.current_stock,
    predictedDailyDemand: row.predicted_daily_demand,
    daysUntilStockout: row.days_until_stockout,
    recommendedReorderQuantity: row.recommended_reorder_quantity,
    createdAt: row.created_at.toISOString(),
    updatedAt: row.updated_at.toISOString(),
    resolvedAt: row.resolved_at ? row.resolved_at.toISOString() : null
  };
}

/**
 * ForecastStore over PostgreSQL. product_variants, historical_sales_daily and
 * inventory_levels are maintained by the order and inventory systems.
 */
export class PgForecastStore implements ForecastStore {
  async getSkuProfile(sku: string): Promise<SkuProfile | null> {
    const { rows } = await query<SkuProfileRow>(
      `SELECT sku, category, launch_date, unit_price, is_active
         FROM product_variants
        WHERE sku = $1`,
      [sku]
    );
    return rows[0] ? mapSkuProfile(rows[0]) : null;
  }

  async listActiveSkus(page: SkuPage): Promise<string[]> {
    const { rows } = await query<{ sku: string }>(
      `SELECT sku
         FROM product_variants
        WHERE is_active = true
          AND ($1::text IS NULL OR sku > $1)
        ORDER BY sku
        LIMIT $2`,
      [page.after, page.limit]
    );
    return rows.map((row) => row.sku);
  }

  async getDailySales(sku: string, from: IsoDate, to: IsoDate): Promise<DailySales[]> {
    const { rows } = await query<DailySalesRow>(
      `SELECT sku, sale_date, quantity
         FROM historical_sales_daily
        WHERE sku = $1
          AND sale_date BETWEEN $2 AND $3
        ORDER BY sale_date`,
      [sku, from, to]
    );
    return rows.map((row) => ({ sku: row.sku, saleDate: row.sale_date, quantity: row.quantity }));
  }

  async getCurrentStock(sku: string): Promise<number | null> {
    const { rows } = await query<{ quantity: number }>('SELECT quantity FROM inventory_levels WHERE sku = $1', [sku]);
    return rows[0]?.quantity ?? null;
  }

  async findSignal(lookup: SignalLookup): Promise<ExternalSignal | null> {
    const { rows } = await query<SignalRow>(
      `SELECT ${SIGNAL_COLUMNS}
         FROM external_signals
        WHERE signal_type = $1
          AND signal_date = $2
          AND ($3::text IS NULL OR location_code = $3)
        ORDER BY updated_at DESC
        LIMIT 1`,
      [lookup.signalType, lookup.signalDate, lookup.locationCode ?? null]
    );
    return rows[0] ? mapSignal(rows[0]) : null;
  }

  async findLatestSignal(lookup: LatestSignalLookup): Promise<ExternalSignal | null> {
    const { rows } = await query<SignalRow>(
      `SELECT ${SIGNAL_COLUMNS}
         FROM external_signals
        WHERE signal_type = $1
          AND product_code = $2
          AND signal_date <= $3
        ORDER BY signal_date DESC, updated_at DESC
        LIMIT 1`,
      [lookup.signalType, lookup.productCode, lookup.onOrBefore]
    );
    return rows[0] ? mapSignal(rows[0]) : null;
  }

  async upsertSignal(signal: ExternalSignal): Promise<void> {
    await query(
      `INSERT INTO external_signals (id, ${SIGNAL_COLUMNS}, created_at, updated_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, now(), now())
       ON CONFLICT (signal_type, location_code, product_code, signal_date)
       DO UPDATE SET value = EXCLUDED.value,
                     payload = EXCLUDED.payload,
                     source = EXCLUDED.source,
                     updated_at = now()`,
      [
        uuidv4(),
        signal.signalType,
        signal.locationCode,
        signal.productCode,
        signal.signalDate,
        signal.value,
        JSON.stringify(signal.payload),
        signal.source
      ]
    );
  }

  async saveForecasts(rows: DemandForecastRow[]): Promise<void> {
    if (rows.length === 0) return;
    await withTransaction(async (client) => {
      for (const row of rows) {
        await insertForecast(client, row);
      }
    });
  }

  async attachActuals(forecastDate: IsoDate): Promise<number> {
    const result = await query(
      `UPDATE demand_forecasts f
          SET actual_quantity = h.quantity
         FROM historical_sales_daily h
        WHERE f.forecast_date = $1
          AND h.sku = f.sku
          AND h.sale_date = f.forecast_date`,
      [forecastDate]
    );
    return result.rowCount ?? 0;
  }

  async listForecastsWithActuals(forecastDate: IsoDate, limit: number): Promise<DemandForecastRow[]> {
    const { rows } = await query<ForecastRow>(
      `SELECT DISTINCT ON (sku, days_ahead, model_type) ${FORECAST_COLUMNS}
         FROM demand_forecasts
        WHERE forecast_date = $1
          AND actual_quantity IS NOT NULL
        ORDER BY sku, days_ahead, model_type, generated_at DESC
        LIMIT $2`,
      [forecastDate, limit]
    );
    return rows.map(mapForecast);
  }

  async upsertAccuracy(record: AccuracyRecord): Promise<void> {
    await query(
      `INSERT INTO forecast_accuracy (${ACCURACY_COLUMNS}, created_at, updated_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, now(), now())
       ON CONFLICT (sku, forecast_date, days_ahead, model_type)
       DO UPDATE SET model_version = EXCLUDED.model_version,
                     metric_date = EXCLUDED.metric_date,
                     predicted_quantity = EXCLUDED.predicted_quantity,
                     actual_quantity = EXCLUDED.actual_quantity,
                     absolute_error = EXCLUDED.absolute_error,
                     percentage_error = EXCLUDED.percentage_error,
                     squared_error = EXCLUDED.squared_error,
                     updated_at = now()`,
      [
        record.sku,
        record.forecastDate,
        record.daysAhead,
        record.modelType,
        record.modelVersion,
        record.metricDate,
        record.predictedQuantity,
        record.actualQuantity,
        record.absoluteError,
        record.percentageError,
        record.squaredError
      ]
    );
  }

  async listAccuracy(since: IsoDate): Promise<AccuracyRecord[]> {
    const { rows } = await query<AccuracyRow>(
      `SELECT ${ACCURACY_COLUMNS}
         FROM forecast_accuracy
        WHERE forecast_date >= $1
        ORDER BY forecast_date, sku, days_ahead`,
      [since]
    );
    return rows.map(mapAccuracy);
  }

  async findOpenAlert(sku: string): Promise<InventoryAlert | null> {
    const { rows } = await query<AlertRow>(
      `SELECT ${ALERT_COLUMNS}
         FROM inventory_alerts
        WHERE sku = $1
          AND status IN ('active', 'acknowledged')`,
      [sku]
    );
    return rows[0] ? mapAlert(rows[0]) : null;
  }

  async upsertAlert(alert: AlertUpsert): Promise<InventoryAlert> {
    return withTransaction(async (client) => {
      const existing = await client.query<{ id: string }>(
        `SELECT id
           FROM inventory_alerts
          WHERE sku = $1
            AND status IN ('active', 'acknowledged')
          FOR UPDATE`,
        [alert.sku]
      );
      const values = [
        alert.alertType,
        alert.severity,
        alert.status,
        alert.currentStock,
        alert.predictedDailyDemand,
        alert.daysUntilStockout,
        alert.recommendedReorderQuantity
      ];

      if (existing.rows[0]) {
        const { rows } = await client.query<AlertRow>(
          `UPDATE inventory_alerts
              SET alert_type = $2,
                  severity = $3,
                  status = $4,
                  current_stock = $5,
                  predicted_daily_demand = $6,
                  days_until_stockout = $7,
                  recommended_reorder_quantity = $8,
                  updated_at = now(),
                  resolved_at = CASE WHEN $4 = 'resolved' THEN now() ELSE NULL END
            WHERE id = $1
            RETURNING ${ALERT_COLUMNS}`,
          [existing.rows[0].id, ...values]
        );
        return mapAlert(rows[0]);
      }

      const { rows } = await client.query<AlertRow>(
        `INSERT INTO inventory_alerts (id, sku, alert_type, severity, status, current_stock, predicted_daily_demand,
                                       days_until_stockout, recommended_reorder_quantity, created_at, updated_at,
                                       resolved_at)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, now(), now(), CASE WHEN $5 = 'resolved' THEN now() ELSE NULL END)
         RETURNING ${ALERT_COLUMNS}`,
        [uuidv4(), alert.sku, ...values]
      );
      return mapAlert(rows[0]);
    });
  }

  async listOpenAlerts(): Promise<InventoryAlert[]> {
    const { rows } = await query<AlertRow>(
      `SELECT ${ALERT_COLUMNS}
         FROM inventory_alerts
        WHERE status IN ('active', 'acknowledged')
        ORDER BY sku`
    );
    return rows.map(mapAlert);
  }

  async setAlertStatus(sku: string, status: AlertStatus): Promise<InventoryAlert | null> {
    const { rows } = await query<AlertRow>(
      `UPDATE inventory_alerts
          SET status = $2,
              updated_at = now(),
              resolved_at = CASE WHEN $2 = 'resolved' THEN now() ELSE resolved_at END
        WHERE sku = $1
          AND status IN ('active', 'acknowledged')
        RETURNING ${ALERT_COLUMNS}`,
      [sku, status]
    );
    return rows[0] ? mapAlert(rows[0]) : null;
  }
}

async function insertForecast(client: PoolClient, row: DemandForecastRow): Promise<void> {
  await client.query(
    `INSERT INTO demand_forecasts (id, ${FORECAST_COLUMNS})
     VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14)`,
    [
      uuidv4(),
      row.runId,
      row.sku,
      row.forecastDate,
      row.daysAhead,
      row.predictedQuantity,
      row.lowerBound,
      row.upperBound,
      row.modelType,
      row.modelVersion,
      JSON.stringify(row.factors),
      row.degraded,
      row.generatedAt,
      row.actualQuantity
    ]
  );
}
