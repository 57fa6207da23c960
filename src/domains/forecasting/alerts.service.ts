import { isPositiveFinite, roundTo, sum } from '../../lib/numbers';
import type { ForecastStore } from './store';
import type { AlertSeverity, AlertType, ForecastResult, InventoryAlert } from './types';

export type AlertInputs = {
  currentStock: number;
  daysUntilStockout: number;
  avgDailyDemand: number;
};

export type AlertEvaluation = {
  alertType: AlertType;
  severity: AlertSeverity;
};

const CRITICAL_DAYS = 3;
const WARNING_DAYS = 7;
const INFO_DEMAND_COVER = 1.5;

export function evaluateAlert(inputs: AlertInputs): AlertEvaluation | null {
  if (inputs.daysUntilStockout < CRITICAL_DAYS) {
    return { alertType: 'stockout_warning', severity: 'critical' };
  }
  if (inputs.daysUntilStockout < WARNING_DAYS) {
    return { alertType: 'low_stock', severity: 'warning' };
  }
  if (inputs.currentStock < inputs.avgDailyDemand * INFO_DEMAND_COVER) {
    return { alertType: 'low_stock', severity: 'info' };
  }
  return null;
}

/** null when the forecast carries no stock level. */
export function alertInputsFromForecast(result: ForecastResult): AlertInputs | null {
  if (result.currentStock === null) return null;
  const firstWeek = result.forecasts.slice(0, 7).map((day) => day.predictedQuantity);
  return {
    currentStock: result.currentStock,
    daysUntilStockout: result.daysUntilStockout,
    avgDailyDemand: sum(firstWeek) / 7
  };
}

export type AlertAction = 'opened' | 'updated' | 'resolved' | 'unchanged' | 'skipped';

export type AlertTransition = {
  sku: string;
  action: AlertAction;
  alert: InventoryAlert | null;
};

export type Recommendation = {
  sku: string;
  alertType: AlertType;
  severity: AlertSeverity;
  status: InventoryAlert['status'];
  currentStock: number;
  daysUntilStockout: number;
  predictedDailyDemand: number;
  recommendedReorderQuantity: number;
  unitPrice: number;
  estimatedCost: number;
};

export type RecommendationSummary = {
  recommendations: Recommendation[];
  totalEstimatedCost: number;
  counts: Record<AlertSeverity, number>;
};

const SEVERITY_RANK: Record<AlertSeverity, number> = {
  critical: 0,
  warning: 1,
  info: 2
};

export function compareAlertPriority(
  a: Pick<InventoryAlert, 'severity' | 'daysUntilStockout' | 'sku'>,
  b: Pick<InventoryAlert, 'severity' | 'daysUntilStockout' | 'sku'>
): number {
  return (
    SEVERITY_RANK[a.severity] - SEVERITY_RANK[b.severity] ||
    a.daysUntilStockout - b.daysUntilStockout ||
    a.sku.localeCompare(b.sku)
  );
}

export type AlertServiceOptions = {
  defaultUnitPrice: number;
};

export class AlertService {
  constructor(
    private readonly store: ForecastStore,
    private readonly options: AlertServiceOptions
  ) {}

  /**
   * Opens, updates or resolves the SKU's alert for a fresh forecast. An
   * acknowledged alert stays acknowledged only while its severity holds.
   */
  async applyForecast(result: ForecastResult): Promise<AlertTransition> {
    const inputs = alertInputsFromForecast(result);
    if (!inputs) {
      return { sku: result.sku, action: 'skipped', alert: null };
    }

    const evaluation = evaluateAlert(inputs);
    const existing = await this.store.findOpenAlert(result.sku);

    if (!evaluation) {
      if (!existing) {
        return { sku: result.sku, action: 'unchanged', alert: null };
      }
      const resolved = await this.store.upsertAlert({
        sku: existing.sku,
        alertType: existing.alertType,
        severity: existing.severity,
        status: 'resolved',
        currentStock: inputs.currentStock,
        predictedDailyDemand: roundTo(inputs.avgDailyDemand, 2),
        daysUntilStockout: inputs.daysUntilStockout,
        recommendedReorderQuantity: result.recommendedReorderQuantity
      });
      return { sku: result.sku, action: 'resolved', alert: resolved };
    }

    const keepAcknowledged = existing?.status === 'acknowledged' && existing.severity === evaluation.severity;
    const alert = await this.store.upsertAlert({
      sku: result.sku,
      alertType: evaluation.alertType,
      severity: evaluation.severity,
      status: keepAcknowledged ? 'acknowledged' : 'active',
      currentStock: inputs.currentStock,
      predictedDailyDemand: roundTo(inputs.avgDailyDemand, 2),
      daysUntilStockout: inputs.daysUntilStockout,
      recommendedReorderQuantity: result.recommendedReorderQuantity
    });
    return { sku: result.sku, action: existing ? 'updated' : 'opened', alert };
  }

  async acknowledge(sku: string): Promise<InventoryAlert | null> {
    return this.store.setAlertStatus(sku, 'acknowledged');
  }

  async listOpenAlerts(): Promise<InventoryAlert[]> {
    const alerts = await this.store.listOpenAlerts();
    return [...alerts].sort(compareAlertPriority);
  }

  async getRecommendations(): Promise<RecommendationSummary> {
    const alerts = await this.listOpenAlerts();
    const counts: Record<AlertSeverity, number> = { critical: 0, warning: 0, info: 0 };
    const recommendations: Recommendation[] = [];

    for (const alert of alerts) {
      counts[alert.severity] += 1;
      const profile = await this.store.getSkuProfile(alert.sku);
      const unitPrice = profile && isPositiveFinite(profile.unitPrice) ? profile.unitPrice : this.options.defaultUnitPrice;
      recommendations.push({
        sku: alert.sku,
        alertType: alert.alertType,
        severity: alert.severity,
        status: alert.status,
        currentStock: alert.currentStock,
        daysUntilStockout: alert.daysUntilStockout,
        predictedDailyDemand: alert.predictedDailyDemand,
        recommendedReorderQuantity: alert.recommendedReorderQuantity,
        unitPrice,
        estimatedCost: roundTo(alert.recommendedReorderQuantity * unitPrice, 2)
      });
    }

    return {
      recommendations,
      totalEstimatedCost: roundTo(sum(recommendations.map((entry) => entry.estimatedCost)), 2),
      counts
    };
  }
}
