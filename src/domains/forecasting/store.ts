import type { IsoDate } from '../../lib/dates';
import type {
  AccuracyRecord,
  AlertStatus,
  DailySales,
  DemandForecastRow,
  ExternalSignal,
  InventoryAlert,
  SignalType,
  SkuProfile
} from './types';

export type SkuPage = {
  after: string | null;
  limit: number;
};

export type SignalLookup = {
  signalType: SignalType;
  signalDate: IsoDate;
  locationCode?: string;
};

export type LatestSignalLookup = {
  signalType: SignalType;
  productCode: string;
  onOrBefore: IsoDate;
};

export type AlertUpsert = Omit<InventoryAlert, 'id' | 'createdAt' | 'updatedAt' | 'resolvedAt'>;

/**
 * Persistence used by the forecasting pipeline. SKU profiles, sales history and
 * stock levels are owned by other systems and only read here.
 */
export interface ForecastStore {
  getSkuProfile(sku: string): Promise<SkuProfile | null>;
  /** Active SKUs ordered by code, strictly after `page.after`. */
  listActiveSkus(page: SkuPage): Promise<string[]>;
  /** Daily rows with `from <= saleDate <= to`, ordered by date ascending. */
  getDailySales(sku: string, from: IsoDate, to: IsoDate): Promise<DailySales[]>;
  /** null when no stock level is recorded for the SKU. */
  getCurrentStock(sku: string): Promise<number | null>;

  findSignal(lookup: SignalLookup): Promise<ExternalSignal | null>;
  findLatestSignal(lookup: LatestSignalLookup): Promise<ExternalSignal | null>;
  upsertSignal(signal: ExternalSignal): Promise<void>;

  saveForecasts(rows: DemandForecastRow[]): Promise<void>;
  /** Copies realized sales onto forecasts for `forecastDate`; returns rows updated. */
  attachActuals(forecastDate: IsoDate): Promise<number>;
  listForecastsWithActuals(forecastDate: IsoDate, limit: number): Promise<DemandForecastRow[]>;

  upsertAccuracy(record: AccuracyRecord): Promise<void>;
  listAccuracy(since: IsoDate): Promise<AccuracyRecord[]>;

  findOpenAlert(sku: string): Promise<InventoryAlert | null>;
  upsertAlert(alert: AlertUpsert): Promise<InventoryAlert>;
  listOpenAlerts(): Promise<InventoryAlert[]>;
  setAlertStatus(sku: string, status: AlertStatus): Promise<InventoryAlert | null>;
}
