import { v4 as uuidv4 } from 'uuid';
import type { IsoDate } from '../lib/dates';
import type {
  AlertUpsert,
  ForecastStore,
  LatestSignalLookup,
  SignalLookup,
  SkuPage
} from '../domains/forecasting/store';
import type {
  AccuracyRecord,
  AlertStatus,
  DailySales,
  DemandForecastRow,
  ExternalSignal,
  InventoryAlert,
  SkuProfile
} from '../domains/forecasting/types';

type StoreMethod = keyof ForecastStore;

function signalKey(signal: Pick<ExternalSignal, 'signalType' | 'locationCode' | 'productCode' | 'signalDate'>): string {
  return [signal.signalType, signal.locationCode, signal.productCode, signal.signalDate].join('|');
}

function accuracyKey(record: Pick<AccuracyRecord, 'sku' | 'forecastDate' | 'daysAhead' | 'modelType'>): string {
  return [record.sku, record.forecastDate, record.daysAhead, record.modelType].join('|');
}

const isOpen = (alert: InventoryAlert) => alert.status === 'active' || alert.status === 'acknowledged';

/**
 * In-process ForecastStore for tests. `failOn` makes a method reject until
 * `clearFailures` is called.
 */
export class MemoryForecastStore implements ForecastStore {
  readonly profiles = new Map<string, SkuProfile>();
  readonly sales: DailySales[] = [];
  readonly stock = new Map<string, number>();
  readonly signals = new Map<string, ExternalSignal>();
  readonly forecasts: DemandForecastRow[] = [];
  readonly accuracy = new Map<string, AccuracyRecord>();
  readonly alerts: InventoryAlert[] = [];
  readonly calls: StoreMethod[] = [];

  private readonly failures = new Map<StoreMethod, Error>();

  constructor(private readonly now: () => Date = () => new Date('2026-03-10T08:00:00.000Z')) {}

  addSku(profile: Partial<SkuProfile> & { sku: string }): this {
    this.profiles.set(profile.sku, {
      category: null,
      launchedOn: null,
      unitPrice: null,
      isActive: true,
      ...profile
    });
    return this;
  }

  addSales(sku: string, entries: Array<[IsoDate, number]>): this {
    for (const [saleDate, quantity] of entries) {
      this.sales.push({ sku, saleDate, quantity });
    }
    return this;
  }

  setStock(sku: string, quantity: number): this {
    this.stock.set(sku, quantity);
    return this;
  }

  failOn(method: StoreMethod, error: Error = new Error(`${method} unavailable`)): this {
    this.failures.set(method, error);
    return this;
  }

  clearFailures(): void {
    this.failures.clear();
  }

  private enter(method: StoreMethod): void {
    this.calls.push(method);
    const failure = this.failures.get(method);
    if (failure) throw failure;
  }

  async getSkuProfile(sku: string): Promise<SkuProfile | null> {
    this.enter('getSkuProfile');
    return this.profiles.get(sku) ?? null;
  }

  async listActiveSkus(page: SkuPage): Promise<string[]> {
    this.enter('listActiveSkus');
    return [...this.profiles.values()]
      .filter((profile) => profile.isActive)
      .map((profile) => profile.sku)
      .sort()
      .filter((sku) => page.after === null || sku > page.after)
      .slice(0, page.limit);
  }

  async getDailySales(sku: string, from: IsoDate, to: IsoDate): Promise<DailySales[]> {
    this.enter('getDailySales');
    return this.sales
      .filter((row) => row.sku === sku && row.saleDate >= from && row.saleDate <= to)
      .sort((a, b) => a.saleDate.localeCompare(b.saleDate));
  }

  async getCurrentStock(sku: string): Promise<number | null> {
    this.enter('getCurrentStock');
    return this.stock.get(sku) ?? null;
  }

  async findSignal(lookup: SignalLookup): Promise<ExternalSignal | null> {
    this.enter('findSignal');
    for (const signal of this.signals.values()) {
      if (
        signal.signalType === lookup.signalType &&
        signal.signalDate === lookup.signalDate &&
        (lookup.locationCode === undefined || signal.locationCode === lookup.locationCode)
      ) {
        return signal;
      }
    }
    return null;
  }

  async findLatestSignal(lookup: LatestSignalLookup): Promise<ExternalSignal | null> {
    this.enter('findLatestSignal');
    const matches = [...this.signals.values()]
      .filter(
        (signal) =>
          signal.signalType === lookup.signalType &&
          signal.productCode === lookup.productCode &&
          signal.signalDate <= lookup.onOrBefore
      )
      .sort((a, b) => b.signalDate.localeCompare(a.signalDate));
    return matches[0] ?? null;
  }

  async upsertSignal(signal: ExternalSignal): Promise<void> {
    this.enter('upsertSignal');
    this.signals.set(signalKey(signal), signal);
  }

  async saveForecasts(rows: DemandForecastRow[]): Promise<void> {
    this.enter('saveForecasts');
    this.forecasts.push(...rows.map((row) => ({ ...row })));
  }

  async attachActuals(forecastDate: IsoDate): Promise<number> {
    this.enter('attachActuals');
    let updated = 0;
    for (const row of this.forecasts) {
      if (row.forecastDate !== forecastDate) continue;
      const actual = this.sales.find((sale) => sale.sku === row.sku && sale.saleDate === forecastDate);
      if (!actual) continue;
      row.actualQuantity = actual.quantity;
      updated += 1;
    }
    return updated;
  }

  async listForecastsWithActuals(forecastDate: IsoDate, limit: number): Promise<DemandForecastRow[]> {
    this.enter('listForecastsWithActuals');
    const latest = new Map<string, DemandForecastRow>();
    for (const row of this.forecasts) {
      if (row.forecastDate !== forecastDate || row.actualQuantity === null) continue;
      const key = [row.sku, row.daysAhead, row.modelType].join('|');
      const current = latest.get(key);
      if (!current || row.generatedAt > current.generatedAt) latest.set(key, row);
    }
    return [...latest.values()]
      .sort((a, b) => a.sku.localeCompare(b.sku) || a.daysAhead - b.daysAhead)
      .slice(0, limit);
  }

  async upsertAccuracy(record: AccuracyRecord): Promise<void> {
    this.enter('upsertAccuracy');
    this.accuracy.set(accuracyKey(record), record);
  }

  async listAccuracy(since: IsoDate): Promise<AccuracyRecord[]> {
    this.enter('listAccuracy');
    return [...this.accuracy.values()].filter((record) => record.forecastDate >= since);
  }

  async findOpenAlert(sku: string): Promise<InventoryAlert | null> {
    this.enter('findOpenAlert');
    return this.alerts.find((alert) => alert.sku === sku && isOpen(alert)) ?? null;
  }

  async upsertAlert(alert: AlertUpsert): Promise<InventoryAlert> {
    this.enter('upsertAlert');
    const timestamp = this.now().toISOString();
    const resolvedAt = alert.status === 'resolved' ? timestamp : null;
    const existing = this.alerts.find((candidate) => candidate.sku === alert.sku && isOpen(candidate));
    if (existing) {
      Object.assign(existing, alert, { updatedAt: timestamp, resolvedAt });
      return { ...existing };
    }
    const created: InventoryAlert = { ...alert, id: uuidv4(), createdAt: timestamp, updatedAt: timestamp, resolvedAt };
    this.alerts.push(created);
    return { ...created };
  }

  async listOpenAlerts(): Promise<InventoryAlert[]> {
    this.enter('listOpenAlerts');
    return this.alerts.filter(isOpen).map((alert) => ({ ...alert }));
  }

  async setAlertStatus(sku: string, status: AlertStatus): Promise<InventoryAlert | null> {
    this.enter('setAlertStatus');
    const existing = this.alerts.find((alert) => alert.sku === sku && isOpen(alert));
    if (!existing) return null;
    existing.status = status;
    existing.updatedAt = this.now().toISOString();
    if (status === 'resolved') existing.resolvedAt = existing.updatedAt;
    return { ...existing };
  }
}
