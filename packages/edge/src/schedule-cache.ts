/**
 * doorsync Schedule Cache
 *
 * Keeps the store's temp codes and one-time-run schedules in step with the
 * panel. Everything is re-read on an interval (default 5 minutes); the runtime
 * also asks for a targeted refresh right after it creates or deletes an item.
 * Listeners are only told when a list actually changed.
 */

import type { OtrSchedule, TempCode } from '@doorsync/core';
import { createLogger, errorMessage, type Logger } from './edge-logger.js';
import type { DoorStateStore } from './state-store.js';

export interface ScheduleSource {
  listTempCodes(doorId: number): Promise<TempCode[]>;
  listOtrSchedules(): Promise<OtrSchedule[]>;
}

export interface ScheduleCacheConfig {
  source: ScheduleSource;
  store: DoorStateStore;
  /** Doors whose temp codes are tracked. */
  doorIds: () => number[];
  /** Refresh interval in ms. Default: 300000 (5m) */
  refreshMs?: number;
  onTempCodes?: (doorId: number, codes: readonly TempCode[]) => void;
  onOtrSchedules?: (schedules: readonly OtrSchedule[]) => void;
  logger?: Logger;
}

export class ScheduleCache {
  private readonly source: ScheduleSource;
  private readonly store: DoorStateStore;
  private readonly doorIds: () => number[];
  private readonly refreshMs: number;
  private readonly onTempCodes?: (doorId: number, codes: readonly TempCode[]) => void;
  private readonly onOtrSchedules?: (schedules: readonly OtrSchedule[]) => void;
  private readonly log: Logger;

  private intervalHandle: ReturnType<typeof setInterval> | null = null;
  private refreshInFlight: Promise<void> | null = null;
  private lastRefreshAt: Date | null = null;

  constructor(config: ScheduleCacheConfig) {
    this.source = config.source;
    this.store = config.store;
    this.doorIds = config.doorIds;
    this.refreshMs = config.refreshMs ?? 300_000;
    this.onTempCodes = config.onTempCodes;
    this.onOtrSchedules = config.onOtrSchedules;
    this.log = config.logger ?? createLogger('schedule-cache');
  }

  get lastRefreshed(): Date | null {
    return this.lastRefreshAt;
  }

  start(): void {
    if (this.intervalHandle) return;
    this.intervalHandle = setInterval(() => {
      this.refreshAll().catch((err: unknown) => {
        this.log.error({ err: errorMessage(err) }, 'Scheduled refresh failed');
      });
    }, this.refreshMs);
  }

  stop(): void {
    if (this.intervalHandle) {
      clearInterval(this.intervalHandle);
      this.intervalHandle = null;
    }
  }

  /** Re-read every list, joining a full refresh already in flight. */
  refreshAll(): Promise<void> {
    if (!this.refreshInFlight) {
      this.refreshInFlight = this.loadAll().finally(() => {
        this.refreshInFlight = null;
      });
    }
    return this.refreshInFlight;
  }

  /** Re-read one door's temp codes. Returns false when the panel could not be read. */
  async refreshTempCodes(doorId: number): Promise<boolean> {
    try {
      const codes = await this.source.listTempCodes(doorId);
      this.storeTempCodes(doorId, codes);
      return true;
    } catch (err: unknown) {
      this.log.warn({ doorId, err: errorMessage(err) }, 'Temp code refresh failed');
      return false;
    }
  }

  async refreshOtrSchedules(): Promise<boolean> {
    try {
      const schedules = await this.source.listOtrSchedules();
      this.storeOtrSchedules(schedules);
      return true;
    } catch (err: unknown) {
      this.log.warn({ err: errorMessage(err) }, 'One-time-run refresh failed');
      return false;
    }
  }

  // ---------- Internal helpers ----------

  private async loadAll(): Promise<void> {
    const doorIds = this.doorIds();
    const results = await Promise.all([
      this.refreshOtrSchedules(),
      ...doorIds.map((doorId) => this.refreshTempCodes(doorId)),
    ]);
    this.lastRefreshAt = new Date();
    this.log.debug(
      { doors: doorIds.length, failed: results.filter((ok) => !ok).length },
      'Schedule cache refreshed',
    );
  }

  private storeTempCodes(doorId: number, codes: TempCode[]): void {
    const previous = this.store.getTempCodes(doorId);
    const next = this.store.setTempCodes(doorId, codes);
    if (JSON.stringify(previous) !== JSON.stringify(next)) {
      this.onTempCodes?.(doorId, next);
    }
  }

  private storeOtrSchedules(schedules: OtrSchedule[]): void {
    const previous = this.store.getOtrSchedules();
    const next = this.store.setOtrSchedules(schedules);
    if (JSON.stringify(previous) !== JSON.stringify(next)) {
      this.onOtrSchedules?.(next);
    }
  }
}
