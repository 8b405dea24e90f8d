import { parseTimestamp } from '../utils/timeUtils';

/**
 * Per-station high-water marks for one source.
 *
 * A station admits an observation only when it has no mark yet or the observation is
 * strictly newer than the mark. Re-fetching an overlap window therefore admits nothing
 * that was already accepted, while late arrivals newer than their own station's mark still get in.
 *
 * Marks are kept as the strings read from the checkpoint and only rewritten when they advance.
 */
export class WatermarkTracker {
  private readonly stations: Map<string, string>;
  private readonly parsed: Map<string, Date | null> = new Map();
  private global: Date | null;

  constructor(perStation: Record<string, string> = {}, globalWatermark: Date | null = null) {
    this.stations = new Map(Object.entries(perStation));
    this.global = globalWatermark;
  }

  /**
   * Current mark for a station, or null if the station is new (or its stored mark is unreadable)
   */
  watermarkFor(stationId: string): Date | null {
    if (this.parsed.has(stationId)) {
      return this.parsed.get(stationId) ?? null;
    }
    const value = parseTimestamp(this.stations.get(stationId));
    this.parsed.set(stationId, value);
    return value;
  }

  admits(stationId: string, observedAt: Date): boolean {
    const current = this.watermarkFor(stationId);
    return current === null || observedAt.getTime() > current.getTime();
  }

  /**
   * Move the station mark, and the source-wide mark, forward to observedAt.
   * Never moves either backwards.
   */
  advance(stationId: string, observedAt: Date): void {
    const current = this.watermarkFor(stationId);
    if (current === null || observedAt.getTime() > current.getTime()) {
      this.stations.set(stationId, observedAt.toISOString());
      this.parsed.set(stationId, observedAt);
    }
    this.raiseGlobal(observedAt);
  }

  /** Raise the source-wide mark without touching any station */
  raiseGlobal(instant: Date): void {
    if (this.global === null || instant.getTime() > this.global.getTime()) {
      this.global = instant;
    }
  }

  get globalWatermark(): Date | null {
    return this.global;
  }

  get stationsTracked(): number {
    return this.stations.size;
  }

  toPerStation(): Record<string, string> {
    return Object.fromEntries(this.stations);
  }
}
