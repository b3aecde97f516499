/**
 * Categorizer: attaches the amount band and defaults the lookup names.
 * Pure; never touches the store.
 */
import type { CategorizedRecord, CleanRecord } from "../core/types.js";
import { UNCATEGORIZED, UNKNOWN_TYPE } from "./cleaning.js";

/** A closed interval of cents; `maxCents: null` is the open top band. */
export interface AmountBand {
  name: string;
  minCents: number;
  maxCents: number | null;
}

/** Mirrors the seeded `amount_categories` rows. */
export const DEFAULT_AMOUNT_BANDS: readonly AmountBand[] = [
  { name: "low", minCents: 0, maxCents: 4_999 },
  { name: "medium", minCents: 5_000, maxCents: 20_000 },
  { name: "high", minCents: 20_001, maxCents: null },
];

/**
 * Ordered bands partitioning [0, ∞) at cent precision: the first starts at
 * zero, each next one starts one cent after the previous ends, and only the
 * last is open-ended.
 */
export class AmountBands {
  readonly bands: readonly AmountBand[];

  constructor(bands: readonly AmountBand[] = DEFAULT_AMOUNT_BANDS) {
    AmountBands.assertPartition(bands);
    this.bands = bands;
  }

  static assertPartition(bands: readonly AmountBand[]): void {
    if (bands.length === 0) throw new RangeError("at least one amount band is required");
    if (bands[0].minCents !== 0) {
      throw new RangeError(`first band "${bands[0].name}" must start at 0`);
    }
    bands.forEach((band, i) => {
      const last = i === bands.length - 1;
      if (band.maxCents === null) {
        if (!last) throw new RangeError(`only the last band may be open-ended, not "${band.name}"`);
        return;
      }
      if (last) throw new RangeError(`last band "${band.name}" must be open-ended`);
      if (band.maxCents < band.minCents) {
        throw new RangeError(`band "${band.name}" ends before it starts`);
      }
      const next = bands[i + 1];
      if (next.minCents !== band.maxCents + 1) {
        throw new RangeError(`bands "${band.name}" and "${next.name}" are not contiguous`);
      }
    });
  }

  /** Every band containing `cents`. A valid partition always yields one. */
  matching(cents: number): AmountBand[] {
    return this.bands.filter(
      (b) => cents >= b.minCents && (b.maxCents === null || cents <= b.maxCents),
    );
  }

  bandFor(cents: number): AmountBand {
    if (!Number.isInteger(cents) || cents < 0) {
      throw new RangeError(`no amount band for ${cents} cents`);
    }
    // Last band starting at or below the amount; the partition makes it the only match.
    for (let i = this.bands.length - 1; i >= 0; i--) {
      if (this.bands[i].minCents <= cents) return this.bands[i];
    }
    throw new RangeError(`no amount band for ${cents} cents`);
  }

  byName(name: string): AmountBand {
    const band = this.bands.find((b) => b.name === name);
    if (!band) throw new RangeError(`unknown amount band "${name}"`);
    return band;
  }
}

export class Categorizer {
  private bands: AmountBands;

  constructor(bands: AmountBands = new AmountBands()) {
    this.bands = bands;
  }

  categorize(record: CleanRecord): CategorizedRecord {
    return {
      ...record,
      transactionType: record.transactionType.trim() || UNKNOWN_TYPE,
      spendCategory: record.spendCategory.trim() || UNCATEGORIZED,
      amountCategory: this.bands.bandFor(record.amountCents).name,
    };
  }

  categorizeAll(records: CleanRecord[]): CategorizedRecord[] {
    return records.map((r) => this.categorize(r));
  }
}
