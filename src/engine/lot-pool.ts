import Decimal from "decimal.js";
import {
  FlagKind,
  LotOrigin,
  type ConsumeResult,
  type ConsumedSegment,
  type LedgerFlag,
  type Lot,
  type LotSnapshot,
  type SeedLot,
} from "@/engine/types";
import { getLogger } from "@/lib/logger";

export class LotQueueError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "LotQueueError";
  }
}

// Fully consumed lots stay in the array behind `head` until this many pile up.
const COMPACT_THRESHOLD = 256;

/**
 * Ordered inventory for one asset. Lots are consumed from the head and
 * appended at the tail; seeds arrive sorted and input is chronological, so
 * insertion order is acquisition order.
 */
export class AssetLotQueue {
  private lots: Lot[] = [];
  private head = 0;
  private total = new Decimal(0);
  private active = false;

  constructor(readonly asset: string) {}

  /** True once anything has been seeded, pushed or consumed. */
  hasActivity(): boolean {
    return this.active;
  }

  seed(lots: Lot[]): void {
    if (this.active) {
      throw new LotQueueError(
        `Cannot seed ${this.asset}: queue already has activity`,
      );
    }
    for (const lot of lots) {
      this.append(lot);
    }
    this.active = true;
  }

  push(lot: Lot): void {
    this.append(lot);
    this.active = true;
  }

  consume(quantity: Decimal): ConsumeResult {
    if (quantity.isNegative()) {
      throw new LotQueueError(
        `Cannot consume a negative quantity of ${this.asset}: ${quantity.toString()}`,
      );
    }
    this.active = true;

    const segments: ConsumedSegment[] = [];
    let remaining = quantity;

    while (remaining.gt(0) && this.head < this.lots.length) {
      const lot = this.lots[this.head];
      const take = Decimal.min(lot.quantity, remaining);

      segments.push({
        lotId: lot.id,
        quantity: take,
        unitCostBasisUsd: lot.unitCostBasisUsd,
        acquisitionDate: lot.acquisitionDate,
      });

      // Split in place: the head keeps its id, date and unit basis.
      lot.quantity = lot.quantity.minus(take);
      remaining = remaining.minus(take);
      if (lot.quantity.isZero()) {
        this.head++;
      }
    }

    const consumed = quantity.minus(remaining);
    this.total = this.total.minus(consumed);
    this.compact();

    return {
      segments,
      consumed,
      shortfall: remaining,
      insufficient: remaining.gt(0),
    };
  }

  totalQuantity(): Decimal {
    return this.total;
  }

  getLots(): Lot[] {
    return this.lots.slice(this.head).map((lot) => ({ ...lot }));
  }

  private append(lot: Lot): void {
    if (lot.asset !== this.asset) {
      throw new LotQueueError(
        `Lot ${lot.id} is ${lot.asset}, queue holds ${this.asset}`,
      );
    }
    this.lots.push({ ...lot });
    this.total = this.total.plus(lot.quantity);
  }

  private compact(): void {
    if (this.head >= COMPACT_THRESHOLD && this.head * 2 >= this.lots.length) {
      this.lots = this.lots.slice(this.head);
      this.head = 0;
    }
  }
}

export interface NewLot {
  asset: string;
  quantity: Decimal;
  unitCostBasisUsd: Decimal;
  acquisitionDate: Date;
  origin: LotOrigin;
  sourceTransactionId: string | null;
}

/**
 * Asset → queue map for one processing run. Owns lot id generation.
 */
export class LotPool {
  private queues: Map<string, AssetLotQueue> = new Map();
  private nextLotId = 1;
  private readonly logger = getLogger("LotPool");

  generateLotId(): string {
    return `lot-${this.nextLotId++}`;
  }

  /**
   * Bulk-loads prior-year lots for one asset, oldest first. A seed with a
   * negative lot, negative basis or negative total is rejected as a whole
   * and reported; empty lots are skipped and reported.
   */
  seed(asset: string, seedLots: SeedLot[]): LedgerFlag[] {
    const queue = this.queueFor(asset);
    if (queue.hasActivity()) {
      throw new LotQueueError(
        `Cannot seed ${asset}: seeding must happen before any activity`,
      );
    }

    const flags: LedgerFlag[] = [];
    const total = seedLots.reduce(
      (sum, lot) => sum.plus(lot.quantity),
      new Decimal(0),
    );
    const invalid = seedLots.find(
      (lot) => lot.quantity.isNegative() || lot.unitCostBasisUsd.isNegative(),
    );

    if (total.isNegative() || invalid) {
      const message = invalid
        ? `Seed for ${asset} rejected: lot dated ${invalid.acquisitionDate.toISOString()} has negative quantity or basis`
        : `Seed for ${asset} rejected: total quantity ${total.toString()} is negative`;
      this.logger.warn({ asset, total: total.toString() }, message);
      flags.push({ kind: FlagKind.SEED_REJECTED, message, asset });
      return flags;
    }

    // Rollover files are not guaranteed to be in date order. Ties keep their
    // file order; ids follow the file position.
    const ordered = seedLots
      .map((seedLot, index) => ({ seedLot, index }))
      .sort(
        (a, b) =>
          a.seedLot.acquisitionDate.getTime() - b.seedLot.acquisitionDate.getTime(),
      );

    const lots: Lot[] = [];
    ordered.forEach(({ seedLot, index }) => {
      if (seedLot.quantity.isZero()) {
        flags.push({
          kind: FlagKind.SEED_REJECTED,
          message: `Skipped empty seed lot #${index + 1} for ${asset}`,
          asset,
          date: seedLot.acquisitionDate,
        });
        return;
      }
      lots.push({
        id: `seed-${asset}-${index + 1}`,
        asset,
        originalQuantity: seedLot.quantity,
        quantity: seedLot.quantity,
        unitCostBasisUsd: seedLot.unitCostBasisUsd,
        acquisitionDate: seedLot.acquisitionDate,
        origin: LotOrigin.SEEDED,
        sourceTransactionId: null,
      });
    });

    queue.seed(lots);
    this.logger.debug(
      { asset, lots: lots.length, quantity: total.toString() },
      "Seeded prior-year lots",
    );
    return flags;
  }

  push(lot: Lot): void {
    this.queueFor(lot.asset).push(lot);
  }

  /** Creates a lot with a fresh id and appends it to its asset's queue. */
  addLot(params: NewLot): Lot {
    const lot: Lot = {
      id: this.generateLotId(),
      asset: params.asset,
      originalQuantity: params.quantity,
      quantity: params.quantity,
      unitCostBasisUsd: params.unitCostBasisUsd,
      acquisitionDate: params.acquisitionDate,
      origin: params.origin,
      sourceTransactionId: params.sourceTransactionId,
    };
    this.push(lot);
    return lot;
  }

  consume(asset: string, quantity: Decimal): ConsumeResult {
    return this.queueFor(asset).consume(quantity);
  }

  totalQuantity(asset: string): Decimal {
    return this.queues.get(asset)?.totalQuantity() ?? new Decimal(0);
  }

  getLots(asset: string): Lot[] {
    return this.queues.get(asset)?.getLots() ?? [];
  }

  assets(): string[] {
    return [...this.queues.keys()].sort();
  }

  quantities(): Map<string, Decimal> {
    const result = new Map<string, Decimal>();
    for (const asset of this.assets()) {
      result.set(asset, this.totalQuantity(asset));
    }
    return result;
  }

  getAllRemainingLots(): Lot[] {
    return this.assets().flatMap((asset) => this.getLots(asset));
  }

  /** Remaining lots in seed shape, for next period's rollover. */
  exportSnapshot(): LotSnapshot {
    const snapshot: LotSnapshot = {};
    for (const asset of this.assets()) {
      const lots = this.getLots(asset);
      if (lots.length === 0) continue;
      snapshot[asset] = lots.map((lot) => ({
        acquisitionDate: lot.acquisitionDate,
        quantity: lot.quantity,
        unitCostBasisUsd: lot.unitCostBasisUsd,
      }));
    }
    return snapshot;
  }

  private queueFor(asset: string): AssetLotQueue {
    let queue = this.queues.get(asset);
    if (!queue) {
      queue = new AssetLotQueue(asset);
      this.queues.set(asset, queue);
    }
    return queue;
  }
}
