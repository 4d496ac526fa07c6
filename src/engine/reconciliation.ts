import Decimal from "decimal.js";
import {
  FlagKind,
  type LedgerFlag,
  type ReconciliationReport,
  type ReconciliationStage,
} from "@/engine/types";
import { getLogger } from "@/lib/logger";

const logger = getLogger("Reconciliation");

export interface ReconciliationOutcome {
  reports: ReconciliationReport[];
  flags: LedgerFlag[];
}

/**
 * Compares computed queue quantities with independently reported holdings.
 * Every asset present on either side gets a report; a missing side counts
 * as zero. Mismatches are reported, never fatal.
 */
export function reconcileHoldings(
  computed: ReadonlyMap<string, Decimal>,
  expected: ReadonlyMap<string, Decimal>,
  stage: ReconciliationStage,
  tolerance: Decimal = new Decimal(0),
): ReconciliationOutcome {
  const assets = [...new Set([...computed.keys(), ...expected.keys()])].sort();
  const reports: ReconciliationReport[] = [];
  const flags: LedgerFlag[] = [];

  for (const asset of assets) {
    const expectedQuantity = expected.get(asset) ?? new Decimal(0);
    const computedQuantity = computed.get(asset) ?? new Decimal(0);
    const delta = expectedQuantity.minus(computedQuantity);
    const status = delta.abs().lte(tolerance) ? "OK" : "MISMATCH";

    reports.push({
      asset,
      stage,
      expectedQuantity,
      computedQuantity,
      delta,
      status,
    });

    if (status === "MISMATCH") {
      const message = `${stage} reconciliation mismatch for ${asset}: holdings ${expectedQuantity.toString()}, lots ${computedQuantity.toString()} (delta ${delta.toString()})`;
      logger.warn({ asset, stage, delta: delta.toString() }, message);
      flags.push({ kind: FlagKind.RECONCILIATION_MISMATCH, message, asset });
    }
  }

  return { reports, flags };
}
