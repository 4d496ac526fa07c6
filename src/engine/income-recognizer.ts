import Decimal from "decimal.js";
import {
  FlagKind,
  LotOrigin,
  type IncomeCategory,
  type IncomeRecord,
  type LedgerFlag,
  type Lot,
} from "@/engine/types";
import { LotPool } from "@/engine/lot-pool";
import { formatCryptoAmount } from "@/lib/format";

export interface IncomeRequest {
  transactionId: string;
  asset: string;
  quantity: Decimal;
  fmvUsd: Decimal | null; // Total value received; null when unpriced
  date: Date;
  category: IncomeCategory;
}

export interface IncomeOutcome {
  record: IncomeRecord;
  lot: Lot;
  flags: LedgerFlag[];
}

/**
 * Records ordinary income at FMV and opens a lot for the received units.
 * The income event itself carries no basis; the new lot's basis is the FMV
 * at receipt, so a later sale is measured against what was taxed as income
 * rather than against zero.
 */
export function recognizeIncome(
  lotPool: LotPool,
  request: IncomeRequest,
): IncomeOutcome {
  const flags: LedgerFlag[] = [];
  let fmvUsd = request.fmvUsd;

  if (fmvUsd === null) {
    fmvUsd = new Decimal(0);
    flags.push({
      kind: FlagKind.MISSING_FMV,
      message: `No FMV for ${formatCryptoAmount(request.quantity)} ${request.asset} received on ${request.date.toISOString()}; income recorded as $0`,
      transactionId: request.transactionId,
      asset: request.asset,
      date: request.date,
    });
  }

  const lot = lotPool.addLot({
    asset: request.asset,
    quantity: request.quantity,
    unitCostBasisUsd: fmvUsd.div(request.quantity),
    acquisitionDate: request.date,
    origin: LotOrigin.INCOME,
    sourceTransactionId: request.transactionId,
  });

  const record: IncomeRecord = {
    id: `${request.transactionId}#income`,
    transactionId: request.transactionId,
    asset: request.asset,
    date: request.date,
    quantity: request.quantity,
    fmvUsd,
    category: request.category,
    resultingLotId: lot.id,
  };

  return { record, lot, flags };
}
