import Decimal from "decimal.js";
import {
  FlagKind,
  type DisposalKind,
  type GainRecord,
  type LedgerFlag,
} from "@/engine/types";
import { LotPool } from "@/engine/lot-pool";
import { getHoldingDays, getHoldingTerm } from "@/engine/holding-period";
import { formatCryptoAmount } from "@/lib/format";
import { getLogger } from "@/lib/logger";

const logger = getLogger("DisposalEngine");

export interface DisposalRequest {
  transactionId: string;
  asset: string;
  quantity: Decimal;
  grossProceedsUsd: Decimal | null; // null: no FMV available
  feeUsd: Decimal;
  disposalDate: Date;
  disposalKind: DisposalKind;
}

export interface DisposalOutcome {
  records: GainRecord[];
  flags: LedgerFlag[];
  consumed: Decimal;
}

/**
 * Matches a disposal against the asset's lots oldest-first and emits one
 * GainRecord per consumed segment, since one disposal can span lots with
 * different holding terms. Proceeds and fee are split by each segment's share
 * of the requested quantity; unmatched quantity produces no record.
 */
export function processDisposal(
  lotPool: LotPool,
  request: DisposalRequest,
): DisposalOutcome {
  const { transactionId, asset, quantity, disposalDate } = request;
  const flags: LedgerFlag[] = [];

  let grossProceeds = request.grossProceedsUsd;
  if (grossProceeds === null) {
    grossProceeds = new Decimal(0);
    flags.push({
      kind: FlagKind.MISSING_FMV,
      message: `No FMV for ${formatCryptoAmount(quantity)} ${asset} disposed on ${disposalDate.toISOString()}; proceeds recorded as $0`,
      transactionId,
      asset,
      date: disposalDate,
    });
  }

  const { segments, consumed, shortfall, insufficient } = lotPool.consume(
    asset,
    quantity,
  );

  if (insufficient) {
    const message = `Insufficient lots: need ${quantity.toString()} ${asset} but only found ${consumed.toString()}`;
    logger.warn(
      { transactionId, asset, requested: quantity.toString(), shortfall: shortfall.toString() },
      message,
    );
    flags.push({
      kind: FlagKind.INSUFFICIENT_LOTS,
      message,
      transactionId,
      asset,
      date: disposalDate,
    });
  }

  const records: GainRecord[] = [];
  let grossAllocated = new Decimal(0);
  let feeAllocated = new Decimal(0);

  segments.forEach((segment, index) => {
    // The last segment of a fully matched disposal takes the remainder so the
    // records add up to the disposal's totals exactly.
    const takesRemainder = !insufficient && index === segments.length - 1;
    const proportion = segment.quantity.div(quantity);

    const grossShare = takesRemainder
      ? grossProceeds.minus(grossAllocated)
      : grossProceeds.mul(proportion);
    const feeShare = takesRemainder
      ? request.feeUsd.minus(feeAllocated)
      : request.feeUsd.mul(proportion);
    grossAllocated = grossAllocated.plus(grossShare);
    feeAllocated = feeAllocated.plus(feeShare);

    const proceedsUsd = grossShare.minus(feeShare);
    const basisUsd = segment.quantity.mul(segment.unitCostBasisUsd);

    records.push({
      id: `${transactionId}#${index + 1}`,
      transactionId,
      asset,
      disposalKind: request.disposalKind,
      disposalDate,
      acquisitionDate: segment.acquisitionDate,
      quantity: segment.quantity,
      proceedsUsd,
      feeUsd: feeShare,
      basisUsd,
      gainUsd: proceedsUsd.minus(basisUsd),
      term: getHoldingTerm(segment.acquisitionDate, disposalDate),
      holdingDays: getHoldingDays(segment.acquisitionDate, disposalDate),
      sourceLotIds: [segment.lotId],
    });
  });

  return { records, flags, consumed };
}
