import { ZeroSupplyError } from "./errors.js";
import { WAD, mulUint256, toUint256 } from "./math.js";
import type {
  BlockRef,
  ReserveValuationSource,
  ShareSource,
  SupplySource,
} from "./sources.js";

// getAum is 30-decimal and totalSupply 18-decimal: scaling by 1e6 before the
// division lands the per-unit value on 18 decimals.
const RESERVE_TO_WAD = 10n ** 6n;

export interface PriceInputs {
  /** Total reserve valuation, 30 decimals. */
  reserveValuation: bigint;
  /** Reference asset total supply, 18 decimals. */
  outstandingSupply: bigint;
  /** Vault share price, 18 decimals. */
  shareMultiplier: bigint;
}

export function perUnitReserveValue(reserveValuation: bigint, outstandingSupply: bigint): bigint {
  if (toUint256(outstandingSupply, "outstanding supply") === 0n) throw new ZeroSupplyError();
  return mulUint256(reserveValuation, RESERVE_TO_WAD, "reserve valuation") / outstandingSupply;
}

/**
 * Price of one wToken in reference units, 18 decimals:
 * `((reserveValuation * 1e6) / outstandingSupply) * shareMultiplier / 1e18`.
 *
 * Every product is checked against uint256 and every division truncates,
 * matching the on-chain arithmetic this figure is compared against.
 */
export function computeNormalizedPrice({
  reserveValuation,
  outstandingSupply,
  shareMultiplier,
}: PriceInputs): bigint {
  const perUnit = perUnitReserveValue(reserveValuation, outstandingSupply);
  return mulUint256(perUnit, shareMultiplier, "per-unit value * share multiplier") / WAD;
}

export interface AggregatorSources {
  reserveValuation: ReserveValuationSource;
  referenceAsset: SupplySource;
  share: ShareSource;
}

export class PriceAggregator {
  private readonly sources: AggregatorSources;

  constructor(sources: AggregatorSources) {
    this.sources = sources;
  }

  // Always the non-maximised valuation.
  async inputs(at?: BlockRef): Promise<PriceInputs> {
    const { reserveValuation, referenceAsset, share } = this.sources;
    const [aum, supply, pps] = await Promise.all([
      reserveValuation.getAum(false, at),
      referenceAsset.totalSupply(at),
      share.pricePerShare(at),
    ]);
    return { reserveValuation: aum, outstandingSupply: supply, shareMultiplier: pps };
  }

  async price(at?: BlockRef): Promise<bigint> {
    return computeNormalizedPrice(await this.inputs(at));
  }
}
