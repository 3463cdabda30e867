import { PriceAggregator } from "./aggregator.js";
import { assertBindings, type OracleBindings } from "./bindings.js";
import { capPrice } from "./capper.js";
import { toInt256, toUint80 } from "./math.js";
import type {
  BlockRef,
  ObservationSource,
  ReserveValuationSource,
  ShareSource,
  SupplySource,
} from "./sources.js";

export const ORACLE_DECIMALS = 18;
export const ORACLE_VERSION = 1n;

/** `AggregatorV3Interface.latestRoundData()` shape. */
export interface RoundData {
  roundId: bigint;
  answer: bigint;
  startedAt: bigint;
  updatedAt: bigint;
  answeredInRound: bigint;
}

export interface PriceCeilingSource {
  priceCeiling(): bigint;
}

export interface WTokenPriceOracleParams {
  reserveValuation: ReserveValuationSource;
  referenceAsset: SupplySource;
  share: ShareSource;
  observer: ObservationSource;
  ceiling: PriceCeilingSource;
  description: string;
}

/**
 * wToken price in reference units, exposed as a Chainlink-style feed.
 * Nothing is cached: every read goes back to the upstream contracts.
 */
export class WTokenPriceOracle {
  readonly bindings: OracleBindings;
  private readonly aggregator: PriceAggregator;
  private readonly observer: ObservationSource;
  private readonly ceiling: PriceCeilingSource;
  private readonly label: string;

  constructor(params: WTokenPriceOracleParams) {
    this.bindings = assertBindings({
      reserveValuationSource: params.reserveValuation.address,
      referenceAssetSource: params.referenceAsset.address,
      shareSource: params.share.address,
    });
    this.aggregator = new PriceAggregator({
      reserveValuation: params.reserveValuation,
      referenceAsset: params.referenceAsset,
      share: params.share,
    });
    this.observer = params.observer;
    this.ceiling = params.ceiling;
    this.label = params.description;
  }

  decimals(): number {
    return ORACLE_DECIMALS;
  }

  description(): string {
    return this.label;
  }

  version(): bigint {
    return ORACLE_VERSION;
  }

  priceCeiling(): bigint {
    return this.ceiling.priceCeiling();
  }

  /** Uncapped price, read at `at` or else at the block the observer reports. */
  async getLivePrice(at?: BlockRef): Promise<bigint> {
    return this.aggregator.price(at ?? (await this.observer.observe()));
  }

  async latestRoundData(): Promise<RoundData> {
    const observation = await this.observer.observe();
    const price = await this.aggregator.price(observation);
    const round = toUint80(observation.blockNumber, "round id");
    return {
      roundId: round,
      answer: toInt256(capPrice(price, this.ceiling.priceCeiling()), "answer"),
      startedAt: observation.timestamp,
      updatedAt: observation.timestamp,
      answeredInRound: round,
    };
  }
}
