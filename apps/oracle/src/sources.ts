import type { Address, Client } from "viem";
import { getBlock, readContract } from "viem/actions";

import { ERC20_SUPPLY_ABI, RESERVE_VALUATION_ABI, VAULT_SHARE_ABI } from "./abis.js";

export interface BlockRef {
  blockNumber: bigint;
}

export interface Observation extends BlockRef {
  /** Block timestamp, unix seconds. */
  timestamp: bigint;
}

export interface ReserveValuationSource {
  readonly address: Address;
  getAum(maximise: boolean, at?: BlockRef): Promise<bigint>;
}

export interface SupplySource {
  readonly address: Address;
  totalSupply(at?: BlockRef): Promise<bigint>;
}

export interface ShareSource {
  readonly address: Address;
  pricePerShare(at?: BlockRef): Promise<bigint>;
}

export interface ObservationSource {
  observe(): Promise<Observation>;
}

export class ViemReserveValuationSource implements ReserveValuationSource {
  readonly address: Address;
  private readonly client: Client;

  constructor(client: Client, address: Address) {
    this.client = client;
    this.address = address;
  }

  getAum(maximise: boolean, at?: BlockRef): Promise<bigint> {
    return readContract(this.client, {
      address: this.address,
      abi: RESERVE_VALUATION_ABI,
      functionName: "getAum",
      args: [maximise],
      blockNumber: at?.blockNumber,
    });
  }
}

export class ViemSupplySource implements SupplySource {
  readonly address: Address;
  private readonly client: Client;

  constructor(client: Client, address: Address) {
    this.client = client;
    this.address = address;
  }

  totalSupply(at?: BlockRef): Promise<bigint> {
    return readContract(this.client, {
      address: this.address,
      abi: ERC20_SUPPLY_ABI,
      functionName: "totalSupply",
      blockNumber: at?.blockNumber,
    });
  }
}

export class ViemShareSource implements ShareSource {
  readonly address: Address;
  private readonly client: Client;

  constructor(client: Client, address: Address) {
    this.client = client;
    this.address = address;
  }

  pricePerShare(at?: BlockRef): Promise<bigint> {
    return readContract(this.client, {
      address: this.address,
      abi: VAULT_SHARE_ABI,
      functionName: "pricePerShare",
      blockNumber: at?.blockNumber,
    });
  }
}

// Latest block as the observation instant: its number stands in for the
// round id and its timestamp for the round times.
export class ViemObservationSource implements ObservationSource {
  private readonly client: Client;

  constructor(client: Client) {
    this.client = client;
  }

  async observe(): Promise<Observation> {
    const block = await getBlock(this.client, { blockTag: "latest" });
    return { blockNumber: block.number, timestamp: block.timestamp };
  }
}
