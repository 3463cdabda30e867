import { maxUint256, type Address } from "viem";

import { assertBindings, assertSameBindings, type OracleBindings } from "./bindings.js";
import { InvalidPriceCeilingError } from "./errors.js";
import {
  acceptOwnership,
  assertOwner,
  initialOwnership,
  pendingOwnerOf,
  renounceOwnership,
  transferOwnership,
  type OwnershipEvent,
  type OwnershipState,
  type Transition,
} from "./ownership.js";
import type { GovernanceStore } from "./store.js";

/** Conservative default ceiling: 2.0 reference units per wToken. */
export const DEFAULT_PRICE_CEILING = 2n * 10n ** 18n;

export interface GovernanceState {
  ownership: OwnershipState;
  priceCeiling: bigint;
}

export type GovernanceEvent =
  | OwnershipEvent
  | { type: "PriceCeilingUpdated"; priceCeiling: bigint };

export type GovernanceListener = (event: GovernanceEvent) => void;

export type ListenerErrorHandler = (error: unknown, event: GovernanceEvent) => void;

function reportListenerError(error: unknown, event: GovernanceEvent): void {
  console.error(`governance listener failed on ${event.type}:`, error);
}

type GovernanceTransition = Transition<GovernanceState, GovernanceEvent>;

function assertPriceCeiling(value: bigint): bigint {
  if (value <= 0n || value > maxUint256) throw new InvalidPriceCeilingError(value);
  return value;
}

export function setPriceCeiling(
  state: GovernanceState,
  caller: string,
  priceCeiling: bigint,
): GovernanceTransition {
  assertOwner(state.ownership, caller);
  assertPriceCeiling(priceCeiling);
  return {
    state: { ...state, priceCeiling },
    events: [{ type: "PriceCeilingUpdated", priceCeiling }],
  };
}

export interface OpenGovernanceParams {
  store: GovernanceStore;
  oracleId: string;
  bindings: OracleBindings;
  /** Used only when no record exists yet for `oracleId`. */
  owner: string;
  priceCeiling?: bigint;
  /** Receives what a listener throws; the committed state is not affected. */
  onListenerError?: ListenerErrorHandler;
}

/**
 * Owner-gated holder of the price ceiling.
 *
 * Mutations run one at a time: each validates against the current state,
 * persists the next state, and only then makes it visible. A rejected call
 * or a failed write leaves the visible state untouched.
 */
export class CapGovernance {
  private state: GovernanceState;
  private readonly store: GovernanceStore;
  private readonly oracleId: string;
  private readonly listeners = new Set<GovernanceListener>();
  private readonly onListenerError: ListenerErrorHandler;
  private tail: Promise<void> = Promise.resolve();

  constructor(
    store: GovernanceStore,
    oracleId: string,
    state: GovernanceState,
    onListenerError: ListenerErrorHandler = reportListenerError,
  ) {
    this.store = store;
    this.oracleId = oracleId;
    this.state = state;
    this.onListenerError = onListenerError;
  }

  static async open(params: OpenGovernanceParams): Promise<CapGovernance> {
    const { store, oracleId, onListenerError } = params;
    const bindings = assertBindings(params.bindings);
    const existing = await store.load(oracleId);
    if (existing) {
      assertSameBindings(existing.bindings, bindings);
      return new CapGovernance(store, oracleId, existing.state, onListenerError);
    }
    const state: GovernanceState = {
      ownership: initialOwnership(params.owner),
      priceCeiling: assertPriceCeiling(params.priceCeiling ?? DEFAULT_PRICE_CEILING),
    };
    await store.init(oracleId, { bindings, state });
    return new CapGovernance(store, oracleId, state, onListenerError);
  }

  priceCeiling(): bigint {
    return this.state.priceCeiling;
  }

  owner(): Address {
    return this.state.ownership.owner;
  }

  pendingOwner(): Address | undefined {
    return pendingOwnerOf(this.state.ownership);
  }

  snapshot(): GovernanceState {
    return this.state;
  }

  onEvent(listener: GovernanceListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  setPriceCeiling(caller: string, priceCeiling: bigint): Promise<void> {
    return this.commit((state) => setPriceCeiling(state, caller, priceCeiling));
  }

  transferOwnership(caller: string, nominee: string): Promise<void> {
    return this.commit((state) => {
      const next = transferOwnership(state.ownership, caller, nominee);
      return { state: { ...state, ownership: next.state }, events: next.events };
    });
  }

  acceptOwnership(caller: string): Promise<void> {
    return this.commit((state) => {
      const next = acceptOwnership(state.ownership, caller);
      return { state: { ...state, ownership: next.state }, events: next.events };
    });
  }

  async renounceOwnership(_caller: string): Promise<never> {
    return renounceOwnership();
  }

  private commit(transition: (state: GovernanceState) => GovernanceTransition): Promise<void> {
    const run = this.tail.then(async () => {
      const next = transition(this.state);
      await this.store.save(this.oracleId, next.state);
      this.state = next.state;
      for (const event of next.events) {
        for (const listener of this.listeners) queueMicrotask(() => this.deliver(listener, event));
      }
    });
    // The caller sees a failure through `run`; the queue itself keeps going.
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private deliver(listener: GovernanceListener, event: GovernanceEvent): void {
    try {
      listener(event);
    } catch (e) {
      this.onListenerError(e, event);
    }
  }
}
