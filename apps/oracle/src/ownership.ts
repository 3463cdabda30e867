import { isAddressEqual, zeroAddress, type Address } from "viem";

import { isLiveAddress } from "./bindings.js";
import { InvalidOwnerError, RenounceDisabledError, UnauthorizedAccountError } from "./errors.js";

/**
 * Two-step ownership. There is no ownerless variant: the only
 * way out of `owned` is through `pending`, and the only way out of `pending`
 * is back to `owned`.
 */
export type OwnershipState =
  | { status: "owned"; owner: Address }
  | { status: "pending"; owner: Address; pendingOwner: Address };

export type OwnershipEvent =
  | { type: "OwnershipTransferStarted"; previousOwner: Address; newOwner: Address }
  | { type: "OwnershipTransferred"; previousOwner: Address; newOwner: Address };

export interface Transition<S, E> {
  state: S;
  events: E[];
}

export function initialOwnership(owner: string): OwnershipState {
  if (!isLiveAddress(owner)) throw new InvalidOwnerError(owner);
  return { status: "owned", owner };
}

export function pendingOwnerOf(state: OwnershipState): Address | undefined {
  return state.status === "pending" ? state.pendingOwner : undefined;
}

function isAccount(caller: string, account: Address): boolean {
  return isLiveAddress(caller) && isAddressEqual(caller, account);
}

export function assertOwner(state: OwnershipState, caller: string): void {
  if (!isAccount(caller, state.owner)) throw new UnauthorizedAccountError(caller);
}

// Nominating the zero address cancels an outstanding nomination.
export function transferOwnership(
  state: OwnershipState,
  caller: string,
  nominee: string,
): Transition<OwnershipState, OwnershipEvent> {
  assertOwner(state, caller);
  if (isLiveAddress(nominee)) {
    return {
      state: { status: "pending", owner: state.owner, pendingOwner: nominee },
      events: [{ type: "OwnershipTransferStarted", previousOwner: state.owner, newOwner: nominee }],
    };
  }
  if (nominee.toLowerCase() !== zeroAddress) throw new InvalidOwnerError(nominee);
  return {
    state: { status: "owned", owner: state.owner },
    events: [{ type: "OwnershipTransferStarted", previousOwner: state.owner, newOwner: zeroAddress }],
  };
}

export function acceptOwnership(
  state: OwnershipState,
  caller: string,
): Transition<OwnershipState, OwnershipEvent> {
  if (state.status !== "pending" || !isAccount(caller, state.pendingOwner)) {
    throw new UnauthorizedAccountError(caller);
  }
  return {
    state: { status: "owned", owner: state.pendingOwner },
    events: [
      { type: "OwnershipTransferred", previousOwner: state.owner, newOwner: state.pendingOwner },
    ],
  };
}

export function renounceOwnership(): never {
  throw new RenounceDisabledError();
}
