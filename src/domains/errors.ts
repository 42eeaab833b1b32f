/**
 * Engine error types.
 *
 * Venue faults are `VenueError`s from `@/adapters/errors`; these cover what
 * the engine itself decides is wrong.
 */

export type ExecutionErrorCode =
  | "STALE_DATA"
  | "VERIFICATION_MISMATCH"
  | "INSUFFICIENT_COLLATERAL"
  | "LEDGER_STATE";

/**
 * Base error for execution failures.
 */
export class ExecutionError extends Error {
  public readonly code: ExecutionErrorCode;

  constructor(message: string, code: ExecutionErrorCode, cause?: unknown) {
    super(message, { cause });
    this.name = "ExecutionError";
    this.code = code;
  }
}

/**
 * No fresh snapshot pair is available.
 */
export class StaleDataError extends ExecutionError {
  constructor(public readonly venues: string[]) {
    super(`No fresh order book from ${venues.join(", ")}`, "STALE_DATA");
    this.name = "StaleDataError";
  }
}

/**
 * The two legs of a paired trade filled too differently to count as hedged.
 */
export class VerificationMismatchError extends ExecutionError {
  constructor(
    public readonly legAFilledBase: bigint,
    public readonly legBFilledBase: bigint,
    reason: string,
  ) {
    super(`Leg fills do not match: ${reason}`, "VERIFICATION_MISMATCH");
    this.name = "VerificationMismatchError";
  }
}

/**
 * A venue lacks the balance or margin a trade needs, even after redeeming
 * idle funds.
 */
export class InsufficientCollateralError extends ExecutionError {
  constructor(
    public readonly venue: string,
    public readonly asset: string,
    public readonly requiredBase: bigint,
    public readonly availableBase: bigint,
  ) {
    super(
      `Insufficient ${asset} on ${venue}: need ${requiredBase}, have ${availableBase}`,
      "INSUFFICIENT_COLLATERAL",
    );
    this.name = "InsufficientCollateralError";
  }
}

/**
 * A ledger mutation was attempted in a phase that does not allow it.
 */
export class LedgerStateError extends ExecutionError {
  constructor(message: string) {
    super(message, "LEDGER_STATE");
    this.name = "LedgerStateError";
  }
}
