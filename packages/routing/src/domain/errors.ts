/**
 * Errors raised by the routing core.
 *
 * Every error is local and recoverable: it reports a bad request against the
 * current town state and leaves that state untouched. Callers branch on
 * `kind` rather than on class identity when errors cross a process boundary.
 */

export type RoutingErrorKind =
  | "invalid-name"
  | "duplicate-name"
  | "duplicate-edge"
  | "unknown-vertex"
  | "unknown-edge"
  | "unknown-car"
  | "invalid-weight"
  | "unreachable"
  | "not-traveling"
  | "invariant-violation";

export abstract class RoutingError extends Error {
  abstract readonly kind: RoutingErrorKind;
}

export class InvalidNameError extends RoutingError {
  readonly kind = "invalid-name";

  constructor(readonly vertexName: string) {
    super(`Invalid vertex name "${vertexName}": names must be non-empty and must not contain "->"`);
    this.name = "InvalidNameError";
  }
}

export class DuplicateNameError extends RoutingError {
  readonly kind = "duplicate-name";

  constructor(readonly vertexName: string) {
    super(`Vertex "${vertexName}" already exists`);
    this.name = "DuplicateNameError";
  }
}

export class DuplicateEdgeError extends RoutingError {
  readonly kind = "duplicate-edge";

  constructor(readonly edgeId: string) {
    super(`Edge ${edgeId} already exists`);
    this.name = "DuplicateEdgeError";
  }
}

export class UnknownVertexError extends RoutingError {
  readonly kind = "unknown-vertex";

  constructor(readonly vertexName: string) {
    super(`Unknown vertex "${vertexName}"`);
    this.name = "UnknownVertexError";
  }
}

export class UnknownEdgeError extends RoutingError {
  readonly kind = "unknown-edge";

  constructor(readonly edgeId: string) {
    super(`Unknown edge ${edgeId}`);
    this.name = "UnknownEdgeError";
  }
}

export class UnknownCarError extends RoutingError {
  readonly kind = "unknown-car";

  constructor(readonly carId: string) {
    super(`Unknown car "${carId}"`);
    this.name = "UnknownCarError";
  }
}

export class InvalidWeightError extends RoutingError {
  readonly kind = "invalid-weight";

  constructor(readonly weight: number) {
    super(`Invalid edge weight ${weight}: weights must be non-negative numbers`);
    this.name = "InvalidWeightError";
  }
}

export class UnreachableError extends RoutingError {
  readonly kind = "unreachable";

  constructor(
    readonly from: string,
    readonly to: string,
  ) {
    super(`No path from "${from}" to "${to}"`);
    this.name = "UnreachableError";
  }
}

export class NotTravelingError extends RoutingError {
  readonly kind = "not-traveling";

  constructor(readonly carId: string) {
    super(`Car "${carId}" has no road to travel`);
    this.name = "NotTravelingError";
  }
}

export class InvariantViolationError extends RoutingError {
  readonly kind = "invariant-violation";

  constructor(readonly violations: string[]) {
    super(`Town bookkeeping is inconsistent:\n  ${violations.join("\n  ")}`);
    this.name = "InvariantViolationError";
  }
}

/** Accepts any non-negative number, including Infinity (a closed road). */
export function assertValidWeight(weight: number): void {
  if (Number.isNaN(weight) || weight < 0) {
    throw new InvalidWeightError(weight);
  }
}
