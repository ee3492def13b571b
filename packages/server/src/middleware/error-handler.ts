import type { Request, Response, NextFunction } from "express";
import { ZodError } from "zod";
import { RoutingError, type RoutingErrorKind } from "@town-sim/routing";
import type { ErrorResponse } from "../models/responses.js";

const STATUS_BY_KIND: Record<RoutingErrorKind, number> = {
  "invalid-name": 422,
  "duplicate-name": 409,
  "duplicate-edge": 409,
  "unknown-vertex": 404,
  "unknown-edge": 404,
  "unknown-car": 404,
  "invalid-weight": 422,
  unreachable: 409,
  "not-traveling": 409,
  "invariant-violation": 500,
};

function statusOf(err: Error): number {
  if ("status" in err && typeof err.status === "number") return err.status;
  return 500;
}

export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response<ErrorResponse>,
  next: NextFunction,
): void {
  if (err instanceof ZodError) {
    console.warn(`[validation] ${JSON.stringify(err.issues)}`);
    res.status(422).json({
      message: "Validation failed",
      details: err.issues,
    });
    return;
  }

  if (err instanceof RoutingError) {
    const status = STATUS_BY_KIND[err.kind];
    if (status >= 500) console.error(`[error] ${err.message}`);
    else console.warn(`[error] ${err.kind}: ${err.message}`);
    res.status(status).json({ message: err.message, kind: err.kind });
    return;
  }

  if (err instanceof Error) {
    console.error(`[error] ${err.message}`);
    res.status(statusOf(err)).json({ message: err.message });
    return;
  }

  next(err);
}
