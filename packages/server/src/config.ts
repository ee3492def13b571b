/**
 * Server settings read from the environment.
 *
 * PORT               listen port (default 3000)
 * TOWN               town config under configs/towns/ to load (default five-corners)
 * TOWN_VERIFY_INVARIANTS  re-check bookkeeping after every mutation (default off)
 * EVENT_LOG_SIZE     recent events kept for GET /api/events (default 100)
 */

import { z } from "zod";

const TRUE_LITERALS = new Set(["1", "true", "yes", "on"]);
const FALSE_LITERALS = new Set(["", "0", "false", "no", "off"]);

const booleanFlag = z.string().transform((value, ctx) => {
  const lower = value.trim().toLowerCase();
  if (TRUE_LITERALS.has(lower)) return true;
  if (FALSE_LITERALS.has(lower)) return false;
  ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected a boolean flag, got "${value}"` });
  return z.NEVER;
});

export const serverEnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  TOWN: z.string().trim().min(1).default("five-corners"),
  TOWN_VERIFY_INVARIANTS: booleanFlag.default("false"),
  EVENT_LOG_SIZE: z.coerce.number().int().nonnegative().default(100),
});

export interface ServerConfig {
  port: number;
  town: string;
  verifyInvariants: boolean;
  eventLogSize: number;
}

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = serverEnvSchema.parse(env);
  return {
    port: parsed.PORT,
    town: parsed.TOWN,
    verifyInvariants: parsed.TOWN_VERIFY_INVARIANTS,
    eventLogSize: parsed.EVENT_LOG_SIZE,
  };
}
