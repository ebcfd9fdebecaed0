/**
 * Zod schemas for the market-data bridge's JSON payloads.
 *
 * Payloads are checked here, at the HTTP boundary, before anything reaches
 * the gateway or the engine. Rate records are validated one by one by the
 * gateway so that a single malformed record does not sink its batch.
 */

import { z } from 'zod';

// ---------------------------------------------------------------------------
// Rates  (api/v1/rates/…)
// ---------------------------------------------------------------------------

/** One OHLCV record. `time` is unix seconds, but ms and ISO strings are seen too. */
export const RateRecordSchema = z
  .object({
    time: z.union([z.number(), z.string()]),
    open: z.number(),
    high: z.number(),
    low: z.number(),
    close: z.number(),
    tick_volume: z.number().nonnegative().optional(),
  })
  .passthrough();

export const RatesResponseSchema = z.object({ rates: z.array(z.unknown()) }).passthrough();

// ---------------------------------------------------------------------------
// Symbols  (api/v1/symbols)
// ---------------------------------------------------------------------------

const SymbolSchema = z
  .object({
    name: z.string().min(1),
    visible: z.boolean().optional(),
  })
  .passthrough();

export const SymbolsResponseSchema = z.object({ symbols: z.array(SymbolSchema) }).passthrough();

// ---------------------------------------------------------------------------
// Session / account / terminal
// ---------------------------------------------------------------------------

export const AccountResponseSchema = z
  .object({
    login: z.union([z.number(), z.string()]),
    server: z.string().optional(),
    balance: z.number().optional(),
    currency: z.string().optional(),
  })
  .passthrough();

export type AccountResponse = z.infer<typeof AccountResponseSchema>;

export const TerminalResponseSchema = z
  .object({
    name: z.string(),
    company: z.string().optional(),
    path: z.string().optional(),
  })
  .passthrough();

export type TerminalResponse = z.infer<typeof TerminalResponseSchema>;

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

/** `{ error: { code, message } }`; `code` follows the terminal's own error codes. */
export const ErrorResponseSchema = z.object({
  error: z.object({
    code: z.number().int(),
    message: z.string().optional(),
  }),
});

// ---------------------------------------------------------------------------
// Validation helper
// ---------------------------------------------------------------------------

/**
 * Validate a parsed JSON payload against a Zod schema.
 * Returns the data on success, or `null` after a console warning.
 */
export function validateApiResponse<T>(schema: z.ZodType<T>, payload: unknown, label: string): T | null {
  const result = schema.safeParse(payload);
  if (result.success) return result.data;
  console.warn(`[Zod] ${label}: response failed validation:`, result.error.issues.slice(0, 3));
  return null;
}
