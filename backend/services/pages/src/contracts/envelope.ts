// backend/services/pages/src/contracts/envelope.ts
import { z } from "zod";

/**
 * amis response envelope. The amis client reads `status` (0 = ok) and `msg`,
 * so config routes answer HTTP 200 for both outcomes.
 */
export const zEnvelope = z.object({
  status: z.number().int(),
  msg: z.string(),
  data: z.record(z.unknown()).optional(),
});

export type Envelope = z.infer<typeof zEnvelope>;

export const zPageItem = z.object({
  name: z.string(),
  config: z.string(),
});

export type PageItem = z.infer<typeof zPageItem>;

export const zPageListData = z.object({
  items: z.array(zPageItem),
  total: z.number().int().min(0),
});

export function ok(msg = "", data?: Record<string, unknown>): Envelope {
  return data === undefined ? { status: 0, msg } : { status: 0, msg, data };
}

export function fail(msg: string): Envelope {
  return { status: -1, msg };
}
