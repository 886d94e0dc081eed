// backend/services/shared/contracts/common.ts
import { z } from "zod";

/** RFC 7807 Problem+JSON */
export const zProblem = z.object({
  type: z.string().default("about:blank"),
  title: z.string(),
  status: z.number().int(),
  detail: z.string().optional(),
  instance: z.string().optional(),
  // app-specific extras (optional)
  code: z.string().optional(),
  errors: z.array(z.unknown()).optional(),
});

export type Problem = z.infer<typeof zProblem>;
