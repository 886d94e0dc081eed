// backend/services/pages/src/validators/page.dto.ts
import { z } from "zod";
import { ValidationError } from "../store/errors";

export const pageNameParams = z.object({
  name: z.string().min(1, "name is empty"),
});

/** `config` arrives as JSON text (amis editor) or as an already-parsed object. */
export const savePageDto = z.object({
  name: z.string().min(1, "name is empty"),
  config: z
    .union([z.string(), z.record(z.unknown())])
    .transform((v) => (typeof v === "string" ? v : JSON.stringify(v))),
});

/** Parse or throw ValidationError carrying the first issue's message. */
export function parseOrThrow<T extends z.ZodTypeAny>(
  schema: T,
  input: unknown
): z.infer<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length ? `${issue.path.join(".")}: ` : "";
    throw new ValidationError(`${where}${issue?.message ?? "invalid input"}`);
  }
  return parsed.data;
}
