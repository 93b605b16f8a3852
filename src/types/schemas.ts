import { z } from "zod";

/**
 * Shape the classifier is asked to emit. A missing or null `is_malicious`
 * decodes as false; `error_code` and `reason` may be absent or null.
 */
export const ClassifierJsonSchema = z.object({
  is_malicious: z
    .boolean()
    .nullish()
    .transform((v) => v ?? false),
  error_code: z.string().nullish(),
  reason: z.string().nullish(),
});

export type ClassifierJson = z.infer<typeof ClassifierJsonSchema>;
