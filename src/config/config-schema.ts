import { z } from "zod";

const nonEmpty = z.string().min(1);

/** `mysql://…`, optionally with the `jdbc:` prefix older deployments were configured with. */
const storeUrl = nonEmpty.regex(/^(jdbc:)?mysql:\/\//, "must be a mysql:// URL");

export const wscrapeOptionsSchema = z
  .object({
    storeUrl,
    sshHost: nonEmpty,
    captureIntervalMs: z.number().int().positive(),
    storeCredentialsPath: nonEmpty,
    sshCredentialsPath: nonEmpty,
    observer: z
      .unknown()
      .refine(
        (v) =>
          v === undefined ||
          (typeof v === "object" && v !== null && "onCapture" in v && typeof v.onCapture === "function"),
        "must implement onCapture(batch)",
      )
      .optional(),
  })
  .strict();

/** `{"user": "...", "pass": "..."}` and nothing else. */
export const credentialsSchema = z
  .object({
    user: z.string(),
    pass: z.string(),
  })
  .strict();

export type Credentials = z.infer<typeof credentialsSchema>;
