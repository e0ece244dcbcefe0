import { z } from "zod";

export const loggingSettingsSchema = z
  .object({
    suppressLogging: z.boolean().optional(),
    bigCacheLimit: z.number().int().min(1).optional(),
  })
  .strict();

const FLAG_VALUES: Record<string, boolean> = {
  "1": true,
  true: true,
  yes: true,
  on: true,
  "0": false,
  false: false,
  no: false,
  off: false,
};

const flag = z
  .string()
  .transform((v) => v.trim().toLowerCase())
  .refine((v) => Object.hasOwn(FLAG_VALUES, v), "must be one of 1, true, yes, on, 0, false, no, off")
  .transform((v) => FLAG_VALUES[v]);

const emptyAsUnset = (v: unknown) => (typeof v === "string" && v.trim() === "" ? undefined : v);

/** Environment variables understood by `loadLoggingSettingsFromEnv`. */
export const loggingEnvSchema = z.object({
  LOGHOST_SUPPRESS: z.preprocess(emptyAsUnset, flag.optional()),
  LOGHOST_CACHE_LIMIT: z.preprocess(emptyAsUnset, z.coerce.number().int().min(1).optional()),
});
