import { z } from "zod";
import { MetaConfigError } from "./errors";

const FLAG_VALUES: Record<string, boolean> = {
  true: true,
  "1": true,
  yes: true,
  on: true,
  false: false,
  "0": false,
  no: false,
  off: false,
};

const flag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((raw, ctx) => {
      if (raw === undefined || raw.trim() === "") return fallback;
      const value = FLAG_VALUES[raw.trim().toLowerCase()];
      if (value === undefined) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a boolean flag, got "${raw}"` });
        return z.NEVER;
      }
      return value;
    });

const envSchema = z.object({
  DATABASE_URL: z.string().url().optional(),
  META_DB_SCHEMA: z
    .string()
    .regex(/^[A-Za-z_][A-Za-z0-9_]*$/)
    .default("public"),
  META_AUTO_LOAD: flag(true),
  META_EAGER_WRITE: flag(false),
  META_HISTORY: z.enum(["off", "memory", "journal"]).default("off"),
  META_LOG: z.enum(["on", "off"]).default("on"),
});

export type MetaHistoryMode = "off" | "memory" | "journal";

export type MetaConfig = Readonly<{
  databaseUrl?: string;
  schema: string;
  autoLoad: boolean;
  eagerWrite: boolean;
  history: MetaHistoryMode;
  logging: boolean;
}>;

/**
 * Reads overlay settings from the environment.
 * Entry points load `.env` first; this module never does.
 */
export function loadMetaConfig(env: NodeJS.ProcessEnv = process.env): MetaConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new MetaConfigError(parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`));
  }

  const e = parsed.data;
  return {
    databaseUrl: e.DATABASE_URL,
    schema: e.META_DB_SCHEMA,
    autoLoad: e.META_AUTO_LOAD,
    eagerWrite: e.META_EAGER_WRITE,
    history: e.META_HISTORY,
    logging: e.META_LOG === "on",
  };
}
