/**
 * Environment configuration, validated once at startup with zod.
 *
 * Store-level settings (credentials, field mappings, batch sizes) live on the
 * `stores` table; this module only covers process-wide knobs.
 */

import { z } from "zod";

const booleanFlag = z.enum(["true", "false"]).transform((v) => v === "true");

const envSchema = z.object({
  /** Postgres connection string; EXTERNAL_DATABASE_URL wins when both are set */
  DATABASE_URL: z.string().optional(),
  EXTERNAL_DATABASE_URL: z.string().optional(),

  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.coerce.number().int().positive().default(5000),

  // ----------------------------------------
  // AUTO-SYNC
  // ----------------------------------------
  AUTO_SYNC_ENABLED: booleanFlag.default("true"),
  SYNC_INTERVAL_MINUTES: z.coerce.number().int().positive().default(15),
  AUTO_SYNC_STARTUP_DELAY_MS: z.coerce.number().int().nonnegative().default(30_000),
  /** Pause between stores within one auto-sync pass */
  STORE_DELAY_MS: z.coerce.number().int().nonnegative().default(5_000),

  // ----------------------------------------
  // EXTERNAL CALL TIMEOUTS
  // ----------------------------------------
  ERP_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  ATUM_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  STOREFRONT_TIMEOUT_MS: z.coerce.number().int().positive().default(30 * 60_000),

  // ----------------------------------------
  // SMTP (sync reports)
  // ----------------------------------------
  SMTP_HOST: z.string().optional(),
  SMTP_PORT: z.coerce.number().int().positive().default(587),
  SMTP_USER: z.string().optional(),
  SMTP_PASS: z.string().optional(),
  SMTP_FROM: z.string().optional(),
});

export type Env = z.infer<typeof envSchema>;

export interface AppConfig {
  databaseUrl: string | undefined;
  useSSL: boolean;
  nodeEnv: Env["NODE_ENV"];
  port: number;
  autoSync: {
    enabled: boolean;
    intervalMinutes: number;
    startupDelayMs: number;
    storeDelayMs: number;
  };
  timeouts: {
    erpMs: number;
    atumMs: number;
    storefrontMs: number;
  };
  smtp: {
    host: string | undefined;
    port: number;
    user: string | undefined;
    pass: string | undefined;
    from: string | undefined;
  };
}

export function parseConfig(source: NodeJS.ProcessEnv): AppConfig {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  - ${issue.path.join(".")}: ${issue.message}`)
      .join("\n");
    throw new Error(`Environment validation failed:\n${issues}`);
  }
  const env = result.data;

  return {
    databaseUrl: env.EXTERNAL_DATABASE_URL || env.DATABASE_URL,
    // Hosted databases require SSL
    useSSL: !!env.EXTERNAL_DATABASE_URL || env.NODE_ENV === "production",
    nodeEnv: env.NODE_ENV,
    port: env.PORT,
    autoSync: {
      enabled: env.AUTO_SYNC_ENABLED,
      intervalMinutes: env.SYNC_INTERVAL_MINUTES,
      startupDelayMs: env.AUTO_SYNC_STARTUP_DELAY_MS,
      storeDelayMs: env.STORE_DELAY_MS,
    },
    timeouts: {
      erpMs: env.ERP_TIMEOUT_MS,
      atumMs: env.ATUM_TIMEOUT_MS,
      storefrontMs: env.STOREFRONT_TIMEOUT_MS,
    },
    smtp: {
      host: env.SMTP_HOST,
      port: env.SMTP_PORT,
      user: env.SMTP_USER,
      pass: env.SMTP_PASS,
      from: env.SMTP_FROM,
    },
  };
}

export const config = parseConfig(process.env);
