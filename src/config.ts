/**
 * Configuration
 *
 * Reads the bot's settings from the environment (populated from .env by
 * main.ts) and validates them once at startup. Every problem is reported
 * together in a single ConfigError.
 */

import { z } from "zod";

export const WEEKDAYS = [
  "sunday",
  "monday",
  "tuesday",
  "wednesday",
  "thursday",
  "friday",
  "saturday",
] as const;

export type Weekday = (typeof WEEKDAYS)[number];

export interface ClockTime {
  hour: number;
  minute: number;
}

export interface Config {
  telegram: {
    botToken: string;
    /** Only this Telegram user id may talk to the bot */
    allowedUserId: string;
  };
  supabase: {
    url: string;
    key: string;
  };
  digest: {
    enabled: boolean;
    day: Weekday;
    time: ClockTime;
    count: number;
  };
  dailyQuote: {
    enabled: boolean;
    time: ClockTime;
  };
  /** IANA zone for schedules; undefined means the system zone */
  timezone: string | undefined;
  metadataTimeoutMs: number;
}

export class ConfigError extends Error {
  constructor(public readonly problems: string[]) {
    super(`Invalid configuration:\n${problems.map((p) => `  - ${p}`).join("\n")}`);
    this.name = "ConfigError";
  }
}

// ============================================================
// SCHEMA
// ============================================================

const CLOCK_PATTERN = /^([01]?\d|2[0-3]):([0-5]\d)$/;

const optionalText = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

const requiredText = z.string({ required_error: "is required" }).trim().min(1, "is required");

const flag = (fallback: boolean) =>
  optionalText.transform((value) => (value === undefined ? fallback : value.toLowerCase() === "true"));

const clockTime = (fallback: string) =>
  optionalText
    .transform((value) => value ?? fallback)
    .pipe(z.string().regex(CLOCK_PATTERN, "must be HH:MM (24h)"))
    .transform((value): ClockTime => {
      const [hour, minute] = value.split(":").map(Number);
      return { hour, minute };
    });

const integer = (fallback: number, schema: z.ZodNumber) =>
  optionalText.transform((value) => value ?? String(fallback)).pipe(z.coerce.number().pipe(schema));

function isTimeZone(zone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: zone });
    return true;
  } catch {
    return false;
  }
}

const envSchema = z
  .object({
    TELEGRAM_BOT_TOKEN: requiredText,
    TELEGRAM_USER_ID: requiredText.pipe(z.string().regex(/^\d+$/, "must be a numeric Telegram user id")),
    SUPABASE_URL: requiredText.pipe(z.string().url("must be a URL")),
    SUPABASE_SERVICE_KEY: optionalText,
    SUPABASE_ANON_KEY: optionalText,
    DIGEST_ENABLED: flag(true),
    DIGEST_DAY: optionalText
      .transform((value) => (value ?? "sunday").toLowerCase())
      .pipe(z.enum(WEEKDAYS, { errorMap: () => ({ message: "must be a weekday name" }) })),
    DIGEST_TIME: clockTime("10:00"),
    DIGEST_COUNT: integer(10, z.number().int("must be an integer").min(1).max(50)),
    DAILY_QUOTE_ENABLED: flag(true),
    DAILY_QUOTE_TIME: clockTime("09:00"),
    TIMEZONE: optionalText.refine((zone) => zone === undefined || isTimeZone(zone), {
      message: "must be an IANA time zone",
    }),
    METADATA_TIMEOUT_MS: integer(10_000, z.number().int("must be an integer").positive()),
  })
  .superRefine((env, ctx) => {
    if (!env.SUPABASE_SERVICE_KEY && !env.SUPABASE_ANON_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["SUPABASE_SERVICE_KEY"],
        message: "SUPABASE_SERVICE_KEY or SUPABASE_ANON_KEY is required",
      });
    }
  });

// ============================================================
// LOADING
// ============================================================

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => {
        const key = issue.path.join(".");
        return issue.message.startsWith(key) ? issue.message : `${key}: ${issue.message}`;
      })
    );
  }

  const e = result.data;
  return {
    telegram: {
      botToken: e.TELEGRAM_BOT_TOKEN,
      allowedUserId: e.TELEGRAM_USER_ID,
    },
    supabase: {
      url: e.SUPABASE_URL,
      key: e.SUPABASE_SERVICE_KEY ?? e.SUPABASE_ANON_KEY ?? "",
    },
    digest: {
      enabled: e.DIGEST_ENABLED,
      day: e.DIGEST_DAY,
      time: e.DIGEST_TIME,
      count: e.DIGEST_COUNT,
    },
    dailyQuote: {
      enabled: e.DAILY_QUOTE_ENABLED,
      time: e.DAILY_QUOTE_TIME,
    },
    timezone: e.TIMEZONE,
    metadataTimeoutMs: e.METADATA_TIMEOUT_MS,
  };
}

// ============================================================
// CRON PATTERNS
// ============================================================

/** minute hour * * weekday, Sunday = 0 */
export function digestCronPattern(config: Pick<Config, "digest">): string {
  const { time, day } = config.digest;
  return `${time.minute} ${time.hour} * * ${WEEKDAYS.indexOf(day)}`;
}

export function dailyQuoteCronPattern(config: Pick<Config, "dailyQuote">): string {
  const { time } = config.dailyQuote;
  return `${time.minute} ${time.hour} * * *`;
}
