import { config as loadDotenv } from "dotenv";
import { z } from "zod";

loadDotenv();

const booleanFlag = (fallback: "true" | "false") =>
  z
    .string()
    .default(fallback)
    .transform((v) => v.toLowerCase() === "true");

const nonNegativeInt = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .refine((v) => /^\d+$/.test(v.trim()), { message: "must be a non-negative integer" })
    .transform((v) => parseInt(v, 10));

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

const schema = z.object({
  LINKS_FILE: z.string().default("links.txt"),
  STORAGE_DIR: z.string().default("dominios"),
  RECHECK_THRESHOLD_SECONDS: nonNegativeInt("600"),
  PROBE_TIMEOUT_MS: nonNegativeInt("10000"),
  STEP_DELAY_MS: nonNegativeInt("100"),
  SITE_DELAY_MS: nonNegativeInt("500"),
  CRON_SCHEDULE: optionalString,
  SCREENSHOT_ENABLED: booleanFlag("true"),
  PLAYWRIGHT_HEADLESS: booleanFlag("true"),
  CHROMIUM_EXECUTABLE_PATH: optionalString,
  TELEGRAM_BOT_TOKEN: optionalString,
  TELEGRAM_CHAT_ID: optionalString,
});

export type AppConfig = z.infer<typeof schema>;

export function parseConfig(env: NodeJS.ProcessEnv): AppConfig {
  const parsed = schema.safeParse(env);
  if (!parsed.success) {
    // Show concise errors without secrets
    const errs = parsed.error.errors.map((e) => `${e.path.join(".")}: ${e.message}`).join(", ");
    throw new Error(`Invalid configuration: ${errs}`);
  }
  return parsed.data;
}

export const appConfig = parseConfig(process.env);
