import { z } from "zod";
import { createLogger } from "../logger";

const log = createLogger("config");

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.coerce.number().int().positive().default(8000),
  DATA_DIR: z.string().min(1).default("data"),
  PREVIEW_DPI: z.coerce.number().int().positive().default(150),
  OCR_DPI: z.coerce.number().int().positive().optional(),
  OCR_LANG: z.string().min(1).default("eng"),
  OCR_LANG_PATH: z.string().optional(),
  OCR_CACHE_PATH: z.string().optional(),
  PIPELINE_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(120_000),
  MAX_UPLOAD_MB: z.coerce.number().positive().default(50),
  ALLOWED_ORIGINS: z.string().optional(),
  CLIENT_DIR: z.string().min(1).optional(),
  LOG_LEVEL: z.enum(["error", "warn", "info", "http", "verbose", "debug", "silly"]).default("info"),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Parse configuration from an environment map. Throws a ZodError listing
 * every invalid variable.
 */
export function parseEnv(source: NodeJS.ProcessEnv = process.env): Env {
  return envSchema.parse(source);
}

export function validateEnv(): Env {
  try {
    const env = parseEnv();
    log.info("Environment variables validated successfully", {
      previewDpi: env.PREVIEW_DPI,
      ocrDpi: env.OCR_DPI ?? env.PREVIEW_DPI,
      dataDir: env.DATA_DIR,
    });
    return env;
  } catch (error) {
    if (error instanceof z.ZodError) {
      log.error("Environment validation failed", { issues: error.errors });
      console.error("\n❌ Environment Variable Validation Failed:\n");
      error.errors.forEach((err) => {
        console.error(`  - ${err.path.join(".")}: ${err.message}`);
      });
      console.error("\nSee .env.example for the supported variables.\n");
    } else {
      log.error("Environment validation failed", { error: String(error) });
    }
    process.exit(1);
  }
}
