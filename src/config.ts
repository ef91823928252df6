import { tmpdir } from "node:os";
import { z } from "zod";
import { ConfigurationError, MissingCredentialsError } from "./errors.js";

export const DEFAULT_CONCURRENCY = 15;
export const DEFAULT_MODEL = "gemini-3-flash-preview";
export const DEFAULT_TIMEOUT_MS = 60_000;
export const DEFAULT_ANKI_CONNECT_URL = "http://localhost:8765";
export const ANKI_CONNECT_VERSION = 6;
export const NOTES_INFO_BATCH_SIZE = 500;
export const API_KEY_ENV = "GEMINI_API_KEY";

const configSchema = z.object({
  concurrency: z.coerce.number().int().min(1).default(DEFAULT_CONCURRENCY),
  model: z.string().min(1).default(DEFAULT_MODEL),
  timeoutMs: z.coerce.number().int().min(1).default(DEFAULT_TIMEOUT_MS),
  workDir: z.string().min(1).optional(),
  ankiConnectUrl: z.string().url().default(DEFAULT_ANKI_CONNECT_URL),
  ankiConnectVersion: z.coerce.number().int().default(ANKI_CONNECT_VERSION),
  notesInfoBatchSize: z.coerce.number().int().min(1).default(NOTES_INFO_BATCH_SIZE),
  apiKey: z.string().min(1).optional(),
});

export type AugmentConfig = Omit<z.output<typeof configSchema>, "workDir"> & {
  /** Parent of the scratch directories; the container only ever deletes what it created here. */
  workDir: string;
};

export type ConfigOverrides = Partial<Record<keyof z.input<typeof configSchema>, string | number | undefined>>;

/**
 * Build the run configuration once at startup.
 *
 * Precedence: explicit overrides (CLI flags), then environment, then defaults.
 * The work directory defaults to the OS temp dir.
 */
export function loadConfig(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
): AugmentConfig {
  const fromEnv: ConfigOverrides = {
    concurrency: env["DECK_AUGMENT_CONCURRENCY"],
    model: env["DECK_AUGMENT_MODEL"],
    workDir: env["DECK_AUGMENT_WORK_DIR"],
    ankiConnectUrl: env["ANKI_CONNECT_URL"],
    apiKey: env[API_KEY_ENV],
  };

  const merged: Record<string, string | number> = {};
  for (const source of [fromEnv, overrides]) {
    for (const [key, value] of Object.entries(source)) {
      if (value !== undefined && value !== "") merged[key] = value;
    }
  }

  const parsed = configSchema.safeParse(merged);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? issue.path.join(".") : "config";
    throw new ConfigurationError(`Invalid configuration for '${where}': ${issue?.message ?? "unknown"}`);
  }

  return {
    ...parsed.data,
    workDir: parsed.data.workDir ?? tmpdir(),
  };
}

export function requireApiKey(config: AugmentConfig): string {
  if (!config.apiKey) throw new MissingCredentialsError(API_KEY_ENV);
  return config.apiKey;
}
