import { z } from "zod";
import { projectRootAbs } from "./pipeline/utils.js";
import { NORMALIZE_MODES, type NormalizeMode, type Phase } from "./state_store.js";

export const STUB_MODES = ["off", "record", "replay", "generate"] as const;
export type StubMode = (typeof STUB_MODES)[number];

export const DEFAULT_MODEL = "gpt-4.1";
export const DEFAULT_LANGUAGE = "hu";
export const DEFAULT_DPI = 300;
export const DEFAULT_CALL_TIMEOUT_MS = 120_000;
export const DEFAULT_MAX_ATTEMPTS = 2;
export const DEFAULT_RETRY_DELAY_MS = 1_000;

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export const RunOptionsSchema = z
  .object({
    projectRoot: z.string().trim().min(1).optional(),
    language: z.string().trim().min(2).max(16).optional(),
    useApi: z.boolean().optional(),
    hitl: z.boolean().optional(),
    stubMode: z.enum(STUB_MODES).optional(),
    normalizeMode: z.enum(NORMALIZE_MODES).optional(),
    dpi: z.number().int().min(72).max(1200).optional(),
    callTimeoutMs: z.number().int().min(1).max(30 * 60 * 1000).optional(),
    maxAttempts: z.number().int().min(1).max(10).optional(),
    retryDelayMs: z.number().int().min(0).max(60_000).optional()
  })
  .strict();

export type RunOptionsInput = z.infer<typeof RunOptionsSchema>;

export type RunOptions = {
  projectRoot: string;
  language: string;
  useApi: boolean;
  hitl: boolean;
  stubMode: StubMode;
  normalizeMode: NormalizeMode;
  dpi: number;
  callTimeoutMs: number;
  maxAttempts: number;
  retryDelayMs: number;
  models: Record<Phase, string>;
};

export type Env = Record<string, string | undefined>;

function envString(env: Env, name: string): string | undefined {
  const raw = env[name]?.trim();
  return raw && raw.length > 0 ? raw : undefined;
}

function envInt(env: Env, name: string, fallback: number, min: number, max: number): number {
  const raw = Number(envString(env, name) ?? fallback);
  if (!Number.isFinite(raw)) return fallback;
  return Math.max(min, Math.min(max, Math.round(raw)));
}

function envNormalizeMode(env: Env): NormalizeMode {
  const raw = envString(env, "TRANSCRIBE_NORMALIZE_MODE")?.toLowerCase();
  return raw === "document" ? "document" : "per_page";
}

/** `input` is validated here, so raw CLI values and request bodies can be passed as they are. */
export function resolveRunOptions(input: RunOptionsInput | Record<string, unknown> = {}, env: Env = process.env): RunOptions {
  const parsed = RunOptionsSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigurationError(`Invalid run options: ${issue ? `${issue.path.join(".")} ${issue.message}` : "unknown"}`);
  }
  const o = parsed.data;

  return {
    projectRoot: projectRootAbs(o.projectRoot),
    language: o.language ?? envString(env, "TRANSCRIBE_LANG") ?? DEFAULT_LANGUAGE,
    useApi: o.useApi ?? true,
    hitl: o.hitl ?? true,
    stubMode: o.stubMode ?? "off",
    normalizeMode: o.normalizeMode ?? envNormalizeMode(env),
    dpi: o.dpi ?? envInt(env, "TRANSCRIBE_DPI", DEFAULT_DPI, 72, 1200),
    callTimeoutMs: o.callTimeoutMs ?? envInt(env, "TRANSCRIBE_CALL_TIMEOUT_MS", DEFAULT_CALL_TIMEOUT_MS, 1_000, 30 * 60 * 1000),
    maxAttempts: o.maxAttempts ?? envInt(env, "TRANSCRIBE_MAX_ATTEMPTS", DEFAULT_MAX_ATTEMPTS, 1, 10),
    retryDelayMs: o.retryDelayMs ?? envInt(env, "TRANSCRIBE_RETRY_DELAY_MS", DEFAULT_RETRY_DELAY_MS, 0, 60_000),
    models: {
      diplomatic: envString(env, "TRANSCRIBE_MODEL") ?? DEFAULT_MODEL,
      normalization: envString(env, "NORMALIZE_MODEL") ?? DEFAULT_MODEL
    }
  };
}

/** Live runs read from the model, so they need a key; stub-only runs never touch the network. */
export function needsCredential(options: Pick<RunOptions, "useApi" | "stubMode">): boolean {
  return options.useApi && options.stubMode !== "replay";
}

export function requireApiKey(env: Env = process.env): string {
  const key = envString(env, "OPENAI_API_KEY");
  if (!key) throw new ConfigurationError("Missing OPENAI_API_KEY; set it or run with --no-api");
  return key;
}
