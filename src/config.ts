export const DEFAULT_COMPLETION_BASE_URL = "https://api.groq.com/openai/v1";
export const DEFAULT_COMPLETION_MODEL = "llama-3.3-70b-versatile";

export type CompletionConfig = {
  apiKey: string | null;
  baseURL: string;
  model: string;
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
  maxRetries: number;
  backoffBaseMs: number;
  backoffMultiplier: number;
};

export type AdvisorConfig = {
  port: number;
  completion: CompletionConfig;
};

let cachedConfig: AdvisorConfig | null = null;

const optionalEnv = (name: string): string | null => process.env[name]?.trim() || null;

const parsePositiveInt = (value: string | undefined, fallback: number): number => {
  const parsed = Number.parseInt(value ?? "", 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
};

const parseNonNegativeInt = (value: string | undefined, fallback: number): number => {
  const parsed = Number.parseInt(value ?? "", 10);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
};

const parseNonNegativeFloat = (value: string | undefined, fallback: number): number => {
  const parsed = Number.parseFloat(value ?? "");
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
};

const parseFloatAtLeast = (value: string | undefined, min: number, fallback: number): number => {
  const parsed = Number.parseFloat(value ?? "");
  return Number.isFinite(parsed) && parsed >= min ? parsed : fallback;
};

export function getConfig(): AdvisorConfig {
  if (cachedConfig) return cachedConfig;

  cachedConfig = {
    port: parsePositiveInt(process.env.PORT, 3000),
    completion: {
      apiKey: optionalEnv("COMPLETION_API_KEY") ?? optionalEnv("GROQ_API_KEY"),
      baseURL: optionalEnv("COMPLETION_BASE_URL") ?? DEFAULT_COMPLETION_BASE_URL,
      model: optionalEnv("COMPLETION_MODEL") ?? DEFAULT_COMPLETION_MODEL,
      temperature: parseNonNegativeFloat(process.env.COMPLETION_TEMPERATURE, 0.3),
      maxTokens: parsePositiveInt(process.env.COMPLETION_MAX_TOKENS, 1024),
      timeoutMs: parsePositiveInt(process.env.COMPLETION_TIMEOUT_MS, 20000),
      maxRetries: parseNonNegativeInt(process.env.COMPLETION_MAX_RETRIES, 2),
      backoffBaseMs: parseNonNegativeInt(process.env.COMPLETION_BACKOFF_BASE_MS, 500),
      backoffMultiplier: parseFloatAtLeast(process.env.COMPLETION_BACKOFF_MULTIPLIER, 1, 2),
    },
  };

  return cachedConfig;
}

/** Forget the cached configuration so the next getConfig() re-reads the environment. */
export function resetConfig(): void {
  cachedConfig = null;
}
