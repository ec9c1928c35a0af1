/**
 * Centralized environment configuration
 * All env access MUST go through this file
 */

function getEnv(key: string, defaultValue?: string): string {
  const value = process.env[key];
  if (value === undefined || value === "") {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

function getList(key: string, defaultValue: string): string[] {
  return getEnv(key, defaultValue)
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export const ENV = {
  // ----------------------------
  // Server
  // ----------------------------
  PORT: parseInt(getEnv("PORT", "5000"), 10),
  NODE_ENV: getEnv("NODE_ENV", "development"),
  CORS_ORIGIN: getEnv("CORS_ORIGIN", "*"),

  // ----------------------------
  // Card data
  // ----------------------------
  // Loaded in order; a later file wins on a card-name collision
  CARD_DATA_FILES: getList(
    "CARD_DATA_FILES",
    "backend/data/axis-atlas.json,backend/data/icici-epm.json"
  ),

  // ----------------------------
  // LLM providers
  // ----------------------------
  GOOGLE_API_KEY: process.env.GOOGLE_API_KEY || "",
  GEMINI_MODEL: getEnv("GEMINI_MODEL", "gemini-1.5-flash"),
  OPENAI_API_KEY: process.env.OPENAI_API_KEY || "",
  OPENAI_MODEL: getEnv("OPENAI_MODEL", "gpt-4o-mini"),

  // Preference order; providers without a key are skipped
  LLM_PROVIDER_ORDER: getList("LLM_PROVIDER_ORDER", "gemini,openai"),
  LLM_TIMEOUT_MS: parseInt(getEnv("LLM_TIMEOUT_MS", "30000"), 10),

  // ----------------------------
  // Debug
  // ----------------------------
  ENABLE_DEBUG: getEnv("ENABLE_DEBUG", "true") === "true",
};
