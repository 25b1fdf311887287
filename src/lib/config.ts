export type ServerConfig = {
  geminiApiKey: string;
  geminiModel: string;
  requestTimeoutMs: number;
  host: string;
  port: number;
  debug: boolean;
  allowedOrigins: string[];
  maxFileSizeMb: number;
  maxFileSizeBytes: number;
  allowedFileTypes: string[];
  rateLimitMaxRequests: number;
  rateLimitWindowMs: number;
  trustedProxyHops: number;
  perfLogging: boolean;
};

export const SERVICE_NAME = "pantry-snap";
export const SERVICE_VERSION = "1.0.0";

const DEFAULT_GEMINI_MODEL = "gemini-2.0-flash";
const DEFAULT_TIMEOUT_MS = 30000;
const MIN_TIMEOUT_MS = 1000;
const DEFAULT_HOST = "0.0.0.0";
const DEFAULT_PORT = 8000;
const DEFAULT_ALLOWED_ORIGINS = "http://localhost:3000,http://127.0.0.1:3000";
const DEFAULT_MAX_FILE_SIZE_MB = 10;
const DEFAULT_ALLOWED_FILE_TYPES = "image/jpeg,image/jpg,image/png,image/webp";
const DEFAULT_RATE_LIMIT_MAX_REQUESTS = 10;
const DEFAULT_RATE_LIMIT_WINDOW_MS = 60000;
const DEFAULT_TRUSTED_PROXY_HOPS = 1;

const readPositiveInt = (raw: string | undefined, fallback: number, minimum = 1) => {
  const parsed = Number.parseInt(raw ?? "", 10);
  if (Number.isNaN(parsed) || parsed < minimum) {
    return fallback;
  }
  return parsed;
};

const readFlag = (raw: string | undefined) => /^(1|true|yes)$/i.test(raw?.trim() ?? "");

const readPerfLogging = () => {
  if (process.env.NODE_ENV === "test") {
    return false;
  }

  const raw = process.env.PERF_LOGGING_ENABLED;
  return raw?.trim() ? readFlag(raw) : true;
};

const readList = (raw: string | undefined, fallback: string) =>
  (raw?.trim() ? raw : fallback)
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);

export const readServerConfig = (): ServerConfig => {
  const maxFileSizeMb = readPositiveInt(process.env.MAX_FILE_SIZE_MB, DEFAULT_MAX_FILE_SIZE_MB);

  return {
    geminiApiKey: process.env.GEMINI_API_KEY?.trim() ?? "",
    geminiModel: process.env.GEMINI_MODEL?.trim() || DEFAULT_GEMINI_MODEL,
    requestTimeoutMs: readPositiveInt(
      process.env.GEMINI_TIMEOUT_MS,
      DEFAULT_TIMEOUT_MS,
      MIN_TIMEOUT_MS
    ),
    host: process.env.HOST?.trim() || DEFAULT_HOST,
    port: readPositiveInt(process.env.PORT, DEFAULT_PORT),
    debug: readFlag(process.env.DEBUG),
    allowedOrigins: readList(process.env.ALLOWED_ORIGINS, DEFAULT_ALLOWED_ORIGINS),
    maxFileSizeMb,
    maxFileSizeBytes: maxFileSizeMb * 1024 * 1024,
    allowedFileTypes: readList(process.env.ALLOWED_FILE_TYPES, DEFAULT_ALLOWED_FILE_TYPES).map(
      (type) => type.toLowerCase()
    ),
    rateLimitMaxRequests: readPositiveInt(
      process.env.RATE_LIMIT_MAX_REQUESTS,
      DEFAULT_RATE_LIMIT_MAX_REQUESTS
    ),
    rateLimitWindowMs: readPositiveInt(process.env.RATE_LIMIT_WINDOW_MS, DEFAULT_RATE_LIMIT_WINDOW_MS),
    trustedProxyHops: readPositiveInt(process.env.TRUSTED_PROXY_HOPS, DEFAULT_TRUSTED_PROXY_HOPS),
    perfLogging: readPerfLogging(),
  };
};
