import type { ServerConfig } from "@/lib/config";

export const CORS_ALLOWED_METHODS = "GET, POST, PUT, DELETE, OPTIONS";

export const isOriginAllowed = (
  origin: string | null,
  { allowedOrigins, debug }: Pick<ServerConfig, "allowedOrigins" | "debug">
) => {
  if (!origin) {
    return false;
  }
  return debug || allowedOrigins.includes("*") || allowedOrigins.includes(origin);
};

export const applyCorsHeaders = (
  headers: Headers,
  origin: string,
  requestedHeaders: string | null
) => {
  headers.set("Access-Control-Allow-Origin", origin);
  headers.set("Access-Control-Allow-Credentials", "true");
  headers.set("Access-Control-Allow-Methods", CORS_ALLOWED_METHODS);
  headers.set("Access-Control-Allow-Headers", requestedHeaders ?? "*");
  headers.append("Vary", "Origin");
};
