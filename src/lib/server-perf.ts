import { readServerConfig, type ServerConfig } from "@/lib/config";

type PerfPhase = "analyze.request" | "gemini.generate";

type PerfEntry = {
  phase: PerfPhase;
  route: string;
  startedAt: number;
  success: boolean;
  clientKey?: string;
  meta?: Record<string, unknown>;
};

// djb2; only used to keep client addresses out of the logs.
export const hashValue = (value: string) => {
  let hash = 5381;
  for (const char of value) {
    hash = (hash * 33 + char.charCodeAt(0)) | 0;
  }
  return Math.abs(hash).toString(16);
};

const toPerfPayload = ({ phase, route, startedAt, success, clientKey, meta }: PerfEntry) => ({
  phase,
  route,
  duration_ms: Math.max(0, Date.now() - startedAt),
  client_hash: clientKey ? hashValue(clientKey) : null,
  success,
  ...(meta ? { meta } : {}),
});

export const logServerPerf = (entry: PerfEntry, { perfLogging }: Pick<ServerConfig, "perfLogging"> = readServerConfig()) => {
  if (!perfLogging) {
    return;
  }

  console.info("[server-perf]", JSON.stringify(toPerfPayload(entry)));
};
