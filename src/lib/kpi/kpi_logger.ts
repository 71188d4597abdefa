export type KpiLogLevel = "info" | "warn" | "error";
export type KpiLogThreshold = KpiLogLevel | "silent";

export const KPI_LOG_THRESHOLDS: readonly KpiLogThreshold[] = ["info", "warn", "error", "silent"];

export type KpiLogEntry = {
  at: string;
  level: KpiLogLevel;
  message: string;
};

export type KpiLogger = {
  entries: KpiLogEntry[];
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
};

const RANK: Record<KpiLogThreshold, number> = {
  info: 0,
  warn: 1,
  error: 2,
  silent: 3,
};

export function createKpiLogger(params: { level?: KpiLogThreshold } = {}): KpiLogger {
  const threshold = params.level ?? "info";
  const entries: KpiLogEntry[] = [];

  const push = (level: KpiLogLevel, message: string) => {
    const entry: KpiLogEntry = {
      at: new Date().toISOString(),
      level,
      message,
    };
    entries.push(entry);

    if (RANK[level] < RANK[threshold]) return;

    if (level === "error") {
      console.error(`[kpi:${level}] ${message}`);
      return;
    }
    if (level === "warn") {
      console.warn(`[kpi:${level}] ${message}`);
      return;
    }
    console.log(`[kpi:${level}] ${message}`);
  };

  return {
    entries,
    info: (message) => push("info", message),
    warn: (message) => push("warn", message),
    error: (message) => push("error", message),
  };
}
