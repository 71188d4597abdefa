import path from "node:path";

import minimist from "minimist";

import { ValidationError } from "./errors";

export type OutputFormat = "json" | "report" | "summary";

export type AnalyzeArgs = {
  file?: string;
  format: OutputFormat;
  currency?: string;
  forecast_label?: string;
};

type RawArgs = {
  file?: unknown;
  format?: unknown;
  report?: unknown;
  json?: unknown;
  currency?: unknown;
  forecast_label?: unknown;
};

function readString(value: unknown): string | undefined {
  if (typeof value !== "string") return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function readFormat(raw: RawArgs): OutputFormat {
  const format = readString(raw.format)?.toLowerCase();
  if (format === "json" || format === "report" || format === "summary") return format;
  if (format) {
    throw new ValidationError({
      reason: `--format must be one of json, report, summary (received ${format}).`,
    });
  }
  if (raw.json === true) return "json";
  if (raw.report === true) return "report";
  return "summary";
}

export function parseAnalyzeArgs(argv: string[], cwd: string = process.cwd()): AnalyzeArgs {
  const raw = minimist<RawArgs>(argv, {
    string: ["file", "format", "currency", "forecast_label"],
    boolean: ["json", "report"],
    alias: { f: "file", "forecast-label": "forecast_label" },
  });

  const file = readString(raw.file) ?? readString(raw._[0]);

  return {
    file: file ? path.resolve(cwd, file) : undefined,
    format: readFormat(raw),
    currency: readString(raw.currency),
    forecast_label: readString(raw.forecast_label),
  };
}
