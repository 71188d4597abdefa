import "dotenv/config";

import fs from "node:fs/promises";
import path from "node:path";

import { parseAnalyzeArgs } from "../../src/lib/kpi/cli_args";
import { getKpiEngineConfig } from "../../src/lib/kpi/config";
import {
  EXPECTED_FORMAT_GUIDE,
  buildPlaceholderDashboard,
  renderDashboardText,
} from "../../src/lib/kpi/dashboard";
import { toKpiFailure } from "../../src/lib/kpi/errors";
import { parseFile } from "../../src/lib/kpi/file_parsers";
import { createKpiLogger } from "../../src/lib/kpi/kpi_logger";
import { buildTextReport } from "../../src/lib/kpi/report";
import { runKpiEngine } from "../../src/lib/kpi/run_kpi_engine";

async function main() {
  const args = parseAnalyzeArgs(process.argv.slice(2));
  const envConfig = getKpiEngineConfig();
  const config = {
    ...envConfig,
    currency_symbol: args.currency ?? envConfig.currency_symbol,
    forecast_label: args.forecast_label ?? envConfig.forecast_label,
  };
  // info lines go to stdout; keep JSON output parseable
  const logger = createKpiLogger({
    level: args.format === "json" && config.log_level === "info" ? "warn" : config.log_level,
  });

  if (!args.file) {
    logger.warn("No input file given; showing the placeholder dashboard.");
    process.stdout.write(`${EXPECTED_FORMAT_GUIDE}\n\n`);
    process.stdout.write(`${JSON.stringify(buildPlaceholderDashboard(config), null, 2)}\n`);
    return;
  }

  const buffer = await fs.readFile(args.file);
  const table = await parseFile(path.basename(args.file), buffer);
  logger.info(`loaded ${table.rows.length} rows from ${path.basename(args.file)}`);

  const result = runKpiEngine(table, { logger, config });

  if (args.format === "json") {
    process.stdout.write(`${JSON.stringify(result, null, 2)}\n`);
    return;
  }
  if (args.format === "report") {
    process.stdout.write(`${buildTextReport(result, config)}\n`);
    return;
  }
  process.stdout.write(`${renderDashboardText(result, config)}\n`);
}

main().catch((error) => {
  process.stderr.write(`${JSON.stringify(toKpiFailure(error), null, 2)}\n`);
  process.exit(1);
});
