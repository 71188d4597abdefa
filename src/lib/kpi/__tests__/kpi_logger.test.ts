import { afterEach, describe, expect, it, vi } from "vitest";

import { createKpiLogger } from "../kpi_logger";

function spyConsole() {
  return {
    log: vi.spyOn(console, "log").mockImplementation(() => undefined),
    warn: vi.spyOn(console, "warn").mockImplementation(() => undefined),
    error: vi.spyOn(console, "error").mockImplementation(() => undefined),
  };
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("createKpiLogger", () => {
  it("prints every level at the default threshold", () => {
    const spies = spyConsole();
    const logger = createKpiLogger();

    logger.info("validated 2 rows");

    expect(spies.log).toHaveBeenCalledWith("[kpi:info] validated 2 rows");
  });

  it("hides lines below the threshold but records them", () => {
    const spies = spyConsole();
    const logger = createKpiLogger({ level: "warn" });

    logger.info("validated 2 rows");
    logger.warn("no input file");
    logger.error("DIVISION_BY_ZERO: previous_orders is zero");

    expect(spies.log).not.toHaveBeenCalled();
    expect(spies.warn).toHaveBeenCalledWith("[kpi:warn] no input file");
    expect(spies.error).toHaveBeenCalledWith("[kpi:error] DIVISION_BY_ZERO: previous_orders is zero");
    expect(logger.entries.map((entry) => [entry.level, entry.message])).toEqual([
      ["info", "validated 2 rows"],
      ["warn", "no input file"],
      ["error", "DIVISION_BY_ZERO: previous_orders is zero"],
    ]);
  });

  it("prints nothing when silent", () => {
    const spies = spyConsole();
    const logger = createKpiLogger({ level: "silent" });

    logger.info("a");
    logger.warn("b");
    logger.error("c");

    expect(spies.log).not.toHaveBeenCalled();
    expect(spies.warn).not.toHaveBeenCalled();
    expect(spies.error).not.toHaveBeenCalled();
    expect(logger.entries).toHaveLength(3);
  });
});
