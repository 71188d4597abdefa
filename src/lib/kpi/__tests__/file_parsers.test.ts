import ExcelJS from "exceljs";
import { describe, expect, it } from "vitest";

import { ValidationError } from "../errors";
import { parseCsvFile, parseFile, parseXlsxFile } from "../file_parsers";

describe("parseCsvFile", () => {
  it("normalizes headers, trims cells, and skips blank lines and the BOM", () => {
    const csv = "\uFEFFMonth,Revenue,Orders\nJan-2024, 1000 ,50\n\nFeb-2024,900,50\n";
    const parsed = parseCsvFile("sales.csv", Buffer.from(csv, "utf8"));

    expect(parsed).toEqual({
      filename: "sales.csv",
      columns: ["month", "revenue", "orders"],
      rows: [
        { month: "Jan-2024", revenue: "1000", orders: "50" },
        { month: "Feb-2024", revenue: "900", orders: "50" },
      ],
    });
  });

  it("returns headers even when there are no data rows", () => {
    const parsed = parseCsvFile("empty.csv", Buffer.from("Month,Revenue,Orders\n", "utf8"));
    expect(parsed.columns).toEqual(["month", "revenue", "orders"]);
    expect(parsed.rows).toEqual([]);
  });

  it("fills short rows with empty cells", () => {
    const parsed = parseCsvFile("short.csv", Buffer.from("Month,Revenue,Orders\nJan,100\n", "utf8"));
    expect(parsed.rows).toEqual([{ month: "Jan", revenue: "100", orders: "" }]);
  });

  it("wraps unreadable CSV in a ValidationError", () => {
    expect(() => parseCsvFile("bad.csv", Buffer.from('Month,Revenue\n"Jan,100\n', "utf8"))).toThrow(
      ValidationError
    );
  });
});

describe("parseXlsxFile", () => {
  it("reads the first worksheet", async () => {
    const workbook = new ExcelJS.Workbook();
    const sheet = workbook.addWorksheet("Sales");
    sheet.addRow(["Month", "Revenue", "Orders"]);
    sheet.addRow(["Jan", 1000, 50]);
    sheet.addRow(["Feb", 1100, 55]);
    const buffer = Buffer.from(await workbook.xlsx.writeBuffer());

    const parsed = await parseXlsxFile("sales.xlsx", buffer);

    expect(parsed.columns).toEqual(["month", "revenue", "orders"]);
    expect(parsed.rows).toEqual([
      { month: "Jan", revenue: "1000", orders: "50" },
      { month: "Feb", revenue: "1100", orders: "55" },
    ]);
  });
});

describe("parseFile", () => {
  it("dispatches on the extension", async () => {
    const parsed = await parseFile("SALES.CSV", Buffer.from("Month,Revenue,Orders\nJan,1,1\n", "utf8"));
    expect(parsed.rows).toHaveLength(1);
  });

  it("rejects legacy and unknown formats", async () => {
    await expect(parseFile("sales.xls", Buffer.from(""))).rejects.toThrow(
      "XLS files are not supported. Please save as .xlsx."
    );
    await expect(parseFile("sales.txt", Buffer.from(""))).rejects.toThrow("Unsupported file type: .txt");
    await expect(parseFile("sales", Buffer.from(""))).rejects.toThrow("Unsupported file type: (none)");
  });
});
