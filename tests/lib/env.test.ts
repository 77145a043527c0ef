import { loadEnv, parseEnv } from "@/lib/env";

describe("parseEnv", () => {
  it("falls back to defaults for unset variables", () => {
    expect(parseEnv({})).toEqual({
      success: true,
      data: {
        useMockData: false,
        storage: { dataDir: "data", salesFileName: "sales", extension: "csv", delimiter: "," },
        currency: { symbol: "€" },
        logLevel: "info",
        logDir: null,
      },
    });
  });

  it.each([
    ["yes", true],
    ["1", true],
    ["0", false],
    ["off", false],
    ["maybe", false],
  ])("reads MOCK_DATA=%s as %s", (value, expected) => {
    const parsed = parseEnv({ MOCK_DATA: value });
    expect(parsed.success && parsed.data.useMockData).toBe(expected);
  });

  it("accepts tab spelled out as the delimiter", () => {
    const named = parseEnv({ TABLE_DELIMITER: "tab" });
    const escaped = parseEnv({ TABLE_DELIMITER: "\\t" });

    expect(named.success && named.data.storage.delimiter).toBe("\t");
    expect(escaped.success && escaped.data.storage.delimiter).toBe("\t");
  });

  it("rejects a delimiter outside the supported set", () => {
    expect(parseEnv({ TABLE_DELIMITER: ":" })).toEqual({
      success: false,
      fieldErrors: { TABLE_DELIMITER: ["TABLE_DELIMITER debe ser ',', ';', '|' o tab"] },
    });
  });

  it("drops the extension from the sales file name", () => {
    const parsed = parseEnv({ SALES_FILE_NAME: "ventas.CSV", TABLE_FILE_EXTENSION: "CSV" });

    expect(parsed.success && parsed.data.storage).toEqual({
      dataDir: "data",
      salesFileName: "ventas",
      extension: "csv",
      delimiter: ",",
    });
  });

  it("normalizes the log level and rejects unknown ones", () => {
    const upper = parseEnv({ LOG_LEVEL: "WARN" });
    expect(upper.success && upper.data.logLevel).toBe("warn");

    const unknown = parseEnv({ LOG_LEVEL: "loud" });
    expect(unknown.success).toBe(false);
    expect(!unknown.success && Object.keys(unknown.fieldErrors)).toEqual(["LOG_LEVEL"]);
  });

  it("keeps logs off disk unless LOG_DIR is set", () => {
    const blank = parseEnv({ LOG_DIR: "  " });
    const set = parseEnv({ LOG_DIR: " logs " });

    expect(blank.success && blank.data.logDir).toBeNull();
    expect(set.success && set.data.logDir).toBe("logs");
  });
});

describe("loadEnv", () => {
  it("throws after reporting the invalid variables", () => {
    const consoleError = jest.spyOn(console, "error").mockImplementation(() => undefined);

    expect(() => loadEnv({ STOCK_DATA_DIR: "   " })).toThrow("Variables de entorno inválidas. Revisa el archivo .env");
    expect(consoleError).toHaveBeenCalledWith("Error al validar variables de entorno", {
      STOCK_DATA_DIR: ["STOCK_DATA_DIR no puede estar vacío"],
    });

    consoleError.mockRestore();
  });

  it("reads process.env by default", () => {
    const previous = process.env.STOCK_DATA_DIR;
    process.env.STOCK_DATA_DIR = "from-process-env";
    try {
      expect(loadEnv().storage.dataDir).toBe("from-process-env");
    } finally {
      if (previous === undefined) {
        delete process.env.STOCK_DATA_DIR;
      } else {
        process.env.STOCK_DATA_DIR = previous;
      }
    }
  });
});
