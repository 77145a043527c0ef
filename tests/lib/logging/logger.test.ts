import { readFile, writeFile } from "fs/promises";
import path from "path";
import { createLogger } from "@/lib/logging/logger";
import { createTempDir } from "../../helpers/config";

describe("createLogger", () => {
  let stderr: jest.SpyInstance;
  let stdout: jest.SpyInstance[];

  beforeEach(() => {
    stderr = jest.spyOn(console, "error").mockImplementation(() => undefined);
    stdout = [
      jest.spyOn(console, "log").mockImplementation(() => undefined),
      jest.spyOn(console, "info").mockImplementation(() => undefined),
      jest.spyOn(console, "debug").mockImplementation(() => undefined),
      jest.spyOn(console, "warn").mockImplementation(() => undefined),
    ];
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("writes one JSON line per entry at or above the level to stderr", () => {
    const logger = createLogger("warn", { scope: "test-scope" });

    logger.info("ignored");
    logger.warn("sell_product failed", { product: "Apples" });

    expect(stderr).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(stderr.mock.calls[0][0]))).toMatchObject({
      level: "warn",
      scope: "test-scope",
      message: "sell_product failed",
      context: { product: "Apples" },
    });
    stdout.forEach((spy) => expect(spy).not.toHaveBeenCalled());
  });

  it("replaces a context that cannot be serialized", () => {
    const circular: Record<string, unknown> = {};
    circular.self = circular;

    createLogger("info").info("cycle", circular);

    expect(JSON.parse(String(stderr.mock.calls[0][0]))).toMatchObject({ message: "cycle", context: "[unserializable]" });
  });

  it("writes nothing when silent", () => {
    const logger = createLogger("silent");
    logger.info("a");
    logger.error("b");

    expect(stderr).not.toHaveBeenCalled();
  });

  describe("with a log directory", () => {
    let dir: string;
    let cleanup: () => Promise<void>;
    const now = () => new Date(2025, 2, 14, 9, 5, 30);

    beforeEach(async () => {
      ({ dir, cleanup } = await createTempDir());
    });

    afterEach(async () => {
      await cleanup();
    });

    it("appends entries to a daily file and keeps the console quiet", async () => {
      const logDir = path.join(dir, "logs");
      const logger = createLogger("info", { dir: logDir, now });

      logger.info("add_product completed", { product: "Apples" });
      logger.warn("sell_product failed");

      const lines = (await readFile(path.join(logDir, "stock-ledger_20250314.log"), "utf8")).trimEnd().split("\n");
      expect(lines.map((line) => JSON.parse(line))).toEqual([
        {
          timestamp: now().toISOString(),
          level: "info",
          scope: "stock-ledger",
          message: "add_product completed",
          context: { product: "Apples" },
        },
        { timestamp: now().toISOString(), level: "warn", scope: "stock-ledger", message: "sell_product failed" },
      ]);
      expect(stderr).not.toHaveBeenCalled();
    });

    it("falls back to stderr when the directory cannot be created", async () => {
      const blocked = path.join(dir, "not-a-dir");
      await writeFile(blocked, "");

      createLogger("info", { dir: blocked, now }).info("stocked");

      expect(stderr).toHaveBeenCalledTimes(1);
      expect(JSON.parse(String(stderr.mock.calls[0][0]))).toMatchObject({ message: "stocked" });
    });
  });
});
