import { describe, it, expect } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { addLogFile, createLogger } from "../core/logger.js";
import { makeTempDir } from "./helpers/fakes.js";

describe("logger", () => {
  it("should also write log lines to the added log file", async () => {
    const dir = await makeTempDir();
    const file = path.join(dir, "logs", "codescribe.log");
    const logger = createLogger("log-file-test");
    logger.level = "info";

    try {
      addLogFile(file);
      logger.info({ entity: "premium" }, "Documented");
      logger.debug("below the level");

      const lines = (await fs.readFile(file, "utf-8")).trim().split("\n");
      expect(lines).toHaveLength(1);
      expect(JSON.parse(lines[0] ?? "")).toMatchObject({
        level: 30,
        name: "log-file-test",
        entity: "premium",
        msg: "Documented",
      });
    } finally {
      logger.level = "silent";
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});
