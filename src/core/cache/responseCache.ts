import { createHash } from "node:crypto";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { CacheIOError, isNotFoundError } from "../errors/index.js";
import { createLogger } from "../logger.js";

const logger = createLogger("response-cache");

const ENTRY_EXTENSION = ".txt";

/** md5 hex of the exact prompt bytes. Whitespace counts. */
export function digestPrompt(promptText: string): string {
  return createHash("md5").update(promptText, "utf8").digest("hex");
}

/**
 * File-based response cache.
 * One `<digest>.txt` per prompt holding the cleaned text, nothing else.
 * No eviction and no locking: one process owns the directory at a time.
 *
 * Storage failures are logged and reported as a miss (`get`) or `false`
 * (`put`); they never reach the caller as exceptions.
 */
export class ResponseCache {
  constructor(private readonly cacheDir: string) {}

  get directory(): string {
    return this.cacheDir;
  }

  entryPath(promptText: string): string {
    return path.join(this.cacheDir, `${digestPrompt(promptText)}${ENTRY_EXTENSION}`);
  }

  async get(promptText: string): Promise<string | undefined> {
    const file = this.entryPath(promptText);
    try {
      const text = await fs.readFile(file, "utf-8");
      logger.debug({ file }, "Cache hit");
      return text;
    } catch (error) {
      if (!isNotFoundError(error)) {
        const failure = new CacheIOError("read", file, { cause: error });
        logger.warn({ err: failure, cause: String(error) }, failure.message);
      }
      return undefined;
    }
  }

  async put(promptText: string, text: string): Promise<boolean> {
    const file = this.entryPath(promptText);
    try {
      await fs.mkdir(this.cacheDir, { recursive: true });
      await fs.writeFile(file, text, "utf-8");
      logger.debug({ file }, "Cached response");
      return true;
    } catch (error) {
      const failure = new CacheIOError("write", file, { cause: error });
      logger.warn({ err: failure, cause: String(error) }, failure.message);
      return false;
    }
  }
}
