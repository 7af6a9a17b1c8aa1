#!/usr/bin/env node
import "dotenv/config";
import * as fs from "node:fs/promises";
import { applyOverrides, loadConfig, DEFAULT_CONFIG_PATH, type AppConfig } from "../core/config/index.js";
import { CodescribeError, ConfigError, describeError } from "../core/errors/index.js";
import { addLogFile, setLogLevel } from "../core/logger.js";
import { DocumentationRun } from "../core/pipeline/documentationRun.js";
import { createEngine, documentProject } from "../core/pipeline/session.js";
import { CodeEntityListSchema, type DocumentedEntity } from "../core/schemas/index.js";
import { parseArgs, USAGE, type CliArgs } from "./args.js";

async function documentEntitiesFile(config: AppConfig, file: string): Promise<void> {
  let data: unknown;
  try {
    data = JSON.parse(await fs.readFile(file, "utf-8"));
  } catch (error) {
    throw new ConfigError(`Cannot read entities file ${file}: ${describeError(error)}`, { cause: error });
  }
  const parsed = CodeEntityListSchema.safeParse(data);
  if (!parsed.success) {
    throw ConfigError.fromZod(`entities file ${file}`, parsed.error);
  }

  const engine = await createEngine(config);
  try {
    const run = new DocumentationRun(engine);
    const startedAt = new Date().toISOString();
    const results: DocumentedEntity[] = [];
    for (const entity of parsed.data) {
      results.push(await run.documentEntity(entity));
    }
    const summary = run.summarize(startedAt, 0);
    console.log(JSON.stringify({ summary, results }, null, 2));
  } finally {
    await engine.dispose();
  }
}

async function documentSources(config: AppConfig): Promise<void> {
  console.log("═══════════════════════════════════════════════════════");
  console.log("  codescribe");
  console.log("═══════════════════════════════════════════════════════");
  console.log(`  Backend:  ${config.backend.backendType}`);
  console.log(`  Language: ${config.codeLanguage}`);
  console.log(`  Input:    ${config.inputDir}`);
  console.log(`  Output:   ${config.outputDir} (${config.outputFormat})`);
  console.log("───────────────────────────────────────────────────────\n");

  const result = await documentProject(config);
  const { summary } = result;

  console.log("\n✅ Documentation generated\n");
  console.log(`  Run ID:    ${summary.runId}`);
  console.log(`  Backend:   ${result.backend}`);
  console.log(`  Files:     ${summary.files}`);
  console.log(`  Entities:  ${summary.entities} (${summary.failed} failed)`);
  for (const [source, count] of Object.entries(summary.bySource)) {
    console.log(`    ${source.padEnd(10)} ${count}`);
  }
  console.log(`  Documents: ${result.written.length}`);
}

async function main(argv: string[]): Promise<number> {
  let args: CliArgs;
  try {
    args = parseArgs(argv);
  } catch (error) {
    console.error(describeError(error));
    console.error(USAGE);
    return 1;
  }

  if (args.help) {
    console.log(USAGE);
    return 0;
  }
  if (args.verbose) {
    setLogLevel("debug");
  }

  try {
    const config = applyOverrides(await loadConfig(args.config ?? DEFAULT_CONFIG_PATH), {
      inputDir: args.input,
      outputDir: args.output,
      outputFormat: args.format,
      modelPath: args.model,
      backendType: args.backend,
    });
    if (config.logFile) {
      addLogFile(config.logFile);
    }

    if (args.entities) {
      await documentEntitiesFile(config, args.entities);
    } else {
      await documentSources(config);
    }
    return 0;
  } catch (error) {
    const label = error instanceof CodescribeError ? error.name : "Error";
    console.error(`\n❌ ${label}: ${describeError(error)}`);
    return 1;
  }
}

main(process.argv.slice(2)).then((code) => {
  process.exitCode = code;
});
