#!/usr/bin/env node

import { Command } from "commander";
import { applySettingArgs, loadConfig, type AppConfig } from "./config.js";
import { bucketize } from "./consensus.js";
import { ConfigError, errorMessage } from "./errors.js";
import { logger } from "./logger.js";
import { runMonitorOnce, startScheduledMonitor, tolerancesFrom } from "./monitor.js";
import { HistoryStore, setMarker } from "./store.js";
import { collectTargets, readTargetsFile } from "./targets.js";
import type { Buckets } from "./types.js";

interface RunOptions {
  targets?: string;
  once?: boolean;
  cleanStart?: boolean;
  set: string[];
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function log(msg: string): void {
  console.log(msg);
}

async function resolveTargets(urls: string[], config: AppConfig, file?: string): Promise<string[]> {
  if (urls.length > 0) return urls;
  const source = file ?? config.TARGETS_FILE;
  if (!source) {
    throw new ConfigError("No targets given: pass URLs, --targets <file> or set TARGETS_FILE");
  }
  return readTargetsFile(source);
}

function printBuckets(buckets: Buckets): void {
  for (const [title, rows] of [
    ["Error", buckets.error],
    ["Unknown", buckets.unknown],
    ["Hash only", buckets.hash_only],
    ["Valid", buckets.valid],
  ] as const) {
    log(`${title} (${rows.length})`);
    for (const row of rows) {
      const c = row.classification;
      const detail = [c.error, ...c.invalidReasons.map((r) => `!${r}`)].filter(Boolean).join(" ");
      log(`  ${row.target}${detail ? `  ${detail}` : ""}`);
    }
  }
}

const program = new Command();

program
  .name("linkwatch")
  .description("Re-sample web pages through a browser and flag drift against their history")
  .version("0.1.0");

program
  .command("run")
  .description("Sample every target now, then keep sampling on CRON_SCHEDULE")
  .argument("[urls...]", "targets to check instead of the targets file")
  .option("--targets <file>", "file with one target per line")
  .option("--once", "run a single pass and exit")
  .option("--clean-start", "delete the history store and local page copies first")
  .option("--set <KEY=VALUE>", "override a setting (repeatable)", collect, [])
  .action(async (urls: string[], opts: RunOptions) => {
    const config = applySettingArgs(loadConfig(), opts.set);

    if (opts.once) {
      const targets = await resolveTargets(urls, config, opts.targets);
      const { buckets } = await runMonitorOnce({ config, targets, cleanStart: opts.cleanStart });
      printBuckets(buckets);
      return;
    }

    await startScheduledMonitor({
      config,
      resolveTargets: () => resolveTargets(urls, config, opts.targets),
      cleanStart: opts.cleanStart,
      onResult: (result) => printBuckets(result.buckets),
    });
  });

program
  .command("marker <url> [text]")
  .description("Set the text expected on a page, or clear it when no text is given")
  .action(async (url: string, text: string | undefined) => {
    const config = loadConfig();
    const [target] = collectTargets([url]);
    if (!target) throw new ConfigError(`Not a valid target: ${url}`);

    const store = new HistoryStore(config.HISTORY_FILE);
    const history = await store.load();
    setMarker(history, target, text);
    await store.save(history);
    log(text ? `Marker set for ${target}` : `Marker cleared for ${target}`);
  });

program
  .command("status")
  .description("Classify every stored target against its history")
  .option("--set <KEY=VALUE>", "override a setting (repeatable)", collect, [])
  .action(async (opts: { set: string[] }) => {
    const config = applySettingArgs(loadConfig(), opts.set);
    const history = await new HistoryStore(config.HISTORY_FILE).load();
    printBuckets(bucketize(history, tolerancesFrom(config)));
  });

program.parseAsync().catch((err: unknown) => {
  logger.fatal({ err: errorMessage(err) }, "Fatal");
  process.exit(1);
});
