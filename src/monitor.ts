import path from "node:path";
import cron from "node-cron";
import { PageArchive } from "./archive.js";
import { launchPlaywrightSession, type BrowserSession, type SessionFactory } from "./browser.js";
import { httpDownloader, type Downloader } from "./capture.js";
import type { AppConfig } from "./config.js";
import { bucketize, type Tolerances } from "./consensus.js";
import { BrowserSessionError, ConfigError, errorMessage } from "./errors.js";
import { scopedLogger } from "./logger.js";
import { SamplingScheduler } from "./scheduler.js";
import { HistoryStore, markersOf, upsertSample } from "./store.js";
import { collectTargets } from "./targets.js";
import type { Buckets, CapturedSample, HistoryMap } from "./types.js";

const log = scopedLogger("monitor");

export interface MonitorOptions {
  config: AppConfig;
  targets: Iterable<string>;
  cleanStart?: boolean;
  launchSession?: SessionFactory;
  download?: Downloader;
}

export interface MonitorResult {
  samples: CapturedSample[];
  history: HistoryMap;
  buckets: Buckets;
}

export function tolerancesFrom(config: AppConfig): Tolerances {
  return {
    compressionTolerance: config.COMPRESSION_TOLERANCE,
    screenshotConfidence: config.SCREENSHOT_CONFIDENCE,
    screenshotTolerance: config.SCREENSHOT_TOLERANCE,
  };
}

export function archiveFor(config: AppConfig): PageArchive {
  return new PageArchive({
    pagesDir: path.join(config.DATA_DIR, "pages"),
    keep: config.LOCAL_PAGES_KEPT,
    concurrency: config.ARCHIVE_CONCURRENCY,
  });
}

async function openSession(config: AppConfig, launch: SessionFactory): Promise<BrowserSession> {
  try {
    return await launch(config);
  } catch (err) {
    if (err instanceof BrowserSessionError) throw err;
    throw new BrowserSessionError("Failed to start browser session", { cause: errorMessage(err) });
  }
}

export async function runMonitorOnce(options: MonitorOptions): Promise<MonitorResult> {
  const { config } = options;
  const store = new HistoryStore(config.HISTORY_FILE);
  const archive = archiveFor(config);

  if (options.cleanStart) {
    await store.reset();
    await archive.reset();
  }

  const history = await store.load();
  const targets = collectTargets(options.targets);
  if (targets.length === 0) {
    throw new ConfigError("No targets to check");
  }
  log.info({ targets: targets.length, known: history.size }, "Starting run");

  const session = await openSession(config, options.launchSession ?? launchPlaywrightSession);
  let samples: CapturedSample[];
  try {
    const scheduler = new SamplingScheduler({
      session,
      download: options.download ?? httpDownloader(config.DOWNLOAD_TIMEOUT_SECONDS * 1000),
      dwellTimeMs: config.DWELL_TIME_SECONDS * 1000,
      maxOpenTabs: config.MAX_OPEN_TABS,
      archive: config.KEEP_LOCAL_RECORDS ? archive : undefined,
    });
    samples = await scheduler.run(targets, markersOf(history));
  } finally {
    await session.shutdown();
  }

  for (const { target, sample } of samples) {
    upsertSample(history, target, sample, config.RETENTION_CAP);
  }
  await archive.flush();
  await store.save(history);

  const buckets = bucketize(history, tolerancesFrom(config));
  log.info(
    {
      error: buckets.error.length,
      unknown: buckets.unknown.length,
      hash_only: buckets.hash_only.length,
      valid: buckets.valid.length,
    },
    "Run complete",
  );
  return { samples, history, buckets };
}

export interface ScheduledMonitorOptions {
  config: AppConfig;
  /** Re-read before every pass so edits to the targets file are picked up. */
  resolveTargets: () => Promise<string[]>;
  cleanStart?: boolean;
  onResult?: (result: MonitorResult) => void;
  runOnce?: (options: MonitorOptions) => Promise<MonitorResult>;
  schedule?: (expression: string, task: () => Promise<void>) => void;
}

/**
 * Runs one pass immediately, then one per CRON_SCHEDULE tick. A failed pass is
 * logged and the schedule carries on; a tick that arrives while a pass is still
 * running is skipped.
 */
export async function startScheduledMonitor(options: ScheduledMonitorOptions): Promise<void> {
  const { config } = options;
  if (!cron.validate(config.CRON_SCHEDULE)) {
    throw new ConfigError(`Invalid CRON_SCHEDULE: ${config.CRON_SCHEDULE}`);
  }
  const runOnce = options.runOnce ?? runMonitorOnce;
  const schedule =
    options.schedule ??
    ((expression: string, task: () => Promise<void>) => {
      cron.schedule(expression, task);
    });

  let running = false;
  const pass = async (label: string, cleanStart: boolean): Promise<void> => {
    if (running) {
      log.warn("Previous run still in progress, skipping this tick");
      return;
    }
    running = true;
    log.info(`${label} run started at ${new Date().toISOString()}`);
    try {
      const result = await runOnce({ config, targets: await options.resolveTargets(), cleanStart });
      options.onResult?.(result);
      log.info(`${label} run completed`);
    } catch (err) {
      log.error({ err: errorMessage(err) }, `${label} run failed`);
    } finally {
      running = false;
    }
  };

  await pass("Initial", options.cleanStart ?? false);
  schedule(config.CRON_SCHEDULE, () => pass("Scheduled", false));
  log.info({ schedule: config.CRON_SCHEDULE }, "Scheduled sampling enabled");
}
