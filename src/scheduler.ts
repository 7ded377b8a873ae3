import type { PageArchive } from "./archive.js";
import type { BrowserSession, NavigationOutcome, TabId, TabInfo } from "./browser.js";
import { captureDirect, captureRendered, captureUnsupported, type Downloader } from "./capture.js";
import { classifyTarget } from "./classify.js";
import { errorMessage } from "./errors.js";
import { scopedLogger } from "./logger.js";
import type { CapturedSample, Target } from "./types.js";
import { sleep } from "./utils.js";

const log = scopedLogger("scheduler");

interface WaitingEntry {
  target: Target;
  tab: TabId;
  navigation: NavigationOutcome;
  dispatchedAt: number;
}

export interface SchedulerOptions {
  session: BrowserSession;
  download: Downloader;
  dwellTimeMs: number;
  /** Hard limit on tabs open at once; 0 leaves it to the dwell time. */
  maxOpenTabs?: number;
  archive?: PageArchive;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Visits each target once. Rendered pages are opened in their own tab and
 * only captured after they have been open for the dwell time, so several
 * pages settle in parallel while the number of open tabs stays bounded.
 */
export class SamplingScheduler {
  private readonly queue: WaitingEntry[] = [];
  private readonly results: CapturedSample[] = [];
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private markers: ReadonlyMap<Target, string> = new Map();
  private peakOpenTabs = 0;
  private strayTabs: TabInfo[] = [];

  constructor(private readonly options: SchedulerOptions) {
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? sleep;
  }

  /** Largest number of tabs held open during the last run. */
  get peakTabs(): number {
    return this.peakOpenTabs;
  }

  /** Tabs the browser still held after the last run had closed everything it opened. */
  get leftoverTabs(): readonly TabInfo[] {
    return this.strayTabs;
  }

  /** Samples in the order they were captured. */
  async run(targets: Iterable<Target>, markers: ReadonlyMap<Target, string> = new Map()): Promise<CapturedSample[]> {
    this.markers = markers;
    this.results.length = 0;
    this.peakOpenTabs = 0;
    this.strayTabs = [];

    for (const target of targets) {
      const targetClass = classifyTarget(target);
      if (targetClass !== "Renderable") {
        const sample =
          targetClass === "Direct"
            ? await captureDirect(target, this.options.download)
            : await captureUnsupported(targetClass);
        this.results.push({ target, sample });
        continue;
      }

      const cap = this.options.maxOpenTabs ?? 0;
      if (cap > 0 && this.queue.length >= cap) {
        await this.retireHead(true);
      }

      await this.dispatch(target);

      const head = this.queue[0];
      if (head && this.now() - head.dispatchedAt >= this.options.dwellTimeMs) {
        await this.retireHead(false);
      }
    }

    while (this.queue.length > 0) {
      await this.retireHead(true);
    }
    await this.sweepTabs();

    log.info({ captured: this.results.length, peakOpenTabs: this.peakOpenTabs }, "Sampling finished");
    return [...this.results];
  }

  private async sweepTabs(): Promise<void> {
    try {
      this.strayTabs = await this.options.session.listTabs();
    } catch (err) {
      log.warn({ err: errorMessage(err) }, "Failed to list open tabs");
      return;
    }
    for (const tab of this.strayTabs) {
      log.warn({ tab: tab.id, target: tab.label, url: tab.url }, "Tab left open after sampling");
    }
  }

  private async dispatch(target: Target): Promise<void> {
    const { session } = this.options;
    let tab: TabId;
    try {
      tab = await session.openTab();
    } catch (err) {
      log.error({ target, err: errorMessage(err) }, "Failed to open tab");
      this.results.push({ target, sample: await captureUnsupported("InternalError") });
      return;
    }

    log.info({ target }, "Loading page");
    const navigation = await session.navigate(tab, target).catch((err: unknown): NavigationOutcome => {
      log.warn({ target, err: errorMessage(err) }, "Navigation failed");
      return "failed";
    });
    await session.setTabLabel(tab, target).catch((err: unknown) => {
      log.warn({ target, err: errorMessage(err) }, "Failed to label tab");
    });

    this.queue.push({ target, tab, navigation, dispatchedAt: this.now() });
    this.peakOpenTabs = Math.max(this.peakOpenTabs, this.queue.length);
  }

  private async retireHead(waitForDeadline: boolean): Promise<void> {
    const entry = this.queue.shift();
    if (!entry) return;

    if (waitForDeadline) {
      const remaining = entry.dispatchedAt + this.options.dwellTimeMs - this.now();
      if (remaining > 0) await this.sleep(remaining);
    }

    log.info({ target: entry.target }, "Capturing page");
    const { session, archive } = this.options;
    const sample = await captureRendered({
      session,
      tab: entry.tab,
      target: entry.target,
      navigation: entry.navigation,
      marker: this.markers.get(entry.target),
      archive,
    });

    try {
      await session.closeTab(entry.tab);
    } catch (err) {
      log.warn({ target: entry.target, err: errorMessage(err) }, "Failed to close tab");
    }
    this.results.push({ target: entry.target, sample });
  }
}
