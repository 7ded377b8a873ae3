import fs from "node:fs/promises";
import path from "node:path";
import pLimit, { type LimitFunction } from "p-limit";
import { errorMessage } from "./errors.js";
import { scopedLogger } from "./logger.js";
import type { Target } from "./types.js";
import { sha256 } from "./utils.js";

const log = scopedLogger("archive");

export interface PageArchiveOptions {
  pagesDir: string;
  keep: number;
  concurrency: number;
}

/**
 * Local copies of captured pages, one directory per target. Writes happen in
 * the background; a failed write is logged and never reaches the run.
 */
export class PageArchive {
  private readonly limit: LimitFunction;
  private readonly pending: Promise<void>[] = [];

  constructor(private readonly options: PageArchiveOptions) {
    this.limit = pLimit(options.concurrency);
  }

  dirFor(target: Target): string {
    return path.join(this.options.pagesDir, sha256(target));
  }

  record(target: Target, html: string, screenshot: Buffer, at: Date = new Date()): void {
    this.pending.push(
      this.limit(() => this.write(target, html, screenshot, at)).catch((err: unknown) => {
        log.error({ target, err: errorMessage(err) }, "Failed to save local page copy");
      }),
    );
  }

  /** Resolves once every queued write has finished or failed. */
  async flush(): Promise<void> {
    const queued = this.pending.splice(0);
    await Promise.all(queued);
  }

  async reset(): Promise<void> {
    await fs.rm(this.options.pagesDir, { recursive: true, force: true });
    log.info({ dir: this.options.pagesDir }, "Local page copies removed");
  }

  private async write(target: Target, html: string, screenshot: Buffer, at: Date): Promise<void> {
    const dir = this.dirFor(target);
    await fs.mkdir(dir, { recursive: true });

    const stamp = at.toISOString().replace(/[:.]/g, "-");
    await fs.writeFile(path.join(dir, `page_${stamp}.html`), html, "utf8");
    if (screenshot.length > 0) {
      await fs.writeFile(path.join(dir, `screenshot_${stamp}.png`), screenshot);
    }

    await this.prune(dir);
  }

  private async prune(dir: string): Promise<void> {
    const files = await fs.readdir(dir);
    for (const prefix of ["page_", "screenshot_"]) {
      // ISO stamps sort chronologically, newest last
      const stale = files.filter((f) => f.startsWith(prefix)).sort().slice(0, -this.options.keep);
      for (const file of stale) {
        await fs.rm(path.join(dir, file), { force: true });
      }
    }
  }
}
