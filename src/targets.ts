import fs from "node:fs/promises";
import { scopedLogger } from "./logger.js";
import type { Target } from "./types.js";
import { canonicalizeTarget } from "./utils.js";

const log = scopedLogger("targets");

/**
 * Canonical, de-duplicated targets sorted by their string form, so that two
 * runs over the same input visit pages in the same order.
 */
export function collectTargets(raw: Iterable<string>): Target[] {
  const seen = new Set<Target>();
  for (const entry of raw) {
    const target = canonicalizeTarget(entry);
    if (target === null) {
      if (entry.trim()) log.warn({ entry }, "Skipping unparsable target");
      continue;
    }
    seen.add(target);
  }
  return [...seen].sort();
}

/** One identifier per line; blank lines and `#` comments are ignored. */
export async function readTargetsFile(filePath: string): Promise<string[]> {
  const content = await fs.readFile(filePath, "utf8");
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("#"));
}
