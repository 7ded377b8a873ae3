import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { HistoryStoreError, errorMessage } from "./errors.js";
import { scopedLogger } from "./logger.js";
import { CAPTURE_ERRORS, type HistoryMap, type Sample, type Target, type TargetRecord } from "./types.js";

const log = scopedLogger("store");

const sampleSchema = z.object({
  digest: z.string(),
  compressedSize: z.number().int().nonnegative(),
  screenshotHash: z.string().optional(),
  title: z.string().optional(),
  targetClass: z.enum(["Renderable", "Direct", "UnsupportedLocal", "UnsupportedMailto", "Unknown", "InternalError"]),
  capturedAt: z.string().datetime(),
  error: z.enum(CAPTURE_ERRORS).optional(),
});

const recordSchema = z.object({
  marker: z.string().optional(),
  lastChecked: z.string().datetime(),
  history: z.array(sampleSchema),
});

const fileSchema = z.record(recordSchema);

function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Appends `sample` to the target's history, evicting the oldest samples once
 * the history exceeds `retentionCap`. Records are replaced, never edited.
 */
export function upsertSample(map: HistoryMap, target: Target, sample: Sample, retentionCap: number): TargetRecord {
  const existing = map.get(target);
  const history = existing ? [...existing.history, sample] : [sample];
  const record: TargetRecord = {
    ...existing,
    lastChecked: new Date().toISOString(),
    history: history.slice(Math.max(0, history.length - retentionCap)),
  };
  map.set(target, record);
  return record;
}

/** Assigns (or, with `undefined`, clears) the marker expected on a target's page. */
export function setMarker(map: HistoryMap, target: Target, marker: string | undefined): TargetRecord {
  const existing = map.get(target);
  const record: TargetRecord = existing
    ? { ...existing }
    : { lastChecked: new Date().toISOString(), history: [] };
  if (marker) {
    record.marker = marker;
  } else {
    delete record.marker;
  }
  map.set(target, record);
  return record;
}

export function markersOf(map: HistoryMap): Map<Target, string> {
  const markers = new Map<Target, string>();
  for (const [target, record] of map) {
    if (record.marker) markers.set(target, record.marker);
  }
  return markers;
}

export class HistoryStore {
  constructor(private readonly filePath: string) {}

  async load(): Promise<HistoryMap> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, "utf8");
    } catch (err) {
      if (isMissing(err)) {
        log.info({ path: this.filePath }, "History store does not exist yet");
        return new Map();
      }
      throw new HistoryStoreError(`Failed to read history store: ${this.filePath}`, { cause: errorMessage(err) });
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new HistoryStoreError(`Failed to parse history store: ${this.filePath}`, { cause: errorMessage(err) });
    }

    const parsed = fileSchema.safeParse(json);
    if (!parsed.success) {
      throw new HistoryStoreError(`History store has an invalid layout: ${this.filePath}`, {
        issues: parsed.error.issues.slice(0, 5).map((i) => `${i.path.join(".")}: ${i.message}`),
      });
    }
    return new Map(Object.entries(parsed.data));
  }

  async save(map: HistoryMap): Promise<void> {
    const sorted: Record<string, TargetRecord> = {};
    for (const target of [...map.keys()].sort()) {
      const record = map.get(target);
      if (record) sorted[target] = record;
    }

    const dir = path.dirname(this.filePath);
    const tmp = path.join(dir, `.${path.basename(this.filePath)}.${process.pid}.tmp`);
    try {
      await fs.mkdir(dir, { recursive: true });
      await fs.writeFile(tmp, JSON.stringify(sorted, null, 2), "utf8");
      await fs.rename(tmp, this.filePath);
    } catch (err) {
      await fs.rm(tmp, { force: true }).catch((rmErr: unknown) => {
        log.warn({ path: tmp, err: errorMessage(rmErr) }, "Failed to remove temporary history file");
      });
      throw new HistoryStoreError(`Failed to write history store: ${this.filePath}`, { cause: errorMessage(err) });
    }
    log.info({ path: this.filePath, targets: map.size }, "History store saved");
  }

  async reset(): Promise<void> {
    await fs.rm(this.filePath, { force: true });
    log.info({ path: this.filePath }, "History store removed");
  }
}
