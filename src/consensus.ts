import { hashDistance } from "./fingerprint.js";
import type {
  Buckets,
  Classification,
  ClassificationStatus,
  ConsensusBaseline,
  HistoryMap,
  InvalidReason,
  Mode,
  Sample,
  TargetRecord,
  ValidReason,
} from "./types.js";

export interface Tolerances {
  compressionTolerance: number;
  screenshotConfidence: number;
  screenshotTolerance: number;
}

/**
 * Most frequent value with its share of `total` as a whole percentage.
 * On a tie the value seen first wins.
 */
export function computeMode<T>(values: readonly T[], total: number = values.length): Mode<T> | undefined {
  const counts = new Map<T, number>();
  for (const value of values) {
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }

  let best: Mode<T> | undefined;
  let bestCount = 0;
  for (const [value, count] of counts) {
    if (count > bestCount) {
      best = { value, confidence: Math.floor((count * 100) / total) };
      bestCount = count;
    }
  }
  return best;
}

export function within(value: number, target: number, tolerance: number): boolean {
  return value >= target - tolerance && value <= target + tolerance;
}

function present<T>(value: T | undefined): value is T {
  return value !== undefined;
}

export function consensusBaseline(prior: readonly Sample[]): ConsensusBaseline {
  const total = prior.length;
  return {
    digest: computeMode(prior.map((s) => s.digest), total),
    compressedSize: computeMode(prior.map((s) => s.compressedSize), total),
    title: computeMode(prior.map((s) => s.title).filter(present), total),
    screenshotHash: computeMode(prior.map((s) => s.screenshotHash).filter(present), total),
  };
}

export function validateRecord(record: TargetRecord, tolerances: Tolerances): Classification {
  const prior = record.history.slice(0, -1);
  const current = record.history[record.history.length - 1];
  if (!current || prior.length === 0) {
    return { status: "insufficient_history" };
  }

  const baseline = consensusBaseline(prior);
  const validReasons: ValidReason[] = [];
  const invalidReasons: InvalidReason[] = [];

  if (current.digest === baseline.digest?.value) {
    validReasons.push("PageHash");
  } else {
    invalidReasons.push("PageHash");
  }

  if (baseline.compressedSize) {
    const mode = baseline.compressedSize.value;
    if (current.compressedSize === mode) {
      validReasons.push("CompressionExact");
    } else if (within(current.compressedSize, mode, tolerances.compressionTolerance)) {
      validReasons.push("CompressionWithinTolerance");
    } else {
      invalidReasons.push("Compression");
    }
  }

  const shot = baseline.screenshotHash;
  if (current.screenshotHash === shot?.value) {
    validReasons.push("ScreenshotHashExact");
  } else if (
    shot &&
    shot.confidence > tolerances.screenshotConfidence &&
    current.screenshotHash !== undefined &&
    hashDistance(current.screenshotHash, shot.value) < tolerances.screenshotTolerance
  ) {
    validReasons.push("ScreenshotHashWithinTolerance");
  } else {
    invalidReasons.push("ScreenshotHash");
  }

  if (baseline.title) {
    if ((current.title ?? "") === baseline.title.value) {
      validReasons.push("Title");
    } else {
      invalidReasons.push("Title");
    }
  }

  let status: ClassificationStatus;
  if (current.error) {
    status = "error";
  } else if (invalidReasons.length === 0) {
    status = "valid";
  } else if (invalidReasons.length === 1 && invalidReasons[0] === "PageHash") {
    status = "hash_only";
  } else {
    status = "unknown";
  }

  return { status, baseline, validReasons, invalidReasons, error: current.error };
}

/** Groups every classifiable target by status; targets without prior history are left out. */
export function bucketize(map: HistoryMap, tolerances: Tolerances): Buckets {
  const buckets: Buckets = { error: [], unknown: [], hash_only: [], valid: [] };
  for (const target of [...map.keys()].sort()) {
    const record = map.get(target);
    if (!record) continue;
    const classification = validateRecord(record, tolerances);
    if (classification.status === "insufficient_history") continue;
    buckets[classification.status].push({ target, marker: record.marker, classification });
  }
  return buckets;
}
