/** Canonical resource identifier, e.g. "https://example.com/docs?page=2". */
export type Target = string;

export type TargetClass =
  | "Renderable"
  | "Direct"
  | "UnsupportedLocal"
  | "UnsupportedMailto"
  | "Unknown"
  | "InternalError";

export const CAPTURE_ERRORS = [
  "InsecureCertificate",
  "Redirected",
  "MarkerNotFound",
  "UnknownLinkType",
  "LinkTypeLocal",
  "LinkTypeMailto",
  "BadScreenshot",
  "PageNotFound",
  "PageError",
  "Warning",
  "WebDriverError",
  "DownloadFailed",
] as const;

export type CaptureError = (typeof CAPTURE_ERRORS)[number];

export interface Sample {
  digest: string; // sha256 hex of the raw text
  compressedSize: number;
  screenshotHash?: string;
  title?: string;
  targetClass: TargetClass;
  capturedAt: string; // ISO
  error?: CaptureError;
}

export interface TargetRecord {
  marker?: string;
  lastChecked: string; // ISO
  history: Sample[];
}

export type HistoryMap = Map<Target, TargetRecord>;

export type ValidReason =
  | "PageHash"
  | "CompressionExact"
  | "CompressionWithinTolerance"
  | "ScreenshotHashExact"
  | "ScreenshotHashWithinTolerance"
  | "Title";

export type InvalidReason = "PageHash" | "Compression" | "ScreenshotHash" | "Title";

export interface Mode<T> {
  value: T;
  confidence: number; // percent of prior samples
}

export interface ConsensusBaseline {
  digest?: Mode<string>;
  compressedSize?: Mode<number>;
  title?: Mode<string>;
  screenshotHash?: Mode<string>;
}

export type ClassificationStatus = "valid" | "hash_only" | "unknown" | "error";

export type Classification =
  | { status: "insufficient_history" }
  | {
      status: ClassificationStatus;
      baseline: ConsensusBaseline;
      validReasons: ValidReason[];
      invalidReasons: InvalidReason[];
      error?: CaptureError;
    };

export interface ClassifiedTarget {
  target: Target;
  marker?: string;
  classification: Exclude<Classification, { status: "insufficient_history" }>;
}

export type Buckets = Record<ClassificationStatus, ClassifiedTarget[]>;

export interface CapturedSample {
  target: Target;
  sample: Sample;
}
