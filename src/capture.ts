import axios from "axios";
import type { PageArchive } from "./archive.js";
import type { BrowserSession, NavigationOutcome, TabId } from "./browser.js";
import { errorMessage } from "./errors.js";
import { BLANK_SCREENSHOT_HASH, buildSample } from "./fingerprint.js";
import { scopedLogger } from "./logger.js";
import type { CaptureError, Sample, Target, TargetClass } from "./types.js";
import { canonicalizeTarget } from "./utils.js";

const log = scopedLogger("capture");

/** Per-session token a cookie-consent extension injects into the markup. */
const VOLATILE_PATTERN = / [a-z]* idc0_343/g;

export function stripVolatile(html: string): string {
  return html.replace(VOLATILE_PATTERN, "");
}

export function checkTitle(title: string): CaptureError | undefined {
  if (title.includes("404") || title.includes("Not Found")) return "PageNotFound";
  if (title.includes("Warning")) return "Warning";
  if (title.includes("Error") || title.includes("Unable to") || title.includes("Problem")) return "PageError";
  return undefined;
}

function navigationError(outcome: NavigationOutcome): CaptureError | undefined {
  switch (outcome) {
    case "insecure-certificate":
      return "InsecureCertificate";
    case "failed":
      return "WebDriverError";
    case "ok":
    case "timeout":
      return undefined;
  }
}

/** Last defined tag wins; candidates are listed lowest priority first. */
function strongest(candidates: (CaptureError | undefined)[]): CaptureError | undefined {
  return candidates.reduce<CaptureError | undefined>((acc, tag) => tag ?? acc, undefined);
}

export interface RenderedCapture {
  session: BrowserSession;
  tab: TabId;
  target: Target;
  navigation: NavigationOutcome;
  marker?: string;
  archive?: PageArchive;
}

export async function captureRendered(job: RenderedCapture): Promise<Sample> {
  const { session, tab, target } = job;
  let protocolError: CaptureError | undefined;
  const attempt = async <T>(what: string, op: () => Promise<T>): Promise<T | undefined> => {
    try {
      return await op();
    } catch (err) {
      log.warn({ target, err: errorMessage(err) }, `Failed to ${what}`);
      protocolError = "WebDriverError";
      return undefined;
    }
  };

  const title = await attempt("read title", () => session.readTitle(tab));
  const text = stripVolatile((await attempt("read document", () => session.readDocumentText(tab))) ?? "");
  let image: Buffer;
  try {
    image = await session.screenshot(tab);
  } catch (err) {
    log.warn({ target, err: errorMessage(err) }, "Failed to take screenshot");
    image = Buffer.alloc(0);
  }
  const location = await attempt("read current location", () => session.currentLocation(tab));

  job.archive?.record(target, text, image);

  const sample = await buildSample({ text, image, title, targetClass: "Renderable" });

  const error = strongest([
    sample.screenshotHash === BLANK_SCREENSHOT_HASH ? "BadScreenshot" : undefined,
    job.marker !== undefined && !text.includes(job.marker) ? "MarkerNotFound" : undefined,
    title !== undefined ? checkTitle(title) : undefined,
    location !== undefined && canonicalizeTarget(location) !== target ? "Redirected" : undefined,
    navigationError(job.navigation),
    protocolError,
  ]);
  return error ? { ...sample, error } : sample;
}

export type Downloader = (url: string) => Promise<string>;

export class DownloadError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
  ) {
    super(message);
    this.name = "DownloadError";
  }
}

export function httpDownloader(timeoutMs: number): Downloader {
  return async (url) => {
    try {
      const { data } = await axios.get<string>(url, { responseType: "text", timeout: timeoutMs });
      return data;
    } catch (err) {
      if (axios.isAxiosError(err)) {
        throw new DownloadError(err.message, err.response?.status);
      }
      throw err;
    }
  };
}

export async function captureDirect(target: Target, download: Downloader): Promise<Sample> {
  try {
    const content = await download(target);
    return await buildSample({ text: content, targetClass: "Direct" });
  } catch (err) {
    log.warn({ target, err: errorMessage(err) }, "Download failed");
    let error: CaptureError = "DownloadFailed";
    if (err instanceof DownloadError && err.status !== undefined) {
      error = err.status === 404 ? "PageNotFound" : "PageError";
    }
    return buildSample({ text: "", targetClass: "Direct", error });
  }
}

const UNSUPPORTED_ERRORS: Partial<Record<TargetClass, CaptureError>> = {
  UnsupportedLocal: "LinkTypeLocal",
  UnsupportedMailto: "LinkTypeMailto",
  Unknown: "UnknownLinkType",
  InternalError: "WebDriverError",
};

/** Placeholder sample for targets that are never fetched. */
export function captureUnsupported(targetClass: TargetClass): Promise<Sample> {
  return buildSample({ text: "", targetClass, error: UNSUPPORTED_ERRORS[targetClass] ?? "UnknownLinkType" });
}
