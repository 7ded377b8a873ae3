import { beforeAll, beforeEach, describe, expect, it } from "vitest";
import { createHash } from "node:crypto";
import { DownloadError, type Downloader } from "../capture.js";
import { BLANK_SCREENSHOT_HASH } from "../fingerprint.js";
import { SamplingScheduler, type SchedulerOptions } from "../scheduler.js";
import { FakeSession, GRADIENT_HASH, gradientPng, type FakePage } from "./fakeSession.js";

let png: Buffer;
let clock: number;
let sleeps: number[];

const noDownload: Downloader = async () => {
  throw new Error("unexpected download");
};

function scheduler(session: FakeSession, options: Partial<SchedulerOptions> = {}): SamplingScheduler {
  return new SamplingScheduler({
    session,
    download: noDownload,
    dwellTimeMs: 0,
    now: () => clock,
    sleep: async (ms) => {
      sleeps.push(ms);
      clock += ms;
    },
    ...options,
  });
}

function session(pages: Record<string, FakePage> = {}, navigateCostMs = 0): FakeSession {
  const s = new FakeSession(png, pages);
  s.onNavigate = () => {
    clock += navigateCostMs;
  };
  return s;
}

beforeAll(async () => {
  png = await gradientPng();
});

beforeEach(() => {
  clock = 0;
  sleeps = [];
});

describe("SamplingScheduler dwell time", () => {
  it("retires a single target right after dispatch when the dwell time is zero", async () => {
    const s = session();
    const results = await scheduler(s).run(["https://example.com/"]);

    expect(sleeps).toEqual([]);
    expect(s.calls).toEqual([
      "open tab-1",
      "navigate tab-1 https://example.com/",
      "label tab-1",
      "title tab-1",
      "text tab-1",
      "screenshot tab-1",
      "location tab-1",
      "close tab-1",
    ]);
    expect(results).toHaveLength(1);
    expect(results[0]?.sample.error).toBeUndefined();
    expect(results[0]?.sample.title).toBe("Example Domain");
    expect(results[0]?.sample.screenshotHash).toBe(GRADIENT_HASH);
  });

  it("closes each page before opening the next when the dwell time is zero", async () => {
    const s = session();
    await scheduler(s).run(["https://example.com/a", "https://example.com/b"]);
    expect(s.calls.indexOf("close tab-1")).toBeLessThan(s.calls.indexOf("open tab-2"));
  });

  it("drains the waiting queue in FIFO order, sleeping until each deadline", async () => {
    const s = session({}, 100);
    const sched = scheduler(s, { dwellTimeMs: 1000 });
    const results = await sched.run(["https://example.com/a", "https://example.com/b", "https://example.com/c"]);

    expect(sleeps).toEqual([800, 100, 100]);
    expect(results.map((r) => r.target)).toEqual([
      "https://example.com/a",
      "https://example.com/b",
      "https://example.com/c",
    ]);
    expect(sched.peakTabs).toBe(3);
  });

  it("retires the queue head during dispatch once it has dwelled long enough", async () => {
    const s = session({}, 100);
    const sched = scheduler(s, { dwellTimeMs: 150 });
    await sched.run(["https://example.com/a", "https://example.com/b", "https://example.com/c", "https://example.com/d"]);

    expect(sleeps).toEqual([50, 100]);
    expect(s.calls.indexOf("close tab-1")).toBeLessThan(s.calls.indexOf("open tab-4"));
    expect(s.calls.indexOf("close tab-2")).toBeGreaterThan(s.calls.indexOf("open tab-4"));
    expect(sched.peakTabs).toBe(3);
  });

  it("honours a hard cap on open tabs", async () => {
    const s = session({}, 100);
    const sched = scheduler(s, { dwellTimeMs: 1000, maxOpenTabs: 1 });
    await sched.run(["https://example.com/a", "https://example.com/b"]);

    expect(sleeps).toEqual([1000, 1000]);
    expect(sched.peakTabs).toBe(1);
    expect(s.calls.indexOf("close tab-1")).toBeLessThan(s.calls.indexOf("open tab-2"));
  });
});

describe("SamplingScheduler non-rendered targets", () => {
  it("captures unsupported targets without touching the browser", async () => {
    const s = session();
    const results = await scheduler(s).run(["mailto:someone@example.com", "file:///tmp/notes.txt"]);

    expect(s.calls).toEqual([]);
    expect(results.map((r) => [r.sample.targetClass, r.sample.error])).toEqual([
      ["UnsupportedMailto", "LinkTypeMailto"],
      ["UnsupportedLocal", "LinkTypeLocal"],
    ]);
  });

  it("downloads direct documents", async () => {
    const s = session();
    const download: Downloader = async (url) => `contents of ${url}`;
    const [result] = await scheduler(s, { download }).run(["https://example.com/report.pdf"]);

    const expected = createHash("sha256").update("contents of https://example.com/report.pdf").digest("hex");
    expect(result?.sample.targetClass).toBe("Direct");
    expect(result?.sample.digest).toBe(expected);
    expect(result?.sample.screenshotHash).toBeUndefined();
    expect(result?.sample.error).toBeUndefined();
    expect(s.calls).toEqual([]);
  });

  it("tags a missing direct document as not found", async () => {
    const download: Downloader = async () => {
      throw new DownloadError("Request failed with status code 404", 404);
    };
    const [result] = await scheduler(session(), { download }).run(["https://example.com/gone.docx"]);
    expect(result?.sample.error).toBe("PageNotFound");
  });
});

describe("SamplingScheduler capture checks", () => {
  const target = "https://example.com/account";

  it("flags a missing marker", async () => {
    const s = session({ [target]: { html: "<p>Hello</p>" } });
    const [result] = await scheduler(s).run([target], new Map([[target, "Welcome back"]]));
    expect(result?.sample.error).toBe("MarkerNotFound");
  });

  it("accepts a page containing its marker", async () => {
    const s = session({ [target]: { html: "<p>Welcome back</p>" } });
    const [result] = await scheduler(s).run([target], new Map([[target, "Welcome back"]]));
    expect(result?.sample.error).toBeUndefined();
  });

  it("flags error titles", async () => {
    const s = session({ [target]: { title: "404 Not Found" } });
    const [result] = await scheduler(s).run([target]);
    expect(result?.sample.error).toBe("PageNotFound");
    expect(result?.sample.title).toBe("404 Not Found");
  });

  it("flags a redirect", async () => {
    const s = session({ [target]: { location: "https://example.com/login" } });
    const [result] = await scheduler(s).run([target]);
    expect(result?.sample.error).toBe("Redirected");
  });

  it("prefers the redirect over a bad title", async () => {
    const s = session({ [target]: { title: "Problem loading page", location: "https://example.com/login" } });
    const [result] = await scheduler(s).run([target]);
    expect(result?.sample.error).toBe("Redirected");
  });

  it("tags an insecure certificate reported during navigation", async () => {
    const s = session({ [target]: { navigation: "insecure-certificate" } });
    const [result] = await scheduler(s).run([target]);
    expect(result?.sample.error).toBe("InsecureCertificate");
  });

  it("ignores a navigation timeout", async () => {
    const s = session({ [target]: { navigation: "timeout" } });
    const [result] = await scheduler(s).run([target]);
    expect(result?.sample.error).toBeUndefined();
  });

  it("degrades a failed title read to a protocol error", async () => {
    const s = session({ [target]: { failTitle: true } });
    const [result] = await scheduler(s).run([target]);
    expect(result?.sample.error).toBe("WebDriverError");
    expect(result?.sample.title).toBeUndefined();
  });

  it("records a failed screenshot as the blank hash", async () => {
    const s = session({ [target]: { failScreenshot: true } });
    const [result] = await scheduler(s).run([target]);
    expect(result?.sample.screenshotHash).toBe(BLANK_SCREENSHOT_HASH);
    expect(result?.sample.error).toBe("BadScreenshot");
  });

  it("strips the consent-extension token before fingerprinting", async () => {
    const s = session({ [target]: { html: '<div class="x abc idc0_343">Hi</div>' } });
    const [result] = await scheduler(s).run([target]);
    const expected = createHash("sha256").update('<div class="x">Hi</div>').digest("hex");
    expect(result?.sample.digest).toBe(expected);
  });

  it("keeps going when a tab cannot be closed", async () => {
    const s = session({ [target]: { failClose: true } });
    const sched = scheduler(s);
    const results = await sched.run([target, "https://example.com/next"]);
    expect(results.map((r) => r.target)).toEqual([target, "https://example.com/next"]);
    expect(sched.leftoverTabs).toEqual([{ id: "tab-1", label: target, url: target }]);
  });

  it("reports no leftover tabs after a clean run", async () => {
    const sched = scheduler(session());
    await sched.run(["https://example.com/a", "https://example.com/b"]);
    expect(sched.leftoverTabs).toEqual([]);
  });

  it("records an internal error when no tab can be opened", async () => {
    const s = session();
    s.failOpenTab = true;
    const [result] = await scheduler(s).run([target]);
    expect(result?.sample.targetClass).toBe("InternalError");
    expect(result?.sample.error).toBe("WebDriverError");
  });
});
