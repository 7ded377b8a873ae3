import { afterEach, beforeEach, describe, expect, it } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { PageArchive } from "../archive.js";
import { sha256 } from "../utils.js";

let dir: string;
const target = "https://example.com/";
const png = Buffer.from([0x89, 0x50, 0x4e, 0x47]);

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "linkwatch-archive-"));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe("PageArchive", () => {
  it("stores pages under the target's hash and keeps only the newest copies", async () => {
    const archive = new PageArchive({ pagesDir: path.join(dir, "pages"), keep: 2, concurrency: 1 });
    for (const day of [1, 2, 3]) {
      archive.record(target, `<p>${day}</p>`, png, new Date(Date.UTC(2024, 0, day)));
    }
    await archive.flush();

    const targetDir = path.join(dir, "pages", sha256(target));
    expect(archive.dirFor(target)).toBe(targetDir);
    expect(fs.readdirSync(targetDir).sort()).toEqual([
      "page_2024-01-02T00-00-00-000Z.html",
      "page_2024-01-03T00-00-00-000Z.html",
      "screenshot_2024-01-02T00-00-00-000Z.png",
      "screenshot_2024-01-03T00-00-00-000Z.png",
    ]);
    expect(fs.readFileSync(path.join(targetDir, "page_2024-01-03T00-00-00-000Z.html"), "utf8")).toBe("<p>3</p>");
  });

  it("skips the screenshot file when there is no image", async () => {
    const archive = new PageArchive({ pagesDir: path.join(dir, "pages"), keep: 2, concurrency: 1 });
    archive.record(target, "<p>x</p>", Buffer.alloc(0), new Date(Date.UTC(2024, 0, 1)));
    await archive.flush();
    expect(fs.readdirSync(archive.dirFor(target))).toEqual(["page_2024-01-01T00-00-00-000Z.html"]);
  });

  it("absorbs write failures", async () => {
    const blocker = path.join(dir, "blocker");
    fs.writeFileSync(blocker, "", "utf8");
    const archive = new PageArchive({ pagesDir: path.join(blocker, "pages"), keep: 2, concurrency: 2 });
    archive.record(target, "<p>x</p>", png);
    await expect(archive.flush()).resolves.toBeUndefined();
  });

  it("removes everything on reset", async () => {
    const archive = new PageArchive({ pagesDir: path.join(dir, "pages"), keep: 2, concurrency: 1 });
    archive.record(target, "<p>x</p>", png);
    await archive.flush();
    await archive.reset();
    expect(fs.existsSync(path.join(dir, "pages"))).toBe(false);
  });
});
