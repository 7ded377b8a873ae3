import { describe, expect, it } from "vitest";
import { classifyTarget, isDirectDocument } from "../classify.js";

describe("classifyTarget", () => {
  it.each([
    ["https://example.com/", "Renderable"],
    ["http://example.com/page?x=1", "Renderable"],
    ["https://example.com/files/Plan.DOCX", "Direct"],
    ["https://example.com/report.pdf?download=1", "Direct"],
    ["file:///home/me/notes.html", "UnsupportedLocal"],
    ["smb://share/Users/me", "UnsupportedLocal"],
    ["mailto:someone@example.com", "UnsupportedMailto"],
    ["ftp://example.com/readme", "Unknown"],
    ["tel:+15550100", "Unknown"],
  ])("classifies %s as %s", (target, expected) => {
    expect(classifyTarget(target)).toBe(expected);
  });

  it("checks the document extension before the scheme", () => {
    expect(classifyTarget("file:///tmp/form.docx")).toBe("Direct");
  });

  it("only reads document extensions from hierarchical URLs", () => {
    expect(classifyTarget("mailto:files/report.pdf")).toBe("UnsupportedMailto");
    expect(classifyTarget("ftp://example.com/report.pdf")).toBe("Unknown");
  });

  it("gives the same answer every time", () => {
    const target = "https://example.com/a";
    expect(new Set([1, 2, 3].map(() => classifyTarget(target))).size).toBe(1);
  });
});

describe("isDirectDocument", () => {
  it("ignores extensions that only appear in the query", () => {
    expect(isDirectDocument("https://example.com/view?file=a.pdf")).toBe(false);
  });
});
