import path from "node:path";
import type { Target, TargetClass } from "./types.js";

const DIRECT_EXTENSIONS = new Set([
  ".docx",
  ".doc",
  ".xlsx",
  ".xls",
  ".pptx",
  ".ppt",
  ".odt",
  ".ods",
  ".pdf",
  ".csv",
  ".zip",
]);

const HIERARCHICAL_PROTOCOLS = new Set(["http:", "https:", "file:"]);

/** Path of a hierarchical URL; empty for anything else. */
function pathOf(target: Target): string {
  try {
    const url = new URL(target);
    return HIERARCHICAL_PROTOCOLS.has(url.protocol) ? url.pathname : "";
  } catch {
    return "";
  }
}

export function isDirectDocument(target: Target): boolean {
  return DIRECT_EXTENSIONS.has(path.posix.extname(pathOf(target)).toLowerCase());
}

/** Handling class of a target, derived from its text alone. */
export function classifyTarget(target: Target): TargetClass {
  const lower = target.toLowerCase();
  if (isDirectDocument(target)) return "Direct";
  if (lower.startsWith("http://") || lower.startsWith("https://")) return "Renderable";
  if (lower.startsWith("file://") || target.includes("/User")) return "UnsupportedLocal";
  if (lower.startsWith("mailto:")) return "UnsupportedMailto";
  return "Unknown";
}
