import crypto from "node:crypto";

export function sha256(input: string | Buffer): string {
  return crypto.createHash("sha256").update(input).digest("hex");
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Canonical form of a target identifier: WHATWG serialisation (lower-cased
 * scheme and host, default port dropped, path percent-encoded) without the
 * fragment. Returns null for strings that do not parse as absolute URLs.
 */
export function canonicalizeTarget(raw: string): string | null {
  const trimmed = raw.trim();
  if (!trimmed) return null;
  try {
    const url = new URL(trimmed);
    url.hash = "";
    return url.toString();
  } catch {
    return null;
  }
}
