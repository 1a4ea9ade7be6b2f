import { InvalidPathError } from "./errors.js";

export const VALID_PATH = /^\/(save|edit|view)\/([a-zA-Z0-9]+)$/;
export const TITLE_PATTERN = /^[a-zA-Z0-9]+$/;

export type TitleResult =
  | { ok: true; title: string }
  | { ok: false; error: InvalidPathError };

// Titles become file names directly, so this match is the whole
// path-traversal boundary.
export function extractTitle(requestPath: string): TitleResult {
  const m = VALID_PATH.exec(requestPath);
  if (!m) return { ok: false, error: new InvalidPathError(requestPath) };
  return { ok: true, title: m[2] };
}

/** Path portion of a raw request URL, percent-decoded. */
export function requestPath(url: string): string {
  const q = url.indexOf("?");
  const raw = q === -1 ? url : url.slice(0, q);
  try {
    return decodeURIComponent(raw);
  } catch {
    // malformed escape: keep it raw, VALID_PATH rejects the '%'
    return raw;
  }
}
