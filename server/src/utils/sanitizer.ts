// Leaves room for the `{token}-` prefix under the usual 255-byte name limit.
const MAX_FILENAME_BYTES = 200;

/**
 * Reduces a client supplied filename to a display name that is safe to use
 * as the suffix of a storage path.
 * Rules:
 * - Basename only, splitting on both / and \
 * - Control characters removed, surrounding whitespace trimmed
 * - At most 200 bytes of UTF-8, cut on a character boundary
 * - Fallback to 'file' if nothing usable is left
 */
export function sanitizeFilename(name: string | undefined | null): string {
  if (!name) return "file";

  const base = name.split(/[\\/]/).pop() || "";

  // eslint-disable-next-line no-control-regex
  let s = base.replace(/[\x00-\x1f\x7f]/g, "").trim();

  if (Buffer.byteLength(s, "utf8") > MAX_FILENAME_BYTES) {
    s = truncateUtf8(s, MAX_FILENAME_BYTES);
  }

  if (!s || s === "." || s === "..") return "file";

  return s;
}

function truncateUtf8(value: string, maxBytes: number): string {
  let bytes = 0;
  let out = "";
  for (const char of value) {
    bytes += Buffer.byteLength(char, "utf8");
    if (bytes > maxBytes) break;
    out += char;
  }
  return out;
}
