export type ArmoredBlock = {
  label: string;
  /** `Name: value` lines between the BEGIN marker and the first blank line or body line. */
  headers: string[];
  /** Every non-empty line between the markers, headers included. */
  lines: string[];
  body: string;
  complete: boolean;
};

const BEGIN_RE = /^-----BEGIN ([A-Z0-9 ]+)-----$/;
const HEADER_RE = /^[A-Za-z][A-Za-z0-9-]*:/;

export function toText(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString("latin1");
}

/**
 * Finds the first `-----BEGIN X-----` block. A block without its END marker is
 * returned with `complete: false` and whatever body was present.
 */
export function readArmoredBlock(text: string): ArmoredBlock | null {
  const lines = text.split(/\r?\n/).map((line) => line.trim());
  const beginAt = lines.findIndex((line) => BEGIN_RE.test(line));
  if (beginAt < 0) return null;
  const label = BEGIN_RE.exec(lines[beginAt] ?? "")?.[1] ?? "";
  const endMarker = `-----END ${label}-----`;

  const headers: string[] = [];
  const inner: string[] = [];
  const bodyLines: string[] = [];
  let inHeaders = true;
  let complete = false;
  for (const line of lines.slice(beginAt + 1)) {
    if (line === endMarker) {
      complete = true;
      break;
    }
    if (line) inner.push(line);
    if (inHeaders && HEADER_RE.test(line)) {
      headers.push(line);
      continue;
    }
    inHeaders = false;
    if (line) bodyLines.push(line);
  }

  return { label, headers, lines: inner, body: bodyLines.join(""), complete };
}
