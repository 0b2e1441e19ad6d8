// Characters that must never reach a log line or a WebSocket close reason.
function isLineBreaking(code: number): boolean {
  return code <= 0x1f || code === 0x7f || code === 0x85 || code === 0x2028 || code === 0x2029;
}

/**
 * Collapse control characters and whitespace runs into single spaces.
 */
export function toOneLine(input: string): string {
  const parts: string[] = [];
  let word = "";
  for (const ch of input) {
    if (isLineBreaking(ch.codePointAt(0) ?? 0) || /\s/u.test(ch)) {
      if (word) parts.push(word);
      word = "";
      continue;
    }
    word += ch;
  }
  if (word) parts.push(word);
  return parts.join(" ");
}

export function truncateUtf8(input: string, maxBytes: number): string {
  if (!Number.isInteger(maxBytes) || maxBytes < 0) return "";
  const encoded = Buffer.from(input, "utf8");
  if (encoded.length <= maxBytes) return input;
  let cut = maxBytes;
  // Back off continuation bytes so we never split a code point.
  while (cut > 0 && ((encoded[cut] ?? 0) & 0xc0) === 0x80) cut -= 1;
  return encoded.subarray(0, cut).toString("utf8");
}

function stringifySafe(input: unknown): string {
  if (typeof input === "string") return input;
  if (input === null || input === undefined) return String(input);
  if (typeof input === "number" || typeof input === "boolean" || typeof input === "bigint") return String(input);
  try {
    return String(input);
  } catch {
    return "";
  }
}

export function formatOneLine(input: unknown, maxBytes: number): string {
  return truncateUtf8(toOneLine(stringifySafe(input)), maxBytes);
}

function readMessage(err: object): string | undefined {
  try {
    const message = "message" in err ? err.message : undefined;
    return typeof message === "string" ? message : undefined;
  } catch {
    return undefined;
  }
}

/**
 * Render an arbitrary thrown value as a bounded single line. Objects without a
 * string `message` are not stringified; they render as `fallback`.
 */
export function formatErrorMessage(err: unknown, maxBytes: number, fallback = "Error"): string {
  let raw: string | undefined;
  if (err !== null && (typeof err === "object" || typeof err === "function")) {
    raw = readMessage(err);
  } else {
    raw = stringifySafe(err);
  }
  const out = raw === undefined ? "" : formatOneLine(raw, maxBytes);
  return out || fallback;
}
