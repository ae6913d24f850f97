import type { DecodedBytePattern } from "./types.js";

const BYTE_TOKEN = /^[0-9A-Fa-f]{2}$/;
const NIBBLE_WILDCARD_TOKEN = /^(?:[0-9A-Fa-f]\?|\?[0-9A-Fa-f])$/;

/**
 * Decodes a hex string body into concrete bytes. Wildcard positions hold a
 * 0x00 placeholder and are listed in `wildcardOffsets`.
 *
 * Jumps (`[2-4]`), alternations and any other token are skipped without
 * advancing the position, so patterns using them decode shorter than what
 * they actually match.
 */
export function decodeHexPattern(body: string): DecodedBytePattern {
  const bytes: number[] = [];
  const wildcardOffsets = new Set<number>();

  for (const token of hexTokens(body)) {
    if (BYTE_TOKEN.test(token)) {
      bytes.push(Number.parseInt(token, 16));
    } else if (token === "??" || NIBBLE_WILDCARD_TOKEN.test(token)) {
      wildcardOffsets.add(bytes.length);
      bytes.push(0x00);
    }
  }

  return { bytes: Uint8Array.from(bytes), wildcardOffsets };
}

export function concreteByteCount(pattern: DecodedBytePattern): number {
  return pattern.bytes.length - pattern.wildcardOffsets.size;
}

export function hexTokens(body: string): string[] {
  const trimmed = body.trim();
  const inner =
    trimmed.startsWith("{") && trimmed.endsWith("}")
      ? trimmed.slice(1, -1)
      : trimmed;
  return inner.split(/\s+/).filter((token) => token.length > 0);
}
