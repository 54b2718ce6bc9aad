import { createHash } from "node:crypto";

function toHex(bytes: Uint8Array): string {
  return Array.from(bytes)
    .map((value) => value.toString(16).padStart(2, "0"))
    .join("");
}

/** Name-based (version 5 layout) UUID derived from a SHA-1 of `seed`. */
export function deterministicUuidFromSeed(seed: string): string {
  const hash = createHash("sha1").update(seed).digest();
  const bytes = Uint8Array.from(hash.subarray(0, 16));
  const byte6 = bytes[6] ?? 0;
  const byte8 = bytes[8] ?? 0;

  bytes[6] = (byte6 & 0x0f) | 0x50;
  bytes[8] = (byte8 & 0x3f) | 0x80;

  const hex = toHex(bytes);
  return [
    hex.slice(0, 8),
    hex.slice(8, 12),
    hex.slice(12, 16),
    hex.slice(16, 20),
    hex.slice(20, 32)
  ].join("-");
}
