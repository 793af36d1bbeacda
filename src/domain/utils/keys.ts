import type { OrderingKey } from "@domain/interfaces/message/IMessageMetadata";

/** Unordered messages share the empty key. */
export const UNORDERED_KEY = "";

export function normalizeOrderingKey(key?: OrderingKey | null): string {
  if (key === undefined || key === null) return UNORDERED_KEY;
  if (typeof key === "string") return key;
  return Buffer.from(key.buffer, key.byteOffset, key.byteLength).toString(
    "base64"
  );
}
