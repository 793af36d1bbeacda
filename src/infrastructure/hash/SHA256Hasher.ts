import type { OrderingKey } from "@domain/interfaces/message/IMessageMetadata";
import type { IHasher } from "@domain/ports/IHasher";
import { createHash } from "node:crypto";

/** First 32 bits of the key's SHA-256 digest, unsigned. */
export class SHA256Hasher implements IHasher {
  hash(key: OrderingKey): number {
    return createHash("sha256").update(key).digest().readUInt32BE(0);
  }
}
