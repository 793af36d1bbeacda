import {
  InvalidTopicError,
  PartitionLimitExceededError,
} from "@domain/errors/PubSubError";
import type { IHasher } from "@domain/ports/IHasher";
import { createPubSub } from "@infra/factories/PubSubFactory";
import { SHA256Hasher } from "@infra/hash/SHA256Hasher";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  bytes,
  createRecordingDriver,
  flush,
  recordBatches,
} from "./helpers";

/** Partition id = key length mod partition count. */
const lengthHasher: IHasher = {
  hash: (key) => (typeof key === "string" ? key.length : key.byteLength),
};

function setup(maxPartitions = 1024) {
  const { driver } = createRecordingDriver();
  const pubsub = createPubSub(
    { partitionCount: 4, maxPartitions, closeGracePeriodMs: 50 },
    { logDriver: driver, hasher: lengthHasher }
  );
  return { pubsub, partitioner: pubsub.partitioner() };
}

describe("Partitioner", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(0);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("maps keys to partitions deterministically", () => {
    const { partitioner } = setup();

    expect(partitioner.partitionId("abc")).toBe(3);
    expect(partitioner.partitionId("abcde")).toBe(1);
    expect(partitioner.partitionId(bytes("abcde"))).toBe(1);

    const first = partitioner.partition("orders", "a");
    expect(partitioner.partition("orders", "a")).toBe(first);
    expect(partitioner.partition("orders", "b")).toBe(first);
    expect(partitioner.partition("orders", "abcde")).toBe(first);
    expect(first.id).toBe(1);
    expect(first.topic).toBe("orders");
  });

  it("keeps partitions of different topics apart", () => {
    const { partitioner } = setup();

    expect(partitioner.partition("orders", "a")).not.toBe(
      partitioner.partition("payments", "a")
    );
  });

  it("rejects empty topics", () => {
    const { partitioner } = setup();

    expect(() => partitioner.partition("", "a")).toThrow(InvalidTopicError);
  });

  it("caps partitions across all topics", () => {
    const { partitioner } = setup(2);
    partitioner.partition("orders", "a");
    partitioner.partition("orders", "bb");

    expect(() => partitioner.partition("payments", "a")).toThrow(
      PartitionLimitExceededError
    );
    expect(partitioner.partition("orders", "ccccc").id).toBe(1);
  });

  it("closing one partition leaves its siblings delivering", async () => {
    const { partitioner } = setup();
    const left = partitioner.partition("orders", "a");
    const right = partitioner.partition("orders", "bb");
    const leftCalls = recordBatches();
    const rightCalls = recordBatches();
    left.subscribe(leftCalls.handler, "left", {});
    right.subscribe(rightCalls.handler, "right", {});

    await left.close(0);
    await right.publish(bytes("1"), { messageId: "r1" });
    await flush();

    expect(left.state).toBe("closed");
    expect(right.state).toBe("open");
    expect(rightCalls.calls).toEqual([["r1"]]);
  });

  it("closes every partition once", async () => {
    const { partitioner } = setup();
    const left = partitioner.partition("orders", "a");
    const right = partitioner.partition("payments", "bb");

    const closing = partitioner.close(0);
    expect(partitioner.close()).toBe(closing);
    await closing;

    expect([left.state, right.state]).toEqual(["closed", "closed"]);
  });

  it("hashes with SHA-256 by default", () => {
    const { driver } = createRecordingDriver();
    const partitioner = createPubSub({}, { logDriver: driver }).partitioner();
    const expected = new SHA256Hasher().hash("customer-42") % 16;

    expect(partitioner.partitionId("customer-42")).toBe(expected);
    expect(partitioner.partitionId(bytes("customer-42"))).toBe(expected);
  });
});
