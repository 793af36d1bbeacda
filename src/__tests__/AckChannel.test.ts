import {
  AckChannelClosedError,
  AckChannelFullError,
  InvalidOptionsError,
} from "@domain/errors/PubSubError";
import { AckChannel } from "@infra/channel/AckChannel";
import { describe, expect, it } from "vitest";

describe("AckChannel", () => {
  it("hands out acks in push order", async () => {
    const channel = new AckChannel(4);
    await channel.push({ messageId: "a" });
    await channel.push({ messageId: "b" });

    expect(channel.size).toBe(2);
    expect(await channel.take()).toEqual({
      done: false,
      value: { messageId: "a" },
    });
    expect(await channel.take()).toEqual({
      done: false,
      value: { messageId: "b" },
    });
  });

  it("resolves a waiting taker on push", async () => {
    const channel = new AckChannel(1);
    const pending = channel.take();

    expect(channel.tryPush({ messageId: "a" })).toBe(true);
    expect(await pending).toEqual({ done: false, value: { messageId: "a" } });
    expect(channel.size).toBe(0);
  });

  it("rejects pushes beyond capacity under the drop policy", async () => {
    const channel = new AckChannel(1, "drop");
    await channel.push({ messageId: "a" });

    expect(channel.tryPush({ messageId: "b" })).toBe(false);
    await expect(channel.push({ messageId: "b" })).rejects.toBeInstanceOf(
      AckChannelFullError
    );
    expect(channel.size).toBe(1);
  });

  it("parks pushers until there is room under the block policy", async () => {
    const channel = new AckChannel(1, "block");
    await channel.push({ messageId: "a" });

    let admitted = false;
    const blocked = channel.push({ messageId: "b" }).then(() => {
      admitted = true;
    });
    await Promise.resolve();
    expect(admitted).toBe(false);

    expect(await channel.take()).toEqual({
      done: false,
      value: { messageId: "a" },
    });
    await blocked;
    expect(admitted).toBe(true);
    expect(await channel.take()).toEqual({
      done: false,
      value: { messageId: "b" },
    });
  });

  it("ends a pending take when its signal aborts", async () => {
    const channel = new AckChannel();
    const abort = new AbortController();
    const pending = channel.take(abort.signal);

    abort.abort();

    expect(await pending).toEqual({ done: true, value: undefined });
    channel.tryPush({ messageId: "a" });
    expect(channel.size).toBe(1);
  });

  it("drains buffered acks after close, then reports done", async () => {
    const channel = new AckChannel(1);
    await channel.push({ messageId: "a" });
    const blocked = channel.push({ messageId: "b" });

    channel.close();

    await expect(blocked).rejects.toBeInstanceOf(AckChannelClosedError);
    expect(() => channel.tryPush({ messageId: "c" })).toThrow(
      AckChannelClosedError
    );
    expect(await channel.take()).toEqual({
      done: false,
      value: { messageId: "a" },
    });
    expect(await channel.take()).toEqual({ done: true, value: undefined });
  });

  it("iterates until closed", async () => {
    const channel = new AckChannel(4);
    channel.tryPush({ messageId: "a" });
    channel.tryPush({ messageId: "b", error: new Error("boom") });
    channel.close();

    const seen: string[] = [];
    for await (const ack of channel) seen.push(ack.messageId);

    expect(seen).toEqual(["a", "b"]);
  });

  it("requires a positive capacity", () => {
    expect(() => new AckChannel(0)).toThrow(InvalidOptionsError);
  });
});
