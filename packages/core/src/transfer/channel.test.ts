import { describe, it, expect } from "vitest";
import { Channel } from "./channel.js";

describe("Channel", () => {
  it("delivers buffered values in order", async () => {
    const channel = new Channel<number>();
    channel.send(1);
    channel.send(2);
    channel.close();

    const received: number[] = [];
    for await (const value of channel) received.push(value);

    expect(received).toEqual([1, 2]);
  });

  it("wakes a waiting receiver", async () => {
    const channel = new Channel<string>();
    const pending = channel.receive();

    channel.send("hello");

    expect(await pending).toEqual({ done: false, value: "hello" });
  });

  it("ends a waiting receiver on close", async () => {
    const channel = new Channel<string>();
    const pending = channel.receive();

    channel.close();

    expect(await pending).toEqual({ done: true, value: undefined });
    expect(channel.isClosed).toBe(true);
  });

  it("drops values sent after close", async () => {
    const channel = new Channel<number>();
    channel.close();
    channel.send(1);

    expect(await channel.receive()).toEqual({ done: true, value: undefined });
  });

  it("rejects a second concurrent receiver", async () => {
    const channel = new Channel<number>();
    const first = channel.receive();

    await expect(channel.receive()).rejects.toThrow(
      "Channel already has a receiver",
    );
    channel.send(3);
    expect(await first).toEqual({ done: false, value: 3 });
  });
});
