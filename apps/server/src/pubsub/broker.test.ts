import { describe, it, expect, vi } from "vitest";
import { PubSubBroker, topicMatches, type PubSubMessage } from "./broker";

describe("topicMatches", () => {
  it.each([
    ["*", "/any/thing", true],
    ["**", "/any", true],
    ["/robot/pose", "/robot/pose", true],
    ["/robot/pose", "/robot/pose2", false],
    ["/robot/*", "/robot/pose", true],
    ["/robot/*", "/robot/camera/info", true],
    ["/robot/**", "/robot/camera/info", true],
    ["/robot/*", "/robotic/arm", false],
    ["/robot/*", "/robot", false],
  ])("%s vs %s -> %s", (pattern, topic, expected) => {
    expect(topicMatches(pattern, topic)).toBe(expected);
  });
});

describe("PubSubBroker", () => {
  it("delivers to matching subscribers with the publish time", () => {
    const broker = new PubSubBroker({ nowMs: () => 42 });
    const robot: PubSubMessage[] = [];
    const other = vi.fn();
    broker.subscribe({ id: "robot", topicPattern: "/robot/*", callback: (m) => robot.push(m) });
    broker.subscribe({ id: "other", topicPattern: "/other", callback: other });

    const payload = new Uint8Array([1]);
    broker.publish("/robot/pose", payload);
    broker.publish("/robot/battery", payload, 7);

    expect(robot).toEqual([
      { topic: "/robot/pose", payload, publishedAtMs: 42 },
      { topic: "/robot/battery", payload, publishedAtMs: 7 },
    ]);
    expect(other).not.toHaveBeenCalled();
  });

  it("isolates a throwing subscriber", () => {
    const broker = new PubSubBroker();
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const after = vi.fn();
    broker.subscribe({
      id: "bad",
      topicPattern: "*",
      callback: () => {
        throw new Error("nope");
      },
    });
    broker.subscribe({ id: "good", topicPattern: "*", callback: after });

    broker.publish("/t", new Uint8Array());
    expect(after).toHaveBeenCalledTimes(1);
    expect(error).toHaveBeenCalledWith("[pubsub] subscriber bad error:", expect.any(Error));
    error.mockRestore();
  });

  it("stops delivering after unsubscribe", () => {
    const broker = new PubSubBroker();
    const cb = vi.fn();
    const off = broker.subscribe({ id: "s", topicPattern: "*", callback: cb });
    off();
    broker.publish("/t", new Uint8Array());
    expect(cb).not.toHaveBeenCalled();
  });
});
