import { describe, it, expect } from "vitest";
import { parseDotEnv } from "./dotenv";

describe("parseDotEnv", () => {
  it("reads keys, strips quotes and skips comments", () => {
    const raw = [
      "# monitor settings",
      "LISTEN_ADDRESS=0.0.0.0:8080",
      "",
      'DECODER="json"',
      "export LOG_LEVEL='info'",
      "not a line",
      "EMPTY=",
    ].join("\n");

    expect(parseDotEnv(raw)).toEqual({
      LISTEN_ADDRESS: "0.0.0.0:8080",
      DECODER: "json",
      LOG_LEVEL: "info",
      EMPTY: "",
    });
  });
});
