import type { PayloadEncoding } from "./types";

const HEX_RE = /^(?:[0-9a-fA-F]{2})*$/;

/** Turns a published payload string into the raw bytes the cache measures. */
export function decodePayload(payload: string, encoding: PayloadEncoding = "utf8"): Uint8Array {
  switch (encoding) {
    case "utf8":
      return new Uint8Array(Buffer.from(payload, "utf8"));
    case "base64":
      return new Uint8Array(Buffer.from(payload, "base64"));
    case "hex":
      // Buffer.from silently truncates at the first bad digit.
      if (!HEX_RE.test(payload)) throw new Error("payload is not valid hex");
      return new Uint8Array(Buffer.from(payload, "hex"));
  }
}
