import { describe, expect, it } from "vitest";

import { contentBytes, contentText, decodeContent } from "./decode.js";

describe("decodeContent", () => {
  it("should pass strings through", () => {
    expect(decodeContent("héllo")).toEqual({ text: "héllo", encoding: "utf-8", source: "string" });
  });

  it("should honour a UTF-16 byte-order mark", () => {
    const bytes = new Uint8Array([0xff, 0xfe, 0x68, 0x00, 0x69, 0x00]);

    expect(decodeContent(bytes)).toEqual({ text: "hi", encoding: "utf-16le", source: "bom" });
  });

  it("should use a meta charset declaration", () => {
    const bytes = new Uint8Array([...new TextEncoder().encode('<meta charset="iso-8859-1"><p>'), 0xe9]);
    const decoded = decodeContent(bytes);

    expect(decoded.source).toBe("meta");
    expect(decoded.encoding).toBe("windows-1252");
    expect(decoded.text.endsWith("é")).toBe(true);
  });

  it("should fall back to UTF-8", () => {
    const decoded = decodeContent(new TextEncoder().encode("<p>é</p>"));

    expect(decoded).toEqual({ text: "<p>é</p>", encoding: "utf-8", source: "default" });
  });

  it("should convert between text and bytes", () => {
    expect(contentText(new TextEncoder().encode("abc"))).toBe("abc");
    expect([...contentBytes("ab")]).toEqual([0x61, 0x62]);
  });
});
