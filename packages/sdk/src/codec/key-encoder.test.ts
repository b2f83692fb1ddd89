import { describe, it, expect } from "vitest";
import { ENCODED_PREFIX, TableKeyEncoder, decodeTableKey, encodeTableKey, keyEncoder } from "./key-encoder.js";

describe("TableKeyEncoder", () => {
  describe("encode()", () => {
    it("should leave keys without illegal characters untouched", () => {
      expect(encodeTableKey("user_42")).toBe("user_42");
      expect(encodeTableKey("")).toBe("");
    });

    it("should prefix and tokenize a forward slash", () => {
      const encoded = encodeTableKey("a/b");

      expect(encoded).toBe("$ENC_a_FS_b");
      expect(encoded.startsWith(ENCODED_PREFIX)).toBe(true);
      expect(decodeTableKey(encoded)).toBe("a/b");
    });

    it("should map each illegal character to its token", () => {
      expect(encodeTableKey("\\")).toBe("$ENC__BS_");
      expect(encodeTableKey("#")).toBe("$ENC__HT_");
      expect(encodeTableKey("?")).toBe("$ENC__QM_");
      expect(encodeTableKey("\t")).toBe("$ENC__C9_");
      expect(encodeTableKey("\u007f")).toBe("$ENC__C127_");
      expect(encodeTableKey("\u009f")).toBe("$ENC__C159_");
    });

    it("should not treat characters outside the control ranges as illegal", () => {
      expect(keyEncoder.needsEncoding("\u00a0")).toBe(false);
      expect(keyEncoder.needsEncoding(" ")).toBe(false);
      expect(keyEncoder.needsEncoding("\u001f")).toBe(true);
    });

    it("should escape underscores once encoding is needed", () => {
      expect(encodeTableKey("x_/")).toBe("$ENC_x_US__FS_");
    });

    it("should be idempotent", () => {
      const once = encodeTableKey("reports/2024#q1?draft");
      expect(encodeTableKey(once)).toBe(once);
    });

    it("should return already-prefixed input unchanged", () => {
      expect(encodeTableKey("$ENC_a/b")).toBe("$ENC_a/b");
    });
  });

  describe("decode()", () => {
    it("should return unprefixed input unchanged", () => {
      expect(decodeTableKey("a_FS_b")).toBe("a_FS_b");
    });

    it("should pass unrecognised token-like spans through", () => {
      expect(decodeTableKey("$ENC_a_ZZ_b")).toBe("a_ZZ_b");
    });

    it("should keep a trailing lone underscore", () => {
      expect(decodeTableKey("$ENC_a_")).toBe("a_");
    });
  });

  describe("round trip", () => {
    const samples = [
      "plain",
      "a/b",
      "_FS_",
      "path/with_underscores/and#hash",
      "\u0000\u0001\u007f\u0080",
      "trailing?",
      "__/__",
      "emoji 🎉/ok",
      "tab\there",
    ];

    it.each(samples)("should decode(encode(%j)) back to the input", (sample) => {
      expect(decodeTableKey(encodeTableKey(sample))).toBe(sample);
    });

    it("should keep literal token text intact when encoding is triggered", () => {
      const value = "a_FS_b/c";
      const encoded = encodeTableKey(value);

      expect(encoded).toBe("$ENC_a_US_FS_US_b_FS_c");
      expect(decodeTableKey(encoded)).toBe(value);
    });
  });

  it("should accept a custom character map", () => {
    const encoder = new TableKeyEncoder(new Map([["|", "_PI_"]]));

    expect(encoder.encode("a|b")).toBe("$ENC_a_PI_b");
    expect(encoder.decode("$ENC_a_PI_b")).toBe("a|b");
    expect(encoder.encode("a/b")).toBe("a/b");
  });
});
