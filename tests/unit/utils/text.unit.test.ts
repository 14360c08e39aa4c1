import { describe, it, expect } from "vitest";
import { decodeForDisplay } from "../../../src/utils/text";

describe("utils", () => {
  describe("text", () => {
    it("should decode valid UTF-8", () => {
      expect(decodeForDisplay(Buffer.from("héllo ✓", "utf-8"))).toBe("héllo ✓");
    });

    it("should replace undecodable bytes instead of throwing", () => {
      expect(decodeForDisplay(Uint8Array.from([0x41, 0xff, 0x42]))).toBe("A�B");
    });
  });
});
