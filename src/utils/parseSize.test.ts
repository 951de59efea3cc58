import { describe, it, expect } from "vitest";
import parseSize from "./parseSize";

describe("parseSize", () => {
  it("reads plain byte counts", () => {
    expect(parseSize("2048")).toBe(2048);
    expect(parseSize("100b")).toBe(100);
  });

  it("uses binary units", () => {
    expect(parseSize("512k")).toBe(524_288);
    expect(parseSize("1.5kb")).toBe(1536);
    expect(parseSize("10mb")).toBe(10_485_760);
    expect(parseSize("10 MB")).toBe(10_485_760);
    expect(parseSize("1g")).toBe(1_073_741_824);
  });

  it("rejects unknown formats", () => {
    expect(() => parseSize("ten")).toThrow('Invalid size "ten"');
    expect(() => parseSize("10tb")).toThrow('Invalid size "10tb"');
  });

  it("rejects sizes outside the allowed range", () => {
    expect(() => parseSize("0")).toThrow('Size must be greater than zero: "0"');
    expect(() => parseSize("2048gb")).toThrow("Size cannot exceed 1tb");
  });
});
