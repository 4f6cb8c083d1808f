import { describe, expect, it } from "vitest";
import { formatIPv4Issue, inspectIPv4, isValidIPv4 } from "./ipv4.js";

describe("isValidIPv4", () => {
  it("accepts dotted quads without leading zeros", () => {
    for (const candidate of ["127.0.0.1", "0.0.0.0", "255.255.255.255", "10.20.30.40", "1.2.3.4"]) {
      expect(isValidIPv4(candidate), candidate).toBe(true);
    }
  });

  it("accepts every octet value rendered in canonical form", () => {
    for (let n = 0; n <= 255; n++) {
      expect(isValidIPv4(`${n}.${255 - n}.${n}.0`), String(n)).toBe(true);
    }
  });

  it("rejects candidates without exactly four segments", () => {
    for (const candidate of ["", "19216811", "192.168.1", "192.168.1.1.1", "1.2.3.4.5.6"]) {
      expect(isValidIPv4(candidate), candidate).toBe(false);
    }
  });

  it("rejects empty segments from stray dots", () => {
    expect(isValidIPv4("192.168..1")).toBe(false);
    expect(isValidIPv4(".192.168.1")).toBe(false);
    expect(isValidIPv4("192.168.1.")).toBe(false);
    expect(isValidIPv4("192.168.1.1.")).toBe(false);
  });

  it("rejects out-of-range, signed, spaced and non-decimal segments", () => {
    expect(isValidIPv4("192.168.1.256")).toBe(false);
    expect(isValidIPv4("-1.192.168.1")).toBe(false);
    expect(isValidIPv4("+1.2.3.4")).toBe(false);
    expect(isValidIPv4(" 192.168.1.1")).toBe(false);
    expect(isValidIPv4("192.168.1.1 ")).toBe(false);
    expect(isValidIPv4("192.m.1.1")).toBe(false);
    expect(isValidIPv4("0x1.2.3.4")).toBe(false);
    expect(isValidIPv4("1.2.3.１")).toBe(false);
  });

  it("rejects leading zeros but accepts a lone zero", () => {
    expect(isValidIPv4("192.168.01.1")).toBe(false);
    expect(isValidIPv4("192.168.001.1")).toBe(false);
    expect(isValidIPv4("00.1.1.1")).toBe(false);
    expect(isValidIPv4("192.168.0.1")).toBe(true);
  });

  it("rejects segments longer than three characters", () => {
    expect(isValidIPv4("1.2.3.0001")).toBe(false);
    expect(isValidIPv4("1.2.3.99999999999999999999")).toBe(false);
  });
});

describe("inspectIPv4", () => {
  it("returns the parsed octets for a valid address", () => {
    expect(inspectIPv4("192.168.0.254")).toEqual({ ok: true, octets: [192, 168, 0, 254] });
  });

  it("reports the segment count", () => {
    expect(inspectIPv4("1.2.3")).toEqual({ ok: false, issue: "segment-count", segmentCount: 3 });
    expect(inspectIPv4("")).toEqual({ ok: false, issue: "segment-count", segmentCount: 1 });
  });

  it("reports the first failing segment and criterion", () => {
    expect(inspectIPv4("1..2.3")).toEqual({
      ok: false,
      issue: "empty",
      segmentIndex: 1,
      segment: "",
    });
    expect(inspectIPv4("1.2.1234.3")).toEqual({
      ok: false,
      issue: "too-long",
      segmentIndex: 2,
      segment: "1234",
    });
    expect(inspectIPv4("1a2.0.0.0")).toEqual({
      ok: false,
      issue: "non-digit",
      segmentIndex: 0,
      segment: "1a2",
    });
    expect(inspectIPv4("1.2.3.300")).toEqual({
      ok: false,
      issue: "out-of-range",
      segmentIndex: 3,
      segment: "300",
    });
    expect(inspectIPv4("1.02.3.4")).toEqual({
      ok: false,
      issue: "leading-zero",
      segmentIndex: 1,
      segment: "02",
    });
  });

  it("checks length before digits and leading zeros", () => {
    expect(inspectIPv4("1.2.3.099")).toMatchObject({ ok: false, issue: "leading-zero" });
    expect(inspectIPv4("1.2.3.0999")).toMatchObject({ ok: false, issue: "too-long" });
    expect(inspectIPv4("1.2.3.0a")).toMatchObject({ ok: false, issue: "non-digit" });
  });
});

describe("formatIPv4Issue", () => {
  it("explains segment count and segment failures", () => {
    expect(formatIPv4Issue(inspectIPv4("1.2"))).toBe(
      "expected 4 dot-separated segments, found 2",
    );
    expect(formatIPv4Issue(inspectIPv4("1.2.3.256"))).toBe(
      'segment 4 ("256") is greater than 255',
    );
    expect(formatIPv4Issue(inspectIPv4(" 1.2.3.4"))).toBe(
      'segment 1 (" 1") contains a character that is not a decimal digit',
    );
  });

  it("returns undefined for valid addresses", () => {
    expect(formatIPv4Issue(inspectIPv4("8.8.4.4"))).toBeUndefined();
  });
});
