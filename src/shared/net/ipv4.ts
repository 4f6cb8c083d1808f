export const IPV4_SEGMENT_COUNT = 4;
const MAX_SEGMENT_LENGTH = 3;
const MAX_OCTET = 255;

export type IPv4SegmentIssue = "empty" | "too-long" | "non-digit" | "out-of-range" | "leading-zero";

export type IPv4Octets = [number, number, number, number];

export type IPv4Inspection =
  | { ok: true; octets: IPv4Octets }
  | { ok: false; issue: "segment-count"; segmentCount: number }
  | { ok: false; issue: IPv4SegmentIssue; segmentIndex: number; segment: string };

function isAsciiDigit(code: number): boolean {
  return code >= 48 && code <= 57;
}

/**
 * Checks one dotted-quad segment. Criteria are evaluated in a fixed order so
 * the first failing one is the one reported.
 */
function inspectSegment(segment: string): { issue: IPv4SegmentIssue } | { value: number } {
  if (segment.length === 0) {
    return { issue: "empty" };
  }
  if (segment.length > MAX_SEGMENT_LENGTH) {
    return { issue: "too-long" };
  }
  let value = 0;
  for (let i = 0; i < segment.length; i++) {
    const code = segment.charCodeAt(i);
    if (!isAsciiDigit(code)) {
      return { issue: "non-digit" };
    }
    value = value * 10 + (code - 48);
  }
  if (value > MAX_OCTET) {
    return { issue: "out-of-range" };
  }
  if (segment.length > 1 && segment.startsWith("0")) {
    return { issue: "leading-zero" };
  }
  return { value };
}

export function inspectIPv4(candidate: string): IPv4Inspection {
  // Leading, trailing and doubled dots surface as empty segments.
  const segments = candidate.split(".");
  if (segments.length !== IPV4_SEGMENT_COUNT) {
    return { ok: false, issue: "segment-count", segmentCount: segments.length };
  }
  const octets: number[] = [];
  for (const [segmentIndex, segment] of segments.entries()) {
    const result = inspectSegment(segment);
    if ("issue" in result) {
      return { ok: false, issue: result.issue, segmentIndex, segment };
    }
    octets.push(result.value);
  }
  const [a = 0, b = 0, c = 0, d = 0] = octets;
  return { ok: true, octets: [a, b, c, d] };
}

export function isValidIPv4(candidate: string): boolean {
  return inspectIPv4(candidate).ok;
}

const SEGMENT_ISSUE_TEXT: Record<IPv4SegmentIssue, string> = {
  empty: "is empty",
  "too-long": "is longer than 3 characters",
  "non-digit": "contains a character that is not a decimal digit",
  "out-of-range": "is greater than 255",
  "leading-zero": "has a leading zero",
};

export function formatIPv4Issue(inspection: IPv4Inspection): string | undefined {
  if (inspection.ok) {
    return undefined;
  }
  if (inspection.issue === "segment-count") {
    return `expected 4 dot-separated segments, found ${inspection.segmentCount}`;
  }
  return `segment ${inspection.segmentIndex + 1} (${JSON.stringify(inspection.segment)}) ${SEGMENT_ISSUE_TEXT[inspection.issue]}`;
}
