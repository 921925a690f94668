import { join, relative, sep } from "node:path";

import { DESTINATION_KEY_SEPARATOR } from "../constants.js";

// Neither escape can come out of `encodeURIComponent`: it never emits a bare "%" and never encodes ".".
const EMPTY_SEGMENT = "%";

function encodeSegment(segment: string): string {
  if (segment === "") {
    return EMPTY_SEGMENT;
  }
  if (/^\.+$/.test(segment)) {
    return "%2E".repeat(segment.length);
  }
  return encodeURIComponent(segment);
}

function decodeSegment(segment: string): string {
  return segment === EMPTY_SEGMENT ? "" : decodeURIComponent(segment);
}

/**
 * `train/loss` -> `<root>/train/loss.csv`, one URI-encoded directory level per key segment.
 * Empty and dot-only segments are escaped so that every key maps to its own file.
 */
export function metricKeyToPath(root: string, key: string, extension: string): string {
  const segments = key.split(DESTINATION_KEY_SEPARATOR).map(encodeSegment);
  const last = segments.pop() ?? EMPTY_SEGMENT;
  return join(root, ...segments, `${last}${extension}`);
}

export function pathToMetricKey(root: string, filePath: string, extension: string): string {
  const rel = relative(root, filePath);
  const withoutExtension = rel.endsWith(extension) ? rel.slice(0, -extension.length) : rel;
  return withoutExtension.split(sep).map(decodeSegment).join(DESTINATION_KEY_SEPARATOR);
}
