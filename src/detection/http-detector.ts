import type { Frame } from "../camera/types.ts";
import { DetectionError, describeError } from "../errors.ts";
import { getLogger } from "../logger.ts";
import type { BoundingBox, Detection, Detector } from "./types.ts";

const logger = getLogger("http-detector");

export interface HttpDetectorOptions {
  url: string;
  fetchImpl?: typeof fetch;
}

const isFiniteNumber = (value: unknown): value is number =>
  typeof value === "number" && Number.isFinite(value);

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const parseBox = (value: unknown): BoundingBox | null => {
  if (Array.isArray(value) && value.length === 4) {
    const [x1, y1, x2, y2]: unknown[] = value;
    if (isFiniteNumber(x1) && isFiniteNumber(y1) && isFiniteNumber(x2) && isFiniteNumber(y2)) {
      return { x1, y1, x2, y2 };
    }
    return null;
  }
  if (
    isRecord(value) &&
    isFiniteNumber(value.x1) &&
    isFiniteNumber(value.y1) &&
    isFiniteNumber(value.x2) &&
    isFiniteNumber(value.y2)
  ) {
    return { x1: value.x1, y1: value.y1, x2: value.x2, y2: value.y2 };
  }
  return null;
};

/** Keeps well-formed entries; anything else in the payload is dropped. */
export function parseDetections(payload: unknown): Detection[] {
  const entries = isRecord(payload) ? payload.detections : payload;
  if (!Array.isArray(entries)) {
    throw new DetectionError("response has no detections array");
  }

  const detections: Detection[] = [];
  for (const entry of entries) {
    if (!isRecord(entry) || typeof entry.label !== "string" || !isFiniteNumber(entry.confidence)) {
      continue;
    }
    const box = parseBox(entry.box);
    if (!box || entry.confidence < 0 || entry.confidence > 1) {
      continue;
    }
    detections.push({ label: entry.label, confidence: entry.confidence, box });
  }
  if (detections.length !== entries.length) {
    logger.debug("Dropped malformed detections", { received: entries.length, kept: detections.length });
  }
  return detections;
}

/**
 * Sends each frame as raw RGBA to a detection service and reads back
 * `{ detections: [{ label, confidence, box }] }`.
 */
export class HttpDetector implements Detector {
  private url: string;
  private fetchImpl: typeof fetch;

  constructor(options: HttpDetectorOptions) {
    this.url = options.url;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async detect(frame: Frame): Promise<Detection[]> {
    const target = new URL(this.url);
    target.searchParams.set("width", String(frame.width));
    target.searchParams.set("height", String(frame.height));
    target.searchParams.set("format", "rgba");

    let response: Response;
    try {
      response = await this.fetchImpl(target, {
        method: "POST",
        headers: { "Content-Type": "application/octet-stream" },
        body: frame.data,
      });
    } catch (error) {
      throw new DetectionError(`detector unreachable: ${describeError(error)}`, error);
    }

    if (!response.ok) {
      const detail = await response.text().catch(() => "");
      throw new DetectionError(`detector answered ${response.status}${detail ? `: ${detail}` : ""}`);
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      throw new DetectionError("detector returned invalid JSON", error);
    }
    return parseDetections(payload);
  }
}
