import { z } from "zod";
import type { Logger } from "../utils/logger.js";

const Rfc3339 = z.string().datetime({ offset: true });

/**
 * Minutes between `creationTime` (RFC 3339) and `now`.
 *
 * Measured from creation, so time spent queued counts as elapsed.
 * A missing or unparseable timestamp yields 0 and a warning; this never throws.
 */
export function elapsedMinutes(
  creationTime: string | null | undefined,
  logger: Logger,
  now: Date = new Date()
): number {
  if (!creationTime) {
    return 0;
  }

  const normalized = creationTime.endsWith("Z")
    ? `${creationTime.slice(0, -1)}+00:00`
    : creationTime;

  const started = Rfc3339.safeParse(normalized).success ? Date.parse(normalized) : NaN;
  if (Number.isNaN(started)) {
    logger.warn({ creationTime }, "Could not parse creation time");
    return 0;
  }

  return (now.getTime() - started) / 1000 / 60;
}
