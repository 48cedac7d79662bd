import type { TesApi } from "../tes/client.js";
import type { Logger } from "../utils/logger.js";

/**
 * Everything a tool needs, built once at startup and passed in explicitly.
 */
export interface ToolContext {
  client: TesApi;
  logger: Logger;
  /** Base polling interval (TASK_POLL_INTERVAL) in seconds. */
  pollIntervalSeconds: number;
}

/** Name, title and agent-facing description of a registered tool. */
export interface ToolDescriptor {
  name: string;
  title: string;
  description: string;
}
