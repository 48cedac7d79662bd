import { z } from "zod";
import { TesError } from "../tes/errors.js";
import type { FetchedTask } from "../tes/models.js";
import { observeState, stateLabel } from "../tes/state.js";
import { adaptiveInterval, classify } from "../monitor/classifier.js";
import { elapsedMinutes } from "../monitor/duration.js";
import { buildStatusReport, type StatusReport } from "../monitor/report.js";
import type { ToolContext, ToolDescriptor } from "./context.js";
import { ToolError, describeCause } from "./tool-error.js";

/** Threshold used when a caller omits max_wait_minutes or passes a non-positive value. */
export const DEFAULT_MAX_WAIT_MINUTES = 10;

export const WAIT_FOR_TASK_TOOL: ToolDescriptor = {
  name: "wait_for_task_completion",
  title: "Monitor TES Task Progress",
  description: `
Check the progress of a TES (Task Execution Service) task and get guidance on what
to do next.

Each call takes a single look at the task and returns immediately; it never blocks.
The response says whether to keep waiting, how many seconds to wait before checking
again, and which tool to call next.

**When to use this tool:**
- After creating a task, to follow its execution
- When a task must finish before you can proceed
- To find out whether a long-running task needs the user's attention

**Parameters:**
- \`task_id\` (required): The unique task identifier to monitor
- \`max_wait_minutes\` (optional): Minutes a running task may take before the
  response recommends notifying the user

**Usage pattern:**
1. Create a task with \`create_tes_task\`
2. Call \`wait_for_task_completion\`
3. Follow \`next_action\` and \`next_tool\`:
   - "fetch_full_task": call \`get_tes_task\` with view="FULL" for results and logs
   - "wait_again": wait \`recommended_interval_seconds\`, then call this tool again
   - "none": report the outcome to the user

**Returns:** A structured status report with a recommendation and next action.
`.trim(),
};

export const waitForTaskInputShape = {
  task_id: z.string().describe("Task ID to monitor"),
  max_wait_minutes: z
    .number()
    .optional()
    .describe("Minutes before a still-running task is flagged for user attention (default 10)"),
};

export async function waitForTask(
  ctx: ToolContext,
  input: { task_id: string; max_wait_minutes?: number },
  now: () => Date = () => new Date()
): Promise<StatusReport> {
  const taskId = input.task_id.trim();
  if (!taskId) {
    throw new ToolError("Task ID cannot be empty.", WAIT_FOR_TASK_TOOL.name);
  }

  const requested = input.max_wait_minutes;
  const maxWaitMinutes =
    requested !== undefined && requested > 0 ? requested : DEFAULT_MAX_WAIT_MINUTES;

  ctx.logger.info({ taskId }, "Checking task status");

  let task: FetchedTask;
  try {
    task = await ctx.client.getTask(taskId, "MINIMAL");
  } catch (err) {
    const message = describeFailure(err, taskId);
    ctx.logger.error({ error: err, taskId }, message);
    throw new ToolError(message, WAIT_FOR_TASK_TOOL.name, { taskId, cause: err });
  }

  const state = observeState(task.state);
  const durationMinutes = elapsedMinutes(task.creation_time, ctx.logger, now());
  const status = classify(state, durationMinutes, maxWaitMinutes);
  const checkIntervalSeconds = adaptiveInterval(state, durationMinutes, ctx.pollIntervalSeconds);

  ctx.logger.info(
    { taskId, state: stateLabel(state), status, durationMinutes },
    "Task status checked"
  );

  return buildStatusReport({
    status,
    taskId,
    taskName: task.name || "Unnamed Task",
    state: stateLabel(state),
    durationMinutes,
    checkIntervalSeconds,
    maxWaitMinutes,
  });
}

function describeFailure(err: unknown, taskId: string): string {
  if (!(err instanceof TesError)) {
    return `An unexpected error occurred: ${describeCause(err)}`;
  }

  switch (err.kind) {
    case "not_found":
      return `Task ${taskId} not found.`;
    case "authentication":
      return "TES authentication failed. Verify credentials.";
    case "server":
      return `TES server error during status check: ${err.message}`;
    case "client":
    case "validation":
      return `Client error checking task ${taskId}: ${err.message}`;
  }
}
