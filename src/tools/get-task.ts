import { z } from "zod";
import type { FetchedTask } from "../tes/models.js";
import { TesError } from "../tes/errors.js";
import {
  TES_VIEWS,
  isOneOf,
  isTesView,
  observeState,
  stateLabel,
  type ObservedState,
  type TesState,
  type TesView,
} from "../tes/state.js";
import type { ToolContext, ToolDescriptor } from "./context.js";
import { ToolError, describeCause } from "./tool-error.js";

export const GET_TASK_TOOL: ToolDescriptor = {
  name: "get_tes_task",
  title: "Get TES Task Details",
  description: `
Retrieve detailed information about a TES (Task Execution Service) task.

This tool fetches comprehensive information about a previously created computational
task, including its current execution status, resource usage, input/output files, and
execution logs.

**When to use this tool:**
- Check the current status of a running task
- Retrieve execution logs after task completion or failure
- Get detailed information about task inputs, outputs, and resource usage
- Debug failed tasks by examining error logs

**Parameters:**
- \`task_id\` (required): The unique task identifier returned when the task was created
- \`view\` (optional): Level of detail to retrieve:
  - "MINIMAL": id and state only - fastest
  - "BASIC": Standard details including inputs, outputs, resources - default
  - "FULL": Complete information including detailed execution logs

**Returns:** Task information with a status summary and guidance for next steps.
`.trim(),
};

export const getTaskInputShape = {
  task_id: z.string().describe("Task ID returned by create_tes_task"),
  view: z
    .string()
    .optional()
    .describe("MINIMAL, BASIC (default) or FULL; case-insensitive"),
};

export type GetTaskResult = {
  data: FetchedTask;
  message: string;
};

const STATE_DESCRIPTIONS: Record<TesState, string> = {
  UNKNOWN: "Status is unknown or not yet determined",
  QUEUED: "Task is queued and waiting to start execution",
  INITIALIZING: "Task is being initialized for execution",
  RUNNING: "Task is currently running",
  PAUSED: "Task execution has been paused",
  COMPLETE: "Task completed successfully",
  EXECUTOR_ERROR: "Task failed due to an error in the executor",
  SYSTEM_ERROR: "Task failed due to a system error",
  CANCELED: "Task was canceled",
  PREEMPTED: "Task was preempted by the system",
  CANCELING: "Task cancellation is in progress",
};

export async function getTask(
  ctx: ToolContext,
  input: { task_id: string; view?: string }
): Promise<GetTaskResult> {
  const taskId = input.task_id.trim();
  if (!taskId) {
    throw new ToolError("Task ID is required and cannot be empty.", GET_TASK_TOOL.name);
  }

  const view = input.view?.trim().toUpperCase() || "BASIC";
  if (!isTesView(view)) {
    throw new ToolError(
      `Invalid view '${view}'. Must be one of: ${TES_VIEWS.join(", ")}. Use MINIMAL for quick status checks, BASIC for standard info, or FULL for complete details including logs.`,
      GET_TASK_TOOL.name,
      { taskId }
    );
  }

  ctx.logger.info({ taskId, view }, "Retrieving task");

  let task: FetchedTask;
  try {
    task = await ctx.client.getTask(taskId, view);
  } catch (err) {
    const message = describeFailure(err, taskId);
    ctx.logger.error({ error: err, taskId }, message);
    throw new ToolError(message, GET_TASK_TOOL.name, { taskId, cause: err });
  }

  const state = observeState(task.state);
  const summary = statusSummary(state, task.name || "Unnamed Task", task.creation_time || "Unknown");

  return {
    data: task,
    message: `${summary}\n${nextSteps(state, view)}`,
  };
}

export function statusSummary(state: ObservedState, name: string, creationTime: string): string {
  const description =
    state.kind === "known" ? STATE_DESCRIPTIONS[state.value] : `Unknown state: ${state.raw}`;
  return `Task '${name}' (created ${creationTime}): ${description}`;
}

export function nextSteps(state: ObservedState, view: TesView): string {
  const label = stateLabel(state);

  if (isOneOf(state, "COMPLETE")) {
    return view !== "FULL"
      ? "Task completed successfully! Use get_tes_task with view='FULL' to see execution logs and output file details."
      : "Task completed successfully. Check the 'outputs' and 'logs' sections for results and execution details.";
  }

  if (isOneOf(state, "EXECUTOR_ERROR", "SYSTEM_ERROR")) {
    return view !== "FULL"
      ? `Task failed with ${label}. Use get_tes_task with view='FULL' to see detailed error logs and determine the cause.`
      : "Task failed. Review the 'logs' section for error details. You may need to modify the task specification and retry.";
  }

  if (isOneOf(state, "CANCELED")) {
    return "Task was canceled. Check with the user if this was intentional, or if the task should be recreated.";
  }

  if (isOneOf(state, "RUNNING", "QUEUED", "INITIALIZING")) {
    return `Task is still ${label.toLowerCase()}. Use wait_for_task_completion to monitor progress, or check again later.`;
  }

  if (isOneOf(state, "PAUSED")) {
    return "Task is paused. You may need to resume it or check with the TES service administrator.";
  }

  return `Task is in ${label} state. Use wait_for_task_completion to monitor for changes.`;
}

function describeFailure(err: unknown, taskId: string): string {
  const cause = describeCause(err).replace(/\.$/, "");
  if (!(err instanceof TesError)) {
    return `Unexpected error retrieving task ${taskId}: ${cause}`;
  }

  switch (err.kind) {
    case "not_found":
      return `Task ${taskId} not found: ${cause}. Please verify the task ID is correct and the task exists.`;
    case "authentication":
      return `Authentication failed when retrieving task ${taskId}: ${cause}. Please check your TES_TOKEN environment variable.`;
    case "server":
      return `TES server error when retrieving task ${taskId}: ${cause}. The service may be experiencing issues.`;
    case "client":
    case "validation":
      return `Client error when retrieving task ${taskId}: ${cause}. Please check your network connectivity and task ID format.`;
  }
}
