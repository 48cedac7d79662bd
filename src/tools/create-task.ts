import { TesTaskSchema, type TesTask } from "../tes/models.js";
import { TesError } from "../tes/errors.js";
import type { ToolContext, ToolDescriptor } from "./context.js";
import { ToolError, describeCause } from "./tool-error.js";

export const CREATE_TASK_TOOL: ToolDescriptor = {
  name: "create_tes_task",
  title: "Create TES Computational Task",
  description: `
Creates a new computational task using the GA4GH Task Execution Service (TES).

**When to use this tool:**
- When you need to execute computational workflows or analyses
- When processing data that requires specific software environments
- When running batch jobs that need defined resource allocations

**Required task components:**
- \`executors\`: At least one executor defining the command(s) to run
- \`name\`: A descriptive name for the task (recommended)

**After creating a task:**
1. Use \`wait_for_task_completion\` to monitor progress
2. Use \`get_tes_task\` with view="FULL" to see logs and detailed status
3. Check outputs once the task completes successfully

**Returns:** Task ID and success confirmation with guidance on next steps.
`.trim(),
};

export const createTaskInputShape = {
  task: TesTaskSchema.describe(
    "Complete task specification: name, description, executors, inputs, outputs, resources, volumes"
  ),
};

export type CreateTaskResult = {
  id: string;
  message: string;
};

export async function createTask(
  ctx: ToolContext,
  input: { task: TesTask }
): Promise<CreateTaskResult> {
  const { task } = input;
  const taskName = task.name || "Unnamed Task";

  if (task.executors.length === 0) {
    throw new ToolError(
      "Task must have at least one executor. Please provide a list of executors with commands to run.",
      CREATE_TASK_TOOL.name
    );
  }

  ctx.logger.info({ taskName }, "Creating task");

  let id: string;
  try {
    id = await ctx.client.submitTask(task);
  } catch (err) {
    const message = describeFailure(err, taskName);
    ctx.logger.error({ error: err, taskName }, message);
    throw new ToolError(message, CREATE_TASK_TOOL.name, { cause: err });
  }

  return {
    id,
    message: `Task '${taskName}' submitted with ID ${id}. Use wait_for_task_completion to monitor its progress.`,
  };
}

function describeFailure(err: unknown, taskName: string): string {
  const cause = describeCause(err).replace(/\.$/, "");
  if (!(err instanceof TesError)) {
    return `Unexpected error creating task '${taskName}': ${cause}`;
  }

  switch (err.kind) {
    case "authentication":
      return `Authentication failed when creating task: ${cause}. Please check your TES_TOKEN environment variable and ensure you have permission to create tasks.`;
    case "server":
      return `TES server error when creating task: ${cause}. The TES service may be experiencing issues. You may want to retry this operation.`;
    case "validation":
      return `Task was submitted but the TES service did not return a usable task ID: ${cause}. This indicates a server-side issue.`;
    case "client":
    case "not_found":
      return `Client error when creating task: ${cause}. Please check your task specification and network connectivity.`;
  }
}
