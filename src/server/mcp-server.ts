import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type { ToolContext } from "../tools/context.js";
import { CREATE_TASK_TOOL, createTask, createTaskInputShape } from "../tools/create-task.js";
import { GET_TASK_TOOL, getTask, getTaskInputShape } from "../tools/get-task.js";
import {
  WAIT_FOR_TASK_TOOL,
  waitForTask,
  waitForTaskInputShape,
} from "../tools/wait-for-task.js";
import { ToolError, describeCause } from "../tools/tool-error.js";

export const SERVER_NAME = "TES Task MCP Server";
export const SERVER_VERSION = "0.1.0";

export const TOOL_NAMES = [CREATE_TASK_TOOL.name, WAIT_FOR_TASK_TOOL.name, GET_TASK_TOOL.name];

const INSTRUCTIONS = `
Gives access to a GA4GH Task Execution Service (TES).

With these tools you can:
- Create computational tasks that run containerized commands
- Follow task progress with adaptive polling guidance
- Retrieve task details including logs and outputs

USAGE PATTERNS:

1. Running a task:
   - create_tes_task submits a new task and returns its ID
   - wait_for_task_completion checks progress; call it again after recommended_interval_seconds
   - get_tes_task with view='FULL' retrieves results and logs

2. Debugging failed tasks:
   - Always use get_tes_task with view='FULL' for failed tasks
   - Read the logs section for executor output and exit codes
   - Check resource requirements if a task fails to start

3. Good practice:
   - Give tasks meaningful names and descriptions
   - Request appropriate CPU, memory and disk
   - Tell the user when a task runs longer than expected

Retries and authentication are handled by the server. Every tool returns a
structured response with guidance for the next step.
`.trim();

/** Builds a server with all three tools registered against `ctx`. */
export function createMcpServer(ctx: ToolContext): McpServer {
  const server = new McpServer(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { instructions: INSTRUCTIONS }
  );

  server.registerTool(
    CREATE_TASK_TOOL.name,
    {
      title: CREATE_TASK_TOOL.title,
      description: CREATE_TASK_TOOL.description,
      inputSchema: createTaskInputShape,
    },
    (args) => runTool(ctx, CREATE_TASK_TOOL.name, () => createTask(ctx, args))
  );

  server.registerTool(
    GET_TASK_TOOL.name,
    {
      title: GET_TASK_TOOL.title,
      description: GET_TASK_TOOL.description,
      inputSchema: getTaskInputShape,
    },
    (args) => runTool(ctx, GET_TASK_TOOL.name, () => getTask(ctx, args))
  );

  server.registerTool(
    WAIT_FOR_TASK_TOOL.name,
    {
      title: WAIT_FOR_TASK_TOOL.title,
      description: WAIT_FOR_TASK_TOOL.description,
      inputSchema: waitForTaskInputShape,
    },
    (args) => runTool(ctx, WAIT_FOR_TASK_TOOL.name, () => waitForTask(ctx, args))
  );

  return server;
}

async function runTool(
  ctx: ToolContext,
  name: string,
  fn: () => Promise<Record<string, unknown>>
): Promise<CallToolResult> {
  try {
    const payload = await fn();
    return {
      content: [{ type: "text", text: JSON.stringify(payload, null, 2) }],
      structuredContent: payload,
    };
  } catch (err) {
    if (!(err instanceof ToolError)) {
      ctx.logger.error({ error: err, tool: name }, "Tool failed unexpectedly");
    }
    return {
      content: [{ type: "text", text: describeCause(err) }],
      isError: true,
    };
  }
}
