/**
 * The single failure type the tool layer surfaces to an agent. Whatever went
 * wrong underneath is kept as `cause`; the message is written for the caller.
 */
export class ToolError extends Error {
  readonly taskId?: string;

  constructor(
    message: string,
    public readonly operation: string,
    options: { taskId?: string; cause?: unknown } = {}
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "ToolError";
    this.taskId = options.taskId;
  }
}

export function describeCause(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
