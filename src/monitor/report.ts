/**
 * Turns a SimplifiedStatus into the decision payload handed back to the
 * calling agent: whether to keep waiting, what to do next, and two lines of
 * human-readable text.
 */
import type { SimplifiedStatus } from "./classifier.js";

export type WaitRecommendation =
  | "continue_waiting"
  | "check_logs"
  | "notify_user"
  | "success_proceed";

export type NextAction = "none" | "fetch_full_task" | "wait_again";

export const GET_TASK_TOOL_NAME = "get_tes_task";
export const WAIT_TOOL_NAME = "wait_for_task_completion";

const NEXT_TOOL: Record<NextAction, string | null> = {
  none: null,
  fetch_full_task: GET_TASK_TOOL_NAME,
  wait_again: WAIT_TOOL_NAME,
};

export interface PollingDecision {
  should_continue_waiting: boolean;
  recommended_interval_seconds: number;
  next_action: NextAction;
}

interface ResponseTemplate {
  shouldContinueWaiting: boolean;
  recommendation: WaitRecommendation;
  nextAction: NextAction;
  message: string;
  details: string;
}

const RESPONSE_TEMPLATES: Record<SimplifiedStatus, ResponseTemplate> = {
  completed_success: {
    shouldContinueWaiting: false,
    recommendation: "success_proceed",
    nextAction: "fetch_full_task",
    message: "Task '{task_name}' completed successfully after {duration_minutes} minutes.",
    details: "Use get_tes_task with view='FULL' to retrieve outputs and logs.",
  },
  completed_failed: {
    shouldContinueWaiting: false,
    recommendation: "check_logs",
    nextAction: "fetch_full_task",
    message: "Task '{task_name}' failed after {duration_minutes} minutes.",
    details: "Use get_tes_task with view='FULL' to examine error logs.",
  },
  canceled: {
    shouldContinueWaiting: false,
    recommendation: "notify_user",
    nextAction: "none",
    message: "Task '{task_name}' was canceled after {duration_minutes} minutes.",
    details: "The task was canceled. Confirm with the user before resubmitting.",
  },
  still_running: {
    shouldContinueWaiting: true,
    recommendation: "continue_waiting",
    nextAction: "wait_again",
    message: "Task '{task_name}' is running ({duration_minutes} min elapsed).",
    details: "Task is in progress. Check again in {check_interval_seconds} seconds.",
  },
  still_running_timeout: {
    shouldContinueWaiting: true,
    recommendation: "notify_user",
    nextAction: "wait_again",
    message:
      "Task '{task_name}' running for {duration_minutes} minutes, exceeding threshold of {max_wait_minutes} min.",
    details:
      "Task is taking longer than expected. Continue waiting or notify user. Next check in {check_interval_seconds} seconds.",
  },
  error_state: {
    shouldContinueWaiting: false,
    recommendation: "check_logs",
    nextAction: "fetch_full_task",
    message: "Task '{task_name}' is in an error state ({state}).",
    details: "Use get_tes_task with view='FULL' to investigate.",
  },
  unknown_state: {
    shouldContinueWaiting: true,
    recommendation: "continue_waiting",
    nextAction: "wait_again",
    message: "Task '{task_name}' is in an unknown state ({state}).",
    details: "Continue monitoring. Next check in {check_interval_seconds} seconds.",
  },
};

export interface StatusReportInput {
  status: SimplifiedStatus;
  taskId: string;
  taskName: string;
  state: string;
  durationMinutes: number;
  checkIntervalSeconds: number;
  maxWaitMinutes: number;
}

export type StatusReport = {
  success: true;
  task_id: string;
  task_name: string;
  status: SimplifiedStatus;
  state: string;
  task_duration_minutes: number;
  estimated_wait_time: number;
  recommended_interval_seconds: number;
  should_continue_waiting: boolean;
  wait_recommendation: WaitRecommendation;
  next_action: NextAction;
  next_tool: string | null;
  message: string;
  details: string;
};

function templateFor(status: SimplifiedStatus): ResponseTemplate {
  return RESPONSE_TEMPLATES[status] ?? RESPONSE_TEMPLATES.unknown_state;
}

export function decidePolling(
  status: SimplifiedStatus,
  checkIntervalSeconds: number
): PollingDecision {
  const template = templateFor(status);
  return {
    should_continue_waiting: template.shouldContinueWaiting,
    recommended_interval_seconds: checkIntervalSeconds,
    next_action: template.nextAction,
  };
}

export function buildStatusReport(input: StatusReportInput): StatusReport {
  const template = templateFor(input.status);
  const decision = decidePolling(input.status, input.checkIntervalSeconds);

  const values: Record<string, string> = {
    task_name: input.taskName,
    duration_minutes: input.durationMinutes.toFixed(1),
    check_interval_seconds: String(input.checkIntervalSeconds),
    max_wait_minutes: String(input.maxWaitMinutes),
    state: input.state,
  };

  return {
    success: true,
    task_id: input.taskId,
    task_name: input.taskName,
    status: input.status,
    state: input.state,
    task_duration_minutes: Math.round(input.durationMinutes * 10) / 10,
    estimated_wait_time: input.checkIntervalSeconds,
    recommended_interval_seconds: decision.recommended_interval_seconds,
    should_continue_waiting: decision.should_continue_waiting,
    wait_recommendation: template.recommendation,
    next_action: decision.next_action,
    next_tool: NEXT_TOOL[decision.next_action],
    message: fillTemplate(template.message, values),
    details: fillTemplate(template.details, values),
  };
}

function fillTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) => values[key] ?? match);
}
