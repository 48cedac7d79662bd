/**
 * Schemas for the GA4GH Task Execution Service resources.
 * Field names follow the wire format (snake_case) so parsed objects serialize
 * back to the same JSON.
 */
import { posix } from "node:path";
import { z } from "zod";

const StringMap = z.record(z.string());

export const TesFileTypeSchema = z.enum(["FILE", "DIRECTORY"]);

export const TesExecutorSchema = z.object({
  image: z.string().describe("Container image, e.g. ubuntu:20.04"),
  command: z.array(z.string()).describe("Program arguments (argv), e.g. [\"/bin/md5\", \"/data/file1\"]"),
  workdir: z.string().optional().describe("Working directory inside the container"),
  stdin: z.string().optional().describe("Absolute container path piped to stdin"),
  stdout: z.string().optional().describe("Absolute container path receiving stdout"),
  stderr: z.string().optional().describe("Absolute container path receiving stderr"),
  env: StringMap.optional().describe("Environment variables for the container"),
  ignore_error: z
    .boolean()
    .optional()
    .describe("Keep running later executors when this one exits non-zero"),
});

const absolutePath = z
  .string()
  .refine((path) => path.startsWith("/"), { message: "Path must be an absolute path." });

/** Absolute, normalized, and at least one directory below root (`/data/file`, not `/file`). */
const nestedOutputPath = absolutePath
  .transform((path) => posix.normalize(path).replace(/(.)\/+$/, "$1"))
  .refine((path) => path.split("/").filter(Boolean).length >= 2, {
    message: "Path can't be at the root, it must be at least one level nested.",
  });

export const TesInputSchema = z.object({
  name: z.string().optional(),
  description: z.string().optional(),
  url: z
    .string()
    .optional()
    .describe("Long-term storage URL, e.g. s3://bucket/file1. Required unless content is set"),
  path: absolutePath.describe("Absolute path of the file inside the container"),
  type: TesFileTypeSchema.optional(),
  content: z.string().optional().describe("Literal file content; overrides url when set"),
  streamable: z.boolean().optional(),
});

export const TesOutputSchema = z.object({
  name: z.string().optional(),
  description: z.string().optional(),
  url: z.string().describe("Storage URL the output is uploaded to"),
  path: nestedOutputPath.describe("Absolute container path, nested at least one level"),
  path_prefix: z.string().optional(),
  type: TesFileTypeSchema.optional(),
});

export const TesResourcesSchema = z.object({
  cpu_cores: z.number().int().optional(),
  preemptible: z.boolean().optional(),
  ram_gb: z.number().optional(),
  disk_gb: z.number().optional(),
  zones: z.array(z.string()).optional(),
  backend_parameters: StringMap.optional(),
  backend_parameters_strict: z.boolean().optional(),
});

export const TesExecutorLogSchema = z.object({
  start_time: z.string().optional(),
  end_time: z.string().optional(),
  stdout: z.string().optional(),
  stderr: z.string().optional(),
  exit_code: z.number().int(),
});

export const TesOutputFileLogSchema = z.object({
  url: z.string(),
  path: z.string(),
  // int64 carried as a string on the wire
  size_bytes: z.string(),
});

export const TesTaskLogSchema = z.object({
  logs: z.array(TesExecutorLogSchema),
  metadata: StringMap.optional(),
  start_time: z.string().optional(),
  end_time: z.string().optional(),
  outputs: z.array(TesOutputFileLogSchema),
  system_logs: z.array(z.string()).optional(),
});

export const TesTaskSchema = z.object({
  id: z.string().optional(),
  // Open-ended on the wire; read through observeState().
  state: z.string().optional(),
  name: z.string().optional(),
  description: z.string().optional(),
  inputs: z.array(TesInputSchema).optional(),
  outputs: z.array(TesOutputSchema).optional(),
  resources: TesResourcesSchema.optional(),
  executors: z.array(TesExecutorSchema),
  volumes: z.array(z.string()).optional(),
  tags: StringMap.optional(),
  logs: z.array(TesTaskLogSchema).optional(),
  creation_time: z.string().optional(),
});

/** MINIMAL view: only id and state are guaranteed. */
export const MinimalTesTaskSchema = z.object({
  id: z.string(),
  state: z.string(),
  name: z.string().optional(),
  creation_time: z.string().optional(),
});

export const TesCreateTaskResponseSchema = z.object({
  id: z.string().optional(),
});

export const TesServiceInfoSchema = z.object({
  id: z.string(),
  name: z.string(),
  type: z
    .object({
      group: z.string(),
      artifact: z.string(),
      version: z.string(),
    })
    .optional(),
  description: z.string().optional(),
  organization: z.object({
    name: z.string(),
    url: z.string(),
  }),
  contactUrl: z.string().optional(),
  documentationUrl: z.string().optional(),
  createdAt: z.string().optional(),
  updatedAt: z.string().optional(),
  environment: z.string().optional(),
  version: z.string(),
  storage: z.array(z.string()).optional(),
  tesResources_backend_parameters: z.array(z.string()).optional(),
});

export type TesFileType = z.infer<typeof TesFileTypeSchema>;
export type TesExecutor = z.infer<typeof TesExecutorSchema>;
export type TesInput = z.infer<typeof TesInputSchema>;
export type TesOutput = z.infer<typeof TesOutputSchema>;
export type TesResources = z.infer<typeof TesResourcesSchema>;
export type TesExecutorLog = z.infer<typeof TesExecutorLogSchema>;
export type TesOutputFileLog = z.infer<typeof TesOutputFileLogSchema>;
export type TesTaskLog = z.infer<typeof TesTaskLogSchema>;
export type TesTask = z.infer<typeof TesTaskSchema>;
export type MinimalTesTask = z.infer<typeof MinimalTesTaskSchema>;
export type TesServiceInfo = z.infer<typeof TesServiceInfoSchema>;

/** Whatever a GET /tasks/{id} returns for the requested view. */
export type FetchedTask = TesTask | MinimalTesTask;

/** Wire form of a task: a plain JSON object without absent optional fields. */
export function serializeTask(task: TesTask): Record<string, unknown> {
  return dropUndefined(task);
}

export function parseTask(data: unknown): TesTask {
  return TesTaskSchema.parse(data);
}

function dropUndefined(value: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (entry === undefined) continue;
    result[key] = normalizeEntry(entry);
  }
  return result;
}

function normalizeEntry(entry: unknown): unknown {
  if (Array.isArray(entry)) {
    return entry.map(normalizeEntry);
  }
  if (typeof entry === "object" && entry !== null) {
    return dropUndefined(Object.fromEntries(Object.entries(entry)));
  }
  return entry;
}
