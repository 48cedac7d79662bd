import type { TesServiceInfo, TesTask } from "../../src/tes/models.js";

export const TEST_TES_URL = "https://tes.example.org/ga4gh/tes/v1";
export const TEST_TOKEN = "test-secret";

export function createTestTask(overrides: Partial<TesTask> = {}): TesTask {
  return {
    name: "checksum",
    description: "Compute the md5 of an input file",
    inputs: [
      {
        url: "s3://test-bucket/input.txt",
        path: "/data/input.txt",
        type: "FILE",
      },
    ],
    outputs: [
      {
        url: "s3://test-bucket/output/md5.txt",
        path: "/data/out/md5.txt",
        type: "FILE",
      },
    ],
    resources: { cpu_cores: 1, ram_gb: 1, disk_gb: 5 },
    executors: [
      {
        image: "alpine:3.19",
        command: ["md5sum", "/data/input.txt"],
        stdout: "/data/out/md5.txt",
      },
    ],
    ...overrides,
  };
}

export function createServiceInfo(overrides: Partial<TesServiceInfo> = {}): TesServiceInfo {
  return {
    id: "org.example.tes",
    name: "Example TES",
    organization: { name: "Example Org", url: "https://example.org" },
    version: "1.1.0",
    ...overrides,
  };
}
