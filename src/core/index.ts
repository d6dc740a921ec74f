/**
 * Core module - the crawler engine shared by the CLI and embedding programs
 */

export * from "./errors.js";

export * from "./models/entity.js";
export * from "./models/task.js";
export * from "./interfaces/index.js";

export * from "./frontier/frontier-queue.js";
export * from "./dedup/dedup-index.js";
export * from "./dedup/high-water-marks.js";
export * from "./dead-letter/dead-letter-list.js";
export * from "./governor/latency-tracker.js";
export * from "./governor/token-bucket.js";
export * from "./governor/rate-governor.js";
export * from "./fetcher/fetcher.js";
export * from "./coordinator/dual-write-coordinator.js";
export * from "./checkpoint/checkpoint.js";
export * from "./checkpoint/checkpoint-manager.js";
export * from "./checkpoint/file-checkpoint-storage.js";
export * from "./reconciliation/reconciler.js";
export * from "./telemetry/events.js";
export * from "./telemetry/metrics.js";
export * from "./pipeline/bounded-channel.js";
export * from "./pipeline/crawl-context.js";
export * from "./pipeline/crawl-pipeline.js";
export * from "./platform/index.js";
export * from "./storage/index.js";
