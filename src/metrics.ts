import { Counter, Histogram, Registry, collectDefaultMetrics } from "prom-client";

export const metricsRegistry = new Registry();
collectDefaultMetrics({ register: metricsRegistry });

export const moderationActionsCounter = new Counter({
  name: "curation_moderation_actions_total",
  help: "Moderation actions applied, by stage and action",
  labelNames: ["stage", "action"],
  registers: [metricsRegistry],
});

export const publishItemsCounter = new Counter({
  name: "curation_publish_items_total",
  help: "Items considered by the publish synchronizer, by stage and outcome",
  labelNames: ["stage", "outcome"],
  registers: [metricsRegistry],
});

export const remoteLatencyHistogram = new Histogram({
  name: "curation_remote_call_seconds",
  help: "Latency of dataset store calls",
  buckets: [0.1, 0.25, 0.5, 1, 2, 5, 10, 30],
  labelNames: ["operation"],
  registers: [metricsRegistry],
});

export const remoteErrorsCounter = new Counter({
  name: "curation_remote_errors_total",
  help: "Dataset store failures by operation and error kind",
  labelNames: ["operation", "kind"],
  registers: [metricsRegistry],
});

export const syncDurationHistogram = new Histogram({
  name: "curation_sync_duration_seconds",
  help: "End-to-end duration of a publish sync run",
  buckets: [0.5, 1, 5, 15, 30, 60, 120, 300],
  registers: [metricsRegistry],
});

export function startRemoteTimer(operation: string) {
  return remoteLatencyHistogram.startTimer({ operation });
}

export function recordRemoteError(operation: string, kind: string) {
  remoteErrorsCounter.labels(operation, kind).inc();
}

export function recordModeration(stage: string, action: "submit" | "approve" | "reject" | "update" | "delete") {
  moderationActionsCounter.labels(stage, action).inc();
}

export function recordPublish(stage: string, outcome: "uploaded" | "skipped" | "failed") {
  publishItemsCounter.labels(stage, outcome).inc();
}
