/**
 * @infrawatch/monitor public API
 */

// Configuration
export {
  ConfigError,
  RESERVED_TARGET_NAME,
  defaultSettingsPath,
  loadSettings,
  parseSettings,
  settingsSchema,
  type AlertSettings,
  type BrokerSettings,
  type MonitorSettings,
  type RecoveryBinding,
  type TargetDefinition,
} from "./config/settings.js";
export { DEFAULT_TIMEOUTS } from "./config/timeouts.js";

// Monitoring
export type * from "./monitoring/types.js";
export { ESCALATION_ORDER } from "./monitoring/types.js";
export { TargetRegistry } from "./monitoring/TargetRegistry.js";
export { Scheduler, applyProbeResult, deriveState, type TransitionListener } from "./monitoring/Scheduler.js";
export { StatusAggregator, toStatusLabel, type MonitorView, type StatusLabel } from "./monitoring/StatusAggregator.js";
export {
  ControlPlane,
  type ControlPlaneConfig,
  type EscalationNotifier,
  type RecoveryAttempt,
} from "./monitoring/ControlPlane.js";
export {
  DockerRestartAction,
  ManualRecoveryAction,
  NoopRecoveryAction,
  WebhookRecoveryAction,
  buildRecoveryBindings,
  createRecoveryAction,
  type CommandRunner,
  type RecoveryAction,
} from "./monitoring/RecoveryActions.js";
export { AlertNotifier, createAlertNotifier, type Alert, type AlertSeverity } from "./monitoring/AlertNotifier.js";
export { metrics, register } from "./monitoring/metrics.js";

// Probes
export * from "./probes/index.js";

// Pipeline
export { BrokerUnavailableError, type MetricsBroker, type QueueMessage, type QueueRole } from "./pipeline/Broker.js";
export { RedisStreamBroker } from "./pipeline/RedisStreamBroker.js";
export {
  InvalidRecordError,
  createMetricRecord,
  deserializeRecord,
  idempotencyKey,
  serializeRecord,
  type MetricRecord,
} from "./pipeline/MetricRecord.js";
export { MetricsProducer, type ProducerStatus } from "./pipeline/MetricsProducer.js";
export { MetricsConsumer, type ConsumerStatus } from "./pipeline/MetricsConsumer.js";
export { RedisMetricsSink, type MetricsSink } from "./pipeline/MetricsSink.js";
export { IdempotencyCache } from "./pipeline/IdempotencyCache.js";
export { ScrapeFeed } from "./pipeline/ScrapeFeed.js";
export { NodeExporterCollector, parseExposition, parseSampleLine } from "./pipeline/NodeExporterCollector.js";
export { StatusSnapshotSource, type MetricSource } from "./pipeline/sources.js";

// HTTP
export { createApp, type AppDeps } from "./app.js";
