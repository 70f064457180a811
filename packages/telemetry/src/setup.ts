/**
 * OTel SDK initialization.
 *
 * Lazy-loaded: OTel SDK packages are only imported when OTEL_ENABLED=true,
 * so there is no overhead when telemetry is disabled.
 */

import type { TelemetryConfig } from "./types.js";

let initialized = false;

let sdkInstance: { shutdown(): Promise<void> } | undefined;

/**
 * Check if telemetry is enabled via the OTEL_ENABLED env var.
 *
 * Returns true only when OTEL_ENABLED is explicitly set to "true" or "1".
 */
export function isTelemetryEnabled(): boolean {
  const value = process.env.OTEL_ENABLED;
  return value === "true" || value === "1";
}

/**
 * Resolve the effective telemetry settings from config overrides and env vars.
 */
export function resolveTelemetryConfig(config?: TelemetryConfig): Required<TelemetryConfig> {
  const rawRatio = config?.sampleRatio ?? Number.parseFloat(process.env.OTEL_TRACES_SAMPLER_ARG ?? "1.0");
  return {
    serviceName: config?.serviceName ?? process.env.OTEL_SERVICE_NAME ?? "relaykit",
    endpoint: config?.endpoint ?? process.env.OTEL_EXPORTER_OTLP_ENDPOINT ?? "http://localhost:4318",
    sampleRatio: Number.isNaN(rawRatio) ? 1.0 : Math.max(0, Math.min(1, rawRatio)),
    environment: config?.environment ?? process.env.OTEL_ENVIRONMENT ?? "development",
  };
}

/**
 * Initialize the OpenTelemetry Node SDK with distributed tracing.
 *
 * Configures:
 * - OTLP HTTP trace exporter
 * - UndiciInstrumentation (auto-instruments fetch calls made by provider adapters)
 * - ParentBasedTraceIdRatio sampler
 * - Resource with service.name, service.version, deployment.environment
 *
 * @returns true if telemetry was initialized, false if disabled or already initialized
 */
export async function setupTelemetry(config?: TelemetryConfig): Promise<boolean> {
  if (!isTelemetryEnabled()) {
    return false;
  }

  if (initialized) {
    return false;
  }

  const { NodeSDK } = await import("@opentelemetry/sdk-node");
  const { OTLPTraceExporter } = await import("@opentelemetry/exporter-trace-otlp-http");
  const { UndiciInstrumentation } = await import("@opentelemetry/instrumentation-undici");
  const { ATTR_SERVICE_NAME, ATTR_SERVICE_VERSION } = await import(
    "@opentelemetry/semantic-conventions"
  );
  const { Resource } = await import("@opentelemetry/resources");
  const { ParentBasedSampler, TraceIdRatioBasedSampler } = await import(
    "@opentelemetry/sdk-trace-base"
  );

  const resolved = resolveTelemetryConfig(config);

  const sdk = new NodeSDK({
    resource: new Resource({
      [ATTR_SERVICE_NAME]: resolved.serviceName,
      [ATTR_SERVICE_VERSION]: process.env.npm_package_version ?? "0.0.0",
      "deployment.environment": resolved.environment,
    }),
    traceExporter: new OTLPTraceExporter({ url: `${resolved.endpoint}/v1/traces` }),
    sampler: new ParentBasedSampler({
      root: new TraceIdRatioBasedSampler(resolved.sampleRatio),
    }),
    instrumentations: [new UndiciInstrumentation()],
  });

  sdk.start();

  sdkInstance = sdk;
  initialized = true;

  return true;
}

/**
 * Gracefully shut down the OTel SDK, flushing any pending spans.
 *
 * Safe to call even if telemetry was never initialized.
 */
export async function shutdownTelemetry(): Promise<void> {
  if (sdkInstance !== undefined) {
    await sdkInstance.shutdown();
    sdkInstance = undefined;
    initialized = false;
  }
}
