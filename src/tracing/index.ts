/**
 * tracing/index.ts - OpenTelemetry setup and span helpers
 *
 * What this file does:
 * Lets a run be traced end to end: one root span for the workflow, a child
 * span per phase and per provider call, and a CLIENT span per kubectl
 * execution (see utils/kubectl.ts).
 *
 * Opt-in:
 * Tracing stays off unless OTEL_TRACING_ENABLED=true. While off, the OTel API
 * hands out a no-op tracer, so the span helpers below cost next to nothing.
 *
 * Optional SDK:
 * @opentelemetry/sdk-trace-node and @opentelemetry/exporter-trace-otlp-proto
 * are optional dependencies, loaded through optional-deps.ts. When the SDK is
 * missing, initTracing() warns and leaves the no-op tracer in place.
 *
 * Exporter options (OTEL_EXPORTER_TYPE):
 * - console (default): prints spans to stdout
 * - otlp: sends spans to OTEL_EXPORTER_OTLP_ENDPOINT
 */

import {
  SpanStatusCode,
  trace,
  type Attributes,
  type Span,
  type Tracer,
} from "@opentelemetry/api";
import type { SpanExporter } from "@opentelemetry/sdk-trace-node";
import { silentLogger, type Logger } from "../utils/logger";
import { loadExporterOtlpProto, loadSdkTraceNode } from "./optional-deps";

export const SERVICE_NAME = "fabric-launch";

/** Environment variables read by initTracing(). */
export interface TracingEnv {
  OTEL_TRACING_ENABLED?: string;
  OTEL_EXPORTER_TYPE?: string;
  OTEL_EXPORTER_OTLP_ENDPOINT?: string;
}

/**
 * Creates the span exporter selected by OTEL_EXPORTER_TYPE.
 *
 * @throws Error when the selected exporter's package is not installed or the
 *   OTLP endpoint is missing
 */
function createSpanExporter(env: TracingEnv, logger: Logger): SpanExporter {
  const exporterType = env.OTEL_EXPORTER_TYPE || "console";

  if (exporterType === "otlp") {
    const exporterOtlpProto = loadExporterOtlpProto();
    if (!exporterOtlpProto) {
      throw new Error(
        "OTEL_EXPORTER_TYPE=otlp requires @opentelemetry/exporter-trace-otlp-proto. " +
          "Install it: npm install @opentelemetry/exporter-trace-otlp-proto"
      );
    }
    const endpoint = env.OTEL_EXPORTER_OTLP_ENDPOINT;
    if (!endpoint) {
      throw new Error(
        "OTEL_EXPORTER_OTLP_ENDPOINT is required when OTEL_EXPORTER_TYPE=otlp."
      );
    }
    const base = endpoint.replace(/\/+$/, "");
    const url = base.endsWith("/v1/traces") ? base : `${base}/v1/traces`;
    logger.info("Using OTLP span exporter", { url });
    return new exporterOtlpProto.OTLPTraceExporter({ url });
  }

  if (exporterType !== "console") {
    throw new Error(
      `Unsupported OTEL_EXPORTER_TYPE: "${exporterType}". Valid options: "console", "otlp".`
    );
  }

  const sdkTraceNode = loadSdkTraceNode();
  if (!sdkTraceNode) {
    throw new Error(
      "Console exporter requires @opentelemetry/sdk-trace-node. " +
        "Install it: npm install @opentelemetry/sdk-trace-node"
    );
  }
  logger.info("Using console span exporter");
  return new sdkTraceNode.ConsoleSpanExporter();
}

/**
 * Registers a global tracer provider when tracing is enabled.
 *
 * Spans are exported immediately (SimpleSpanProcessor); a CLI run is short
 * and batching would lose spans at exit.
 *
 * @param env - Usually process.env
 * @param logger - Diagnostic log
 * @returns A shutdown function that flushes pending spans; a no-op when
 *   tracing is disabled or the SDK is missing
 */
export function initTracing(
  env: TracingEnv = process.env,
  logger: Logger = silentLogger
): () => Promise<void> {
  const noop = async () => {};
  if (env.OTEL_TRACING_ENABLED !== "true") return noop;

  const sdkTraceNode = loadSdkTraceNode();
  if (!sdkTraceNode) {
    logger.warn(
      "OTEL_TRACING_ENABLED=true but @opentelemetry/sdk-trace-node is not installed; tracing is a no-op"
    );
    return noop;
  }

  const exporter = createSpanExporter(env, logger);
  const provider = new sdkTraceNode.NodeTracerProvider({
    spanProcessors: [new sdkTraceNode.SimpleSpanProcessor(exporter)],
  });
  provider.register();
  logger.info("Tracing enabled", { service: SERVICE_NAME });

  return async () => {
    await provider.shutdown();
  };
}

/**
 * Get a tracer from the global provider (a no-op tracer when tracing is off).
 */
export function getTracer(): Tracer {
  return trace.getTracer(SERVICE_NAME);
}

/**
 * Runs `fn` inside an active span and records its outcome.
 *
 * Errors are recorded on the span and rethrown unchanged.
 *
 * @param name - Span name, e.g. "fabric-launch.phase.discovery"
 * @param attributes - Attributes set when the span starts
 * @param fn - Work to trace; receives the span for extra attributes
 */
export function withSpan<T>(
  name: string,
  attributes: Attributes,
  fn: (span: Span) => Promise<T>
): Promise<T> {
  return getTracer().startActiveSpan(name, { attributes }, async (span) => {
    try {
      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: error instanceof Error ? error.message : String(error),
      });
      if (error instanceof Error) span.recordException(error);
      throw error;
    } finally {
      span.end();
    }
  });
}
