/**
 * optional-deps.ts - Dynamic loaders for optional OTel SDK packages
 *
 * The OTel API (@opentelemetry/api) is a hard dependency; the SDK and
 * exporters are optional so a plain install stays small. Each loader returns
 * the module, or null when the package isn't installed. Any other load
 * failure (syntax error, broken transitive dependency) is rethrown.
 *
 * Kept in its own module so tests can vi.mock("./optional-deps") and
 * simulate packages being present or absent.
 */

/**
 * Returns true if the error is a MODULE_NOT_FOUND for the expected package.
 */
function isModuleNotFound(error: unknown, packageName: string): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    error.code === "MODULE_NOT_FOUND" &&
    error.message.includes(packageName)
  );
}

/**
 * Load @opentelemetry/sdk-trace-node.
 * Provides NodeTracerProvider, SimpleSpanProcessor and ConsoleSpanExporter.
 */
export function loadSdkTraceNode(): typeof import("@opentelemetry/sdk-trace-node") | null {
  try {
    return require("@opentelemetry/sdk-trace-node");
  } catch (error) {
    if (isModuleNotFound(error, "@opentelemetry/sdk-trace-node")) return null;
    throw error;
  }
}

/**
 * Load @opentelemetry/exporter-trace-otlp-proto.
 * Provides OTLPTraceExporter for sending spans to a collector.
 */
export function loadExporterOtlpProto(): typeof import("@opentelemetry/exporter-trace-otlp-proto") | null {
  try {
    return require("@opentelemetry/exporter-trace-otlp-proto");
  } catch (error) {
    if (isModuleNotFound(error, "@opentelemetry/exporter-trace-otlp-proto")) return null;
    throw error;
  }
}
