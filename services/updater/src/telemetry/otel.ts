import { diag, DiagConsoleLogger, DiagLogLevel, SpanStatusCode, trace, type Attributes } from "@opentelemetry/api";
import { NodeSDK } from "@opentelemetry/sdk-node";
import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-http";
import { getNodeAutoInstrumentations } from "@opentelemetry/auto-instrumentations-node";
import { resourceFromAttributes } from "@opentelemetry/resources";

const DIAG_LEVELS: Record<string, DiagLogLevel> = {
  NONE: DiagLogLevel.NONE,
  ERROR: DiagLogLevel.ERROR,
  WARN: DiagLogLevel.WARN,
  INFO: DiagLogLevel.INFO,
  DEBUG: DiagLogLevel.DEBUG,
  VERBOSE: DiagLogLevel.VERBOSE,
  ALL: DiagLogLevel.ALL
};

let sdk: NodeSDK | null = null;

export async function initOtel(env: { otlpEndpoint?: string; serviceName: string }) {
  const endpoint = env.otlpEndpoint?.trim();
  if (!endpoint) return;

  // Quiet unless OTEL_DIAGNOSTIC_LOG_LEVEL asks otherwise.
  const diagLevel = DIAG_LEVELS[(process.env.OTEL_DIAGNOSTIC_LOG_LEVEL ?? "").toUpperCase()];
  if (diagLevel !== undefined) {
    diag.setLogger(new DiagConsoleLogger(), diagLevel);
  }

  sdk = new NodeSDK({
    resource: resourceFromAttributes({
      "service.name": env.serviceName
    }),
    traceExporter: new OTLPTraceExporter({
      url: endpoint
    }),
    instrumentations: [getNodeAutoInstrumentations()]
  });

  sdk.start();
}

export async function shutdownOtel() {
  const s = sdk;
  sdk = null;
  await s?.shutdown();
}

/**
 * Runs `fn` inside an active span. Without an SDK the global tracer is a no-op,
 * so callers never need to know whether tracing is on.
 */
export async function withSpan<T>(
  name: string,
  attributes: Attributes,
  fn: (setAttributes: (attrs: Attributes) => void) => Promise<T>
): Promise<T> {
  const tracer = trace.getTracer("compose-vm-updater");
  return tracer.startActiveSpan(name, { attributes }, async (span) => {
    try {
      const result = await fn((attrs) => span.setAttributes(attrs));
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (err) {
      span.recordException(err instanceof Error ? err : String(err));
      span.setStatus({ code: SpanStatusCode.ERROR, message: err instanceof Error ? err.message : String(err) });
      throw err;
    } finally {
      span.end();
    }
  });
}
