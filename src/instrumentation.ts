import { NodeSDK } from '@opentelemetry/sdk-node';
import { getNodeAutoInstrumentations } from '@opentelemetry/auto-instrumentations-node';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-http';
import { PrometheusExporter } from '@opentelemetry/exporter-prometheus';
import { logWithTrace, errorMessage } from './logger';

// Track if instrumentation has been initialized to prevent multiple initializations
let isInitialized = false;

// Must run before express is imported so the auto-instrumentations can patch it
export function initializeInstrumentation(env: NodeJS.ProcessEnv = process.env): void {
  if (isInitialized) {
    logWithTrace('info', 'OpenTelemetry instrumentation already initialized, skipping');
    return;
  }

  if (env.OTEL_SDK_DISABLED === 'true') {
    logWithTrace('info', 'OpenTelemetry disabled by OTEL_SDK_DISABLED');
    return;
  }

  // OTEL_RESOURCE_ATTRIBUTES (key1=value1,key2=value2) is picked up by the SDK's env detector
  const serviceName = env.OTEL_SERVICE_NAME || 'wordpass-backend';
  const otlpEndpoint = env.OTEL_EXPORTER_OTLP_ENDPOINT || 'http://localhost:4318';
  const prometheusPort = parseInt(env.PROMETHEUS_PORT || '9464', 10);

  const traceExporter = new OTLPTraceExporter({
    url: `${otlpEndpoint}/v1/traces`,
  });

  // The Prometheus exporter is a pull-based metric reader with its own HTTP endpoint
  const prometheusExporter = new PrometheusExporter({
    port: prometheusPort,
    endpoint: '/metrics',
  });

  const sdk = new NodeSDK({
    serviceName,
    traceExporter,
    metricReader: prometheusExporter,
    instrumentations: [
      getNodeAutoInstrumentations({
        // Word lists are read on every request; fs spans would drown everything else
        '@opentelemetry/instrumentation-fs': {
          enabled: false,
        },
      }),
    ],
  });

  sdk.start();
  isInitialized = true;

  logWithTrace('info', 'OpenTelemetry initialized', {
    serviceName,
    metricsUrl: `http://localhost:${prometheusPort}/metrics`,
    tracesUrl: `${otlpEndpoint}/v1/traces`,
  });

  // Gracefully shut down the SDK on process termination
  process.on('SIGTERM', () => {
    sdk
      .shutdown()
      .then(() => logWithTrace('info', 'OpenTelemetry SDK shut down successfully'))
      .catch((error: unknown) =>
        logWithTrace('error', 'Error shutting down OpenTelemetry SDK', { error: errorMessage(error) })
      );
  });
}
