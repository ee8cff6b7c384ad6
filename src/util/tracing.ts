import {
  trace,
  SpanStatusCode,
  type Span,
  type Tracer,
} from "@opentelemetry/api";
import { NodeTracerProvider } from "@opentelemetry/sdk-trace-node";
import {
  ConsoleSpanExporter,
  SimpleSpanProcessor,
  InMemorySpanExporter,
  type SpanExporter,
} from "@opentelemetry/sdk-trace-base";
import { Resource } from "@opentelemetry/resources";
import { ATTR_SERVICE_NAME } from "@opentelemetry/semantic-conventions";
import type { TracingConfig } from "../config/types.js";
import { CALLMAP_VERSION } from "../config/constants.js";

let tracer: Tracer | null = null;
let provider: NodeTracerProvider | null = null;
let memoryExporter: InMemorySpanExporter | null = null;
let isInitialized = false;

export const TRACING_SERVICE_NAME = "callmap";

export const SPAN_NAMES = {
  GENERATE: "callmap.generate",
  CALLSTACK_RESOLVE: "callmap.callstack.resolve",
  REFRESH: "callmap.refresh",
} as const;

export type SpanAttributes = Record<string, string | number | boolean | undefined>;

export function isTracingEnabled(): boolean {
  return isInitialized && tracer !== null;
}

export function getMemoryExporter(): InMemorySpanExporter | null {
  return memoryExporter;
}

export function initTracing(config: TracingConfig): void {
  if (isInitialized) {
    return;
  }

  if (!config.enabled) {
    isInitialized = true;
    return;
  }

  const serviceName = config.serviceName ?? TRACING_SERVICE_NAME;
  const resource = Resource.default().merge(
    new Resource({
      [ATTR_SERVICE_NAME]: serviceName,
    }),
  );

  provider = new NodeTracerProvider({ resource });

  let exporter: SpanExporter;
  if (config.exporterType === "memory") {
    memoryExporter = new InMemorySpanExporter();
    exporter = memoryExporter;
  } else {
    exporter = new ConsoleSpanExporter();
  }
  provider.addSpanProcessor(new SimpleSpanProcessor(exporter));

  provider.register();
  tracer = trace.getTracer(serviceName, CALLMAP_VERSION);
  isInitialized = true;
}

export function shutdownTracing(): Promise<void> {
  if (provider) {
    return provider.shutdown();
  }
  return Promise.resolve();
}

function getTracer(): Tracer {
  return tracer ?? trace.getTracer(TRACING_SERVICE_NAME, CALLMAP_VERSION);
}

function definedAttributes(
  attrs: SpanAttributes,
): Record<string, string | number | boolean> {
  const result: Record<string, string | number | boolean> = {};
  for (const [key, value] of Object.entries(attrs)) {
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}

function endSpan(span: Span, error?: unknown): void {
  if (error !== undefined) {
    const err = error instanceof Error ? error : new Error(String(error));
    span.recordException(err);
    span.setStatus({ code: SpanStatusCode.ERROR, message: err.message });
  } else {
    span.setStatus({ code: SpanStatusCode.OK });
  }
  span.end();
}

export async function withSpan<T>(
  name: string,
  fn: (span: Span) => Promise<T>,
  attributes?: SpanAttributes,
): Promise<T> {
  const span = getTracer().startSpan(name, {
    attributes: attributes ? definedAttributes(attributes) : undefined,
  });

  try {
    const result = await fn(span);
    endSpan(span);
    return result;
  } catch (error) {
    endSpan(span, error);
    throw error;
  }
}

export function withSpanSync<T>(
  name: string,
  fn: (span: Span) => T,
  attributes?: SpanAttributes,
): T {
  const span = getTracer().startSpan(name, {
    attributes: attributes ? definedAttributes(attributes) : undefined,
  });

  try {
    const result = fn(span);
    endSpan(span);
    return result;
  } catch (error) {
    endSpan(span, error);
    throw error;
  }
}

export function setSpanAttributes(span: Span, attributes: SpanAttributes): void {
  span.setAttributes(definedAttributes(attributes));
}

export async function resetTracingForTest(): Promise<void> {
  if (provider) {
    await provider.shutdown();
  }
  trace.disable();
  tracer = null;
  provider = null;
  memoryExporter = null;
  isInitialized = false;
}
