/**
 * Prometheus Metrics Service
 *
 * Collects and exposes application metrics for monitoring.
 */

import { Registry, Counter, Histogram, collectDefaultMetrics } from 'prom-client';
import { config } from '../config.js';

// Create a custom registry
export const metricsRegistry = new Registry();

// Add default Node.js metrics (memory, CPU, event loop lag)
// Not under test: the event loop monitor outlives the test run
if (config.NODE_ENV !== 'test') {
  collectDefaultMetrics({ register: metricsRegistry });
}

// HTTP Request metrics
export const httpRequestsTotal = new Counter({
  name: 'http_requests_total',
  help: 'Total number of HTTP requests',
  labelNames: ['method', 'path', 'status'],
  registers: [metricsRegistry]
});

export const httpRequestDuration = new Histogram({
  name: 'http_request_duration_seconds',
  help: 'Duration of HTTP requests in seconds',
  labelNames: ['method', 'path', 'status'],
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5],
  registers: [metricsRegistry]
});

// Business metrics
export const taxCalculationsTotal = new Counter({
  name: 'tax_calculations_total',
  help: 'Total salaried tax calculations by applied slab',
  labelNames: ['slab'],
  registers: [metricsRegistry]
});

export const invalidInputsTotal = new Counter({
  name: 'tax_invalid_inputs_total',
  help: 'Total calculation requests rejected as invalid input',
  labelNames: ['channel'],
  registers: [metricsRegistry]
});

// Error metrics
export const errorsTotal = new Counter({
  name: 'errors_total',
  help: 'Total errors',
  labelNames: ['type', 'path'],
  registers: [metricsRegistry]
});

/**
 * Get metrics in Prometheus format
 */
export async function getMetrics(): Promise<string> {
  return metricsRegistry.metrics();
}

/**
 * Get metrics content type
 */
export function getMetricsContentType(): string {
  return metricsRegistry.contentType;
}

/**
 * Record HTTP request metrics
 */
export function recordHttpRequest(
  method: string,
  path: string,
  status: number,
  durationMs: number
): void {
  // Collapse unknown paths to keep label cardinality bounded
  const normalizedPath = status === 404 ? 'unmatched' : path;

  httpRequestsTotal.labels(method, normalizedPath, String(status)).inc();
  httpRequestDuration.labels(method, normalizedPath, String(status)).observe(durationMs / 1000);
}

export function recordTaxCalculation(slab: number): void {
  taxCalculationsTotal.labels(`S#${slab}`).inc();
}

export function recordInvalidInput(channel: 'api' | 'form'): void {
  invalidInputsTotal.labels(channel).inc();
}

export function recordError(type: string, path: string): void {
  errorsTotal.labels(type, path).inc();
}
