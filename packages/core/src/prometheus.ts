/**
 * Prometheus telemetry entry point for Node.js environments.
 *
 * This module exports Prometheus-specific telemetry functionality that
 * requires prom-client (a Node.js-only library).
 *
 * @example
 * import { setTelemetry } from '@agent-market/core';
 * import { createPrometheusTelemetry } from '@agent-market/core/prometheus';
 *
 * setTelemetry(createPrometheusTelemetry());
 */

export {
  createPrometheusTelemetry,
  type PrometheusTelemetryOptions,
  type PrometheusTelemetryFacade,
} from './telemetry-prometheus.js';
