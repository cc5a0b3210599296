/**
 * Central Metrics Registry
 *
 * Single prom-client Registry for the whole process, with default Node metrics.
 * No dependencies on other metrics modules to avoid circular imports.
 */

import { Registry, collectDefaultMetrics } from 'prom-client';

export const metricsRegistry = new Registry();
collectDefaultMetrics({ register: metricsRegistry });
