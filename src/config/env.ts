/**
 * Environment configuration with validation and defaults
 */

import { config } from 'dotenv';
import { ConfigError } from '../errors.js';

// Load .env file
config();

/**
 * Parse environment variable as number with default
 */
export function parseNumber(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : defaultValue;
}

/**
 * Parse environment variable as boolean with default
 */
export function parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
  if (!value) return defaultValue;
  return value.toLowerCase() === 'true';
}

/**
 * Environment configuration
 */
export const env = {
  // Transport
  HOST: process.env.FRAME_RELAY_HOST || '0.0.0.0',
  PORT: parseNumber(process.env.FRAME_RELAY_PORT, 5556),
  WS_COMPRESSION: parseBoolean(process.env.WS_COMPRESSION, false),
  MAX_PAYLOAD_MB: parseNumber(process.env.MAX_PAYLOAD_MB, 64),

  // Delivery
  PUBLISH_HIGH_WATER_MARK: parseNumber(process.env.PUBLISH_HIGH_WATER_MARK, 1),
  RECEIVE_TIMEOUT_MS: parseNumber(process.env.RECEIVE_TIMEOUT_MS, 5000),
  RECONNECT_INTERVAL_MS: parseNumber(process.env.RECONNECT_INTERVAL_MS, 500),

  // Metrics
  FPS_WINDOW_SIZE: parseNumber(process.env.FPS_WINDOW_SIZE, 30),
  REPORT_INTERVAL_MS: parseNumber(process.env.REPORT_INTERVAL_MS, 2000),

  // Logging
  LOG_LEVEL: process.env.LOG_LEVEL || 'info',

  // Node environment
  NODE_ENV: process.env.NODE_ENV || 'development',

  // Computed
  get isDevelopment() {
    return this.NODE_ENV === 'development';
  },
  get isProduction() {
    return this.NODE_ENV === 'production';
  }
};

export type Env = typeof env;

/**
 * Validate configuration ranges. Collects every problem before failing.
 */
export function validateConfig(values: Env = env): void {
  const errors: string[] = [];

  if (!Number.isInteger(values.PORT) || values.PORT < 0 || values.PORT > 65535) {
    errors.push('FRAME_RELAY_PORT must be an integer between 0 and 65535.');
  }

  if (
    !Number.isInteger(values.PUBLISH_HIGH_WATER_MARK) ||
    values.PUBLISH_HIGH_WATER_MARK < 1 ||
    values.PUBLISH_HIGH_WATER_MARK > 3
  ) {
    errors.push('PUBLISH_HIGH_WATER_MARK must be 1, 2 or 3.');
  }

  if (values.RECEIVE_TIMEOUT_MS <= 0) {
    errors.push('RECEIVE_TIMEOUT_MS must be positive.');
  }

  if (values.RECONNECT_INTERVAL_MS < 10) {
    errors.push('RECONNECT_INTERVAL_MS must be at least 10.');
  }

  if (!Number.isInteger(values.FPS_WINDOW_SIZE) || values.FPS_WINDOW_SIZE < 2) {
    errors.push('FPS_WINDOW_SIZE must be an integer of at least 2.');
  }

  if (values.REPORT_INTERVAL_MS < 100) {
    errors.push('REPORT_INTERVAL_MS must be at least 100.');
  }

  if (values.MAX_PAYLOAD_MB < 1) {
    errors.push('MAX_PAYLOAD_MB must be at least 1.');
  }

  if (errors.length > 0) {
    throw new ConfigError(errors);
  }
}

/**
 * Configuration summary for the startup log
 */
export function describeConfig(values: Env = env): Record<string, string | number | boolean> {
  return {
    environment: values.NODE_ENV,
    transport: `${values.HOST}:${values.PORT}`,
    compression: values.WS_COMPRESSION,
    publishHighWaterMark: values.PUBLISH_HIGH_WATER_MARK,
    receiveTimeoutMs: values.RECEIVE_TIMEOUT_MS,
    reconnectIntervalMs: values.RECONNECT_INTERVAL_MS,
    fpsWindow: values.FPS_WINDOW_SIZE,
    logLevel: values.LOG_LEVEL
  };
}
