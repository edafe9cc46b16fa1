/**
 * Error taxonomy for the frame pipeline
 */

export type ErrorCode =
  | 'CONFIG_INVALID'
  | 'STARTUP_FAILED'
  | 'DEVICE_FAILED'
  | 'SOURCE_EXHAUSTED'
  | 'DECODE_MISMATCH'
  | 'WIRE_INVALID'
  | 'SESSION_STATE'
  | 'SESSION_CLOSED';

export class FrameRelayError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Invalid environment or CLI configuration
 */
export class ConfigError extends FrameRelayError {
  readonly problems: string[];

  constructor(problems: string[]) {
    super('CONFIG_INVALID', `Invalid configuration: ${problems.join('; ')}`);
    this.problems = problems;
  }
}

/**
 * Device open or transport bind failed; aborts before streaming
 */
export class StartupError extends FrameRelayError {
  readonly resource: string;

  constructor(resource: string, message: string, options?: { cause?: unknown }) {
    super('STARTUP_FAILED', `${resource}: ${message}`, options);
    this.resource = resource;
  }
}

/**
 * Device failure during streaming; ends the session
 */
export class DeviceError extends FrameRelayError {
  constructor(message: string, options?: { cause?: unknown; code?: 'DEVICE_FAILED' | 'SOURCE_EXHAUSTED' }) {
    super(options?.code ?? 'DEVICE_FAILED', message, options);
  }
}

export class SourceExhaustedError extends DeviceError {
  constructor(message = 'Frame source has no more frames') {
    super(message, { code: 'SOURCE_EXHAUSTED' });
  }
}

/**
 * Payload does not match its declared dimensions; the frame is dropped
 */
export class DecodeMismatchError extends FrameRelayError {
  readonly streamId: string;

  constructor(streamId: string, message: string) {
    super('DECODE_MISMATCH', `${streamId}: ${message}`);
    this.streamId = streamId;
  }
}

/**
 * Transport packet failed schema validation
 */
export class WirePacketError extends FrameRelayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('WIRE_INVALID', message, options);
  }
}

export class SessionStateError extends FrameRelayError {
  constructor(message: string) {
    super('SESSION_STATE', message);
  }
}

export class SessionClosedError extends FrameRelayError {
  constructor(resource: string) {
    super('SESSION_CLOSED', `${resource} is closed`);
  }
}

export function isFatal(error: unknown): error is DeviceError {
  return error instanceof DeviceError;
}
