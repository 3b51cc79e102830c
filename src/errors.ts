export class ConfigurationError extends Error {
  constructor(message: string, public readonly issues: string[] = []) {
    super(issues.length > 0 ? `${message}\n${issues.map((issue) => `  - ${issue}`).join('\n')}` : message);
    this.name = 'ConfigurationError';
  }
}

export type TvReachability = 'transient' | 'unreachable';

/**
 * Raised by the TV adapter. `reachability` tells a network hiccup (or a TV still
 * powering on) apart from a TV that refuses or cannot be routed to.
 */
export class TvTransportError extends Error {
  constructor(message: string, public readonly reachability: TvReachability, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TvTransportError';
  }
}

export class TransientSampleError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransientSampleError';
  }
}

export class UnreachableDeviceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'UnreachableDeviceError';
  }
}

export class StreamConnectError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StreamConnectError';
  }
}

export type StreamSendErrorKind = 'transient' | 'closed';

export class StreamSendError extends Error {
  constructor(message: string, public readonly kind: StreamSendErrorKind, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StreamSendError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
