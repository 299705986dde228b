/**
 * Exception classes for hub-link.
 */

export interface HubErrorOptions {
  /** Underlying error that caused this one */
  cause?: unknown;
}

export class HubError extends Error {
  constructor(message: string, options?: HubErrorOptions) {
    super(message, options);
    this.name = 'HubError';
  }
}

// Wire level

export class FrameError extends HubError {
  constructor(message: string, options?: HubErrorOptions) {
    super(message, options);
    this.name = 'FrameError';
  }
}

export class FrameTruncatedError extends FrameError {
  constructor(message: string) {
    super(message);
    this.name = 'FrameTruncatedError';
  }
}

export class InvalidEscapeError extends FrameError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidEscapeError';
  }
}

export class ProtocolError extends HubError {
  constructor(message: string, options?: HubErrorOptions) {
    super(message, options);
    this.name = 'ProtocolError';
  }
}

export class UnknownMessageTypeError extends ProtocolError {
  constructor(readonly messageType: number) {
    super(`Unknown message type 0x${messageType.toString(16).padStart(2, '0')}`);
    this.name = 'UnknownMessageTypeError';
  }
}

export class FieldTooLargeError extends ProtocolError {
  constructor(message: string) {
    super(message);
    this.name = 'FieldTooLargeError';
  }
}

export class MalformedMessageError extends ProtocolError {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedMessageError';
  }
}

// Link level

export class BLEConnectionError extends HubError {
  constructor(message: string, options?: HubErrorOptions) {
    super(message, options);
    this.name = 'BLEConnectionError';
  }
}

export class BLETimeoutError extends HubError {
  constructor(message: string) {
    super(message);
    this.name = 'BLETimeoutError';
  }
}

export class OperationAbortedError extends HubError {
  constructor(message: string = 'Operation aborted') {
    super(message);
    this.name = 'OperationAbortedError';
  }
}

// Session level

export class HandshakeTimeoutError extends HubError {
  constructor(message: string, options?: HubErrorOptions) {
    super(message, options);
    this.name = 'HandshakeTimeoutError';
  }
}

export class HandshakeRejectedError extends HubError {
  constructor(message: string) {
    super(message);
    this.name = 'HandshakeRejectedError';
  }
}

export class UploadRejectedError extends HubError {
  constructor(readonly slot: number) {
    super(`Hub rejected upload to slot ${slot}`);
    this.name = 'UploadRejectedError';
  }
}

export class UploadFailedError extends HubError {
  constructor(message: string, options?: HubErrorOptions) {
    super(message, options);
    this.name = 'UploadFailedError';
  }
}

export class FlowTimeoutError extends HubError {
  constructor(message: string, options?: HubErrorOptions) {
    super(message, options);
    this.name = 'FlowTimeoutError';
  }
}

export class FlowRejectedError extends HubError {
  constructor(readonly slot: number, readonly stop: boolean) {
    super(`Hub rejected ${stop ? 'stop' : 'start'} of slot ${slot}`);
    this.name = 'FlowRejectedError';
  }
}

// Fast path

export class RunError extends HubError {
  constructor(message: string, options?: HubErrorOptions) {
    super(message, options);
    this.name = 'RunError';
  }
}

export class UnknownActionError extends RunError {
  constructor(readonly action: string, available: string[]) {
    super(`Unknown action: ${action}. Available: ${available.join(', ')}`);
    this.name = 'UnknownActionError';
  }
}

export class ActionUnavailableError extends RunError {
  constructor(readonly action: string, options?: HubErrorOptions) {
    super(`Action unavailable: ${action}`, options);
    this.name = 'ActionUnavailableError';
  }
}

export class PreloadError extends HubError {
  constructor(message: string) {
    super(message);
    this.name = 'PreloadError';
  }
}

export class CatalogTooLargeError extends PreloadError {
  constructor(entries: number, capacity: number) {
    super(`Catalog has ${entries} actions but only ${capacity} slots are free`);
    this.name = 'CatalogTooLargeError';
  }
}
