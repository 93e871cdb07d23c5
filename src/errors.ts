// src/errors.ts

/**
 * Base class for all Teleinfo errors
 */
export class TeleinfoError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TeleinfoError';
  }
}

/**
 * A frame was delimited but neither grammar consumes its body.
 */
export class TeleinfoParseError extends TeleinfoError {
  /** Decoded text of the offending frame body */
  readonly frame: string;
  /** Bytes following the offending frame, usable to resynchronize */
  readonly remaining: Uint8Array;

  constructor(message: string, frame: string, remaining: Uint8Array) {
    super(message);
    this.name = 'TeleinfoParseError';
    this.frame = frame;
    this.remaining = remaining;
  }
}

/**
 * Raised by `assertValid` when a record failed checksum validation
 */
export class TeleinfoChecksumError extends TeleinfoError {
  readonly tags: string[];

  constructor(tags: string[]) {
    super(
      tags.length > 0
        ? `Checksum mismatch for ${tags.join(', ')}`
        : 'Frame was not fully consumed'
    );
    this.name = 'TeleinfoChecksumError';
    this.tags = tags;
  }
}

/**
 * Nothing arrived within the read timeout. Recoverable: the read loop treats it as zero bytes.
 */
export class TeleinfoTimeoutError extends TeleinfoError {
  constructor(message: string = 'Teleinfo read timed out') {
    super(message);
    this.name = 'TeleinfoTimeoutError';
  }
}

/**
 * Unrecoverable transport failure
 */
export class TeleinfoIoError extends TeleinfoError {
  constructor(message: string = 'Teleinfo transport failure', options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TeleinfoIoError';
  }
}

export class TeleinfoEndOfStreamError extends TeleinfoIoError {
  constructor(message: string = 'End of stream reached') {
    super(message);
    this.name = 'TeleinfoEndOfStreamError';
  }
}

export class TeleinfoNotConnectedError extends TeleinfoIoError {
  constructor(message: string = 'Transport is not connected') {
    super(message);
    this.name = 'TeleinfoNotConnectedError';
  }
}

export class TeleinfoTooManyEmptyReadsError extends TeleinfoIoError {
  constructor(attempts: number) {
    super(`No data received after ${attempts} consecutive reads`);
    this.name = 'TeleinfoTooManyEmptyReadsError';
  }
}

export class TeleinfoBufferOverflowError extends TeleinfoError {
  constructor(size: number, max: number) {
    super(`Buffer overflow: ${size} bytes accumulated without a complete frame (max ${max})`);
    this.name = 'TeleinfoBufferOverflowError';
  }
}

export class TeleinfoConfigError extends TeleinfoError {
  constructor(message: string) {
    super(message);
    this.name = 'TeleinfoConfigError';
  }
}

// --- Node.js transport errors ---

export class NodeSerialConnectionError extends TeleinfoIoError {
  constructor(message: string = 'Serial connection error', options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'NodeSerialConnectionError';
  }
}

export class NodeSerialReadError extends TeleinfoIoError {
  constructor(message: string = 'Serial read error', options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'NodeSerialReadError';
  }
}

export class NodeTcpConnectionError extends TeleinfoIoError {
  constructor(message: string = 'TCP connection error', options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'NodeTcpConnectionError';
  }
}
