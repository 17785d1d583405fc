/**
 * Custom exception classes for the SFILES codec
 */

export class SFILESError extends Error {
  public cause?: Error;

  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'SFILESError';
    this.cause = cause;
    Object.setPrototypeOf(this, SFILESError.prototype);
  }
}

export class MalformedSyntaxError extends SFILESError {
  public sfiles: string;
  public reason: string;
  public offset: number;

  constructor(sfiles: string, reason: string = "N/A", offset: number = -1) {
    const pointer = offset >= 0 ? ' '.repeat(offset) + '^' : '';
    const message = `SFILES: ${sfiles}${pointer ? '\n        ' + pointer : ''}\nOffset: ${offset}\nReason: ${reason}`;

    super(message);
    this.name = 'MalformedSyntaxError';
    this.sfiles = sfiles;
    this.reason = reason;
    this.offset = offset;
    Object.setPrototypeOf(this, MalformedSyntaxError.prototype);
  }
}

export class MalformedTopologyError extends SFILESError {
  public reason: string;
  public offset: number;

  constructor(reason: string, offset: number = -1) {
    super(offset >= 0 ? `${reason} (at offset ${offset})` : reason);
    this.name = 'MalformedTopologyError';
    this.reason = reason;
    this.offset = offset;
    Object.setPrototypeOf(this, MalformedTopologyError.prototype);
  }
}

export class AmbiguousHeatIntegrationError extends SFILESError {
  public group: number | null;

  constructor(message: string, group: number | null = null) {
    super(message);
    this.name = 'AmbiguousHeatIntegrationError';
    this.group = group;
    Object.setPrototypeOf(this, AmbiguousHeatIntegrationError.prototype);
  }
}

export class UnencodableGraphError extends SFILESError {
  constructor(message: string, cause?: Error) {
    super(message, cause);
    this.name = 'UnencodableGraphError';
    Object.setPrototypeOf(this, UnencodableGraphError.prototype);
  }
}
