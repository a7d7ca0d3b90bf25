/** Base class for everything that makes a single datagram undecodable. */
export class TelemetryDecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class TruncatedBufferError extends TelemetryDecodeError {
  constructor(
    readonly offset: number,
    readonly width: number,
    readonly length: number,
  ) {
    super(`Buffer truncated: need ${width} bytes at offset ${offset}, buffer has ${length}`);
  }
}

export class MalformedHeaderError extends TelemetryDecodeError {
  constructor(readonly packetFormat: number) {
    super(`Unsupported packet format ${packetFormat}`);
  }
}

export interface VariantKey {
  packetFormat: number;
  packetId: number;
  packetVersion: number;
}

/** A well-formed header whose (format, id, version) has no registered decoder. */
export class UnsupportedVariantError extends TelemetryDecodeError {
  constructor(readonly variant: VariantKey) {
    super(
      `No decoder for packet format ${variant.packetFormat}, id ${variant.packetId}, version ${variant.packetVersion}`,
    );
  }
}

export class UnknownEventCodeError extends TelemetryDecodeError {
  constructor(readonly code: string) {
    super(`Unknown event code ${JSON.stringify(code)}`);
  }
}
