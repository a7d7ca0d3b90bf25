import { TruncatedBufferError } from "../codec/errors.js";
import { decodeHeader } from "./header.js";
import { type AnyDecodedPacket, findDefinition } from "./registry.js";

/**
 * Decodes one datagram. Purely structural: field values are not checked.
 * Trailing bytes past the documented packet size are ignored; every decode
 * error propagates to the caller.
 */
export function decodePacket(buf: Buffer): AnyDecodedPacket {
  const [header, bodyOffset] = decodeHeader(buf);
  const definition = findDefinition(header);

  if (bodyOffset + definition.bodySize > buf.length) {
    throw new TruncatedBufferError(bodyOffset, definition.bodySize, buf.length);
  }

  const [packet] = definition.decode(buf, bodyOffset, header);
  return packet;
}
