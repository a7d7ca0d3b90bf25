import type { TreeMap } from "@pitlog/shared/types";
import { UnknownEventCodeError } from "../codec/errors.js";
import { type StructType, text } from "../codec/layout.js";
import { type Read, readFixedBytes } from "../codec/primitives.js";

export interface EventBody<D> {
  eventStringCode: string;
  /** null for events that carry no details (session start, DRS enabled, ...) */
  eventDetails: D | null;
}

interface EventBodyOptions<D> {
  /** Size of the details union: the largest variant. */
  detailsSize: number;
  /** Reads the variant selected by `code`; undefined for codes this format does not define. */
  readDetails(code: string, buf: Buffer, offset: number): Read<D | null> | undefined;
  detailsToTree(details: D): TreeMap;
}

const eventStringCode = text(4);

/**
 * Event packets carry a 4-character code followed by a fixed-size union.
 * The code picks the variant; whatever the variant leaves of the union is
 * consumed as padding.
 */
export function eventBody<D>(options: EventBodyOptions<D>): StructType<EventBody<D>> {
  const { detailsSize, readDetails, detailsToTree } = options;

  return {
    size: eventStringCode.size + detailsSize,
    fieldNames: ["eventStringCode", "eventDetails"],
    read(buf, offset) {
      const [code, detailsStart] = eventStringCode.read(buf, offset);
      const detailsEnd = detailsStart + detailsSize;

      const decoded = readDetails(code, buf, detailsStart);
      if (!decoded) throw new UnknownEventCodeError(code);

      const [eventDetails, variantEnd] = decoded;
      const [, next] = readFixedBytes(buf, variantEnd, detailsEnd - variantEnd);
      return [{ eventStringCode: code, eventDetails }, next];
    },
    toTree(body) {
      const node: TreeMap = { eventStringCode: body.eventStringCode };
      if (body.eventDetails !== null) node.eventDetails = detailsToTree(body.eventDetails);
      return node;
    },
  };
}
