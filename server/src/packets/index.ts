export { decodePacket } from "./dispatch.js";
export { DecodedPacket } from "./decoded.js";
export { decodeHeader, headerToTree, type PacketHeader } from "./header.js";
export {
  type AnyDecodedPacket,
  type AnyPacketDefinition,
  findDefinition,
  packetDefinitions,
} from "./registry.js";
