import {
  EVENT_DESCRIPTIONS,
  driverName,
  infringementTypeName,
  penaltyTypeName,
  teamName,
  trackName,
} from "@pitlog/shared/lookups";
import type { PacketDocument } from "@pitlog/shared/types";
import type { AnyDecodedPacket } from "./packets/index.js";
import type { PacketSink } from "./pipeline.js";

interface Participant {
  name: string;
  driverId: number;
  teamId: number;
}

/** Human-readable console lines for race events: fastest laps, penalties, retirements. */
export function createRaceLog(log: (line: string) => void = console.log): PacketSink {
  let sessionUID: bigint | null = null;
  let participants: readonly Participant[] = [];
  let sessionAnnounced = false;

  function carLabel(vehicleIdx: number): string {
    const car = participants[vehicleIdx];
    if (!car) return `car ${vehicleIdx}`;
    const name = car.name || driverName(car.driverId) || `driver ${car.driverId}`;
    const team = teamName(car.teamId);
    return team ? `${name} (${team})` : name;
  }

  function onEvent(packet: Extract<AnyDecodedPacket, { kind: "event" }>): void {
    const { eventStringCode, eventDetails } = packet.body;
    const title = EVENT_DESCRIPTIONS[eventStringCode] ?? eventStringCode;
    if (!eventDetails) {
      log(`[Race] ${title}`);
      return;
    }

    switch (eventDetails.variant) {
      case "fastestLap":
        log(`[Race] ${title}: ${carLabel(eventDetails.details.vehicleIdx)} ${eventDetails.details.lapTime.toFixed(3)}s`);
        break;
      case "penalty": {
        const { penaltyType, infringementType, vehicleIdx, lapNum } = eventDetails.details;
        const penaltyLabel = penaltyTypeName(penaltyType) ?? `penalty ${penaltyType}`;
        const infringementLabel = infringementTypeName(infringementType) ?? `infringement ${infringementType}`;
        log(`[Race] ${title}: ${carLabel(vehicleIdx)} ${penaltyLabel} for ${infringementLabel} (lap ${lapNum})`);
        break;
      }
      case "speedTrap":
        log(`[Race] ${title}: ${carLabel(eventDetails.details.vehicleIdx)} ${eventDetails.details.speed.toFixed(1)} km/h`);
        break;
      default:
        log(`[Race] ${title}: ${carLabel(eventDetails.details.vehicleIdx)}`);
    }
  }

  function write(packet: AnyDecodedPacket, _document: PacketDocument): void {
    if (packet.header.sessionUID !== sessionUID) {
      sessionUID = packet.header.sessionUID;
      participants = [];
      sessionAnnounced = false;
    }

    switch (packet.kind) {
      case "participants":
        participants = packet.body.participants.slice(0, packet.body.numActiveCars);
        break;
      case "session":
        if (!sessionAnnounced) {
          sessionAnnounced = true;
          const track = trackName(packet.body.trackId) ?? `track ${packet.body.trackId}`;
          log(`[Race] Session ${sessionUID} at ${track}, ${packet.body.totalLaps} laps`);
        }
        break;
      case "event":
        onEvent(packet);
        break;
    }
  }

  return { write, close: () => {} };
}
