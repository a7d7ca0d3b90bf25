import fs from "node:fs";
import { fileURLToPath } from "node:url";
import type { PacketKind } from "./types.js";

// Appendix tables published with the game's UDP telemetry documentation.
// Ids missing from a table are unknown to that season's game.

type IdTable = ReadonlyMap<number, string>;

interface Appendix {
  teams: IdTable;
  drivers: IdTable;
  tracks: IdTable;
  nationalities: IdTable;
  surfaceTypes: IdTable;
  penaltyTypes: IdTable;
  infringementTypes: IdTable;
}

const APPENDIX_PATH = fileURLToPath(new URL("../data/appendix.json", import.meta.url));

function toTable(raw: unknown, name: string): IdTable {
  if (typeof raw !== "object" || raw === null) {
    throw new Error(`appendix.${name} must be an object`);
  }
  const table = new Map<number, string>();
  for (const [id, label] of Object.entries(raw)) {
    if (typeof label !== "string") throw new Error(`appendix.${name}.${id} must be a string`);
    table.set(Number(id), label);
  }
  return table;
}

function loadAppendix(): Appendix {
  const raw: Record<string, unknown> = JSON.parse(fs.readFileSync(APPENDIX_PATH, "utf-8"));
  return {
    teams: toTable(raw.teams, "teams"),
    drivers: toTable(raw.drivers, "drivers"),
    tracks: toTable(raw.tracks, "tracks"),
    nationalities: toTable(raw.nationalities, "nationalities"),
    surfaceTypes: toTable(raw.surfaceTypes, "surfaceTypes"),
    penaltyTypes: toTable(raw.penaltyTypes, "penaltyTypes"),
    infringementTypes: toTable(raw.infringementTypes, "infringementTypes"),
  };
}

const appendix = loadAppendix();

export const teamName = (id: number): string | null => appendix.teams.get(id) ?? null;
export const driverName = (id: number): string | null => appendix.drivers.get(id) ?? null;
export const trackName = (id: number): string | null => appendix.tracks.get(id) ?? null;
export const nationalityName = (id: number): string | null =>
  appendix.nationalities.get(id) ?? null;
export const surfaceTypeName = (id: number): string | null =>
  appendix.surfaceTypes.get(id) ?? null;
export const penaltyTypeName = (id: number): string | null =>
  appendix.penaltyTypes.get(id) ?? null;
export const infringementTypeName = (id: number): string | null =>
  appendix.infringementTypes.get(id) ?? null;

// ── Packet and event descriptions ───────────────────────────────

export const PACKET_DESCRIPTIONS: Readonly<Record<PacketKind, { name: string; description: string }>> = {
  motion: {
    name: "Motion",
    description: "Contains all motion data for player's car – only sent while player is in control",
  },
  session: { name: "Session", description: "Data about the session – track, time left" },
  lapData: { name: "Lap Data", description: "Data about all the lap times of cars in the session" },
  event: { name: "Event", description: "Various notable events that happen during a session" },
  participants: {
    name: "Participants",
    description: "List of participants in the session, mostly relevant for multiplayer",
  },
  carSetups: { name: "Car Setups", description: "Packet detailing car setups for cars in the race" },
  carTelemetry: { name: "Car Telemetry", description: "Telemetry data for all cars" },
  carStatus: { name: "Car Status", description: "Status data for all cars such as damage" },
  finalClassification: {
    name: "Final Classification",
    description: "Final classification confirmation at the end of a race",
  },
  lobbyInfo: {
    name: "Lobby information",
    description: "Information about players in a multiplayer lobby",
  },
};

export const EVENT_DESCRIPTIONS: Readonly<Record<string, string>> = {
  SSTA: "Session Started",
  SEND: "Session Ended",
  FTLP: "Fastest Lap",
  RTMT: "Retirement",
  DRSE: "DRS enabled",
  DRSD: "DRS disabled",
  TMPT: "Team mate in pits",
  CHQF: "Chequered flag",
  RCWN: "Race Winner",
  PENA: "Penalty issued",
  SPTP: "Speed trap triggered",
};

// ── Controller buttons (carTelemetry.buttonStatus) ──────────────

export const BUTTON_FLAGS = {
  cross: 0x0001,
  triangle: 0x0002,
  circle: 0x0004,
  square: 0x0008,
  dPadLeft: 0x0010,
  dPadRight: 0x0020,
  dPadUp: 0x0040,
  dPadDown: 0x0080,
  options: 0x0100,
  l1: 0x0200,
  r1: 0x0400,
  l2: 0x0800,
  r2: 0x1000,
  leftStickClick: 0x2000,
  rightStickClick: 0x4000,
} as const;

export type ButtonName = keyof typeof BUTTON_FLAGS;

/** Names of the buttons set in a buttonStatus bit mask, in flag order. */
export function decodeButtons(buttonStatus: number): ButtonName[] {
  const pressed: ButtonName[] = [];
  for (const [name, bit] of Object.entries(BUTTON_FLAGS)) {
    if (buttonStatus & bit && isButtonName(name)) pressed.push(name);
  }
  return pressed;
}

function isButtonName(name: string): name is ButtonName {
  return Object.hasOwn(BUTTON_FLAGS, name);
}
