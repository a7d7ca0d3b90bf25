import { describe, expect, it } from "vitest";
import { PACKET_IDS, PACKET_KINDS, isPacketKind } from "../constants.js";
import {
  EVENT_DESCRIPTIONS,
  PACKET_DESCRIPTIONS,
  decodeButtons,
  driverName,
  infringementTypeName,
  nationalityName,
  penaltyTypeName,
  surfaceTypeName,
  teamName,
  trackName,
} from "../lookups.js";

describe("appendix lookups", () => {
  it("resolves known ids", () => {
    expect(teamName(0)).toBe("Mercedes");
    expect(teamName(255)).toBe("My Team");
    expect(driverName(9)).toBe("Max Verstappen");
    expect(trackName(5)).toBe("Monaco");
    expect(nationalityName(1)).toBe("American");
    expect(surfaceTypeName(0)).toBe("Tarmac");
    expect(penaltyTypeName(4)).toBe("Time penalty");
    expect(infringementTypeName(7)).toBe("Corner cutting gained time");
  });

  it("returns null for ids outside a table", () => {
    expect(trackName(-1)).toBeNull();
    expect(nationalityName(0)).toBeNull();
    expect(driverName(250)).toBeNull();
  });
});

describe("descriptions", () => {
  it("describes every packet kind", () => {
    expect(Object.keys(PACKET_DESCRIPTIONS).sort()).toEqual([...PACKET_KINDS].sort());
    expect(PACKET_DESCRIPTIONS.lobbyInfo.name).toBe("Lobby information");
  });

  it("describes event codes", () => {
    expect(EVENT_DESCRIPTIONS.FTLP).toBe("Fastest Lap");
    expect(EVENT_DESCRIPTIONS.SPTP).toBe("Speed trap triggered");
  });
});

describe("decodeButtons", () => {
  it("lists pressed buttons in flag order", () => {
    expect(decodeButtons(0)).toEqual([]);
    expect(decodeButtons(0x4000 | 0x0004 | 0x0001)).toEqual(["cross", "circle", "rightStickClick"]);
  });

  it("ignores bits above the last flag", () => {
    expect(decodeButtons(0x8000 | 0x0200)).toEqual(["l1"]);
  });
});

describe("packet kinds", () => {
  it("maps kinds to wire ids 0-9", () => {
    expect(PACKET_KINDS.map((kind) => PACKET_IDS[kind])).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);
    expect(isPacketKind("lapData")).toBe(true);
    expect(isPacketKind("toString")).toBe(false);
  });
});
