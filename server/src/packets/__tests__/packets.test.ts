import { decodeButtons } from "@pitlog/shared/lookups";
import type { TreeNode } from "@pitlog/shared/types";
import { describe, expect, it } from "vitest";
import { makePacket } from "../../__tests__/fixtures.js";
import { packetToTree } from "../../codec/tree.js";
import { decodePacket } from "../dispatch.js";

const first = (node: TreeNode | undefined): TreeNode | undefined => (Array.isArray(node) ? node[0] : undefined);

describe("2020 car telemetry", () => {
  const buf = makePacket({ packetFormat: 2020, packetId: 6 }, 1283);
  const car1 = 24 + 58;
  buf.writeUInt16LE(287, car1);
  buf.writeFloatLE(1, car1 + 2);
  buf.writeInt8(-1, car1 + 15);
  buf.set([90, 91, 92, 93], car1 + 28);
  buf.writeUInt32LE(0x0401, 1300);
  buf.writeUInt8(255, 1304);
  buf.writeInt8(7, 1306);

  it("reads per-car records at their offsets", () => {
    const packet = decodePacket(buf);
    if (packet.kind !== "carTelemetry" || packet.format !== 2020) throw new Error("wrong packet");
    const car = packet.body.carTelemetryData[1];
    expect(car?.speed).toBe(287);
    expect(car?.throttle).toBe(1);
    expect(car?.gear).toBe(-1);
    expect(car?.tyresSurfaceTemperature).toEqual([90, 91, 92, 93]);
  });

  it("reads the trailing player fields", () => {
    const packet = decodePacket(buf);
    if (packet.kind !== "carTelemetry" || packet.format !== 2020) throw new Error("wrong packet");
    expect(packet.body.mfdPanelIndex).toBe(255);
    expect(packet.body.suggestedGear).toBe(7);
    expect(decodeButtons(packet.body.buttonStatus)).toEqual(["cross", "r1"]);
  });
});

describe("2020 session", () => {
  it("reads signed ids and the weather forecast", () => {
    const buf = makePacket({ packetFormat: 2020, packetId: 1 }, 227);
    buf.writeInt8(-1, 24 + 7);
    buf.writeUInt8(2, 24 + 126);
    buf.set([10, 15, 3, 28], 24 + 127 + 5);
    buf.writeInt8(-2, 24 + 127 + 9);

    const packet = decodePacket(buf);
    expect(packetToTree(packet)).toMatchObject({ trackId: -1, numWeatherForecastSamples: 2 });
    if (packet.kind !== "session" || packet.format !== 2020) throw new Error("wrong packet");
    expect(packet.body.weatherForecastSamples).toHaveLength(20);
    expect(packet.body.weatherForecastSamples[1]).toEqual({
      sessionType: 10,
      timeOffset: 15,
      weather: 3,
      trackTemperature: 28,
      airTemperature: -2,
    });
  });
});

describe("2020 final classification", () => {
  it("keeps 64-bit race times at full precision", () => {
    const buf = makePacket({ packetFormat: 2020, packetId: 8 }, 815);
    buf.writeUInt8(20, 24);
    buf.writeUInt8(1, 25);
    buf.writeFloatLE(81.234, 25 + 6);
    buf.writeDoubleLE(5423.123456789, 25 + 10);

    const tree = packetToTree(decodePacket(buf));
    expect(tree.numCars).toBe(20);
    expect(first(tree.classificationData)).toMatchObject({
      position: 1,
      bestLapTime: 81.234,
      totalRaceTime: 5423.123456789,
    });
  });
});

describe("car status naming", () => {
  it("uses tyreVisualCompound in 2019 and visualTyreCompound in 2020", () => {
    const tree2019 = packetToTree(decodePacket(makePacket({ packetFormat: 2019, packetId: 7 }, 1120)));
    const tree2020 = packetToTree(decodePacket(makePacket({ packetFormat: 2020, packetId: 7 }, 1320)));
    expect(first(tree2019.carStatusData)).toMatchObject({ tyreVisualCompound: 0 });
    expect(first(tree2020.carStatusData)).toMatchObject({ visualTyreCompound: 0, tyresAgeLaps: 0 });
  });
});

describe("2019 participants", () => {
  it("reads twenty entries with NUL-terminated names", () => {
    const buf = makePacket({ packetFormat: 2019, packetId: 4 }, 1081);
    buf.writeUInt8(2, 23);
    const second = 24 + 54;
    buf.set([0, 9, 1, 5, 10], second);
    buf.write("VERSTAPPEN", second + 5, "utf8");

    const packet = decodePacket(buf);
    if (packet.kind !== "participants") throw new Error("wrong packet");
    expect(packet.body.participants).toHaveLength(20);
    expect(packet.body.participants[1]).toEqual({
      aiControlled: 0,
      driverId: 9,
      teamId: 1,
      raceNumber: 5,
      nationality: 10,
      name: "VERSTAPPEN",
      yourTelemetry: 0,
    });
  });
});
