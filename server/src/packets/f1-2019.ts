import { CAR_COUNT } from "@pitlog/shared/constants";
import { array, f32, i16, i8, type Infer, struct, text, u16, u32, u8 } from "../codec/layout.js";
import { eventBody } from "./events.js";

// F1 2019 packet layouts (packetFormat 2019, packetVersion 1).
// Every layout starts right after the 23-byte header.

const CARS = CAR_COUNT[2019];

// ── Motion (id 0, 1343 bytes) ───────────────────────────────────

export const carMotionData = struct({
  worldPositionX: f32,
  worldPositionY: f32,
  worldPositionZ: f32,
  worldVelocityX: f32,
  worldVelocityY: f32,
  worldVelocityZ: f32,
  worldForwardDirX: i16, // normalised, divide by 32767.0
  worldForwardDirY: i16,
  worldForwardDirZ: i16,
  worldRightDirX: i16,
  worldRightDirY: i16,
  worldRightDirZ: i16,
  gForceLateral: f32,
  gForceLongitudinal: f32,
  gForceVertical: f32,
  yaw: f32, // radians
  pitch: f32,
  roll: f32,
});

/** Player-car-only block that ends every motion packet. Wheel order is RL, RR, FL, FR. */
export const playerMotionFields = {
  suspensionPosition: array(f32, 4),
  suspensionVelocity: array(f32, 4),
  suspensionAcceleration: array(f32, 4),
  wheelSpeed: array(f32, 4),
  wheelSlip: array(f32, 4),
  localVelocityX: f32,
  localVelocityY: f32,
  localVelocityZ: f32,
  angularVelocityX: f32,
  angularVelocityY: f32,
  angularVelocityZ: f32,
  angularAccelerationX: f32,
  angularAccelerationY: f32,
  angularAccelerationZ: f32,
  frontWheelsAngle: f32, // radians
};

export const motion = struct({
  carMotionData: array(carMotionData, CARS),
  ...playerMotionFields,
});

// ── Session (id 1, 149 bytes) ───────────────────────────────────

export const marshalZone = struct({
  zoneStart: f32, // fraction (0..1) of the lap
  zoneFlag: i8, // -1 unknown, 0 none, 1 green, 2 blue, 3 yellow, 4 red
});

export const session = struct({
  weather: u8,
  trackTemperature: i8,
  airTemperature: i8,
  totalLaps: u8,
  trackLength: u16,
  sessionType: u8,
  trackId: i8,
  formula: u8,
  sessionTimeLeft: u16,
  sessionDuration: u16,
  pitSpeedLimit: u8,
  gamePaused: u8,
  isSpectating: u8,
  spectatorCarIndex: u8,
  sliProNativeSupport: u8,
  numMarshalZones: u8,
  marshalZones: array(marshalZone, 21),
  safetyCarStatus: u8,
  networkGame: u8,
});

// ── Lap data (id 2, 843 bytes) ──────────────────────────────────

export const lapData = struct({
  lastLapTime: f32,
  currentLapTime: f32,
  bestLapTime: f32,
  sector1Time: f32,
  sector2Time: f32,
  lapDistance: f32,
  totalDistance: f32,
  safetyCarDelta: f32,
  carPosition: u8,
  currentLapNum: u8,
  pitStatus: u8,
  sector: u8,
  currentLapInvalid: u8,
  penalties: u8,
  gridPosition: u8,
  driverStatus: u8,
  resultStatus: u8,
});

export const laps = struct({
  lapData: array(lapData, CARS),
});

// ── Event (id 3, 32 bytes) ──────────────────────────────────────

const vehicleOnly = struct({ vehicleIdx: u8 });

export const fastestLap = struct({
  vehicleIdx: u8,
  lapTime: f32,
});

export type EventDetails =
  | { variant: "fastestLap"; details: Infer<typeof fastestLap> }
  | { variant: "retirement"; details: Infer<typeof vehicleOnly> }
  | { variant: "teamMateInPits"; details: Infer<typeof vehicleOnly> }
  | { variant: "raceWinner"; details: Infer<typeof vehicleOnly> };

export const event = eventBody<EventDetails>({
  detailsSize: 5,
  readDetails(code, buf, offset) {
    switch (code) {
      case "SSTA":
      case "SEND":
      case "DRSE":
      case "DRSD":
      case "CHQF":
        return [null, offset];
      case "FTLP": {
        const [details, next] = fastestLap.read(buf, offset);
        return [{ variant: "fastestLap", details }, next];
      }
      case "RTMT": {
        const [details, next] = vehicleOnly.read(buf, offset);
        return [{ variant: "retirement", details }, next];
      }
      case "TMPT": {
        const [details, next] = vehicleOnly.read(buf, offset);
        return [{ variant: "teamMateInPits", details }, next];
      }
      case "RCWN": {
        const [details, next] = vehicleOnly.read(buf, offset);
        return [{ variant: "raceWinner", details }, next];
      }
      default:
        return undefined;
    }
  },
  detailsToTree(event) {
    return event.variant === "fastestLap"
      ? fastestLap.toTree(event.details)
      : vehicleOnly.toTree(event.details);
  },
});

// ── Participants (id 4, 1104 bytes) ─────────────────────────────

export const participantData = struct({
  aiControlled: u8, // 1 = AI, 0 = human
  driverId: u8,
  teamId: u8,
  raceNumber: u8,
  nationality: u8,
  name: text(48), // UTF-8, NUL terminated
  yourTelemetry: u8, // 0 = restricted, 1 = public
});

export const participants = struct({
  numActiveCars: u8,
  participants: array(participantData, CARS),
});

// ── Car setups (id 5, 843 bytes) ────────────────────────────────

export const carSetupData = struct({
  frontWing: u8,
  rearWing: u8,
  onThrottle: u8,
  offThrottle: u8,
  frontCamber: f32,
  rearCamber: f32,
  frontToe: f32,
  rearToe: f32,
  frontSuspension: u8,
  rearSuspension: u8,
  frontAntiRollBar: u8,
  rearAntiRollBar: u8,
  frontSuspensionHeight: u8,
  rearSuspensionHeight: u8,
  brakePressure: u8,
  brakeBias: u8,
  frontTyrePressure: f32,
  rearTyrePressure: f32,
  ballast: u8,
  fuelLoad: f32,
});

export const carSetups = struct({
  carSetups: array(carSetupData, CARS),
});

// ── Car telemetry (id 6, 1347 bytes) ────────────────────────────

export const carTelemetryData = struct({
  speed: u16, // km/h
  throttle: f32, // 0.0 - 1.0
  steer: f32, // -1.0 (full lock left) - 1.0 (full lock right)
  brake: f32,
  clutch: u8, // 0 - 100
  gear: i8, // 1-8, N = 0, R = -1
  engineRPM: u16,
  drs: u8,
  revLightsPercent: u8,
  brakesTemperature: array(u16, 4),
  tyresSurfaceTemperature: array(u16, 4),
  tyresInnerTemperature: array(u16, 4),
  engineTemperature: u16,
  tyresPressure: array(f32, 4),
  surfaceType: array(u8, 4),
});

export const carTelemetry = struct({
  carTelemetryData: array(carTelemetryData, CARS),
  buttonStatus: u32,
});

// ── Car status (id 7, 1143 bytes) ───────────────────────────────

export const carStatusData = struct({
  tractionControl: u8,
  antiLockBrakes: u8,
  fuelMix: u8,
  frontBrakeBias: u8,
  pitLimiterStatus: u8,
  fuelInTank: f32,
  fuelCapacity: f32,
  fuelRemainingLaps: f32,
  maxRPM: u16,
  idleRPM: u16,
  maxGears: u8,
  drsAllowed: u8,
  tyresWear: array(u8, 4),
  actualTyreCompound: u8,
  tyreVisualCompound: u8,
  tyresDamage: array(u8, 4),
  frontLeftWingDamage: u8,
  frontRightWingDamage: u8,
  rearWingDamage: u8,
  engineDamage: u8,
  gearBoxDamage: u8,
  vehicleFiaFlags: i8,
  ersStoreEnergy: f32, // joules
  ersDeployMode: u8,
  ersHarvestedThisLapMGUK: f32,
  ersHarvestedThisLapMGUH: f32,
  ersDeployedThisLap: f32,
});

export const carStatus = struct({
  carStatusData: array(carStatusData, CARS),
});
