import { CAR_COUNT } from "@pitlog/shared/constants";
import { array, f32, f64, i8, type Infer, struct, text, u16, u32, u8 } from "../codec/layout.js";
import { eventBody } from "./events.js";
import { carMotionData, marshalZone, participantData, playerMotionFields } from "./f1-2019.js";

// F1 2020 packet layouts (packetFormat 2020, packetVersion 1).
// Every layout starts right after the 24-byte header. Sub-records whose byte
// layout did not change since 2019 are shared with that format.

const CARS = CAR_COUNT[2020];

// ── Motion (id 0, 1464 bytes) ───────────────────────────────────

export const motion = struct({
  carMotionData: array(carMotionData, CARS),
  ...playerMotionFields,
});

// ── Session (id 1, 251 bytes) ───────────────────────────────────

export const weatherForecastSample = struct({
  sessionType: u8, // 0 unknown, 1-4 practice, 5-9 qualifying, 10-11 race, 12 time trial
  timeOffset: u8, // minutes
  weather: u8, // 0 clear, 1 light cloud, 2 overcast, 3 light rain, 4 heavy rain, 5 storm
  trackTemperature: i8,
  airTemperature: i8,
});

export const session = struct({
  weather: u8,
  trackTemperature: i8,
  airTemperature: i8,
  totalLaps: u8,
  trackLength: u16,
  sessionType: u8,
  trackId: i8, // -1 unknown
  formula: u8, // 0 F1 Modern, 1 F1 Classic, 2 F2, 3 F1 Generic
  sessionTimeLeft: u16,
  sessionDuration: u16,
  pitSpeedLimit: u8,
  gamePaused: u8,
  isSpectating: u8,
  spectatorCarIndex: u8,
  sliProNativeSupport: u8,
  numMarshalZones: u8,
  marshalZones: array(marshalZone, 21),
  safetyCarStatus: u8, // 0 none, 1 full, 2 virtual, 3 formation lap
  networkGame: u8,
  numWeatherForecastSamples: u8,
  weatherForecastSamples: array(weatherForecastSample, 20),
});

// ── Lap data (id 2, 1190 bytes) ─────────────────────────────────

export const lapData = struct({
  lastLapTime: f32, // seconds
  currentLapTime: f32,
  sector1TimeInMS: u16,
  sector2TimeInMS: u16,
  bestLapTime: f32,
  bestLapNum: u8,
  bestLapSector1TimeInMS: u16,
  bestLapSector2TimeInMS: u16,
  bestLapSector3TimeInMS: u16,
  bestOverallSector1TimeInMS: u16,
  bestOverallSector1LapNum: u8,
  bestOverallSector2TimeInMS: u16,
  bestOverallSector2LapNum: u8,
  bestOverallSector3TimeInMS: u16,
  bestOverallSector3LapNum: u8,
  lapDistance: f32, // negative until the line is crossed
  totalDistance: f32,
  safetyCarDelta: f32,
  carPosition: u8,
  currentLapNum: u8,
  pitStatus: u8, // 0 none, 1 pitting, 2 in pit area
  sector: u8,
  currentLapInvalid: u8,
  penalties: u8, // seconds
  gridPosition: u8,
  driverStatus: u8, // 0 garage, 1 flying lap, 2 in lap, 3 out lap, 4 on track
  resultStatus: u8,
});

export const laps = struct({
  lapData: array(lapData, CARS),
});

// ── Event (id 3, 35 bytes) ──────────────────────────────────────

const vehicleOnly = struct({ vehicleIdx: u8 });

export const fastestLap = struct({
  vehicleIdx: u8,
  lapTime: f32, // seconds
});

export const penalty = struct({
  penaltyType: u8,
  infringementType: u8,
  vehicleIdx: u8,
  otherVehicleIdx: u8,
  time: u8,
  lapNum: u8,
  placesGained: u8,
});

export const speedTrap = struct({
  vehicleIdx: u8,
  speed: f32, // km/h
});

export type EventDetails =
  | { variant: "fastestLap"; details: Infer<typeof fastestLap> }
  | { variant: "penalty"; details: Infer<typeof penalty> }
  | { variant: "raceWinner"; details: Infer<typeof vehicleOnly> }
  | { variant: "retirement"; details: Infer<typeof vehicleOnly> }
  | { variant: "speedTrap"; details: Infer<typeof speedTrap> }
  | { variant: "teamMateInPits"; details: Infer<typeof vehicleOnly> };

export const event = eventBody<EventDetails>({
  detailsSize: 7,
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
      case "PENA": {
        const [details, next] = penalty.read(buf, offset);
        return [{ variant: "penalty", details }, next];
      }
      case "RCWN": {
        const [details, next] = vehicleOnly.read(buf, offset);
        return [{ variant: "raceWinner", details }, next];
      }
      case "RTMT": {
        const [details, next] = vehicleOnly.read(buf, offset);
        return [{ variant: "retirement", details }, next];
      }
      case "SPTP": {
        const [details, next] = speedTrap.read(buf, offset);
        return [{ variant: "speedTrap", details }, next];
      }
      case "TMPT": {
        const [details, next] = vehicleOnly.read(buf, offset);
        return [{ variant: "teamMateInPits", details }, next];
      }
      default:
        return undefined;
    }
  },
  detailsToTree(event) {
    switch (event.variant) {
      case "fastestLap":
        return fastestLap.toTree(event.details);
      case "penalty":
        return penalty.toTree(event.details);
      case "speedTrap":
        return speedTrap.toTree(event.details);
      default:
        return vehicleOnly.toTree(event.details);
    }
  },
});

// ── Participants (id 4, 1213 bytes) ─────────────────────────────

export const participants = struct({
  numActiveCars: u8,
  participants: array(participantData, CARS),
});

// ── Car setups (id 5, 1102 bytes) ───────────────────────────────

export const carSetupData = struct({
  frontWing: u8,
  rearWing: u8,
  onThrottle: u8, // differential, percent
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
  rearLeftTyrePressure: f32, // PSI
  rearRightTyrePressure: f32,
  frontLeftTyrePressure: f32,
  frontRightTyrePressure: f32,
  ballast: u8,
  fuelLoad: f32,
});

export const carSetups = struct({
  carSetups: array(carSetupData, CARS),
});

// ── Car telemetry (id 6, 1307 bytes) ────────────────────────────

export const carTelemetryData = struct({
  speed: u16,
  throttle: f32,
  steer: f32,
  brake: f32,
  clutch: u8,
  gear: i8,
  engineRPM: u16,
  drs: u8,
  revLightsPercent: u8,
  brakesTemperature: array(u16, 4),
  tyresSurfaceTemperature: array(u8, 4),
  tyresInnerTemperature: array(u8, 4),
  engineTemperature: u16,
  tyresPressure: array(f32, 4),
  surfaceType: array(u8, 4),
});

export const carTelemetry = struct({
  carTelemetryData: array(carTelemetryData, CARS),
  buttonStatus: u32,
  mfdPanelIndex: u8, // 255 = closed
  mfdPanelIndexSecondaryPlayer: u8,
  suggestedGear: i8, // 0 if none
});

// ── Car status (id 7, 1344 bytes) ───────────────────────────────

export const carStatusData = struct({
  tractionControl: u8,
  antiLockBrakes: u8,
  fuelMix: u8, // 0 lean, 1 standard, 2 rich, 3 max
  frontBrakeBias: u8,
  pitLimiterStatus: u8,
  fuelInTank: f32,
  fuelCapacity: f32,
  fuelRemainingLaps: f32,
  maxRPM: u16,
  idleRPM: u16,
  maxGears: u8,
  drsAllowed: u8,
  drsActivationDistance: u16, // metres, 0 = not available
  tyresWear: array(u8, 4),
  actualTyreCompound: u8,
  visualTyreCompound: u8,
  tyresAgeLaps: u8,
  tyresDamage: array(u8, 4),
  frontLeftWingDamage: u8,
  frontRightWingDamage: u8,
  rearWingDamage: u8,
  drsFault: u8,
  engineDamage: u8,
  gearBoxDamage: u8,
  vehicleFiaFlags: i8,
  ersStoreEnergy: f32,
  ersDeployMode: u8,
  ersHarvestedThisLapMGUK: f32,
  ersHarvestedThisLapMGUH: f32,
  ersDeployedThisLap: f32,
});

export const carStatus = struct({
  carStatusData: array(carStatusData, CARS),
});

// ── Final classification (id 8, 839 bytes) ──────────────────────

export const finalClassificationData = struct({
  position: u8,
  numLaps: u8,
  gridPosition: u8,
  points: u8,
  numPitStops: u8,
  resultStatus: u8,
  bestLapTime: f32,
  totalRaceTime: f64, // seconds, without penalties
  penaltiesTime: u8,
  numPenalties: u8,
  numTyreStints: u8,
  tyreStintsActual: array(u8, 8),
  tyreStintsVisual: array(u8, 8),
});

export const finalClassification = struct({
  numCars: u8,
  classificationData: array(finalClassificationData, CARS),
});

// ── Lobby info (id 9, 1169 bytes) ───────────────────────────────

export const lobbyInfoData = struct({
  aiControlled: u8,
  teamId: u8, // 255 if no team selected yet
  nationality: u8,
  name: text(48),
  readyStatus: u8, // 0 not ready, 1 ready, 2 spectating
});

export const lobbyInfo = struct({
  numPlayers: u8,
  lobbyPlayers: array(lobbyInfoData, CARS),
});
