// src/s6/rideMigrator.ts
import {
  CUSTOMER_HISTORY_SIZE,
  DOWNTIME_HISTORY_SIZE,
  MAX_CARS_PER_TRAIN,
  MAX_STATIONS,
  MAX_VEHICLES_PER_RIDE,
  NUM_COLOUR_SCHEMES,
  RIDE_TYPE_NULL,
  isXY8Undefined,
  type RawRideRecord,
  type XY8,
} from "./rawRide.js";
import { PEEP_SPAWN_UNDEFINED, type RawPeepSpawnRecord, type RawSpriteRecord } from "./rawRecords.js";
import {
  PEEP_STATE_ENTERING_RIDE,
  PEEP_STATE_ON_RIDE,
  SPRITE_IDENTIFIER_PEEP,
  type PeepSpawn,
  type Ride,
  type RideStation,
  type Sprite,
  type TileCoordsXY,
  type TileCoordsXYZD,
  type TrackColour,
  type VehicleColour,
} from "../world/types.js";

export const PEEP_SPAWN_HEIGHT_SCALE = 16;

function at(values: ReadonlyArray<number>, i: number): number {
  return values[i] ?? 0;
}

function tileOrNull(v: XY8 | undefined): TileCoordsXY | null {
  if (v === undefined || isXY8Undefined(v)) return null;
  return { x: v.x, y: v.y };
}

function stationLocation(v: XY8 | undefined, height: number): TileCoordsXYZD | null {
  const xy = tileOrNull(v);
  return xy === null ? null : { x: xy.x, y: xy.y, z: height, direction: 0 };
}

function migrateStation(src: RawRideRecord, i: number): RideStation {
  const height = at(src.stationHeights, i);
  return {
    start: tileOrNull(src.stationStarts[i]),
    height,
    length: at(src.stationLength, i),
    depart: at(src.stationDepart, i),
    trainAtStation: at(src.trainAtStation, i),
    // direction is fixed up from the map after import
    entrance: stationLocation(src.entrances[i], height),
    exit: stationLocation(src.exits[i], height),
    lastPeepInQueue: at(src.lastPeepInQueue, i),
    segmentLength: at(src.length, i),
    segmentTime: at(src.time, i),
    queueTime: at(src.queueTime, i),
    queueLength: at(src.queueLength, i),
  };
}

export function isRideSlotUsed(src: RawRideRecord): boolean {
  return src.type !== RIDE_TYPE_NULL;
}

export function migrateRide(src: RawRideRecord, index: number): Ride {
  const stations: RideStation[] = [];
  for (let i = 0; i < MAX_STATIONS; i++) stations.push(migrateStation(src, i));

  const vehicleColours: VehicleColour[] = [];
  for (let i = 0; i < MAX_CARS_PER_TRAIN; i++) {
    vehicleColours.push({
      body: at(src.vehicleBodyColours, i),
      trim: at(src.vehicleTrimColours, i),
      ternary: at(src.vehicleColoursExtended, i),
    });
  }

  const trackColours: TrackColour[] = [];
  for (let i = 0; i < NUM_COLOUR_SCHEMES; i++) {
    trackColours.push({
      main: at(src.trackColourMain, i),
      additional: at(src.trackColourAdditional, i),
      supports: at(src.trackColourSupports, i),
    });
  }

  return {
    id: index,
    type: src.type,
    subtype: src.subtype,
    mode: src.mode,
    colourSchemeType: src.colourSchemeType,
    vehicleColours,
    status: src.status,
    name: src.name,
    nameArguments: src.nameArguments,
    overallView: tileOrNull(src.overallView),
    stations,
    vehicles: src.vehicles.slice(0, MAX_VEHICLES_PER_RIDE),
    departFlags: src.departFlags,
    numStations: src.numStations,
    numVehicles: src.numVehicles,
    numCarsPerTrain: src.numCarsPerTrain,
    proposedNumVehicles: src.proposedNumVehicles,
    proposedNumCarsPerTrain: src.proposedNumCarsPerTrain,
    maxTrains: src.maxTrains,
    minMaxCarsPerTrain: src.minMaxCarsPerTrain,
    minWaitingTime: src.minWaitingTime,
    maxWaitingTime: src.maxWaitingTime,
    operationOption: src.operationOption,
    boatHireReturnDirection: src.boatHireReturnDirection,
    boatHireReturnPosition: tileOrNull(src.boatHireReturnPosition),
    measurementIndex: src.measurementIndex,
    specialTrackElements: src.specialTrackElements,
    maxSpeed: src.maxSpeed,
    averageSpeed: src.averageSpeed,
    currentTestSegment: src.currentTestSegment,
    averageSpeedTestTimeout: src.averageSpeedTestTimeout,
    maxPositiveVerticalG: src.maxPositiveVerticalG,
    maxNegativeVerticalG: src.maxNegativeVerticalG,
    maxLateralG: src.maxLateralG,
    previousVerticalG: src.previousVerticalG,
    previousLateralG: src.previousLateralG,
    testingFlags: src.testingFlags,
    curTestTrackLocation: tileOrNull(src.curTestTrackLocation),
    turnCountDefault: src.turnCountDefault,
    turnCountBanked: src.turnCountBanked,
    turnCountSloped: src.turnCountSloped,
    inversions: src.inversions,
    drops: src.drops,
    startDropHeight: src.startDropHeight,
    highestDropHeight: src.highestDropHeight,
    shelteredLength: src.shelteredLength,
    var11C: src.var11C,
    numShelteredSections: src.numShelteredSections,
    curTestTrackZ: src.curTestTrackZ,
    curNumCustomers: src.curNumCustomers,
    numCustomersTimeout: src.numCustomersTimeout,
    numCustomers: src.numCustomers.slice(0, CUSTOMER_HISTORY_SIZE),
    price: src.price,
    chairliftBullwheelLocation: src.chairliftBullwheelLocation.map(tileOrNull),
    chairliftBullwheelZ: src.chairliftBullwheelZ.slice(),
    ratings: { ...src.ratings },
    value: src.value,
    chairliftBullwheelRotation: src.chairliftBullwheelRotation,
    satisfaction: src.satisfaction,
    satisfactionTimeOut: src.satisfactionTimeOut,
    satisfactionNext: src.satisfactionNext,
    windowInvalidateFlags: src.windowInvalidateFlags,
    totalCustomers: src.totalCustomers,
    totalProfit: src.totalProfit,
    popularity: src.popularity,
    popularityTimeOut: src.popularityTimeOut,
    popularityNext: src.popularityNext,
    numRiders: src.numRiders,
    musicTuneId: src.musicTuneId,
    slideInUse: src.slideInUse,
    slidePeep: src.slidePeep,
    slidePeepTShirtColour: src.slidePeepTShirtColour,
    spiralSlideProgress: src.spiralSlideProgress,
    buildDate: src.buildDate,
    upkeepCost: src.upkeepCost,
    raceWinner: src.raceWinner,
    musicPosition: src.musicPosition,
    breakdownReasonPending: src.breakdownReasonPending,
    mechanicStatus: src.mechanicStatus,
    mechanic: src.mechanic,
    inspectionStation: src.inspectionStation,
    brokenVehicle: src.brokenVehicle,
    brokenCar: src.brokenCar,
    breakdownReason: src.breakdownReason,
    priceSecondary: src.priceSecondary,
    reliability: src.reliability,
    unreliabilityFactor: src.unreliabilityFactor,
    downtime: src.downtime,
    inspectionInterval: src.inspectionInterval,
    lastInspection: src.lastInspection,
    downtimeHistory: src.downtimeHistory.slice(0, DOWNTIME_HISTORY_SIZE),
    noPrimaryItemsSold: src.noPrimaryItemsSold,
    noSecondaryItemsSold: src.noSecondaryItemsSold,
    breakdownSoundModifier: src.breakdownSoundModifier,
    notFixedTimeout: src.notFixedTimeout,
    lastCrashType: src.lastCrashType,
    connectedMessageThrottle: src.connectedMessageThrottle,
    incomePerHour: src.incomePerHour,
    profit: src.profit,
    trackColours,
    music: src.music,
    entranceStyle: src.entranceStyle,
    vehicleChangeTimeout: src.vehicleChangeTimeout,
    numBlockBrakes: src.numBlockBrakes,
    liftHillSpeed: src.liftHillSpeed,
    guestsFavourite: src.guestsFavourite,
    lifecycleFlags: src.lifecycleFlags,
    totalAirTime: src.totalAirTime,
    currentTestStation: src.currentTestStation,
    numCircuits: src.numCircuits,
    cableLiftX: src.cableLiftX,
    cableLiftY: src.cableLiftY,
    cableLiftZ: src.cableLiftZ,
    cableLift: src.cableLift,
  };
}

export function migrateSprite(src: RawSpriteRecord): Sprite {
  return {
    identifier: src.identifier,
    type: src.type,
    nextInQuadrant: src.nextInQuadrant,
    next: src.next,
    previous: src.previous,
    linkedListTypeOffset: src.linkedListTypeOffset,
    spriteIndex: src.spriteIndex,
    flags: src.flags,
    x: src.x,
    y: src.y,
    z: src.z,
    peepState: src.peepState,
    peepCurrentRide: src.peepCurrentRide,
    bytes: Uint8Array.from(src.bytes),
  };
}

/** Undefined slots (x = 0xFFFF) are dropped; height goes from coarse units to world units. */
export function migratePeepSpawns(spawns: ReadonlyArray<RawPeepSpawnRecord>): PeepSpawn[] {
  const out: PeepSpawn[] = [];
  spawns.forEach((s, slot) => {
    if (s.x === PEEP_SPAWN_UNDEFINED) return;
    out.push({ x: s.x, y: s.y, z: s.z * PEEP_SPAWN_HEIGHT_SCALE, direction: s.direction, slot });
  });
  return out;
}

export function isRiding(sprite: Sprite, rideIndex: number): boolean {
  return (
    sprite.identifier === SPRITE_IDENTIFIER_PEEP &&
    sprite.peepCurrentRide === rideIndex &&
    (sprite.peepState === PEEP_STATE_ON_RIDE || sprite.peepState === PEEP_STATE_ENTERING_RIDE)
  );
}

export function countRiders(sprites: ReadonlyArray<Sprite>, rideIndex: number): number {
  let n = 0;
  for (const s of sprites) if (isRiding(s, rideIndex)) n++;
  return n;
}
