// src/s6/rawRide.ts
//
// One 0x260-byte ride record. Fields are read in on-disk order; gaps are
// skipped explicitly.

import { BinaryReader } from "./binary.js";
import { RIDE_SIZE } from "./layout.js";

export const RIDE_TYPE_NULL = 0xff;
export const MAX_CARS_PER_TRAIN = 32;
export const MAX_VEHICLES_PER_RIDE = 32;
export const MAX_STATIONS = 4;
export const CUSTOMER_HISTORY_SIZE = 10;
export const DOWNTIME_HISTORY_SIZE = 8;
export const NUM_COLOUR_SCHEMES = 4;

/** Packed x/y byte pair; 0xFFFF as a whole means "undefined". */
export type XY8 = Readonly<{ x: number; y: number }>;

export const XY8_UNDEFINED = 0xffff;

export type RawRideRecord = Readonly<{
  type: number;
  subtype: number;
  mode: number;
  colourSchemeType: number;
  vehicleBodyColours: ReadonlyArray<number>;
  vehicleTrimColours: ReadonlyArray<number>;
  status: number;
  name: number;
  nameArguments: number;
  overallView: XY8;
  stationStarts: ReadonlyArray<XY8>;
  stationHeights: ReadonlyArray<number>;
  stationLength: ReadonlyArray<number>;
  stationDepart: ReadonlyArray<number>;
  trainAtStation: ReadonlyArray<number>;
  entrances: ReadonlyArray<XY8>;
  exits: ReadonlyArray<XY8>;
  lastPeepInQueue: ReadonlyArray<number>;
  vehicles: ReadonlyArray<number>;
  departFlags: number;
  numStations: number;
  numVehicles: number;
  numCarsPerTrain: number;
  proposedNumVehicles: number;
  proposedNumCarsPerTrain: number;
  maxTrains: number;
  minMaxCarsPerTrain: number;
  minWaitingTime: number;
  maxWaitingTime: number;
  operationOption: number;
  boatHireReturnDirection: number;
  boatHireReturnPosition: XY8;
  measurementIndex: number;
  specialTrackElements: number;
  maxSpeed: number;
  averageSpeed: number;
  currentTestSegment: number;
  averageSpeedTestTimeout: number;
  length: ReadonlyArray<number>;
  time: ReadonlyArray<number>;
  maxPositiveVerticalG: number;
  maxNegativeVerticalG: number;
  maxLateralG: number;
  previousVerticalG: number;
  previousLateralG: number;
  testingFlags: number;
  curTestTrackLocation: XY8;
  turnCountDefault: number;
  turnCountBanked: number;
  turnCountSloped: number;
  inversions: number;
  drops: number;
  startDropHeight: number;
  highestDropHeight: number;
  shelteredLength: number;
  var11C: number;
  numShelteredSections: number;
  curTestTrackZ: number;
  curNumCustomers: number;
  numCustomersTimeout: number;
  numCustomers: ReadonlyArray<number>;
  price: number;
  chairliftBullwheelLocation: ReadonlyArray<XY8>;
  chairliftBullwheelZ: ReadonlyArray<number>;
  ratings: Readonly<{ excitement: number; intensity: number; nausea: number }>;
  value: number;
  chairliftBullwheelRotation: number;
  satisfaction: number;
  satisfactionTimeOut: number;
  satisfactionNext: number;
  windowInvalidateFlags: number;
  totalCustomers: number;
  totalProfit: number;
  popularity: number;
  popularityTimeOut: number;
  popularityNext: number;
  numRiders: number;
  musicTuneId: number;
  slideInUse: number;
  slidePeep: number;
  slidePeepTShirtColour: number;
  spiralSlideProgress: number;
  buildDate: number;
  upkeepCost: number;
  raceWinner: number;
  musicPosition: number;
  breakdownReasonPending: number;
  mechanicStatus: number;
  mechanic: number;
  inspectionStation: number;
  brokenVehicle: number;
  brokenCar: number;
  breakdownReason: number;
  priceSecondary: number;
  reliability: number;
  unreliabilityFactor: number;
  downtime: number;
  inspectionInterval: number;
  lastInspection: number;
  downtimeHistory: ReadonlyArray<number>;
  noPrimaryItemsSold: number;
  noSecondaryItemsSold: number;
  breakdownSoundModifier: number;
  notFixedTimeout: number;
  lastCrashType: number;
  connectedMessageThrottle: number;
  incomePerHour: number;
  profit: number;
  queueTime: ReadonlyArray<number>;
  trackColourMain: ReadonlyArray<number>;
  trackColourAdditional: ReadonlyArray<number>;
  trackColourSupports: ReadonlyArray<number>;
  music: number;
  entranceStyle: number;
  vehicleChangeTimeout: number;
  numBlockBrakes: number;
  liftHillSpeed: number;
  guestsFavourite: number;
  lifecycleFlags: number;
  vehicleColoursExtended: ReadonlyArray<number>;
  totalAirTime: number;
  currentTestStation: number;
  numCircuits: number;
  cableLiftX: number;
  cableLiftY: number;
  cableLiftZ: number;
  cableLift: number;
  queueLength: ReadonlyArray<number>;
}>;

function readXY8(r: BinaryReader): XY8 {
  const x = r.readU8();
  const y = r.readU8();
  return { x, y };
}

export function isXY8Undefined(v: XY8): boolean {
  return ((v.y << 8) | v.x) === XY8_UNDEFINED;
}

const u8 = (r: BinaryReader): number => r.readU8();
const u16 = (r: BinaryReader): number => r.readU16LE();
const i32 = (r: BinaryReader): number => r.readI32LE();

export function readRawRide(r: BinaryReader): RawRideRecord {
  const start = r.position;

  const type = r.readU8();
  const subtype = r.readU8();
  r.skip(2);
  const mode = r.readU8();
  const colourSchemeType = r.readU8();

  const vehicleBodyColours: number[] = [];
  const vehicleTrimColours: number[] = [];
  for (let i = 0; i < MAX_CARS_PER_TRAIN; i++) {
    vehicleBodyColours.push(r.readU8());
    vehicleTrimColours.push(r.readU8());
  }
  r.skip(3);
  const status = r.readU8();
  const name = r.readU16LE();
  const nameArguments = r.readU32LE();
  const overallView = readXY8(r);
  const stationStarts = r.readArray(MAX_STATIONS, readXY8);
  const stationHeights = r.readArray(MAX_STATIONS, u8);
  const stationLength = r.readArray(MAX_STATIONS, u8);
  const stationDepart = r.readArray(MAX_STATIONS, u8);
  const trainAtStation = r.readArray(MAX_STATIONS, u8);
  const entrances = r.readArray(MAX_STATIONS, readXY8);
  const exits = r.readArray(MAX_STATIONS, readXY8);
  const lastPeepInQueue = r.readArray(MAX_STATIONS, u16);
  r.skip(4);
  const vehicles = r.readArray(MAX_VEHICLES_PER_RIDE, u16);

  const departFlags = r.readU8();
  const numStations = r.readU8();
  const numVehicles = r.readU8();
  const numCarsPerTrain = r.readU8();
  const proposedNumVehicles = r.readU8();
  const proposedNumCarsPerTrain = r.readU8();
  const maxTrains = r.readU8();
  const minMaxCarsPerTrain = r.readU8();
  const minWaitingTime = r.readU8();
  const maxWaitingTime = r.readU8();
  const operationOption = r.readU8();
  const boatHireReturnDirection = r.readU8();
  const boatHireReturnPosition = readXY8(r);
  const measurementIndex = r.readU8();
  const specialTrackElements = r.readU8();
  r.skip(2);

  const maxSpeed = r.readI32LE();
  const averageSpeed = r.readI32LE();
  const currentTestSegment = r.readU8();
  const averageSpeedTestTimeout = r.readU8();
  r.skip(2);
  const length = r.readArray(MAX_STATIONS, i32);
  const time = r.readArray(MAX_STATIONS, u16);
  const maxPositiveVerticalG = r.readI16LE();
  const maxNegativeVerticalG = r.readI16LE();
  const maxLateralG = r.readI16LE();
  const previousVerticalG = r.readI16LE();
  const previousLateralG = r.readI16LE();
  r.skip(2);
  const testingFlags = r.readU32LE();
  const curTestTrackLocation = readXY8(r);
  const turnCountDefault = r.readU16LE();
  const turnCountBanked = r.readU16LE();
  const turnCountSloped = r.readU16LE();
  const inversions = r.readU8();
  const drops = r.readU8();
  const startDropHeight = r.readU8();
  const highestDropHeight = r.readU8();
  const shelteredLength = r.readI32LE();
  const var11C = r.readU16LE();
  const numShelteredSections = r.readU8();
  const curTestTrackZ = r.readU8();

  const curNumCustomers = r.readU16LE();
  const numCustomersTimeout = r.readU16LE();
  const numCustomers = r.readArray(CUSTOMER_HISTORY_SIZE, u16);
  const price = r.readI16LE();
  const chairliftBullwheelLocation = r.readArray(2, readXY8);
  const chairliftBullwheelZ = r.readArray(2, u8);
  const ratings = {
    excitement: r.readI16LE(),
    intensity: r.readI16LE(),
    nausea: r.readI16LE(),
  };
  const value = r.readU16LE();
  const chairliftBullwheelRotation = r.readU16LE();
  const satisfaction = r.readU8();
  const satisfactionTimeOut = r.readU8();
  const satisfactionNext = r.readU8();
  const windowInvalidateFlags = r.readU8();
  r.skip(2);
  const totalCustomers = r.readU32LE();
  const totalProfit = r.readI32LE();
  const popularity = r.readU8();
  const popularityTimeOut = r.readU8();
  const popularityNext = r.readU8();
  const numRiders = r.readU8();
  const musicTuneId = r.readU8();
  const slideInUse = r.readU8();
  const slidePeep = r.readU16LE();
  r.skip(0xe);
  const slidePeepTShirtColour = r.readU8();
  r.skip(0x7);
  const spiralSlideProgress = r.readU8();
  r.skip(0x9);
  const buildDate = r.readI16LE();
  const upkeepCost = r.readI16LE();
  const raceWinner = r.readU16LE();
  r.skip(2);
  const musicPosition = r.readU32LE();

  const breakdownReasonPending = r.readU8();
  const mechanicStatus = r.readU8();
  const mechanic = r.readU16LE();
  const inspectionStation = r.readU8();
  const brokenVehicle = r.readU8();
  const brokenCar = r.readU8();
  const breakdownReason = r.readU8();
  const priceSecondary = r.readI16LE();
  const reliability = r.readU16LE();
  const unreliabilityFactor = r.readU8();
  const downtime = r.readU8();
  const inspectionInterval = r.readU8();
  const lastInspection = r.readU8();
  const downtimeHistory = r.readArray(DOWNTIME_HISTORY_SIZE, u8);
  const noPrimaryItemsSold = r.readU32LE();
  const noSecondaryItemsSold = r.readU32LE();
  const breakdownSoundModifier = r.readU8();
  const notFixedTimeout = r.readU8();
  const lastCrashType = r.readU8();
  const connectedMessageThrottle = r.readU8();
  const incomePerHour = r.readI32LE();
  const profit = r.readI32LE();
  const queueTime = r.readArray(MAX_STATIONS, u8);
  const trackColourMain = r.readArray(NUM_COLOUR_SCHEMES, u8);
  const trackColourAdditional = r.readArray(NUM_COLOUR_SCHEMES, u8);
  const trackColourSupports = r.readArray(NUM_COLOUR_SCHEMES, u8);
  const music = r.readU8();
  const entranceStyle = r.readU8();
  const vehicleChangeTimeout = r.readU16LE();
  const numBlockBrakes = r.readU8();
  const liftHillSpeed = r.readU8();
  const guestsFavourite = r.readU16LE();
  const lifecycleFlags = r.readU32LE();
  const vehicleColoursExtended = r.readArray(MAX_CARS_PER_TRAIN, u8);
  const totalAirTime = r.readU16LE();
  const currentTestStation = r.readU8();
  const numCircuits = r.readU8();
  const cableLiftX = r.readI16LE();
  const cableLiftY = r.readI16LE();
  const cableLiftZ = r.readU8();
  r.skip(1);
  const cableLift = r.readU16LE();
  const queueLength = r.readArray(MAX_STATIONS, u16);

  // 0x58 bytes of trailing padding
  r.skip(RIDE_SIZE - (r.position - start));

  return {
    type,
    subtype,
    mode,
    colourSchemeType,
    vehicleBodyColours,
    vehicleTrimColours,
    status,
    name,
    nameArguments,
    overallView,
    stationStarts,
    stationHeights,
    stationLength,
    stationDepart,
    trainAtStation,
    entrances,
    exits,
    lastPeepInQueue,
    vehicles,
    departFlags,
    numStations,
    numVehicles,
    numCarsPerTrain,
    proposedNumVehicles,
    proposedNumCarsPerTrain,
    maxTrains,
    minMaxCarsPerTrain,
    minWaitingTime,
    maxWaitingTime,
    operationOption,
    boatHireReturnDirection,
    boatHireReturnPosition,
    measurementIndex,
    specialTrackElements,
    maxSpeed,
    averageSpeed,
    currentTestSegment,
    averageSpeedTestTimeout,
    length,
    time,
    maxPositiveVerticalG,
    maxNegativeVerticalG,
    maxLateralG,
    previousVerticalG,
    previousLateralG,
    testingFlags,
    curTestTrackLocation,
    turnCountDefault,
    turnCountBanked,
    turnCountSloped,
    inversions,
    drops,
    startDropHeight,
    highestDropHeight,
    shelteredLength,
    var11C,
    numShelteredSections,
    curTestTrackZ,
    curNumCustomers,
    numCustomersTimeout,
    numCustomers,
    price,
    chairliftBullwheelLocation,
    chairliftBullwheelZ,
    ratings,
    value,
    chairliftBullwheelRotation,
    satisfaction,
    satisfactionTimeOut,
    satisfactionNext,
    windowInvalidateFlags,
    totalCustomers,
    totalProfit,
    popularity,
    popularityTimeOut,
    popularityNext,
    numRiders,
    musicTuneId,
    slideInUse,
    slidePeep,
    slidePeepTShirtColour,
    spiralSlideProgress,
    buildDate,
    upkeepCost,
    raceWinner,
    musicPosition,
    breakdownReasonPending,
    mechanicStatus,
    mechanic,
    inspectionStation,
    brokenVehicle,
    brokenCar,
    breakdownReason,
    priceSecondary,
    reliability,
    unreliabilityFactor,
    downtime,
    inspectionInterval,
    lastInspection,
    downtimeHistory,
    noPrimaryItemsSold,
    noSecondaryItemsSold,
    breakdownSoundModifier,
    notFixedTimeout,
    lastCrashType,
    connectedMessageThrottle,
    incomePerHour,
    profit,
    queueTime,
    trackColourMain,
    trackColourAdditional,
    trackColourSupports,
    music,
    entranceStyle,
    vehicleChangeTimeout,
    numBlockBrakes,
    liftHillSpeed,
    guestsFavourite,
    lifecycleFlags,
    vehicleColoursExtended,
    totalAirTime,
    currentTestStation,
    numCircuits,
    cableLiftX,
    cableLiftY,
    cableLiftZ,
    cableLift,
    queueLength,
  };
}
