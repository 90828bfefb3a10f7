// src/s6/rawRecords.ts
//
// Cursor decode of the park data region (3 048 816 bytes starting at the
// next-free tile element index). Field order mirrors the file image.

import { BinaryReader } from "./binary.js";
import { FormatError } from "./errors.js";
import { readFixedString } from "./header.js";
import {
  BANNER_SIZE,
  EXPANSION_PACK_NAMES_SIZE,
  EXPENDITURE_MONTHS,
  EXPENDITURE_TYPES,
  FINANCE_GRAPH_SIZE,
  HISTORY_SIZE,
  MAP_ANIMATION_SIZE,
  MAX_ANIMATED_OBJECTS,
  MAX_AWARDS,
  MAX_BANNERS,
  MAX_NEWS_ITEMS,
  MAX_PARK_ENTRANCES,
  MAX_PEEP_SPAWNS,
  MAX_RESEARCH_ITEMS,
  MAX_RIDES,
  MAX_RIDE_MEASUREMENTS,
  MAX_STAFF,
  MAX_TILE_ELEMENTS,
  MAX_USER_STRINGS,
  NEWS_TEXT_SIZE,
  NUM_SPRITE_LISTS,
  PARK_DATA_SIZE,
  PATROL_AREA_SIZE,
  RCT2_MAX_SPRITES,
  RESEARCH_ITEM_SIZE,
  RIDE_ENTRY_QUADS,
  RIDE_MEASUREMENT_SIZE,
  RIDE_RATINGS_CALC_DATA_SIZE,
  RIDE_TYPE_QUADS,
  SCENERY_ITEM_QUADS,
  SPRITE_SIZE,
  STAFF_TYPE_COUNT,
  TILE_ELEMENT_SIZE,
  TILE_ELEMENTS_SIZE,
  TRACK_TYPE_QUADS,
  USER_STRING_MAX_LENGTH,
} from "./layout.js";
import { readRawRide, type RawRideRecord } from "./rawRide.js";

export const PEEP_SPAWN_UNDEFINED = 0xffff;
export const LOCATION_NULL = -32768;

/** 8 raw bytes of one tile element. */
export type RawTileRecord = Uint8Array;

export type RawPeepSpawnRecord = Readonly<{
  x: number;
  y: number;
  /** Coarse height units; the world uses 16x finer steps. */
  z: number;
  direction: number;
}>;

export type RawSpriteRecord = Readonly<{
  identifier: number;
  type: number;
  nextInQuadrant: number;
  next: number;
  previous: number;
  linkedListTypeOffset: number;
  spriteIndex: number;
  flags: number;
  x: number;
  y: number;
  z: number;
  /** Peep fields; meaningful only when `identifier` is the peep identifier. */
  peepState: number;
  peepCurrentRide: number;
  bytes: Uint8Array;
}>;

export type RawNewsItemRecord = Readonly<{
  type: number;
  flags: number;
  assoc: number;
  ticks: number;
  monthYear: number;
  day: number;
  text: Uint8Array;
}>;

export type RawResearchBitmap = Readonly<{
  rideTypes: ReadonlyArray<number>;
  rideEntries: ReadonlyArray<number>;
  sceneryItems: ReadonlyArray<number>;
}>;

export type RawAward = Readonly<{ time: number; type: number }>;

export type RawResearchItem = Readonly<{ rawValue: number; category: number }>;

export type RawBanner = Readonly<{
  type: number;
  flags: number;
  stringIdx: number;
  colour: number;
  textColour: number;
  x: number;
  y: number;
}>;

export type RawMapAnimation = Readonly<{ baseZ: number; type: number; x: number; y: number }>;

export type RawParkEntrance = Readonly<{ x: number; y: number; z: number; direction: number }>;

export type RawParkData = Readonly<{
  nextFreeTileElementPointerIndex: number;
  sprites: ReadonlyArray<RawSpriteRecord>;
  spriteListHead: ReadonlyArray<number>;
  spriteListCount: ReadonlyArray<number>;
  parkName: number;
  parkNameArgs: number;
  initialCash: number;
  currentLoan: number;
  parkFlags: number;
  parkEntranceFee: number;
  peepSpawns: ReadonlyArray<RawPeepSpawnRecord>;
  guestCountChangeModifier: number;
  currentResearchLevel: number;
  research: RawResearchBitmap;
  researchedTrackTypesA: ReadonlyArray<number>;
  researchedTrackTypesB: ReadonlyArray<number>;
  guestsInPark: number;
  guestsHeadingForPark: number;
  expenditureTable: ReadonlyArray<ReadonlyArray<number>>;
  lastGuestsInPark: number;
  handymanColour: number;
  mechanicColour: number;
  securityColour: number;
  parkRating: number;
  parkRatingHistory: Uint8Array;
  guestsInParkHistory: Uint8Array;
  activeResearchTypes: number;
  researchProgressStage: number;
  lastResearchedItemSubject: number;
  nextResearchItem: number;
  researchProgress: number;
  nextResearchCategory: number;
  nextResearchExpectedDay: number;
  nextResearchExpectedMonth: number;
  guestInitialHappiness: number;
  parkSize: number;
  guestGenerationProbability: number;
  totalRideValueForMoney: number;
  maximumLoan: number;
  guestInitialCash: number;
  guestInitialHunger: number;
  guestInitialThirst: number;
  objectiveType: number;
  objectiveYear: number;
  objectiveCurrency: number;
  objectiveGuests: number;
  campaignWeeksLeft: Uint8Array;
  campaignRideIndex: Uint8Array;
  balanceHistory: ReadonlyArray<number>;
  currentExpenditure: number;
  currentProfit: number;
  weeklyProfitAverageDividend: number;
  weeklyProfitAverageDivisor: number;
  weeklyProfitHistory: ReadonlyArray<number>;
  parkValue: number;
  parkValueHistory: ReadonlyArray<number>;
  completedCompanyValue: number;
  totalAdmissions: number;
  incomeFromAdmissions: number;
  companyValue: number;
  peepWarningThrottle: Uint8Array;
  awards: ReadonlyArray<RawAward>;
  landPrice: number;
  constructionRightsPrice: number;
  gameVersionNumber: number;
  completedCompanyValueRecord: number;
  rideCount: number;
  historicalProfit: number;
  scenarioCompletedName: Uint8Array;
  /** Obfuscated; see `decryptMoney`. */
  cash: number;
  parkRatingCasualtyPenalty: number;
  mapSizeUnits: number;
  mapSizeMinus2: number;
  mapSize: number;
  mapMaxXY: number;
  samePriceThroughout: number;
  suggestedMaxGuests: number;
  parkRatingWarningDays: number;
  lastEntranceStyle: number;
  researchItems: ReadonlyArray<RawResearchItem>;
  mapBaseZ: number;
  scenarioName: Uint8Array;
  scenarioDescription: Uint8Array;
  currentInterestRate: number;
  samePriceThroughoutExtended: number;
  parkEntrances: ReadonlyArray<RawParkEntrance>;
  scenarioFilename: Uint8Array;
  savedExpansionPackNames: Uint8Array;
  banners: ReadonlyArray<RawBanner>;
  customStrings: ReadonlyArray<Uint8Array>;
  gameTicks1: number;
  rides: ReadonlyArray<RawRideRecord>;
  savedAge: number;
  savedViewX: number;
  savedViewY: number;
  savedViewZoom: number;
  savedViewRotation: number;
  mapAnimations: ReadonlyArray<RawMapAnimation>;
  numMapAnimations: number;
  rideRatingsCalcData: Uint8Array;
  rideMeasurements: ReadonlyArray<Uint8Array>;
  nextGuestIndex: number;
  grassAndSceneryTilepos: number;
  patrolAreas: ReadonlyArray<number>;
  staffModes: Uint8Array;
  climate: number;
  climateUpdateTimer: number;
  currentWeather: number;
  nextWeather: number;
  temperature: number;
  nextTemperature: number;
  currentWeatherEffect: number;
  nextWeatherEffect: number;
  currentWeatherGloom: number;
  nextWeatherGloom: number;
  currentRainLevel: number;
  nextRainLevel: number;
  newsItems: ReadonlyArray<RawNewsItemRecord>;
  widePathTileLoopX: number;
  widePathTileLoopY: number;
}>;

const u8 = (r: BinaryReader): number => r.readU8();
const u16 = (r: BinaryReader): number => r.readU16LE();
const i16 = (r: BinaryReader): number => r.readI16LE();
const u32 = (r: BinaryReader): number => r.readU32LE();
const i32 = (r: BinaryReader): number => r.readI32LE();

export function readSprite(r: BinaryReader): RawSpriteRecord {
  const bytes = r.readCopy(SPRITE_SIZE);
  const view = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  return {
    identifier: view.readUInt8(0x00),
    type: view.readUInt8(0x01),
    nextInQuadrant: view.readUInt16LE(0x02),
    next: view.readUInt16LE(0x04),
    previous: view.readUInt16LE(0x06),
    linkedListTypeOffset: view.readUInt8(0x08),
    spriteIndex: view.readUInt16LE(0x0a),
    flags: view.readUInt16LE(0x0c),
    x: view.readInt16LE(0x0e),
    y: view.readInt16LE(0x10),
    z: view.readInt16LE(0x12),
    peepState: view.readUInt8(0x2b),
    peepCurrentRide: view.readUInt8(0x68),
    bytes,
  };
}

function readPeepSpawn(r: BinaryReader): RawPeepSpawnRecord {
  return { x: r.readU16LE(), y: r.readU16LE(), z: r.readU8(), direction: r.readU8() };
}

function readAward(r: BinaryReader): RawAward {
  return { time: r.readU16LE(), type: r.readU16LE() };
}

function readResearchItem(r: BinaryReader): RawResearchItem {
  return { rawValue: r.readU32LE(), category: r.readU8() };
}

function readBanner(r: BinaryReader): RawBanner {
  const start = r.position;
  const banner = {
    type: r.readU8(),
    flags: r.readU8(),
    stringIdx: r.readU16LE(),
    colour: r.readU8(),
    textColour: r.readU8(),
    x: r.readU8(),
    y: r.readU8(),
  };
  r.skip(BANNER_SIZE - (r.position - start));
  return banner;
}

function readMapAnimation(r: BinaryReader): RawMapAnimation {
  const start = r.position;
  const anim = { baseZ: r.readU8(), type: r.readU8(), x: r.readU16LE(), y: r.readU16LE() };
  r.skip(MAP_ANIMATION_SIZE - (r.position - start));
  return anim;
}

function readNewsItem(r: BinaryReader): RawNewsItemRecord {
  const type = r.readU8();
  const flags = r.readU8();
  const assoc = r.readU32LE();
  const ticks = r.readU16LE();
  const monthYear = r.readU16LE();
  const day = r.readU8();
  r.skip(1);
  const text = readFixedString(r, NEWS_TEXT_SIZE);
  return { type, flags, assoc, ticks, monthYear, day, text };
}

/** Splits the tile element chunk into 8-byte records, in file order. */
export function splitTileRecords(bytes: Buffer): RawTileRecord[] {
  if (bytes.length !== TILE_ELEMENTS_SIZE) {
    throw new FormatError(`Tile element block must be ${TILE_ELEMENTS_SIZE} bytes, got ${bytes.length}`);
  }
  const out: RawTileRecord[] = [];
  for (let i = 0; i < MAX_TILE_ELEMENTS; i++) {
    out.push(bytes.subarray(i * TILE_ELEMENT_SIZE, (i + 1) * TILE_ELEMENT_SIZE));
  }
  return out;
}

export function decodeParkData(bytes: Buffer): RawParkData {
  if (bytes.length !== PARK_DATA_SIZE) {
    throw new FormatError(`Park data must be ${PARK_DATA_SIZE} bytes, got ${bytes.length}`);
  }
  const r = new BinaryReader(bytes);

  const nextFreeTileElementPointerIndex = r.readU32LE();
  const sprites = r.readArray(RCT2_MAX_SPRITES, readSprite);
  const spriteListHead = r.readArray(NUM_SPRITE_LISTS, u16);
  const spriteListCount = r.readArray(NUM_SPRITE_LISTS, u16);
  const parkName = r.readU16LE();
  r.skip(2);
  const parkNameArgs = r.readU32LE();
  const initialCash = r.readI32LE();
  const currentLoan = r.readI32LE();
  const parkFlags = r.readU32LE();
  const parkEntranceFee = r.readI16LE();
  // legacy single park entrance (x, y, pad, z, pad), superseded by the entrance arrays
  r.skip(8);
  const peepSpawns = r.readArray(MAX_PEEP_SPAWNS, readPeepSpawn);
  const guestCountChangeModifier = r.readU8();
  const currentResearchLevel = r.readU8();
  r.skip(4);
  const rideTypes = r.readArray(RIDE_TYPE_QUADS, u32);
  const rideEntries = r.readArray(RIDE_ENTRY_QUADS, u32);
  const researchedTrackTypesA = r.readArray(TRACK_TYPE_QUADS, u32);
  const researchedTrackTypesB = r.readArray(TRACK_TYPE_QUADS, u32);

  const guestsInPark = r.readU16LE();
  const guestsHeadingForPark = r.readU16LE();
  const expenditureTable: number[][] = [];
  for (let m = 0; m < EXPENDITURE_MONTHS; m++) {
    expenditureTable.push(r.readArray(EXPENDITURE_TYPES, i32));
  }

  const lastGuestsInPark = r.readU16LE();
  r.skip(3);
  const handymanColour = r.readU8();
  const mechanicColour = r.readU8();
  const securityColour = r.readU8();
  const sceneryItems = r.readArray(SCENERY_ITEM_QUADS, u32);

  const parkRating = r.readU16LE();
  const parkRatingHistory = r.readCopy(HISTORY_SIZE);
  const guestsInParkHistory = r.readCopy(HISTORY_SIZE);

  const activeResearchTypes = r.readU8();
  const researchProgressStage = r.readU8();
  const lastResearchedItemSubject = r.readU32LE();
  r.skip(1000);
  const nextResearchItem = r.readU32LE();
  const researchProgress = r.readU16LE();
  const nextResearchCategory = r.readU8();
  const nextResearchExpectedDay = r.readU8();
  const nextResearchExpectedMonth = r.readU8();
  const guestInitialHappiness = r.readU8();
  const parkSize = r.readU16LE();
  const guestGenerationProbability = r.readU16LE();
  const totalRideValueForMoney = r.readU16LE();
  const maximumLoan = r.readI32LE();
  const guestInitialCash = r.readI16LE();
  const guestInitialHunger = r.readU8();
  const guestInitialThirst = r.readU8();
  const objectiveType = r.readU8();
  const objectiveYear = r.readU8();
  r.skip(2);
  const objectiveCurrency = r.readI32LE();
  const objectiveGuests = r.readU16LE();
  const campaignWeeksLeft = r.readCopy(20);
  const campaignRideIndex = r.readCopy(22);
  const balanceHistory = r.readArray(FINANCE_GRAPH_SIZE, i32);

  const currentExpenditure = r.readI32LE();
  const currentProfit = r.readI32LE();
  const weeklyProfitAverageDividend = r.readU32LE();
  const weeklyProfitAverageDivisor = r.readU16LE();
  r.skip(2);
  const weeklyProfitHistory = r.readArray(FINANCE_GRAPH_SIZE, i32);

  const parkValue = r.readI32LE();
  const parkValueHistory = r.readArray(FINANCE_GRAPH_SIZE, i32);

  const completedCompanyValue = r.readI32LE();
  const totalAdmissions = r.readU32LE();
  const incomeFromAdmissions = r.readI32LE();
  const companyValue = r.readI32LE();
  const peepWarningThrottle = r.readCopy(16);
  const awards = r.readArray(MAX_AWARDS, readAward);
  const landPrice = r.readI16LE();
  const constructionRightsPrice = r.readI16LE();
  // unknown word, padding, cd key, padding
  r.skip(2 + 2 + 4 + 64);
  const gameVersionNumber = r.readU32LE();
  const completedCompanyValueRecord = r.readI32LE();
  r.skip(4); // loan hash
  const rideCount = r.readU16LE();
  r.skip(6);
  const historicalProfit = r.readI32LE();
  r.skip(4);
  const scenarioCompletedName = readFixedString(r, 32);
  const cash = r.readU32LE();
  r.skip(50);
  const parkRatingCasualtyPenalty = r.readU16LE();
  const mapSizeUnits = r.readU16LE();
  const mapSizeMinus2 = r.readU16LE();
  const mapSize = r.readU16LE();
  const mapMaxXY = r.readU16LE();
  const samePriceThroughout = r.readU32LE();
  const suggestedMaxGuests = r.readU16LE();
  const parkRatingWarningDays = r.readU16LE();
  const lastEntranceStyle = r.readU8();
  r.skip(1 + 2); // legacy water colour, padding
  const researchItems: RawResearchItem[] = [];
  for (let i = 0; i < MAX_RESEARCH_ITEMS; i++) {
    const start = r.position;
    researchItems.push(readResearchItem(r));
    r.seek(start + RESEARCH_ITEM_SIZE);
  }
  const mapBaseZ = r.readU16LE();
  const scenarioName = readFixedString(r, 64);
  const scenarioDescription = readFixedString(r, 256);
  const currentInterestRate = r.readU8();
  r.skip(1);
  const samePriceThroughoutExtended = r.readU32LE();
  const entranceX = r.readArray(MAX_PARK_ENTRANCES, i16);
  const entranceY = r.readArray(MAX_PARK_ENTRANCES, i16);
  const entranceZ = r.readArray(MAX_PARK_ENTRANCES, i16);
  const entranceDirection = r.readArray(MAX_PARK_ENTRANCES, u8);
  const parkEntrances: RawParkEntrance[] = [];
  for (let i = 0; i < MAX_PARK_ENTRANCES; i++) {
    parkEntrances.push({
      x: entranceX[i] ?? LOCATION_NULL,
      y: entranceY[i] ?? LOCATION_NULL,
      z: entranceZ[i] ?? 0,
      direction: entranceDirection[i] ?? 0,
    });
  }
  const scenarioFilename = readFixedString(r, 256);
  const savedExpansionPackNames = r.readCopy(EXPANSION_PACK_NAMES_SIZE);
  const banners = r.readArray(MAX_BANNERS, readBanner);
  const customStrings = r.readArray(MAX_USER_STRINGS, (rr) =>
    readFixedString(rr, USER_STRING_MAX_LENGTH),
  );
  const gameTicks1 = r.readU32LE();
  const rides = r.readArray(MAX_RIDES, readRawRide);

  const savedAge = r.readU16LE();
  const savedViewX = r.readI16LE();
  const savedViewY = r.readI16LE();
  const savedViewZoom = r.readU8();
  const savedViewRotation = r.readU8();
  const mapAnimations = r.readArray(MAX_ANIMATED_OBJECTS, readMapAnimation);
  const numMapAnimations = r.readU16LE();
  r.skip(2);
  const rideRatingsCalcData = r.readCopy(RIDE_RATINGS_CALC_DATA_SIZE);
  r.skip(60);
  const rideMeasurements = r.readArray(MAX_RIDE_MEASUREMENTS, (rr) =>
    rr.readCopy(RIDE_MEASUREMENT_SIZE),
  );
  const nextGuestIndex = r.readU32LE();
  const grassAndSceneryTilepos = r.readU16LE();
  const patrolAreas = r.readArray((MAX_STAFF + STAFF_TYPE_COUNT) * PATROL_AREA_SIZE, u32);
  const staffModes = r.readCopy(MAX_STAFF + STAFF_TYPE_COUNT);
  // padding, plus a byte at +2 with no known use
  r.skip(2 + 1 + 1 + 4);
  const climate = r.readU8();
  r.skip(1);
  const climateUpdateTimer = r.readU16LE();
  const currentWeather = r.readU8();
  const nextWeather = r.readU8();
  const temperature = r.readI8();
  const nextTemperature = r.readI8();
  const currentWeatherEffect = r.readU8();
  const nextWeatherEffect = r.readU8();
  const currentWeatherGloom = r.readU8();
  const nextWeatherGloom = r.readU8();
  const currentRainLevel = r.readU8();
  const nextRainLevel = r.readU8();
  const newsItems = r.readArray(MAX_NEWS_ITEMS, readNewsItem);
  r.skip(64 + 4); // padding, legacy scenario flags
  const widePathTileLoopX = r.readU16LE();
  const widePathTileLoopY = r.readU16LE();
  r.skip(432);

  if (r.remaining() !== 0) {
    throw new FormatError(`Park data has ${r.remaining()} unread bytes`);
  }

  return {
    nextFreeTileElementPointerIndex,
    sprites,
    spriteListHead,
    spriteListCount,
    parkName,
    parkNameArgs,
    initialCash,
    currentLoan,
    parkFlags,
    parkEntranceFee,
    peepSpawns,
    guestCountChangeModifier,
    currentResearchLevel,
    research: { rideTypes, rideEntries, sceneryItems },
    researchedTrackTypesA,
    researchedTrackTypesB,
    guestsInPark,
    guestsHeadingForPark,
    expenditureTable,
    lastGuestsInPark,
    handymanColour,
    mechanicColour,
    securityColour,
    parkRating,
    parkRatingHistory,
    guestsInParkHistory,
    activeResearchTypes,
    researchProgressStage,
    lastResearchedItemSubject,
    nextResearchItem,
    researchProgress,
    nextResearchCategory,
    nextResearchExpectedDay,
    nextResearchExpectedMonth,
    guestInitialHappiness,
    parkSize,
    guestGenerationProbability,
    totalRideValueForMoney,
    maximumLoan,
    guestInitialCash,
    guestInitialHunger,
    guestInitialThirst,
    objectiveType,
    objectiveYear,
    objectiveCurrency,
    objectiveGuests,
    campaignWeeksLeft,
    campaignRideIndex,
    balanceHistory,
    currentExpenditure,
    currentProfit,
    weeklyProfitAverageDividend,
    weeklyProfitAverageDivisor,
    weeklyProfitHistory,
    parkValue,
    parkValueHistory,
    completedCompanyValue,
    totalAdmissions,
    incomeFromAdmissions,
    companyValue,
    peepWarningThrottle,
    awards,
    landPrice,
    constructionRightsPrice,
    gameVersionNumber,
    completedCompanyValueRecord,
    rideCount,
    historicalProfit,
    scenarioCompletedName,
    cash,
    parkRatingCasualtyPenalty,
    mapSizeUnits,
    mapSizeMinus2,
    mapSize,
    mapMaxXY,
    samePriceThroughout,
    suggestedMaxGuests,
    parkRatingWarningDays,
    lastEntranceStyle,
    researchItems,
    mapBaseZ,
    scenarioName,
    scenarioDescription,
    currentInterestRate,
    samePriceThroughoutExtended,
    parkEntrances,
    scenarioFilename,
    savedExpansionPackNames,
    banners,
    customStrings,
    gameTicks1,
    rides,
    savedAge,
    savedViewX,
    savedViewY,
    savedViewZoom,
    savedViewRotation,
    mapAnimations,
    numMapAnimations,
    rideRatingsCalcData,
    rideMeasurements,
    nextGuestIndex,
    grassAndSceneryTilepos,
    patrolAreas,
    staffModes,
    climate,
    climateUpdateTimer,
    currentWeather,
    nextWeather,
    temperature,
    nextTemperature,
    currentWeatherEffect,
    nextWeatherEffect,
    currentWeatherGloom,
    nextWeatherGloom,
    currentRainLevel,
    nextRainLevel,
    newsItems,
    widePathTileLoopX,
    widePathTileLoopY,
  };
}
