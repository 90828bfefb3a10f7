// src/s6/fieldMigrator.ts
import path from "node:path";

import { objectEntryIdentifier, type RawScenarioInfo } from "./header.js";
import { RCT2_MAX_SPRITES, type S6Kind } from "./layout.js";
import { silent, type WarnFn } from "./log.js";
import type { ParsedParkFile } from "./parkFile.js";
import { LOCATION_NULL, type RawParkData } from "./rawRecords.js";
import { containsUtf8ColourCode, decodeRct2, decodeUtf8, toByteString } from "./rct2String.js";
import { isRideSlotUsed, migratePeepSpawns, migrateRide, migrateSprite } from "./rideMigrator.js";
import {
  NEWS_ITEM_NULL,
  NEWS_TYPE_COUNT,
  SPRITE_INDEX_NULL,
  SPRITE_LIST_NULL,
  type ScenarioInfo,
} from "../world/types.js";
import type { WorldState } from "../world/worldState.js";

const MONEY_XOR_KEY = 0xf4ec9621;

function rol32(v: number, shift: number): number {
  return ((v << shift) | (v >>> (32 - shift))) >>> 0;
}

/** The cash field is stored obfuscated; returns the signed amount. */
export function decryptMoney(stored: number): number {
  return rol32((stored ^ MONEY_XOR_KEY) >>> 0, 13) | 0;
}

export function encryptMoney(amount: number): number {
  const v = amount >>> 0;
  return (((v >>> 13) | (v << 19)) ^ MONEY_XOR_KEY) >>> 0;
}

/**
 * Some scenarios already hold UTF-8 text; a UTF-8 colour code in either field
 * marks both as such.
 */
export function migrateScenarioInfo(info: RawScenarioInfo): ScenarioInfo {
  const alreadyUtf8 = containsUtf8ColourCode(info.name) || containsUtf8ColourCode(info.details);
  const decode = alreadyUtf8 ? decodeUtf8 : decodeRct2;
  return {
    editorStep: info.editorStep,
    category: info.category,
    objectiveType: info.objectiveType,
    objectiveArg1: info.objectiveArg1,
    objectiveArg2: info.objectiveArg2,
    objectiveArg3: info.objectiveArg3,
    name: decode(info.name),
    details: decode(info.details),
    entry: {
      flags: info.entry.flags,
      name: objectEntryIdentifier(info.entry),
      checksum: info.entry.checksum,
    },
  };
}

/** File name the park is known by: the real one for scenarios, the stored one for saves. */
export function resolveScenarioFileName(kind: S6Kind, storedName: Uint8Array, filePath: string): string {
  if (kind === "scenario" && filePath !== "") return path.basename(filePath);
  return toByteString(storedName);
}

function migrateSprites(park: RawParkData, world: WorldState): void {
  for (let i = 0; i < RCT2_MAX_SPRITES; i++) {
    const src = park.sprites[i];
    if (src !== undefined) world.sprites[i] = migrateSprite(src);
  }
  world.spriteListHead = park.spriteListHead.slice();
  world.spriteListCount = park.spriteListCount.slice();

  const extra = world.spriteCapacity - RCT2_MAX_SPRITES;
  if (extra === 0) return;

  // slots past the file's array are free; they go in front of the null list
  const first = world.sprites[RCT2_MAX_SPRITES];
  const last = world.sprites[world.spriteCapacity - 1];
  if (first === undefined || last === undefined) return;
  const oldHead = world.spriteListHead[SPRITE_LIST_NULL] ?? SPRITE_INDEX_NULL;
  first.previous = SPRITE_INDEX_NULL;
  last.next = oldHead;
  const oldFirst = oldHead < RCT2_MAX_SPRITES ? world.sprites[oldHead] : undefined;
  if (oldFirst !== undefined) oldFirst.previous = last.spriteIndex;
  world.spriteListHead[SPRITE_LIST_NULL] = RCT2_MAX_SPRITES;
  world.spriteListCount[SPRITE_LIST_NULL] = (world.spriteListCount[SPRITE_LIST_NULL] ?? 0) + extra;
}

function migrateNews(park: RawParkData, world: WorldState, warn: WarnFn): void {
  for (let i = 0; i < park.newsItems.length; i++) {
    const src = park.newsItems[i];
    const dst = world.newsItems[i];
    if (src === undefined || dst === undefined) break;
    if (src.type >= NEWS_TYPE_COUNT) {
      warn(`Invalid news type 0x${src.type.toString(16)} for news item ${i}, ignoring remaining news items`);
      dst.type = NEWS_ITEM_NULL;
      break;
    }
    dst.type = src.type;
    dst.flags = src.flags;
    dst.assoc = src.assoc;
    dst.ticks = src.ticks;
    dst.monthYear = src.monthYear;
    dst.day = src.day;
    dst.text = toByteString(src.text);
  }
}

export type MigrateFieldsOptions = {
  /** Path the park was loaded from; "" when loaded from memory. */
  filePath?: string;
  warn?: WarnFn;
};

/**
 * Resets `world` for the park's map size and copies every scalar, array and
 * record out of the parsed file. Tile elements and research bitmaps are
 * handled separately. Legacy text outside the scenario info block is kept
 * as byte strings until the string conversion pass.
 */
export function migrateFields(
  parsed: ParsedParkFile,
  world: WorldState,
  opts: MigrateFieldsOptions = {},
): void {
  const warn = opts.warn ?? silent;
  const park = parsed.park;

  world.initAll(park.mapSize);

  if (parsed.scenarioInfo !== undefined) {
    world.scenarioInfo = migrateScenarioInfo(parsed.scenarioInfo);
  }

  world.date.monthsElapsed = parsed.date.elapsedMonths;
  world.date.monthTicks = parsed.date.currentDay;
  world.date.scenarioTicks = parsed.date.scenarioTicks;
  world.randomSeeds = [parsed.date.srand0, parsed.date.srand1];

  world.nextFreeTileElementPointerIndex = park.nextFreeTileElementPointerIndex;
  migrateSprites(park, world);

  world.park.name = park.parkName;
  world.park.nameArgs = park.parkNameArgs;
  world.finance.initialCash = park.initialCash;
  world.finance.bankLoan = park.currentLoan;
  world.park.flags = park.parkFlags;
  world.park.entranceFee = park.parkEntranceFee;

  world.peepSpawns = migratePeepSpawns(park.peepSpawns);

  world.guests.changeModifier = park.guestCountChangeModifier;
  world.research.fundingLevel = park.currentResearchLevel;
  world.research.trackTypesA = park.researchedTrackTypesA.slice();
  world.research.trackTypesB = park.researchedTrackTypesB.slice();

  world.guests.inPark = park.guestsInPark;
  world.guests.headingForPark = park.guestsHeadingForPark;
  world.finance.expenditureTable = park.expenditureTable.map((month) => month.slice());
  world.guests.inParkLastWeek = park.lastGuestsInPark;

  world.staff.handymanColour = park.handymanColour;
  world.staff.mechanicColour = park.mechanicColour;
  world.staff.securityColour = park.securityColour;

  world.park.rating = park.parkRating;
  world.park.ratingHistory = Array.from(park.parkRatingHistory);
  world.park.guestsInParkHistory = Array.from(park.guestsInParkHistory);

  world.research.priorities = park.activeResearchTypes;
  world.research.progressStage = park.researchProgressStage;
  world.research.lastItem = { rawValue: park.lastResearchedItemSubject, category: 0 };
  world.research.nextItem = { rawValue: park.nextResearchItem, category: park.nextResearchCategory };
  world.research.progress = park.researchProgress;
  world.research.expectedDay = park.nextResearchExpectedDay;
  world.research.expectedMonth = park.nextResearchExpectedMonth;
  world.guests.initialHappiness = park.guestInitialHappiness;
  world.park.size = park.parkSize;
  world.guests.generationProbability = park.guestGenerationProbability;
  world.park.totalRideValueForMoney = park.totalRideValueForMoney;
  world.finance.maxBankLoan = park.maximumLoan;
  world.guests.initialCash = park.guestInitialCash;
  world.guests.initialHunger = park.guestInitialHunger;
  world.guests.initialThirst = park.guestInitialThirst;
  world.objective.type = park.objectiveType;
  world.objective.year = park.objectiveYear;
  world.objective.currency = park.objectiveCurrency;
  world.objective.numGuests = park.objectiveGuests;
  world.marketing.campaignWeeksLeft = Array.from(park.campaignWeeksLeft);
  world.marketing.campaignRideIndex = Array.from(park.campaignRideIndex);

  world.finance.currentExpenditure = park.currentExpenditure;
  world.finance.currentProfit = park.currentProfit;
  world.finance.weeklyProfitAverageDividend = park.weeklyProfitAverageDividend;
  world.finance.weeklyProfitAverageDivisor = park.weeklyProfitAverageDivisor;
  world.finance.parkValue = park.parkValue;
  world.finance.cashHistory = park.balanceHistory.slice();
  world.finance.weeklyProfitHistory = park.weeklyProfitHistory.slice();
  world.finance.parkValueHistory = park.parkValueHistory.slice();

  world.objective.completedCompanyValue = park.completedCompanyValue;
  world.finance.totalAdmissions = park.totalAdmissions;
  world.finance.totalIncomeFromAdmissions = park.incomeFromAdmissions;
  world.finance.companyValue = park.companyValue;
  world.guests.warningThrottle = Array.from(park.peepWarningThrottle);
  world.park.awards = park.awards.map((a) => ({ time: a.time, type: a.type }));
  world.finance.landPrice = park.landPrice;
  world.finance.constructionRightsPrice = park.constructionRightsPrice;

  world.gameVersion = park.gameVersionNumber;
  world.objective.companyValueRecord = park.completedCompanyValueRecord;
  world.park.rideCount = park.rideCount;
  world.finance.historicalProfit = park.historicalProfit;
  world.objective.completedBy = toByteString(park.scenarioCompletedName);
  world.finance.cash = decryptMoney(park.cash);
  world.park.ratingCasualtyPenalty = park.parkRatingCasualtyPenalty;

  world.map.sizeUnits = park.mapSizeUnits;
  world.map.sizeMinus2 = park.mapSizeMinus2;
  world.map.size = park.mapSize;
  world.map.sizeMaxXY = park.mapMaxXY;

  world.park.samePriceThroughoutA = park.samePriceThroughout;
  world.guests.suggestedMaximum = park.suggestedMaxGuests;
  world.objective.parkRatingWarningDays = park.parkRatingWarningDays;
  world.park.lastEntranceStyle = park.lastEntranceStyle;
  world.research.items = park.researchItems.map((it) => ({ rawValue: it.rawValue, category: it.category }));
  world.map.baseZ = park.mapBaseZ;
  world.objective.scenarioName = toByteString(park.scenarioName);
  world.objective.scenarioDetails = toByteString(park.scenarioDescription);
  world.finance.bankLoanInterestRate = park.currentInterestRate;
  world.park.samePriceThroughoutB = park.samePriceThroughoutExtended;

  world.park.entrances = park.parkEntrances
    .filter((e) => e.x !== LOCATION_NULL)
    .map((e) => ({ x: e.x, y: e.y, z: e.z, direction: e.direction }));

  world.objective.scenarioFileName = resolveScenarioFileName(
    parsed.kind,
    park.scenarioFilename,
    opts.filePath ?? "",
  );
  world.objective.expansionPacks = Uint8Array.from(park.savedExpansionPackNames);
  world.banners = park.banners.map((b) => ({ ...b }));
  world.userStrings = park.customStrings.map(toByteString);
  world.date.currentTicks = park.gameTicks1;
  world.date.realTimeTicks = 0;

  park.rides.forEach((src, index) => {
    if (isRideSlotUsed(src)) world.rides[index] = migrateRide(src, index);
  });

  world.savedView = {
    age: park.savedAge,
    x: park.savedViewX,
    y: park.savedViewY,
    zoom: park.savedViewZoom,
    rotation: park.savedViewRotation,
  };

  world.mapAnimations = park.mapAnimations.map((a) => ({ ...a }));
  world.numMapAnimations = park.numMapAnimations;
  world.rideRatingsCalcData = Uint8Array.from(park.rideRatingsCalcData);
  world.rideMeasurements = park.rideMeasurements.map((m) => Uint8Array.from(m));
  world.guests.nextGuestNumber = park.nextGuestIndex;
  world.map.grassSceneryTileLoopPosition = park.grassAndSceneryTilepos;
  world.staff.patrolAreas = park.patrolAreas.slice();
  world.staff.modes = Array.from(park.staffModes);

  world.climate = {
    climate: park.climate,
    updateTimer: park.climateUpdateTimer,
    current: {
      weather: park.currentWeather,
      temperature: park.temperature,
      weatherEffect: park.currentWeatherEffect,
      weatherGloom: park.currentWeatherGloom,
      rainLevel: park.currentRainLevel,
    },
    next: {
      weather: park.nextWeather,
      temperature: park.nextTemperature,
      weatherEffect: park.nextWeatherEffect,
      weatherGloom: park.nextWeatherGloom,
      rainLevel: park.nextRainLevel,
    },
  };

  migrateNews(park, world, warn);

  world.map.widePathTileLoopX = park.widePathTileLoopX;
  world.map.widePathTileLoopY = park.widePathTileLoopY;
}
