// src/world/worldState.ts
import { ResearchInventedSet } from "./researchInvented.js";
import {
  isLastForTile,
  type SurfaceElement,
  type TileElement,
} from "./tileElement.js";
import {
  LOCATION_NULL,
  NEWS_ITEM_NULL,
  SPRITE_IDENTIFIER_NULL,
  SPRITE_INDEX_NULL,
  SPRITE_LIST_NULL,
  type Banner,
  type ClimateState,
  type DateState,
  type FinanceState,
  type GuestState,
  type MapAnimation,
  type MapState,
  type MarketingState,
  type NewsItem,
  type ObjectiveState,
  type ParkState,
  type PeepSpawn,
  type ResearchState,
  type Ride,
  type SavedView,
  type ScenarioInfo,
  type Sprite,
  type StaffState,
  type WeatherState,
} from "./types.js";

export const MAXIMUM_MAP_SIZE_TECHNICAL = 256;
export const TILE_UNDEFINED = -1;
export const DEFAULT_SPRITE_CAPACITY = 10000;
export const NUM_SPRITE_LISTS = 6;
export const MAX_RIDES = 255;
export const MAX_USER_STRINGS = 1024;
export const MAX_NEWS_ITEMS = 61;

export type WorldStateOptions = {
  /** Sprite slots in this world; must be at least 10000. */
  spriteCapacity?: number;
};

export type TilePointerResult = {
  /** Tiles that got a pointer before the element array ran out. */
  tilesMapped: number;
  nextFreeIndex: number;
};

function zeros(n: number): number[] {
  return new Array<number>(n).fill(0);
}

export function createNullSprite(index: number, capacity: number): Sprite {
  const bytes = new Uint8Array(256);
  bytes[0] = SPRITE_IDENTIFIER_NULL;
  return {
    identifier: SPRITE_IDENTIFIER_NULL,
    type: 0,
    nextInQuadrant: SPRITE_INDEX_NULL,
    next: index + 1 < capacity ? index + 1 : SPRITE_INDEX_NULL,
    previous: index > 0 ? index - 1 : SPRITE_INDEX_NULL,
    linkedListTypeOffset: SPRITE_LIST_NULL * 2,
    spriteIndex: index,
    flags: 0,
    x: LOCATION_NULL,
    y: 0,
    z: 0,
    peepState: 0,
    peepCurrentRide: 0,
    bytes,
  };
}

function emptyWeather(): WeatherState {
  return { weather: 0, temperature: 0, weatherEffect: 0, weatherGloom: 0, rainLevel: 0 };
}

function emptyScenarioInfo(): ScenarioInfo {
  return {
    editorStep: 0,
    category: 0,
    objectiveType: 0,
    objectiveArg1: 0,
    objectiveArg2: 0,
    objectiveArg3: 0,
    name: "",
    details: "",
    entry: { flags: 0xffffffff, name: "", checksum: 0 },
  };
}

function emptyFinance(): FinanceState {
  return {
    cash: 0,
    initialCash: 0,
    bankLoan: 0,
    maxBankLoan: 0,
    bankLoanInterestRate: 0,
    expenditureTable: [],
    currentExpenditure: 0,
    currentProfit: 0,
    weeklyProfitAverageDividend: 0,
    weeklyProfitAverageDivisor: 0,
    cashHistory: [],
    weeklyProfitHistory: [],
    parkValueHistory: [],
    parkValue: 0,
    companyValue: 0,
    historicalProfit: 0,
    totalAdmissions: 0,
    totalIncomeFromAdmissions: 0,
    landPrice: 0,
    constructionRightsPrice: 0,
  };
}

function emptyPark(): ParkState {
  return {
    name: 0,
    nameArgs: 0,
    flags: 0,
    entranceFee: 0,
    rating: 0,
    ratingHistory: [],
    guestsInParkHistory: [],
    ratingCasualtyPenalty: 0,
    size: 0,
    totalRideValueForMoney: 0,
    samePriceThroughoutA: 0,
    samePriceThroughoutB: 0,
    lastEntranceStyle: 0,
    entrances: [],
    rideCount: 0,
    awards: [],
    landRemainingOwnershipSales: 0,
    landRemainingConstructionSales: 0,
  };
}

function emptyGuests(): GuestState {
  return {
    inPark: 0,
    headingForPark: 0,
    inParkLastWeek: 0,
    changeModifier: 0,
    generationProbability: 0,
    suggestedMaximum: 0,
    initialHappiness: 0,
    initialCash: 0,
    initialHunger: 0,
    initialThirst: 0,
    nextGuestNumber: 0,
    warningThrottle: [],
  };
}

function emptyResearch(): ResearchState {
  return {
    fundingLevel: 0,
    priorities: 0,
    progressStage: 0,
    lastItem: { rawValue: 0xffffffff, category: 0 },
    nextItem: { rawValue: 0xffffffff, category: 0 },
    progress: 0,
    expectedDay: 0,
    expectedMonth: 0,
    items: [],
    trackTypesA: [],
    trackTypesB: [],
  };
}

function emptyObjective(): ObjectiveState {
  return {
    type: 0,
    year: 0,
    currency: 0,
    numGuests: 0,
    parkRatingWarningDays: 0,
    completedCompanyValue: 0,
    companyValueRecord: 0,
    completedBy: "",
    scenarioName: "",
    scenarioDetails: "",
    scenarioFileName: "",
    expansionPacks: new Uint8Array(0),
  };
}

function emptyStaff(): StaffState {
  return { handymanColour: 0, mechanicColour: 0, securityColour: 0, patrolAreas: [], modes: [] };
}

function emptyClimate(): ClimateState {
  return { climate: 0, updateTimer: 0, current: emptyWeather(), next: emptyWeather() };
}

function emptyMarketing(): MarketingState {
  return { campaignWeeksLeft: [], campaignRideIndex: [] };
}

function emptyMap(mapSize: number): MapState {
  return {
    size: mapSize,
    sizeUnits: (mapSize - 1) * 32,
    sizeMinus2: mapSize * 32 - 2,
    sizeMaxXY: (mapSize - 1) * 32 - 1,
    baseZ: 0,
    grassSceneryTileLoopPosition: 0,
    widePathTileLoopX: 0,
    widePathTileLoopY: 0,
  };
}

function emptySavedView(): SavedView {
  return { age: 0, x: 0, y: 0, zoom: 0, rotation: 0 };
}

/**
 * Container for everything a park import writes. `initAll` resets it to an
 * empty park of the given map size.
 */
export class WorldState {
  public readonly spriteCapacity: number;

  public scenarioInfo: ScenarioInfo = emptyScenarioInfo();
  public date: DateState = { monthsElapsed: 0, monthTicks: 0, scenarioTicks: 0, currentTicks: 0, realTimeTicks: 0 };
  public randomSeeds: [number, number] = [0, 0];
  public gameVersion = 0;

  public tileElements: TileElement[] = [];
  /** First element index per tile, indexed `y * 256 + x`. */
  public tilePointers: number[] = [];
  public nextFreeTileElementPointerIndex = 0;

  public sprites: Sprite[] = [];
  public spriteListHead: number[] = [];
  public spriteListCount: number[] = [];

  public peepSpawns: PeepSpawn[] = [];
  public rides: Array<Ride | null> = [];
  public banners: Banner[] = [];
  public userStrings: string[] = [];
  public newsItems: NewsItem[] = [];
  public mapAnimations: MapAnimation[] = [];
  public numMapAnimations = 0;
  public rideRatingsCalcData: Uint8Array = new Uint8Array(0);
  public rideMeasurements: Uint8Array[] = [];

  public readonly invented = new ResearchInventedSet();

  public finance: FinanceState = emptyFinance();
  public park: ParkState = emptyPark();
  public guests: GuestState = emptyGuests();
  public research: ResearchState = emptyResearch();
  public objective: ObjectiveState = emptyObjective();
  public staff: StaffState = emptyStaff();
  public climate: ClimateState = emptyClimate();
  public marketing: MarketingState = emptyMarketing();
  public map: MapState = emptyMap(MAXIMUM_MAP_SIZE_TECHNICAL);
  public savedView: SavedView = emptySavedView();

  public constructor(opts: WorldStateOptions = {}) {
    const capacity = opts.spriteCapacity ?? DEFAULT_SPRITE_CAPACITY;
    if (!Number.isInteger(capacity) || capacity < DEFAULT_SPRITE_CAPACITY || capacity >= SPRITE_INDEX_NULL) {
      throw new RangeError(`Sprite capacity out of range: ${capacity}`);
    }
    this.spriteCapacity = capacity;
    this.initAll(MAXIMUM_MAP_SIZE_TECHNICAL);
  }

  public initAll(mapSize: number): void {
    this.scenarioInfo = emptyScenarioInfo();
    this.date = { monthsElapsed: 0, monthTicks: 0, scenarioTicks: 0, currentTicks: 0, realTimeTicks: 0 };
    this.randomSeeds = [0, 0];
    this.gameVersion = 0;

    this.tileElements = [];
    this.tilePointers = new Array<number>(MAXIMUM_MAP_SIZE_TECHNICAL * MAXIMUM_MAP_SIZE_TECHNICAL).fill(
      TILE_UNDEFINED,
    );
    this.nextFreeTileElementPointerIndex = 0;

    this.sprites = [];
    for (let i = 0; i < this.spriteCapacity; i++) {
      this.sprites.push(createNullSprite(i, this.spriteCapacity));
    }
    this.spriteListHead = new Array<number>(NUM_SPRITE_LISTS).fill(SPRITE_INDEX_NULL);
    this.spriteListCount = zeros(NUM_SPRITE_LISTS);
    this.spriteListHead[SPRITE_LIST_NULL] = 0;
    this.spriteListCount[SPRITE_LIST_NULL] = this.spriteCapacity;

    this.peepSpawns = [];
    this.rides = new Array<Ride | null>(MAX_RIDES).fill(null);
    this.banners = [];
    this.userStrings = new Array<string>(MAX_USER_STRINGS).fill("");
    this.newsItems = [];
    for (let i = 0; i < MAX_NEWS_ITEMS; i++) {
      this.newsItems.push({ type: NEWS_ITEM_NULL, flags: 0, assoc: 0, ticks: 0, monthYear: 0, day: 0, text: "" });
    }
    this.mapAnimations = [];
    this.numMapAnimations = 0;
    this.rideRatingsCalcData = new Uint8Array(0);
    this.rideMeasurements = [];
    this.invented.clearAll();

    this.finance = emptyFinance();
    this.park = emptyPark();
    this.guests = emptyGuests();
    this.research = emptyResearch();
    this.objective = emptyObjective();
    this.staff = emptyStaff();
    this.climate = emptyClimate();
    this.marketing = emptyMarketing();
    this.map = emptyMap(mapSize);
    this.savedView = emptySavedView();
  }

  public getRide(index: number): Ride | null {
    return this.rides[index] ?? null;
  }

  public activeRides(): Ride[] {
    return this.rides.filter((r): r is Ride => r !== null);
  }

  /**
   * Points every tile of the 256x256 grid at its first element, walking the
   * element array row by row (y outer, x inner). Each tile's run ends at the
   * element flagged last-for-tile.
   */
  public updateTilePointers(): TilePointerResult {
    const total = MAXIMUM_MAP_SIZE_TECHNICAL * MAXIMUM_MAP_SIZE_TECHNICAL;
    this.tilePointers = new Array<number>(total).fill(TILE_UNDEFINED);

    let index = 0;
    let tilesMapped = 0;
    for (let tile = 0; tile < total && index < this.tileElements.length; tile++) {
      this.tilePointers[tile] = index;
      tilesMapped++;
      for (;;) {
        const el = this.tileElements[index];
        index++;
        if (el === undefined || isLastForTile(el)) break;
      }
    }
    this.nextFreeTileElementPointerIndex = index;
    return { tilesMapped, nextFreeIndex: index };
  }

  public elementsAt(x: number, y: number): TileElement[] {
    if (x < 0 || y < 0 || x >= MAXIMUM_MAP_SIZE_TECHNICAL || y >= MAXIMUM_MAP_SIZE_TECHNICAL) return [];
    const start = this.tilePointers[y * MAXIMUM_MAP_SIZE_TECHNICAL + x] ?? TILE_UNDEFINED;
    if (start === TILE_UNDEFINED) return [];

    const out: TileElement[] = [];
    for (let i = start; i < this.tileElements.length; i++) {
      const el = this.tileElements[i];
      if (el === undefined) break;
      out.push(el);
      if (isLastForTile(el)) break;
    }
    return out;
  }

  public surfaceAt(x: number, y: number): SurfaceElement | undefined {
    for (const el of this.elementsAt(x, y)) {
      if (el.kind === "surface") return el;
    }
    return undefined;
  }
}
