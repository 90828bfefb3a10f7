// src/world/types.ts
//
// Destination entities. Everything here is mutable: the importer overwrites a
// WorldState in place.

export const SPRITE_INDEX_NULL = 0xffff;
export const LOCATION_NULL = -32768;

export const SPRITE_IDENTIFIER_VEHICLE = 0;
export const SPRITE_IDENTIFIER_PEEP = 1;
export const SPRITE_IDENTIFIER_MISC = 2;
export const SPRITE_IDENTIFIER_LITTER = 3;
export const SPRITE_IDENTIFIER_NULL = 255;

export const SPRITE_LIST_NULL = 0;
export const SPRITE_LIST_TRAIN = 1;
export const SPRITE_LIST_PEEP = 2;
export const SPRITE_LIST_MISC = 3;
export const SPRITE_LIST_LITTER = 4;
export const SPRITE_LIST_UNKNOWN = 5;

export const PEEP_STATE_ON_RIDE = 3;
export const PEEP_STATE_ENTERING_RIDE = 7;

export const NEWS_ITEM_NULL = 0;
export const NEWS_TYPE_COUNT = 10;

export type CoordsXYZD = { x: number; y: number; z: number; direction: number };

/** Tile coordinates; z is in coarse height units. */
export type TileCoordsXYZD = CoordsXYZD;

export type TileCoordsXY = { x: number; y: number };

export type PeepSpawn = CoordsXYZD & {
  /** Index of the record this spawn came from. */
  slot: number;
};

export type ParkEntrance = CoordsXYZD;

export type Sprite = {
  identifier: number;
  type: number;
  nextInQuadrant: number;
  next: number;
  previous: number;
  /** Twice the sprite list index. */
  linkedListTypeOffset: number;
  spriteIndex: number;
  flags: number;
  x: number;
  y: number;
  z: number;
  peepState: number;
  peepCurrentRide: number;
  /** Full 256-byte image of the record. */
  bytes: Uint8Array;
};

export type NewsItem = {
  type: number;
  flags: number;
  assoc: number;
  ticks: number;
  monthYear: number;
  day: number;
  text: string;
};

export type Award = { time: number; type: number };

export type ResearchItem = { rawValue: number; category: number };

export type Banner = {
  type: number;
  flags: number;
  stringIdx: number;
  colour: number;
  textColour: number;
  x: number;
  y: number;
};

export type MapAnimation = { baseZ: number; type: number; x: number; y: number };

export type VehicleColour = { body: number; trim: number; ternary: number };

export type TrackColour = { main: number; additional: number; supports: number };

export type RideStation = {
  start: TileCoordsXY | null;
  height: number;
  length: number;
  depart: number;
  trainAtStation: number;
  entrance: TileCoordsXYZD | null;
  exit: TileCoordsXYZD | null;
  lastPeepInQueue: number;
  segmentLength: number;
  segmentTime: number;
  queueTime: number;
  queueLength: number;
};

export type RideRatings = { excitement: number; intensity: number; nausea: number };

export type Ride = {
  id: number;
  type: number;
  subtype: number;
  mode: number;
  colourSchemeType: number;
  vehicleColours: VehicleColour[];
  status: number;
  name: number;
  nameArguments: number;
  overallView: TileCoordsXY | null;
  stations: RideStation[];
  vehicles: number[];
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
  boatHireReturnPosition: TileCoordsXY | null;
  measurementIndex: number;
  specialTrackElements: number;
  maxSpeed: number;
  averageSpeed: number;
  currentTestSegment: number;
  averageSpeedTestTimeout: number;
  maxPositiveVerticalG: number;
  maxNegativeVerticalG: number;
  maxLateralG: number;
  previousVerticalG: number;
  previousLateralG: number;
  testingFlags: number;
  curTestTrackLocation: TileCoordsXY | null;
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
  numCustomers: number[];
  price: number;
  chairliftBullwheelLocation: Array<TileCoordsXY | null>;
  chairliftBullwheelZ: number[];
  ratings: RideRatings;
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
  downtimeHistory: number[];
  noPrimaryItemsSold: number;
  noSecondaryItemsSold: number;
  breakdownSoundModifier: number;
  notFixedTimeout: number;
  lastCrashType: number;
  connectedMessageThrottle: number;
  incomePerHour: number;
  profit: number;
  trackColours: TrackColour[];
  music: number;
  entranceStyle: number;
  vehicleChangeTimeout: number;
  numBlockBrakes: number;
  liftHillSpeed: number;
  guestsFavourite: number;
  lifecycleFlags: number;
  totalAirTime: number;
  currentTestStation: number;
  numCircuits: number;
  cableLiftX: number;
  cableLiftY: number;
  cableLiftZ: number;
  cableLift: number;
};

export type ScenarioObjectEntry = { flags: number; name: string; checksum: number };

export type ScenarioInfo = {
  editorStep: number;
  category: number;
  objectiveType: number;
  objectiveArg1: number;
  objectiveArg2: number;
  objectiveArg3: number;
  name: string;
  details: string;
  entry: ScenarioObjectEntry;
};

export type DateState = {
  monthsElapsed: number;
  monthTicks: number;
  scenarioTicks: number;
  currentTicks: number;
  realTimeTicks: number;
};

export type FinanceState = {
  cash: number;
  initialCash: number;
  bankLoan: number;
  maxBankLoan: number;
  bankLoanInterestRate: number;
  expenditureTable: number[][];
  currentExpenditure: number;
  currentProfit: number;
  weeklyProfitAverageDividend: number;
  weeklyProfitAverageDivisor: number;
  cashHistory: number[];
  weeklyProfitHistory: number[];
  parkValueHistory: number[];
  parkValue: number;
  companyValue: number;
  historicalProfit: number;
  totalAdmissions: number;
  totalIncomeFromAdmissions: number;
  landPrice: number;
  constructionRightsPrice: number;
};

export type ParkState = {
  name: number;
  nameArgs: number;
  flags: number;
  entranceFee: number;
  rating: number;
  ratingHistory: number[];
  guestsInParkHistory: number[];
  ratingCasualtyPenalty: number;
  size: number;
  totalRideValueForMoney: number;
  samePriceThroughoutA: number;
  samePriceThroughoutB: number;
  lastEntranceStyle: number;
  entrances: ParkEntrance[];
  rideCount: number;
  awards: Award[];
  landRemainingOwnershipSales: number;
  landRemainingConstructionSales: number;
};

export type GuestState = {
  inPark: number;
  headingForPark: number;
  inParkLastWeek: number;
  changeModifier: number;
  generationProbability: number;
  suggestedMaximum: number;
  initialHappiness: number;
  initialCash: number;
  initialHunger: number;
  initialThirst: number;
  nextGuestNumber: number;
  warningThrottle: number[];
};

export type ResearchState = {
  fundingLevel: number;
  priorities: number;
  progressStage: number;
  lastItem: ResearchItem;
  nextItem: ResearchItem;
  progress: number;
  expectedDay: number;
  expectedMonth: number;
  items: ResearchItem[];
  /** Researched track type words, kept for saving back out. */
  trackTypesA: number[];
  trackTypesB: number[];
};

export type ObjectiveState = {
  type: number;
  year: number;
  currency: number;
  numGuests: number;
  parkRatingWarningDays: number;
  completedCompanyValue: number;
  companyValueRecord: number;
  completedBy: string;
  scenarioName: string;
  scenarioDetails: string;
  scenarioFileName: string;
  expansionPacks: Uint8Array;
};

export type StaffState = {
  handymanColour: number;
  mechanicColour: number;
  securityColour: number;
  patrolAreas: number[];
  modes: number[];
};

export type WeatherState = {
  weather: number;
  temperature: number;
  weatherEffect: number;
  weatherGloom: number;
  rainLevel: number;
};

export type ClimateState = {
  climate: number;
  updateTimer: number;
  current: WeatherState;
  next: WeatherState;
};

export type MarketingState = {
  campaignWeeksLeft: number[];
  campaignRideIndex: number[];
};

export type MapState = {
  size: number;
  sizeUnits: number;
  sizeMinus2: number;
  sizeMaxXY: number;
  baseZ: number;
  grassSceneryTileLoopPosition: number;
  widePathTileLoopX: number;
  widePathTileLoopY: number;
};

export type SavedView = {
  age: number;
  x: number;
  y: number;
  zoom: number;
  rotation: number;
};
