// src/s6/summary.ts
import { isEmptyObjectEntry, objectEntryIdentifier } from "./header.js";
import type { ImportResult } from "./importer.js";
import type { ParsedParkFile } from "./parkFile.js";
import { migrateScenarioInfo } from "./fieldMigrator.js";
import { toByteString } from "./rct2String.js";
import type { TileElement } from "../world/tileElement.js";
import { NEWS_ITEM_NULL } from "../world/types.js";
import type { WorldState } from "../world/worldState.js";

export type ParkFileSummary = {
  kind: string;
  version: number;
  numPackedObjects: number;
  scenarioName?: string;
  scenarioFileName: string;
  mapSize: number;
  requiredObjects: string[];
};

export type RideSummary = {
  id: number;
  type: number;
  status: number;
  numStations: number;
  numRiders: number;
};

export type WorldSummary = {
  scenario: { name: string; details: string; fileName: string; completedBy: string };
  date: { monthsElapsed: number; monthTicks: number; scenarioTicks: number };
  map: { size: number; tileElements: Record<string, number> };
  finance: { cash: number; bankLoan: number; maxBankLoan: number; parkValue: number; companyValue: number };
  park: {
    rating: number;
    entranceFee: number;
    guestsInPark: number;
    entrances: number;
    peepSpawns: Array<{ x: number; y: number; z: number; direction: number }>;
    landOwnershipForSale: number;
    constructionRightsForSale: number;
  };
  rides: RideSummary[];
  invented: { rideTypes: number; rideEntries: number; sceneryItems: number };
  newsItems: number;
  quirkApplied: boolean;
  repair: ImportResult["repair"];
};

export function summarizeParkFile(parsed: ParsedParkFile): ParkFileSummary {
  const out: ParkFileSummary = {
    kind: parsed.kind,
    version: parsed.header.version,
    numPackedObjects: parsed.header.numPackedObjects,
    scenarioFileName: toByteString(parsed.park.scenarioFilename),
    mapSize: parsed.park.mapSize,
    requiredObjects: parsed.objects.filter((e) => !isEmptyObjectEntry(e)).map(objectEntryIdentifier),
  };
  if (parsed.scenarioInfo) out.scenarioName = migrateScenarioInfo(parsed.scenarioInfo).name;
  return out;
}

export function countTileElements(elements: ReadonlyArray<TileElement>): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const el of elements) counts[el.kind] = (counts[el.kind] ?? 0) + 1;
  return counts;
}

export function summarizeWorld(world: WorldState, result: ImportResult): WorldSummary {
  return {
    scenario: {
      name: world.objective.scenarioName,
      details: world.objective.scenarioDetails,
      fileName: world.objective.scenarioFileName,
      completedBy: world.objective.completedBy,
    },
    date: {
      monthsElapsed: world.date.monthsElapsed,
      monthTicks: world.date.monthTicks,
      scenarioTicks: world.date.scenarioTicks,
    },
    map: { size: world.map.size, tileElements: countTileElements(world.tileElements) },
    finance: {
      cash: world.finance.cash,
      bankLoan: world.finance.bankLoan,
      maxBankLoan: world.finance.maxBankLoan,
      parkValue: world.finance.parkValue,
      companyValue: world.finance.companyValue,
    },
    park: {
      rating: world.park.rating,
      entranceFee: world.park.entranceFee,
      guestsInPark: world.guests.inPark,
      entrances: world.park.entrances.length,
      peepSpawns: world.peepSpawns.map(({ x, y, z, direction }) => ({ x, y, z, direction })),
      landOwnershipForSale: world.park.landRemainingOwnershipSales,
      constructionRightsForSale: world.park.landRemainingConstructionSales,
    },
    rides: world.activeRides().map((r) => ({
      id: r.id,
      type: r.type,
      status: r.status,
      numStations: r.numStations,
      numRiders: r.numRiders,
    })),
    invented: { ...result.invented },
    newsItems: world.newsItems.filter((n) => n.type !== NEWS_ITEM_NULL).length,
    quirkApplied: result.quirkApplied,
    repair: result.repair,
  };
}

export function stringifySummary(summary: ParkFileSummary | WorldSummary): string {
  return JSON.stringify(summary, null, 2) + "\n";
}
