// src/s6/importer.ts
import { readFileSync } from "node:fs";

import { DEFAULT_IMPORTER_CONFIG, type ImporterConfig } from "./config.js";
import { kindFromPath, type RawObjectEntry } from "./header.js";
import type { S6Kind } from "./layout.js";
import { makeLogger, type ImportLogger, type WarnFn } from "./log.js";
import type { ObjectRepository, ScenarioCatalogSource, ScenarioDetails } from "./objectRepository.js";
import { readParkFile, type ParsedParkFile } from "./parkFile.js";
import { applyQuirks, BUILTIN_QUIRKS, type QuirkTable } from "./quirks.js";
import { toByteString } from "./rct2String.js";
import { repairWorld, type RepairReport } from "./repair.js";
import { importResearchBitmaps, type InventedCounts } from "./researchBitmaps.js";
import { migrateFields } from "./fieldMigrator.js";
import { importTileRecord } from "./tileDecoder.js";
import { WorldState } from "../world/worldState.js";

export type ImportPhase =
  | "idle"
  | "headerRead"
  | "chunksLoaded"
  | "migrated"
  | "repaired"
  | "done"
  | "failed";

export type ParkLoadResult = Readonly<{
  kind: S6Kind;
  /** All 721 object slots, empty ones included. */
  requiredObjects: ReadonlyArray<RawObjectEntry>;
}>;

export type ImportResult = Readonly<{
  scenarioFileName: string;
  quirkApplied: boolean;
  invented: InventedCounts;
  repair: RepairReport;
}>;

export type S6ImporterOptions = {
  config?: Partial<ImporterConfig>;
  quirks?: QuirkTable;
  warn?: WarnFn;
  verbose?: WarnFn;
};

/**
 * Two-phase importer for `.sc6` scenarios and `.sv6` saved games: `load`
 * parses the file and reports the objects it needs, `import` writes it into a
 * world. Any error moves the importer to `failed` and is rethrown.
 */
export class S6Importer implements ScenarioCatalogSource {
  private state: ImportPhase = "idle";
  private failure: unknown;
  private parsed: ParsedParkFile | undefined;
  private filePath = "";
  private readonly config: ImporterConfig;
  private readonly quirks: QuirkTable;
  private readonly log: ImportLogger;

  public constructor(
    private readonly objects: ObjectRepository,
    opts: S6ImporterOptions = {},
  ) {
    this.config = { ...DEFAULT_IMPORTER_CONFIG, ...opts.config };
    this.quirks = opts.quirks ?? BUILTIN_QUIRKS;
    this.log = makeLogger(opts);
  }

  public get phase(): ImportPhase {
    return this.state;
  }

  /** The error that moved the importer to `failed`, if any. */
  public get error(): unknown {
    return this.failure;
  }

  public get parsedFile(): ParsedParkFile | undefined {
    return this.parsed;
  }

  /** Dispatches on the extension: `.sc6` is a scenario, `.sv6` a saved game. */
  public load(filePath: string): ParkLoadResult {
    return this.run(() => {
      const kind = kindFromPath(filePath);
      return this.loadBytes(readFileSync(filePath), kind, filePath);
    });
  }

  public loadScenario(filePath: string): ParkLoadResult {
    return this.run(() => this.loadBytes(readFileSync(filePath), "scenario", filePath));
  }

  public loadSavedGame(filePath: string): ParkLoadResult {
    return this.run(() => this.loadBytes(readFileSync(filePath), "savedGame", filePath));
  }

  public loadFromBuffer(bytes: Buffer, isScenario: boolean, filePath = ""): ParkLoadResult {
    return this.run(() => this.loadBytes(bytes, isScenario ? "scenario" : "savedGame", filePath));
  }

  public import(world: WorldState): ImportResult {
    return this.run(() => {
      const parsed = this.parsed;
      if (parsed === undefined) throw new Error("import() called before a park was loaded");

      migrateFields(parsed, world, { filePath: this.filePath, warn: this.log.warn });
      world.tileElements = parsed.tiles.map((raw, i) => importTileRecord(raw, i));
      world.updateTilePointers();
      const invented = importResearchBitmaps(parsed.park.research, world.invented);
      this.state = "migrated";

      const scenarioFileName = toByteString(parsed.park.scenarioFilename);
      const quirkApplied = applyQuirks(this.quirks, scenarioFileName, world, this.log.warn);
      if (quirkApplied) this.log.verbose(`Applied compatibility fix for '${scenarioFileName}'`);

      const repair = repairWorld(world, this.log);
      this.state = "repaired";

      this.state = "done";
      return { scenarioFileName, quirkApplied, invented, repair };
    });
  }

  /** Parks carry no catalog entry of their own. */
  public getDetails(): ScenarioDetails | undefined {
    return undefined;
  }

  private loadBytes(bytes: Buffer, kind: S6Kind, filePath: string): ParkLoadResult {
    this.state = "idle";
    this.parsed = undefined;
    this.failure = undefined;

    const parsed = readParkFile(bytes, kind, {
      validateChecksum: this.config.validateChecksum,
      onHeader: () => {
        this.state = "headerRead";
      },
      onPackedObject: (entry, data) => this.objects.exportPackedObject(entry, data),
      verbose: this.log.verbose,
    });

    this.parsed = parsed;
    this.filePath = filePath;
    this.state = "chunksLoaded";
    return { kind, requiredObjects: parsed.objects };
  }

  private run<T>(fn: () => T): T {
    try {
      return fn();
    } catch (e) {
      this.state = "failed";
      this.failure = e;
      throw e;
    }
  }
}

export type LoadParkDeps = {
  objects: ObjectRepository;
  world?: WorldState;
  config?: Partial<ImporterConfig>;
  quirks?: QuirkTable;
  warn?: WarnFn;
  verbose?: WarnFn;
};

export type LoadedPark = Readonly<{
  world: WorldState;
  load: ParkLoadResult;
  result: ImportResult;
}>;

/** load → resolve objects (unless skipped) → import. */
export function loadPark(filePath: string, deps: LoadParkDeps): LoadedPark {
  const config: ImporterConfig = { ...DEFAULT_IMPORTER_CONFIG, ...deps.config };
  const importer = new S6Importer(deps.objects, {
    config,
    quirks: deps.quirks ?? BUILTIN_QUIRKS,
    warn: deps.warn,
    verbose: deps.verbose,
  });
  const load = importer.load(filePath);
  if (!config.skipObjectCheck) deps.objects.loadObjects(load.requiredObjects);
  const world = deps.world ?? new WorldState({ spriteCapacity: config.spriteCapacity });
  const result = importer.import(world);
  return { world, load, result };
}
