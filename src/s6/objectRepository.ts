// src/s6/objectRepository.ts
import { readdirSync } from "node:fs";
import path from "node:path";

import { AssetResolutionError } from "./errors.js";
import { isEmptyObjectEntry, objectEntryIdentifier, type RawObjectEntry } from "./header.js";

/** Source of object definitions a park refers to. */
export interface ObjectRepository {
  /** Receives an object definition embedded in the park file. */
  exportPackedObject(entry: RawObjectEntry, data: Buffer): void;
  /**
   * Makes the listed objects available; empty slots are ignored.
   * @throws AssetResolutionError naming every identifier it cannot supply
   */
  loadObjects(entries: ReadonlyArray<RawObjectEntry>): void;
}

export type ScenarioDetails = Readonly<{
  name: string;
  details: string;
  category: number;
  objectiveType: number;
}>;

export interface ScenarioCatalogSource {
  getDetails(): ScenarioDetails | undefined;
}

function key(id: string): string {
  return id.toUpperCase();
}

export class InMemoryObjectRepository implements ObjectRepository {
  private readonly known = new Set<string>();
  private readonly packed = new Map<string, Buffer>();
  private loaded: string[] = [];

  public constructor(knownIdentifiers: Iterable<string> = []) {
    for (const id of knownIdentifiers) this.known.add(key(id));
  }

  public exportPackedObject(entry: RawObjectEntry, data: Buffer): void {
    const id = objectEntryIdentifier(entry);
    this.known.add(key(id));
    this.packed.set(key(id), Buffer.from(data));
  }

  public loadObjects(entries: ReadonlyArray<RawObjectEntry>): void {
    const wanted = entries.filter((e) => !isEmptyObjectEntry(e)).map(objectEntryIdentifier);
    const missing = [...new Set(wanted.filter((id) => !this.known.has(key(id))))];
    if (missing.length > 0) throw new AssetResolutionError(missing);
    this.loaded = wanted;
  }

  public has(identifier: string): boolean {
    return this.known.has(key(identifier));
  }

  public packedObject(identifier: string): Buffer | undefined {
    return this.packed.get(key(identifier));
  }

  public get loadedIdentifiers(): ReadonlyArray<string> {
    return this.loaded;
  }
}

/** Knows every object whose `<NAME>.DAT` file sits in `dir` (not recursive). */
export class DirectoryObjectRepository extends InMemoryObjectRepository {
  public constructor(dir: string) {
    super(
      readdirSync(dir, { withFileTypes: true })
        .filter((e) => e.isFile() && path.extname(e.name).toLowerCase() === ".dat")
        .map((e) => path.basename(e.name, path.extname(e.name))),
    );
  }
}
