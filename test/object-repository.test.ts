import { describe, expect, it } from "vitest";
import { mkdir, mkdtemp, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { AssetResolutionError } from "../src/s6/errors.js";
import type { RawObjectEntry } from "../src/s6/header.js";
import { DirectoryObjectRepository, InMemoryObjectRepository } from "../src/s6/objectRepository.js";

function entry(name: string, flags = 0): RawObjectEntry {
  return { flags, name: name.padEnd(8, " "), checksum: 0 };
}

const EMPTY = entry("", 0xffffffff);

describe("InMemoryObjectRepository", () => {
  it("matches identifiers without regard to case and skips empty slots", () => {
    const repo = new InMemoryObjectRepository(["ride01"]);
    repo.loadObjects([entry("RIDE01"), EMPTY, entry("Ride01")]);
    expect(repo.loadedIdentifiers).toEqual(["RIDE01", "Ride01"]);
  });

  it("names each missing object once", () => {
    const repo = new InMemoryObjectRepository();
    expect(() => repo.loadObjects([entry("A"), entry("B"), entry("A")])).toThrow(
      "Unable to load required objects: A, B",
    );
    expect(() => repo.loadObjects([entry("A")])).toThrow(AssetResolutionError);
  });

  it("learns packed objects", () => {
    const repo = new InMemoryObjectRepository();
    repo.exportPackedObject(entry("PACKED"), Buffer.from([9]));
    expect(repo.has("packed")).toBe(true);
    expect(repo.packedObject("PACKED")).toEqual(Buffer.from([9]));
  });
});

describe("DirectoryObjectRepository", () => {
  it("knows every .DAT file in the directory", async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), "park-importer-objects-"));
    await writeFile(path.join(dir, "RIDE01.DAT"), "");
    await writeFile(path.join(dir, "shop01.dat"), "");
    await writeFile(path.join(dir, "README.txt"), "");
    await mkdir(path.join(dir, "NESTED.DAT"));

    const repo = new DirectoryObjectRepository(dir);
    expect(repo.has("RIDE01")).toBe(true);
    expect(repo.has("SHOP01")).toBe(true);
    expect(repo.has("README")).toBe(false);
    expect(repo.has("NESTED")).toBe(false);
  });
});
