import { describe, expect, it } from "vitest";
import { mkdtemp, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { DEFAULT_IMPORTER_CONFIG, parseImporterConfig, readImporterConfig } from "../src/s6/config.js";

describe("parseImporterConfig", () => {
  it("fills in defaults", () => {
    expect(parseImporterConfig({})).toEqual(DEFAULT_IMPORTER_CONFIG);
    expect(DEFAULT_IMPORTER_CONFIG).toEqual({ validateChecksum: true, skipObjectCheck: false, spriteCapacity: 10000 });
  });

  it("accepts overrides", () => {
    expect(parseImporterConfig({ validateChecksum: false, spriteCapacity: 20000 })).toEqual({
      validateChecksum: false,
      skipObjectCheck: false,
      spriteCapacity: 20000,
    });
  });

  it("rejects malformed input", () => {
    expect(() => parseImporterConfig(null)).toThrow("Invalid config: expected object");
    expect(() => parseImporterConfig([])).toThrow("Invalid config: expected object");
    expect(() => parseImporterConfig({ skipObjectCheck: "yes" })).toThrow(
      "Invalid skipObjectCheck: expected boolean",
    );
    expect(() => parseImporterConfig({ spriteCapacity: 9999 })).toThrow(
      "Invalid spriteCapacity: expected integer in [10000, 65534]",
    );
    expect(() => parseImporterConfig({ spriteCapacity: 10000.5 })).toThrow(
      "Invalid spriteCapacity: expected integer in [10000, 65534]",
    );
  });
});

describe("readImporterConfig", () => {
  it("reads a JSON file", async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), "park-importer-config-"));
    const file = path.join(dir, "importer.json");
    await writeFile(file, JSON.stringify({ skipObjectCheck: true }), "utf8");

    await expect(readImporterConfig(file)).resolves.toEqual({
      validateChecksum: true,
      skipObjectCheck: true,
      spriteCapacity: 10000,
    });
  });
});
