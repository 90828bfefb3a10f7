// src/s6/config.ts
import { readFile } from "node:fs/promises";

export type ImporterConfig = {
  /** Reject files whose checksum trailer does not match. */
  validateChecksum: boolean;
  /** Skip asking the object repository for the park's objects. */
  skipObjectCheck: boolean;
  /** Sprite slots in the destination world (at least 10000). */
  spriteCapacity: number;
};

export const DEFAULT_IMPORTER_CONFIG: Readonly<ImporterConfig> = {
  validateChecksum: true,
  skipObjectCheck: false,
  spriteCapacity: 10000,
};

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function parseOptionalBool(input: Record<string, unknown>, key: string, fallback: boolean): boolean {
  const v = input[key];
  if (v === undefined) return fallback;
  if (typeof v !== "boolean") throw new Error(`Invalid ${key}: expected boolean`);
  return v;
}

function parseOptionalInt(
  input: Record<string, unknown>,
  key: string,
  min: number,
  max: number,
  fallback: number,
): number {
  const v = input[key];
  if (v === undefined) return fallback;
  if (typeof v !== "number" || !Number.isInteger(v) || v < min || v > max) {
    throw new Error(`Invalid ${key}: expected integer in [${min}, ${max}]`);
  }
  return v;
}

export function parseImporterConfig(input: unknown): ImporterConfig {
  if (!isRecord(input)) throw new Error("Invalid config: expected object");
  return {
    validateChecksum: parseOptionalBool(input, "validateChecksum", DEFAULT_IMPORTER_CONFIG.validateChecksum),
    skipObjectCheck: parseOptionalBool(input, "skipObjectCheck", DEFAULT_IMPORTER_CONFIG.skipObjectCheck),
    spriteCapacity: parseOptionalInt(
      input,
      "spriteCapacity",
      DEFAULT_IMPORTER_CONFIG.spriteCapacity,
      0xfffe,
      DEFAULT_IMPORTER_CONFIG.spriteCapacity,
    ),
  };
}

export async function readImporterConfig(filePath: string): Promise<ImporterConfig> {
  const text = await readFile(filePath, "utf8");
  const parsed: unknown = JSON.parse(text);
  return parseImporterConfig(parsed);
}
