// src/s6/header.ts
import path from "node:path";

import { BinaryReader } from "./binary.js";
import { FormatError, UnsupportedFormatError } from "./errors.js";
import {
  CLASSIC_FLAG_UNSUPPORTED,
  HEADER_SIZE,
  OBJECT_ENTRY_COUNT,
  OBJECT_ENTRY_SIZE,
  SCENARIO_INFO_SIZE,
  S6_TYPE_SAVED_GAME,
  S6_TYPE_SCENARIO,
  layoutFor,
  type LayoutDescriptor,
  type S6Kind,
} from "./layout.js";

export type RawHeader = Readonly<{
  type: number;
  classicFlag: number;
  numPackedObjects: number;
  version: number;
  magicNumber: number;
}>;

export type RawObjectEntry = Readonly<{
  flags: number;
  /** 8 ASCII characters, space padded. */
  name: string;
  checksum: number;
}>;

export type RawScenarioInfo = Readonly<{
  editorStep: number;
  category: number;
  objectiveType: number;
  objectiveArg1: number;
  objectiveArg2: number;
  objectiveArg3: number;
  name: Uint8Array;
  details: Uint8Array;
  entry: RawObjectEntry;
}>;

export type RawDateBlock = Readonly<{
  elapsedMonths: number;
  currentDay: number;
  scenarioTicks: number;
  srand0: number;
  srand1: number;
}>;

export const OBJECT_ENTRY_EMPTY_FLAGS = 0xffffffff;

/** Bytes of a fixed-size character array up to (not including) the first NUL. */
export function readFixedString(r: BinaryReader, size: number): Uint8Array {
  const bytes = r.readBytes(size);
  const end = bytes.indexOf(0);
  return Uint8Array.from(end === -1 ? bytes : bytes.subarray(0, end));
}

export function readObjectEntry(r: BinaryReader): RawObjectEntry {
  const flags = r.readU32LE();
  const name = r.readBytes(8).toString("latin1");
  const checksum = r.readU32LE();
  return { flags, name, checksum };
}

export function isEmptyObjectEntry(entry: RawObjectEntry): boolean {
  return entry.flags === OBJECT_ENTRY_EMPTY_FLAGS;
}

/** Identifier used when asking the object repository for a definition. */
export function objectEntryIdentifier(entry: RawObjectEntry): string {
  return entry.name.replace(/[\s\0]+$/, "");
}

export function decodeHeader(bytes: Buffer): RawHeader {
  if (bytes.length !== HEADER_SIZE) {
    throw new FormatError(`Header must be ${HEADER_SIZE} bytes, got ${bytes.length}`);
  }
  const r = new BinaryReader(bytes);
  return {
    type: r.readU8(),
    classicFlag: r.readU8(),
    numPackedObjects: r.readU16LE(),
    version: r.readU32LE(),
    magicNumber: r.readU32LE(),
  };
}

export function decodeScenarioInfo(bytes: Buffer): RawScenarioInfo {
  if (bytes.length !== SCENARIO_INFO_SIZE) {
    throw new FormatError(`Scenario info must be ${SCENARIO_INFO_SIZE} bytes, got ${bytes.length}`);
  }
  const r = new BinaryReader(bytes);
  const editorStep = r.readU8();
  const category = r.readU8();
  const objectiveType = r.readU8();
  const objectiveArg1 = r.readU8();
  const objectiveArg2 = r.readI32LE();
  const objectiveArg3 = r.readI16LE();
  r.skip(0x3e);
  const name = readFixedString(r, 64);
  const details = readFixedString(r, 256);
  const entry = readObjectEntry(r);
  return {
    editorStep,
    category,
    objectiveType,
    objectiveArg1,
    objectiveArg2,
    objectiveArg3,
    name,
    details,
    entry,
  };
}

export function decodeObjectEntries(bytes: Buffer): RawObjectEntry[] {
  if (bytes.length !== OBJECT_ENTRY_COUNT * OBJECT_ENTRY_SIZE) {
    throw new FormatError(`Object table has unexpected size ${bytes.length}`);
  }
  return new BinaryReader(bytes).readArray(OBJECT_ENTRY_COUNT, readObjectEntry);
}

export function decodeDateBlock(bytes: Buffer): RawDateBlock {
  const r = new BinaryReader(bytes);
  return {
    elapsedMonths: r.readU16LE(),
    currentDay: r.readU16LE(),
    scenarioTicks: r.readU32LE(),
    srand0: r.readU32LE(),
    srand1: r.readU32LE(),
  };
}

/** Picks the layout from the file extension (`.sc6` or `.sv6`, any case). */
export function kindFromPath(filePath: string): S6Kind {
  const ext = path.extname(filePath).toLowerCase();
  if (ext === ".sc6") return "scenario";
  if (ext === ".sv6") return "savedGame";
  throw new FormatError(`Invalid park extension '${ext || filePath}' (expected .sc6 or .sv6)`);
}

/**
 * Checks the header against the layout the caller asked for. Unknown type
 * tags and the classic compressed variant are unsupported; a known tag for the
 * other layout is a format error.
 */
export function selectLayout(header: RawHeader, kind: S6Kind): LayoutDescriptor {
  if (header.type !== S6_TYPE_SCENARIO && header.type !== S6_TYPE_SAVED_GAME) {
    throw new UnsupportedFormatError(`Unknown park type tag ${header.type}`);
  }
  if (header.classicFlag === CLASSIC_FLAG_UNSUPPORTED) {
    throw new UnsupportedFormatError(
      `Classic compressed saves (flag 0x${header.classicFlag.toString(16)}) are not supported`,
    );
  }

  const layout = layoutFor(kind);
  if (header.type !== layout.headerType) {
    throw new FormatError(
      kind === "scenario" ? "Park is not a scenario." : "Park is not a saved game.",
    );
  }
  return layout;
}
