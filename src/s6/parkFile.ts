// src/s6/parkFile.ts
//
// Phase one of an import: turns file bytes into raw records. Nothing here
// touches a WorldState.

import { BinaryReader } from "./binary.js";
import {
  decodeDateBlock,
  decodeHeader,
  decodeObjectEntries,
  decodeScenarioInfo,
  readObjectEntry,
  selectLayout,
  type RawDateBlock,
  type RawHeader,
  type RawObjectEntry,
  type RawScenarioInfo,
} from "./header.js";
import {
  DATE_BLOCK_SIZE,
  HEADER_SIZE,
  OBJECTS_SIZE,
  OBJECT_ENTRY_SIZE,
  PARK_DATA_SIZE,
  SCENARIO_INFO_SIZE,
  TILE_ELEMENTS_SIZE,
  type LayoutDescriptor,
  type S6Kind,
} from "./layout.js";
import { silent, type WarnFn } from "./log.js";
import { decodeParkData, splitTileRecords, type RawParkData, type RawTileRecord } from "./rawRecords.js";
import { SawyerChunkReader, validateChecksum } from "./sawyerChunk.js";

export type PackedObjectSink = (entry: RawObjectEntry, data: Buffer) => void;

export type ReadParkFileOptions = {
  validateChecksum?: boolean;
  onPackedObject?: PackedObjectSink;
  /** Called once the header has been checked against the layout. */
  onHeader?: (header: RawHeader, layout: LayoutDescriptor) => void;
  verbose?: WarnFn;
};

export type ParsedParkFile = Readonly<{
  kind: S6Kind;
  layout: LayoutDescriptor;
  header: RawHeader;
  scenarioInfo: RawScenarioInfo | undefined;
  objects: ReadonlyArray<RawObjectEntry>;
  date: RawDateBlock;
  tiles: ReadonlyArray<RawTileRecord>;
  park: RawParkData;
}>;

function readFixedChunk(chunks: SawyerChunkReader, size: number): Buffer {
  const out = Buffer.alloc(size);
  chunks.readChunk(out, size);
  return out;
}

/**
 * Scenario files split the park region into several chunks that land at fixed
 * offsets; gaps between them stay zero. Saved games store it whole.
 */
function readParkRegion(chunks: SawyerChunkReader, layout: LayoutDescriptor): Buffer {
  const region = Buffer.alloc(PARK_DATA_SIZE);
  for (const chunk of layout.parkChunks) {
    chunks.readChunk(region.subarray(chunk.offset, chunk.offset + chunk.size), chunk.size);
  }
  return region;
}

export function readParkFile(
  bytes: Buffer,
  kind: S6Kind,
  opts: ReadParkFileOptions = {},
): ParsedParkFile {
  const verbose = opts.verbose ?? silent;

  // both layouts carry the trailer, so saved games are checked as well
  if (opts.validateChecksum ?? true) validateChecksum(bytes);

  const r = new BinaryReader(bytes);
  const chunks = new SawyerChunkReader(r);

  const header = decodeHeader(readFixedChunk(chunks, HEADER_SIZE));
  verbose(`classic flag = 0x${header.classicFlag.toString(16).padStart(2, "0")}`);
  const layout = selectLayout(header, kind);
  opts.onHeader?.(header, layout);

  const scenarioInfo = layout.hasScenarioInfo
    ? decodeScenarioInfo(readFixedChunk(chunks, SCENARIO_INFO_SIZE))
    : undefined;

  for (let i = 0; i < header.numPackedObjects; i++) {
    const entry = readObjectEntry(new BinaryReader(r.readBytes(OBJECT_ENTRY_SIZE)));
    const data = chunks.readChunkBytes();
    verbose(`packed object ${i}: ${entry.name} (${data.length} bytes)`);
    opts.onPackedObject?.(entry, data);
  }

  const objects = decodeObjectEntries(readFixedChunk(chunks, OBJECTS_SIZE));
  const date = decodeDateBlock(readFixedChunk(chunks, DATE_BLOCK_SIZE));
  const tiles = splitTileRecords(readFixedChunk(chunks, TILE_ELEMENTS_SIZE));
  const park = decodeParkData(readParkRegion(chunks, layout));

  return { kind, layout, header, scenarioInfo, objects, date, tiles, park };
}
