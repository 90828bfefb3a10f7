import { describe, expect, it } from "vitest";

import { FormatError, UnsupportedFormatError } from "../src/s6/errors.js";
import { layoutFor } from "../src/s6/layout.js";
import {
  decodeHeader,
  isEmptyObjectEntry,
  kindFromPath,
  objectEntryIdentifier,
  selectLayout,
} from "../src/s6/header.js";

function header(type: number, classicFlag = 0): Buffer {
  const buf = Buffer.alloc(32);
  buf.writeUInt8(type, 0);
  buf.writeUInt8(classicFlag, 1);
  buf.writeUInt16LE(2, 2);
  buf.writeUInt32LE(120001, 4);
  buf.writeUInt32LE(0xdeadbeef, 8);
  return buf;
}

describe("decodeHeader", () => {
  it("reads every field", () => {
    expect(decodeHeader(header(1))).toEqual({
      type: 1,
      classicFlag: 0,
      numPackedObjects: 2,
      version: 120001,
      magicNumber: 0xdeadbeef,
    });
  });

  it("rejects the wrong size", () => {
    expect(() => decodeHeader(Buffer.alloc(31))).toThrow(FormatError);
  });
});

describe("selectLayout", () => {
  it("matches the type tag to the requested kind", () => {
    expect(selectLayout(decodeHeader(header(1)), "scenario").hasScenarioInfo).toBe(true);
    expect(selectLayout(decodeHeader(header(0)), "savedGame").parkChunks).toHaveLength(1);
  });

  it("hands back the layout descriptor for the kind", () => {
    expect(selectLayout(decodeHeader(header(1)), "scenario")).toBe(layoutFor("scenario"));
    expect(selectLayout(decodeHeader(header(0)), "savedGame")).toBe(layoutFor("savedGame"));
  });

  it("rejects the other known kind as a format error", () => {
    expect(() => selectLayout(decodeHeader(header(1)), "savedGame")).toThrow("Park is not a saved game.");
    expect(() => selectLayout(decodeHeader(header(0)), "scenario")).toThrow("Park is not a scenario.");
  });

  it("rejects unknown tags and classic saves as unsupported", () => {
    expect(() => selectLayout(decodeHeader(header(2)), "scenario")).toThrow(UnsupportedFormatError);
    expect(() => selectLayout(decodeHeader(header(0, 0x0f)), "savedGame")).toThrow(UnsupportedFormatError);
  });
});

describe("kindFromPath", () => {
  it("reads the extension in any case", () => {
    expect(kindFromPath("/x/Park.SC6")).toBe("scenario");
    expect(kindFromPath("park.sv6")).toBe("savedGame");
  });

  it("rejects anything else", () => {
    expect(() => kindFromPath("park")).toThrow("Invalid park extension 'park' (expected .sc6 or .sv6)");
  });
});

describe("object entries", () => {
  it("trims the padded identifier", () => {
    expect(objectEntryIdentifier({ flags: 0, name: "TOILETS ", checksum: 0 })).toBe("TOILETS");
    expect(isEmptyObjectEntry({ flags: 0xffffffff, name: "        ", checksum: 0 })).toBe(true);
    expect(isEmptyObjectEntry({ flags: 0, name: "TOILETS ", checksum: 0 })).toBe(false);
  });
});
