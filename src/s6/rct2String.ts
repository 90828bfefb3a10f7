// src/s6/rct2String.ts
//
// Legacy single-byte park text. Bytes map to Latin-1 except for the glyphs
// below; 0xFF introduces a two-byte big-endian code unit.

const RCT2_SPECIAL: ReadonlyMap<number, number> = new Map([
  [0x9f, 0x0104], // Ą
  [0xa0, 0x25b2], // ▲
  [0xa2, 0x0106], // Ć
  [0xa6, 0x0118], // Ę
  [0xa7, 0x0141], // Ł
  [0xaa, 0x25bc], // ▼
  [0xac, 0x2713], // ✓
  [0xad, 0x274c], // ❌
  [0xaf, 0x25b6], // ▶
  [0xb4, 0x201c], // “
  [0xb5, 0x20ac], // €
  [0xba, 0x2022], // •
  [0xbb, 0x25b4], // ▴
  [0xbc, 0x25be], // ▾
  [0xbd, 0x25c0], // ◀
]);

const MULTIBYTE_PREFIX = 0xff;

export const FORMAT_COLOUR_FIRST = 142;
export const FORMAT_COLOUR_LAST = 156;
const FORMAT_CODE_FIRST = 123;

/** Format codes: control range plus 123..156; colours are 142..156. */
export function isFormatCode(cp: number): boolean {
  return cp < 32 || (cp >= FORMAT_CODE_FIRST && cp <= FORMAT_COLOUR_LAST);
}

export function isColourCode(cp: number): boolean {
  return cp >= FORMAT_COLOUR_FIRST && cp <= FORMAT_COLOUR_LAST;
}

/** True when the bytes hold a UTF-8 encoded colour code (C2 8E .. C2 9C). */
export function containsUtf8ColourCode(bytes: Uint8Array): boolean {
  for (let i = 0; i + 1 < bytes.length; i++) {
    const next = bytes[i + 1] ?? 0;
    if (bytes[i] === 0xc2 && isColourCode(next)) return true;
  }
  return false;
}

export function decodeRct2(bytes: Uint8Array): string {
  let out = "";
  for (let i = 0; i < bytes.length; i++) {
    const b = bytes[i] ?? 0;
    if (b === 0) break;
    if (b === MULTIBYTE_PREFIX) {
      const hi = bytes[i + 1] ?? 0;
      const lo = bytes[i + 2] ?? 0;
      // truncated sequence ends the string
      if (hi === 0 || lo === 0) break;
      out += String.fromCharCode((hi << 8) | lo);
      i += 2;
      continue;
    }
    out += String.fromCodePoint(RCT2_SPECIAL.get(b) ?? b);
  }
  return out;
}

export function decodeUtf8(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString("utf8");
}

/**
 * Byte-preserving string form of raw legacy text, used between migration and
 * the string conversion pass.
 */
export function toByteString(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString("latin1");
}

export function fromByteString(text: string): Uint8Array {
  return Uint8Array.from(Buffer.from(text, "latin1"));
}

export function convertByteString(text: string): string {
  return decodeRct2(fromByteString(text));
}

export function removeFormatting(text: string, allowColours: boolean): string {
  let out = "";
  for (const ch of text) {
    const cp = ch.codePointAt(0) ?? 0;
    if (isFormatCode(cp) && !(allowColours && isColourCode(cp))) continue;
    out += ch;
  }
  return out;
}

/** Longest prefix whose UTF-8 form fits in `maxBytes`, cut on a character boundary. */
export function truncateUtf8(text: string, maxBytes: number): string {
  let out = "";
  let used = 0;
  for (const ch of text) {
    const n = Buffer.byteLength(ch, "utf8");
    if (used + n > maxBytes) break;
    out += ch;
    used += n;
  }
  return out;
}
