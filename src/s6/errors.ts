/**
 * Typed error classes raised while importing a legacy park file.
 */

/** Base class for all import errors. */
export class ImportError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ImportError";
  }
}

/** Bad type tag, unexpected record shape or a chunk that decodes to the wrong size. */
export class FormatError extends ImportError {
  constructor(message: string) {
    super(message);
    this.name = "FormatError";
  }
}

/** The checksum trailer does not match the payload. */
export class ChecksumError extends ImportError {
  constructor(
    public readonly expected: number,
    public readonly actual: number,
  ) {
    super(
      `Invalid checksum: file says 0x${expected.toString(16).padStart(8, "0")}, ` +
        `payload sums to 0x${actual.toString(16).padStart(8, "0")}`,
    );
    this.name = "ChecksumError";
  }
}

/** A recognised but unsupported variant, such as the classic compressed save. */
export class UnsupportedFormatError extends ImportError {
  constructor(message: string) {
    super(message);
    this.name = "UnsupportedFormatError";
  }
}

/** The stream ended before a declared length was satisfied. */
export class TruncatedDataError extends ImportError {
  constructor(
    public readonly needed: number,
    public readonly available: number,
  ) {
    super(`Unexpected EOF: need ${needed} bytes, have ${available}`);
    this.name = "TruncatedDataError";
  }
}

/** Raised by an object repository when required objects cannot be loaded. */
export class AssetResolutionError extends ImportError {
  constructor(public readonly missing: ReadonlyArray<string>) {
    super(`Unable to load required objects: ${missing.join(", ")}`);
    this.name = "AssetResolutionError";
  }
}
