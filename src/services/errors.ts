/**
 * Error taxonomy for decoding migration exports.
 *
 * Errors scoped to the `export` abort the whole decode. Errors scoped to an
 * `account` only drop the one embedded entry they were raised for.
 */

export type MigrationErrorCode =
  | "InvalidBase64"
  | "TruncatedVarint"
  | "TruncatedMessage"
  | "VarintOverflow"
  | "UnsupportedWireType"
  | "InvalidTag"
  | "MissingSecret"
  | "UnsupportedUrl"
  | "MissingData"
  | "InvalidOtpUrl";

export type MigrationErrorScope = "export" | "account";

export class MigrationError extends Error {
  public readonly code: MigrationErrorCode;
  public readonly scope: MigrationErrorScope;
  /** Byte offset into the message being decoded, when known. */
  public readonly offset?: number;

  constructor(
    code: MigrationErrorCode,
    message: string,
    scope: MigrationErrorScope = "export",
    offset?: number
  ) {
    super(message);
    this.name = "MigrationError";
    this.code = code;
    this.scope = scope;
    this.offset = offset;

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, MigrationError.prototype);
  }
}

/**
 * Factory functions for the structural errors raised while reading the
 * protobuf wire format. All of them are fatal to the export.
 */
export const WireError = {
  truncatedVarint: (offset: number) =>
    new MigrationError(
      "TruncatedVarint",
      `Malformed migration payload: varint at byte ${offset} is truncated.`,
      "export",
      offset
    ),

  varintOverflow: (offset: number) =>
    new MigrationError(
      "VarintOverflow",
      `Malformed migration payload: varint at byte ${offset} exceeds 64 bits.`,
      "export",
      offset
    ),

  truncatedMessage: (offset: number, needed: number, remaining: number) =>
    new MigrationError(
      "TruncatedMessage",
      `Malformed migration payload: field at byte ${offset} needs ${needed} bytes but only ${remaining} remain.`,
      "export",
      offset
    ),

  unsupportedWireType: (offset: number, wireType: number) =>
    new MigrationError(
      "UnsupportedWireType",
      `Malformed migration payload: unsupported wire type ${wireType} at byte ${offset}.`,
      "export",
      offset
    ),

  invalidTag: (offset: number) =>
    new MigrationError(
      "InvalidTag",
      `Malformed migration payload: field number 0 at byte ${offset}.`,
      "export",
      offset
    ),
};

export function isMigrationError(error: unknown): error is MigrationError {
  return error instanceof MigrationError;
}
