/**
 * Maps decoded protobuf fields onto the `MigrationPayload` schema used by
 * authenticator exports (see `proto/otp_migration.proto`).
 */
import {
  BatchInfo,
  MigrationExport,
  OtpAccount,
  OtpAlgorithm,
  OtpType,
  SkippedEntry,
} from "../types";
import { MigrationError } from "./errors";
import { logger } from "./logger";
import { varintToNumber } from "./varint";
import { decodeFields, WireType } from "./wireDecoder";

export const MIGRATION_PAYLOAD_FIELDS = {
  OTP_PARAMETERS: 1,
  VERSION: 2,
  BATCH_SIZE: 3,
  BATCH_INDEX: 4,
  BATCH_ID: 5,
} as const;

export const OTP_PARAMETER_FIELDS = {
  SECRET: 1,
  NAME: 2,
  ISSUER: 3,
  ALGORITHM: 4,
  DIGITS: 5,
  TYPE: 6,
  COUNTER: 7,
} as const;

const ALGORITHM_VALUE_MAP: { [key: number]: OtpAlgorithm } = {
  1: "SHA1",
  2: "SHA256",
  3: "SHA512",
  4: "MD5",
};

const DIGITS_VALUE_MAP: { [key: number]: 6 | 8 } = {
  1: 6, // DIGIT_COUNT_SIX
  2: 8, // DIGIT_COUNT_EIGHT
};

const TYPE_VALUE_MAP: { [key: number]: OtpType } = {
  1: "HOTP",
  2: "TOTP",
};

const textDecoder = new TextDecoder();

/**
 * Decodes one embedded `OtpParameters` message.
 * @param bytes The body of the embedded message.
 * @param entry 1-based position of the message, used in error messages.
 * @throws {MigrationError} `MissingSecret` (account scope) when the entry has no secret.
 */
export function decodeOtpParameters(
  bytes: Uint8Array,
  entry: number
): OtpAccount {
  let secret: Uint8Array | undefined;
  let name = "";
  let issuer = "";
  let algorithmValue = 0;
  let digitsValue = 0;
  let typeValue = 0;
  let counter: bigint | undefined;

  for (const field of decodeFields(bytes)) {
    if (field.wireType === WireType.LengthDelimited) {
      switch (field.fieldNumber) {
        case OTP_PARAMETER_FIELDS.SECRET:
          secret = field.value;
          break;
        case OTP_PARAMETER_FIELDS.NAME:
          name = textDecoder.decode(field.value);
          break;
        case OTP_PARAMETER_FIELDS.ISSUER:
          issuer = textDecoder.decode(field.value);
          break;
      }
    } else if (field.wireType === WireType.Varint) {
      switch (field.fieldNumber) {
        case OTP_PARAMETER_FIELDS.ALGORITHM:
          algorithmValue = varintToNumber(field.value);
          break;
        case OTP_PARAMETER_FIELDS.DIGITS:
          digitsValue = varintToNumber(field.value);
          break;
        case OTP_PARAMETER_FIELDS.TYPE:
          typeValue = varintToNumber(field.value);
          break;
        case OTP_PARAMETER_FIELDS.COUNTER:
          counter = field.value;
          break;
      }
    }
  }

  if (!secret || secret.length === 0) {
    throw new MigrationError(
      "MissingSecret",
      `Malformed account entry #${entry}: no secret.`,
      "account"
    );
  }

  const type = TYPE_VALUE_MAP[typeValue] ?? "UNSPECIFIED";
  const account: OtpAccount = {
    // Detach from the payload buffer.
    secret: new Uint8Array(secret),
    name,
    issuer,
    type,
    typeValue,
    algorithm: ALGORITHM_VALUE_MAP[algorithmValue] ?? "UNSPECIFIED",
    digits: DIGITS_VALUE_MAP[digitsValue] ?? 6,
  };
  if (type === "HOTP") {
    account.counter = counter ?? 0n;
  }
  return account;
}

/**
 * Decodes a complete `MigrationPayload` message.
 * Entries without a secret are dropped and reported in `skipped`; any
 * structural error aborts the decode.
 * @param bytes The raw protobuf payload.
 */
export function mapMigrationPayload(bytes: Uint8Array): MigrationExport {
  const accounts: OtpAccount[] = [];
  const skipped: SkippedEntry[] = [];
  const batch: BatchInfo = {};
  let entry = 0;

  for (const field of decodeFields(bytes)) {
    if (
      field.fieldNumber === MIGRATION_PAYLOAD_FIELDS.OTP_PARAMETERS &&
      field.wireType === WireType.LengthDelimited
    ) {
      entry++;
      try {
        accounts.push(decodeOtpParameters(field.value, entry));
      } catch (error) {
        if (error instanceof MigrationError && error.scope === "account") {
          logger.warn(`Skipping account entry #${entry}: ${error.message}`);
          skipped.push({ entry, error });
          continue;
        }
        throw error;
      }
    } else if (field.wireType === WireType.Varint) {
      // The metadata fields are int32: negative values arrive sign-extended to 64 bits.
      const value = Number(BigInt.asIntN(32, field.value));
      switch (field.fieldNumber) {
        case MIGRATION_PAYLOAD_FIELDS.VERSION:
          batch.version = value;
          break;
        case MIGRATION_PAYLOAD_FIELDS.BATCH_SIZE:
          batch.batchSize = value;
          break;
        case MIGRATION_PAYLOAD_FIELDS.BATCH_INDEX:
          batch.batchIndex = value;
          break;
        case MIGRATION_PAYLOAD_FIELDS.BATCH_ID:
          batch.batchId = value;
          break;
      }
    } else {
      logger.debug(
        `Ignoring top-level field ${field.fieldNumber} (wire type ${field.wireType}).`
      );
    }
  }

  return { accounts, skipped, batch };
}
