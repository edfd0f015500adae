import { MigrationExport } from "../types";
import { MigrationError } from "./errors";
import { logger } from "./logger";
import { mapMigrationPayload } from "./migrationPayloadMapper";

/**
 * Decodes Base64 text into bytes.
 * @throws {MigrationError} `InvalidBase64` when the text is not valid Base64.
 */
export function base64ToUint8Array(base64: string): Uint8Array {
  // The `+` character is often replaced with a space in URL parameters.
  // Some exporters also use the URL-safe alphabet.
  const base64Fixed = base64
    .replace(/ /g, "+")
    .replace(/-/g, "+")
    .replace(/_/g, "/");

  let binaryString: string;
  try {
    binaryString = atob(base64Fixed);
  } catch (error) {
    logger.debug("atob rejected migration data:", error);
    throw new MigrationError(
      "InvalidBase64",
      "Malformed migration export: the data parameter is not valid Base64."
    );
  }

  const len = binaryString.length;
  const bytes = new Uint8Array(len);
  for (let i = 0; i < len; i++) {
    bytes[i] = binaryString.charCodeAt(i);
  }
  return bytes;
}

/** Helper for debugging to convert a Uint8Array to a hex string. */
export const toHexString = (bytes: Uint8Array) =>
  bytes.reduce((str, byte) => str + byte.toString(16).padStart(2, "0"), "");

/**
 * Decodes the raw protobuf payload of a migration export.
 * @param protobufData The raw protobuf binary data.
 */
export function decodeProtobufPayload(protobufData: Uint8Array): MigrationExport {
  try {
    return mapMigrationPayload(protobufData);
  } catch (error) {
    logger.debug(
      "Protobuf Decode Error. Offending data (hex):",
      toHexString(protobufData)
    );
    throw error;
  }
}

/**
 * Decodes the Base64 `data` value of an `otpauth-migration://` URL. The value
 * must already be URL-decoded.
 */
export function decodeMigrationData(dataBase64: string): MigrationExport {
  const protobufData = base64ToUint8Array(dataBase64);
  logger.debug(`Decoded ${protobufData.length} bytes of migration data.`);
  return decodeProtobufPayload(protobufData);
}
