export * from "./types";
export { MigrationError, isMigrationError } from "./services/errors";
export type { MigrationErrorCode, MigrationErrorScope } from "./services/errors";
export { readVarint, MAX_VARINT_BYTES } from "./services/varint";
export { decodeFields, WireType } from "./services/wireDecoder";
export type { DecodedField } from "./services/wireDecoder";
export {
  mapMigrationPayload,
  decodeOtpParameters,
} from "./services/migrationPayloadMapper";
export { encodeBase32, encodeBase32Unpadded } from "./services/base32";
export {
  base64ToUint8Array,
  decodeMigrationData,
  decodeProtobufPayload,
} from "./services/protobufProcessor";
export { decodeExportUrl, extractAccounts } from "./services/otpUrlParser";
export type { ExtractedExport } from "./services/otpUrlParser";
export { convertToOtpData, buildOtpAuthUrl } from "./services/otpFormatter";
export { formatAsText } from "./services/textExporter";
export { formatAsJson } from "./services/jsonExporter";
export { formatAsCsv } from "./services/csvExporter";
export { logger, setDebugLogging } from "./services/logger";
