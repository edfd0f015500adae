import type { MigrationError } from "./services/errors";

export type OtpType = "TOTP" | "HOTP" | "UNSPECIFIED";

export type OtpAlgorithm = "SHA1" | "SHA256" | "SHA512" | "MD5" | "UNSPECIFIED";

/**
 * One decoded account. Created once per embedded `OtpParameters` message and
 * never modified afterwards.
 */
export interface OtpAccount {
  /** Raw secret bytes. Never empty. */
  secret: Uint8Array;
  name: string;
  issuer: string;
  type: OtpType;
  /** The numeric `type` value as it appeared in the payload (0 when absent). */
  typeValue: number;
  algorithm: OtpAlgorithm;
  digits: 6 | 8;
  /** Only set for HOTP accounts. */
  counter?: bigint;
}

/** Top-level metadata of a migration payload. Exports split over several QR codes share a batchId. */
export interface BatchInfo {
  version?: number;
  batchSize?: number;
  batchIndex?: number;
  batchId?: number;
}

export interface SkippedEntry {
  /** 1-based position of the embedded message in the payload. */
  entry: number;
  error: MigrationError;
}

export interface MigrationExport {
  /** In the order the entries appear in the payload. */
  accounts: OtpAccount[];
  skipped: SkippedEntry[];
  batch: BatchInfo;
}

/**
 * The presentation form of an account, with the secret as Base32 text.
 */
export interface OtpData {
  name: string;
  issuer: string;
  type: OtpType;
  typeDescription: string;
  algorithm: OtpAlgorithm;
  digits: 6 | 8;
  period: 30 | "";
  counter: string;
  secret: string;
  url: string;
}
