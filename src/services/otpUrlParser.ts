import { BatchInfo, MigrationExport, OtpData, SkippedEntry } from "../types";
import { MigrationError } from "./errors";
import { logger } from "./logger";
import { convertToOtpData } from "./otpFormatter";
import { decodeMigrationData } from "./protobufProcessor";
import { mapToOtpAccount, RawOtpAccount } from "./otpDataMapper";

export const MIGRATION_URL_PREFIX = "otpauth-migration://";
export const OTP_URL_PREFIX = "otpauth://";

function parseUrl(urlString: string, code: "UnsupportedUrl" | "InvalidOtpUrl"): URL {
  try {
    return new URL(urlString);
  } catch {
    throw new MigrationError(code, `Not a valid URL: ${urlString}`);
  }
}

/**
 * Decodes a standard otpauth:// URL into a single account.
 * This is used for single-account QR codes.
 * @param otpUrlString The full otpauth:// URL.
 */
function decodeStandardOtpAuthUrl(otpUrlString: string): MigrationExport {
  const url = parseUrl(otpUrlString, "InvalidOtpUrl");

  const type = url.hostname.toLowerCase(); // 'totp' or 'hotp'
  if (type !== "totp" && type !== "hotp") {
    throw new MigrationError(
      "InvalidOtpUrl",
      `Unsupported OTP type in URL: ${type}`
    );
  }

  const label = decodeURIComponent(url.pathname.substring(1));
  const params = url.searchParams;

  const secretB32 = params.get("secret");
  if (!secretB32) {
    throw new MigrationError(
      "InvalidOtpUrl",
      "Missing 'secret' parameter in otpauth URL."
    );
  }

  let issuer = params.get("issuer");
  let name = label;

  if (issuer) {
    // If issuer is in params, it's the authority.
    // The label might still contain the issuer. If so, remove it for a cleaner name.
    if (name.startsWith(`${issuer}:`)) {
      name = name.substring(issuer.length + 1).trim();
    }
  } else {
    // If issuer is not in params, try to extract from label "Issuer:Name".
    const parts = label.split(":");
    if (parts.length > 1) {
      issuer = parts[0];
      name = parts.slice(1).join(":").trim();
    }
  }

  const digits = parseInt(params.get("digits") || "6", 10);

  const rawAccount: RawOtpAccount = {
    name: name,
    issuer: issuer || "",
    secret: secretB32,
    algorithm: params.get("algorithm") || "SHA1",
    digits: digits === 8 ? 8 : 6,
    type: type,
  };

  if (type === "hotp") {
    const counterStr = params.get("counter");
    if (!counterStr || !/^\d+$/.test(counterStr)) {
      throw new MigrationError(
        "InvalidOtpUrl",
        "Missing 'counter' parameter for hotp type in otpauth URL."
      );
    }
    rawAccount.counter = BigInt(counterStr);
  }

  return { accounts: [mapToOtpAccount(rawAccount)], skipped: [], batch: {} };
}

/**
 * Extracts the accounts from an authenticator export URL.
 * @param otpUrl An `otpauth-migration://` export URL or a single-account `otpauth://` URL.
 */
export function decodeExportUrl(otpUrl: string): MigrationExport {
  const trimmedUrl = otpUrl.trim();

  if (trimmedUrl.startsWith(OTP_URL_PREFIX)) {
    return decodeStandardOtpAuthUrl(trimmedUrl);
  }

  if (!trimmedUrl.startsWith(MIGRATION_URL_PREFIX)) {
    throw new MigrationError(
      "UnsupportedUrl",
      `Input must start with '${MIGRATION_URL_PREFIX}' or '${OTP_URL_PREFIX}'.`
    );
  }

  const url = parseUrl(trimmedUrl, "UnsupportedUrl");
  const dataBase64 = url.searchParams.get("data");

  if (!dataBase64) {
    throw new MigrationError(
      "MissingData",
      'Invalid OTP URL: Missing "data" parameter.'
    );
  }

  return decodeMigrationData(dataBase64);
}

export interface ExtractedExport {
  /** Every account from every URL, in input order. */
  accounts: OtpData[];
  skipped: SkippedEntry[];
  /** Batch metadata of each URL, in input order. */
  batches: BatchInfo[];
}

/**
 * Decodes one or more export URLs and formats their accounts for display.
 * No accounts is a valid result, not an error.
 */
export function extractAccounts(urls: readonly string[]): ExtractedExport {
  const result: ExtractedExport = { accounts: [], skipped: [], batches: [] };

  for (const url of urls) {
    const decoded = decodeExportUrl(url);
    logger.debug(
      `Decoded ${decoded.accounts.length} account(s), skipped ${decoded.skipped.length}.`,
      decoded.batch
    );
    result.accounts.push(...decoded.accounts.map(convertToOtpData));
    result.skipped.push(...decoded.skipped);
    result.batches.push(decoded.batch);
  }

  return result;
}
