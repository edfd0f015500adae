import { OtpAccount, OtpData, OtpType } from "../types";
import { encodeBase32Unpadded } from "./base32";

/** Authenticator exports do not carry a period; every TOTP app uses 30 seconds. */
export const DEFAULT_PERIOD = 30;

const TYPE_DESCRIPTIONS: Record<OtpType, string> = {
  TOTP: "Time-based (TOTP)",
  HOTP: "Counter-based (HOTP)",
  UNSPECIFIED: "Unspecified",
};

/**
 * Builds the standard `otpauth://` URL for an account, or an empty string
 * when the account's type is unknown.
 */
export function buildOtpAuthUrl(account: OtpAccount, secretText: string): string {
  if (account.type === "UNSPECIFIED") {
    return "";
  }
  const key = account.type.toLowerCase();
  // The label for the otpauth URL is just the account name. The issuer is a separate parameter.
  const encodedLabel = encodeURIComponent(account.name || "N/A");

  const params = new URLSearchParams({
    secret: secretText,
  });
  if (account.issuer) {
    params.set("issuer", account.issuer);
  }

  // Add algorithm if it's not the default (SHA1)
  if (account.algorithm !== "SHA1" && account.algorithm !== "UNSPECIFIED") {
    params.set("algorithm", account.algorithm);
  }

  // Add digits if it's not the default (6)
  if (account.digits !== 6) {
    params.set("digits", String(account.digits));
  }

  if (account.type === "HOTP") {
    params.set("counter", String(account.counter ?? 0n));
  }

  return `otpauth://${key}/${encodedLabel}?${params.toString()}`;
}

/**
 * Converts a decoded account into its presentation form, with the secret as
 * unpadded Base32 text and a generated URL.
 * @param account The decoded account.
 * @returns A formatted OtpData object.
 */
export function convertToOtpData(account: OtpAccount): OtpData {
  const secretText = encodeBase32Unpadded(account.secret);
  const isHotp = account.type === "HOTP";

  return {
    name: account.name,
    issuer: account.issuer,
    type: account.type,
    typeDescription: TYPE_DESCRIPTIONS[account.type],
    algorithm: account.algorithm,
    digits: account.digits,
    period: isHotp ? "" : DEFAULT_PERIOD,
    counter: isHotp ? String(account.counter ?? 0n) : "",
    secret: secretText,
    url: buildOtpAuthUrl(account, secretText),
  };
}
