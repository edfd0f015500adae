import { decode as thirtyTwoDecode } from "thirty-two";
import { OtpAccount, OtpAlgorithm } from "../types";
import { MigrationError } from "./errors";

const KNOWN_ALGORITHMS: readonly OtpAlgorithm[] = [
  "SHA1",
  "SHA256",
  "SHA512",
  "MD5",
];

const BASE32_SECRET = /^[A-Z2-7]+=*$/i;

// A plain account description, as carried by a single `otpauth://` URL.
export interface RawOtpAccount {
  name: string;
  issuer: string;
  secret: string; // Base32 encoded
  algorithm: string;
  digits: 6 | 8;
  type: "totp" | "hotp";
  counter?: bigint;
}

function toAlgorithm(algorithm: string): OtpAlgorithm {
  const upper = algorithm.toUpperCase();
  return KNOWN_ALGORITHMS.find((known) => known === upper) ?? "UNSPECIFIED";
}

/**
 * Converts a raw account description into the canonical OtpAccount.
 * @throws {MigrationError} `InvalidOtpUrl` when the secret is not Base32 or
 * decodes to no bytes.
 */
export function mapToOtpAccount(acc: RawOtpAccount): OtpAccount {
  const secretB32 = acc.secret.trim();
  // thirty-two maps characters outside the alphabet to arbitrary bits.
  if (!BASE32_SECRET.test(secretB32)) {
    throw new MigrationError(
      "InvalidOtpUrl",
      "Invalid otpauth URL: the secret is not valid Base32."
    );
  }

  const secretBytes = new Uint8Array(thirtyTwoDecode(secretB32.toUpperCase()));
  if (secretBytes.length === 0) {
    throw new MigrationError(
      "InvalidOtpUrl",
      "Invalid otpauth URL: the secret is empty."
    );
  }

  const isHotp = acc.type === "hotp";
  const account: OtpAccount = {
    secret: secretBytes,
    name: acc.name,
    issuer: acc.issuer,
    type: isHotp ? "HOTP" : "TOTP",
    typeValue: isHotp ? 1 : 2,
    algorithm: toAlgorithm(acc.algorithm),
    digits: acc.digits,
  };
  if (isHotp) {
    account.counter = acc.counter ?? 0n;
  }
  return account;
}
