import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import fs from "fs";
import path from "path";
import { decodeExportUrl, extractAccounts } from "../src/services/otpUrlParser";
import { convertToOtpData } from "../src/services/otpFormatter";
import { encodeBase32 } from "../src/services/base32";
import { catchMigrationError } from "./helpers/errors";
import { buildMigrationUrl, textBytes } from "./helpers/migrationPayload";

const readFixture = (name: string) =>
  fs.readFileSync(path.join(__dirname, "data", name), "utf-8").trim();

// Load the migration URLs, skipping the comment lines.
const migrationUrls = readFixture("example_export.txt")
  .split("\n")
  .filter((line) => line.startsWith("otpauth-migration://"));

describe("decodeExportUrl", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should decode the example single-account export", () => {
    const { accounts, skipped, batch } = decodeExportUrl(migrationUrls[0]);
    expect(accounts).toHaveLength(1);
    expect(skipped).toEqual([]);
    expect(batch).toEqual({ version: 1, batchSize: 1, batchIndex: 0, batchId: 123456789 });

    const formattedData = convertToOtpData(accounts[0]);
    expect(formattedData.name).toBe("ExampleAccount");
    expect(formattedData.issuer).toBe("ExampleCorp");
    expect(formattedData.type).toBe("TOTP");
    expect(formattedData.digits).toBe(6);
    expect(formattedData.period).toBe(30);
    expect(formattedData.secret).toBe(
      "IJAVESCPKIZUEVBWGVLVUR2DGNEFATKUJVAUEWCTINHFIWSWLBRQ"
    );
    expect(encodeBase32(accounts[0].secret)).toBe(
      "IJAVESCPKIZUEVBWGVLVUR2DGNEFATKUJVAUEWCTINHFIWSWLBRQ===="
    );
  });

  it("should decode a multi-account export in order", () => {
    const { accounts, batch } = decodeExportUrl(migrationUrls[1]);
    const formatted = accounts.map(convertToOtpData);

    expect(formatted.map((otp) => otp.name)).toEqual(["alice@example.com", "bob", "carol"]);
    expect(formatted.map((otp) => otp.url)).toEqual([
      "otpauth://totp/alice%40example.com?secret=MFWHA2DBFVZWKY3SMV2C2MBQGAYQ&issuer=Alpha",
      "otpauth://totp/bob?secret=AAAQEAYEAUDAOCAJ",
      "otpauth://totp/carol?secret=777P37H3&issuer=Gamma&algorithm=SHA512&digits=8",
    ]);
    expect(formatted[1].issuer).toBe("");
    expect(formatted[1].algorithm).toBe("UNSPECIFIED");
    expect(batch).toEqual({ version: 1, batchSize: 2, batchIndex: 1, batchId: 7 });
  });

  it("should decode an HOTP account", () => {
    const [account] = decodeExportUrl(migrationUrls[2]).accounts;
    const formattedData = convertToOtpData(account);

    expect(formattedData.type).toBe("HOTP");
    expect(formattedData.counter).toBe("42");
    expect(formattedData.url).toBe(
      "otpauth://hotp/deploy?secret=NBXXI4BNNNSXSLJRGIZQ&issuer=CI&algorithm=SHA256&digits=8&counter=42"
    );
  });

  it("should drop only the entry that has no secret", () => {
    const { accounts, skipped } = decodeExportUrl(migrationUrls[3]);

    expect(accounts.map((a) => a.name)).toEqual(["kept"]);
    expect(convertToOtpData(accounts[0]).secret).toBe("ONSWG33OMQ");
    expect(skipped.map((s) => [s.entry, s.error.code])).toEqual([[1, "MissingSecret"]]);
  });

  it("should ignore fields outside the known schema", () => {
    const { accounts, batch } = decodeExportUrl(migrationUrls[4]);

    expect(accounts).toHaveLength(1);
    expect(accounts[0].name).toBe("extra");
    expect(convertToOtpData(accounts[0]).secret).toBe("OVXGW3TPO5XC2ZTJMVWGI4Y");
    expect(batch).toEqual({ version: 1 });
  });

  it("should decode payloads encoded by protobufjs", () => {
    const url = buildMigrationUrl({
      otpParameters: [
        { secret: textBytes("first"), name: "one", type: 2, digits: 1, algorithm: 1 },
        { secret: textBytes("second"), name: "two", type: 2, digits: 2, algorithm: 3 },
      ],
      version: 1,
      batchSize: 1,
      batchIndex: 0,
      batchId: 99,
    });

    const { accounts } = decodeExportUrl(url);
    expect(accounts.map((a) => [a.name, a.digits, a.algorithm])).toEqual([
      ["one", 6, "SHA1"],
      ["two", 8, "SHA512"],
    ]);
  });

  it("should correctly parse a URL with space characters in the data parameter", () => {
    // The Base64 `+` characters were replaced by spaces.
    const { accounts } = decodeExportUrl(readFixture("test_plus_problem_export.txt"));
    expect(accounts).toHaveLength(1);
    expect(accounts[0].name).toBe("spaced");
    expect(convertToOtpData(accounts[0]).secret).toBe("FN7PQPQP4A");
  });

  it("should decode a standard otpauth URL", () => {
    const { accounts } = decodeExportUrl(
      "otpauth://totp/TestService:test%40example.com?secret=JBSWY3DPEHPK3PXP&algorithm=SHA256&digits=8"
    );

    expect(accounts).toHaveLength(1);
    const formattedData = convertToOtpData(accounts[0]);
    expect(formattedData.name).toBe("test@example.com");
    expect(formattedData.issuer).toBe("TestService");
    expect(formattedData.secret).toBe("JBSWY3DPEHPK3PXP");
    expect(formattedData.algorithm).toBe("SHA256");
    expect(formattedData.digits).toBe(8);
  });

  it("should reject an otpauth secret with characters outside Base32", () => {
    const error = catchMigrationError(() =>
      decodeExportUrl("otpauth://totp/x?secret=JBSW!!3DP")
    );
    expect(error.code).toBe("InvalidOtpUrl");
    expect(error.message).toBe("Invalid otpauth URL: the secret is not valid Base32.");
  });

  it("should accept a lowercase otpauth secret", () => {
    const { accounts } = decodeExportUrl("otpauth://totp/x?secret=nbswy3dp");
    expect(convertToOtpData(accounts[0]).secret).toBe("NBSWY3DP");
  });

  it("should require a counter for otpauth hotp URLs", () => {
    const error = catchMigrationError(() =>
      decodeExportUrl("otpauth://hotp/deploy?secret=JBSWY3DPEHPK3PXP")
    );
    expect(error.code).toBe("InvalidOtpUrl");
    expect(error.message).toBe("Missing 'counter' parameter for hotp type in otpauth URL.");
  });
});

describe("Error Handling and Edge Cases in otpUrlParser", () => {
  it("should fail with InvalidBase64 for a URL with invalid base64 data", () => {
    const error = catchMigrationError(() =>
      decodeExportUrl(readFixture("test_export_wrong_data.txt"))
    );
    expect(error.code).toBe("InvalidBase64");
  });

  it("should fail with TruncatedMessage for a cut-off payload", () => {
    const error = catchMigrationError(() =>
      decodeExportUrl(readFixture("test_export_truncated.txt"))
    );
    expect(error.code).toBe("TruncatedMessage");
    expect(error.scope).toBe("export");
  });

  it("should throw an error for a URL missing the 'data' parameter", () => {
    const error = catchMigrationError(() =>
      decodeExportUrl("otpauth-migration://offline?foo=bar")
    );
    expect(error.code).toBe("MissingData");
    expect(error.message).toBe('Invalid OTP URL: Missing "data" parameter.');
  });

  it("should throw an error for a URL with an invalid prefix", () => {
    const error = catchMigrationError(() =>
      decodeExportUrl(readFixture("test_export_wrong_prefix.txt"))
    );
    expect(error.code).toBe("UnsupportedUrl");
    expect(error.message).toBe(
      "Input must start with 'otpauth-migration://' or 'otpauth://'."
    );
  });
});

describe("extractAccounts", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should combine the accounts of several URLs in input order", () => {
    const result = extractAccounts([migrationUrls[0], migrationUrls[2]]);

    expect(result.accounts.map((otp) => otp.name)).toEqual(["ExampleAccount", "deploy"]);
    expect(result.batches).toHaveLength(2);
    expect(result.skipped).toEqual([]);
  });

  it("should return an empty result when every entry lacks a secret", () => {
    const url = buildMigrationUrl({ otpParameters: [{ name: "a" }, { name: "b" }] });
    const result = extractAccounts([url]);

    expect(result.accounts).toEqual([]);
    expect(result.skipped.map((s) => s.entry)).toEqual([1, 2]);
  });
});
