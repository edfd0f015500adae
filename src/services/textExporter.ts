import { OtpData } from "../types";

const NONE = "(none)";

/**
 * Renders one account as an "Account #N" block followed by a blank line.
 * @param otp The account to render.
 * @param index 1-based account number.
 */
export function formatAccountBlock(otp: OtpData, index: number): string {
  const lines = [
    `Account #${index}`,
    `  Name   : ${otp.name || NONE}`,
    `  Issuer : ${otp.issuer || NONE}`,
    `  Type   : ${otp.type === "UNSPECIFIED" ? "(unknown)" : otp.type}`,
    `  Digits : ${otp.digits}`,
    `  Period : ${otp.period === "" ? "(n/a)" : otp.period}`,
  ];
  if (otp.type === "HOTP") {
    lines.push(`  Counter: ${otp.counter}`);
  }
  lines.push(`  Secret : ${otp.secret}`);

  return lines.join("\n") + "\n\n";
}

/**
 * Renders every account, numbered from 1 in the order given.
 */
export function formatAsText(otps: OtpData[]): string {
  return otps.map((otp, i) => formatAccountBlock(otp, i + 1)).join("");
}
