import { OtpData } from "../types";

/**
 * Renders accounts as a formatted JSON array.
 */
export function formatAsJson(otps: OtpData[]): string {
  // The `null, 2` arguments format the JSON with an indent of 2 spaces for readability.
  return JSON.stringify(otps, null, 2) + "\n";
}
