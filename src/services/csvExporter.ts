import { OtpData } from "../types";

export const CSV_HEADERS: (keyof OtpData)[] = [
  "name",
  "secret",
  "issuer",
  "type",
  "typeDescription",
  "algorithm",
  "digits",
  "period",
  "counter",
  "url",
];

export const escapeCsvField = (field: string | number): string => {
  const str = String(field);
  if (
    str.includes(",") ||
    str.includes('"') ||
    str.includes("\n") ||
    str.includes("\r")
  ) {
    return `"${str.replace(/"/g, '""')}"`;
  }
  return str;
};

/**
 * Renders accounts as CSV with a header row. Rows end in `\n`.
 */
export function formatAsCsv(otps: OtpData[]): string {
  const csvRows = [
    CSV_HEADERS.join(","),
    ...otps.map((otp) =>
      CSV_HEADERS.map((header) => escapeCsvField(otp[header])).join(",")
    ),
  ];

  return csvRows.join("\n") + "\n";
}
