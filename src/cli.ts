import { once } from "node:events";
import { createInterface } from "node:readline/promises";
import { OtpData } from "./types";
import { isMigrationError } from "./services/errors";
import { formatAsCsv } from "./services/csvExporter";
import { formatAsJson } from "./services/jsonExporter";
import { formatAsText } from "./services/textExporter";
import { extractAccounts } from "./services/otpUrlParser";
import { logger, setDebugLogging } from "./services/logger";

export type OutputFormat = "text" | "json" | "csv";

const FORMATTERS: Record<OutputFormat, (otps: OtpData[]) => string> = {
  text: formatAsText,
  json: formatAsJson,
  csv: formatAsCsv,
};

export interface CliOptions {
  urls: string[];
  format: OutputFormat;
  debug: boolean;
  help: boolean;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export const HELP_TEXT = `Usage: otp-migration-decode [options] [url...]

Decodes otpauth-migration:// export URLs and prints each account's secret.
When no URL is given, one is read from an interactive prompt.

Options:
  -f, --format <text|json|csv>   Output format (default: text)
  --debug                        Log decoding details to stderr
  -h, --help                     Show this help`;

function isOutputFormat(value: string): value is OutputFormat {
  return value === "text" || value === "json" || value === "csv";
}

export function parseArgs(args: readonly string[]): CliOptions {
  const options: CliOptions = {
    urls: [],
    format: "text",
    debug: process.env.OTP_DEBUG_LOGGING === "true",
    help: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "-h" || arg === "--help") {
      options.help = true;
    } else if (arg === "--debug") {
      options.debug = true;
    } else if (arg === "-f" || arg === "--format" || arg.startsWith("--format=")) {
      const value = arg.startsWith("--format=")
        ? arg.slice("--format=".length)
        : args[++i];
      if (value === undefined || !isOutputFormat(value)) {
        throw new UsageError(
          `--format expects one of text, json, csv (got ${value ?? "nothing"})`
        );
      }
      options.format = value;
    } else if (arg.startsWith("-")) {
      throw new UsageError(`unknown option: ${arg}`);
    } else {
      options.urls.push(arg);
    }
  }

  return options;
}

async function promptForUrl(input: NodeJS.ReadableStream): Promise<string> {
  const rl = createInterface({ input, output: process.stderr });
  // The question never settles when input ends without a line.
  const closed = once(rl, "close").then(() => null);
  try {
    const answer = await Promise.race([
      rl.question("otpauth-migration URL: "),
      closed,
    ]);
    if (answer === null) {
      throw new UsageError("no URL given");
    }
    return answer.trim();
  } catch (error) {
    if (error instanceof Error && error.name === "AbortError") {
      throw new UsageError("no URL given");
    }
    throw error;
  } finally {
    rl.close();
  }
}

function reportUsageError(error: UsageError): number {
  logger.error(`error: ${error.message}`);
  logger.error(HELP_TEXT);
  return 2;
}

/**
 * Runs the decoder and returns the process exit code.
 */
export async function run(
  args: readonly string[],
  write: (text: string) => void = (text) => process.stdout.write(text),
  input: NodeJS.ReadableStream = process.stdin
): Promise<number> {
  let options: CliOptions;
  try {
    options = parseArgs(args);
  } catch (error) {
    if (error instanceof UsageError) {
      return reportUsageError(error);
    }
    throw error;
  }

  if (options.help) {
    write(HELP_TEXT + "\n");
    return 0;
  }
  setDebugLogging(options.debug);

  let urls = options.urls;
  if (urls.length === 0) {
    try {
      urls = [await promptForUrl(input)];
    } catch (error) {
      if (error instanceof UsageError) {
        return reportUsageError(error);
      }
      throw error;
    }
  }

  try {
    const { accounts, skipped } = extractAccounts(urls);
    if (skipped.length > 0) {
      logger.warn(`${skipped.length} account entry(s) had no secret and were skipped.`);
    }
    if (accounts.length === 0) {
      logger.warn("No accounts found in migration payload.");
      return 0;
    }
    write(FORMATTERS[options.format](accounts));
    return 0;
  } catch (error) {
    if (isMigrationError(error)) {
      logger.error(`Error: ${error.message}`);
      logger.debug(`Error code: ${error.code}`);
      return 1;
    }
    throw error;
  }
}

