import { AppConfig, loadEnvConfig } from "./config";
import { UsageError } from "./errors";
import { resolveRecord } from "./lookup";
import { createFetcher, RecordFetcher } from "./scraper";
import { RecordStore } from "./store/RecordStore";
import { SQLiteRecordStore } from "./store/sqlite";
import { LandRecordKey } from "./types";
import { log } from "./utils/logger";

export interface CliArgs {
  key: LandRecordKey;
  forceRefresh: boolean;
}

export const USAGE = `Usage: land-record --district_name <name> --sub_district_name <name>
                   --village_name <name> --khasra_no <number> [--force_refresh]

Looks up a land record in the local database, scraping the Jamabandi portal
when it is missing or --force_refresh is given.

Example:
  land-record --district_name 'नुह' --sub_district_name 'नगीना' \\
              --village_name 'F. pur dehar' --khasra_no '1//17'
`;

const STRING_FLAGS = {
  "--district_name": "district_name",
  "--sub_district_name": "sub_district_name",
  "--village_name": "village_name",
  "--khasra_no": "khasra_no",
} as const;

function isStringFlag(flag: string): flag is keyof typeof STRING_FLAGS {
  return Object.prototype.hasOwnProperty.call(STRING_FLAGS, flag);
}

/** Returns "help" when --help/-h is present. */
export function parseArgs(argv: string[]): CliArgs | "help" {
  const values: Partial<LandRecordKey> = {};
  let forceRefresh = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const eq = arg.indexOf("=");
    const flag = arg.startsWith("--") && eq > 0 ? arg.slice(0, eq) : arg;
    const inline = flag === arg ? undefined : arg.slice(eq + 1);

    if (flag === "--help" || flag === "-h") {
      return "help";
    }
    if (flag === "--force_refresh") {
      if (inline !== undefined) {
        throw new UsageError("--force_refresh does not take a value");
      }
      forceRefresh = true;
      continue;
    }
    if (!isStringFlag(flag)) {
      throw new UsageError(`Unknown argument: ${arg}`);
    }

    let value = inline;
    if (value === undefined) {
      const next = argv[i + 1];
      if (next !== undefined && !next.startsWith("--")) {
        value = next;
        i++;
      }
    }
    if (!value) {
      throw new UsageError(`${flag} requires a value`);
    }
    values[STRING_FLAGS[flag]] = value;
  }

  const { district_name, sub_district_name, village_name, khasra_no } = values;
  if (!district_name || !sub_district_name || !village_name || !khasra_no) {
    const missing = Object.entries(STRING_FLAGS)
      .filter(([, field]) => !values[field])
      .map(([flag]) => flag);
    throw new UsageError(`Missing required arguments: ${missing.join(", ")}`);
  }

  return {
    key: { district_name, sub_district_name, village_name, khasra_no },
    forceRefresh,
  };
}

export interface CliDeps {
  loadConfig: () => AppConfig;
  openStore: (config: AppConfig) => RecordStore;
  createFetcher: (config: AppConfig) => RecordFetcher;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

const defaultDeps: CliDeps = {
  loadConfig: loadEnvConfig,
  openStore: (config) => new SQLiteRecordStore(config.databasePath),
  createFetcher,
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

/**
 * Runs one lookup and resolves to the process exit code:
 * 0 on success, 1 on store/fetch failures, 2 on bad arguments or configuration.
 */
export async function run(argv: string[], overrides: Partial<CliDeps> = {}): Promise<number> {
  const deps: CliDeps = { ...defaultDeps, ...overrides };

  let args: CliArgs | "help";
  try {
    args = parseArgs(argv);
  } catch (err) {
    if (!(err instanceof UsageError)) throw err;
    deps.stderr(`${err.message}\n\n${USAGE}`);
    return 2;
  }
  if (args === "help") {
    deps.stdout(USAGE);
    return 0;
  }

  const { key, forceRefresh } = args;
  log({ stage: "inputs", ...key, force_refresh: forceRefresh });

  let store: RecordStore | undefined;
  try {
    const config = deps.loadConfig();
    store = deps.openStore(config);
    const { record, source } = await resolveRecord(
      key,
      { store, fetcher: deps.createFetcher(config) },
      forceRefresh
    );
    log({ stage: "resolved", source, id: record.id });
    deps.stdout(`${JSON.stringify(record, null, 2)}\n`);
    return 0;
  } catch (err) {
    const name = err instanceof Error ? err.name : "Error";
    const message = err instanceof Error ? err.message : String(err);
    log({ stage: "fatal_error", error: name, message });
    deps.stderr(`${name}: ${message}\n`);
    return err instanceof UsageError ? 2 : 1;
  } finally {
    await store?.close();
  }
}
