import { LogLevel, parseLogLevel } from "../adapters/structured-logger.js";
import { ConfigurationError } from "../errors.js";
import type { WScrapeOptions } from "../types/config.js";

export const DEFAULT_INTERVAL_MS = 60_000;

export interface CliConfig {
  options: WScrapeOptions;
  logLevel: LogLevel;
}

export type CliCommand = { kind: "run"; config: CliConfig } | { kind: "help" };

export const HELP_TEXT = `
  wscrape: record who is logged in on a remote host

  Usage: wscrape [options]

  Options:
    --store-url <url>          mysql:// URL of the store (jdbc:mysql:// accepted)
    --host <name>              Remote host, reached over SSH on port 22
    --interval <ms>            Pause between captures (default: ${DEFAULT_INTERVAL_MS})
    --store-credentials <path> JSON file with {"user", "pass"} for the store
    --ssh-credentials <path>   JSON file with {"user", "pass"} for SSH
    --log-level <level>        debug, info, warn or error (default: info)
    --verbose, -v              Same as --log-level debug
    --help, -h                 Show this help
`;

/** Parse `process.argv`. Field validation is left to resolveOptions(). */
export function parseCliArgs(argv: readonly string[]): CliCommand {
  let storeUrl: string | undefined;
  let sshHost: string | undefined;
  let storeCredentialsPath: string | undefined;
  let sshCredentialsPath: string | undefined;
  let captureIntervalMs = DEFAULT_INTERVAL_MS;
  let logLevel = LogLevel.INFO;

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];
    const value = (): string => {
      const next = argv[++i];
      if (next === undefined || next.startsWith("--")) {
        throw new ConfigurationError(`${arg} requires a value`);
      }
      return next;
    };

    switch (arg) {
      case "--store-url":
        storeUrl = value();
        break;
      case "--host":
        sshHost = value();
        break;
      case "--interval": {
        const raw = value();
        if (!/^\d+$/.test(raw)) {
          throw new ConfigurationError(`--interval requires a number of milliseconds, got "${raw}"`);
        }
        captureIntervalMs = Number(raw);
        break;
      }
      case "--store-credentials":
        storeCredentialsPath = value();
        break;
      case "--ssh-credentials":
        sshCredentialsPath = value();
        break;
      case "--log-level": {
        const raw = value();
        const parsed = parseLogLevel(raw);
        if (parsed === undefined) throw new ConfigurationError(`Unknown log level: ${raw}`);
        logLevel = parsed;
        break;
      }
      case "--verbose":
      case "-v":
        logLevel = LogLevel.DEBUG;
        break;
      case "--help":
      case "-h":
        return { kind: "help" };
      default:
        throw new ConfigurationError(`Unknown option: ${arg}\nRun with --help for usage.`);
    }
  }

  if (
    storeUrl === undefined ||
    sshHost === undefined ||
    storeCredentialsPath === undefined ||
    sshCredentialsPath === undefined
  ) {
    const required: [string, string | undefined][] = [
      ["--store-url", storeUrl],
      ["--host", sshHost],
      ["--store-credentials", storeCredentialsPath],
      ["--ssh-credentials", sshCredentialsPath],
    ];
    const missing = required.filter(([, v]) => v === undefined).map(([flag]) => flag);
    throw new ConfigurationError(`Missing required option(s): ${missing.join(", ")}`);
  }

  return {
    kind: "run",
    config: {
      options: { storeUrl, sshHost, captureIntervalMs, storeCredentialsPath, sshCredentialsPath },
      logLevel,
    },
  };
}
