import path from "node:path";
import {
  countItems,
  createProjectRouter,
  monthWindow,
  normalizeArchiveRows,
  normalizeFeedEvents,
  parseMonth,
  resolvePublicUrl,
  runPipeline,
  type RawEvent
} from "@monthly-digest/core";
import { BigQueryArchiveClient } from "@monthly-digest/provider-bigquery";
import { GithubFeedClient, type FeedFetchOptions } from "@monthly-digest/provider-github";
import { renderMonthlyDigest } from "@monthly-digest/renderer-rst";
import { cachePath, loadOrStore } from "./cache.js";
import { formatError, loadConfig, requireGcpProject } from "./config.js";
import { createLogger, parseLogLevel, type DestinationStream, type Logger } from "./logger.js";
import { DEFAULT_TOKEN_FILE, loadToken } from "./token.js";

type CliCommand = "archive" | "feed" | "help";

export const USER_AGENT = "monthly-digest/0.1.0";
export const LOG_LEVEL_ENV = "MONTHLY_DIGEST_LOG";

export interface CliIO {
  /** Report text, written as is. */
  write: (text: string) => void;
  log: (message: string) => void;
  error: (message: string) => void;
}

export interface FeedClientLike {
  fetchMonth: (options: FeedFetchOptions) => Promise<RawEvent[]>;
}

export interface ArchiveClientLike {
  queryMonth: (month: string, user: string) => Promise<string[]>;
}

export interface CliRuntimeOptions {
  io?: CliIO;
  createFeedClient?: (token: string | undefined) => FeedClientLike;
  createArchiveClient?: (projectId: string, logger: Logger) => ArchiveClientLike;
  /** Where log records go; stderr when omitted. */
  logDestination?: DestinationStream;
}

interface ParsedCommand {
  command: CliCommand;
  args: string[];
}

interface RunArgs {
  month: string;
  config: string;
  tokenFile: string;
}

function defaultIO(): CliIO {
  return {
    write: (text) => {
      process.stdout.write(text);
    },
    log: (message) => console.log(message),
    error: (message) => console.error(message)
  };
}

function parseCommand(argv: string[]): ParsedCommand {
  const command = argv[0] ?? "help";
  const args = argv.slice(1);
  if (command === "archive" || command === "feed") {
    return { command, args };
  }
  return { command: "help", args: [] };
}

function parseRunArgs(args: string[], options: { allowTokenFile: boolean }): RunArgs {
  let month: string | undefined;
  let config = "config.toml";
  let tokenFile = DEFAULT_TOKEN_FILE;

  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    if (!arg) {
      continue;
    }

    if (arg === "--config") {
      const value = args[i + 1];
      if (!value) {
        throw new Error("Missing value for --config");
      }
      config = value;
      i += 1;
      continue;
    }

    if (arg === "--token-file" && options.allowTokenFile) {
      const value = args[i + 1];
      if (!value) {
        throw new Error("Missing value for --token-file");
      }
      tokenFile = value;
      i += 1;
      continue;
    }

    if (arg.startsWith("--")) {
      throw new Error(`Unknown option: ${arg}`);
    }

    if (month !== undefined) {
      throw new Error(`Unexpected argument: ${arg}`);
    }
    month = arg;
  }

  if (month === undefined) {
    throw new Error("Missing <month> argument (YYYYMM or YYYY-MM)");
  }

  return { month: parseMonth(month), config, tokenFile };
}

function createCliLogger(runtimeOptions: CliRuntimeOptions): Logger {
  return createLogger(parseLogLevel(process.env[LOG_LEVEL_ENV]), runtimeOptions.logDestination);
}

async function runArchive(
  cwd: string,
  io: CliIO,
  args: string[],
  runtimeOptions: CliRuntimeOptions
): Promise<number> {
  const logger = createCliLogger(runtimeOptions);

  try {
    const parsed = parseRunArgs(args, { allowTokenFile: false });
    const config = await loadConfig(path.resolve(cwd, parsed.config));
    const projectId = requireGcpProject(config);
    const router = createProjectRouter({ owners: config.repo_owners, granularity: "owner" });

    const client =
      runtimeOptions.createArchiveClient?.(projectId, logger) ??
      new BigQueryArchiveClient({
        projectId,
        userAgent: USER_AGENT,
        onQuery: (query) => logger.info(`querying BigQuery in ${projectId}: ${query}`)
      });

    const result = await runPipeline<string, string>(
      {
        collect: (ctx) =>
          loadOrStore(cachePath(cwd, ctx.month), () => client.queryMonth(ctx.month, config.user), logger),
        normalize: (rows, ctx) => normalizeArchiveRows(rows, router, { onSkip: ctx.onSkip }),
        render: (aggregation) => renderMonthlyDigest(aggregation)
      },
      { month: parsed.month, onSkip: (reason) => logger.warn(`skipped ${reason}`) }
    );

    logger.info(
      `${result.sourceCount} events, ${countItems(result.aggregation)} items in ${result.aggregation.size} projects`
    );
    io.write(result.output);
    return 0;
  } catch (error: unknown) {
    io.error(formatError(error));
    return 1;
  }
}

async function runFeed(
  cwd: string,
  io: CliIO,
  args: string[],
  runtimeOptions: CliRuntimeOptions
): Promise<number> {
  const logger = createCliLogger(runtimeOptions);

  try {
    const parsed = parseRunArgs(args, { allowTokenFile: true });
    const config = await loadConfig(path.resolve(cwd, parsed.config));
    const token = await loadToken(path.resolve(cwd, parsed.tokenFile));
    if (!token) {
      logger.info("no GitHub token found; using unauthenticated requests");
    }

    const router = createProjectRouter({ owners: config.repo_owners });
    const client =
      runtimeOptions.createFeedClient?.(token) ?? new GithubFeedClient({ token, userAgent: USER_AGENT });

    const result = await runPipeline<RawEvent, string>(
      {
        collect: (ctx) =>
          client.fetchMonth({
            user: config.user,
            window: monthWindow(ctx.month),
            onPage: (info) =>
              logger.debug(`page ${info.page}: ${info.received} events, ${info.kept} in window (${info.url})`),
            onRateLimited: (url) => logger.warn(`rate limit reached at ${url}; ending the feed there`)
          }),
        normalize: (events) => normalizeFeedEvents(events, router),
        render: (aggregation, ctx) =>
          renderMonthlyDigest(aggregation, { resolveUrl: resolvePublicUrl, onSkip: ctx.onSkip })
      },
      { month: parsed.month, onSkip: (reason) => logger.warn(`skipped ${reason}`) }
    );

    logger.info(
      `${result.sourceCount} events, ${countItems(result.aggregation)} items in ${result.aggregation.size} projects`
    );
    io.write(result.output);
    return 0;
  } catch (error: unknown) {
    io.error(formatError(error));
    return 1;
  }
}

function printHelp(io: CliIO): void {
  io.log("monthly-digest");
  io.log("Usage: monthly-digest <archive|feed> <month> [options]");
  io.log("Commands:");
  io.log("  archive   query GitHub Archive in BigQuery for the month (cached in <month>.json)");
  io.log("  feed      page through the live GitHub events feed for the month");
  io.log("Options:");
  io.log("  <month>               YYYYMM or YYYY-MM");
  io.log("  --config <path>       TOML config with user, gcp_project, repo_owners (default: config.toml)");
  io.log(`  --token-file <path>   feed only; GitHub token file (default: ${DEFAULT_TOKEN_FILE}, then GITHUB_TOKEN)`);
  io.log("Environment:");
  io.log(`  ${LOG_LEVEL_ENV}=fatal|error|warn|info|debug|trace   JSON log lines on stderr (default: warn)`);
}

export async function runCli(
  argv: string[],
  cwd = process.cwd(),
  runtimeOptions: CliRuntimeOptions = {}
): Promise<number> {
  const io = runtimeOptions.io ?? defaultIO();
  const parsed = parseCommand(argv);

  switch (parsed.command) {
    case "archive":
      return runArchive(cwd, io, parsed.args, runtimeOptions);
    case "feed":
      return runFeed(cwd, io, parsed.args, runtimeOptions);
    default:
      printHelp(io);
      return 0;
  }
}
