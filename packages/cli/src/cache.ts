import { readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { DigestError, describeError } from "@monthly-digest/core";
import type { Logger } from "./logger.js";

const cacheSchema = z.array(z.string());

export function cachePath(cwd: string, month: string): string {
  return path.join(cwd, `${month}.json`);
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export async function readCache(file: string): Promise<string[] | undefined> {
  let raw: string;
  try {
    raw = await readFile(file, "utf-8");
  } catch (error: unknown) {
    if (isNotFound(error)) {
      return undefined;
    }
    throw new DigestError("cache_io", `Cannot read cache ${file}: ${describeError(error)}`, { cause: error });
  }

  let doc: unknown;
  try {
    doc = JSON.parse(raw);
  } catch (error: unknown) {
    throw new DigestError("cache_io", `Cache ${file} is not valid JSON`, { cause: error });
  }

  const result = cacheSchema.safeParse(doc);
  if (!result.success) {
    throw new DigestError("cache_io", `Cache ${file} must be a JSON array of strings`, { cause: result.error });
  }
  return result.data;
}

export async function writeCache(file: string, events: string[]): Promise<void> {
  try {
    await writeFile(file, JSON.stringify(events), "utf-8");
  } catch (error: unknown) {
    throw new DigestError("cache_io", `Cannot write cache ${file}: ${describeError(error)}`, { cause: error });
  }
}

/** Returns the cached events, or computes them and stores the result before returning. */
export async function loadOrStore(
  file: string,
  compute: () => Promise<string[]>,
  logger?: Logger
): Promise<string[]> {
  const cached = await readCache(file);
  if (cached) {
    logger?.info(`loading ${cached.length} events from cache ${file}`);
    return cached;
  }

  logger?.info(`no cache at ${file}; querying`);
  const events = await compute();
  await writeCache(file, events);
  logger?.info(`saved ${events.length} events to cache ${file}`);
  return events;
}
