import { readFile } from "node:fs/promises";
import { parse } from "smol-toml";
import { z } from "zod";
import { DEFAULT_REPO_OWNERS, DigestError, describeError } from "@monthly-digest/core";

const loginPattern = /^[A-Za-z0-9](?:[A-Za-z0-9-]*[A-Za-z0-9])?$/;

export const digestConfigSchema = z.object({
  user: z.string().regex(loginPattern, "Must be a GitHub login"),
  gcp_project: z.string().min(1).optional(),
  repo_owners: z.array(z.string().min(1)).default([...DEFAULT_REPO_OWNERS])
});

export type DigestConfig = z.infer<typeof digestConfigSchema>;

function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${where}: ${issue.message}`;
    })
    .join("\n");
}

export function parseConfigString(raw: string): DigestConfig {
  let doc: unknown;
  try {
    doc = parse(raw);
  } catch (error: unknown) {
    throw new DigestError("config_parse", `Invalid TOML: ${describeError(error)}`, { cause: error });
  }

  const result = digestConfigSchema.safeParse(doc);
  if (!result.success) {
    throw new DigestError("config_parse", formatZodIssues(result.error), { cause: result.error });
  }
  return result.data;
}

export async function loadConfig(configPath: string): Promise<DigestConfig> {
  let raw: string;
  try {
    raw = await readFile(configPath, "utf-8");
  } catch (error: unknown) {
    throw new DigestError("config_read", `Cannot read ${configPath}: ${describeError(error)}`, { cause: error });
  }
  return parseConfigString(raw);
}

export function requireGcpProject(config: DigestConfig): string {
  if (!config.gcp_project) {
    throw new DigestError("config_parse", "gcp_project: Required for the archive command");
  }
  return config.gcp_project;
}

export function formatError(error: unknown): string {
  if (error instanceof DigestError) {
    return error.message;
  }

  if (error instanceof z.ZodError) {
    return formatZodIssues(error);
  }

  return describeError(error);
}
