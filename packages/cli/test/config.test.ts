import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { isDigestError } from "@monthly-digest/core";
import { formatError, loadConfig, parseConfigString, requireGcpProject } from "../src/config.js";

const tempDirs: string[] = [];

afterEach(async () => {
  await Promise.all(tempDirs.map((dir) => rm(dir, { recursive: true, force: true })));
  tempDirs.length = 0;
});

async function captureError(run: () => unknown): Promise<unknown> {
  try {
    await run();
  } catch (error: unknown) {
    return error;
  }
  return undefined;
}

describe("config", () => {
  it("parses user and project and applies default owners", () => {
    const config = parseConfigString('gcp_project = "test-project"\nuser = "octo-dev"\n');
    expect(config.user).toBe("octo-dev");
    expect(config.gcp_project).toBe("test-project");
    expect(config.repo_owners).toEqual(["djc", "nicoburns", "seanmonstar", "rust-lang", "hyperium"]);
  });

  it("accepts custom repo owners", () => {
    const config = parseConfigString('user = "octo-dev"\nrepo_owners = ["acme"]\n');
    expect(config.repo_owners).toEqual(["acme"]);
    expect(config.gcp_project).toBeUndefined();
  });

  it("rejects a missing user", async () => {
    const error = await captureError(() => parseConfigString('gcp_project = "test-project"\n'));
    expect(isDigestError(error, "config_parse")).toBe(true);
    expect(formatError(error)).toBe("user: Required");
  });

  it("rejects a user that is not a login", () => {
    expect(() => parseConfigString('user = "octo dev"\n')).toThrowError("user: Must be a GitHub login");
  });

  it("rejects invalid toml", async () => {
    const error = await captureError(() => parseConfigString('user = "octo-dev'));
    expect(isDigestError(error, "config_parse")).toBe(true);
    expect(formatError(error)).toMatch(/^Invalid TOML: /);
  });

  it("requires a project for the archive command", () => {
    const config = parseConfigString('user = "octo-dev"\n');
    expect(() => requireGcpProject(config)).toThrowError("gcp_project: Required for the archive command");
  });

  it("reports unreadable files as read failures", async () => {
    const dir = await mkdtemp(path.join(tmpdir(), "monthly-digest-config-"));
    tempDirs.push(dir);

    const error = await captureError(() => loadConfig(path.join(dir, "missing.toml")));
    expect(isDigestError(error, "config_read")).toBe(true);
  });

  it("loads a config file", async () => {
    const dir = await mkdtemp(path.join(tmpdir(), "monthly-digest-config-"));
    tempDirs.push(dir);
    const file = path.join(dir, "config.toml");
    await writeFile(file, 'user = "octo-dev"\ngcp_project = "test-project"\n', "utf-8");

    await expect(loadConfig(file)).resolves.toMatchObject({ user: "octo-dev", gcp_project: "test-project" });
  });
});
