import { readFile } from "node:fs/promises";
import { DigestError, describeError } from "@monthly-digest/core";

export const DEFAULT_TOKEN_FILE = ".github-token";
export const TOKEN_ENV = "GITHUB_TOKEN";

/** Token file first, then `GITHUB_TOKEN`; `undefined` means unauthenticated requests. */
export async function loadToken(
  tokenFile: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<string | undefined> {
  try {
    const value = (await readFile(tokenFile, "utf-8")).trim();
    if (value) {
      return value;
    }
  } catch (error: unknown) {
    const missing = error instanceof Error && "code" in error && error.code === "ENOENT";
    if (!missing) {
      throw new DigestError("credential", `Cannot read token file ${tokenFile}: ${describeError(error)}`, {
        cause: error
      });
    }
  }

  const fromEnv = env[TOKEN_ENV]?.trim();
  return fromEnv ? fromEnv : undefined;
}
