/**
 * Launch checks for the tool server process.
 *
 * The command and arguments are passed through unvalidated; the only checks
 * are that the executable and any required files exist.
 */

import { existsSync, statSync } from "fs";
import { delimiter, isAbsolute, join, resolve } from "path";
import { ConnectionError } from "./errors.js";

function isFile(path: string): boolean {
  return existsSync(path) && statSync(path).isFile();
}

/**
 * Resolve a command the way a shell would: paths are checked relative to
 * `cwd`, bare names are looked up on PATH.
 *
 * @returns The resolved path, or undefined if nothing matches
 */
export function resolveCommand(
  command: string,
  options: { cwd?: string; pathEnv?: string } = {}
): string | undefined {
  if (command.length === 0) {
    return undefined;
  }

  if (isAbsolute(command) || command.includes("/") || command.includes("\\")) {
    const candidate = resolve(options.cwd ?? process.cwd(), command);
    return isFile(candidate) ? candidate : undefined;
  }

  const pathEnv = options.pathEnv ?? process.env["PATH"] ?? "";
  const extensions = process.platform === "win32" ? ["", ".exe", ".cmd", ".bat"] : [""];
  for (const dir of pathEnv.split(delimiter)) {
    if (!dir) continue;
    for (const ext of extensions) {
      const candidate = join(dir, command + ext);
      if (isFile(candidate)) {
        return candidate;
      }
    }
  }
  return undefined;
}

/**
 * Throw ConnectionError for any path that does not exist.
 */
export function assertPathsExist(command: string, paths: readonly string[], cwd?: string): void {
  for (const path of paths) {
    if (!existsSync(resolve(cwd ?? process.cwd(), path))) {
      throw new ConnectionError(`Required path does not exist: ${path}`, command);
    }
  }
}

/**
 * Throw ConnectionError if the command cannot be found.
 */
export function assertCommandExists(command: string, cwd?: string): void {
  if (resolveCommand(command, { cwd }) === undefined) {
    throw new ConnectionError(`Command not found: ${command}`, command);
  }
}
