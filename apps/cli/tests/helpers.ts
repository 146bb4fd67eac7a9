/**
 * In-process CLI runner for tests.
 */

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import type { FetchFunction } from "@dirscope/client";
import { vi } from "vitest";
import { runProgram } from "../src/program";

export interface CliResult {
  code: number;
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  fetch?: FetchFunction;
  signal?: AbortSignal;
}

/**
 * Run `dirscope <args>` and capture what it prints through console.
 */
export async function runCli(args: string[], options: RunOptions = {}): Promise<CliResult> {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const log = vi.spyOn(console, "log").mockImplementation((...parts: unknown[]) => {
    stdout.push(parts.map(String).join(" "));
  });
  const error = vi.spyOn(console, "error").mockImplementation((...parts: unknown[]) => {
    stderr.push(parts.map(String).join(" "));
  });
  try {
    const code = await runProgram(["node", "dirscope", ...args], {
      signal: options.signal ?? new AbortController().signal,
      fetch: options.fetch,
    });
    return { code, stdout: stdout.join("\n"), stderr: stderr.join("\n") };
  } finally {
    log.mockRestore();
    error.mockRestore();
  }
}

/**
 * Point the config directory at a fresh temp directory.
 * Returns the directory; remove it with `removeConfigDir`.
 */
export function useTempConfigDir(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "dirscope-test-"));
  vi.stubEnv("DIRSCOPE_CONFIG_DIR", dir);
  return dir;
}

export function removeConfigDir(dir: string): void {
  vi.unstubAllEnvs();
  fs.rmSync(dir, { recursive: true, force: true });
}

/** Connection flags for the fake drive */
export const DRIVE_FLAGS = ["--base-url", "https://drive.test", "--drive-id", "42", "--token", "test-secret"];
