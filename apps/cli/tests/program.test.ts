import { afterEach, describe, expect, it, vi } from "vitest";
import { runCli } from "./helpers";

describe("dirscope program", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should show help and exit 0 when no command is given", async () => {
    const written: string[] = [];
    vi.spyOn(process.stderr, "write").mockImplementation((chunk: string | Uint8Array) => {
      written.push(String(chunk));
      return true;
    });

    const result = await runCli([]);

    expect(result.code).toBe(0);
    expect(written.join("")).toContain("Usage: dirscope [options] [command]");
  });

  it("should exit 0 for --version", async () => {
    const written: string[] = [];
    vi.spyOn(process.stdout, "write").mockImplementation((chunk: string | Uint8Array) => {
      written.push(String(chunk));
      return true;
    });

    const result = await runCli(["--version"]);

    expect(result.code).toBe(0);
    expect(written.join("")).toBe("0.1.0\n");
  });

  it("should exit 1 for an unknown command", async () => {
    vi.spyOn(process.stderr, "write").mockImplementation(() => true);

    const result = await runCli(["frobnicate"]);

    expect(result.code).toBe(1);
  });
});
