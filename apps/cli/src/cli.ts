#!/usr/bin/env -S npx tsx

import { EXIT_FAILURE } from "./lib/errors";
import { abortOnSignals } from "./lib/signals";
import { runProgram } from "./program";

async function main(): Promise<number> {
  const controller = new AbortController();
  const removeSignalHandlers = abortOnSignals(controller);
  try {
    return await runProgram(process.argv, { signal: controller.signal });
  } finally {
    removeSignalHandlers();
  }
}

main().then(
  (code) => process.exit(code),
  (error: unknown) => {
    console.error(error);
    process.exit(EXIT_FAILURE);
  }
);
