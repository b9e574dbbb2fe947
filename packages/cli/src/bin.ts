#!/usr/bin/env -S node --import tsx
import { fileURLToPath } from "node:url";
import { run } from "@oclif/core";
import { exitCodeFor } from "./lib/output.js";

run(undefined, { root: fileURLToPath(new URL("..", import.meta.url)) })
  .then(() => {
    // noop
  })
  .catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : "CLI failure");
    process.exitCode = exitCodeFor(error);
  });
