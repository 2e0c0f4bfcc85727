#!/usr/bin/env node
import { buildProgram } from "./program.js";

void buildProgram()
  .parseAsync(process.argv)
  .catch((error) => {
    const message = error instanceof Error ? error.message : String(error);
    console.error(message);
    process.exitCode = 1;
  });
