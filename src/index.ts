#!/usr/bin/env node
import { buildProgram } from "./cli/program.js";

buildProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error("Error:", error);
    process.exit(1);
  });
