#!/usr/bin/env node
import { buildProgram } from "./cli/program.js";
import { failCommand } from "./cli/output.js";

buildProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => failCommand(err));
