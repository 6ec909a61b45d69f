#!/usr/bin/env node

import chalk from "chalk";
import { errorMessage } from "../core/errors.js";
import { EXIT_INTERNAL_ERROR } from "../index.js";
import { createProgram } from "./program.js";

createProgram()
  .parseAsync()
  .catch((err: unknown) => {
    console.error(chalk.red(errorMessage(err)));
    process.exitCode = EXIT_INTERNAL_ERROR;
  });
