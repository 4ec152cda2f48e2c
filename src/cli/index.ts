#!/usr/bin/env node

import { createContext } from "../app/context.js";
import { buildProgram } from "./program.js";

const ctx = createContext();

buildProgram(ctx)
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    ctx.logger.fatal({ err }, "waiver-merger failed");
    console.error(err instanceof Error ? err.message : err);
    process.exitCode = 1;
  });
