#!/usr/bin/env tsx
/**
 * Explore a Prometheus exporter's metrics from the terminal.
 *
 * Usage: npm run explore -- [--host localhost] [--port 9100] [command]
 */

import { CommanderError } from "commander";

import { loadConfig } from "../config.js";
import { buildExploreProgram } from "./explore-program.js";

buildExploreProgram({ config: loadConfig() })
  .parseAsync(process.argv)
  .catch((err) => {
    // Commander has already printed usage or the parse error
    if (err instanceof CommanderError) process.exit(err.exitCode);

    console.error("Explore failed:", err instanceof Error ? err.message : err);
    process.exit(1);
  });
