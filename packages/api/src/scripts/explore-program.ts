/**
 * Commander program behind the explore CLI.
 *
 *   explore [--host <host>] [--port <port>] [command]
 *
 * Commands: groups, search <term...>, details <name>, names, and
 * interactive (the default when no command is given). Flags override the
 * exporter host/port from the environment.
 */

import { Command, InvalidArgumentError, type OutputConfiguration } from "commander";
import { createInterface } from "node:readline/promises";
import { stdin, stdout } from "node:process";

import type { ExplorerConfig } from "../config.js";
import { MetricsExplorer, exporterMetricsUrl } from "../metrics/index.js";
import {
  createNameCompleter,
  renderDetails,
  renderGroups,
  renderSearch,
} from "./explore-commands.js";

export type Printer = (lines: string[]) => void;

export interface ExploreProgramOptions {
  config: ExplorerConfig;
  /** Receives each rendered block (default: console.log) */
  print?: Printer;
  /** Commander output overrides, applied to every subcommand */
  output?: OutputConfiguration;
}

interface GlobalOptions {
  host: string;
  port: number;
}

const consolePrinter: Printer = (lines) => {
  console.log(lines.join("\n"));
};

export function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 1 || port > 65_535) {
    throw new InvalidArgumentError("Not a valid port number.");
  }
  return port;
}

// ---------------------------------------------------------------------------
// Interactive menu
// ---------------------------------------------------------------------------

async function interactive(explorer: MetricsExplorer, print: Printer) {
  const completer = createNameCompleter();
  const rl = createInterface({
    input: stdin,
    output: stdout,
    completer: (line: string) => completer.complete(line),
  });

  try {
    while (true) {
      print([
        "",
        "Metrics Explorer",
        "1. List metric groups",
        "2. Search metrics",
        "3. Show metric details",
        "4. Exit",
      ]);

      const choice = (await rl.question("\nEnter your choice (1-4): ")).trim();

      if (choice === "1") {
        print(renderGroups(await explorer.listGroups()));
      } else if (choice === "2") {
        const term = await rl.question("Enter search term: ");
        print(renderSearch(await explorer.search(term)));
      } else if (choice === "3") {
        const names = await explorer.names();
        const name = await completer.during(names, () => rl.question("Enter metric name: "));
        print(renderDetails(await explorer.details(name.trim())));
      } else if (choice === "4") {
        break;
      }
    }
  } finally {
    rl.close();
  }
}

// ---------------------------------------------------------------------------
// Program
// ---------------------------------------------------------------------------

/**
 * Build the CLI. Errors (including `--help`) surface as CommanderError
 * with an exit code instead of exiting the process.
 */
export function buildExploreProgram({
  config,
  print = consolePrinter,
  output,
}: ExploreProgramOptions): Command {
  const program = new Command()
    .name("explore")
    .description("Explore a Prometheus exporter's metrics")
    .option("--host <host>", "exporter host", config.exporterHost)
    .option("--port <port>", "exporter port", parsePort, config.exporterPort)
    .exitOverride();
  if (output) program.configureOutput(output);

  const explorer = () => {
    const { host, port } = program.opts<GlobalOptions>();
    return new MetricsExplorer({
      metricsUrl: exporterMetricsUrl({ host, port }),
      timeoutMs: config.scrapeTimeoutMs,
    });
  };

  program
    .command("groups")
    .description("List metric names grouped by prefix")
    .action(async () => {
      print(renderGroups(await explorer().listGroups()));
    });

  program
    .command("search")
    .description("Search metric names and help text")
    .argument("<term...>", "search term (words are joined with spaces)")
    .action(async (term: string[]) => {
      print(renderSearch(await explorer().search(term.join(" "))));
    });

  program
    .command("details")
    .description("Show type, help and current values of a metric")
    .argument("<name>", "metric name")
    .action(async (name: string) => {
      print(renderDetails(await explorer().details(name)));
    });

  program
    .command("names")
    .description("List all metric names")
    .action(async () => {
      print(await explorer().names());
    });

  program
    .command("interactive", { isDefault: true })
    .description("Menu-driven exploration")
    .action(async () => {
      await interactive(explorer(), print);
    });

  return program;
}
