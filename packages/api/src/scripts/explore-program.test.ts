import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import { CommanderError } from "commander";
import { loadConfig } from "../config.js";
import { buildExploreProgram, parsePort } from "./explore-program.js";
import { renderDetails, renderSearch } from "./explore-commands.js";

// ---------------------------------------------------------------------------
// Setup
// ---------------------------------------------------------------------------

const EXPOSITION = [
  "up 1",
  "# HELP node_load1 1m load average.",
  "# TYPE node_load1 gauge",
  "node_load1 0.5",
].join("\n");

let fetchSpy: MockInstance<typeof fetch>;

beforeEach(() => {
  fetchSpy = vi
    .spyOn(globalThis, "fetch")
    .mockImplementation(async () => new Response(EXPOSITION, { status: 200 }));
});

afterEach(() => {
  vi.restoreAllMocks();
});

function program(env: Record<string, string | undefined> = {}) {
  const print = vi.fn<(lines: string[]) => void>();
  const cli = buildExploreProgram({
    config: loadConfig({ NODE_ENV: "test", ...env }),
    print,
    output: { writeOut: () => {}, writeErr: () => {} },
  });
  return { cli, print };
}

function fetchedUrl(): unknown {
  return fetchSpy.mock.calls[0]?.[0];
}

// ---------------------------------------------------------------------------
// Exporter address
// ---------------------------------------------------------------------------

describe("exporter address", () => {
  it("uses the environment when no flags are given", async () => {
    const { cli } = program({ EXPORTER_HOST: "envhost", EXPORTER_PORT: "9200" });

    await cli.parseAsync(["names"], { from: "user" });

    expect(fetchedUrl()).toBe("http://envhost:9200/metrics");
  });

  it("lets --host and --port override the environment", async () => {
    const { cli } = program({ EXPORTER_HOST: "envhost", EXPORTER_PORT: "9200" });

    await cli.parseAsync(["--host", "flaghost", "--port", "9300", "names"], { from: "user" });

    expect(fetchedUrl()).toBe("http://flaghost:9300/metrics");
  });

  it("exits with code 1 on an invalid port", async () => {
    const { cli } = program();

    const failure = cli.parseAsync(["--port", "abc", "names"], { from: "user" });

    await expect(failure).rejects.toBeInstanceOf(CommanderError);
    await expect(failure).rejects.toMatchObject({
      exitCode: 1,
      code: "commander.invalidArgument",
    });
    expect(fetchSpy).not.toHaveBeenCalled();
  });
});

describe("parsePort", () => {
  it("accepts ports in range", () => {
    expect(parsePort("1")).toBe(1);
    expect(parsePort("65535")).toBe(65535);
  });

  it("rejects non-integers and out-of-range values", () => {
    expect(() => parsePort("0")).toThrow("Not a valid port number.");
    expect(() => parsePort("65536")).toThrow("Not a valid port number.");
    expect(() => parsePort("91.5")).toThrow("Not a valid port number.");
  });
});

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

describe("commands", () => {
  it("prints the sorted names", async () => {
    const { cli, print } = program();

    await cli.parseAsync(["names"], { from: "user" });

    expect(print).toHaveBeenCalledWith(["node_load1", "up"]);
  });

  it("joins the words of a search term", async () => {
    const { cli, print } = program();

    await cli.parseAsync(["search", "load", "average"], { from: "user" });

    expect(print).toHaveBeenCalledWith(
      renderSearch([{ name: "node_load1", help: "1m load average.", value: 0.5 }]),
    );
  });

  it("prints details for one metric", async () => {
    const { cli, print } = program();

    await cli.parseAsync(["details", "node_load1"], { from: "user" });

    expect(print).toHaveBeenCalledWith(
      renderDetails({
        name: "node_load1",
        type: "gauge",
        help: "1m load average.",
        values: [{ value: 0.5, labels: {} }],
      }),
    );
  });

  it("rejects details without a name", async () => {
    const { cli } = program();

    await expect(cli.parseAsync(["details"], { from: "user" })).rejects.toMatchObject({
      exitCode: 1,
      code: "commander.missingArgument",
    });
  });
});
