import { describe, it, expect } from "vitest";
import {
  createNameCompleter,
  renderDetails,
  renderGroups,
  renderSearch,
  renderTable,
  truncateHelp,
} from "./explore-commands.js";

// ---------------------------------------------------------------------------
// Completion
// ---------------------------------------------------------------------------

describe("createNameCompleter", () => {
  it("offers nothing outside a name prompt", () => {
    expect(createNameCompleter().complete("node")).toEqual([[], "node"]);
  });

  it("completes names case-insensitively while the prompt is open", async () => {
    const completer = createNameCompleter();
    const names = ["go_goroutines", "node_load1", "node_load5"];

    const hits = await completer.during(names, async () => completer.complete("NODE_"));

    expect(hits).toEqual([["node_load1", "node_load5"], "NODE_"]);
    expect(completer.complete("node_")).toEqual([[], "node_"]);
  });

  it("lists every name when nothing matches", async () => {
    const completer = createNameCompleter();
    const hits = await completer.during(["up"], async () => completer.complete("x"));

    expect(hits).toEqual([["up"], "x"]);
  });

  it("clears the names when the prompt fails", async () => {
    const completer = createNameCompleter();

    await expect(
      completer.during(["up"], async () => {
        throw new Error("readline closed");
      }),
    ).rejects.toThrow("readline closed");
    expect(completer.complete("u")).toEqual([[], "u"]);
  });
});

// ---------------------------------------------------------------------------
// Rendering
// ---------------------------------------------------------------------------

describe("truncateHelp", () => {
  it("cuts long help text at 100 characters", () => {
    expect(truncateHelp("a".repeat(101))).toBe(`${"a".repeat(100)}...`);
    expect(truncateHelp("a".repeat(100))).toBe("a".repeat(100));
  });
});

describe("renderTable", () => {
  it("draws a grid sized to the widest cell", () => {
    expect(renderTable(["Metric", "Description"], [["up", "Target is up"]])).toEqual([
      "+--------+--------------+",
      "| Metric | Description  |",
      "+========+==============+",
      "| up     | Target is up |",
      "+--------+--------------+",
    ]);
  });
});

describe("renderGroups", () => {
  it("lists each prefix with its names", () => {
    const groups = new Map([
      ["node", ["node_load1", "node_load5"]],
      ["up", ["up"]],
    ]);
    expect(renderGroups(groups)).toEqual([
      "",
      "node:",
      "  - node_load1",
      "  - node_load5",
      "",
      "up:",
      "  - up",
    ]);
  });
});

describe("renderSearch", () => {
  it("reports an empty result", () => {
    expect(renderSearch([])).toEqual(["No results found"]);
  });

  it("renders matches as a table", () => {
    expect(renderSearch([{ name: "up", help: "Target is up", value: 1 }])).toEqual([
      "",
      "Search results:",
      "+--------+--------------+",
      "| Metric | Description  |",
      "+========+==============+",
      "| up     | Target is up |",
      "+--------+--------------+",
    ]);
  });
});

describe("renderDetails", () => {
  it("prints metadata and labelled values", () => {
    const lines = renderDetails({
      name: "node_cpu_seconds_total",
      type: "counter",
      help: "CPU time",
      values: [
        { value: 123.4, labels: { cpu: "0" } },
        { value: Infinity, labels: {} },
      ],
    });

    expect(lines).toEqual([
      "",
      "Details for metric: node_cpu_seconds_total",
      "-".repeat(50),
      "Type: counter",
      "Help: CPU time",
      "",
      "Current values:",
      'Value: 123.4 (Labels: {cpu="0"})',
      "Value: +Inf",
    ]);
  });

  it("omits metadata and says so when nothing is known", () => {
    expect(renderDetails({ name: "missing_metric", type: null, help: null, values: [] })).toEqual([
      "",
      "Details for metric: missing_metric",
      "-".repeat(50),
      "",
      "Current values:",
      "No current values found",
    ]);
  });
});
