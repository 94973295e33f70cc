import { describe, it, expect, beforeAll, afterAll } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { readEventsFile, writeCsvFile } from "../src/io/files";
import { ConfigError, ExportError } from "../src/sim/errors";

let dir = "";

beforeAll(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "event-window-sim-"));
});

afterAll(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe("readEventsFile", () => {
  it("loads the bundled sample config", () => {
    const f = readEventsFile(path.resolve("data/events.json"));
    expect(f.eventMin).toBe(1800);
    expect(f.eventMax).toBe(2100);
    expect(f.events.map((e) => e.name)).toEqual(["Snowfall", "Fog", "Blizzard", "Aurora", "Heatwave"]);
  });

  it("raises ConfigError for a missing file", () => {
    expect(() => readEventsFile(path.join(dir, "nope.json"))).toThrow(ConfigError);
  });

  it("raises ConfigError for unparseable JSON", () => {
    const p = path.join(dir, "broken.json");
    fs.writeFileSync(p, "{ Events: [", "utf-8");
    expect(() => readEventsFile(p)).toThrow(/not valid JSON/);
  });
});

describe("writeCsvFile", () => {
  it("writes headers and rows, creating the directory", () => {
    const p = path.join(dir, "nested", "summary.csv");
    writeCsvFile(p, ["event", "avgPerDay"], [{ event: "Fog", avgPerDay: 1.5 }]);
    expect(fs.readFileSync(p, "utf-8")).toBe("event,avgPerDay\nFog,1.5");
  });

  it("raises ExportError carrying the destination when it cannot write", () => {
    const blocker = path.join(dir, "blocker");
    fs.writeFileSync(blocker, "not a directory", "utf-8");
    const dest = path.join(blocker, "days.csv");
    let caught: unknown = null;
    try {
      writeCsvFile(dest, ["day"], [{ day: 1 }]);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ExportError);
    expect(caught instanceof ExportError ? caught.path : "").toBe(dest);
  });
});
