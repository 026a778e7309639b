import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import fs from "fs/promises";
import os from "os";
import path from "path";
import { bootstrap } from "./main";
import { Application } from "./core/app";

describe("bootstrap", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "noisefloor-main-"));
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  const quickScan = () => [
    "--mock",
    "--start-mhz", "915",
    "--end-mhz", "915",
    "--dwell-min", "0",
    "--settle-s", "0",
    "--timeout-s", "1",
    "--out", path.join(dir, "scan.csv"),
  ];

  it("should exit 2 on a bad command line", async () => {
    expect(await bootstrap(["--tcp", "radio.local"], {})).toBe(2);
  });

  it("should keep the scan's exit code when shutdown fails", async () => {
    const original = Application.prototype.stop;
    const stop = vi.spyOn(Application.prototype, "stop").mockImplementation(async function (this: Application) {
      await original.call(this);
      throw new Error("sink flush failed");
    });

    expect(await bootstrap(quickScan(), {})).toBe(0);
    expect(stop).toHaveBeenCalledTimes(1);
    const lines = (await fs.readFile(path.join(dir, "scan.csv"), "utf8")).trimEnd().split("\n");
    expect(lines.at(-1)).toBe("915,0,,,,");
  });
});
