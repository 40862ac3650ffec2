import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { formatTimestamp } from "../shared/time.js";
import { BootTimeError, loadOrCreateBootRecord, virtualNow } from "./bootTime.js";

describe("loadOrCreateBootRecord", () => {
  let dir: string;
  let bootFile: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "boot-time-test-"));
    bootFile = join(dir, "boot_time.txt");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("creates the boot file with the current time on first run", async () => {
    const now = new Date(2025, 6, 1, 9, 15, 30, 450);

    const record = await loadOrCreateBootRecord(bootFile, now);

    expect(record.restored).toBe(false);
    expect(formatTimestamp(record.startedAt)).toBe("2025-07-01 09:15:30");
    expect(await readFile(bootFile, "utf-8")).toBe("2025-07-01 09:15:30");
  });

  it("reuses the stored timestamp on later runs", async () => {
    const first = await loadOrCreateBootRecord(bootFile, new Date(2025, 6, 1, 9, 15, 30, 450));
    const second = await loadOrCreateBootRecord(bootFile, new Date(2025, 7, 20, 18, 0, 0));

    expect(second.restored).toBe(true);
    expect(second.startedAt.getTime()).toBe(first.startedAt.getTime());
    expect(await readFile(bootFile, "utf-8")).toBe("2025-07-01 09:15:30");
  });

  it("tolerates surrounding whitespace in the stored value", async () => {
    await writeFile(bootFile, "  2024-02-29 23:59:59\n", "utf-8");

    const record = await loadOrCreateBootRecord(bootFile);

    expect(formatTimestamp(record.startedAt)).toBe("2024-02-29 23:59:59");
  });

  it("fails on a malformed boot file", async () => {
    await writeFile(bootFile, "yesterday", "utf-8");

    await expect(loadOrCreateBootRecord(bootFile)).rejects.toBeInstanceOf(BootTimeError);
  });

  it("fails on an empty boot file", async () => {
    await writeFile(bootFile, "", "utf-8");

    await expect(loadOrCreateBootRecord(bootFile)).rejects.toThrow("Malformed boot time");
  });
});

describe("virtualNow", () => {
  const epoch = new Date(2025, 5, 13, 0, 0, 0);

  it("equals the epoch at boot", () => {
    const startedAt = new Date(2025, 8, 1, 12, 0, 0);
    const result = virtualNow({ startedAt, restored: true }, epoch, startedAt);
    expect(formatTimestamp(result)).toBe("2025-06-13 00:00:00");
  });

  it("advances by the real elapsed time", () => {
    const startedAt = new Date(2025, 8, 1, 12, 0, 0);
    const now = new Date(startedAt.getTime() + (26 * 3600 + 61) * 1000);

    const result = virtualNow({ startedAt, restored: true }, epoch, now);

    expect(formatTimestamp(result)).toBe("2025-06-14 02:01:01");
  });
});
