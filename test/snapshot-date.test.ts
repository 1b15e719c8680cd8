import { describe, it, expect } from "vitest";
import { isValidDataDate, resolveSnapshotDate, tryResolveSnapshotDate } from "../src/services/snapshot-date.js";
import { DateResolutionError } from "../src/errors.js";

describe("resolveSnapshotDate", () => {
  it("extracts the date from a dump archive name", () => {
    expect(resolveSnapshotDate("Update to dump-2025-09-02.210328Z.zip")).toBe("2025-09-02");
  });

  it("finds the name on a later line of the message", () => {
    expect(resolveSnapshotDate("archive update\n\nsource: dump-2024-01-15.031500Z.zip\n")).toBe("2024-01-15");
  });

  it("throws DateResolutionError when no archive is named", () => {
    expect(() => resolveSnapshotDate("Update README")).toThrow(DateResolutionError);
  });

  it("quotes the first line of the message in the error", () => {
    expect(() => resolveSnapshotDate("Update README\nmore text")).toThrow(
      'No snapshot date in revision message: "Update README"',
    );
  });

  it("rejects an impossible calendar date", () => {
    expect(tryResolveSnapshotDate("dump-2025-02-30.000000Z.zip")).toBeNull();
    expect(() => resolveSnapshotDate("dump-2025-02-30.000000Z.zip")).toThrow(DateResolutionError);
  });

  it("requires the full dump name, not just a date", () => {
    expect(tryResolveSnapshotDate("snapshot of 2025-09-02")).toBeNull();
  });
});

describe("isValidDataDate", () => {
  it("accepts real days", () => {
    expect(isValidDataDate("2024-02-29")).toBe(true);
    expect(isValidDataDate("2025-12-31")).toBe(true);
  });

  it("rejects malformed or impossible dates", () => {
    expect(isValidDataDate("2023-02-29")).toBe(false);
    expect(isValidDataDate("2024-13-01")).toBe(false);
    expect(isValidDataDate("20240101")).toBe(false);
    expect(isValidDataDate("2024-1-01")).toBe(false);
    expect(isValidDataDate("")).toBe(false);
  });
});
