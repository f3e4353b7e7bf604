import { describe, expect, it } from "vitest";
import { ReferenceSnapshot } from "./referenceSnapshot";

describe("ReferenceSnapshot", () => {
  it("indexes entries by kind with normalized names", () => {
    const loadedAt = new Date("2026-01-08T00:00:00.000Z");
    const snapshot = ReferenceSnapshot.fromEntries(
      [
        { referenceId: "org-1", name: " Greenfield Foundation ", kind: "organization", status: "Active LP" },
        { referenceId: "person-1", name: "John Smith", kind: "person", status: null },
        { referenceId: "org-2", name: "   ", kind: "organization", status: null },
      ],
      loadedAt,
    );

    expect(snapshot.size).toBe(2);
    expect(snapshot.loadedAt).toBe(loadedAt);
    expect(snapshot.index("organization")).toEqual([
      {
        referenceId: "org-1",
        name: "Greenfield Foundation",
        kind: "organization",
        status: "Active LP",
        normalizedName: "greenfield",
      },
    ]);
    expect(snapshot.index("person").map((entry) => entry.normalizedName)).toEqual(["john smith"]);
  });

  it("cannot be changed after it is built", () => {
    const snapshot = ReferenceSnapshot.fromEntries([
      { referenceId: "org-1", name: "Greenfield Foundation", kind: "organization", status: null },
    ]);

    expect(Object.isFrozen(snapshot.index("organization"))).toBe(true);
  });

  it("starts empty", () => {
    expect(ReferenceSnapshot.empty().size).toBe(0);
  });
});
