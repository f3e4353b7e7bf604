import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, expect, it } from "vitest";
import {
  EntityClassifierService,
  loadClassificationPolicy,
} from "./entityClassifierService";

describe("EntityClassifierService", () => {
  const classifier = new EntityClassifierService();

  it.each([
    ["Greenfield Foundation", "foundation"],
    ["Greenfield Family Foundation", "foundation"],
    ["Whitfield Family Trust", "family_office"],
    ["Smith Family Office Capital Partners LLC", "family_office"],
    ["Acme Ventures Fund II, L.P.", "fund"],
    ["Harbor Point Capital Partners LP", "fund"],
    ["Acme Robotics, Inc.", "corporate"],
    ["Smith Irrevocable Trust", "trust"],
    ["John Q. Smith", "individual"],
    ["Dr. Maria Lopez, Jr.", "individual"],
    ["José Müller", "individual"],
    ["Zoë O’Neill-Brontë", "individual"],
    ["Sequoia Holdings", "unknown"],
    ["Refund Solutions Group", "unknown"],
    ["", "unknown"],
  ])("classifies %j as %s", (name, expected) => {
    expect(classifier.classify(name)).toBe(expected);
  });

  it("applies the first matching rule of a custom policy", () => {
    const custom = new EntityClassifierService({
      rules: [{ entityType: "fund", tokens: ["foundation"] }],
      organizationTokens: [],
      personalNameTokens: { min: 2, max: 3 },
    });

    expect(custom.classify("Greenfield Foundation")).toBe("fund");
  });

  it("is deterministic for the same name", () => {
    const name = "Whitfield Family Trust";
    expect(classifier.classify(name)).toBe(classifier.classify(name));
  });
});

describe("loadClassificationPolicy", () => {
  it("reads a policy file and fills defaults", async () => {
    const directory = await mkdtemp(join(tmpdir(), "classifier-policy-"));
    const path = join(directory, "policy.json");
    await writeFile(
      path,
      JSON.stringify({ rules: [{ entityType: "trust", tokens: ["endowment"] }] }),
      "utf8",
    );

    try {
      const policy = loadClassificationPolicy(path);
      expect(policy).toEqual({
        rules: [{ entityType: "trust", tokens: ["endowment"] }],
        organizationTokens: [],
        personalNameTokens: { min: 2, max: 3 },
      });
      expect(new EntityClassifierService(policy).classify("Yale Endowment")).toBe("trust");
    } finally {
      await rm(directory, { recursive: true, force: true });
    }
  });

  it("rejects rules with unsupported entity types", async () => {
    const directory = await mkdtemp(join(tmpdir(), "classifier-policy-"));
    const path = join(directory, "policy.json");
    await writeFile(
      path,
      JSON.stringify({ rules: [{ entityType: "individual", tokens: ["mr"] }] }),
      "utf8",
    );

    try {
      expect(() => loadClassificationPolicy(path)).toThrow();
    } finally {
      await rm(directory, { recursive: true, force: true });
    }
  });
});
