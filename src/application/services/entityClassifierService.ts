import { readFileSync } from "node:fs";
import { z } from "zod";
import type { EntityType } from "../../core/entities/stockholder";
import { foldedTokens, foldPunctuation } from "../utils/nameText";

type TokenRuleType = Exclude<EntityType, "individual" | "unknown">;

export type TokenRule = {
  entityType: TokenRuleType;
  tokens: string[];
};

/**
 * Declared precedence: rules are tried in order, then the personal-name check, then `unknown`.
 */
export type ClassificationPolicy = {
  rules: TokenRule[];
  organizationTokens: string[];
  personalNameTokens: { min: number; max: number };
};

export const DEFAULT_CLASSIFICATION_POLICY: ClassificationPolicy = {
  rules: [
    {
      entityType: "foundation",
      tokens: ["foundation", "charitable trust", "endowment"],
    },
    {
      entityType: "family_office",
      tokens: ["family office", "family holdings", "family trust", "family lp"],
    },
    {
      entityType: "fund",
      tokens: ["fund", "capital", "partners", "ventures", "management", "advisors", "lp"],
    },
    {
      entityType: "corporate",
      tokens: ["inc", "incorporated", "corp", "corporation", "llc", "ltd", "limited", "company", "plc"],
    },
    {
      entityType: "trust",
      tokens: ["trust", "estate"],
    },
  ],
  organizationTokens: [
    "holdings",
    "group",
    "bank",
    "associates",
    "investments",
    "investors",
    "equity",
    "securities",
    "university",
    "llp",
    "co",
    "sa",
    "nv",
    "ag",
    "gmbh",
    "affiliates",
    "entities",
  ],
  personalNameTokens: { min: 2, max: 3 },
};

const policySchema = z.object({
  rules: z
    .array(
      z.object({
        entityType: z.enum([
          "foundation",
          "family_office",
          "fund",
          "corporate",
          "trust",
        ]),
        tokens: z.array(z.string().min(1)).min(1),
      }),
    )
    .min(1),
  organizationTokens: z.array(z.string().min(1)).default([]),
  personalNameTokens: z
    .object({
      min: z.number().int().positive(),
      max: z.number().int().positive(),
    })
    .default({ min: 2, max: 3 }),
});

/**
 * Reads a replacement precedence table from JSON so token sets can be tuned without a code change.
 */
export const loadClassificationPolicy = (path: string): ClassificationPolicy =>
  policySchema.parse(JSON.parse(readFileSync(path, "utf8")));

const HONORIFICS = new Set(["mr", "mrs", "ms", "dr", "prof", "sir"]);
const GENERATIONAL = new Set(["jr", "sr", "ii", "iii", "iv", "md", "phd"]);
const NAME_WORD = /^\p{Lu}[\p{L}\p{M}'’-]*\.?,?$/u;

const escapeRegExp = (value: string): string =>
  value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

/**
 * Builds a word-boundary matcher over folded text, so "fund" never matches inside "refunded".
 */
const tokenMatcher = (token: string): RegExp => {
  const folded = foldPunctuation(token);
  return new RegExp(`(?:^| )${escapeRegExp(folded)}(?: |$)`);
};

type CompiledRule = {
  entityType: TokenRuleType;
  matchers: RegExp[];
};

/**
 * Assigns one entity type per name from an ordered keyword table; the first rule that matches wins.
 */
export class EntityClassifierService {
  private readonly rules: CompiledRule[];
  private readonly organizationMatchers: RegExp[];

  constructor(
    private readonly policy: ClassificationPolicy = DEFAULT_CLASSIFICATION_POLICY,
  ) {
    this.rules = policy.rules.map((rule) => ({
      entityType: rule.entityType,
      matchers: rule.tokens.map(tokenMatcher),
    }));
    this.organizationMatchers = [
      ...policy.rules.flatMap((rule) => rule.tokens),
      ...policy.organizationTokens,
    ].map(tokenMatcher);
  }

  classify(name: string): EntityType {
    const folded = foldPunctuation(name);
    if (!folded) {
      return "unknown";
    }

    for (const rule of this.rules) {
      if (rule.matchers.some((matcher) => matcher.test(folded))) {
        return rule.entityType;
      }
    }

    if (this.looksLikePersonalName(name, folded)) {
      return "individual";
    }

    return "unknown";
  }

  private looksLikePersonalName(name: string, folded: string): boolean {
    if (this.organizationMatchers.some((matcher) => matcher.test(folded))) {
      return false;
    }

    const words = name
      .split(/\s+/)
      .filter(Boolean)
      .filter((word) => {
        const token = foldedTokens(word).join("");
        return !HONORIFICS.has(token) && !GENERATIONAL.has(token);
      });

    const { min, max } = this.policy.personalNameTokens;
    if (words.length < min || words.length > max) {
      return false;
    }

    return words.every((word) => NAME_WORD.test(word));
  }
}
