import "dotenv/config";
import { z } from "zod";

const supportedFilingsProviders = ["mock", "sec-edgar"] as const;
const supportedReferenceProviders = ["none", "mock", "affinity"] as const;
const supportedRosterProviders = ["none", "mock", "propublica"] as const;
const supportedOutputFormats = ["csv", "json"] as const;

export type FilingsProviderName = (typeof supportedFilingsProviders)[number];
export type ReferenceProviderName = (typeof supportedReferenceProviders)[number];
export type RosterProviderName = (typeof supportedRosterProviders)[number];
export type OutputFormat = (typeof supportedOutputFormats)[number];

const envSchema = z.object({
  NODE_ENV: z
    .enum(["development", "test", "production"])
    .default("development"),
  FILINGS_PROVIDER: z.enum(supportedFilingsProviders).default("mock"),
  FILINGS_LOOKBACK_DAYS: z.coerce.number().int().positive().default(7),
  FILING_FORMS: z.string().default("S-1,S-1/A"),
  FILINGS_LIMIT: z.coerce.number().int().positive().default(100),
  SEC_EDGAR_SEARCH_URL: z
    .string()
    .default("https://efts.sec.gov/LATEST/search-index"),
  SEC_EDGAR_ARCHIVES_BASE_URL: z
    .string()
    .default("https://www.sec.gov/Archives/edgar/data"),
  SEC_EDGAR_USER_AGENT: z
    .string()
    .default("s1-prospector/1.0 (contact: devnull@example.com)"),
  SEC_EDGAR_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  REFERENCE_PROVIDER: z.enum(supportedReferenceProviders).default("mock"),
  AFFINITY_BASE_URL: z.string().default("https://api.affinity.co"),
  AFFINITY_API_KEY: z.string().default(""),
  AFFINITY_LIST_NAME: z.string().default("Fundraising"),
  AFFINITY_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  ROSTER_PROVIDER: z.enum(supportedRosterProviders).default("mock"),
  PROPUBLICA_BASE_URL: z
    .string()
    .default("https://projects.propublica.org/nonprofits/api/v2"),
  PROPUBLICA_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  ENRICHMENT_TIMEOUT_MS: z.coerce.number().int().positive().default(45_000),
  MAX_FOUNDATION_CONTACTS: z.coerce.number().int().positive().default(5),
  MATCH_THRESHOLD: z.coerce.number().int().min(0).max(100).default(80),
  CLASSIFIER_POLICY_PATH: z.string().default(""),
  OUTPUT_FORMAT: z.enum(supportedOutputFormats).default("csv"),
  OUTPUT_DIR: z.string().default("./out"),
});

export type AppEnv = z.infer<typeof envSchema>;

export const env: AppEnv = envSchema.parse(process.env);

/**
 * Normalizes configured form types once so filing queries stay deterministic across environments.
 */
export const filingForms = (): string[] =>
  Array.from(
    new Set(
      env.FILING_FORMS.split(",")
        .map((item) => item.trim().toUpperCase())
        .filter(Boolean),
    ),
  );

/**
 * Falls back to an empty reference list when Affinity is selected without a key, so matching is skipped rather than failing.
 */
export const referenceProvider = (): ReferenceProviderName => {
  if (env.REFERENCE_PROVIDER === "affinity" && !env.AFFINITY_API_KEY.trim()) {
    console.warn(
      "[config] REFERENCE_PROVIDER=affinity but AFFINITY_API_KEY is empty; CRM matching will be skipped.",
    );
    return "none";
  }

  return env.REFERENCE_PROVIDER;
};

export const filingsProvider = (): FilingsProviderName => env.FILINGS_PROVIDER;

export const rosterProvider = (): RosterProviderName => env.ROSTER_PROVIDER;
