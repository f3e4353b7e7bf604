import { EnrichmentService } from "../services/enrichmentService";
import {
  DEFAULT_CLASSIFICATION_POLICY,
  EntityClassifierService,
  loadClassificationPolicy,
} from "../services/entityClassifierService";
import { MatchResolverService } from "../services/matchResolverService";
import { ProspectorPipelineService } from "../services/prospectorPipelineService";
import { ProspectorRunService } from "../services/prospectorRunService";
import { RecordNormalizerService } from "../services/recordNormalizerService";
import { TableExtractorService } from "../services/tableExtractorService";
import {
  env,
  filingsProvider,
  referenceProvider,
  rosterProvider,
  type OutputFormat,
} from "../../shared/config/env";
import { logger } from "../../shared/logger/logger";
import {
  CsvFileOutputSink,
  JsonFileOutputSink,
} from "../../infra/output/fileOutputSinks";
import { AffinityReferenceListProvider } from "../../infra/providers/affinity/affinityReferenceListProvider";
import { MockFilingsProvider } from "../../infra/providers/mocks/mockFilingsProvider";
import {
  EmptyReferenceListProvider,
  MockReferenceListProvider,
} from "../../infra/providers/mocks/mockReferenceListProvider";
import { MockRosterLookup } from "../../infra/providers/mocks/mockRosterLookup";
import { ProPublicaRosterLookup } from "../../infra/providers/propublica/proPublicaRosterLookup";
import { SecEdgarFilingsProvider } from "../../infra/providers/sec/secEdgarFilingsProvider";
import { SystemClock, UuidIdGenerator } from "../../infra/system/systemPorts";
import type {
  FilingsProviderPort,
  ReferenceListProviderPort,
  RosterLookupPort,
} from "../../core/ports/inboundPorts";
import type { OutputSinkPort } from "../../core/ports/outboundPorts";

export type RuntimeOverrides = {
  matchThreshold?: number;
  outputFormat?: OutputFormat;
  outputDir?: string;
};

/**
 * Resolves the configured filings adapter while preserving a mock fallback for local development.
 */
const createFilingsProvider = (): FilingsProviderPort => {
  if (filingsProvider() === "sec-edgar") {
    return new SecEdgarFilingsProvider(
      env.SEC_EDGAR_SEARCH_URL,
      env.SEC_EDGAR_ARCHIVES_BASE_URL,
      env.SEC_EDGAR_USER_AGENT,
      env.SEC_EDGAR_TIMEOUT_MS,
    );
  }

  return new MockFilingsProvider();
};

const createReferenceProvider = (): ReferenceListProviderPort => {
  const provider = referenceProvider();
  if (provider === "affinity") {
    return new AffinityReferenceListProvider(
      env.AFFINITY_BASE_URL,
      env.AFFINITY_API_KEY,
      env.AFFINITY_LIST_NAME,
      env.AFFINITY_TIMEOUT_MS,
    );
  }

  if (provider === "mock") {
    return new MockReferenceListProvider();
  }

  return new EmptyReferenceListProvider();
};

/**
 * `null` means no roster source; foundation records then report their lookup as unavailable.
 */
const createRosterLookup = (): RosterLookupPort | null => {
  const provider = rosterProvider();
  if (provider === "propublica") {
    return new ProPublicaRosterLookup(
      env.PROPUBLICA_BASE_URL,
      env.PROPUBLICA_TIMEOUT_MS,
    );
  }

  if (provider === "mock") {
    return new MockRosterLookup();
  }

  return null;
};

const createOutputSink = (format: OutputFormat, directory: string): OutputSinkPort =>
  format === "json"
    ? new JsonFileOutputSink(directory)
    : new CsvFileOutputSink(directory);

const createClassifier = (): EntityClassifierService => {
  const policyPath = env.CLASSIFIER_POLICY_PATH.trim();
  if (!policyPath) {
    return new EntityClassifierService(DEFAULT_CLASSIFICATION_POLICY);
  }

  logger.info({ policyPath }, "Loading classification policy");
  return new EntityClassifierService(loadClassificationPolicy(policyPath));
};

/**
 * Centralizes runtime wiring so every CLI command shares one composition root.
 */
export const createRuntime = (overrides: RuntimeOverrides = {}) => {
  const clock = new SystemClock();
  const ids = new UuidIdGenerator();

  const filingsProviderAdapter = createFilingsProvider();
  const referenceProviderAdapter = createReferenceProvider();
  const rosterLookup = createRosterLookup();
  const outputSink = createOutputSink(
    overrides.outputFormat ?? env.OUTPUT_FORMAT,
    overrides.outputDir ?? env.OUTPUT_DIR,
  );

  const classifier = createClassifier();
  const matcher = new MatchResolverService(
    overrides.matchThreshold ?? env.MATCH_THRESHOLD,
  );
  const enrichment = new EnrichmentService(rosterLookup, {
    timeoutMs: env.ENRICHMENT_TIMEOUT_MS,
    maxContacts: env.MAX_FOUNDATION_CONTACTS,
  });

  const pipeline = new ProspectorPipelineService(
    new TableExtractorService(),
    new RecordNormalizerService(),
    classifier,
    matcher,
    enrichment,
  );
  const runService = new ProspectorRunService(
    filingsProviderAdapter,
    referenceProviderAdapter,
    pipeline,
    outputSink,
    clock,
    ids,
  );

  return {
    clock,
    classifier,
    matcher,
    referenceProvider: referenceProviderAdapter,
    runService,
  };
};

export type Runtime = ReturnType<typeof createRuntime>;
