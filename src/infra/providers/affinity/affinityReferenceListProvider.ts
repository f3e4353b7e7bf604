import type { ReferenceListProviderPort } from "../../../core/ports/inboundPorts";
import type { AppBoundaryError } from "../../../core/entities/appError";
import type { ReferenceEntry } from "../../../core/entities/reference";
import type { ReferenceKind } from "../../../core/entities/stockholder";
import { err, ok, type Result } from "neverthrow";
import type { Logger } from "pino";
import { z } from "zod";
import { logger as defaultLogger } from "../../../shared/logger/logger";
import { HttpClient } from "../../http/httpClient";
import { fromHttpFailure, malformedResponse } from "../../http/boundaryError";

const PROVIDER = "affinity";
const PAGE_SIZE = 500;
// List entry entity types in the v1 API.
const PERSON_ENTITY = 0;
const ORGANIZATION_ENTITY = 1;

const listsSchema = z.array(z.object({ id: z.number(), name: z.string() }));

const listDetailSchema = z.object({
  id: z.number(),
  fields: z
    .array(z.object({ id: z.number(), name: z.string() }))
    .default([]),
});

const listEntrySchema = z.object({
  id: z.number(),
  entity_id: z.number(),
  entity_type: z.number(),
  entity: z
    .object({
      name: z.string().nullish(),
      first_name: z.string().nullish(),
      last_name: z.string().nullish(),
    })
    .nullish(),
});

const listEntriesPageSchema = z.object({
  list_entries: z.array(listEntrySchema),
  next_page_token: z.string().nullish(),
});

const fieldValuesSchema = z.array(
  z.object({ field_id: z.number(), value: z.unknown() }),
);

const interactionsSchema = z.object({
  interactions: z.array(z.object({ date: z.string().nullish() })).default([]),
});

const textValueSchema = z.union([
  z.string(),
  z.number(),
  z.object({ text: z.string() }),
]);

type ListEntry = z.infer<typeof listEntrySchema>;

type EntryFields = { status: string | null; notes: string | null };

type FieldIds = { status: ReadonlySet<number>; notes: ReadonlySet<number> };

const ISO_DATE_PREFIX = /^\d{4}-\d{2}-\d{2}/;

const entryKind = (entry: ListEntry): ReferenceKind | null => {
  if (entry.entity_type === PERSON_ENTITY) {
    return "person";
  }

  if (entry.entity_type === ORGANIZATION_ENTITY) {
    return "organization";
  }

  return null;
};

const entryName = (entry: ListEntry, kind: ReferenceKind): string => {
  const entity = entry.entity;
  if (!entity) {
    return "";
  }

  if (kind === "organization") {
    return entity.name?.trim() ?? "";
  }

  return [entity.first_name, entity.last_name]
    .map((part) => part?.trim() ?? "")
    .filter(Boolean)
    .join(" ");
};

const renderText = (value: unknown): string | null => {
  const parsed = textValueSchema.safeParse(value);
  if (!parsed.success) {
    return null;
  }

  const text =
    typeof parsed.data === "object" ? parsed.data.text : String(parsed.data);
  return text.trim() || null;
};

const fieldIdsMatching = (
  fields: ReadonlyArray<{ id: number; name: string }>,
  pattern: RegExp,
): Set<number> =>
  new Set(fields.filter((field) => pattern.test(field.name)).map((field) => field.id));

/**
 * Loads the named Affinity list as CRM reference entries. Status comes from the list's status or stage field,
 * notes from its note fields and last activity from the entity's most recent interaction.
 */
export class AffinityReferenceListProvider implements ReferenceListProviderPort {
  constructor(
    private readonly baseUrl: string,
    private readonly apiKey: string,
    private readonly listName: string,
    private readonly timeoutMs = 30_000,
    private readonly httpClient = new HttpClient(),
    private readonly log: Logger = defaultLogger,
  ) {
    if (!this.apiKey.trim()) {
      throw new Error(
        "AFFINITY_API_KEY is required when REFERENCE_PROVIDER is set to affinity.",
      );
    }
  }

  async loadEntries(): Promise<Result<ReferenceEntry[], AppBoundaryError>> {
    const listIdResult = await this.findListId();
    if (listIdResult.isErr()) {
      return err(listIdResult.error);
    }

    const listId = listIdResult.value;
    const detailResult = await this.fetchParsed(
      `/lists/${listId}`,
      listDetailSchema,
      "Affinity list detail",
    );
    if (detailResult.isErr()) {
      return err(detailResult.error);
    }

    const fieldIds: FieldIds = {
      status: fieldIdsMatching(detailResult.value.fields, /status|stage/i),
      notes: fieldIdsMatching(detailResult.value.fields, /note/i),
    };

    const entriesResult = await this.fetchAllEntries(listId);
    if (entriesResult.isErr()) {
      return err(entriesResult.error);
    }

    const references: ReferenceEntry[] = [];
    for (const entry of entriesResult.value) {
      const kind = entryKind(entry);
      const name = kind ? entryName(entry, kind) : "";
      if (!kind || !name) {
        continue;
      }

      let fields: EntryFields = { status: null, notes: null };
      if (fieldIds.status.size > 0 || fieldIds.notes.size > 0) {
        const fieldsResult = await this.fetchEntryFields(entry.id, fieldIds);
        if (fieldsResult.isErr()) {
          return err(fieldsResult.error);
        }

        fields = fieldsResult.value;
      }

      references.push({
        referenceId: `affinity-${kind}-${entry.entity_id}`,
        name,
        kind,
        status: fields.status,
        lastActivity: await this.fetchLastActivity(kind, entry.entity_id),
        notes: fields.notes,
      });
    }

    this.log.info(
      { list: this.listName, listId, entries: references.length },
      "Affinity list loaded",
    );
    return ok(references);
  }

  private async findListId(): Promise<Result<number, AppBoundaryError>> {
    const listsResult = await this.fetchParsed("/lists", listsSchema, "Affinity lists");
    if (listsResult.isErr()) {
      return err(listsResult.error);
    }

    const wanted = this.listName.trim().toLowerCase();
    const list = listsResult.value.find(
      (candidate) => candidate.name.trim().toLowerCase() === wanted,
    );
    if (!list) {
      return err({
        source: "reference",
        code: "config_invalid",
        provider: PROVIDER,
        message: `Affinity list "${this.listName}" was not found.`,
        retryable: false,
      });
    }

    return ok(list.id);
  }

  private async fetchAllEntries(
    listId: number,
  ): Promise<Result<ListEntry[], AppBoundaryError>> {
    const entries: ListEntry[] = [];
    let pageToken: string | null = null;

    do {
      const query: Record<string, string> = { page_size: String(PAGE_SIZE) };
      if (pageToken) {
        query.page_token = pageToken;
      }

      const pageResult = await this.fetchParsed(
        `/lists/${listId}/list-entries`,
        listEntriesPageSchema,
        "Affinity list entries",
        query,
      );
      if (pageResult.isErr()) {
        return err(pageResult.error);
      }

      entries.push(...pageResult.value.list_entries);
      pageToken = pageResult.value.next_page_token ?? null;
    } while (pageToken);

    return ok(entries);
  }

  private async fetchEntryFields(
    listEntryId: number,
    fieldIds: FieldIds,
  ): Promise<Result<EntryFields, AppBoundaryError>> {
    const valuesResult = await this.fetchParsed(
      "/field-values",
      fieldValuesSchema,
      "Affinity field values",
      { list_entry_id: String(listEntryId) },
    );
    if (valuesResult.isErr()) {
      return err(valuesResult.error);
    }

    const fields: EntryFields = { status: null, notes: null };
    for (const fieldValue of valuesResult.value) {
      const text = renderText(fieldValue.value);
      if (!text) {
        continue;
      }

      if (!fields.status && fieldIds.status.has(fieldValue.field_id)) {
        fields.status = text;
      } else if (!fields.notes && fieldIds.notes.has(fieldValue.field_id)) {
        fields.notes = text;
      }
    }

    return ok(fields);
  }

  /**
   * Best effort: an interaction lookup failure leaves last activity empty and is only logged.
   */
  private async fetchLastActivity(
    kind: ReferenceKind,
    entityId: number,
  ): Promise<string | null> {
    const result = await this.fetchParsed(
      "/interactions",
      interactionsSchema,
      "Affinity interactions",
      { [`${kind}_id`]: String(entityId), page_size: "1" },
    );
    if (result.isErr()) {
      this.log.warn(
        { kind, entityId, code: result.error.code, reason: result.error.message },
        "Affinity interactions unavailable; last activity left empty",
      );
      return null;
    }

    const date = result.value.interactions[0]?.date?.trim();
    if (!date) {
      return null;
    }

    return ISO_DATE_PREFIX.test(date) ? date.slice(0, 10) : date;
  }

  private async fetchParsed<T>(
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    label: string,
    query: Record<string, string> = {},
  ): Promise<Result<T, AppBoundaryError>> {
    const url = new URL(path, this.baseUrl);
    for (const [key, value] of Object.entries(query)) {
      url.searchParams.set(key, value);
    }

    const response = await this.httpClient.requestJson({
      url: url.toString(),
      method: "GET",
      timeoutMs: this.timeoutMs,
      retries: 2,
      retryDelayMs: 300,
      headers: {
        Authorization: `Basic ${Buffer.from(`:${this.apiKey}`).toString("base64")}`,
        Accept: "application/json",
      },
    });

    if (response.isErr()) {
      return err(fromHttpFailure("reference", PROVIDER, response.error, label));
    }

    const parsed = schema.safeParse(response.value);
    if (!parsed.success) {
      return err(
        malformedResponse("reference", PROVIDER, `${label} payload was malformed.`, parsed.error),
      );
    }

    return ok(parsed.data);
  }
}
