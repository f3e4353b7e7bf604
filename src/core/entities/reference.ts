import type { ReferenceKind } from "./stockholder";

export type ReferenceEntry = {
  referenceId: string;
  name: string;
  kind: ReferenceKind;
  status: string | null;
  /** Date of the most recent CRM interaction, `YYYY-MM-DD`. */
  lastActivity?: string | null;
  notes?: string | null;
};
