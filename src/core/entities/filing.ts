/**
 * Calendar date in `YYYY-MM-DD` form.
 */
export type IsoDate = string;

export type FilingMetadata = {
  documentId: string;
  provider: string;
  companyName: string;
  cik?: string;
  formType: string;
  accessionNo?: string;
  filingDate: IsoDate;
  docUrl: string;
};

export type FilingDocument = {
  documentId: string;
  rawContent: string;
  companyName: string;
  filingDate: IsoDate;
  formType?: string;
  docUrl?: string;
};
