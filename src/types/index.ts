// Federal Register API Types
// Shapes of the `api/v1` responses this loader reads. Only the fields we
// request are modelled; the register returns many more.

import { Type, type Static } from "@sinclair/typebox";

// =====================
// Agency Types
// =====================

/**
 * Agency record - from GET /agencies
 */
export const RegisterAgencySchema = Type.Object({
  id: Type.Number(),
  name: Type.String(),
  /** Abbreviation such as "EPA"; null for many sub-agencies */
  short_name: Type.Union([Type.String(), Type.Null()]),
  /** URL-safe identifier used in `conditions[agencies][]` */
  slug: Type.String(),
  url: Type.Optional(Type.Union([Type.String(), Type.Null()])),
  recent_articles_url: Type.Optional(Type.Union([Type.String(), Type.Null()])),
});

export type RegisterAgency = Static<typeof RegisterAgencySchema>;

export const RegisterAgencyListSchema = Type.Array(RegisterAgencySchema);

// =====================
// Document Types
// =====================

/**
 * Document fields requested via `fields[]`
 */
export const DOCUMENT_FIELDS = [
  "document_number",
  "title",
  "publication_date",
  "pdf_url",
  "abstract",
] as const;

/**
 * Document search result item
 */
export const RegisterDocumentSchema = Type.Object({
  document_number: Type.String(),
  title: Type.String(),
  /** ISO date, e.g. "2024-05-17" */
  publication_date: Type.String(),
  pdf_url: Type.Union([Type.String(), Type.Null()]),
  abstract: Type.Union([Type.String(), Type.Null()]),
});

export type RegisterDocument = Static<typeof RegisterDocumentSchema>;

/**
 * Page of documents - from GET /documents.json
 *
 * `results` is omitted entirely when a search matches nothing.
 */
export const RegisterDocumentPageSchema = Type.Object({
  count: Type.Number(),
  total_pages: Type.Optional(Type.Number()),
  next_page_url: Type.Optional(Type.Union([Type.String(), Type.Null()])),
  results: Type.Optional(Type.Array(RegisterDocumentSchema)),
});

export type RegisterDocumentPage = Static<typeof RegisterDocumentPageSchema>;
