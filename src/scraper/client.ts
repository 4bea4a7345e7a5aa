import { Value } from "@sinclair/typebox/value";

import { REGISTER_DEFAULTS, type RegisterConfig } from "../config.js";
import {
  ConfigurationError,
  NotFoundError,
  TransportError,
  describeError,
} from "../errors.js";
import { registerLogger } from "../logger.js";
import {
  DOCUMENT_FIELDS,
  RegisterAgencyListSchema,
  RegisterDocumentPageSchema,
  type RegisterAgency,
  type RegisterDocument,
} from "../types/index.js";

import type { Notice, NoticePage, NoticeSource } from "../types/sync.js";
import type { TSchema, Static } from "@sinclair/typebox";

export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

export interface RegisterClientOptions extends Partial<RegisterConfig> {
  /** Replaces the global fetch (tests) */
  fetch?: FetchFn;
  /** Replaces setTimeout-based waiting (tests) */
  sleep?: (ms: number) => Promise<void>;
}

const RETRYABLE_STATUSES = new Set([408, 429, 500, 502, 503, 504]);

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Name of an agency's storage folder: the short name when the register has
 * one, else the full name.
 */
export function agencyDisplayName(agency: RegisterAgency): string {
  return agency.short_name ?? agency.name;
}

/**
 * Match a configured identifier against the register's agency list,
 * case-insensitively, by short name first and then by full name.
 */
export function matchAgency(
  agencies: RegisterAgency[],
  identifier: string
): RegisterAgency | undefined {
  const wanted = identifier.trim().toLowerCase();
  return (
    agencies.find((a) => a.short_name?.toLowerCase() === wanted) ??
    agencies.find((a) => a.name.toLowerCase() === wanted)
  );
}

/**
 * Build the documents search URL for one page of an agency's notices.
 */
export function buildDocumentsUrl(
  baseUrl: string,
  agencySlug: string,
  page: number,
  perPage: number
): string {
  const params = new URLSearchParams();
  params.append("conditions[agencies][]", agencySlug);
  params.append("order", "newest");
  params.append("per_page", String(perPage));
  params.append("page", String(page));
  for (const field of DOCUMENT_FIELDS) {
    params.append("fields[]", field);
  }
  return `${baseUrl}/documents.json?${params.toString()}`;
}

export function toNotice(
  agency: string,
  folder: string,
  doc: RegisterDocument
): Notice {
  return {
    agency,
    folder,
    documentNumber: doc.document_number,
    title: doc.title,
    publicationDate: doc.publication_date,
    documentUrl: doc.pdf_url,
    abstract: doc.abstract,
  };
}

/**
 * Federal Register API client
 *
 * Requests are spaced by `rateLimitMs`. Network failures, 408/429 and 5xx
 * responses are retried up to `maxRetries` times with a linear backoff.
 */
export class RegisterClient implements NoticeSource {
  private readonly config: RegisterConfig;
  private readonly fetchFn: FetchFn;
  private readonly sleep: (ms: number) => Promise<void>;
  private lastRequestTime = 0;
  private agencyCache: RegisterAgency[] | undefined;
  private readonly resolved = new Map<string, RegisterAgency>();

  constructor(options: RegisterClientOptions = {}) {
    this.config = {
      baseUrl: options.baseUrl ?? REGISTER_DEFAULTS.baseUrl,
      perPage: options.perPage ?? REGISTER_DEFAULTS.perPage,
      rateLimitMs: options.rateLimitMs ?? REGISTER_DEFAULTS.rateLimitMs,
      timeoutMs: options.timeoutMs ?? REGISTER_DEFAULTS.timeoutMs,
      maxRetries: options.maxRetries ?? REGISTER_DEFAULTS.maxRetries,
    };
    this.fetchFn = options.fetch ?? ((url, init) => fetch(url, init));
    this.sleep = options.sleep ?? defaultSleep;
  }

  private async rateLimitedFetch(url: string): Promise<Response> {
    const elapsed = Date.now() - this.lastRequestTime;

    if (elapsed < this.config.rateLimitMs) {
      const waitTime = this.config.rateLimitMs - elapsed;
      registerLogger.debug(
        { waitTime },
        "Rate limiting: waiting before request"
      );
      await this.sleep(waitTime);
    }

    this.lastRequestTime = Date.now();
    registerLogger.debug({ url }, "Sending request to register API");

    const startTime = performance.now();
    const response = await this.fetchFn(url, {
      signal: AbortSignal.timeout(this.config.timeoutMs),
    });
    const duration = Math.round(performance.now() - startTime);

    registerLogger.debug(
      {
        url,
        status: response.status,
        statusText: response.statusText,
        duration: `${String(duration)}ms`,
      },
      "Received response from register API"
    );

    return response;
  }

  /**
   * GET with retries. Returns the first OK response; 404 becomes
   * NotFoundError, anything else that survives the retries TransportError.
   */
  private async request(url: string, what: string): Promise<Response> {
    let attempt = 0;

    for (;;) {
      let failure: TransportError;

      try {
        const response = await this.rateLimitedFetch(url);
        if (response.ok) {
          return response;
        }
        // Release the connection; the body of a failed response is unused
        await response.body?.cancel();
        if (response.status === 404) {
          throw new NotFoundError(`${what} not found: ${url}`);
        }
        failure = new TransportError(
          `Failed to fetch ${what}: ${String(response.status)} ${response.statusText}`,
          { status: response.status }
        );
        if (!RETRYABLE_STATUSES.has(response.status)) {
          throw failure;
        }
      } catch (error) {
        if (error instanceof NotFoundError || error instanceof TransportError) {
          throw error;
        }
        failure = new TransportError(
          `Failed to fetch ${what}: ${describeError(error)}`,
          { cause: error }
        );
      }

      if (attempt >= this.config.maxRetries) {
        registerLogger.error(
          { url, attempts: attempt + 1, error: failure.message },
          "Register request failed"
        );
        throw failure;
      }

      attempt += 1;
      const backoff = this.config.rateLimitMs * attempt;
      registerLogger.warn(
        { url, attempt, backoff, error: failure.message },
        "Retrying register request"
      );
      await this.sleep(backoff);
    }
  }

  private async requestJson<T extends TSchema>(
    url: string,
    what: string,
    schema: T
  ): Promise<Static<T>> {
    const response = await this.request(url, what);

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new TransportError(
        `Invalid JSON in ${what} response: ${describeError(error)}`,
        { cause: error }
      );
    }

    if (!Value.Check(schema, body)) {
      const first = Value.Errors(schema, body).First();
      throw new TransportError(
        `Unexpected ${what} response shape${first !== undefined ? ` at ${first.path}: ${first.message}` : ""}`
      );
    }
    return body;
  }

  /**
   * Fetch the full agency list
   */
  async fetchAgencies(): Promise<RegisterAgency[]> {
    if (this.agencyCache !== undefined) {
      return this.agencyCache;
    }

    const url = `${this.config.baseUrl}/agencies`;
    registerLogger.info({ url }, "Fetching agency list");

    const agencies = await this.requestJson(
      url,
      "agency list",
      RegisterAgencyListSchema
    );
    registerLogger.debug(
      { agencyCount: agencies.length },
      "Successfully fetched agency list"
    );

    this.agencyCache = agencies;
    return agencies;
  }

  /**
   * Resolve a configured agency identifier to the register's agency record.
   */
  async resolveAgency(identifier: string): Promise<RegisterAgency> {
    const cached = this.resolved.get(identifier);
    if (cached !== undefined) {
      return cached;
    }

    const agency = matchAgency(await this.fetchAgencies(), identifier);
    if (agency === undefined) {
      throw new ConfigurationError(
        `No register agency matches '${identifier}'`,
        { agency: identifier }
      );
    }

    registerLogger.debug(
      { identifier, slug: agency.slug, name: agency.name },
      "Resolved agency"
    );
    this.resolved.set(identifier, agency);
    return agency;
  }

  /**
   * List one page of an agency's notices, newest first
   */
  async listNotices(agency: string, page: number): Promise<NoticePage> {
    const resolved = await this.resolveAgency(agency);
    const url = buildDocumentsUrl(
      this.config.baseUrl,
      resolved.slug,
      page,
      this.config.perPage
    );
    registerLogger.info({ agency, page }, "Fetching notice page");

    const data = await this.requestJson(
      url,
      `notices of ${agency}`,
      RegisterDocumentPageSchema
    );
    const results = data.results ?? [];

    registerLogger.debug(
      { agency, page, noticeCount: results.length, total: data.count },
      "Successfully fetched notice page"
    );

    return {
      notices: results.map((doc) =>
        toNotice(agency, agencyDisplayName(resolved), doc)
      ),
      hasMore:
        data.next_page_url !== undefined &&
        data.next_page_url !== null &&
        results.length > 0,
    };
  }

  /**
   * Download a notice's PDF
   */
  async fetchDocument(documentUrl: string): Promise<Uint8Array> {
    registerLogger.debug({ url: documentUrl }, "Downloading document");

    const response = await this.request(documentUrl, "document");
    try {
      return new Uint8Array(await response.arrayBuffer());
    } catch (error) {
      throw new TransportError(
        `Failed to read document body from ${documentUrl}: ${describeError(error)}`,
        { cause: error }
      );
    }
  }
}
