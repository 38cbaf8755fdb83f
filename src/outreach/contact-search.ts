/**
 * Contact search session.
 *
 * The discovery and freshness code only talks to `ContactSearchSession`.
 * `HttpContactSearchClient` reaches a contact-search service over REST; any
 * other backend (a browser session, a fixture in tests) implements the same
 * four calls.
 */

import { Type, type TSchema, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ConfigError } from "./errors.js";
import { withRetry, type Sleep } from "./pacing.js";
import type { ContactCard, ContactProfile, ContactSearchQuery } from "./types.js";

export interface ContactSearchSession {
  /** False when the session is logged out or the key is rejected. */
  verifySession(): Promise<boolean>;
  search(query: ContactSearchQuery): Promise<ContactCard[]>;
  /** One profile visit costs one unit of the service's daily allowance. */
  visitProfile(detailLink: string): Promise<ContactProfile>;
  /** The service's own count of visits left today, or null when unavailable. */
  fetchRemainingQuota(): Promise<number | null>;
}

export type HttpContactSearchClientOptions = {
  apiUrl: string;
  apiKey: string | null;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
  /** Backoff between retries of transient failures. */
  sleep?: Sleep;
};

const ContactCardSchema = Type.Object({
  name: Type.String(),
  title: Type.Optional(Type.Union([Type.String(), Type.Null()])),
  detailLink: Type.String(),
  hasEmailIndicator: Type.Optional(Type.Boolean()),
});

const SearchResponseSchema = Type.Object({
  results: Type.Array(ContactCardSchema),
});

const ProfileResponseSchema = Type.Object({
  email: Type.Optional(Type.Union([Type.String(), Type.Null()])),
  title: Type.Optional(Type.Union([Type.String(), Type.Null()])),
  companyText: Type.Optional(Type.Union([Type.String(), Type.Null()])),
});

const UsageResponseSchema = Type.Object({
  remaining: Type.Optional(Type.Union([Type.Number(), Type.Null()])),
});

function decode<T extends TSchema>(schema: T, value: unknown, what: string): Static<T> {
  if (!Value.Check(schema, value)) {
    const first = [...Value.Errors(schema, value)][0];
    throw new Error(
      `Contact search returned an unexpected ${what}: ${first ? `${first.path} ${first.message}` : "shape mismatch"}`,
    );
  }
  return value;
}

export class HttpContactSearchClient implements ContactSearchSession {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly opts: HttpContactSearchClientOptions) {
    this.baseUrl = opts.apiUrl.replace(/\/+$/, "");
    this.fetchImpl = opts.fetchImpl ?? fetch;
  }

  private async request(pathOrUrl: string): Promise<Response> {
    const url = /^https?:\/\//i.test(pathOrUrl) ? pathOrUrl : `${this.baseUrl}${pathOrUrl}`;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.opts.timeoutMs);
    try {
      const headers: Record<string, string> = { Accept: "application/json" };
      if (this.opts.apiKey) {
        headers.Authorization = `Bearer ${this.opts.apiKey}`;
      }
      return await this.fetchImpl(url, { method: "GET", headers, signal: controller.signal });
    } finally {
      clearTimeout(timeout);
    }
  }

  private async getJson(pathOrUrl: string): Promise<unknown> {
    return await withRetry({
      task: async () => {
        const res = await this.request(pathOrUrl);
        if (!res.ok) {
          const errorText = await res.text().catch(() => "Unknown error");
          throw new Error(`Contact search error (${res.status}): ${errorText}`);
        }
        const body: unknown = await res.json();
        return body;
      },
      sleep: this.opts.sleep,
    });
  }

  async verifySession(): Promise<boolean> {
    if (!this.opts.apiKey) {
      throw new ConfigError("Contact search API key is not configured (CONTACT_SEARCH_API_KEY)");
    }
    const res = await this.request("/session");
    if (res.status === 401 || res.status === 403) {
      return false;
    }
    if (!res.ok) {
      const errorText = await res.text().catch(() => "Unknown error");
      throw new Error(`Contact search error (${res.status}): ${errorText}`);
    }
    return true;
  }

  async search(query: ContactSearchQuery): Promise<ContactCard[]> {
    const params = new URLSearchParams({ company: query.company });
    if (query.titleFilter) {
      params.set("title", query.titleFilter);
    }
    if (query.requireEmailIndicator) {
      params.set("requireEmail", "true");
    }
    const body = decode(
      SearchResponseSchema,
      await this.getJson(`/contacts/search?${params.toString()}`),
      "search response",
    );
    return body.results.map((card) => ({
      name: card.name.trim(),
      title: card.title?.trim() || null,
      detailLink: card.detailLink,
      hasEmailIndicator: card.hasEmailIndicator === true,
    }));
  }

  async visitProfile(detailLink: string): Promise<ContactProfile> {
    const body = decode(ProfileResponseSchema, await this.getJson(detailLink), "profile");
    return {
      email: body.email?.trim() || null,
      title: body.title?.trim() || null,
      companyText: body.companyText?.trim() || null,
    };
  }

  async fetchRemainingQuota(): Promise<number | null> {
    const body = decode(UsageResponseSchema, await this.getJson("/account/usage"), "usage report");
    const remaining = body.remaining;
    return typeof remaining === "number" && Number.isFinite(remaining)
      ? Math.max(0, Math.trunc(remaining))
      : null;
  }
}
