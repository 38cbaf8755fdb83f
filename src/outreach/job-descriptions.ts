import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { SubsystemLogger } from "../logging.js";
import { errorMessage } from "./errors.js";
import type { OutreachStore } from "./store.js";
import type { JobPosting } from "./types.js";

export interface JobDescriptionFetcher {
  /** Null when the page has no usable description. */
  fetch(url: string): Promise<JobPosting | null>;
}

const GREENHOUSE_API = "https://boards-api.greenhouse.io/v1/boards";
const LEVER_API = "https://api.lever.co/v0/postings";
const MIN_DESCRIPTION_LENGTH = 50;

const ENTITIES: Record<string, string> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'",
  nbsp: "\u00a0",
  "#39": "'",
};

function decodeEntities(value: string): string {
  return value.replace(/&(#\d+|#x[0-9a-f]+|[a-z]+);/gi, (whole, name: string) => {
    const lower = name.toLowerCase();
    if (lower in ENTITIES) {
      return ENTITIES[lower] ?? whole;
    }
    if (lower.startsWith("#x")) {
      return String.fromCodePoint(Number.parseInt(lower.slice(2), 16));
    }
    if (lower.startsWith("#")) {
      return String.fromCodePoint(Number.parseInt(lower.slice(1), 10));
    }
    return whole;
  });
}

/** Plain text from posting HTML. Greenhouse double-escapes its markup. */
export function htmlToText(html: string): string {
  const markup = /&lt;\/?[a-z]/i.test(html) ? decodeEntities(html) : html;
  return decodeEntities(
    markup
      .replace(/<(script|style)[^>]*>[\s\S]*?<\/\1>/gi, " ")
      .replace(/<br\s*\/?>/gi, "\n")
      .replace(/<\/(p|div|li|h[1-6]|ul|ol)>/gi, "\n")
      .replace(/<li[^>]*>/gi, "- ")
      .replace(/<[^>]+>/g, " "),
  )
    .split("\n")
    .map((line) => line.replace(/[ \t\u00a0]+/g, " ").trim())
    .filter(Boolean)
    .join("\n");
}

export type AtsJobReference =
  | { provider: "greenhouse"; board: string; jobId: string }
  | { provider: "lever"; company: string; postingId: string };

export function parseAtsUrl(url: string): AtsJobReference | null {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return null;
  }
  const host = parsed.hostname.toLowerCase();
  const segments = parsed.pathname.split("/").filter(Boolean);

  if (host === "boards.greenhouse.io" || host === "job-boards.greenhouse.io") {
    const jobsIndex = segments.indexOf("jobs");
    const board = segments[jobsIndex - 1];
    const jobId = segments[jobsIndex + 1];
    if (jobsIndex > 0 && board && jobId && /^\d+$/.test(jobId)) {
      return { provider: "greenhouse", board, jobId };
    }
    const ghJid = parsed.searchParams.get("gh_jid");
    if (segments[0] && ghJid) {
      return { provider: "greenhouse", board: segments[0], jobId: ghJid };
    }
    return null;
  }
  if (host === "jobs.lever.co" && segments[0] && segments[1]) {
    return { provider: "lever", company: segments[0], postingId: segments[1] };
  }
  return null;
}

const GreenhouseJobSchema = Type.Object({
  title: Type.Optional(Type.String()),
  content: Type.Optional(Type.String()),
  company_name: Type.Optional(Type.String()),
  location: Type.Optional(
    Type.Union([Type.Object({ name: Type.Optional(Type.String()) }), Type.Null()]),
  ),
});

const LeverPostingSchema = Type.Object({
  text: Type.Optional(Type.String()),
  descriptionPlain: Type.Optional(Type.String()),
  description: Type.Optional(Type.String()),
  additionalPlain: Type.Optional(Type.String()),
  lists: Type.Optional(
    Type.Array(
      Type.Object({ text: Type.Optional(Type.String()), content: Type.Optional(Type.String()) }),
    ),
  ),
  categories: Type.Optional(Type.Object({ location: Type.Optional(Type.String()) })),
});

/** Reads postings from the public Greenhouse and Lever job board APIs. */
export class AtsJobDescriptionFetcher implements JobDescriptionFetcher {
  private readonly fetchImpl: typeof fetch;
  private readonly timeoutMs: number;

  constructor(opts?: { fetchImpl?: typeof fetch; timeoutMs?: number }) {
    this.fetchImpl = opts?.fetchImpl ?? fetch;
    this.timeoutMs = opts?.timeoutMs ?? 15_000;
  }

  async fetch(url: string): Promise<JobPosting | null> {
    const ref = parseAtsUrl(url);
    if (!ref) {
      return null;
    }
    const posting =
      ref.provider === "greenhouse"
        ? await this.fetchGreenhouse(url, ref.board, ref.jobId)
        : await this.fetchLever(url, ref.company, ref.postingId);
    if (!posting || posting.description.length < MIN_DESCRIPTION_LENGTH) {
      return null;
    }
    return posting;
  }

  private async getJson(apiUrl: string): Promise<unknown> {
    const response = await this.fetchImpl(apiUrl, {
      headers: { Accept: "application/json" },
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    if (response.status === 404) {
      return null;
    }
    if (!response.ok) {
      throw new Error(`Job board returned ${response.status} for ${apiUrl}`);
    }
    return await response.json();
  }

  private async fetchGreenhouse(
    url: string,
    board: string,
    jobId: string,
  ): Promise<JobPosting | null> {
    const data = await this.getJson(`${GREENHOUSE_API}/${board}/jobs/${jobId}`);
    if (data === null || !Value.Check(GreenhouseJobSchema, data)) {
      return null;
    }
    return {
      url,
      title: data.title?.trim() || null,
      company: data.company_name?.trim() || null,
      location: data.location?.name?.trim() || null,
      description: htmlToText(data.content ?? ""),
    };
  }

  private async fetchLever(
    url: string,
    company: string,
    postingId: string,
  ): Promise<JobPosting | null> {
    const data = await this.getJson(`${LEVER_API}/${company}/${postingId}`);
    if (data === null || !Value.Check(LeverPostingSchema, data)) {
      return null;
    }
    const sections = [
      data.descriptionPlain?.trim() || htmlToText(data.description ?? ""),
      ...(data.lists ?? []).map((list) =>
        [list.text?.trim() ?? "", htmlToText(list.content ?? "")].filter(Boolean).join("\n"),
      ),
      data.additionalPlain?.trim() ?? "",
    ];
    return {
      url,
      title: data.text?.trim() || null,
      company: null,
      location: data.categories?.location?.trim() || null,
      description: sections.filter(Boolean).join("\n\n"),
    };
  }
}

const StoredPostingSchema = Type.Object({
  title: Type.Union([Type.String(), Type.Null()]),
  company: Type.Union([Type.String(), Type.Null()]),
  location: Type.Union([Type.String(), Type.Null()]),
  description: Type.String({ minLength: 1 }),
});

function parsePosting(text: string, url: string): JobPosting | null {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return null;
  }
  if (!Value.Check(StoredPostingSchema, raw)) {
    return null;
  }
  return {
    url,
    title: raw.title,
    company: raw.company,
    location: raw.location,
    description: raw.description,
  };
}

/** Serves postings from the job cache and fills it from the fetcher on a miss. */
export class CachedJobDescriptionSource {
  constructor(
    private readonly deps: {
      store: OutreachStore;
      fetcher: JobDescriptionFetcher;
      logger: SubsystemLogger;
    },
  ) {}

  cached(url: string): JobPosting | null {
    const text = this.deps.store.getJobDescription(url);
    return text === null ? null : parsePosting(text, url);
  }

  async get(url: string): Promise<JobPosting | null> {
    const hit = this.cached(url);
    if (hit) {
      return hit;
    }
    let posting: JobPosting | null;
    try {
      posting = await this.deps.fetcher.fetch(url);
    } catch (err) {
      this.deps.logger.warn(`Could not fetch job description for ${url}: ${errorMessage(err)}`);
      return null;
    }
    if (!posting) {
      this.deps.logger.debug(`No usable job description at ${url}`);
      return null;
    }
    this.deps.store.saveJobDescription(url, JSON.stringify(posting));
    return posting;
  }
}
