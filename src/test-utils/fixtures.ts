import { createSubsystemLogger, type SubsystemLogger } from "../logging.js";
import type { ContactSearchSession } from "../outreach/contact-search.js";
import type { LanguageModelClient } from "../outreach/language-model.js";
import type { MailTransport } from "../outreach/mailer.js";
import type { Pacer } from "../outreach/pacing.js";
import type {
  ContactCard,
  ContactProfile,
  ContactSearchQuery,
  OutgoingMessage,
  SendOutcome,
} from "../outreach/types.js";
import type { RuntimeEnv } from "../runtime.js";

export const DAY_MS = 24 * 60 * 60 * 1000;

export class ExitError extends Error {
  constructor(readonly code: number) {
    super(`exit ${code}`);
  }
}

export function captureRuntime(): RuntimeEnv & { logs: string[]; errors: string[] } {
  const logs: string[] = [];
  const errors: string[] = [];
  return {
    logs,
    errors,
    log: (...args) => {
      logs.push(args.map(String).join(" "));
    },
    error: (...args) => {
      errors.push(args.map(String).join(" "));
    },
    exit: (code) => {
      throw new ExitError(code);
    },
  };
}

export function testLogger(subsystem = "test"): SubsystemLogger & {
  runtime: ReturnType<typeof captureRuntime>;
} {
  const runtime = captureRuntime();
  return Object.assign(createSubsystemLogger(subsystem, { runtime, debug: false }), { runtime });
}

/** A settable clock. */
export type FakeClock = {
  now: () => number;
  advance: (ms: number) => void;
  set: (ms: number) => void;
};

export function fixedClock(start: number): FakeClock {
  let current = start;
  return {
    now: () => current,
    advance: (ms) => {
      current += ms;
    },
    set: (ms) => {
      current = ms;
    },
  };
}

/** Records every pause instead of waiting; `onSleep` can move a fake clock. */
export function recordingPacer(onSleep?: (ms: number) => void): Pacer & {
  pauses: number[];
  sleeps: number[];
} {
  const pauses: number[] = [];
  const sleeps: number[] = [];
  return {
    pauses,
    sleeps,
    pause: async (range) => {
      pauses.push(range.minMs);
      onSleep?.(range.minMs);
      return range.minMs;
    },
    sleep: async (ms) => {
      sleeps.push(ms);
      onSleep?.(ms);
    },
  };
}

type ProfileEntry = ContactProfile | Error;

/**
 * In-memory contact search service. Results are keyed by
 * `company|titleFilter` (`*` when no title filter is given).
 */
export class FakeContactSearchSession implements ContactSearchSession {
  sessionValid = true;
  remainingQuota: number | null | Error = null;
  readonly searches: ContactSearchQuery[] = [];
  readonly visits: string[] = [];
  private readonly results = new Map<string, ContactCard[] | Error>();
  private readonly profiles = new Map<string, ProfileEntry>();

  setResults(company: string, titleFilter: string | null, cards: ContactCard[] | Error): this {
    this.results.set(`${company.toLowerCase()}|${titleFilter ?? "*"}`, cards);
    return this;
  }

  setProfile(detailLink: string, profile: ProfileEntry): this {
    this.profiles.set(detailLink, profile);
    return this;
  }

  async verifySession(): Promise<boolean> {
    return this.sessionValid;
  }

  async search(query: ContactSearchQuery): Promise<ContactCard[]> {
    this.searches.push(query);
    const entry = this.results.get(`${query.company.toLowerCase()}|${query.titleFilter ?? "*"}`);
    if (entry instanceof Error) {
      throw entry;
    }
    return entry ?? [];
  }

  async visitProfile(detailLink: string): Promise<ContactProfile> {
    this.visits.push(detailLink);
    const entry = this.profiles.get(detailLink);
    if (entry instanceof Error) {
      throw entry;
    }
    return entry ?? {};
  }

  async fetchRemainingQuota(): Promise<number | null> {
    if (this.remainingQuota instanceof Error) {
      throw this.remainingQuota;
    }
    return this.remainingQuota;
  }
}

export function card(
  name: string,
  title: string | null,
  opts?: { link?: string; email?: boolean },
): ContactCard {
  return {
    name,
    title,
    detailLink: opts?.link ?? `/profiles/${name.toLowerCase().replace(/\s+/g, "-")}`,
    hasEmailIndicator: opts?.email ?? true,
  };
}

/** Answers each send with the next queued outcome, defaulting to `sent`. */
export class FakeTransport implements MailTransport {
  readonly sent: OutgoingMessage[] = [];
  private readonly outcomes: SendOutcome[] = [];
  onSend?: (message: OutgoingMessage) => void;

  queue(...outcomes: SendOutcome[]): this {
    this.outcomes.push(...outcomes);
    return this;
  }

  async send(message: OutgoingMessage): Promise<SendOutcome> {
    this.sent.push(message);
    this.onSend?.(message);
    return this.outcomes.shift() ?? { kind: "sent", messageId: `<${this.sent.length}@test>` };
  }
}

/** Replies per model from a queue; an Error entry is thrown. */
export class FakeLanguageModel implements LanguageModelClient {
  readonly calls: Array<{ model: string; prompt: string }> = [];
  private readonly replies = new Map<string, Array<string | Error>>();

  reply(model: string, ...replies: Array<string | Error>): this {
    this.replies.set(model, [...(this.replies.get(model) ?? []), ...replies]);
    return this;
  }

  async generate(request: { model: string; prompt: string }): Promise<string> {
    this.calls.push(request);
    const next = this.replies.get(request.model)?.shift();
    if (next === undefined) {
      throw new Error(`No reply queued for ${request.model}`);
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  }
}

export const GENERATED_JSON = JSON.stringify({
  subject_initial: "Backend role at Acme",
  subject_followup1: "Following up on Acme",
  subject_followup2: "Last note on Acme",
  intro: "I build reliable payment services.",
  followup1: "Checking whether you saw my note.",
  followup2: "Closing the loop on my application.",
});
