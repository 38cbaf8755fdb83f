import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import {
  FakeContactSearchSession,
  card,
  recordingPacer,
  testLogger,
} from "../test-utils/fixtures.js";
import { ContactDiscovery, isValidEmail } from "./discovery.js";
import { QuotaLedger } from "./quota.js";
import { OutreachStore } from "./store.js";
import { parseTitleKeywords } from "./titles.js";

const tempDirs: string[] = [];

function makeStore(): OutreachStore {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "outreach-discovery-"));
  tempDirs.push(dir);
  return new OutreachStore(path.join(dir, "outreach.sqlite"));
}

afterEach(() => {
  for (const dir of tempDirs.splice(0, tempDirs.length)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

const keywords = parseTitleKeywords({
  searchTerms: ["Recruiter", "Talent"],
  strong: ["recruiter", "talent acquisition"],
  loose: ["people", "talent"],
  exclude: ["vp", "chief people", "founder"],
});

function setup(store: OutreachStore, opts?: { dailyLimit?: number; min?: number }) {
  const session = new FakeContactSearchSession();
  const ledger = new QuotaLedger(store, {
    dailyLimit: opts?.dailyLimit ?? 10,
    today: () => "2026-01-15",
  });
  const pacer = recordingPacer();
  const logger = testLogger("discovery");
  const discovery = new ContactDiscovery({
    session,
    ledger,
    keywords,
    pacer,
    logger,
    minRecruitersPerCompany: opts?.min ?? 2,
    profileDelay: { minMs: 1000, maxMs: 2000 },
  });
  return { session, ledger, pacer, logger, discovery };
}

describe("isValidEmail", () => {
  it("accepts plain addresses only", () => {
    expect(isValidEmail("ann@acme.test")).toBe(true);
    expect(isValidEmail("ann@acme")).toBe(false);
    expect(isValidEmail("ann lee@acme.test")).toBe(false);
    expect(isValidEmail("")).toBe(false);
  });
});

describe("ContactDiscovery", () => {
  it("stops after the strict pass once enough contacts are found", async () => {
    const store = makeStore();
    try {
      const { session, ledger, pacer, discovery } = setup(store);
      session
        .setResults("Acme", "Recruiter", [
          card("Ann Lee", "Technical Recruiter"),
          card("Bob Ray", "Senior Recruiter"),
        ])
        .setProfile("/profiles/ann-lee", { email: "Ann@Acme.test" })
        .setProfile("/profiles/bob-ray", { email: "bob@acme.test" });

      const result = await discovery.discover("Acme", 5);

      expect(result).toEqual({
        kind: "found",
        contacts: [
          { name: "Ann Lee", position: "Technical Recruiter", email: "ann@acme.test", confidence: "auto" },
          { name: "Bob Ray", position: "Senior Recruiter", email: "bob@acme.test", confidence: "auto" },
        ],
        profileVisits: 2,
        quotaExhausted: false,
      });
      expect(session.searches).toEqual([
        { company: "Acme", titleFilter: "Recruiter", requireEmailIndicator: true },
      ]);
      expect(pacer.pauses).toEqual([1000, 1000]);
      expect(ledger.remaining()).toBe(8);
    } finally {
      store.close();
    }
  });

  it("falls back to looser passes and marks their hits for review", async () => {
    const store = makeStore();
    try {
      const { session, discovery } = setup(store);
      session
        .setResults("Acme", "Recruiter", [
          card("Vic Tor", "VP Recruiter"),
          card("No Mail", "Recruiter", { email: false }),
        ])
        .setResults("Acme", null, [
          card("No Mail", "Recruiter", { email: false }),
          card("Eng Ineer", "Software Engineer"),
        ])
        .setProfile("/profiles/vic-tor", { email: "vic@acme.test" })
        .setProfile("/profiles/no-mail", { email: "nomail@acme.test" });

      const result = await discovery.discover("Acme", 5);

      expect(result.kind).toBe("found");
      if (result.kind !== "found") {
        return;
      }
      expect(result.contacts).toEqual([
        { name: "Vic Tor", position: "VP Recruiter", email: "vic@acme.test", confidence: "manual_review" },
        { name: "No Mail", position: "Recruiter", email: "nomail@acme.test", confidence: "manual_review" },
      ]);
      expect(session.searches).toHaveLength(5);
      expect(session.searches[4]).toEqual({ company: "Acme", requireEmailIndicator: false });
      expect(session.visits).toEqual(["/profiles/vic-tor", "/profiles/no-mail"]);
    } finally {
      store.close();
    }
  });

  it("stops visiting profiles when the daily quota runs out", async () => {
    const store = makeStore();
    try {
      const { session, ledger, logger, discovery } = setup(store, { dailyLimit: 1 });
      session
        .setResults("Acme", "Recruiter", [
          card("Ann Lee", "Recruiter"),
          card("Bob Ray", "Recruiter"),
        ])
        .setProfile("/profiles/ann-lee", { email: "ann@acme.test" })
        .setProfile("/profiles/bob-ray", { email: "bob@acme.test" });

      const result = await discovery.discover("Acme", 5);

      expect(result).toMatchObject({ kind: "found", profileVisits: 1, quotaExhausted: true });
      expect(session.visits).toEqual(["/profiles/ann-lee"]);
      expect(session.searches).toHaveLength(1);
      expect(ledger.remaining()).toBe(0);
      expect(logger.runtime.logs.some((line) => line.includes("daily contact quota exhausted"))).toBe(
        true,
      );
    } finally {
      store.close();
    }
  });

  it("never exceeds the company allocation", async () => {
    const store = makeStore();
    try {
      const { session, discovery } = setup(store);
      session
        .setResults("Acme", "Recruiter", [
          card("Ann Lee", "Recruiter"),
          card("Bob Ray", "Recruiter"),
        ])
        .setProfile("/profiles/ann-lee", { email: "ann@acme.test" })
        .setProfile("/profiles/bob-ray", { email: "bob@acme.test" });

      const result = await discovery.discover("Acme", 1);

      expect(result).toMatchObject({ kind: "found", profileVisits: 1 });
      expect(session.visits).toEqual(["/profiles/ann-lee"]);
    } finally {
      store.close();
    }
  });

  it("skips profiles without an email and repeated addresses", async () => {
    const store = makeStore();
    try {
      const { session, ledger, discovery } = setup(store);
      session
        .setResults("Acme", "Recruiter", [
          card("Ann Lee", "Recruiter"),
          card("Bob Ray", "Recruiter"),
          card("Cat Cole", "Recruiter"),
        ])
        .setProfile("/profiles/ann-lee", {})
        .setProfile("/profiles/bob-ray", { email: "team@acme.test" })
        .setProfile("/profiles/cat-cole", { email: "TEAM@acme.test" });

      const result = await discovery.discover("Acme", 5);

      expect(result).toMatchObject({ kind: "found", profileVisits: 3 });
      if (result.kind === "found") {
        expect(result.contacts.map((contact) => contact.name)).toEqual(["Bob Ray"]);
      }
      expect(ledger.remaining()).toBe(7);
    } finally {
      store.close();
    }
  });

  it("reports search errors when nothing was found", async () => {
    const store = makeStore();
    try {
      const { session, discovery } = setup(store);
      session.setResults("Acme", "Recruiter", new Error("boom"));

      const result = await discovery.discover("Acme", 5);

      expect(result).toEqual({
        kind: "error",
        message: "search Recruiter failed: boom; search Recruiter failed: boom",
        profileVisits: 0,
        quotaExhausted: false,
      });
    } finally {
      store.close();
    }
  });

  it("returns empty when no card qualifies", async () => {
    const store = makeStore();
    try {
      const { session, discovery } = setup(store);
      session.setResults("Acme", null, [card("Eng Ineer", "Software Engineer")]);

      const result = await discovery.discover("Acme", 5);

      expect(result).toEqual({ kind: "empty", profileVisits: 0, quotaExhausted: false });
      expect(session.visits).toEqual([]);
    } finally {
      store.close();
    }
  });
});
