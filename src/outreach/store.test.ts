import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import Database from "better-sqlite3";
import { afterEach, describe, expect, it } from "vitest";
import { DAY_MS, fixedClock, type FakeClock } from "../test-utils/fixtures.js";
import { OutreachStore } from "./store.js";

const T0 = Date.UTC(2026, 0, 15, 15, 0);
const tempDirs: string[] = [];

function makeStore(clock: FakeClock = fixedClock(T0)): { store: OutreachStore; dbPath: string } {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "outreach-store-"));
  tempDirs.push(dir);
  const dbPath = path.join(dir, "outreach.sqlite");
  return { store: new OutreachStore(dbPath, { now: clock.now }), dbPath };
}

afterEach(() => {
  for (const dir of tempDirs.splice(0, tempDirs.length)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

function seedPair(store: OutreachStore): { applicationId: number; recruiterId: number } {
  const { id: applicationId } = store.addApplication({
    company: "Acme",
    jobUrl: "https://jobs.example.com/acme/1",
    jobTitle: "Backend Engineer",
    appliedDate: "2026-01-10",
  });
  const { id: recruiterId } = store.addRecruiter({
    company: "Acme",
    name: "Rita Recruiter",
    position: "Technical Recruiter",
    email: "rita@acme.test",
    confidence: "auto",
  });
  store.linkRecruiterToApplication(applicationId, recruiterId);
  return { applicationId, recruiterId };
}

describe("OutreachStore applications", () => {
  it("dedupes applications by job URL", () => {
    const { store } = makeStore();
    try {
      const first = store.addApplication({
        company: "Acme",
        jobUrl: "https://jobs.example.com/acme/1",
        appliedDate: "2026-01-10",
      });
      const second = store.addApplication({
        company: "ACME",
        jobUrl: "https://jobs.example.com/acme/1",
        appliedDate: "2026-01-12",
      });
      expect(first.created).toBe(true);
      expect(second).toEqual({ id: first.id, created: false });
      expect(store.listApplications()).toHaveLength(1);
    } finally {
      store.close();
    }
  });

  it("groups active companies case-insensitively, oldest application first", () => {
    const { store } = makeStore();
    try {
      store.addApplication({ company: "Globex", jobUrl: "https://g.test/1", appliedDate: "2026-01-12" });
      store.addApplication({ company: "Acme", jobUrl: "https://a.test/1", appliedDate: "2026-01-11" });
      store.addApplication({ company: "acme", jobUrl: "https://a.test/2", appliedDate: "2026-01-09" });
      const closed = store.addApplication({
        company: "Initech",
        jobUrl: "https://i.test/1",
        appliedDate: "2026-01-01",
      });
      store.setApplicationStatus(closed.id, "inactive");

      const companies = store.listActiveCompanies();
      expect(companies.map((entry) => entry.company.toLowerCase())).toEqual(["acme", "globex"]);
      expect(companies.map((entry) => entry.firstAppliedDate)).toEqual(["2026-01-09", "2026-01-12"]);
      expect(store.listActiveApplicationsByCompany("ACME")).toHaveLength(2);
    } finally {
      store.close();
    }
  });
});

describe("OutreachStore recruiters", () => {
  it("resolves a re-discovered email to the same recruiter", () => {
    const { store } = makeStore();
    try {
      const first = store.addRecruiter({
        company: "Acme",
        name: "Rita Recruiter",
        email: "Rita@Acme.test",
        confidence: "auto",
      });
      for (let i = 0; i < 3; i++) {
        const again = store.addRecruiter({
          company: "Acme",
          name: "Rita R.",
          email: " rita@acme.test ",
          confidence: "manual_review",
        });
        expect(again).toEqual({ id: first.id, created: false });
      }
      expect(store.countRecruiters()).toBe(1);
      expect(store.getRecruiter(first.id)?.name).toBe("Rita Recruiter");
      expect(store.findRecruiterByEmail("RITA@acme.test")?.id).toBe(first.id);
    } finally {
      store.close();
    }
  });

  it("keeps verifiedAt when a check fails", () => {
    const clock = fixedClock(T0);
    const { store } = makeStore(clock);
    try {
      const { id } = store.addRecruiter({
        company: "Acme",
        name: "Rita Recruiter",
        email: "rita@acme.test",
        confidence: "auto",
      });
      clock.advance(10 * DAY_MS);
      store.markRecruiterCheckFailed(id);
      const recruiter = store.getRecruiter(id);
      expect(recruiter?.verifiedAt).toBe(T0);
      expect(recruiter?.checkedAt).toBe(T0 + 10 * DAY_MS);
      expect(recruiter?.checkOutcome).toBe("unverified");
      expect(recruiter?.status).toBe("active");
    } finally {
      store.close();
    }
  });

  it("applies changed fields and refreshes verification", () => {
    const clock = fixedClock(T0);
    const { store } = makeStore(clock);
    try {
      const { id } = store.addRecruiter({
        company: "Acme",
        name: "Rita Recruiter",
        position: "Recruiter",
        email: "rita@acme.test",
        confidence: "auto",
      });
      clock.advance(40 * DAY_MS);
      store.updateRecruiter(id, { position: "Senior Recruiter", email: "Rita.R@acme.test" });
      const recruiter = store.getRecruiter(id);
      expect(recruiter).toMatchObject({
        name: "Rita Recruiter",
        position: "Senior Recruiter",
        email: "rita.r@acme.test",
        verifiedAt: T0 + 40 * DAY_MS,
        checkOutcome: "updated",
      });
    } finally {
      store.close();
    }
  });
});

describe("OutreachStore links", () => {
  it("ignores a repeated link", () => {
    const { store } = makeStore();
    try {
      const { applicationId, recruiterId } = seedPair(store);
      expect(store.linkRecruiterToApplication(applicationId, recruiterId)).toBe(false);
      expect(store.listLinks(applicationId)).toHaveLength(1);
    } finally {
      store.close();
    }
  });

  it("lists only uncontacted active pairs", () => {
    const { store } = makeStore();
    try {
      const { applicationId, recruiterId } = seedPair(store);
      expect(store.listUncontactedPairs()).toEqual([{ recruiterId, applicationId }]);
      store.scheduleOutreach({ recruiterId, applicationId, stage: "initial", scheduledFor: "2026-01-15" });
      expect(store.listUncontactedPairs()).toEqual([]);
    } finally {
      store.close();
    }
  });
});

describe("OutreachStore outreach records", () => {
  it("refuses a second pending or sent record for the same stage", () => {
    const { store } = makeStore();
    try {
      const { applicationId, recruiterId } = seedPair(store);
      const input = { recruiterId, applicationId, stage: "initial" as const, scheduledFor: "2026-01-15" };
      const first = store.scheduleOutreach(input);
      expect(first?.status).toBe("pending");
      expect(store.scheduleOutreach(input)).toBeNull();

      store.markOutreachSent(first?.id ?? 0);
      expect(store.scheduleOutreach(input)).toBeNull();
      expect(store.listOutreachForPair(recruiterId, applicationId)).toHaveLength(1);
    } finally {
      store.close();
    }
  });

  it("allows a new record once the earlier one failed", () => {
    const { store } = makeStore();
    try {
      const { applicationId, recruiterId } = seedPair(store);
      const input = { recruiterId, applicationId, stage: "initial" as const, scheduledFor: "2026-01-15" };
      const first = store.scheduleOutreach(input);
      store.markOutreachFailed(first?.id ?? 0, "connection reset");
      expect(store.getOutreach(first?.id ?? 0)).toMatchObject({
        status: "failed",
        attempts: 1,
        lastError: "connection reset",
      });
      expect(store.scheduleOutreach(input)).not.toBeNull();
    } finally {
      store.close();
    }
  });

  it("never lists replied or future records as due", () => {
    const { store } = makeStore();
    try {
      const { applicationId, recruiterId } = seedPair(store);
      const other = store.addRecruiter({
        company: "Acme",
        name: "Tom Talent",
        email: "tom@acme.test",
        confidence: "auto",
      });
      store.linkRecruiterToApplication(applicationId, other.id);

      store.scheduleOutreach({ recruiterId, applicationId, stage: "initial", scheduledFor: "2026-01-01" });
      store.scheduleOutreach({
        recruiterId: other.id,
        applicationId,
        stage: "initial",
        scheduledFor: "2026-01-20",
      });
      expect(store.listDueOutreach("2026-01-15").map((row) => row.recruiterId)).toEqual([recruiterId]);

      expect(store.markReplied(recruiterId, applicationId)).toBe(1);
      expect(store.listDueOutreach("2026-01-15")).toEqual([]);
      expect(store.listDueOutreach("2026-12-31").map((row) => row.recruiterId)).toEqual([other.id]);
    } finally {
      store.close();
    }
  });

  it("joins recruiter and application details onto due records", () => {
    const { store } = makeStore();
    try {
      const { applicationId, recruiterId } = seedPair(store);
      store.scheduleOutreach({ recruiterId, applicationId, stage: "initial", scheduledFor: "2026-01-15" });
      expect(store.listDueOutreach("2026-01-15")[0]).toMatchObject({
        recruiterName: "Rita Recruiter",
        recruiterEmail: "rita@acme.test",
        company: "Acme",
        jobUrl: "https://jobs.example.com/acme/1",
        jobTitle: "Backend Engineer",
        stage: "initial",
      });
    } finally {
      store.close();
    }
  });

  it("retires the recruiter with a bounce", () => {
    const { store } = makeStore();
    try {
      const { applicationId, recruiterId } = seedPair(store);
      const record = store.scheduleOutreach({
        recruiterId,
        applicationId,
        stage: "initial",
        scheduledFor: "2026-01-15",
      });
      store.markOutreachBounced(record?.id ?? 0, recruiterId, "550 mailbox unavailable");
      expect(store.getOutreach(record?.id ?? 0)?.status).toBe("bounced");
      expect(store.getRecruiter(recruiterId)).toMatchObject({
        status: "inactive",
        inactiveReason: "Email bounced: 550 mailbox unavailable",
      });
    } finally {
      store.close();
    }
  });

  it("reschedules only pending records", () => {
    const { store } = makeStore();
    try {
      const { applicationId, recruiterId } = seedPair(store);
      const pending = store.scheduleOutreach({
        recruiterId,
        applicationId,
        stage: "initial",
        scheduledFor: "2026-01-15",
      });
      const sentRecruiter = store.addRecruiter({
        company: "Acme",
        name: "Tom Talent",
        email: "tom@acme.test",
        confidence: "auto",
      });
      const sent = store.scheduleOutreach({
        recruiterId: sentRecruiter.id,
        applicationId,
        stage: "initial",
        scheduledFor: "2026-01-15",
      });
      store.markOutreachSent(sent?.id ?? 0);

      expect(store.rescheduleOutreach([pending?.id ?? 0, sent?.id ?? 0], "2026-01-16")).toBe(1);
      expect(store.getOutreach(pending?.id ?? 0)?.scheduledFor).toBe("2026-01-16");
      expect(store.getOutreach(sent?.id ?? 0)?.scheduledFor).toBe("2026-01-15");
    } finally {
      store.close();
    }
  });

  it("picks the latest sent record by insertion order", () => {
    const { store } = makeStore();
    try {
      const { applicationId, recruiterId } = seedPair(store);
      for (const stage of ["initial", "followup1"] as const) {
        const record = store.scheduleOutreach({
          recruiterId,
          applicationId,
          stage,
          scheduledFor: "2026-01-15",
        });
        store.markOutreachSent(record?.id ?? 0);
      }
      expect(store.getLastSentOutreach(recruiterId, applicationId)?.stage).toBe("followup1");
      expect(store.countOutreachByStatus()).toEqual({ pending: 0, sent: 2, failed: 0, bounced: 0 });
    } finally {
      store.close();
    }
  });
});

describe("OutreachStore quota", () => {
  it("never stores or reports a negative remainder", () => {
    const { store, dbPath } = makeStore();
    try {
      store.incrementQuotaUsed("2026-01-15", 1, 5);
      expect(store.incrementQuotaUsed("2026-01-15", 5, 5)).toMatchObject({
        totalLimit: 5,
        used: 6,
        remaining: 0,
      });
    } finally {
      store.close();
    }

    const db = new Database(dbPath, { readonly: true });
    try {
      const row = db
        .prepare("SELECT used, remaining FROM contact_quota WHERE date = ?")
        .get("2026-01-15") as { used: number; remaining: number } | undefined;
      expect(row).toEqual({ used: 6, remaining: 0 });
    } finally {
      db.close();
    }
  });

  it("takes the service reading over the local counter", () => {
    const { store } = makeStore();
    try {
      store.incrementQuotaUsed("2026-01-15", 2, 50);
      expect(store.reconcileQuota("2026-01-15", 40, 50)).toMatchObject({ used: 10, remaining: 40 });
      expect(store.reconcileQuota("2026-01-15", 70, 50)).toMatchObject({ used: 0, remaining: 50 });
    } finally {
      store.close();
    }
  });
});

describe("OutreachStore caches", () => {
  it("never returns expired generated content", () => {
    const clock = fixedClock(T0);
    const { store } = makeStore(clock);
    try {
      store.saveAiContent({
        cacheKey: "k1",
        company: "Acme",
        jobTitle: "Backend Engineer",
        content: { intro: "hello" },
        ttlDays: 1,
      });
      expect(store.getAiContent("k1")).toEqual({ intro: "hello" });
      clock.advance(DAY_MS);
      expect(store.getAiContent("k1")).toBeNull();
    } finally {
      store.close();
    }
  });

  it("round-trips compressed job descriptions until they expire", () => {
    const clock = fixedClock(T0);
    const { store } = makeStore(clock);
    try {
      const text = "Build payment APIs. ".repeat(50);
      store.saveJobDescription("https://jobs.example.com/acme/1", text);
      expect(store.getJobDescription("https://jobs.example.com/acme/1")).toBe(text);

      clock.advance(21 * DAY_MS);
      expect(store.getJobDescription("https://jobs.example.com/acme/1")).toBeNull();
      clock.set(T0);
      expect(store.getJobDescription("https://jobs.example.com/acme/1")).toBeNull();
    } finally {
      store.close();
    }
  });

  it("purges expired rows when the store is reopened", () => {
    const clock = fixedClock(T0);
    const { store, dbPath } = makeStore(clock);
    store.saveAiContent({ cacheKey: "k1", company: "Acme", jobTitle: null, content: {}, ttlDays: 1 });
    store.incrementModelUsage("2026-01-15", "gemini-2.5-flash");
    store.close();

    clock.advance(30 * DAY_MS);
    const reopened = new OutreachStore(dbPath, { now: clock.now });
    try {
      expect(reopened.purgeExpired()).toEqual({ aiCache: 0, jobCache: 0, modelUsage: 0 });
      expect(reopened.getModelUsage("2026-01-15", "gemini-2.5-flash")).toBe(0);
    } finally {
      reopened.close();
    }
  });

  it("counts model calls per day and model", () => {
    const { store } = makeStore();
    try {
      expect(store.incrementModelUsage("2026-01-15", "gemini-2.5-flash-lite")).toBe(1);
      expect(store.incrementModelUsage("2026-01-15", "gemini-2.5-flash-lite")).toBe(2);
      expect(store.getModelUsage("2026-01-15", "gemini-2.5-flash")).toBe(0);
      expect(store.getModelUsage("2026-01-16", "gemini-2.5-flash-lite")).toBe(0);
    } finally {
      store.close();
    }
  });
});

describe("OutreachStore runs", () => {
  it("records run outcome and failures", () => {
    const { store } = makeStore();
    try {
      const { runId } = store.beginRun("send");
      store.recordFailure({
        runId,
        step: "send",
        ref: "7",
        errorType: "network",
        message: "connection reset",
        retryable: true,
      });
      store.markRunCompleted(runId, { sent: 2 });

      const [run] = store.listRecentRuns();
      expect(run).toMatchObject({ id: runId, kind: "send", status: "completed", summary: { sent: 2 } });
      expect(store.listRunFailures(runId)).toMatchObject([
        { runId, step: "send", ref: "7", errorType: "network", retryable: true },
      ]);
    } finally {
      store.close();
    }
  });
});
