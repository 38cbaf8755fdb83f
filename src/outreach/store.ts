import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import zlib from "node:zlib";
import Database from "better-sqlite3";
import { createQuotaSnapshot } from "./quota.js";
import type {
  ApplicationRecord,
  ApplicationRecruiterLink,
  ApplicationStatus,
  CheckOutcome,
  NewApplication,
  NewRecruiter,
  OutreachCandidate,
  OutreachRecord,
  OutreachStage,
  OutreachStatus,
  PipelineRunRecord,
  QuotaSnapshot,
  RecruiterChanges,
  RecruiterConfidence,
  RecruiterRecord,
  RecruiterStatus,
  RunFailureRecord,
  RunKind,
  RunStatus,
} from "./types.js";

const DAY_MS = 24 * 60 * 60 * 1000;

export type OutreachStoreOptions = {
  now?: () => number;
  jobCacheRetentionDays?: number;
  modelUsageRetentionDays?: number;
};

type ApplicationRow = {
  id: number;
  company: string;
  job_url: string;
  job_title: string | null;
  applied_date: string;
  status: string;
  created_at: number;
};

type RecruiterRow = {
  id: number;
  company: string;
  name: string;
  position: string | null;
  email: string;
  confidence: string;
  status: string;
  verified_at: number;
  checked_at: number | null;
  check_outcome: string | null;
  inactive_reason: string | null;
  created_at: number;
};

type OutreachRow = {
  id: number;
  recruiter_id: number;
  application_id: number;
  stage: string;
  status: string;
  replied: number;
  scheduled_for: string;
  sent_at: number | null;
  attempts: number;
  last_error: string | null;
  created_at: number;
};

type CandidateRow = OutreachRow & {
  recruiter_name: string;
  recruiter_email: string;
  company: string;
  job_url: string;
  job_title: string | null;
};

type QuotaRow = {
  date: string;
  total_limit: number;
  used: number;
};

function ensureDir(dir: string): void {
  fs.mkdirSync(dir, { recursive: true });
}

export function normalizeEmail(value: string): string {
  return value.trim().toLowerCase();
}

function md5(value: string): string {
  return crypto.createHash("md5").update(value).digest("hex");
}

function parseJson<T>(raw: unknown, fallback: T): T {
  if (typeof raw !== "string" || !raw.trim()) {
    return fallback;
  }
  try {
    return JSON.parse(raw) as T;
  } catch {
    return fallback;
  }
}

function toApplication(row: ApplicationRow): ApplicationRecord {
  return {
    id: row.id,
    company: row.company,
    jobUrl: row.job_url,
    jobTitle: row.job_title,
    appliedDate: row.applied_date,
    status: row.status === "inactive" ? "inactive" : "active",
    createdAt: row.created_at,
  };
}

function toCheckOutcome(value: string | null): CheckOutcome | null {
  switch (value) {
    case "verified":
    case "refreshed":
    case "updated":
    case "unverified":
    case "inactive":
      return value;
    default:
      return null;
  }
}

function toRecruiter(row: RecruiterRow): RecruiterRecord {
  const confidence: RecruiterConfidence = row.confidence === "auto" ? "auto" : "manual_review";
  const status: RecruiterStatus = row.status === "inactive" ? "inactive" : "active";
  return {
    id: row.id,
    company: row.company,
    name: row.name,
    position: row.position,
    email: row.email,
    confidence,
    status,
    verifiedAt: row.verified_at,
    checkedAt: row.checked_at,
    checkOutcome: toCheckOutcome(row.check_outcome),
    inactiveReason: row.inactive_reason,
    createdAt: row.created_at,
  };
}

function toStage(value: string): OutreachStage {
  return value === "followup1" || value === "followup2" ? value : "initial";
}

function toOutreachStatus(value: string): OutreachStatus {
  return value === "sent" || value === "failed" || value === "bounced" ? value : "pending";
}

function toOutreach(row: OutreachRow): OutreachRecord {
  return {
    id: row.id,
    recruiterId: row.recruiter_id,
    applicationId: row.application_id,
    stage: toStage(row.stage),
    status: toOutreachStatus(row.status),
    replied: row.replied === 1,
    scheduledFor: row.scheduled_for,
    sentAt: row.sent_at,
    attempts: row.attempts,
    lastError: row.last_error,
    createdAt: row.created_at,
  };
}

function toCandidate(row: CandidateRow): OutreachCandidate {
  return {
    ...toOutreach(row),
    recruiterName: row.recruiter_name,
    recruiterEmail: row.recruiter_email,
    company: row.company,
    jobUrl: row.job_url,
    jobTitle: row.job_title,
  };
}

const CANDIDATE_SELECT = `
  SELECT o.*, r.name AS recruiter_name, r.email AS recruiter_email,
         a.company AS company, a.job_url AS job_url, a.job_title AS job_title
  FROM outreach o
  JOIN recruiters r ON r.id = o.recruiter_id
  JOIN applications a ON a.id = o.application_id`;

export class OutreachStore {
  private readonly db: Database.Database;
  private readonly now: () => number;
  private readonly jobCacheRetentionMs: number;
  private readonly modelUsageRetentionMs: number;

  constructor(
    private readonly dbPath: string,
    opts: OutreachStoreOptions = {},
  ) {
    this.now = opts.now ?? Date.now;
    this.jobCacheRetentionMs = (opts.jobCacheRetentionDays ?? 21) * DAY_MS;
    this.modelUsageRetentionMs = (opts.modelUsageRetentionDays ?? 21) * DAY_MS;
    ensureDir(path.dirname(this.dbPath));
    this.db = new Database(this.dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("foreign_keys = ON");
    this.ensureSchema();
    this.purgeExpired();
  }

  close(): void {
    this.db.close();
  }

  private ensureSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS applications (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        company TEXT NOT NULL COLLATE NOCASE,
        job_url TEXT NOT NULL UNIQUE,
        job_title TEXT,
        applied_date TEXT NOT NULL,
        status TEXT NOT NULL DEFAULT 'active',
        created_at INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS recruiters (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        company TEXT NOT NULL COLLATE NOCASE,
        name TEXT NOT NULL,
        position TEXT,
        email TEXT NOT NULL UNIQUE,
        confidence TEXT NOT NULL,
        status TEXT NOT NULL DEFAULT 'active',
        verified_at INTEGER NOT NULL,
        checked_at INTEGER,
        check_outcome TEXT,
        inactive_reason TEXT,
        created_at INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS application_recruiters (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        application_id INTEGER NOT NULL,
        recruiter_id INTEGER NOT NULL,
        created_at INTEGER NOT NULL,
        UNIQUE(application_id, recruiter_id),
        FOREIGN KEY (application_id) REFERENCES applications(id),
        FOREIGN KEY (recruiter_id) REFERENCES recruiters(id)
      );

      CREATE TABLE IF NOT EXISTS outreach (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        recruiter_id INTEGER NOT NULL,
        application_id INTEGER NOT NULL,
        stage TEXT NOT NULL,
        status TEXT NOT NULL DEFAULT 'pending',
        replied INTEGER NOT NULL DEFAULT 0,
        scheduled_for TEXT NOT NULL,
        sent_at INTEGER,
        attempts INTEGER NOT NULL DEFAULT 0,
        last_error TEXT,
        created_at INTEGER NOT NULL,
        FOREIGN KEY (recruiter_id) REFERENCES recruiters(id),
        FOREIGN KEY (application_id) REFERENCES applications(id)
      );

      CREATE TABLE IF NOT EXISTS contact_quota (
        date TEXT PRIMARY KEY,
        total_limit INTEGER NOT NULL,
        used INTEGER NOT NULL DEFAULT 0,
        remaining INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS ai_cache (
        cache_key TEXT PRIMARY KEY,
        company TEXT NOT NULL,
        job_title TEXT,
        content_json TEXT NOT NULL,
        created_at INTEGER NOT NULL,
        expires_at INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS job_cache (
        url_hash TEXT PRIMARY KEY,
        job_url TEXT NOT NULL,
        content BLOB NOT NULL,
        created_at INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS model_usage (
        date TEXT NOT NULL,
        model TEXT NOT NULL,
        calls INTEGER NOT NULL DEFAULT 0,
        updated_at INTEGER NOT NULL,
        PRIMARY KEY (date, model)
      );

      CREATE TABLE IF NOT EXISTS pipeline_runs (
        id TEXT PRIMARY KEY,
        kind TEXT NOT NULL,
        status TEXT NOT NULL,
        started_at INTEGER NOT NULL,
        finished_at INTEGER,
        summary_json TEXT
      );

      CREATE TABLE IF NOT EXISTS run_failures (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        run_id TEXT NOT NULL,
        step TEXT NOT NULL,
        ref TEXT,
        error_type TEXT NOT NULL,
        message TEXT NOT NULL,
        retryable INTEGER NOT NULL,
        created_at INTEGER NOT NULL,
        FOREIGN KEY (run_id) REFERENCES pipeline_runs(id) ON DELETE CASCADE
      );

      CREATE INDEX IF NOT EXISTS idx_outreach_pair ON outreach(recruiter_id, application_id);
      CREATE INDEX IF NOT EXISTS idx_outreach_due ON outreach(status, scheduled_for);
      CREATE INDEX IF NOT EXISTS idx_recruiters_company ON recruiters(company);
      CREATE INDEX IF NOT EXISTS idx_applications_company ON applications(company);
    `);
  }

  /** Drops expired cache rows and old model usage counters. */
  purgeExpired(): { aiCache: number; jobCache: number; modelUsage: number } {
    const now = this.now();
    const aiCache = this.db.prepare("DELETE FROM ai_cache WHERE expires_at <= ?").run(now).changes;
    const jobCache = this.db
      .prepare("DELETE FROM job_cache WHERE created_at <= ?")
      .run(now - this.jobCacheRetentionMs).changes;
    const modelUsage = this.db
      .prepare("DELETE FROM model_usage WHERE updated_at <= ?")
      .run(now - this.modelUsageRetentionMs).changes;
    return { aiCache, jobCache, modelUsage };
  }

  // ---------------------------------------------------------------------------
  // Applications
  // ---------------------------------------------------------------------------

  addApplication(input: NewApplication): { id: number; created: boolean } {
    const result = this.db
      .prepare(
        `INSERT INTO applications (company, job_url, job_title, applied_date, status, created_at)
         VALUES (?, ?, ?, ?, 'active', ?)
         ON CONFLICT(job_url) DO NOTHING`,
      )
      .run(input.company, input.jobUrl, input.jobTitle ?? null, input.appliedDate, this.now());
    if (result.changes > 0) {
      return { id: Number(result.lastInsertRowid), created: true };
    }
    const existing = this.db
      .prepare("SELECT id FROM applications WHERE job_url = ?")
      .get(input.jobUrl) as { id: number } | undefined;
    if (!existing) {
      throw new Error(`Application insert for ${input.jobUrl} neither created nor found a row`);
    }
    return { id: existing.id, created: false };
  }

  getApplication(id: number): ApplicationRecord | null {
    const row = this.db.prepare("SELECT * FROM applications WHERE id = ?").get(id) as
      | ApplicationRow
      | undefined;
    return row ? toApplication(row) : null;
  }

  listApplications(status?: ApplicationStatus): ApplicationRecord[] {
    const rows = (
      status
        ? this.db
            .prepare("SELECT * FROM applications WHERE status = ? ORDER BY applied_date ASC, id ASC")
            .all(status)
        : this.db.prepare("SELECT * FROM applications ORDER BY applied_date ASC, id ASC").all()
    ) as ApplicationRow[];
    return rows.map(toApplication);
  }

  listActiveApplicationsByCompany(company: string): ApplicationRecord[] {
    const rows = this.db
      .prepare(
        `SELECT * FROM applications
         WHERE company = ? AND status = 'active'
         ORDER BY applied_date ASC, id ASC`,
      )
      .all(company) as ApplicationRow[];
    return rows.map(toApplication);
  }

  /** Distinct companies with an active application, oldest application first. */
  listActiveCompanies(): Array<{ company: string; firstAppliedDate: string }> {
    const rows = this.db
      .prepare(
        `SELECT company, MIN(applied_date) AS first_applied, MIN(id) AS first_id
         FROM applications
         WHERE status = 'active'
         GROUP BY company
         ORDER BY first_applied ASC, first_id ASC`,
      )
      .all() as Array<{ company: string; first_applied: string; first_id: number }>;
    return rows.map((row) => ({ company: row.company, firstAppliedDate: row.first_applied }));
  }

  setApplicationStatus(id: number, status: ApplicationStatus): boolean {
    return (
      this.db.prepare("UPDATE applications SET status = ? WHERE id = ?").run(status, id).changes > 0
    );
  }

  // ---------------------------------------------------------------------------
  // Recruiters
  // ---------------------------------------------------------------------------

  /** Email is the identity key: re-adding a known email returns the existing row. */
  addRecruiter(input: NewRecruiter): { id: number; created: boolean } {
    const email = normalizeEmail(input.email);
    const now = this.now();
    const result = this.db
      .prepare(
        `INSERT INTO recruiters
         (company, name, position, email, confidence, status, verified_at, created_at)
         VALUES (?, ?, ?, ?, ?, 'active', ?, ?)
         ON CONFLICT(email) DO NOTHING`,
      )
      .run(
        input.company,
        input.name.trim(),
        input.position?.trim() || null,
        email,
        input.confidence,
        now,
        now,
      );
    if (result.changes > 0) {
      return { id: Number(result.lastInsertRowid), created: true };
    }
    const existing = this.findRecruiterByEmail(email);
    if (!existing) {
      throw new Error(`Recruiter insert for ${email} neither created nor found a row`);
    }
    return { id: existing.id, created: false };
  }

  getRecruiter(id: number): RecruiterRecord | null {
    const row = this.db.prepare("SELECT * FROM recruiters WHERE id = ?").get(id) as
      | RecruiterRow
      | undefined;
    return row ? toRecruiter(row) : null;
  }

  findRecruiterByEmail(email: string): RecruiterRecord | null {
    const row = this.db
      .prepare("SELECT * FROM recruiters WHERE email = ?")
      .get(normalizeEmail(email)) as RecruiterRow | undefined;
    return row ? toRecruiter(row) : null;
  }

  listActiveRecruitersByCompany(company: string): RecruiterRecord[] {
    const rows = this.db
      .prepare("SELECT * FROM recruiters WHERE company = ? AND status = 'active' ORDER BY id ASC")
      .all(company) as RecruiterRow[];
    return rows.map(toRecruiter);
  }

  countRecruiters(): number {
    const row = this.db.prepare("SELECT COUNT(*) AS count FROM recruiters").get() as {
      count: number;
    };
    return row.count;
  }

  touchRecruiterVerified(id: number, outcome: "verified" | "refreshed"): void {
    const now = this.now();
    this.db
      .prepare(
        "UPDATE recruiters SET verified_at = ?, checked_at = ?, check_outcome = ? WHERE id = ?",
      )
      .run(now, now, outcome, id);
  }

  updateRecruiter(id: number, changes: RecruiterChanges): void {
    const current = this.getRecruiter(id);
    if (!current) {
      return;
    }
    const now = this.now();
    this.db
      .prepare(
        `UPDATE recruiters
         SET name = ?, position = ?, email = ?, verified_at = ?, checked_at = ?, check_outcome = 'updated'
         WHERE id = ?`,
      )
      .run(
        changes.name ?? current.name,
        changes.position !== undefined ? changes.position : current.position,
        changes.email !== undefined ? normalizeEmail(changes.email) : current.email,
        now,
        now,
        id,
      );
  }

  /** Records a check that could not run. `verified_at` keeps its last good value. */
  markRecruiterCheckFailed(id: number): void {
    this.db
      .prepare("UPDATE recruiters SET checked_at = ?, check_outcome = 'unverified' WHERE id = ?")
      .run(this.now(), id);
  }

  markRecruiterInactive(id: number, reason: string): void {
    this.db
      .prepare(
        `UPDATE recruiters
         SET status = 'inactive', inactive_reason = ?, checked_at = ?, check_outcome = 'inactive'
         WHERE id = ?`,
      )
      .run(reason, this.now(), id);
  }

  // ---------------------------------------------------------------------------
  // Application <-> recruiter links
  // ---------------------------------------------------------------------------

  /** Returns true when a new link row was written. */
  linkRecruiterToApplication(applicationId: number, recruiterId: number): boolean {
    const result = this.db
      .prepare(
        `INSERT OR IGNORE INTO application_recruiters (application_id, recruiter_id, created_at)
         VALUES (?, ?, ?)`,
      )
      .run(applicationId, recruiterId, this.now());
    return result.changes > 0;
  }

  listLinks(applicationId: number): ApplicationRecruiterLink[] {
    const rows = this.db
      .prepare(
        `SELECT application_id, recruiter_id, created_at
         FROM application_recruiters WHERE application_id = ? ORDER BY id ASC`,
      )
      .all(applicationId) as Array<{
      application_id: number;
      recruiter_id: number;
      created_at: number;
    }>;
    return rows.map((row) => ({
      applicationId: row.application_id,
      recruiterId: row.recruiter_id,
      createdAt: row.created_at,
    }));
  }

  /** Active links between active applications and active recruiters with no outreach yet. */
  listUncontactedPairs(): Array<{ recruiterId: number; applicationId: number }> {
    const rows = this.db
      .prepare(
        `SELECT l.recruiter_id, l.application_id
         FROM application_recruiters l
         JOIN applications a ON a.id = l.application_id
         JOIN recruiters r ON r.id = l.recruiter_id
         WHERE a.status = 'active' AND r.status = 'active'
           AND NOT EXISTS (
             SELECT 1 FROM outreach o
             WHERE o.recruiter_id = l.recruiter_id AND o.application_id = l.application_id
           )
         ORDER BY l.id ASC`,
      )
      .all() as Array<{ recruiter_id: number; application_id: number }>;
    return rows.map((row) => ({ recruiterId: row.recruiter_id, applicationId: row.application_id }));
  }

  // ---------------------------------------------------------------------------
  // Outreach records
  // ---------------------------------------------------------------------------

  /**
   * Creates a pending record unless the pair already holds a pending or sent
   * record for the same stage. Returns null when nothing was written.
   */
  scheduleOutreach(input: {
    recruiterId: number;
    applicationId: number;
    stage: OutreachStage;
    scheduledFor: string;
  }): OutreachRecord | null {
    const insert = this.db.transaction((): OutreachRecord | null => {
      const existing = this.db
        .prepare(
          `SELECT id FROM outreach
           WHERE recruiter_id = ? AND application_id = ? AND stage = ?
             AND status IN ('pending', 'sent')
           LIMIT 1`,
        )
        .get(input.recruiterId, input.applicationId, input.stage) as { id: number } | undefined;
      if (existing) {
        return null;
      }
      const result = this.db
        .prepare(
          `INSERT INTO outreach
           (recruiter_id, application_id, stage, status, replied, scheduled_for, attempts, created_at)
           VALUES (?, ?, ?, 'pending', 0, ?, 0, ?)`,
        )
        .run(input.recruiterId, input.applicationId, input.stage, input.scheduledFor, this.now());
      return this.getOutreach(Number(result.lastInsertRowid));
    });
    return insert();
  }

  getOutreach(id: number): OutreachRecord | null {
    const row = this.db.prepare("SELECT * FROM outreach WHERE id = ?").get(id) as
      | OutreachRow
      | undefined;
    return row ? toOutreach(row) : null;
  }

  listOutreachForPair(recruiterId: number, applicationId: number): OutreachRecord[] {
    const rows = this.db
      .prepare(
        "SELECT * FROM outreach WHERE recruiter_id = ? AND application_id = ? ORDER BY id ASC",
      )
      .all(recruiterId, applicationId) as OutreachRow[];
    return rows.map(toOutreach);
  }

  /** Most recent sent record for the pair, by insertion order. */
  getLastSentOutreach(recruiterId: number, applicationId: number): OutreachRecord | null {
    const row = this.db
      .prepare(
        `SELECT * FROM outreach
         WHERE recruiter_id = ? AND application_id = ? AND status = 'sent'
         ORDER BY id DESC LIMIT 1`,
      )
      .get(recruiterId, applicationId) as OutreachRow | undefined;
    return row ? toOutreach(row) : null;
  }

  hasReply(recruiterId: number, applicationId: number): boolean {
    const row = this.db
      .prepare(
        "SELECT 1 AS hit FROM outreach WHERE recruiter_id = ? AND application_id = ? AND replied = 1 LIMIT 1",
      )
      .get(recruiterId, applicationId) as { hit: number } | undefined;
    return row !== undefined;
  }

  /** Pending records due on or before `today` for pairs that are still worth contacting. */
  listDueOutreach(today: string): OutreachCandidate[] {
    const rows = this.db
      .prepare(
        `${CANDIDATE_SELECT}
         WHERE o.status = 'pending'
           AND o.scheduled_for <= ?
           AND o.replied = 0
           AND r.status = 'active'
           AND a.status = 'active'
           AND NOT EXISTS (
             SELECT 1 FROM outreach x
             WHERE x.recruiter_id = o.recruiter_id AND x.application_id = o.application_id
               AND x.replied = 1
           )
         ORDER BY o.scheduled_for ASC, o.id ASC`,
      )
      .all(today) as CandidateRow[];
    return rows.map(toCandidate);
  }

  markOutreachSent(id: number): void {
    this.db
      .prepare("UPDATE outreach SET status = 'sent', sent_at = ?, last_error = NULL WHERE id = ?")
      .run(this.now(), id);
  }

  markOutreachFailed(id: number, error: string): void {
    this.db
      .prepare(
        "UPDATE outreach SET status = 'failed', attempts = attempts + 1, last_error = ? WHERE id = ?",
      )
      .run(error, id);
  }

  /** A hard bounce retires the record and the recruiter together. */
  markOutreachBounced(id: number, recruiterId: number, reason: string): void {
    const apply = this.db.transaction(() => {
      this.db
        .prepare(
          "UPDATE outreach SET status = 'bounced', attempts = attempts + 1, last_error = ? WHERE id = ?",
        )
        .run(reason, id);
      this.markRecruiterInactive(recruiterId, `Email bounced: ${reason}`);
    });
    apply();
  }

  /** Moves still-pending records to a new date. Returns how many moved. */
  rescheduleOutreach(ids: number[], date: string): number {
    const stmt = this.db.prepare(
      "UPDATE outreach SET scheduled_for = ? WHERE id = ? AND status = 'pending'",
    );
    const apply = this.db.transaction((batch: number[]) => {
      let moved = 0;
      for (const id of batch) {
        moved += stmt.run(date, id).changes;
      }
      return moved;
    });
    return apply(ids);
  }

  /** Flags every record of the pair as replied. Returns the number of rows touched. */
  markReplied(recruiterId: number, applicationId: number): number {
    return this.db
      .prepare("UPDATE outreach SET replied = 1 WHERE recruiter_id = ? AND application_id = ?")
      .run(recruiterId, applicationId).changes;
  }

  listRetryableFailures(maxAttempts: number): OutreachCandidate[] {
    const rows = this.db
      .prepare(
        `${CANDIDATE_SELECT}
         WHERE o.status = 'failed'
           AND o.attempts < ?
           AND r.status = 'active'
           AND a.status = 'active'
           AND NOT EXISTS (
             SELECT 1 FROM outreach x
             WHERE x.recruiter_id = o.recruiter_id AND x.application_id = o.application_id
               AND (x.replied = 1 OR (x.stage = o.stage AND x.status IN ('pending', 'sent')))
           )
         ORDER BY o.id ASC`,
      )
      .all(maxAttempts) as CandidateRow[];
    return rows.map(toCandidate);
  }

  listExhaustedFailures(maxAttempts: number): OutreachCandidate[] {
    const rows = this.db
      .prepare(`${CANDIDATE_SELECT} WHERE o.status = 'failed' AND o.attempts >= ? ORDER BY o.id ASC`)
      .all(maxAttempts) as CandidateRow[];
    return rows.map(toCandidate);
  }

  requeueOutreach(id: number, scheduledFor: string): boolean {
    return (
      this.db
        .prepare(
          "UPDATE outreach SET status = 'pending', scheduled_for = ? WHERE id = ? AND status = 'failed'",
        )
        .run(scheduledFor, id).changes > 0
    );
  }

  countOutreachByStatus(): Record<OutreachStatus, number> {
    const counts: Record<OutreachStatus, number> = { pending: 0, sent: 0, failed: 0, bounced: 0 };
    const rows = this.db
      .prepare("SELECT status, COUNT(*) AS count FROM outreach GROUP BY status")
      .all() as Array<{ status: string; count: number }>;
    for (const row of rows) {
      counts[toOutreachStatus(row.status)] += row.count;
    }
    return counts;
  }

  // ---------------------------------------------------------------------------
  // Contact search quota
  // ---------------------------------------------------------------------------

  private ensureQuotaRow(date: string, totalLimit: number): void {
    this.db
      .prepare(
        `INSERT OR IGNORE INTO contact_quota (date, total_limit, used, remaining)
         VALUES (?, ?, 0, ?)`,
      )
      .run(date, totalLimit, totalLimit);
  }

  private readQuota(date: string): QuotaSnapshot {
    const row = this.db
      .prepare("SELECT date, total_limit, used FROM contact_quota WHERE date = ?")
      .get(date) as QuotaRow | undefined;
    if (!row) {
      throw new Error(`No quota row for ${date}`);
    }
    return createQuotaSnapshot({
      date: row.date,
      totalLimit: row.total_limit,
      used: row.used,
    });
  }

  /** Lazily creates the day's counter. */
  getQuota(date: string, defaultLimit: number): QuotaSnapshot {
    this.ensureQuotaRow(date, defaultLimit);
    return this.readQuota(date);
  }

  incrementQuotaUsed(date: string, count: number, defaultLimit: number): QuotaSnapshot {
    this.ensureQuotaRow(date, defaultLimit);
    this.db
      .prepare(
        `UPDATE contact_quota
         SET used = used + ?, remaining = MAX(0, total_limit - (used + ?))
         WHERE date = ?`,
      )
      .run(count, count, date);
    return this.readQuota(date);
  }

  /** The service's own reading wins over the local counter. */
  reconcileQuota(date: string, remaining: number, totalLimit: number): QuotaSnapshot {
    const clampedRemaining = Math.max(0, Math.min(totalLimit, remaining));
    this.db
      .prepare(
        `INSERT INTO contact_quota (date, total_limit, used, remaining)
         VALUES (?, ?, ?, ?)
         ON CONFLICT(date) DO UPDATE SET
           total_limit = excluded.total_limit,
           used = excluded.used,
           remaining = excluded.remaining`,
      )
      .run(date, totalLimit, totalLimit - clampedRemaining, clampedRemaining);
    return this.readQuota(date);
  }

  // ---------------------------------------------------------------------------
  // Generated content cache
  // ---------------------------------------------------------------------------

  getAiContent(cacheKey: string): unknown {
    const row = this.db
      .prepare("SELECT content_json FROM ai_cache WHERE cache_key = ? AND expires_at > ?")
      .get(cacheKey, this.now()) as { content_json: string } | undefined;
    return row ? parseJson<unknown>(row.content_json, null) : null;
  }

  saveAiContent(params: {
    cacheKey: string;
    company: string;
    jobTitle: string | null;
    content: Record<string, unknown>;
    ttlDays: number;
  }): void {
    const now = this.now();
    this.db
      .prepare(
        `INSERT INTO ai_cache (cache_key, company, job_title, content_json, created_at, expires_at)
         VALUES (?, ?, ?, ?, ?, ?)
         ON CONFLICT(cache_key) DO UPDATE SET
           content_json = excluded.content_json,
           created_at = excluded.created_at,
           expires_at = excluded.expires_at`,
      )
      .run(
        params.cacheKey,
        params.company,
        params.jobTitle,
        JSON.stringify(params.content),
        now,
        now + params.ttlDays * DAY_MS,
      );
  }

  // ---------------------------------------------------------------------------
  // Job description cache
  // ---------------------------------------------------------------------------

  saveJobDescription(jobUrl: string, content: string): void {
    const blob = zlib.deflateSync(Buffer.from(content, "utf8"));
    this.db
      .prepare(
        `INSERT INTO job_cache (url_hash, job_url, content, created_at)
         VALUES (?, ?, ?, ?)
         ON CONFLICT(url_hash) DO UPDATE SET
           content = excluded.content,
           created_at = excluded.created_at`,
      )
      .run(md5(jobUrl), jobUrl, blob, this.now());
  }

  /** Expired or unreadable entries are deleted and reported as missing. */
  getJobDescription(jobUrl: string): string | null {
    const urlHash = md5(jobUrl);
    const row = this.db
      .prepare("SELECT content, created_at FROM job_cache WHERE url_hash = ?")
      .get(urlHash) as { content: Buffer; created_at: number } | undefined;
    if (!row) {
      return null;
    }
    if (row.created_at <= this.now() - this.jobCacheRetentionMs) {
      this.deleteJobDescription(jobUrl);
      return null;
    }
    try {
      return zlib.inflateSync(row.content).toString("utf8");
    } catch {
      this.deleteJobDescription(jobUrl);
      return null;
    }
  }

  deleteJobDescription(jobUrl: string): void {
    this.db.prepare("DELETE FROM job_cache WHERE url_hash = ?").run(md5(jobUrl));
  }

  // ---------------------------------------------------------------------------
  // Language model usage
  // ---------------------------------------------------------------------------

  getModelUsage(date: string, model: string): number {
    const row = this.db
      .prepare("SELECT calls FROM model_usage WHERE date = ? AND model = ?")
      .get(date, model) as { calls: number } | undefined;
    return row?.calls ?? 0;
  }

  incrementModelUsage(date: string, model: string): number {
    this.db
      .prepare(
        `INSERT INTO model_usage (date, model, calls, updated_at)
         VALUES (?, ?, 1, ?)
         ON CONFLICT(date, model) DO UPDATE SET
           calls = calls + 1,
           updated_at = excluded.updated_at`,
      )
      .run(date, model, this.now());
    return this.getModelUsage(date, model);
  }

  // ---------------------------------------------------------------------------
  // Runs
  // ---------------------------------------------------------------------------

  beginRun(kind: RunKind): { runId: string } {
    const runId = crypto.randomUUID();
    this.db
      .prepare(
        "INSERT INTO pipeline_runs (id, kind, status, started_at) VALUES (?, ?, 'running', ?)",
      )
      .run(runId, kind, this.now());
    return { runId };
  }

  markRunCompleted(runId: string, summary?: Record<string, unknown>): void {
    this.finishRun(runId, "completed", summary);
  }

  markRunFailed(runId: string, summary?: Record<string, unknown>): void {
    this.finishRun(runId, "failed", summary);
  }

  private finishRun(
    runId: string,
    status: Exclude<RunStatus, "running">,
    summary?: Record<string, unknown>,
  ): void {
    this.db
      .prepare("UPDATE pipeline_runs SET status = ?, finished_at = ?, summary_json = ? WHERE id = ?")
      .run(status, this.now(), summary ? JSON.stringify(summary) : null, runId);
  }

  recordFailure(params: {
    runId: string;
    step: string;
    ref?: string;
    errorType: string;
    message: string;
    retryable: boolean;
  }): void {
    this.db
      .prepare(
        `INSERT INTO run_failures (run_id, step, ref, error_type, message, retryable, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        params.runId,
        params.step,
        params.ref ?? null,
        params.errorType,
        params.message,
        params.retryable ? 1 : 0,
        this.now(),
      );
  }

  listRecentRuns(limit = 10): PipelineRunRecord[] {
    const rows = this.db
      .prepare("SELECT * FROM pipeline_runs ORDER BY started_at DESC, rowid DESC LIMIT ?")
      .all(limit) as Array<{
      id: string;
      kind: string;
      status: string;
      started_at: number;
      finished_at: number | null;
      summary_json: string | null;
    }>;
    return rows.map((row): PipelineRunRecord => ({
      id: row.id,
      kind: row.kind === "send" ? "send" : "find",
      status: row.status === "completed" || row.status === "failed" ? row.status : "running",
      startedAt: row.started_at,
      finishedAt: row.finished_at,
      summary: parseJson<Record<string, unknown> | null>(row.summary_json, null),
    }));
  }

  listRunFailures(runId: string): RunFailureRecord[] {
    const rows = this.db
      .prepare("SELECT * FROM run_failures WHERE run_id = ? ORDER BY id ASC")
      .all(runId) as Array<{
      id: number;
      run_id: string;
      step: string;
      ref: string | null;
      error_type: string;
      message: string;
      retryable: number;
      created_at: number;
    }>;
    return rows.map((row) => ({
      id: row.id,
      runId: row.run_id,
      step: row.step,
      ref: row.ref,
      errorType: row.error_type,
      message: row.message,
      retryable: row.retryable === 1,
      createdAt: row.created_at,
    }));
  }
}
