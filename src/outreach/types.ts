export type ApplicationStatus = "active" | "inactive";

export type ApplicationRecord = {
  id: number;
  company: string;
  jobUrl: string;
  jobTitle: string | null;
  /** Calendar date, `YYYY-MM-DD`. */
  appliedDate: string;
  status: ApplicationStatus;
  createdAt: number;
};

export type NewApplication = {
  company: string;
  jobUrl: string;
  jobTitle?: string | null;
  appliedDate: string;
};

export type RecruiterConfidence = "auto" | "manual_review";
export type RecruiterStatus = "active" | "inactive";

/**
 * Outcome of the most recent freshness check. `unverified` means the check
 * could not run; `verifiedAt` then still holds the last successful check.
 */
export type CheckOutcome = "verified" | "refreshed" | "updated" | "unverified" | "inactive";

export type RecruiterRecord = {
  id: number;
  company: string;
  name: string;
  position: string | null;
  email: string;
  confidence: RecruiterConfidence;
  status: RecruiterStatus;
  verifiedAt: number;
  checkedAt: number | null;
  checkOutcome: CheckOutcome | null;
  inactiveReason: string | null;
  createdAt: number;
};

export type NewRecruiter = {
  company: string;
  name: string;
  position?: string | null;
  email: string;
  confidence: RecruiterConfidence;
};

export type RecruiterChanges = {
  name?: string;
  position?: string | null;
  email?: string;
};

export type ApplicationRecruiterLink = {
  applicationId: number;
  recruiterId: number;
  createdAt: number;
};

export const OUTREACH_STAGES = ["initial", "followup1", "followup2"] as const;
export type OutreachStage = (typeof OUTREACH_STAGES)[number];

export type OutreachStatus = "pending" | "sent" | "failed" | "bounced";

export type OutreachRecord = {
  id: number;
  recruiterId: number;
  applicationId: number;
  stage: OutreachStage;
  status: OutreachStatus;
  replied: boolean;
  /** Calendar date in the send-window timezone, `YYYY-MM-DD`. */
  scheduledFor: string;
  sentAt: number | null;
  attempts: number;
  lastError: string | null;
  createdAt: number;
};

/** A due outreach record joined with what the sender needs. */
export type OutreachCandidate = OutreachRecord & {
  recruiterName: string;
  recruiterEmail: string;
  company: string;
  jobUrl: string;
  jobTitle: string | null;
};

export type QuotaSnapshot = {
  date: string;
  totalLimit: number;
  used: number;
  remaining: number;
};

// -----------------------------------------------------------------------------
// Contact search collaborator
// -----------------------------------------------------------------------------

export type ContactSearchQuery = {
  company: string;
  titleFilter?: string;
  requireEmailIndicator?: boolean;
};

/** One row of a search result page. */
export type ContactCard = {
  name: string;
  title: string | null;
  detailLink: string;
  hasEmailIndicator: boolean;
};

export type ContactProfile = {
  email?: string | null;
  title?: string | null;
  companyText?: string | null;
};

export type DiscoveredContact = {
  name: string;
  position: string | null;
  email: string;
  confidence: RecruiterConfidence;
};

export type DiscoveryResult =
  | { kind: "found"; contacts: DiscoveredContact[]; profileVisits: number; quotaExhausted: boolean }
  | { kind: "empty"; profileVisits: number; quotaExhausted: boolean }
  | { kind: "error"; message: string; profileVisits: number; quotaExhausted: boolean };

// -----------------------------------------------------------------------------
// Freshness
// -----------------------------------------------------------------------------

export type FreshnessTier = "trust" | "lightweight" | "full";

export type VerificationResult =
  | { kind: "trusted"; recruiterId: number }
  | { kind: "refreshed"; recruiterId: number }
  | { kind: "updated"; recruiterId: number; changed: Array<keyof RecruiterChanges> }
  | { kind: "verified"; recruiterId: number }
  | { kind: "inactive"; recruiterId: number; reason: string }
  | { kind: "unverified"; recruiterId: number; error: string };

// -----------------------------------------------------------------------------
// Sending
// -----------------------------------------------------------------------------

export type SendWindowState = "wait" | "send" | "cutoff";

export type SendWindow = {
  startHour: number;
  endHour: number;
  graceHours: number;
  timezone: string;
};

export type SendOutcome =
  | { kind: "sent"; messageId?: string }
  | { kind: "recipient_rejected"; reason: string }
  | { kind: "transient_failure"; reason: string };

export type OutgoingMessage = {
  to: string;
  subject: string;
  body: string;
  attachmentPath?: string | null;
};

export type RenderedMessage = {
  subject: string;
  body: string;
};

// -----------------------------------------------------------------------------
// Personalization
// -----------------------------------------------------------------------------

export type GeneratedContent = {
  subjectInitial: string;
  subjectFollowup1: string;
  subjectFollowup2: string;
  intro: string;
  followup1: string;
  followup2: string;
};

export type GenerationResult =
  | { kind: "cached"; content: GeneratedContent }
  | { kind: "generated"; content: GeneratedContent; model: string }
  | { kind: "exhausted" }
  | { kind: "failed"; message: string };

export type JobPosting = {
  url: string;
  title: string | null;
  company: string | null;
  location: string | null;
  description: string;
};

// -----------------------------------------------------------------------------
// Runs
// -----------------------------------------------------------------------------

export type RunKind = "find" | "send";
export type RunStatus = "running" | "completed" | "failed";

export type PipelineRunRecord = {
  id: string;
  kind: RunKind;
  status: RunStatus;
  startedAt: number;
  finishedAt: number | null;
  summary: Record<string, unknown> | null;
};

export type RunFailureRecord = {
  id: number;
  runId: string;
  step: string;
  ref: string | null;
  errorType: string;
  message: string;
  retryable: boolean;
  createdAt: number;
};
