export { resolveOutreachConfig, assertMailConfigured, type OutreachConfig } from "./config.js";
export { createOutreachContext, type OutreachContext } from "./context.js";
export { OutreachStore, normalizeEmail } from "./store.js";
export { distributeQuota, allocateCompanies, createQuotaSnapshot, QuotaLedger } from "./quota.js";
export { classifyFreshness, RecruiterVerifier } from "./freshness.js";
export { ContactDiscovery, isValidEmail } from "./discovery.js";
export { classifyTitle, isExcludedTitle, loadTitleKeywords } from "./titles.js";
export { OutreachEngine, NEXT_STAGE } from "./engine.js";
export { resolveSendWindowState, msUntilWindowOpens, dateKey } from "./send-window.js";
export { ApplicationIntake, validateIntake } from "./intake.js";
export { OutreachPipeline } from "./pipeline.js";
export { RosterService } from "./roster.js";
export { ContentPersonalizer, contentCacheKey } from "./personalization.js";
export { renderOutreachMessage, OutreachMessageResolver } from "./templates.js";
export { HttpContactSearchClient, type ContactSearchSession } from "./contact-search.js";
export { GeminiClient, type LanguageModelClient } from "./language-model.js";
export { SmtpMailTransport, classifySendError, type MailTransport } from "./mailer.js";
export {
  AtsJobDescriptionFetcher,
  CachedJobDescriptionSource,
  type JobDescriptionFetcher,
} from "./job-descriptions.js";
export {
  OutreachError,
  ConfigError,
  IntakeValidationError,
  classifyExternalError,
} from "./errors.js";
export type {
  ApplicationRecord,
  RecruiterRecord,
  OutreachRecord,
  OutreachStage,
  OutreachStatus,
  QuotaSnapshot,
  SendWindow,
  SendWindowState,
  FreshnessTier,
  VerificationResult,
  DiscoveryResult,
  SendOutcome,
  GenerationResult,
} from "./types.js";
