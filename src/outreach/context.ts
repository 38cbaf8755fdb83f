import { createSubsystemLogger } from "../logging.js";
import type { RuntimeEnv } from "../runtime.js";
import { assertMailConfigured, type OutreachConfig } from "./config.js";
import { HttpContactSearchClient, type ContactSearchSession } from "./contact-search.js";
import { ContactDiscovery } from "./discovery.js";
import { OutreachEngine } from "./engine.js";
import { RecruiterVerifier } from "./freshness.js";
import { ApplicationIntake } from "./intake.js";
import {
  AtsJobDescriptionFetcher,
  CachedJobDescriptionSource,
  type JobDescriptionFetcher,
} from "./job-descriptions.js";
import { GeminiClient, type LanguageModelClient } from "./language-model.js";
import { SmtpMailTransport, type MailTransport } from "./mailer.js";
import { createPacer, type RandomSource, type Sleep } from "./pacing.js";
import { ContentPersonalizer } from "./personalization.js";
import { OutreachPipeline } from "./pipeline.js";
import { QuotaLedger } from "./quota.js";
import { RosterService } from "./roster.js";
import { dateKey } from "./send-window.js";
import { OutreachStore } from "./store.js";
import { OutreachMessageResolver } from "./templates.js";
import { loadTitleKeywords, type TitleKeywords } from "./titles.js";

/** Collaborators a caller may supply instead of the networked defaults. */
export type OutreachContextOverrides = {
  runtime?: RuntimeEnv;
  debug?: boolean;
  now?: () => number;
  sleep?: Sleep;
  random?: RandomSource;
  session?: ContactSearchSession;
  languageModel?: LanguageModelClient | null;
  transport?: MailTransport;
  jobFetcher?: JobDescriptionFetcher;
  keywords?: TitleKeywords;
};

export type OutreachContext = {
  config: OutreachConfig;
  store: OutreachStore;
  intake: ApplicationIntake;
  pipeline: OutreachPipeline;
  today: () => string;
  close: () => void;
};

/**
 * Builds every service once from resolved config. The store is opened here
 * and must be released with `close()`.
 */
export function createOutreachContext(
  config: OutreachConfig,
  overrides: OutreachContextOverrides = {},
): OutreachContext {
  const now = overrides.now ?? Date.now;
  const today = () => dateKey(now(), config.sendWindow.timezone);
  const logger = createSubsystemLogger("outreach", {
    runtime: overrides.runtime,
    debug: overrides.debug,
  });
  const pacer = createPacer({ sleep: overrides.sleep, random: overrides.random });

  const store = new OutreachStore(config.store.path, {
    now,
    jobCacheRetentionDays: config.retention.jobCacheDays,
    modelUsageRetentionDays: config.retention.modelUsageDays,
  });

  const session =
    overrides.session ??
    new HttpContactSearchClient({
      apiUrl: config.contactSearch.apiUrl,
      apiKey: config.contactSearch.apiKey,
      timeoutMs: config.contactSearch.timeoutMs,
      sleep: overrides.sleep,
    });
  const ledger = new QuotaLedger(store, { dailyLimit: config.contactSearch.dailyLimit, today });

  const jobs = new CachedJobDescriptionSource({
    store,
    fetcher: overrides.jobFetcher ?? new AtsJobDescriptionFetcher(),
    logger: logger.child("jobs"),
  });

  const languageModel =
    overrides.languageModel !== undefined
      ? overrides.languageModel
      : config.personalization.apiKey
        ? new GeminiClient({
            apiKey: config.personalization.apiKey,
            timeoutMs: config.personalization.timeoutMs,
          })
        : null;
  const personalizer = new ContentPersonalizer({
    store,
    client: languageModel,
    models: config.personalization.models,
    cacheTtlDays: config.personalization.cacheTtlDays,
    candidateBackground: config.personalization.candidateBackground,
    logger: logger.child("personalize"),
    today,
  });

  const roster = new RosterService({
    store,
    session,
    ledger,
    verifier: new RecruiterVerifier({
      session,
      store,
      logger: logger.child("freshness"),
      thresholds: config.freshness,
      pacer,
      profileDelay: config.contactSearch.profileDelay,
      now,
    }),
    discovery: new ContactDiscovery({
      session,
      ledger,
      keywords: overrides.keywords ?? loadTitleKeywords(),
      pacer,
      logger: logger.child("discovery"),
      minRecruitersPerCompany: config.contactSearch.minRecruitersPerCompany,
      profileDelay: config.contactSearch.profileDelay,
    }),
    pacer,
    logger: logger.child("roster"),
    minRecruitersPerCompany: config.contactSearch.minRecruitersPerCompany,
    perCompanyCap: config.contactSearch.perCompanyCap,
    companyDelay: config.contactSearch.companyDelay,
  });

  const createEngine = (): OutreachEngine => {
    let transport = overrides.transport;
    if (!transport) {
      assertMailConfigured(config);
      transport = new SmtpMailTransport({
        host: config.mail.host,
        port: config.mail.port,
        secure: config.mail.secure,
        user: config.mail.user ?? "",
        password: config.mail.password ?? "",
        from: config.mail.from,
        fromName: config.sender.name || null,
      });
    }
    return new OutreachEngine({
      store,
      transport,
      messages: new OutreachMessageResolver({
        personalizer,
        jobs,
        senderName: config.sender.name,
        logger: logger.child("messages"),
      }),
      pacer,
      logger: logger.child("engine"),
      window: config.sendWindow,
      sendIntervalDays: config.outreach.sendIntervalDays,
      maxSendAttempts: config.outreach.maxSendAttempts,
      retryBaseDays: config.outreach.retryBaseDays,
      sendDelay: config.outreach.sendDelay,
      attachmentPath: config.outreach.resumePath,
      now,
    });
  };

  const pipeline = new OutreachPipeline({
    store,
    roster,
    personalizer,
    jobs,
    ledger,
    logger: logger.child("pipeline"),
    maxSendAttempts: config.outreach.maxSendAttempts,
    createEngine,
  });

  const intake = new ApplicationIntake({
    store,
    jobs,
    logger: logger.child("intake"),
    today,
  });

  return {
    config,
    store,
    intake,
    pipeline,
    today,
    close: () => store.close(),
  };
}
