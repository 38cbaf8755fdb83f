import type { SubsystemLogger } from "../logging.js";
import type { DelayRange } from "./config.js";
import type { ContactSearchSession } from "./contact-search.js";
import { isValidEmail } from "./discovery.js";
import { errorMessage } from "./errors.js";
import type { Pacer } from "./pacing.js";
import { normalizeEmail, type OutreachStore } from "./store.js";
import type {
  ContactCard,
  FreshnessTier,
  RecruiterChanges,
  RecruiterRecord,
  VerificationResult,
} from "./types.js";

const DAY_MS = 24 * 60 * 60 * 1000;

export type FreshnessThresholds = {
  lightweightAfterDays: number;
  fullAfterDays: number;
};

export function classifyFreshness(ageDays: number, thresholds: FreshnessThresholds): FreshnessTier {
  if (ageDays < thresholds.lightweightAfterDays) {
    return "trust";
  }
  if (ageDays < thresholds.fullAfterDays) {
    return "lightweight";
  }
  return "full";
}

function normalizeName(value: string): string {
  return value
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, " ")
    .replace(/\s+/g, " ")
    .trim();
}

function normalizeCompany(value: string): string {
  return value.toLowerCase().replace(/[^\p{L}\p{N}]/gu, "");
}

export function findCardByName(cards: ContactCard[], name: string): ContactCard | null {
  const wanted = normalizeName(name);
  if (!wanted) {
    return null;
  }
  return cards.find((card) => normalizeName(card.name) === wanted) ?? null;
}

export function companyMatches(companyText: string, company: string): boolean {
  const text = normalizeCompany(companyText);
  const expected = normalizeCompany(company);
  if (!text || !expected) {
    return true;
  }
  return text.includes(expected) || expected.includes(text);
}

export type RecruiterVerifierDeps = {
  session: ContactSearchSession;
  store: OutreachStore;
  logger: SubsystemLogger;
  thresholds: FreshnessThresholds;
  pacer: Pacer;
  /** Paused before every search and profile visit. */
  profileDelay: DelayRange;
  now?: () => number;
};

/**
 * Re-checks a known recruiter according to how long ago it was last verified.
 *
 * Profile visits made here do not touch the contact quota: the service
 * serves known contacts from cache. A check that throws leaves the
 * recruiter active and records the attempt as `unverified`.
 */
export class RecruiterVerifier {
  private readonly now: () => number;

  constructor(private readonly deps: RecruiterVerifierDeps) {
    this.now = deps.now ?? Date.now;
  }

  tierFor(recruiter: RecruiterRecord): FreshnessTier {
    const ageDays = (this.now() - recruiter.verifiedAt) / DAY_MS;
    return classifyFreshness(ageDays, this.deps.thresholds);
  }

  private async search(company: string): Promise<ContactCard[]> {
    await this.deps.pacer.pause(this.deps.profileDelay);
    return await this.deps.session.search({ company });
  }

  async verify(recruiter: RecruiterRecord): Promise<VerificationResult> {
    const tier = this.tierFor(recruiter);
    if (tier === "trust") {
      return { kind: "trusted", recruiterId: recruiter.id };
    }
    try {
      if (tier === "lightweight") {
        return await this.lightweightCheck(recruiter);
      }
      return await this.fullReverify(recruiter);
    } catch (err) {
      const message = errorMessage(err);
      this.deps.store.markRecruiterCheckFailed(recruiter.id);
      this.deps.logger.warn(`Could not verify ${recruiter.name} at ${recruiter.company}: ${message}`);
      return { kind: "unverified", recruiterId: recruiter.id, error: message };
    }
  }

  private async lightweightCheck(recruiter: RecruiterRecord): Promise<VerificationResult> {
    const cards = await this.search(recruiter.company);
    if (findCardByName(cards, recruiter.name)) {
      this.deps.store.touchRecruiterVerified(recruiter.id, "refreshed");
      return { kind: "refreshed", recruiterId: recruiter.id };
    }
    this.deps.logger.info(`${recruiter.name} missing from ${recruiter.company} results, escalating`);
    return await this.fullReverify(recruiter, cards);
  }

  private async fullReverify(
    recruiter: RecruiterRecord,
    knownCards?: ContactCard[],
  ): Promise<VerificationResult> {
    const { session, store, logger, pacer } = this.deps;
    const cards = knownCards ?? (await this.search(recruiter.company));
    const match = findCardByName(cards, recruiter.name);
    if (!match) {
      return this.retire(recruiter, `No longer listed at ${recruiter.company}`);
    }

    await pacer.pause(this.deps.profileDelay);
    const profile = await session.visitProfile(match.detailLink);
    if (profile.companyText && !companyMatches(profile.companyText, recruiter.company)) {
      return this.retire(recruiter, `Now at ${profile.companyText}`);
    }

    const changes: RecruiterChanges = {};
    if (match.name.trim() && match.name.trim() !== recruiter.name) {
      changes.name = match.name.trim();
    }
    const position = profile.title?.trim() || match.title;
    if (position && position !== recruiter.position) {
      changes.position = position;
    }
    const email = normalizeEmail(profile.email ?? "");
    if (isValidEmail(email) && email !== recruiter.email) {
      const owner = store.findRecruiterByEmail(email);
      if (owner && owner.id !== recruiter.id) {
        logger.warn(`${email} already belongs to recruiter ${owner.id}; keeping ${recruiter.email}`);
      } else {
        changes.email = email;
      }
    }

    const changed = Object.keys(changes).filter(
      (key): key is keyof RecruiterChanges => key === "name" || key === "position" || key === "email",
    );
    if (changed.length === 0) {
      store.touchRecruiterVerified(recruiter.id, "verified");
      return { kind: "verified", recruiterId: recruiter.id };
    }
    store.updateRecruiter(recruiter.id, changes);
    logger.info(`Updated ${recruiter.name}: ${changed.join(", ")}`);
    return { kind: "updated", recruiterId: recruiter.id, changed };
  }

  private retire(recruiter: RecruiterRecord, reason: string): VerificationResult {
    this.deps.store.markRecruiterInactive(recruiter.id, reason);
    this.deps.logger.info(`${recruiter.name} marked inactive: ${reason}`);
    return { kind: "inactive", recruiterId: recruiter.id, reason };
  }
}
