import type { SubsystemLogger } from "../logging.js";
import type { DelayRange } from "./config.js";
import type { ContactSearchSession } from "./contact-search.js";
import type { ContactDiscovery } from "./discovery.js";
import { ConfigError, errorMessage } from "./errors.js";
import type { RecruiterVerifier } from "./freshness.js";
import type { Pacer } from "./pacing.js";
import { allocateCompanies, type QuotaLedger } from "./quota.js";
import type { OutreachStore } from "./store.js";
import type { QuotaSnapshot, VerificationResult } from "./types.js";

export type StepFailure = {
  step: string;
  ref?: string;
  error: unknown;
  retryable: boolean;
};

export type RosterSummary = {
  companies: number;
  verification: Record<VerificationResult["kind"], number>;
  linksCreated: number;
  companiesSearched: string[];
  deferredCompanies: string[];
  contactsFound: number;
  recruitersCreated: number;
  profileVisits: number;
  quota: QuotaSnapshot;
};

export type RosterServiceDeps = {
  store: OutreachStore;
  session: ContactSearchSession;
  ledger: QuotaLedger;
  verifier: RecruiterVerifier;
  discovery: ContactDiscovery;
  pacer: Pacer;
  logger: SubsystemLogger;
  minRecruitersPerCompany: number;
  perCompanyCap: number;
  companyDelay: DelayRange;
};

/** Keeps each company's recruiter list fresh, linked and topped up. */
export class RosterService {
  constructor(private readonly deps: RosterServiceDeps) {}

  async refresh(opts?: { onFailure?: (failure: StepFailure) => void }): Promise<RosterSummary> {
    const { store, session, ledger, verifier, logger } = this.deps;
    const onFailure = opts?.onFailure;

    if (!(await session.verifySession())) {
      throw new ConfigError("Contact search session is not valid; sign in again");
    }

    try {
      const external = await session.fetchRemainingQuota();
      if (external !== null) {
        const snapshot = ledger.reconcile(external);
        logger.info(`Quota remaining today: ${snapshot.remaining}/${snapshot.totalLimit}`);
      }
    } catch (err) {
      logger.warn(`Quota reading unavailable, keeping local counter: ${errorMessage(err)}`);
      onFailure?.({ step: "quota_reconcile", error: err, retryable: true });
    }

    const summary: RosterSummary = {
      companies: 0,
      verification: { trusted: 0, refreshed: 0, updated: 0, verified: 0, inactive: 0, unverified: 0 },
      linksCreated: 0,
      companiesSearched: [],
      deferredCompanies: [],
      contactsFound: 0,
      recruitersCreated: 0,
      profileVisits: 0,
      quota: ledger.snapshot(),
    };

    const companies = store.listActiveCompanies();
    summary.companies = companies.length;
    const needing: string[] = [];

    for (const { company } of companies) {
      for (const recruiter of store.listActiveRecruitersByCompany(company)) {
        const result = await verifier.verify(recruiter);
        summary.verification[result.kind] += 1;
        if (result.kind === "unverified") {
          onFailure?.({
            step: "verify_recruiter",
            ref: String(recruiter.id),
            error: result.error,
            retryable: true,
          });
        }
      }
      const active = store.listActiveRecruitersByCompany(company);
      summary.linksCreated += this.linkToApplications(
        company,
        active.map((recruiter) => recruiter.id),
      );
      if (active.length < this.deps.minRecruitersPerCompany) {
        needing.push(company);
      }
    }

    if (needing.length === 0) {
      logger.info("Every company has enough recruiters");
      summary.quota = ledger.snapshot();
      return summary;
    }

    const remaining = ledger.remaining();
    if (remaining === 0) {
      logger.warn(`${needing.length} companies need contacts but today's quota is used up`);
      summary.deferredCompanies = needing;
      summary.quota = ledger.snapshot();
      return summary;
    }

    const allocations = allocateCompanies(remaining, needing, this.deps.perCompanyCap);
    logger.info(
      `Distributing ${remaining} credits: ${allocations.map((entry) => `${entry.company}=${entry.allocation}`).join(", ")}`,
    );

    let quotaExhausted = false;
    for (const { company, allocation } of allocations) {
      if (allocation === 0 || quotaExhausted) {
        summary.deferredCompanies.push(company);
        continue;
      }
      if (summary.companiesSearched.length > 0) {
        await this.deps.pacer.pause(this.deps.companyDelay);
      }
      summary.companiesSearched.push(company);

      const result = await this.deps.discovery.discover(company, allocation);
      summary.profileVisits += result.profileVisits;
      quotaExhausted = result.quotaExhausted;

      if (result.kind === "error") {
        logger.error(`No contacts found for ${company}: ${result.message}`);
        onFailure?.({
          step: "discover_contacts",
          ref: company,
          error: result.message,
          retryable: true,
        });
        continue;
      }
      if (result.kind === "empty") {
        logger.warn(`No contacts found for ${company}`);
        continue;
      }

      const recruiterIds: number[] = [];
      for (const contact of result.contacts) {
        const { id, created } = store.addRecruiter({ company, ...contact });
        recruiterIds.push(id);
        summary.contactsFound += 1;
        if (created) {
          summary.recruitersCreated += 1;
        } else {
          logger.debug(`Already known: ${contact.email} (id=${id})`);
        }
      }
      summary.linksCreated += this.linkToApplications(company, recruiterIds);
    }

    summary.quota = ledger.snapshot();
    return summary;
  }

  /** Links recruiters to every active application of the company. */
  private linkToApplications(company: string, recruiterIds: number[]): number {
    let created = 0;
    for (const application of this.deps.store.listActiveApplicationsByCompany(company)) {
      for (const recruiterId of recruiterIds) {
        if (this.deps.store.linkRecruiterToApplication(application.id, recruiterId)) {
          created += 1;
        }
      }
    }
    return created;
  }
}
