import type { SubsystemLogger } from "../logging.js";
import type { DelayRange } from "./config.js";
import type { ContactSearchSession } from "./contact-search.js";
import { errorMessage } from "./errors.js";
import type { Pacer } from "./pacing.js";
import type { QuotaLedger } from "./quota.js";
import { normalizeEmail } from "./store.js";
import { classifyTitle, isExcludedTitle, type TitleKeywords } from "./titles.js";
import type {
  ContactCard,
  ContactSearchQuery,
  DiscoveredContact,
  DiscoveryResult,
} from "./types.js";

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

export function isValidEmail(value: string): boolean {
  return EMAIL_PATTERN.test(value);
}

type SearchPass = {
  name: "strict" | "relaxed" | "unfiltered";
  useTitleTerms: boolean;
  requireEmailIndicator: boolean;
  excludeSenior: boolean;
  /** Hits from fallback passes always need a human look. */
  fallback: boolean;
};

const SEARCH_PASSES: readonly SearchPass[] = [
  {
    name: "strict",
    useTitleTerms: true,
    requireEmailIndicator: true,
    excludeSenior: true,
    fallback: false,
  },
  {
    name: "relaxed",
    useTitleTerms: true,
    requireEmailIndicator: true,
    excludeSenior: false,
    fallback: true,
  },
  {
    name: "unfiltered",
    useTitleTerms: false,
    requireEmailIndicator: false,
    excludeSenior: true,
    fallback: true,
  },
];

export type ContactDiscoveryDeps = {
  session: ContactSearchSession;
  ledger: QuotaLedger;
  keywords: TitleKeywords;
  pacer: Pacer;
  logger: SubsystemLogger;
  minRecruitersPerCompany: number;
  profileDelay: DelayRange;
};

type DiscoveryState = {
  company: string;
  maxContacts: number;
  found: DiscoveredContact[];
  visited: Set<string>;
  seenEmails: Set<string>;
  errors: string[];
  profileVisits: number;
  quotaExhausted: boolean;
};

/**
 * Finds recruiting contacts at a company in up to three passes, each looser
 * than the last. Later passes only run while fewer than
 * `minRecruitersPerCompany` contacts have been found.
 */
export class ContactDiscovery {
  constructor(private readonly deps: ContactDiscoveryDeps) {}

  async discover(company: string, maxContacts: number): Promise<DiscoveryResult> {
    const state: DiscoveryState = {
      company,
      maxContacts,
      found: [],
      visited: new Set(),
      seenEmails: new Set(),
      errors: [],
      profileVisits: 0,
      quotaExhausted: false,
    };

    for (const [index, pass] of SEARCH_PASSES.entries()) {
      if (index > 0 && state.found.length >= this.deps.minRecruitersPerCompany) {
        break;
      }
      if (state.found.length >= maxContacts || state.quotaExhausted) {
        break;
      }
      if (index > 0) {
        this.deps.logger.info(`${company}: ${pass.name} pass (${state.found.length} found so far)`);
      }
      await this.runPass(pass, state);
    }

    const base = { profileVisits: state.profileVisits, quotaExhausted: state.quotaExhausted };
    if (state.found.length > 0) {
      return { kind: "found", contacts: state.found, ...base };
    }
    if (state.errors.length > 0) {
      return { kind: "error", message: state.errors.join("; "), ...base };
    }
    return { kind: "empty", ...base };
  }

  private queriesFor(pass: SearchPass, company: string): ContactSearchQuery[] {
    if (!pass.useTitleTerms) {
      return [{ company, requireEmailIndicator: false }];
    }
    return this.deps.keywords.searchTerms.map((titleFilter) => ({
      company,
      titleFilter,
      requireEmailIndicator: pass.requireEmailIndicator,
    }));
  }

  private async runPass(pass: SearchPass, state: DiscoveryState): Promise<void> {
    for (const query of this.queriesFor(pass, state.company)) {
      if (state.found.length >= state.maxContacts || state.quotaExhausted) {
        return;
      }
      let cards: ContactCard[];
      try {
        cards = await this.deps.session.search(query);
      } catch (err) {
        const message = `search ${query.titleFilter ?? "(no title)"} failed: ${errorMessage(err)}`;
        state.errors.push(message);
        this.deps.logger.warn(`${state.company}: ${message}`);
        continue;
      }
      this.deps.logger.debug(
        `${state.company}: '${query.titleFilter ?? "*"}' returned ${cards.length} card(s)`,
      );
      await this.collect(cards, pass, state);
      if (state.found.length >= this.deps.minRecruitersPerCompany) {
        return;
      }
    }
  }

  private async collect(
    cards: ContactCard[],
    pass: SearchPass,
    state: DiscoveryState,
  ): Promise<void> {
    const { keywords, ledger, logger, session } = this.deps;
    for (const card of cards) {
      if (state.found.length >= state.maxContacts) {
        return;
      }
      if (state.visited.has(card.detailLink)) {
        continue;
      }
      const confidence = classifyTitle(card.title, keywords);
      if (!confidence) {
        continue;
      }
      if (pass.excludeSenior && isExcludedTitle(card.title, keywords)) {
        continue;
      }
      if (pass.requireEmailIndicator && !card.hasEmailIndicator) {
        continue;
      }
      if (ledger.remaining() <= 0) {
        state.quotaExhausted = true;
        logger.warn(`${state.company}: daily contact quota exhausted`);
        return;
      }

      state.visited.add(card.detailLink);
      await this.deps.pacer.pause(this.deps.profileDelay);
      let email: string;
      try {
        const profile = await session.visitProfile(card.detailLink);
        email = normalizeEmail(profile.email ?? "");
      } catch (err) {
        const message = `profile visit for ${card.name} failed: ${errorMessage(err)}`;
        state.errors.push(message);
        logger.warn(`${state.company}: ${message}`);
        continue;
      }
      state.profileVisits += 1;
      ledger.consume(1);

      if (!isValidEmail(email)) {
        logger.debug(`${state.company}: no email on profile for ${card.name}`);
        continue;
      }
      if (state.seenEmails.has(email)) {
        continue;
      }
      state.seenEmails.add(email);
      state.found.push({
        name: card.name,
        position: card.title,
        email,
        confidence: pass.fallback ? "manual_review" : confidence,
      });
      logger.info(`${state.company}: found ${card.name} <${email}> (${pass.name})`);
    }
  }
}
