import type { OutreachStore } from "./store.js";
import type { QuotaSnapshot } from "./types.js";

/**
 * Split the remaining daily contact-search budget across companies.
 *
 * Companies earlier in the list receive the `+1` share of any remainder, so
 * callers order them by priority (oldest application first). When every
 * company can get the full cap the leftover budget stays unused.
 */
export function distributeQuota(
  remaining: number,
  companyCount: number,
  perCompanyCap: number,
): number[] {
  if (!Number.isInteger(remaining) || remaining < 0) {
    throw new RangeError(`remaining quota must be a non-negative integer, got ${remaining}`);
  }
  if (!Number.isInteger(companyCount) || companyCount < 0) {
    throw new RangeError(`company count must be a non-negative integer, got ${companyCount}`);
  }
  if (!Number.isInteger(perCompanyCap) || perCompanyCap < 1) {
    throw new RangeError(`per-company cap must be a positive integer, got ${perCompanyCap}`);
  }
  if (companyCount === 0) {
    return [];
  }
  if (remaining === 0) {
    return new Array<number>(companyCount).fill(0);
  }

  const base = Math.floor(remaining / companyCount);
  const extra = remaining % companyCount;
  if (base >= perCompanyCap) {
    return new Array<number>(companyCount).fill(perCompanyCap);
  }
  return Array.from({ length: companyCount }, (_, index) =>
    index < extra ? Math.min(base + 1, perCompanyCap) : base,
  );
}

/** Pairs each company with its share, preserving order. */
export function allocateCompanies<T>(
  remaining: number,
  companies: readonly T[],
  perCompanyCap: number,
): Array<{ company: T; allocation: number }> {
  const shares = distributeQuota(remaining, companies.length, perCompanyCap);
  return companies.map((company, index) => ({ company, allocation: shares[index] ?? 0 }));
}

/** Remaining is reported floored at zero, even when visits overshoot the limit. */
export function createQuotaSnapshot(input: {
  date: string;
  totalLimit: number;
  used: number;
}): QuotaSnapshot {
  if (!Number.isInteger(input.totalLimit) || input.totalLimit < 0) {
    throw new RangeError(`quota limit must be a non-negative integer, got ${input.totalLimit}`);
  }
  if (!Number.isInteger(input.used) || input.used < 0) {
    throw new RangeError(`quota usage must be a non-negative integer, got ${input.used}`);
  }
  return {
    date: input.date,
    totalLimit: input.totalLimit,
    used: input.used,
    remaining: Math.max(0, input.totalLimit - input.used),
  };
}

/** Day-scoped view over the stored contact-search counter. */
export class QuotaLedger {
  constructor(
    private readonly store: OutreachStore,
    private readonly params: {
      dailyLimit: number;
      today: () => string;
    },
  ) {}

  snapshot(): QuotaSnapshot {
    return this.store.getQuota(this.params.today(), this.params.dailyLimit);
  }

  remaining(): number {
    return this.snapshot().remaining;
  }

  /** Records profile visits. */
  consume(count = 1): QuotaSnapshot {
    return this.store.incrementQuotaUsed(this.params.today(), count, this.params.dailyLimit);
  }

  reconcile(externalRemaining: number): QuotaSnapshot {
    const current = this.snapshot();
    return this.store.reconcileQuota(current.date, externalRemaining, current.totalLimit);
  }
}
