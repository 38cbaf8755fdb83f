import path from "node:path";
import type { RawOutreachConfig } from "../config/config.js";
import { resolveStateDir } from "../config/paths.js";
import { ConfigError } from "./errors.js";
import type { SendWindow } from "./types.js";

export type DelayRange = {
  minMs: number;
  maxMs: number;
};

export type ModelQuota = {
  model: string;
  dailyLimit: number;
};

export type OutreachConfig = {
  store: {
    path: string;
  };
  contactSearch: {
    apiUrl: string;
    apiKey: string | null;
    dailyLimit: number;
    perCompanyCap: number;
    minRecruitersPerCompany: number;
    timeoutMs: number;
    profileDelay: DelayRange;
    companyDelay: DelayRange;
  };
  freshness: {
    lightweightAfterDays: number;
    fullAfterDays: number;
  };
  sendWindow: SendWindow;
  outreach: {
    sendIntervalDays: number;
    maxSendAttempts: number;
    retryBaseDays: number;
    sendDelay: DelayRange;
    resumePath: string | null;
  };
  mail: {
    host: string;
    port: number;
    secure: boolean;
    user: string | null;
    password: string | null;
    from: string | null;
  };
  personalization: {
    apiKey: string | null;
    models: ModelQuota[];
    cacheTtlDays: number;
    timeoutMs: number;
    candidateBackground: string[];
  };
  sender: {
    name: string;
  };
  retention: {
    jobCacheDays: number;
    modelUsageDays: number;
  };
};

const DEFAULT_MODELS: ModelQuota[] = [
  { model: "gemini-2.5-flash-lite", dailyLimit: 20 },
  { model: "gemini-2.5-flash", dailyLimit: 20 },
];

function clampNumber(
  value: number | undefined,
  min: number,
  max: number,
  fallback: number,
): number {
  if (value === undefined || !Number.isFinite(value)) {
    return fallback;
  }
  return Math.min(max, Math.max(min, value));
}

function section(raw: RawOutreachConfig, key: string): Record<string, unknown> {
  const value = raw[key];
  return typeof value === "object" && value !== null && !Array.isArray(value)
    ? (value as Record<string, unknown>)
    : {};
}

function num(value: unknown): number | undefined {
  return typeof value === "number" ? value : undefined;
}

function str(value: unknown): string {
  return typeof value === "string" ? value.trim() : "";
}

function secret(value: unknown, envValue: string | undefined): string | null {
  return str(value) || envValue?.trim() || null;
}

function resolveDelay(value: unknown, fallback: DelayRange): DelayRange {
  const raw =
    typeof value === "object" && value !== null ? (value as Record<string, unknown>) : {};
  const minSeconds = clampNumber(num(raw.minSeconds), 0, 3600, fallback.minMs / 1000);
  const maxSeconds = clampNumber(num(raw.maxSeconds), minSeconds, 3600, fallback.maxMs / 1000);
  return { minMs: Math.round(minSeconds * 1000), maxMs: Math.round(maxSeconds * 1000) };
}

function resolveModels(value: unknown): ModelQuota[] {
  if (!Array.isArray(value)) {
    return DEFAULT_MODELS.map((entry) => ({ ...entry }));
  }
  const models: ModelQuota[] = [];
  for (const entry of value) {
    if (typeof entry === "string" && entry.trim()) {
      models.push({ model: entry.trim(), dailyLimit: 20 });
      continue;
    }
    if (typeof entry === "object" && entry !== null) {
      const record = entry as Record<string, unknown>;
      const model = str(record.model);
      if (model) {
        models.push({
          model,
          dailyLimit: Math.trunc(clampNumber(num(record.dailyLimit), 0, 10_000, 20)),
        });
      }
    }
  }
  return models.length > 0 ? models : DEFAULT_MODELS.map((entry) => ({ ...entry }));
}

export function isValidTimeZone(timezone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: timezone });
    return true;
  } catch {
    return false;
  }
}

export function resolveOutreachConfig(
  raw: RawOutreachConfig = {},
  env: NodeJS.ProcessEnv = process.env,
): OutreachConfig {
  const store = section(raw, "store");
  const contactSearch = section(raw, "contactSearch");
  const freshness = section(raw, "freshness");
  const sendWindow = section(raw, "sendWindow");
  const outreach = section(raw, "outreach");
  const mail = section(raw, "mail");
  const personalization = section(raw, "personalization");
  const sender = section(raw, "sender");
  const retention = section(raw, "retention");

  const stateDir = resolveStateDir(env);
  const storePath = str(store.path) || path.join(stateDir, "outreach.sqlite");

  const lightweightAfterDays = Math.trunc(
    clampNumber(num(freshness.lightweightAfterDays), 0, 365, 7),
  );
  const fullAfterDays = Math.trunc(
    clampNumber(num(freshness.fullAfterDays), lightweightAfterDays + 1, 730, 30),
  );

  const startHour = Math.trunc(clampNumber(num(sendWindow.startHour), 0, 23, 9));
  const endHour = Math.trunc(clampNumber(num(sendWindow.endHour), startHour + 1, 24, 11));
  const timezone = str(sendWindow.timezone) || "America/New_York";
  if (!isValidTimeZone(timezone)) {
    throw new ConfigError(`Unknown send window timezone: ${timezone}`);
  }

  const background = Array.isArray(personalization.candidateBackground)
    ? personalization.candidateBackground
        .filter((line): line is string => typeof line === "string")
        .map((line) => line.trim())
        .filter(Boolean)
    : [];

  const resumePath = str(outreach.resumePath);

  return {
    store: {
      path: storePath,
    },
    contactSearch: {
      apiUrl: str(contactSearch.apiUrl) || "http://127.0.0.1:8780",
      apiKey: secret(contactSearch.apiKey, env.CONTACT_SEARCH_API_KEY),
      dailyLimit: Math.trunc(clampNumber(num(contactSearch.dailyLimit), 0, 10_000, 50)),
      perCompanyCap: Math.trunc(clampNumber(num(contactSearch.perCompanyCap), 1, 100, 3)),
      minRecruitersPerCompany: Math.trunc(
        clampNumber(num(contactSearch.minRecruitersPerCompany), 1, 100, 2),
      ),
      timeoutMs: Math.trunc(clampNumber(num(contactSearch.timeoutMs), 1000, 300_000, 30_000)),
      profileDelay: resolveDelay(contactSearch.profileDelay, { minMs: 4000, maxMs: 8000 }),
      companyDelay: resolveDelay(contactSearch.companyDelay, { minMs: 3000, maxMs: 7000 }),
    },
    freshness: {
      lightweightAfterDays,
      fullAfterDays,
    },
    sendWindow: {
      startHour,
      endHour,
      graceHours: clampNumber(num(sendWindow.graceHours), 0, 12, 1),
      timezone,
    },
    outreach: {
      sendIntervalDays: Math.trunc(clampNumber(num(outreach.sendIntervalDays), 1, 90, 7)),
      maxSendAttempts: Math.trunc(clampNumber(num(outreach.maxSendAttempts), 1, 10, 3)),
      retryBaseDays: Math.trunc(clampNumber(num(outreach.retryBaseDays), 1, 30, 1)),
      sendDelay: resolveDelay(outreach.sendDelay, { minMs: 30_000, maxMs: 90_000 }),
      resumePath: resumePath ? path.resolve(resumePath) : null,
    },
    mail: {
      host: str(mail.host) || "smtp.gmail.com",
      port: Math.trunc(clampNumber(num(mail.port), 1, 65_535, 587)),
      secure: mail.secure === true,
      user: secret(mail.user, env.SMTP_USER),
      password: secret(mail.password, env.SMTP_PASSWORD),
      from: str(mail.from) || null,
    },
    personalization: {
      apiKey: secret(personalization.apiKey, env.GEMINI_API_KEY),
      models: resolveModels(personalization.models),
      cacheTtlDays: Math.trunc(clampNumber(num(personalization.cacheTtlDays), 1, 365, 21)),
      timeoutMs: Math.trunc(clampNumber(num(personalization.timeoutMs), 1000, 300_000, 60_000)),
      candidateBackground: background,
    },
    sender: {
      name: str(sender.name) || "",
    },
    retention: {
      jobCacheDays: Math.trunc(clampNumber(num(retention.jobCacheDays), 1, 365, 21)),
      modelUsageDays: Math.trunc(clampNumber(num(retention.modelUsageDays), 1, 365, 21)),
    },
  };
}

/** Throws when sending is impossible with the resolved settings. */
export function assertMailConfigured(config: OutreachConfig): void {
  const missing: string[] = [];
  if (!config.mail.user) {
    missing.push("SMTP_USER");
  }
  if (!config.mail.password) {
    missing.push("SMTP_PASSWORD");
  }
  if (missing.length > 0) {
    throw new ConfigError(`Mail credentials missing: ${missing.join(", ")}`);
  }
}
