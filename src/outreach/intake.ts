import fs from "node:fs";
import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { parse as parseDate, isValid } from "date-fns";
import type { SubsystemLogger } from "../logging.js";
import { ConfigError, IntakeValidationError, errorMessage } from "./errors.js";
import type { CachedJobDescriptionSource } from "./job-descriptions.js";
import type { OutreachStore } from "./store.js";
import type { ApplicationRecord, NewApplication } from "./types.js";

const IntakeRecordSchema = Type.Object({
  company: Type.String(),
  jobUrl: Type.String(),
  jobTitle: Type.Optional(Type.Union([Type.String(), Type.Null()])),
  appliedDate: Type.Optional(Type.Union([Type.String(), Type.Null()])),
});

export type IntakeInput = {
  company?: string;
  jobUrl?: string;
  jobTitle?: string | null;
  appliedDate?: string | null;
};

export type IntakeResult = {
  id: number;
  created: boolean;
  application: ApplicationRecord;
};

export type ImportSummary = {
  added: IntakeResult[];
  duplicates: IntakeResult[];
  invalid: Array<{ index: number; problems: string[] }>;
};

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === "http:" || url.protocol === "https:";
  } catch {
    return false;
  }
}

function isCalendarDate(value: string): boolean {
  return /^\d{4}-\d{2}-\d{2}$/.test(value) && isValid(parseDate(value, "yyyy-MM-dd", new Date()));
}

/**
 * Checks an intake record and returns the normalized application, or every
 * problem found with it.
 */
export function validateIntake(
  raw: unknown,
  today: string,
): { ok: true; value: NewApplication } | { ok: false; problems: string[] } {
  if (!Value.Check(IntakeRecordSchema, raw)) {
    const problems = [...Value.Errors(IntakeRecordSchema, raw)].map((error) =>
      error.path ? `${error.path.slice(1)}: ${error.message}` : error.message,
    );
    return { ok: false, problems: problems.length > 0 ? problems : ["not an object"] };
  }

  const problems: string[] = [];
  const company = raw.company.trim();
  const jobUrl = raw.jobUrl.trim();
  const appliedDate = raw.appliedDate?.trim() || today;
  if (!company) {
    problems.push("company is required");
  }
  if (!jobUrl) {
    problems.push("jobUrl is required");
  } else if (!isHttpUrl(jobUrl)) {
    problems.push(`jobUrl must be an http(s) URL: ${jobUrl}`);
  }
  if (!isCalendarDate(appliedDate)) {
    problems.push(`appliedDate must be YYYY-MM-DD: ${appliedDate}`);
  }
  if (problems.length > 0) {
    return { ok: false, problems };
  }
  return {
    ok: true,
    value: { company, jobUrl, jobTitle: raw.jobTitle?.trim() || null, appliedDate },
  };
}

export type ApplicationIntakeDeps = {
  store: OutreachStore;
  jobs: CachedJobDescriptionSource | null;
  logger: SubsystemLogger;
  today: () => string;
};

/** Records job applications and keeps their descriptions cached for later personalization. */
export class ApplicationIntake {
  constructor(private readonly deps: ApplicationIntakeDeps) {}

  async add(input: IntakeInput): Promise<IntakeResult> {
    const checked = validateIntake(input, this.deps.today());
    if (!checked.ok) {
      throw new IntakeValidationError(checked.problems);
    }
    return await this.insert(checked.value);
  }

  async importFile(filePath: string): Promise<ImportSummary> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(filePath, "utf8"));
    } catch (err) {
      throw new ConfigError(`Cannot read applications from ${filePath}: ${errorMessage(err)}`, {
        cause: err,
      });
    }
    if (!Array.isArray(parsed)) {
      throw new ConfigError(`${filePath} must contain a JSON array of applications`);
    }

    const summary: ImportSummary = { added: [], duplicates: [], invalid: [] };
    const today = this.deps.today();
    for (const [index, entry] of parsed.entries()) {
      const checked = validateIntake(entry, today);
      if (!checked.ok) {
        this.deps.logger.warn(`Skipping record ${index}: ${checked.problems.join("; ")}`);
        summary.invalid.push({ index, problems: checked.problems });
        continue;
      }
      const result = await this.insert(checked.value);
      (result.created ? summary.added : summary.duplicates).push(result);
    }
    this.deps.logger.info(
      `Imported ${summary.added.length} application(s), ${summary.duplicates.length} already known, ${summary.invalid.length} invalid`,
    );
    return summary;
  }

  close(applicationId: number): ApplicationRecord {
    const application = this.deps.store.getApplication(applicationId);
    if (!application) {
      throw new ConfigError(`No application with id ${applicationId}`);
    }
    this.deps.store.setApplicationStatus(applicationId, "inactive");
    this.deps.logger.info(`Closed application ${applicationId} (${application.company})`);
    return { ...application, status: "inactive" };
  }

  /** Stops every further stage for the pair. */
  markReplied(recruiterId: number, applicationId: number): number {
    const touched = this.deps.store.markReplied(recruiterId, applicationId);
    if (touched === 0) {
      throw new ConfigError(
        `No outreach found for recruiter ${recruiterId} and application ${applicationId}`,
      );
    }
    this.deps.logger.info(`Marked recruiter ${recruiterId} as replied for application ${applicationId}`);
    return touched;
  }

  private async insert(value: NewApplication): Promise<IntakeResult> {
    const { id, created } = this.deps.store.addApplication(value);
    const application = this.deps.store.getApplication(id);
    if (!application) {
      throw new Error(`Application ${id} vanished after insert`);
    }
    if (created) {
      this.deps.logger.info(`Added application ${id}: ${value.company} ${value.jobUrl}`);
      if (this.deps.jobs) {
        const posting = await this.deps.jobs.get(value.jobUrl);
        if (posting) {
          this.deps.logger.debug(`Cached job description for ${value.jobUrl}`);
        }
      }
    }
    return { id, created, application };
  }
}
