import type { SubsystemLogger } from "../logging.js";
import type { OutreachEngine, OutreachRunSummary } from "./engine.js";
import { ConfigError, classifyExternalError } from "./errors.js";
import type { CachedJobDescriptionSource } from "./job-descriptions.js";
import type { ContentPersonalizer } from "./personalization.js";
import type { QuotaLedger } from "./quota.js";
import type { RosterService, RosterSummary, StepFailure } from "./roster.js";
import type { OutreachStore } from "./store.js";
import { DEFAULT_ROLE } from "./templates.js";
import type {
  OutreachStatus,
  PipelineRunRecord,
  QuotaSnapshot,
  RunFailureRecord,
} from "./types.js";

export type ContentSummary = {
  applications: number;
  cached: number;
  generated: number;
  failed: number;
  deferred: number;
};

export type FindRunSummary = {
  runId: string;
  roster: RosterSummary;
  content: ContentSummary;
  failures: number;
};

export type SendRunSummary = OutreachRunSummary & {
  runId: string;
  failures: number;
};

export type PipelineRunResult = {
  find: FindRunSummary | null;
  /** Set when the find run failed. */
  findError: string | null;
  send: SendRunSummary;
};

export type AttentionItem = {
  outreachId: number;
  recruiterId: number;
  applicationId: number;
  recruiterEmail: string;
  company: string;
  stage: string;
  attempts: number;
  lastError: string | null;
};

export type PipelineStatus = {
  quota: QuotaSnapshot;
  applications: { active: number; inactive: number };
  recruiters: number;
  outreach: Record<OutreachStatus, number>;
  needsAttention: AttentionItem[];
  recentRuns: PipelineRunRecord[];
};

export type OutreachPipelineDeps = {
  store: OutreachStore;
  roster: RosterService;
  personalizer: ContentPersonalizer;
  jobs: CachedJobDescriptionSource;
  ledger: QuotaLedger;
  logger: SubsystemLogger;
  maxSendAttempts: number;
  /** Builds the send engine; throws when mail is not configured. */
  createEngine: () => OutreachEngine;
};

function failureType(err: unknown): { errorType: string; message: string } {
  const classified = classifyExternalError(err);
  return {
    errorType: err instanceof ConfigError ? "config" : classified.type,
    message: classified.message,
  };
}

/** The two batch jobs: refresh recruiters (`find`) and dispatch due email (`send`). */
export class OutreachPipeline {
  constructor(private readonly deps: OutreachPipelineDeps) {}

  private failureRecorder(runId: string): {
    record: (failure: StepFailure) => void;
    count: () => number;
  } {
    let count = 0;
    return {
      record: (failure) => {
        count += 1;
        const { errorType, message } = failureType(failure.error);
        this.deps.store.recordFailure({
          runId,
          step: failure.step,
          ref: failure.ref,
          errorType,
          message,
          retryable: failure.retryable,
        });
      },
      count: () => count,
    };
  }

  private failRun(runId: string, step: string, err: unknown): void {
    const { errorType, message } = failureType(err);
    this.deps.store.recordFailure({
      runId,
      step,
      errorType,
      message,
      retryable: classifyExternalError(err).isTransient,
    });
    this.deps.store.markRunFailed(runId, { error: message });
    this.deps.logger.error(`${step} run failed: ${message}`);
  }

  async find(): Promise<FindRunSummary> {
    const { store, logger } = this.deps;
    const { runId } = store.beginRun("find");
    const failures = this.failureRecorder(runId);
    logger.info(`Starting find run ${runId}`);
    try {
      const roster = await this.deps.roster.refresh({ onFailure: failures.record });
      const content = await this.prepareContent(failures.record);
      const summary: FindRunSummary = { runId, roster, content, failures: failures.count() };
      store.markRunCompleted(runId, summary);
      return summary;
    } catch (err) {
      this.failRun(runId, "find", err);
      throw err;
    }
  }

  /**
   * Generates and caches message content for every active application that
   * has recruiters linked, so sends can run without calling the model.
   */
  async prepareContent(onFailure?: (failure: StepFailure) => void): Promise<ContentSummary> {
    const { store, personalizer, jobs, logger } = this.deps;
    const summary: ContentSummary = {
      applications: 0,
      cached: 0,
      generated: 0,
      failed: 0,
      deferred: 0,
    };
    if (!personalizer.canGenerate()) {
      logger.warn("No language model API key configured; messages will use the standard text");
      return summary;
    }

    for (const application of store.listApplications("active")) {
      if (store.listLinks(application.id).length === 0) {
        continue;
      }
      summary.applications += 1;
      const posting = await jobs.get(application.jobUrl);
      const jobTitle = application.jobTitle ?? posting?.title ?? DEFAULT_ROLE;

      if (personalizer.lookup(application.company, jobTitle, posting?.description)) {
        summary.cached += 1;
        continue;
      }
      if (personalizer.allModelsExhausted()) {
        summary.deferred += 1;
        continue;
      }

      const result = await personalizer.generate(
        application.company,
        jobTitle,
        posting?.description,
      );
      switch (result.kind) {
        case "cached":
          summary.cached += 1;
          break;
        case "generated":
          summary.generated += 1;
          break;
        case "exhausted":
          summary.deferred += 1;
          break;
        case "failed":
          summary.failed += 1;
          onFailure?.({
            step: "generate_content",
            ref: String(application.id),
            error: result.message,
            retryable: true,
          });
          break;
      }
    }

    if (summary.deferred > 0) {
      logger.warn(`Content for ${summary.deferred} application(s) deferred until model quota resets`);
    }
    return summary;
  }

  async send(): Promise<SendRunSummary> {
    const { store, logger } = this.deps;
    const engine = this.deps.createEngine();
    const { runId } = store.beginRun("send");
    const failures = this.failureRecorder(runId);
    logger.info(`Starting send run ${runId}`);
    try {
      const result = await engine.run({ onFailure: failures.record });
      const summary: SendRunSummary = { runId, ...result, failures: failures.count() };
      store.markRunCompleted(runId, summary);
      return summary;
    } catch (err) {
      this.failRun(runId, "send", err);
      throw err;
    }
  }

  /**
   * Find, then send. A failed find is already recorded on its own run and
   * does not stop emails that are due from going out.
   */
  async run(): Promise<PipelineRunResult> {
    let find: FindRunSummary | null = null;
    let findError: string | null = null;
    try {
      find = await this.find();
    } catch (err) {
      findError = failureType(err).message;
      this.deps.logger.warn(`Continuing with send after failed find: ${findError}`);
    }
    const send = await this.send();
    return { find, findError, send };
  }

  status(limit = 10): PipelineStatus {
    const { store, ledger, maxSendAttempts } = this.deps;
    const applications = store.listApplications();
    return {
      quota: ledger.snapshot(),
      applications: {
        active: applications.filter((application) => application.status === "active").length,
        inactive: applications.filter((application) => application.status === "inactive").length,
      },
      recruiters: store.countRecruiters(),
      outreach: store.countOutreachByStatus(),
      needsAttention: store.listExhaustedFailures(maxSendAttempts).map((record) => ({
        outreachId: record.id,
        recruiterId: record.recruiterId,
        applicationId: record.applicationId,
        recruiterEmail: record.recruiterEmail,
        company: record.company,
        stage: record.stage,
        attempts: record.attempts,
        lastError: record.lastError,
      })),
      recentRuns: store.listRecentRuns(limit),
    };
  }

  runFailures(runId: string): RunFailureRecord[] {
    return this.deps.store.listRunFailures(runId);
  }
}
