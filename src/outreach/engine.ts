import type { SubsystemLogger } from "../logging.js";
import type { DelayRange } from "./config.js";
import type { MailTransport } from "./mailer.js";
import type { Pacer } from "./pacing.js";
import type { StepFailure } from "./roster.js";
import { dateKey, msUntilWindowOpens, resolveSendWindowState } from "./send-window.js";
import type { OutreachStore } from "./store.js";
import type {
  OutreachCandidate,
  OutreachRecord,
  OutreachStage,
  RenderedMessage,
  SendWindow,
  SendWindowState,
} from "./types.js";

/** Successor of each stage; null ends the sequence. */
export const NEXT_STAGE: Record<OutreachStage, OutreachStage | null> = {
  initial: "followup1",
  followup1: "followup2",
  followup2: null,
};

export interface MessageResolver {
  resolve(candidate: OutreachCandidate): Promise<RenderedMessage | null>;
}

export type OutreachEngineDeps = {
  store: OutreachStore;
  transport: MailTransport;
  messages: MessageResolver;
  pacer: Pacer;
  logger: SubsystemLogger;
  window: SendWindow;
  sendIntervalDays: number;
  maxSendAttempts: number;
  retryBaseDays: number;
  sendDelay: DelayRange;
  attachmentPath?: string | null;
  now?: () => number;
};

export type RequeueSummary = {
  requeued: number;
  exhausted: number;
};

export type SendSummary = {
  state: SendWindowState;
  waitedMs: number;
  due: number;
  sent: number;
  failed: number;
  bounced: number;
  skipped: number;
  deferred: number;
  rescheduled: number;
  scheduledNext: number;
};

export type OutreachRunSummary = {
  requeue: RequeueSummary;
  scheduledInitial: number;
  send: SendSummary;
};

/**
 * Drives every (recruiter, application) pair through
 * initial -> followup1 -> followup2 and dispatches due records inside the
 * send window.
 */
export class OutreachEngine {
  private readonly now: () => number;

  constructor(private readonly deps: OutreachEngineDeps) {
    this.now = deps.now ?? Date.now;
  }

  today(): string {
    return dateKey(this.now(), this.deps.window.timezone);
  }

  private daysFromToday(days: number): string {
    return dateKey(this.now(), this.deps.window.timezone, days);
  }

  windowState(): SendWindowState {
    return resolveSendWindowState(this.now(), this.deps.window);
  }

  /** Creates an initial record for every linked pair that has never been contacted. */
  scheduleInitial(): number {
    const today = this.today();
    let scheduled = 0;
    for (const pair of this.deps.store.listUncontactedPairs()) {
      const record = this.deps.store.scheduleOutreach({
        ...pair,
        stage: "initial",
        scheduledFor: today,
      });
      if (record) {
        scheduled += 1;
      }
    }
    if (scheduled > 0) {
      this.deps.logger.info(`Scheduled ${scheduled} initial email(s)`);
    }
    return scheduled;
  }

  /**
   * Queues the stage after the pair's most recent sent record. Returns null
   * when nothing was sent yet, the sequence is finished, or the stage exists.
   */
  scheduleNext(recruiterId: number, applicationId: number): OutreachRecord | null {
    const last = this.deps.store.getLastSentOutreach(recruiterId, applicationId);
    if (!last) {
      return null;
    }
    const next = NEXT_STAGE[last.stage];
    if (!next) {
      return null;
    }
    return this.deps.store.scheduleOutreach({
      recruiterId,
      applicationId,
      stage: next,
      scheduledFor: this.daysFromToday(this.deps.sendIntervalDays),
    });
  }

  /** Puts failed sends back in the queue with exponential backoff. */
  requeueFailedSends(): RequeueSummary {
    const { store, logger, maxSendAttempts, retryBaseDays } = this.deps;
    const claimed = new Set<string>();
    let requeued = 0;
    for (const record of store.listRetryableFailures(maxSendAttempts)) {
      const key = `${record.recruiterId}:${record.applicationId}:${record.stage}`;
      if (claimed.has(key)) {
        continue;
      }
      const delayDays = retryBaseDays * 2 ** Math.max(0, record.attempts - 1);
      if (store.requeueOutreach(record.id, this.daysFromToday(delayDays))) {
        claimed.add(key);
        requeued += 1;
      }
    }
    const exhausted = store.listExhaustedFailures(maxSendAttempts).length;
    if (requeued > 0) {
      logger.info(`Re-queued ${requeued} failed email(s)`);
    }
    if (exhausted > 0) {
      logger.warn(`${exhausted} email(s) failed ${maxSendAttempts} times and need attention`);
    }
    return { requeued, exhausted };
  }

  private rescheduleForTomorrow(candidates: OutreachCandidate[]): number {
    if (candidates.length === 0) {
      return 0;
    }
    const tomorrow = this.daysFromToday(1);
    const moved = this.deps.store.rescheduleOutreach(
      candidates.map((candidate) => candidate.id),
      tomorrow,
    );
    this.deps.logger.info(`Rescheduled ${moved} email(s) for ${tomorrow}`);
    return moved;
  }

  async processDue(opts?: { onFailure?: (failure: StepFailure) => void }): Promise<SendSummary> {
    const { store, logger, pacer, transport } = this.deps;
    const summary: SendSummary = {
      state: this.windowState(),
      waitedMs: 0,
      due: 0,
      sent: 0,
      failed: 0,
      bounced: 0,
      skipped: 0,
      deferred: 0,
      rescheduled: 0,
      scheduledNext: 0,
    };

    if (summary.state === "wait") {
      const waitMs = msUntilWindowOpens(this.now(), this.deps.window);
      logger.info(
        `Outside send window; waiting ${Math.ceil(waitMs / 60_000)} min until ${this.deps.window.startHour}:00 (${this.deps.window.timezone})`,
      );
      await pacer.sleep(waitMs);
      summary.waitedMs = waitMs;
    }

    const due = store.listDueOutreach(this.today());
    summary.due = due.length;

    if (summary.state === "cutoff") {
      if (due.length > 0) {
        logger.info("Past the send cutoff");
        summary.rescheduled = this.rescheduleForTomorrow(due);
      }
      return summary;
    }
    if (due.length === 0) {
      logger.info("No outreach due");
      return summary;
    }

    let needsPause = false;
    for (const [index, candidate] of due.entries()) {
      if (needsPause) {
        await pacer.pause(this.deps.sendDelay);
        needsPause = false;
      }
      if (this.windowState() === "cutoff") {
        logger.info("Send cutoff reached mid-batch");
        summary.rescheduled += this.rescheduleForTomorrow(due.slice(index));
        break;
      }

      const recruiter = store.getRecruiter(candidate.recruiterId);
      if (
        !recruiter ||
        recruiter.status !== "active" ||
        store.hasReply(candidate.recruiterId, candidate.applicationId)
      ) {
        summary.skipped += 1;
        continue;
      }

      const message = await this.deps.messages.resolve(candidate);
      if (!message) {
        summary.deferred += 1;
        continue;
      }

      logger.info(
        `[${candidate.stage}] ${candidate.recruiterName} @ ${candidate.company} -> ${candidate.recruiterEmail}`,
      );
      const outcome = await transport.send({
        to: candidate.recruiterEmail,
        subject: message.subject,
        body: message.body,
        attachmentPath: this.deps.attachmentPath ?? null,
      });
      needsPause = true;

      switch (outcome.kind) {
        case "sent": {
          store.markOutreachSent(candidate.id);
          summary.sent += 1;
          if (!store.hasReply(candidate.recruiterId, candidate.applicationId)) {
            const next = this.scheduleNext(candidate.recruiterId, candidate.applicationId);
            if (next) {
              summary.scheduledNext += 1;
            }
          }
          break;
        }
        case "recipient_rejected": {
          store.markOutreachBounced(candidate.id, candidate.recruiterId, outcome.reason);
          summary.bounced += 1;
          logger.error(`Hard bounce for ${candidate.recruiterEmail}; recruiter marked inactive`);
          opts?.onFailure?.({
            step: "send",
            ref: String(candidate.id),
            error: outcome.reason,
            retryable: false,
          });
          break;
        }
        case "transient_failure": {
          store.markOutreachFailed(candidate.id, outcome.reason);
          summary.failed += 1;
          logger.error(`Failed to send to ${candidate.recruiterEmail}: ${outcome.reason}`);
          opts?.onFailure?.({
            step: "send",
            ref: String(candidate.id),
            error: outcome.reason,
            retryable: candidate.attempts + 1 < this.deps.maxSendAttempts,
          });
          break;
        }
      }
    }

    logger.info(
      `Sent ${summary.sent}, failed ${summary.failed}, bounced ${summary.bounced}, deferred ${summary.deferred}`,
    );
    return summary;
  }

  async run(opts?: { onFailure?: (failure: StepFailure) => void }): Promise<OutreachRunSummary> {
    const requeue = this.requeueFailedSends();
    const scheduledInitial = this.scheduleInitial();
    const send = await this.processDue(opts);
    return { requeue, scheduledInitial, send };
  }
}
