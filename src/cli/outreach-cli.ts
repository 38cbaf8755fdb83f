import type { Command } from "commander";
import { loadConfig } from "../config/config.js";
import { danger, info, success, warn } from "../globals.js";
import { resolveOutreachConfig } from "../outreach/config.js";
import { createOutreachContext, type OutreachContext } from "../outreach/context.js";
import { ConfigError, IntakeValidationError } from "../outreach/errors.js";
import type { ImportSummary, IntakeResult } from "../outreach/intake.js";
import type { FindRunSummary, PipelineStatus, SendRunSummary } from "../outreach/pipeline.js";
import { defaultRuntime, type RuntimeEnv } from "../runtime.js";

type OutreachCommonOpts = {
  json?: boolean;
};

export type OutreachCliDeps = {
  runtime?: RuntimeEnv;
  openContext?: () => OutreachContext;
};

function defaultOpenContext(): OutreachContext {
  return createOutreachContext(resolveOutreachConfig(loadConfig()));
}

function parseId(value: string, label: string): number {
  const id = Number.parseInt(value, 10);
  if (!Number.isInteger(id) || id <= 0 || String(id) !== value.trim()) {
    throw new ConfigError(`${label} must be a positive integer, got "${value}"`);
  }
  return id;
}

function formatFind(summary: FindRunSummary): string[] {
  const { roster, content } = summary;
  const verified = Object.entries(roster.verification)
    .filter(([, count]) => count > 0)
    .map(([kind, count]) => `${kind}=${count}`)
    .join(", ");
  return [
    info(`Find run ${summary.runId}`),
    `Companies: ${roster.companies} (searched ${roster.companiesSearched.length}, deferred ${roster.deferredCompanies.length})`,
    `Recruiter checks: ${verified || "none"}`,
    `Contacts found: ${roster.contactsFound} (${roster.recruitersCreated} new), links created: ${roster.linksCreated}`,
    `Content: ${content.generated} generated, ${content.cached} cached, ${content.deferred} deferred, ${content.failed} failed`,
    `Quota remaining: ${roster.quota.remaining}/${roster.quota.totalLimit}`,
    summary.failures > 0 ? warn(`${summary.failures} failure(s) recorded`) : success("No failures"),
  ];
}

function formatSend(summary: SendRunSummary): string[] {
  const { send } = summary;
  return [
    info(`Send run ${summary.runId} (window: ${send.state})`),
    `Re-queued ${summary.requeue.requeued} failed email(s); ${summary.requeue.exhausted} need attention`,
    `Scheduled ${summary.scheduledInitial} initial email(s)`,
    `Due ${send.due}: sent ${send.sent}, failed ${send.failed}, bounced ${send.bounced}, skipped ${send.skipped}, deferred ${send.deferred}, rescheduled ${send.rescheduled}`,
    `Next stages scheduled: ${send.scheduledNext}`,
  ];
}

function formatStatus(status: PipelineStatus): string[] {
  const lines = [
    `Quota ${status.quota.date}: ${status.quota.used} used, ${status.quota.remaining}/${status.quota.totalLimit} remaining`,
    `Applications: ${status.applications.active} active, ${status.applications.inactive} closed`,
    `Recruiters: ${status.recruiters}`,
    `Outreach: ${status.outreach.pending} pending, ${status.outreach.sent} sent, ${status.outreach.failed} failed, ${status.outreach.bounced} bounced`,
  ];
  if (status.needsAttention.length > 0) {
    lines.push(warn(`Needs attention (${status.needsAttention.length}):`));
    for (const item of status.needsAttention) {
      lines.push(
        `  #${item.outreachId} ${item.stage} ${item.recruiterEmail} @ ${item.company}: ${item.lastError ?? "unknown error"}`,
      );
    }
  }
  if (status.recentRuns.length > 0) {
    lines.push("Recent runs:");
    for (const run of status.recentRuns) {
      lines.push(`  ${new Date(run.startedAt).toISOString()} ${run.kind} ${run.status} ${run.id}`);
    }
  }
  return lines;
}

function formatIntake(result: IntakeResult): string[] {
  return result.created
    ? [success(`Added application ${result.id} (${result.application.company})`)]
    : [warn(`Application already recorded as ${result.id}`)];
}

function formatImport(summary: ImportSummary): string[] {
  const lines = [
    `Added ${summary.added.length}, already known ${summary.duplicates.length}, invalid ${summary.invalid.length}`,
  ];
  for (const entry of summary.invalid) {
    lines.push(danger(`  record ${entry.index}: ${entry.problems.join("; ")}`));
  }
  return lines;
}

export function registerOutreachCli(program: Command, deps: OutreachCliDeps = {}): void {
  const runtime = deps.runtime ?? defaultRuntime;
  const openContext = deps.openContext ?? defaultOpenContext;

  function printOutput<T>(
    value: T,
    asJson: boolean | undefined,
    format: (value: T) => string[],
  ): void {
    if (asJson) {
      runtime.log(JSON.stringify(value, null, 2));
      return;
    }
    for (const line of format(value)) {
      runtime.log(line);
    }
  }

  /** A task may return a non-zero exit code after printing its output. */
  async function withContext(
    task: (ctx: OutreachContext) => Promise<number | void> | number | void,
  ): Promise<void> {
    let exitCode: number | void = undefined;
    try {
      const ctx = openContext();
      try {
        exitCode = await task(ctx);
      } finally {
        ctx.close();
      }
    } catch (err) {
      if (err instanceof IntakeValidationError) {
        for (const problem of err.problems) {
          runtime.error(danger(problem));
        }
      } else {
        runtime.error(danger(String(err)));
      }
      runtime.exit(1);
    }
    if (exitCode) {
      runtime.exit(exitCode);
    }
  }

  program
    .command("add")
    .description("Record a job application")
    .requiredOption("--company <name>", "Company name")
    .requiredOption("--url <jobUrl>", "Job posting URL")
    .option("--title <title>", "Job title")
    .option("--applied <date>", "Application date (YYYY-MM-DD, default today)")
    .option("--json", "Output JSON", false)
    .action(
      async (
        opts: { company: string; url: string; title?: string; applied?: string } & OutreachCommonOpts,
      ) => {
        await withContext(async (ctx) => {
          const result = await ctx.intake.add({
            company: opts.company,
            jobUrl: opts.url,
            jobTitle: opts.title,
            appliedDate: opts.applied,
          });
          printOutput(result, opts.json, formatIntake);
        });
      },
    );

  program
    .command("import")
    .description("Import applications from a JSON array file")
    .argument("<file>", "Path to a JSON file")
    .option("--json", "Output JSON", false)
    .action(async (file: string, opts: OutreachCommonOpts) => {
      await withContext(async (ctx) => {
        const summary = await ctx.intake.importFile(file);
        printOutput(summary, opts.json, formatImport);
      });
    });

  program
    .command("close")
    .description("Close an application so it gets no further outreach")
    .argument("<applicationId>", "Application id")
    .option("--json", "Output JSON", false)
    .action(async (applicationId: string, opts: OutreachCommonOpts) => {
      await withContext((ctx) => {
        const application = ctx.intake.close(parseId(applicationId, "applicationId"));
        printOutput(application, opts.json, (value) => [
          success(`Closed application ${value.id} (${value.company})`),
        ]);
      });
    });

  program
    .command("replied")
    .description("Record a recruiter reply; stops follow-ups for that application")
    .argument("<recruiterId>", "Recruiter id")
    .argument("<applicationId>", "Application id")
    .option("--json", "Output JSON", false)
    .action(async (recruiterId: string, applicationId: string, opts: OutreachCommonOpts) => {
      await withContext((ctx) => {
        const touched = ctx.intake.markReplied(
          parseId(recruiterId, "recruiterId"),
          parseId(applicationId, "applicationId"),
        );
        printOutput({ touched }, opts.json, (value) => [
          success(`Marked ${value.touched} record(s) as replied`),
        ]);
      });
    });

  program
    .command("find")
    .description("Refresh recruiters, discover new contacts and prepare message content")
    .option("--json", "Output JSON", false)
    .action(async (opts: OutreachCommonOpts) => {
      await withContext(async (ctx) => {
        printOutput(await ctx.pipeline.find(), opts.json, formatFind);
      });
    });

  program
    .command("send")
    .description("Send due outreach inside the send window")
    .option("--json", "Output JSON", false)
    .action(async (opts: OutreachCommonOpts) => {
      await withContext(async (ctx) => {
        printOutput(await ctx.pipeline.send(), opts.json, formatSend);
      });
    });

  program
    .command("run")
    .description("Run find, then send")
    .option("--json", "Output JSON", false)
    .action(async (opts: OutreachCommonOpts) => {
      await withContext(async (ctx) => {
        const result = await ctx.pipeline.run();
        printOutput(result, opts.json, (value) => [
          ...(value.find ? formatFind(value.find) : [danger(`Find failed: ${value.findError}`)]),
          ...formatSend(value.send),
        ]);
        return result.findError ? 1 : 0;
      });
    });

  program
    .command("status")
    .description("Show quota, counts, failures needing attention and recent runs")
    .option("--run-id <id>", "Show the failures recorded for one run")
    .option("--limit <n>", "Recent run limit", "10")
    .option("--json", "Output JSON", false)
    .action(async (opts: { runId?: string; limit: string } & OutreachCommonOpts) => {
      await withContext((ctx) => {
        if (opts.runId) {
          printOutput(ctx.pipeline.runFailures(opts.runId), opts.json, (failures) =>
            failures.length === 0
              ? ["No failures recorded"]
              : failures.map(
                  (failure) =>
                    `${failure.step}${failure.ref ? ` ${failure.ref}` : ""} [${failure.errorType}${failure.retryable ? ", retryable" : ""}] ${failure.message}`,
                ),
          );
          return;
        }
        const limit = Number.parseInt(opts.limit, 10);
        printOutput(
          ctx.pipeline.status(Number.isFinite(limit) && limit > 0 ? limit : 10),
          opts.json,
          formatStatus,
        );
      });
    });
}
