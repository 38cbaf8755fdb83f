import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { Command } from "commander";
import { afterEach, describe, expect, it } from "vitest";
import { resolveOutreachConfig } from "../outreach/config.js";
import { createOutreachContext } from "../outreach/context.js";
import {
  ExitError,
  FakeContactSearchSession,
  FakeTransport,
  captureRuntime,
  fixedClock,
} from "../test-utils/fixtures.js";
import { registerOutreachCli } from "./outreach-cli.js";

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs.splice(0, tempDirs.length)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

function setup() {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "outreach-cli-"));
  tempDirs.push(dir);
  const runtime = captureRuntime();
  const clock = fixedClock(Date.UTC(2026, 0, 15, 15, 0));
  const config = resolveOutreachConfig({ store: { path: path.join(dir, "outreach.sqlite") } }, {});
  const session = new FakeContactSearchSession();
  const openContext = () =>
    createOutreachContext(config, {
      runtime,
      now: clock.now,
      session,
      languageModel: null,
      transport: new FakeTransport(),
      jobFetcher: { fetch: async () => null },
    });
  const program = new Command().name("outreach").exitOverride();
  registerOutreachCli(program, { runtime, openContext });
  const run = (...args: string[]) => program.parseAsync(args, { from: "user" });
  return { runtime, session, run };
}

describe("outreach cli", () => {
  it("adds, lists and closes an application", async () => {
    const { runtime, run } = setup();

    await run("add", "--company", "Acme", "--url", "https://jobs.lever.co/acme/1");
    expect(runtime.logs[runtime.logs.length - 1]).toContain("Added application 1 (Acme)");

    await run("add", "--company", "Acme", "--url", "https://jobs.lever.co/acme/1");
    expect(runtime.logs[runtime.logs.length - 1]).toContain("Application already recorded as 1");

    await run("close", "1");
    expect(runtime.logs[runtime.logs.length - 1]).toContain("Closed application 1 (Acme)");

    await run("status", "--json");
    const status: unknown = JSON.parse(runtime.logs[runtime.logs.length - 1] ?? "null");
    expect(status).toMatchObject({ applications: { active: 0, inactive: 1 }, recruiters: 0 });
  });

  it("prints each validation problem and exits non-zero", async () => {
    const { runtime, run } = setup();

    await expect(run("add", "--company", " ", "--url", "ftp://files.test/x")).rejects.toEqual(
      new ExitError(1),
    );
    expect(runtime.errors).toHaveLength(2);
    expect(runtime.errors[0]).toContain("company is required");
    expect(runtime.errors[1]).toContain("jobUrl must be an http(s) URL: ftp://files.test/x");
  });

  it("rejects ids that are not positive integers", async () => {
    const { runtime, run } = setup();

    await expect(run("replied", "1", "abc")).rejects.toBeInstanceOf(ExitError);
    expect(runtime.errors[0]).toContain('applicationId must be a positive integer, got "abc"');
  });

  it("runs send after a failed find and exits non-zero", async () => {
    const { runtime, session, run } = setup();
    session.sessionValid = false;

    await expect(run("run")).rejects.toEqual(new ExitError(1));
    expect(
      runtime.logs.some((line) =>
        line.includes("Find failed: Contact search session is not valid; sign in again"),
      ),
    ).toBe(true);
    expect(runtime.logs.some((line) => line.includes("Scheduled 0 initial email(s)"))).toBe(true);
  });
});
