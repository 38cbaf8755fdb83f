#!/usr/bin/env node
import { Command } from "commander";
import { registerOutreachCli } from "./cli/outreach-cli.js";
import { danger } from "./globals.js";
import { defaultRuntime } from "./runtime.js";

const program = new Command()
  .name("outreach")
  .description("Find recruiters for your job applications and send staged follow-up email")
  .version("0.1.0");

registerOutreachCli(program);

program.parseAsync(process.argv).catch((err: unknown) => {
  defaultRuntime.error(danger(String(err)));
  defaultRuntime.exit(1);
});
