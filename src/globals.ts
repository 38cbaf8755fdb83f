import chalk from "chalk";

export const danger = (text: string): string => chalk.red(text);
export const warn = (text: string): string => chalk.yellow(text);
export const success = (text: string): string => chalk.green(text);
export const info = (text: string): string => chalk.cyan(text);
export const muted = (text: string): string => chalk.gray(text);

export function isDebugEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  const raw = env.OUTREACH_DEBUG?.trim().toLowerCase();
  return raw === "1" || raw === "true";
}
