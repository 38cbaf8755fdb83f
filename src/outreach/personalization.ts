import crypto from "node:crypto";
import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { SubsystemLogger } from "../logging.js";
import type { ModelQuota } from "./config.js";
import { errorMessage } from "./errors.js";
import type { LanguageModelClient } from "./language-model.js";
import type { OutreachStore } from "./store.js";
import type { GeneratedContent, GenerationResult } from "./types.js";

const DESCRIPTION_PROMPT_LIMIT = 4000;

/** Field names the model is asked to return. */
const GeneratedPayloadSchema = Type.Object({
  subject_initial: Type.String({ minLength: 1 }),
  subject_followup1: Type.String({ minLength: 1 }),
  subject_followup2: Type.String({ minLength: 1 }),
  intro: Type.String({ minLength: 1 }),
  followup1: Type.String({ minLength: 1 }),
  followup2: Type.String({ minLength: 1 }),
});

export function contentCacheKey(
  company: string,
  jobTitle: string,
  description?: string | null,
): string {
  const raw = description
    ? `${company}-${jobTitle}-${description}`
    : `fallback-${company}-${jobTitle}`;
  return crypto.createHash("sha256").update(raw).digest("hex");
}

export function parseGeneratedContent(raw: unknown): GeneratedContent | null {
  if (!Value.Check(GeneratedPayloadSchema, raw)) {
    return null;
  }
  return {
    subjectInitial: raw.subject_initial.trim(),
    subjectFollowup1: raw.subject_followup1.trim(),
    subjectFollowup2: raw.subject_followup2.trim(),
    intro: raw.intro.trim(),
    followup1: raw.followup1.trim(),
    followup2: raw.followup2.trim(),
  };
}

export function toGeneratedPayload(content: GeneratedContent): Record<string, string> {
  return {
    subject_initial: content.subjectInitial,
    subject_followup1: content.subjectFollowup1,
    subject_followup2: content.subjectFollowup2,
    intro: content.intro,
    followup1: content.followup1,
    followup2: content.followup2,
  };
}

/** Pulls the first `{...}` block out of model output. */
export function extractJsonObject(text: string): unknown {
  const match = /\{[\s\S]*\}/.exec(text);
  if (!match) {
    return null;
  }
  try {
    return JSON.parse(match[0]);
  } catch {
    return null;
  }
}

export function buildPrompt(params: {
  company: string;
  jobTitle: string;
  description?: string | null;
  candidateBackground: string[];
}): string {
  const lines = [
    "Write a short cold outreach sequence to a recruiter for the role below.",
    "",
    `Company: ${params.company}`,
    `Job Title: ${params.jobTitle}`,
    "",
  ];
  if (params.description) {
    lines.push("Job Description:", params.description.slice(0, DESCRIPTION_PROMPT_LIMIT), "");
  } else {
    lines.push(
      "No job description is available. Base the emails on what this role typically involves at this company.",
      "",
    );
  }
  if (params.candidateBackground.length > 0) {
    lines.push("Candidate Background:", ...params.candidateBackground.map((line) => `- ${line}`), "");
  }
  lines.push(
    "Return only a JSON object with these string fields:",
    "subject_initial, subject_followup1, subject_followup2 (subject lines under 10 words, no greeting)",
    "intro, followup1, followup2 (email bodies under 120 words, three sentences on fit, no greeting or signature)",
    "Professional tone. No emojis.",
  );
  return lines.join("\n");
}

export type ContentPersonalizerDeps = {
  store: OutreachStore;
  client: LanguageModelClient | null;
  models: ModelQuota[];
  cacheTtlDays: number;
  candidateBackground: string[];
  logger: SubsystemLogger;
  today: () => string;
};

/**
 * Generates subject lines and bodies for every stage of a company/role,
 * caching the result so each posting costs at most one model call.
 */
export class ContentPersonalizer {
  constructor(private readonly deps: ContentPersonalizerDeps) {}

  canGenerate(): boolean {
    return this.deps.client !== null;
  }

  /** Cached content only. Never calls the model. */
  lookup(company: string, jobTitle: string, description?: string | null): GeneratedContent | null {
    const key = contentCacheKey(company, jobTitle, description?.trim() || null);
    return parseGeneratedContent(this.deps.store.getAiContent(key));
  }

  /** True when every configured model has used its allowance today. */
  allModelsExhausted(): boolean {
    const today = this.deps.today();
    return this.deps.models.every(
      (entry) => this.deps.store.getModelUsage(today, entry.model) >= entry.dailyLimit,
    );
  }

  async generate(
    company: string,
    jobTitle: string,
    description?: string | null,
  ): Promise<GenerationResult> {
    const { store, client, logger } = this.deps;
    const text = description?.trim() || null;
    const cacheKey = contentCacheKey(company, jobTitle, text);

    const cached = parseGeneratedContent(store.getAiContent(cacheKey));
    if (cached) {
      logger.debug(`Using cached content for ${company} | ${jobTitle}`);
      return { kind: "cached", content: cached };
    }
    if (!client) {
      return { kind: "failed", message: "Language model API key is not configured (GEMINI_API_KEY)" };
    }

    const today = this.deps.today();
    const available = this.deps.models.filter(
      (entry) => store.getModelUsage(today, entry.model) < entry.dailyLimit,
    );
    if (available.length === 0) {
      logger.warn("All model quotas exhausted for today");
      return { kind: "exhausted" };
    }

    if (!text) {
      logger.info(`No job description for ${company}; generating role-based content`);
    }
    const prompt = buildPrompt({
      company,
      jobTitle,
      description: text,
      candidateBackground: this.deps.candidateBackground,
    });

    const failures: string[] = [];
    for (const { model } of available) {
      let output: string;
      try {
        output = await client.generate({ model, prompt });
      } catch (err) {
        failures.push(`${model}: ${errorMessage(err)}`);
        logger.warn(`${model} failed: ${errorMessage(err)}`);
        continue;
      }
      store.incrementModelUsage(today, model);

      const content = parseGeneratedContent(extractJsonObject(output));
      if (!content) {
        failures.push(`${model}: response did not contain the expected JSON fields`);
        logger.warn(`${model} returned unusable content`);
        continue;
      }
      store.saveAiContent({
        cacheKey,
        company,
        jobTitle,
        content: toGeneratedPayload(content),
        ttlDays: this.deps.cacheTtlDays,
      });
      logger.info(`Generated content for ${company} | ${jobTitle} using ${model}`);
      return { kind: "generated", content, model };
    }

    return { kind: "failed", message: failures.join("; ") };
  }
}
