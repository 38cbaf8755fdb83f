import type { SubsystemLogger } from "../logging.js";
import type { CachedJobDescriptionSource } from "./job-descriptions.js";
import type { ContentPersonalizer } from "./personalization.js";
import type {
  GeneratedContent,
  OutreachCandidate,
  OutreachStage,
  RenderedMessage,
} from "./types.js";

export const DEFAULT_ROLE = "Software Engineer";

export type MessageContext = {
  recruiterName: string;
  company: string;
  jobUrl: string;
  jobTitle: string;
  senderName: string;
};

function firstName(fullName: string): string {
  return fullName.trim().split(/\s+/)[0] || "there";
}

function subjectFor(stage: OutreachStage, ctx: MessageContext, content?: GeneratedContent): string {
  if (content) {
    switch (stage) {
      case "initial":
        return content.subjectInitial;
      case "followup1":
        return content.subjectFollowup1;
      case "followup2":
        return content.subjectFollowup2;
    }
  }
  return `${ctx.company} - ${ctx.jobTitle} interest`;
}

function personalizedParagraphs(
  stage: OutreachStage,
  ctx: MessageContext,
  content: GeneratedContent,
): string[] {
  switch (stage) {
    case "initial":
      return [
        `I recently came across the ${ctx.jobTitle} role at ${ctx.company}:\n${ctx.jobUrl}`,
        content.intro,
        "I would love the opportunity to discuss how I can contribute to your team.",
        "I've attached my resume for your review.",
      ];
    case "followup1":
      return [
        content.followup1,
        "Please let me know if there's a good time to connect. I'd be happy to share more details about my experience.",
      ];
    case "followup2":
      return [content.followup2];
  }
}

function genericParagraphs(stage: OutreachStage, ctx: MessageContext): string[] {
  switch (stage) {
    case "initial":
      return [
        "I hope you're doing well.",
        `I recently applied for the ${ctx.jobTitle} role at ${ctx.company}:\n${ctx.jobUrl}`,
        "I would love to explore how I can contribute to your team, and I've attached my resume for your review.",
      ];
    case "followup1":
      return [
        `I wanted to briefly follow up on my previous message about the ${ctx.jobTitle} role at ${ctx.company}.`,
        "Please let me know if there's a good time to connect. I'd be happy to share more details about my experience.",
      ];
    case "followup2":
      return [
        `Just checking in one last time regarding the ${ctx.jobTitle} role at ${ctx.company}.`,
        "If there's someone else on your team I should reach out to, I'd greatly appreciate your guidance.",
      ];
  }
}

export function renderOutreachMessage(
  stage: OutreachStage,
  ctx: MessageContext,
  content?: GeneratedContent,
): RenderedMessage {
  const paragraphs = content
    ? personalizedParagraphs(stage, ctx, content)
    : genericParagraphs(stage, ctx);
  const closing = stage === "followup2" ? "Thank you for your time," : "Best,";
  const signature = ctx.senderName ? `${closing}\n${ctx.senderName}` : closing;
  const body = [`Hi ${firstName(ctx.recruiterName)},`, ...paragraphs, signature].join("\n\n");
  return { subject: subjectFor(stage, ctx, content), body };
}

export type OutreachMessageResolverDeps = {
  personalizer: ContentPersonalizer;
  jobs: CachedJobDescriptionSource;
  senderName: string;
  logger: SubsystemLogger;
};

/**
 * Builds the message for a due record. Returns null when the language model
 * allowance is spent and nothing is cached, so the record stays pending.
 */
export class OutreachMessageResolver {
  constructor(private readonly deps: OutreachMessageResolverDeps) {}

  async resolve(candidate: OutreachCandidate): Promise<RenderedMessage | null> {
    const posting = await this.deps.jobs.get(candidate.jobUrl);
    const ctx: MessageContext = {
      recruiterName: candidate.recruiterName,
      company: candidate.company,
      jobUrl: candidate.jobUrl,
      jobTitle: candidate.jobTitle ?? posting?.title ?? DEFAULT_ROLE,
      senderName: this.deps.senderName,
    };

    const result = await this.deps.personalizer.generate(
      ctx.company,
      ctx.jobTitle,
      posting?.description,
    );
    switch (result.kind) {
      case "cached":
      case "generated":
        return renderOutreachMessage(candidate.stage, ctx, result.content);
      case "exhausted":
        this.deps.logger.warn(
          `Model quota exhausted and no cached content for ${ctx.company}; leaving pending`,
        );
        return null;
      case "failed":
        this.deps.logger.warn(
          `Personalization failed for ${ctx.company} (${result.message}); using the standard text`,
        );
        return renderOutreachMessage(candidate.stage, ctx);
    }
  }
}
