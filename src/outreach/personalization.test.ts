import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { FakeLanguageModel, GENERATED_JSON, testLogger } from "../test-utils/fixtures.js";
import {
  ContentPersonalizer,
  buildPrompt,
  contentCacheKey,
  extractJsonObject,
  parseGeneratedContent,
} from "./personalization.js";
import { OutreachStore } from "./store.js";

const TODAY = "2026-01-15";
const tempDirs: string[] = [];

function makeStore(): OutreachStore {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "outreach-personalize-"));
  tempDirs.push(dir);
  return new OutreachStore(path.join(dir, "outreach.sqlite"));
}

afterEach(() => {
  for (const dir of tempDirs.splice(0, tempDirs.length)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

function setup(store: OutreachStore, client: FakeLanguageModel | null, dailyLimit = 2) {
  const logger = testLogger("personalize");
  const personalizer = new ContentPersonalizer({
    store,
    client,
    models: [
      { model: "lite", dailyLimit },
      { model: "flash", dailyLimit },
    ],
    cacheTtlDays: 30,
    candidateBackground: ["Five years of backend work"],
    logger,
    today: () => TODAY,
  });
  return { personalizer, logger };
}

const EXPECTED_CONTENT = {
  subjectInitial: "Backend role at Acme",
  subjectFollowup1: "Following up on Acme",
  subjectFollowup2: "Last note on Acme",
  intro: "I build reliable payment services.",
  followup1: "Checking whether you saw my note.",
  followup2: "Closing the loop on my application.",
};

describe("content helpers", () => {
  it("keys the cache on the description when there is one", () => {
    const withText = contentCacheKey("Acme", "Engineer", "Build APIs");
    expect(withText).toBe(contentCacheKey("Acme", "Engineer", "Build APIs"));
    expect(withText).not.toBe(contentCacheKey("Acme", "Engineer", "Build UIs"));
    expect(contentCacheKey("Acme", "Engineer")).toBe(contentCacheKey("Acme", "Engineer", null));
    expect(contentCacheKey("Acme", "Engineer")).toMatch(/^[0-9a-f]{64}$/);
  });

  it("finds the JSON object inside fenced model output", () => {
    expect(extractJsonObject('```json\n{"a": 1}\n```')).toEqual({ a: 1 });
    expect(extractJsonObject("no json here")).toBeNull();
    expect(extractJsonObject("{not json}")).toBeNull();
  });

  it("rejects payloads with missing or empty fields", () => {
    expect(parseGeneratedContent(JSON.parse(GENERATED_JSON))).toEqual(EXPECTED_CONTENT);
    expect(parseGeneratedContent({ intro: "hello" })).toBeNull();
    expect(parseGeneratedContent({ ...JSON.parse(GENERATED_JSON), followup2: "" })).toBeNull();
  });

  it("builds a role-based prompt when no description is known", () => {
    const prompt = buildPrompt({
      company: "Acme",
      jobTitle: "Engineer",
      candidateBackground: ["Led a payments team"],
    });
    expect(prompt).toContain("Company: Acme\nJob Title: Engineer");
    expect(prompt).toContain("No job description is available.");
    expect(prompt).toContain("Candidate Background:\n- Led a payments team");
  });

  it("truncates long descriptions in the prompt", () => {
    const prompt = buildPrompt({
      company: "Acme",
      jobTitle: "Engineer",
      description: "x".repeat(5000),
      candidateBackground: [],
    });
    expect(prompt).toContain(`Job Description:\n${"x".repeat(4000)}\n`);
    expect(prompt).not.toContain("x".repeat(4001));
    expect(prompt).not.toContain("Candidate Background");
  });
});

describe("ContentPersonalizer", () => {
  it("generates once and serves the cache afterwards", async () => {
    const store = makeStore();
    try {
      const model = new FakeLanguageModel().reply("lite", `Here you go:\n${GENERATED_JSON}`);
      const { personalizer } = setup(store, model);

      expect(personalizer.lookup("Acme", "Engineer", "Build APIs")).toBeNull();
      expect(await personalizer.generate("Acme", "Engineer", "Build APIs")).toEqual({
        kind: "generated",
        content: EXPECTED_CONTENT,
        model: "lite",
      });
      expect(await personalizer.generate("Acme", "Engineer", " Build APIs ")).toEqual({
        kind: "cached",
        content: EXPECTED_CONTENT,
      });
      expect(personalizer.lookup("Acme", "Engineer", "Build APIs")).toEqual(EXPECTED_CONTENT);
      expect(model.calls).toHaveLength(1);
      expect(store.getModelUsage(TODAY, "lite")).toBe(1);
    } finally {
      store.close();
    }
  });

  it("falls through to the next model when one fails", async () => {
    const store = makeStore();
    try {
      const model = new FakeLanguageModel()
        .reply("lite", new Error("503 overloaded"))
        .reply("flash", GENERATED_JSON);
      const { personalizer } = setup(store, model);

      const result = await personalizer.generate("Acme", "Engineer");

      expect(result).toMatchObject({ kind: "generated", model: "flash" });
      expect(model.calls.map((call) => call.model)).toEqual(["lite", "flash"]);
      expect(store.getModelUsage(TODAY, "lite")).toBe(0);
      expect(store.getModelUsage(TODAY, "flash")).toBe(1);
    } finally {
      store.close();
    }
  });

  it("reports every model's problem when none produced content", async () => {
    const store = makeStore();
    try {
      const model = new FakeLanguageModel()
        .reply("lite", "Sorry, I cannot help with that.")
        .reply("flash", new Error("socket hang up"));
      const { personalizer } = setup(store, model);

      expect(await personalizer.generate("Acme", "Engineer")).toEqual({
        kind: "failed",
        message: "lite: response did not contain the expected JSON fields; flash: socket hang up",
      });
      expect(store.getModelUsage(TODAY, "lite")).toBe(1);
    } finally {
      store.close();
    }
  });

  it("skips models that used their daily allowance", async () => {
    const store = makeStore();
    try {
      const model = new FakeLanguageModel();
      const { personalizer } = setup(store, model, 1);
      store.incrementModelUsage(TODAY, "lite");
      expect(personalizer.allModelsExhausted()).toBe(false);
      store.incrementModelUsage(TODAY, "flash");

      expect(personalizer.allModelsExhausted()).toBe(true);
      expect(await personalizer.generate("Acme", "Engineer")).toEqual({ kind: "exhausted" });
      expect(model.calls).toEqual([]);
    } finally {
      store.close();
    }
  });

  it("cannot generate without a client", async () => {
    const store = makeStore();
    try {
      const { personalizer } = setup(store, null);
      expect(personalizer.canGenerate()).toBe(false);
      expect(await personalizer.generate("Acme", "Engineer")).toEqual({
        kind: "failed",
        message: "Language model API key is not configured (GEMINI_API_KEY)",
      });
    } finally {
      store.close();
    }
  });
});
