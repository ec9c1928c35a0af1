import { describe, it, expect, jest, beforeAll, beforeEach } from "@jest/globals";
import { NOT_FOUND_ANSWER } from "../src/config/constants";
import type { LLMProvider, ProviderPolicy } from "../src/rag/llm";
import { answerQuery } from "../src/services/qa-engine.service";
import type { CardDataset } from "../src/types";
import { AXIS_ATLAS, ICICI_EPM, loadTestDataset } from "./helpers";

let dataset: CardDataset;

function fakePolicy(answer: string): { provider: LLMProvider; policy: ProviderPolicy } {
  const provider: LLMProvider = { name: "mock", complete: jest.fn(async () => answer) };
  return { provider, policy: { providers: [provider], timeoutMs: 1000 } };
}

beforeAll(() => {
  jest.spyOn(console, "log").mockImplementation(() => undefined);
  dataset = loadTestDataset();
});

beforeEach(() => {
  jest.spyOn(console, "warn").mockImplementation(() => undefined);
});

describe("answerQuery", () => {
  it("answers a numeric comparison with the calculator", async () => {
    const { provider, policy } = fakePolicy("unused");

    const response = await answerQuery("Compare rewards for 1 lakh spend", { dataset, policy });

    expect(response.intent).toBe("reward_comparison");
    expect(response.source).toBe("calculator");
    expect(response.spendAmount).toBe(100000);
    expect(response.calculations).toHaveLength(2);
    expect(response.answer.split("\n").pop()).toBe(`Winner: ${ICICI_EPM} with 3000 points.`);
    expect(provider.complete).not.toHaveBeenCalled();
  });

  it("calculates for the named card only", async () => {
    const { policy } = fakePolicy("unused");

    const response = await answerQuery("How many miles for 2.5L hotel spend on Atlas?", {
      dataset,
      policy,
    });

    expect(response.intent).toBe("reward_calculation");
    expect(response.cards).toEqual([AXIS_ATLAS]);
    expect(response.category).toBe("hotel");
    expect(response.answer.split("\n")[0]).toBe(
      `**${AXIS_ATLAS}**: 11000 EDGE Miles (5 EDGE Miles per ₹100 on travel up to ₹200000 per month, 2 EDGE Miles per ₹100 beyond)`
    );
  });

  it("sends other questions to the LLM with the assembled context", async () => {
    const { provider, policy } = fakePolicy("Unlimited domestic and international visits.");

    const response = await answerQuery("What is the lounge access on EPM?", {
      dataset,
      policy,
      debug: true,
    });

    expect(response.source).toBe("llm");
    expect(response.answer).toBe("Unlimited domestic and international visits.");
    expect(response.calculations).toEqual([]);
    expect(response.debug?.providers).toEqual(["mock"]);
    expect(Object.keys(response.debug?.context.cards ?? {})).toEqual([ICICI_EPM]);
    expect(provider.complete).toHaveBeenCalledTimes(1);
  });

  it("uses the LLM for a reward question without an amount", async () => {
    const { policy } = fakePolicy("2 EDGE Miles per ₹100.");

    const response = await answerQuery("How many points do I earn on Atlas?", { dataset, policy });

    expect(response.intent).toBe("reward_calculation");
    expect(response.spendAmount).toBeNull();
    expect(response.source).toBe("llm");
  });

  it("normalises whitespace and omits debug by default", async () => {
    const { policy } = fakePolicy("Yes.");

    const response = await answerQuery("  What   is the golf benefit?  ", { dataset, policy });

    expect(response.query).toBe("What is the golf benefit?");
    expect(response.intent).toBe("golf");
    expect(response.debug).toBeUndefined();
    expect(response.followups.length).toBeGreaterThan(0);
  });

  it("replaces an answer that is not in the card data", async () => {
    const { policy } = fakePolicy("I don't know.");

    const response = await answerQuery("What is the golf benefit?", { dataset, policy });

    expect(response.answer).toBe(NOT_FOUND_ANSWER);
    expect(console.warn).toHaveBeenCalledWith(
      '[QUERY] No answer found in card data for "What is the golf benefit?"'
    );
  });

  it("lists the milestones a calculated spend reaches", async () => {
    const { provider, policy } = fakePolicy("unused");

    const response = await answerQuery(
      "So if i spend 8L on ICICI EPM, what are the total points and milestone i receive?",
      { dataset, policy }
    );

    expect(response.intent).toBe("reward_calculation");
    expect(response.source).toBe("calculator");
    expect(response.answer.split("\n")).toEqual([
      `**${ICICI_EPM}**: 24000 points (6 Reward Points per ₹200)`,
      "Calculation: ₹800000 ÷ 200 × 6 = 24000 points",
      "Milestones reached: Tata CLiQ voucher worth ₹3,000 on ₹4,00,000 annual spend; " +
        "Additional Tata CLiQ voucher worth ₹3,000 on ₹8,00,000 annual spend",
    ]);
    expect(provider.complete).not.toHaveBeenCalled();
  });

  it("sends a comparison the field it is about", async () => {
    const { provider, policy } = fakePolicy("Axis Atlas covers lost card liability up to the credit limit.");

    const response = await answerQuery("which card has better lost card liability ? axis or icici ?", {
      dataset,
      policy,
      debug: true,
    });

    expect(response.intent).toBe("reward_comparison");
    expect(response.source).toBe("llm");
    expect(response.cards).toEqual([AXIS_ATLAS, ICICI_EPM]);
    expect(Object.keys(response.debug?.context.cards[AXIS_ATLAS] ?? {})).toEqual([
      "rewards",
      "insurance_cover",
    ]);
    expect(provider.complete).toHaveBeenCalledTimes(1);
  });
});
