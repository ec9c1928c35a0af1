import { describe, it, expect } from "@jest/globals";
import { generateFollowups } from "../src/services/followup.service";

describe("generateFollowups", () => {
  it("ranks fee follow-ups first for a fee question", () => {
    const followups = generateFollowups({
      query: "What is the annual fee of EPM?",
      intent: "annual_fee",
      cards: ["Card B"],
      availableCards: ["Card A", "Card B"],
      spendAmount: null,
      category: null,
      history: [],
    });

    expect(followups).toEqual([
      "Would you like to compare the fee vs benefits value?",
      "Would you like to know about fee waiver conditions?",
      "Would you like to compare this with the Card A?",
    ]);
  });

  it("offers a calculation for a general question", () => {
    const followups = generateFollowups({
      query: "Tell me about these cards",
      intent: null,
      cards: [],
      availableCards: ["Card A", "Card B"],
      spendAmount: null,
      category: null,
    });

    expect(followups).toEqual([
      "Should I help you with a spending scenario calculation?",
      "Would you like to know about the application process and eligibility?",
      "Would you like more details about any specific aspect?",
    ]);
  });

  it("draws on the conversation so far", () => {
    const followups = generateFollowups({
      query: "plan for travel rewards",
      intent: null,
      cards: [],
      availableCards: ["Card A"],
      spendAmount: null,
      category: "travel",
      history: [{ query: "annual fee?", response: "₹5,000 plus GST" }],
    });

    expect(followups).toEqual([
      "Are you planning a specific trip? I can help optimize card benefits for your travel.",
      "Should I help you with a spending scenario calculation?",
      "Are you interested in travel insurance benefits?",
    ]);
  });

  it("never returns more than three suggestions", () => {
    const followups = generateFollowups({
      query: "Which is better if I spend 2 lakh on flights?",
      intent: "reward_comparison",
      cards: [],
      availableCards: ["Card A", "Card B"],
      spendAmount: 200000,
      category: "flight",
      history: [{ query: "What about travel?", response: "..." }],
    });

    expect(followups).toHaveLength(3);
  });
});
