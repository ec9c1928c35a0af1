import { describe, it, expect, jest, beforeEach } from "@jest/globals";
import {
  INTENT_PRECEDENCE,
  detectComparisonFocus,
  detectQueryIntent,
  getIntentStage,
  isSpendingCategoryIntent,
} from "../src/services/intent-detector.service";

beforeEach(() => {
  jest.spyOn(console, "log").mockImplementation(() => undefined);
});

describe("INTENT_PRECEDENCE", () => {
  it("lists every intent once, in rule order", () => {
    expect(INTENT_PRECEDENCE).toEqual([
      "annual_fee_reversal_spend_threshold",
      "lounge_access",
      "reward_comparison",
      "welcome_benefits",
      "renewal_benefits",
      "reward_calculation",
      "milestone_benefits",
      "miles_transfer",
      "reward_redemption",
      "tier_structure",
      "accrual_exclusions",
      "reward_capping",
      "insurance_cover",
      "utilities",
      "fuel",
      "rent",
      "education",
      "gaming",
      "wallet",
      "insurance",
      "government",
      "gold",
      "foreign_currency_markup",
      "cash_withdrawal",
      "late_payment",
      "interest_rate",
      "joining_fee",
      "annual_fee",
      "golf",
      "dining_benefits",
      "concierge",
      "eligibility",
      "reward_rate",
    ]);
    expect(new Set(INTENT_PRECEDENCE).size).toBe(INTENT_PRECEDENCE.length);
  });
});

describe("detectQueryIntent", () => {
  it.each([
    ["What is the annual fee and how much must I spend for the fee waiver?", "annual_fee_reversal_spend_threshold"],
    ["Does the Atlas card offer lounge access?", "lounge_access"],
    ["Which card gives more miles on hotels?", "reward_comparison"],
    ["Atlas vs EPM", "reward_comparison"],
    ["What are the welcome benefits of EPM?", "welcome_benefits"],
    ["How many points will I earn if I spend 50000 on groceries?", "reward_calculation"],
    ["What are the milestone rewards?", "milestone_benefits"],
    ["Can I transfer miles to airline partners?", "miles_transfer"],
    ["How do I redeem my points?", "reward_redemption"],
    ["What is the tier structure of Atlas?", "tier_structure"],
    ["Is there a cap on grocery rewards?", "reward_capping"],
    ["Is there a fuel surcharge?", "fuel"],
    ["Do I earn points on rent payments?", "rent"],
    ["What is the forex markup?", "foreign_currency_markup"],
    ["What are the cash withdrawal charges?", "cash_withdrawal"],
    ["What is the late payment fee?", "late_payment"],
    ["What is the interest rate?", "interest_rate"],
    ["What about the joining fee?", "joining_fee"],
    ["What is the annual fee?", "annual_fee"],
    ["Is there a golf benefit?", "golf"],
    ["Is there a concierge service?", "concierge"],
    ["Who can apply for EPM?", "eligibility"],
    ["What is the reward rate on Atlas?", "reward_rate"],
  ])("classifies %j as %s", (query, intent) => {
    expect(detectQueryIntent(query)).toBe(intent);
  });

  it("returns null for a general question", () => {
    expect(detectQueryIntent("Tell me about these cards")).toBeNull();
  });

  it("returns null for blank input", () => {
    expect(detectQueryIntent("   ")).toBeNull();
  });

  it("is case-insensitive", () => {
    expect(detectQueryIntent("LOUNGE ACCESS ON ATLAS")).toBe("lounge_access");
  });

});

describe("stage precedence", () => {
  it("fee waiver beats comparison", () => {
    expect(detectQueryIntent("Compare the fee waiver conditions")).toBe(
      "annual_fee_reversal_spend_threshold"
    );
  });

  it("fee waiver beats lounge access", () => {
    expect(detectQueryIntent("Is the annual fee waived and is lounge access free?")).toBe(
      "annual_fee_reversal_spend_threshold"
    );
  });

  it("lounge beats comparison", () => {
    expect(detectQueryIntent("Compare lounge access on both cards")).toBe("lounge_access");
  });

  it("comparison beats reward calculation", () => {
    expect(detectQueryIntent("Compare how many points I get if I spend 1 lakh")).toBe(
      "reward_comparison"
    );
  });

  it("benefit rules beat spending categories", () => {
    expect(detectQueryIntent("Is insurance excluded from rewards?")).toBe("accrual_exclusions");
  });

  it("insurance cover beats the insurance spending category", () => {
    expect(detectQueryIntent("show the insurance cover")).toBe("insurance_cover");
  });

  it("spending categories beat the field fallback", () => {
    expect(detectQueryIntent("What rewards do I get on education?")).toBe("education");
  });

  it("the stage of each intent follows the precedence list", () => {
    const stageOrder = [
      "fee_waiver",
      "lounge",
      "reward_comparison",
      "benefit",
      "spending_category",
      "field",
    ];
    const ranks = INTENT_PRECEDENCE.map((intent) => stageOrder.indexOf(getIntentStage(intent)));

    for (let i = 1; i < ranks.length; i++) {
      expect(ranks[i]).toBeGreaterThanOrEqual(ranks[i - 1]);
    }
  });
});

describe("detectComparisonFocus", () => {
  it("finds the card field a comparison is about", () => {
    const query = "which card has better lost card liability ? axis or icici ?";

    expect(detectQueryIntent(query)).toBe("reward_comparison");
    expect(detectComparisonFocus(query)).toBe("insurance_cover");
  });

  it("reaches the field fallback rules", () => {
    expect(detectComparisonFocus("Compare the joining fee")).toBe("joining_fee");
  });

  it("returns null for a plain reward comparison", () => {
    expect(detectComparisonFocus("Which card gives more miles on hotels?")).toBeNull();
  });
});

describe("isSpendingCategoryIntent", () => {
  it("recognises surcharge categories only", () => {
    expect(isSpendingCategoryIntent("gold")).toBe(true);
    expect(isSpendingCategoryIntent("golf")).toBe(false);
    expect(isSpendingCategoryIntent(null)).toBe(false);
  });
});
