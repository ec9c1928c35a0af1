import path from "path";
import { describe, it, expect, jest, beforeEach } from "@jest/globals";
import {
  bankNameFromFile,
  findCardById,
  loadCardData,
  readCardDocument,
  resolveCardId,
} from "../src/services/card-data.service";
import { AXIS_ATLAS, FIXTURES_DIR, ICICI_EPM, loadTestDataset } from "./helpers";

const fixture = (name: string) => path.join(FIXTURES_DIR, name);

beforeEach(() => {
  jest.spyOn(console, "log").mockImplementation(() => undefined);
  jest.spyOn(console, "warn").mockImplementation(() => undefined);
});

describe("resolveCardId", () => {
  it("prefers an explicit id", () => {
    expect(resolveCardId({ id: "axis_atlas", name: "Renamed Travel Card" })).toBe("axis_atlas");
  });

  it("falls back to the display name", () => {
    expect(resolveCardId({ name: ICICI_EPM })).toBe("icici_epm");
    expect(resolveCardId({ name: AXIS_ATLAS })).toBe("axis_atlas");
  });

  it("returns null for cards without a calculator", () => {
    expect(resolveCardId({ name: "Alpha Rewards Card" })).toBeNull();
    expect(resolveCardId({ id: "alpha", name: "Alpha Rewards Card" })).toBeNull();
  });
});

describe("bankNameFromFile", () => {
  it("upper-cases the first dash-separated segment", () => {
    expect(bankNameFromFile("backend/data/axis-atlas.json")).toBe("AXIS");
    expect(bankNameFromFile("icici-epm.json")).toBe("ICICI");
  });
});

describe("readCardDocument", () => {
  it("skips a card without a name and records why", () => {
    const diagnostics: string[] = [];
    const document = readCardDocument(fixture("hdfc-alpha.json"), diagnostics);

    expect(document?.bankName).toBe("HDFC");
    expect(document?.cards.map((card) => card.name)).toEqual(["Alpha Rewards Card"]);
    expect(document?.cards[0].cardId).toBeNull();
    expect(diagnostics).toHaveLength(1);
    expect(diagnostics[0]).toContain("Skipping card #1");
  });

  it("returns null for malformed JSON", () => {
    const diagnostics: string[] = [];
    expect(readCardDocument(fixture("broken-card.json"), diagnostics)).toBeNull();
    expect(diagnostics[0]).toContain("Could not load");
  });

  it("returns null for a document without cards", () => {
    const diagnostics: string[] = [];
    expect(readCardDocument(fixture("no-cards.json"), diagnostics)).toBeNull();
    expect(diagnostics[0]).toContain("Invalid card document");
  });
});

describe("loadCardData", () => {
  it("loads both bank documents", () => {
    const dataset = loadTestDataset();

    expect(Array.from(dataset.cards.keys())).toEqual([AXIS_ATLAS, ICICI_EPM]);
    expect(Array.from(dataset.commonTerms.keys())).toEqual(["AXIS", "ICICI"]);
    expect(dataset.cards.get(ICICI_EPM)?.bank).toBe("ICICI");
    expect(dataset.diagnostics).toEqual([]);
  });

  it("resolves card ids once at load", () => {
    const dataset = loadTestDataset();

    expect(findCardById(dataset, "icici_epm")?.name).toBe(ICICI_EPM);
    expect(findCardById(dataset, "axis_atlas")?.name).toBe(AXIS_ATLAS);
  });

  it("keeps the later definition on a card-name collision", () => {
    const dataset = loadCardData([fixture("hdfc-alpha.json"), fixture("hdfc-alpha-update.json")]);

    expect(dataset.cards.size).toBe(1);
    expect(dataset.cards.get("Alpha Rewards Card")?.terms.fees).toEqual({
      annual_fee: "₹2,500 plus GST",
    });
    expect(dataset.commonTerms.get("HDFC")?.foreign_currency_markup).toBe("2% plus GST");
    expect(dataset.diagnostics).toContain(
      `Card "Alpha Rewards Card" redefined by ${fixture("hdfc-alpha-update.json")}; later definition wins`
    );
  });

  it("skips missing and malformed files and loads the rest", () => {
    const dataset = loadCardData([
      fixture("missing.json"),
      fixture("broken-card.json"),
      fixture("hdfc-alpha.json"),
    ]);

    expect(Array.from(dataset.cards.keys())).toEqual(["Alpha Rewards Card"]);
    expect(dataset.diagnostics.filter((message) => message.startsWith("Could not load"))).toHaveLength(2);
  });
});
