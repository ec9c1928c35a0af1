import path from "path";
import { AxiosHeaders, type AxiosResponse } from "axios";
import { loadCardData } from "../src/services/card-data.service";
import type { CardDataset, CardRecord } from "../src/types";

export const DATA_DIR = path.resolve(__dirname, "../data");
export const FIXTURES_DIR = path.resolve(__dirname, "fixtures");

export const AXIS_ATLAS = "Axis Bank Atlas Credit Card";
export const ICICI_EPM = "ICICI Bank Emeralde Private Metal Credit Card";

export function loadTestDataset(): CardDataset {
  return loadCardData([
    path.join(DATA_DIR, "axis-atlas.json"),
    path.join(DATA_DIR, "icici-epm.json"),
  ]);
}

export function getCard(dataset: CardDataset, name: string): CardRecord {
  const card = dataset.cards.get(name);
  if (!card) {
    throw new Error(`Test dataset is missing ${name}`);
  }
  return card;
}

export function axiosResponse<T>(data: T, status = 200): AxiosResponse<T> {
  return {
    data,
    status,
    statusText: status === 200 ? "OK" : "Error",
    headers: {},
    config: { headers: new AxiosHeaders() },
  };
}
