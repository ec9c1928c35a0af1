/**
 * Card Data Loader
 *
 * Reads the bank JSON documents (a `common_terms` block plus a `cards` array)
 * into two read-only maps: card name -> card record, bank name -> common terms.
 * Loaded once per process and shared across requests.
 */

import fs from "fs";
import path from "path";
import { z } from "zod";
import { ENV } from "../config/env";
import type { CardDataset, CardDocument, CardId, CardRecord } from "../types";

// ================= SCHEMA =================

const rewardsSchema = z
    .object({
        rate_general: z.string().optional(),
        accrual_exclusions: z.array(z.string()).optional(),
        capping_per_statement_cycle: z.record(z.string()).optional(),
    })
    .passthrough();

const cardTermsSchema = z
    .object({
        id: z.string().optional(),
        name: z.string().min(1),
        rewards: rewardsSchema.optional(),
    })
    .passthrough();

const commonTermsSchema = z
    .object({
        surcharge_fees: z.record(z.unknown()).optional(),
    })
    .passthrough();

const cardDocumentSchema = z.object({
    common_terms: commonTermsSchema.optional(),
    cards: z.array(z.unknown()),
});

export type CardTerms = z.infer<typeof cardTermsSchema>;
export type CommonTerms = z.infer<typeof commonTermsSchema>;

const KNOWN_CARD_IDS: readonly CardId[] = ["icici_epm", "axis_atlas"];

function isCardId(value: string): value is CardId {
    return KNOWN_CARD_IDS.some((id) => id === value);
}

/**
 * Resolve the calculator identity of a card.
 * An explicit `id` wins; otherwise the display name is matched once, here.
 */
export function resolveCardId(terms: CardTerms): CardId | null {
    if (terms.id && isCardId(terms.id)) {
        return terms.id;
    }

    const name = terms.name.toLowerCase();
    if (name.includes("icici") && name.includes("emeralde")) return "icici_epm";
    if (name.includes("axis") && name.includes("atlas")) return "axis_atlas";
    return null;
}

/**
 * "data/axis-atlas.json" -> "AXIS"
 */
export function bankNameFromFile(filePath: string): string {
    const base = path.basename(filePath, path.extname(filePath));
    return base.split("-")[0].toUpperCase();
}

function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Read and validate one bank document.
 * Returns null (after a warning) when the file is missing or malformed.
 */
export function readCardDocument(
    filePath: string,
    diagnostics: string[] = []
): CardDocument | null {
    let raw: unknown;
    try {
        raw = JSON.parse(fs.readFileSync(path.resolve(filePath), "utf-8"));
    } catch (error) {
        const message = `Could not load ${filePath}: ${describeError(error)}`;
        console.warn(`[DATA] ${message}`);
        diagnostics.push(message);
        return null;
    }

    const parsed = cardDocumentSchema.safeParse(raw);
    if (!parsed.success) {
        const message = `Invalid card document ${filePath}: ${parsed.error.issues
            .map((issue) => `${issue.path.join(".") || "<root>"} ${issue.message}`)
            .join("; ")}`;
        console.warn(`[DATA] ${message}`);
        diagnostics.push(message);
        return null;
    }

    const bankName = bankNameFromFile(filePath);
    const cards: CardRecord[] = [];

    parsed.data.cards.forEach((entry, index) => {
        const card = cardTermsSchema.safeParse(entry);
        if (!card.success) {
            const message = `Skipping card #${index} in ${filePath}: ${card.error.issues
                .map((issue) => `${issue.path.join(".")} ${issue.message}`)
                .join("; ")}`;
            console.warn(`[DATA] ${message}`);
            diagnostics.push(message);
            return;
        }

        const cardId = resolveCardId(card.data);
        if (card.data.id && !isCardId(card.data.id)) {
            diagnostics.push(
                `Unknown card id "${card.data.id}" for ${card.data.name}; reward calculation disabled`
            );
        }

        cards.push({
            name: card.data.name,
            bank: bankName,
            cardId,
            terms: card.data,
        });
    });

    return {
        bankName,
        commonTerms: parsed.data.common_terms ?? null,
        cards,
    };
}

/**
 * Load every document in order. On a card-name collision the later
 * definition replaces the earlier one.
 */
export function loadCardData(files: string[]): CardDataset {
    const dataset: CardDataset = {
        cards: new Map(),
        commonTerms: new Map(),
        diagnostics: [],
    };

    for (const file of files) {
        const document = readCardDocument(file, dataset.diagnostics);
        if (!document) continue;

        if (document.commonTerms) {
            if (dataset.commonTerms.has(document.bankName)) {
                dataset.diagnostics.push(
                    `Common terms for ${document.bankName} replaced by ${file}`
                );
            }
            dataset.commonTerms.set(document.bankName, document.commonTerms);
        }

        for (const card of document.cards) {
            if (dataset.cards.has(card.name)) {
                const message = `Card "${card.name}" redefined by ${file}; later definition wins`;
                console.warn(`[DATA] ${message}`);
                dataset.diagnostics.push(message);
            }
            dataset.cards.set(card.name, card);
        }
    }

    console.log(
        `[DATA] Loaded ${dataset.cards.size} cards from ${files.length} files`
    );
    return dataset;
}

let cachedDataset: CardDataset | null = null;

/**
 * Process-wide dataset, loaded from CARD_DATA_FILES on first use
 */
export function getCardData(): CardDataset {
    if (!cachedDataset) {
        cachedDataset = loadCardData(ENV.CARD_DATA_FILES);
    }
    return cachedDataset;
}

export function findCardById(
    dataset: CardDataset,
    cardId: CardId
): CardRecord | undefined {
    return Array.from(dataset.cards.values()).find((card) => card.cardId === cardId);
}
