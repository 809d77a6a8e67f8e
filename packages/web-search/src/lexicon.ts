/**
 * Intent vocabulary: keyword phrases, secondary hint tokens and the domain
 * fragments that boost a result for each intent.
 */

import { z } from "zod";
import lexiconData from "./data/intent-lexicon.json" with { type: "json" };

const wordList = z.array(z.string().min(1));

const LexiconSchema = z.object({
  keywords: z.object({
    news: wordList,
    technical: wordList,
    shopping: wordList,
    academic: wordList,
    local: wordList,
    finance: wordList,
  }),
  hints: z.object({
    news: wordList,
    technical: wordList,
    shopping: wordList,
    academic: wordList,
    local: wordList,
  }),
  domainBoosts: z.object({
    news: wordList,
    technical: wordList,
    shopping: wordList,
    academic: wordList,
    finance: wordList,
    local: wordList,
    general: wordList,
  }),
});

export type IntentLexicon = z.infer<typeof LexiconSchema>;

export const INTENT_LEXICON: IntentLexicon = LexiconSchema.parse(lexiconData);
