/**
 * Result shapes of the DataForSEO endpoints this project calls.
 * Only the fields read downstream are declared; zod strips the rest.
 */

import { z } from 'zod';

// =============================================================================
// KEYWORDS
// =============================================================================

/** keywords_data/google_ads/keywords_for_keywords/live: one row per keyword */
export const relatedTermResultSchema = z.object({
  keyword: z.string(),
  search_volume: z.number().nullish(),
});

export type RelatedTermResult = z.infer<typeof relatedTermResultSchema>;

/** dataforseo_labs/google/keyword_ideas/live */
export const keywordIdeasResultSchema = z.object({
  items: z
    .array(
      z.object({
        keyword: z.string(),
        keyword_info: z
          .object({
            search_volume: z.number().nullish(),
          })
          .nullish(),
      }),
    )
    .nullish(),
});

export type KeywordIdeasResult = z.infer<typeof keywordIdeasResultSchema>;

/** keywords_data/google/autocomplete/live */
export const autocompleteResultSchema = z.object({
  items: z
    .array(
      z.object({
        suggestion: z.string().nullish(),
      }),
    )
    .nullish(),
});

export type AutocompleteResult = z.infer<typeof autocompleteResultSchema>;

// =============================================================================
// SERP
// =============================================================================

/** serp/google/organic/live/advanced; items mix organic and SERP-feature blocks */
export const serpResultSchema = z.object({
  keyword: z.string().nullish(),
  items: z
    .array(
      z.object({
        type: z.string(),
        rank_group: z.number().nullish(),
        url: z.string().nullish(),
        domain: z.string().nullish(),
        title: z.string().nullish(),
      }),
    )
    .nullish(),
});

export type SerpApiResult = z.infer<typeof serpResultSchema>;
