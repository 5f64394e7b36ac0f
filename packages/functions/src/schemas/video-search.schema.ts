import { z } from 'zod';

/** The subset of a Google Custom Search JSON API response the enrichment reads. */
export const searchResultItemSchema = z.object({
  link: z.string().optional(),
  title: z.string().optional(),
  pagemap: z
    .object({
      cse_thumbnail: z.array(z.object({ src: z.string().optional() }).passthrough()).optional(),
      videoobject: z.array(z.object({ thumbnailurl: z.string().optional() }).passthrough()).optional(),
    })
    .passthrough()
    .optional(),
}).passthrough();

export const searchResponseSchema = z.object({
  items: z.array(searchResultItemSchema).optional(),
}).passthrough();

export type SearchResultItem = z.infer<typeof searchResultItemSchema>;
export type SearchResponse = z.infer<typeof searchResponseSchema>;
