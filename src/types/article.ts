import { z } from 'zod';

// Content blocks and articles as stored on disk and served from the cache
export const ContentBlockSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('text'), value: z.string() }),
  z.object({ kind: z.literal('image'), value: z.string().url() }),
  z.object({ kind: z.literal('code'), value: z.string(), language: z.string() }), // '' = undetected
]);

export type ContentBlock = z.infer<typeof ContentBlockSchema>;

export const ArticleSchema = z.object({
  id: z.string().length(16),                                 // md5(url), first 16 hex chars
  title: z.string().min(1),
  publishedDate: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),    // YYYY-MM-DD
  url: z.string().url(),                                     // unique key, never mutated
  content: z.array(ContentBlockSchema).min(1),
  category: z.string(),
  summary: z.string(),
  source: z.string(),
  author: z.string().optional(),
  createdAt: z.string().datetime({ offset: true }),
  updatedAt: z.string().datetime({ offset: true }),
});

export type Article = z.infer<typeof ArticleSchema>;

// One entry read off a listing page
export interface CrawlCandidate {
  url: string;
  title: string;
  articleId: number | null;  // null when the URL carries no numeric id
}

// Fields scraped from an article page before formatting
export interface RawArticle {
  url: string;
  title: string;
  author: string | null;
  publishTime: string | null;
  content: ContentBlock[];
}
