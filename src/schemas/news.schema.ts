import { z } from "zod";

/**
 * Fields of an rss-parser item the ticker uses
 */
export const FeedItemSchema = z.object({
  title: z.string().optional(),
  link: z.string().optional(),
  isoDate: z.string().optional(),
  pubDate: z.string().optional(),
  contentSnippet: z.string().optional(),
});

export const FeedSchema = z.object({
  title: z.string().optional(),
  items: z.array(FeedItemSchema).default([]),
});

export type FeedItem = z.infer<typeof FeedItemSchema>;
