import { z } from "zod";

/**
 * Response shapes of the Google Reader API as served by FreshRSS.
 * Only the fields the sync reads are declared; everything else passes through.
 */

const linkSchema = z.object({
  href: z.string(),
});

const contentSchema = z.object({
  content: z.string().default(""),
});

const numericString = z.union([z.string(), z.number()]);

export const readerItemSchema = z.object({
  id: z.string(),
  title: z.string().optional(),
  published: numericString.optional(),
  timestampUsec: numericString.optional(),
  canonical: z.array(linkSchema).optional(),
  alternate: z.array(linkSchema).optional(),
  summary: contentSchema.optional(),
  content: contentSchema.optional(),
  categories: z.array(z.string()).default([]),
  origin: z
    .object({
      title: z.string().optional(),
      htmlUrl: z.string().optional(),
    })
    .optional(),
});

export type ReaderItem = z.infer<typeof readerItemSchema>;

export const streamContentsSchema = z.object({
  items: z.array(readerItemSchema).default([]),
  continuation: z.string().optional(),
});

export const subscriptionListSchema = z.object({
  subscriptions: z.array(
    z.object({
      id: z.string(),
      title: z.string().optional(),
      url: z.string().optional(),
      htmlUrl: z.string().optional(),
      categories: z
        .array(
          z.object({
            id: z.string(),
            label: z.string().optional(),
          })
        )
        .default([]),
    })
  ),
});
