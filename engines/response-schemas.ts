import { z } from 'zod';

export const countResponseSchema = z.object({
  count: z.number().int().nonnegative()
});

const bulkItemSchema = z.record(
  z.object({
    _id: z.string().optional(),
    status: z.number().optional(),
    error: z.unknown().optional()
  })
);

export const bulkResponseSchema = z.object({
  errors: z.boolean().optional(),
  items: z.array(bulkItemSchema).default([])
});

export type BulkResponse = z.infer<typeof bulkResponseSchema>;

export const solrSelectResponseSchema = z.object({
  response: z.object({
    numFound: z.number().int().nonnegative()
  })
});

export const solrCoreStatusSchema = z.object({
  status: z.record(z.object({ name: z.string().optional() }).passthrough()).default({})
});

export const vespaHealthSchema = z.object({
  status: z.object({
    code: z.string()
  })
});

export const vespaSearchResponseSchema = z.object({
  root: z
    .object({
      fields: z.object({ totalCount: z.number().int().nonnegative().optional() }).optional()
    })
    .optional()
});
