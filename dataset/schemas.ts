import { z } from 'zod';

const documentIdSchema = z.union([z.string().min(1), z.number().finite()]).transform((value) => String(value));

/** Dataset entry: any object with a non-empty `id`; other fields pass through untouched. */
export const documentSchema = z
  .object({ id: documentIdSchema })
  .passthrough();

export const embeddingRecordSchema = z.object({
  id: documentIdSchema,
  vector: z.array(z.number().finite()).min(1)
});
