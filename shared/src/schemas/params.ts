import { z } from 'zod';

/** Params for routes addressing a row by its integer id (post, comment, message). */
export const idParamSchema = z.object({
  id: z.string().regex(/^\d+$/).pipe(z.coerce.number<string>().int().positive()),
});

export type IdParam = z.infer<typeof idParamSchema>;
