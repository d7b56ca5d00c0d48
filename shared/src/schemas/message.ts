import { z } from 'zod';

/** Query for GET admin/messages (inbox). Each field falls back to its default on its own. */
export const messagesListQuerySchema = z.object({
  page: z.coerce.number().int().min(1).catch(1),
  sort: z.enum(['newest', 'oldest']).catch('newest'),
});

export type MessagesListQuery = z.infer<typeof messagesListQuerySchema>;
