import { z } from 'zod';

const MAX_COMMENT_LENGTH = 5000;

export const commentBodySchema = z.object({
  comment_text: z.string().trim().min(1, { error: 'Please write a comment' }).max(MAX_COMMENT_LENGTH, { error: `Comment must be at most ${MAX_COMMENT_LENGTH} characters` }),
});

export type CommentBody = z.infer<typeof commentBodySchema>;
