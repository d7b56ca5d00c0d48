import { z } from 'zod';

const MAX_NAME_LENGTH = 250;
const MAX_EMAIL_LENGTH = 250;
const MAX_PHONE_LENGTH = 100;
const MAX_MESSAGE_LENGTH = 10000;

export const contactBodySchema = z.object({
  name: z.string().trim().min(1, { error: 'Please provide a valid name' }).max(MAX_NAME_LENGTH, { error: `Name must be at most ${MAX_NAME_LENGTH} characters` }),
  email: z.string().trim().min(1, { error: 'Please provide a valid email address' }).max(MAX_EMAIL_LENGTH).email({ error: 'Please provide a valid email address' }),
  phone: z
    .string()
    .max(MAX_PHONE_LENGTH, { error: `Phone must be at most ${MAX_PHONE_LENGTH} characters` })
    .optional()
    .transform((s) => (s != null && s.trim() !== '' ? s.trim() : null)),
  message: z.string().trim().min(1, { error: 'Please provide a message' }).max(MAX_MESSAGE_LENGTH, { error: `Message must be at most ${MAX_MESSAGE_LENGTH} characters` }),
});

export type ContactBody = z.infer<typeof contactBodySchema>;
