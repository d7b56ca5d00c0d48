import { z } from 'zod';

const MAX_NAME_LENGTH = 100;
const MAX_EMAIL_LENGTH = 100;

export const registerBodySchema = z
  .object({
    name: z.string().trim().min(1, { error: 'Please enter your name' }).max(MAX_NAME_LENGTH, { error: `Name must be at most ${MAX_NAME_LENGTH} characters` }),
    email: z.string().trim().min(1, { error: 'Email is required' }).max(MAX_EMAIL_LENGTH).email({ error: 'Please provide a valid email address' }).transform((s) => s.toLowerCase()),
    password: z.string().min(8, { error: 'Password must be at least 8 characters' }),
    confirm_password: z.string(),
  })
  .refine((body) => body.password === body.confirm_password, {
    error: 'Passwords do not match',
    path: ['confirm_password'],
  });

export const loginBodySchema = z.object({
  email: z.string().trim().min(1, { error: 'Email is required' }).email({ error: 'Please provide a valid email address' }).transform((s) => s.toLowerCase()),
  password: z.string().min(1, { error: 'Password is required' }),
});

export type RegisterBody = z.infer<typeof registerBodySchema>;
export type LoginBody = z.infer<typeof loginBodySchema>;
