import { z } from 'zod';

const MAX_FIELD_LENGTH = 250;

/** Only absolute http(s) URLs; rejects javascript: and data: links that would end up in href/src. */
export function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

const shortText = (label: string) =>
  z.string().trim().min(1, { error: `${label} is required` }).max(MAX_FIELD_LENGTH, { error: `${label} must be at most ${MAX_FIELD_LENGTH} characters` });

export const postBodySchema = z.object({
  title: shortText('Title'),
  subtitle: shortText('Subtitle'),
  body: z.string().trim().min(1, { error: 'Blog content is required' }),
  img_url: shortText('Image URL').refine(isHttpUrl, { error: 'Image URL must be a valid http(s) URL' }),
  project_url: z
    .string()
    .max(MAX_FIELD_LENGTH, { error: `Project link must be at most ${MAX_FIELD_LENGTH} characters` })
    .optional()
    .transform((s) => (s != null && s.trim() !== '' ? s.trim() : null))
    .refine((s) => s === null || isHttpUrl(s), { error: 'Project link must be a valid http(s) URL' }),
});

export type PostBody = z.infer<typeof postBodySchema>;
