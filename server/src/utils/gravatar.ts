import { GRAVATAR_DEFAULT, GRAVATAR_RATING, GRAVATAR_SIZE } from "../config.js";
import { md5Hex } from "./hash.js";

const GRAVATAR_BASE_URL = "https://www.gravatar.com/avatar/";

export interface GravatarOptions {
  size?: number;
  rating?: string;
  fallback?: string;
}

/** Avatar URL keyed by the MD5 of the trimmed, lower-cased email. */
export function gravatarUrl(email: string, options: GravatarOptions = {}): string {
  const hash = md5Hex(email.trim().toLowerCase());
  const params = new URLSearchParams({
    s: String(options.size ?? GRAVATAR_SIZE),
    r: options.rating ?? GRAVATAR_RATING,
    d: options.fallback ?? GRAVATAR_DEFAULT,
  });
  return `${GRAVATAR_BASE_URL}${hash}?${params.toString()}`;
}
