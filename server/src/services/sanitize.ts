import DOMPurify from "isomorphic-dompurify";

/**
 * Post bodies are admin-authored rich text rendered unescaped; strip scripts,
 * event handlers and other active content before they are stored.
 */
export function sanitizePostBody(html: string): string {
  return DOMPurify.sanitize(html, {
    USE_PROFILES: { html: true },
    FORBID_TAGS: ["style", "form", "input", "button", "textarea", "select"],
  });
}
