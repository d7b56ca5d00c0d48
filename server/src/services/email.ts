import nodemailer from "nodemailer";
import {
  APP_NAME,
  SMTP_FROM,
  SMTP_HOST,
  SMTP_PASSWORD,
  SMTP_PORT,
  SMTP_USER,
} from "../config.js";

/** Blog palette for email, matching public/css/styles.css */
const STYLE = {
  bg: "#f7f5f2",
  bgElevated: "#ffffff",
  text: "#212529",
  textMuted: "#6c757d",
  accent: "#0085a1",
  border: "#dee2e6",
  fontSans: "'Open Sans', 'Helvetica Neue', Arial, sans-serif",
};

export interface SendMailOptions {
  to: string;
  subject: string;
  text: string;
  html: string;
  replyTo?: string;
}

export function isEmailConfigured(): boolean {
  return SMTP_HOST !== "";
}

/**
 * Send an email over SMTP. No-op if SMTP_HOST is not set.
 * Returns { sent: true } on success, { sent: false, error } on failure.
 */
export async function sendMail(
  options: SendMailOptions,
): Promise<{ sent: boolean; error?: string }> {
  if (!isEmailConfigured()) {
    return { sent: false, error: "Email is not configured" };
  }
  try {
    const transporter = nodemailer.createTransport({
      host: SMTP_HOST,
      port: SMTP_PORT,
      secure: SMTP_PORT === 465,
      auth: SMTP_USER ? { user: SMTP_USER, pass: SMTP_PASSWORD } : undefined,
    });
    await transporter.sendMail({
      from: SMTP_FROM,
      to: options.to,
      replyTo: options.replyTo?.trim() || undefined,
      subject: options.subject,
      text: options.text,
      html: options.html,
    });
    return { sent: true };
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    return { sent: false, error: msg };
  }
}

export function escapeHtml(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

/**
 * Build contact form notification email (HTML and plain text) for the admin.
 */
export function buildContactNotificationEmail(
  name: string,
  email: string,
  phone: string | null,
  message: string,
): { subject: string; text: string; html: string } {
  const subject = `${APP_NAME} Contact Form: ${name}`;
  const text = [
    `New contact form submission from ${name} (${email}):`,
    phone ? `Phone: ${phone}` : "",
    "",
    "---",
    "",
    message,
    "",
    "---",
    "",
    `Reply to: ${email}`,
    "",
    APP_NAME,
  ]
    .filter(Boolean)
    .join("\n");

  const safeName = escapeHtml(name);
  const safeEmail = escapeHtml(email);
  const safePhone = phone ? escapeHtml(phone) : null;
  const safeMessage = escapeHtml(message).replace(/\n/g, "<br>");

  const html = `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="utf-8" />
  <meta name="viewport" content="width=device-width, initial-scale=1" />
  <title>${escapeHtml(subject)}</title>
</head>
<body style="margin:0; font-family: ${STYLE.fontSans}; background: ${STYLE.bg}; color: ${STYLE.text}; line-height: 1.6;">
  <div style="max-width: 520px; margin: 0 auto; padding: 32px 24px;">
    <div style="background: ${STYLE.bgElevated}; border: 1px solid ${STYLE.border}; border-radius: 8px; padding: 32px 28px;">
      <h1 style="margin: 0 0 8px; font-size: 1.25rem; color: ${STYLE.accent};">New Contact Message</h1>
      <p style="margin: 0 0 20px; font-size: 0.875rem; color: ${STYLE.textMuted};">Someone submitted the contact form on ${APP_NAME}.</p>
      <table style="width: 100%; border-collapse: collapse; margin: 0 0 20px;">
        <tr>
          <td style="padding: 8px 0; font-size: 0.875rem; color: ${STYLE.textMuted}; width: 80px;">From</td>
          <td style="padding: 8px 0;">${safeName}</td>
        </tr>
        <tr>
          <td style="padding: 8px 0; font-size: 0.875rem; color: ${STYLE.textMuted};">Email</td>
          <td style="padding: 8px 0;"><a href="mailto:${safeEmail}" style="color: ${STYLE.accent};">${safeEmail}</a></td>
        </tr>${
          safePhone
            ? `
        <tr>
          <td style="padding: 8px 0; font-size: 0.875rem; color: ${STYLE.textMuted};">Phone</td>
          <td style="padding: 8px 0;">${safePhone}</td>
        </tr>`
            : ""
        }
      </table>
      <div style="padding: 16px; background: ${STYLE.bg}; border: 1px solid ${STYLE.border}; border-radius: 6px;">
        <p style="margin: 0; white-space: pre-wrap;">${safeMessage}</p>
      </div>
    </div>
  </div>
</body>
</html>`;

  return { subject, text, html };
}
