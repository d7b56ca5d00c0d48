import type { FastifyInstance } from "fastify";
import { contactBodySchema } from "@khaled-blog/shared";
import { findAdmin } from "../users/repo.js";
import { createMessage } from "../messages/repo.js";
import {
  buildContactNotificationEmail,
  isEmailConfigured,
  sendMail,
} from "../../services/email.js";
import { pickFormValues, redactEmail } from "../../utils/forms.js";

const CONTACT_FIELDS = ["name", "email", "phone", "message"] as const;

export async function contactRoutes(app: FastifyInstance) {
  app.get("/contact", async (_request, reply) => {
    return reply.render("contact", { title: "Contact Me", values: {}, errors: {} });
  });

  app.post("/contact", async (request, reply) => {
    const parsed = contactBodySchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.status(400).render("contact", {
        title: "Contact Me",
        values: pickFormValues(request.body, CONTACT_FIELDS),
        errors: parsed.error.flatten().fieldErrors,
      });
    }
    const { name, email, phone, message } = parsed.data;
    const id = createMessage(parsed.data);
    request.log.info(
      { messageId: id, email: redactEmail(email) },
      "Contact message stored",
    );

    if (isEmailConfigured()) {
      const admin = findAdmin();
      if (admin) {
        const { subject, text, html } = buildContactNotificationEmail(
          name,
          email,
          phone,
          message,
        );
        const result = await sendMail({
          to: admin.email,
          subject,
          text,
          html,
          replyTo: email,
        });
        if (!result.sent) {
          request.log.warn(
            { messageId: id, error: result.error },
            "Contact notification email failed",
          );
        }
      }
    }

    return reply
      .flash("success", "Your message has been sent successfully!")
      .redirect("/contact");
  });
}
