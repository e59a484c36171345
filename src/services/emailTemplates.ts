// src/services/emailTemplates.ts
import type { Notification } from "./notifier";

const SITE_NAME = "Job Board";

export interface RenderedEmail {
  subject: string;
  html: string;
  text: string;
}

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

function layout(heading: string, paragraphs: string[]): string {
  const body = paragraphs.map((p) => `<p>${p}</p>`).join("\n");
  return [
    `<html><body style="font-family: Arial, sans-serif; line-height: 1.6; color: #333;">`,
    `<div style="max-width: 600px; margin: 0 auto; padding: 20px;">`,
    `<h1>${escapeHtml(heading)}</h1>`,
    body,
    `<p>Best regards,<br>The ${SITE_NAME} Team</p>`,
    `</div></body></html>`,
  ].join("\n");
}

function plain(lines: string[]): string {
  return [...lines, "", `Best regards,`, `The ${SITE_NAME} Team`].join("\n");
}

/**
 * Subject, HTML and text bodies for each notification kind.
 * Every interpolated value in the HTML is escaped.
 */
export function renderEmail(notification: Notification): RenderedEmail {
  const e = escapeHtml;

  switch (notification.kind) {
    case "welcome": {
      const { firstName } = notification.data;
      return {
        subject: `Welcome to ${SITE_NAME}!`,
        html: layout(`Welcome to ${SITE_NAME}!`, [
          `Hi ${e(firstName)},`,
          `Thank you for joining ${SITE_NAME}. You can now browse open positions or post your own.`,
        ]),
        text: plain([
          `Hi ${firstName},`,
          "",
          `Thank you for joining ${SITE_NAME}. You can now browse open positions or post your own.`,
        ]),
      };
    }

    case "application-submitted": {
      const { firstName, jobTitle, company } = notification.data;
      return {
        subject: `Application Submitted: ${jobTitle} at ${company}`,
        html: layout("Application Submitted Successfully!", [
          `Hi ${e(firstName)},`,
          `Your application for the <strong>${e(jobTitle)}</strong> position at <strong>${e(company)}</strong> has been submitted.`,
          "You can track its status in your dashboard.",
        ]),
        text: plain([
          `Hi ${firstName},`,
          "",
          `Your application for the ${jobTitle} position at ${company} has been submitted.`,
          "You can track its status in your dashboard.",
        ]),
      };
    }

    case "application-received": {
      const { firstName, jobTitle, applicantName } = notification.data;
      return {
        subject: `New Application: ${jobTitle}`,
        html: layout("New Job Application Received", [
          `Hi ${e(firstName)},`,
          `You have received a new application for your <strong>${e(jobTitle)}</strong> position.`,
          `<strong>Applicant:</strong> ${e(applicantName)}`,
        ]),
        text: plain([
          `Hi ${firstName},`,
          "",
          `You have received a new application for your ${jobTitle} position.`,
          `Applicant: ${applicantName}`,
        ]),
      };
    }

    case "job-approved": {
      const { firstName, jobTitle } = notification.data;
      return {
        subject: `Job Approved: ${jobTitle}`,
        html: layout("Job Posting Approved!", [
          `Hi ${e(firstName)},`,
          `Your job posting for <strong>${e(jobTitle)}</strong> has been approved and is now visible to job seekers.`,
        ]),
        text: plain([
          `Hi ${firstName},`,
          "",
          `Your job posting for ${jobTitle} has been approved and is now visible to job seekers.`,
        ]),
      };
    }

    case "job-rejected": {
      const { firstName, jobTitle, reason } = notification.data;
      const reasonLines = reason ? [`Reason: ${reason}`] : [];
      return {
        subject: `Job Posting Update: ${jobTitle}`,
        html: layout("Job Posting Requires Revision", [
          `Hi ${e(firstName)},`,
          `Your job posting for <strong>${e(jobTitle)}</strong> requires some revisions before it can be published.`,
          ...(reason ? [`<strong>Reason:</strong> ${e(reason)}`] : []),
          "Once you update the posting it will be reviewed again.",
        ]),
        text: plain([
          `Hi ${firstName},`,
          "",
          `Your job posting for ${jobTitle} requires some revisions before it can be published.`,
          ...reasonLines,
          "Once you update the posting it will be reviewed again.",
        ]),
      };
    }
  }
}
