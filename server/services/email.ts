/**
 * email.ts
 * Nodemailer wrapper for sync run reports.
 *
 * Uses the SMTP_* settings from config:
 *   SMTP_HOST   e.g. smtp.gmail.com
 *   SMTP_PORT   e.g. 587 (465 switches to implicit TLS)
 *   SMTP_USER / SMTP_PASS
 *   SMTP_FROM   display name + address, falls back to SMTP_USER
 */

import nodemailer from "nodemailer";
import { format, differenceInSeconds } from "date-fns";
import type { Store, SyncRun } from "@shared/schema";
import { config, type AppConfig } from "../config";

type SmtpConfig = AppConfig["smtp"];

export interface MailMessage {
  from?: string;
  to: string;
  subject: string;
  html: string;
  text?: string;
}

export interface MailTransport {
  sendMail(message: MailMessage): Promise<unknown>;
}

export function isSmtpConfigured(smtp: SmtpConfig = config.smtp): boolean {
  return !!(smtp.host && smtp.user && smtp.pass);
}

function createTransport(smtp: SmtpConfig): MailTransport {
  return nodemailer.createTransport({
    host: smtp.host,
    port: smtp.port,
    secure: smtp.port === 465,
    auth: {
      user: smtp.user,
      pass: smtp.pass,
    },
  });
}

export async function sendEmail(
  opts: { to: string; subject: string; html: string; text?: string },
  smtp: SmtpConfig = config.smtp,
  transport: MailTransport = createTransport(smtp),
): Promise<void> {
  if (!isSmtpConfigured(smtp)) {
    throw new Error("SMTP is not configured. Set SMTP_HOST, SMTP_USER, and SMTP_PASS in your environment.");
  }
  await transport.sendMail({
    from: smtp.from || smtp.user,
    to: opts.to,
    subject: opts.subject,
    html: opts.html,
    text: opts.text,
  });
}

export function renderSyncReport(store: Pick<Store, "name">, run: SyncRun): { subject: string; html: string } {
  const subject = `Sync ${run.status} — ${store.name}`;
  const duration = run.completedAt ? `${differenceInSeconds(run.completedAt, run.startedAt)}s` : "in progress";

  const rows: Array<[string, string]> = [
    ["Trigger", run.trigger],
    ["Started", format(run.startedAt, "yyyy-MM-dd HH:mm:ss")],
    ["Duration", duration],
    ["Processed", String(run.processed)],
    ["Created", String(run.created)],
    ["Updated", String(run.updated)],
    ["Skipped", String(run.skipped)],
    ["Errors", String(run.errors)],
  ];

  const tableRows = rows
    .map(([label, value]) => `<tr><td style="padding:4px 12px 4px 0;color:#6b7280;">${label}</td><td>${escHtml(value)}</td></tr>`)
    .join("");
  const details = run.errorDetails
    ? `<p style="margin-top:16px;color:#b91c1c;white-space:pre-wrap;">${escHtml(run.errorDetails)}</p>`
    : "";

  const html = `<div style="font-family:-apple-system,Arial,sans-serif;font-size:14px;color:#111;">
    <h2 style="margin:0 0 12px;">${escHtml(subject)}</h2>
    <table>${tableRows}</table>${details}
  </div>`;

  return { subject, html };
}

/**
 * Sends the run report when SMTP is configured and the store has a
 * recipient. Returns false when skipped.
 */
export async function sendSyncReport(
  store: Pick<Store, "name">,
  run: SyncRun,
  recipient: string,
  transport?: MailTransport,
  smtp: SmtpConfig = config.smtp,
): Promise<boolean> {
  if (!recipient || !isSmtpConfigured(smtp)) return false;
  const { subject, html } = renderSyncReport(store, run);
  await sendEmail({ to: recipient, subject, html }, smtp, transport ?? createTransport(smtp));
  return true;
}

function escHtml(s: string): string {
  return s.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}
