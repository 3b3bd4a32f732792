import fs from "node:fs";
import path from "node:path";
import nodemailer from "nodemailer";
import { errorMessage } from "../core/errors.js";
import { Notifier, OutboundMessage, SendResult } from "./notifier.js";

/** The one nodemailer call we use; tests pass a fake. */
export interface MailTransport {
  sendMail(mail: { from: string; to: string; subject: string; text: string }): Promise<unknown>;
}

export interface MailNotifierOptions {
  from: string;
  smtpUrl?: string;
  transport?: MailTransport;
  /** Where messages are written when no transport is configured. */
  outboxDir: string;
  clock?: () => Date;
}

export class MailNotifier implements Notifier {
  readonly mode: "smtp" | "outbox";
  private transport: MailTransport | null;
  private seq = 0;

  constructor(private opts: MailNotifierOptions) {
    this.transport = opts.transport ?? (opts.smtpUrl ? nodemailer.createTransport(opts.smtpUrl) : null);
    this.mode = this.transport ? "smtp" : "outbox";
  }

  async send(message: OutboundMessage): Promise<SendResult> {
    if (this.transport) {
      try {
        await this.transport.sendMail({
          from: this.opts.from,
          to: message.recipient,
          subject: message.subject,
          text: message.body
        });
        return { ok: true, mode: "smtp" };
      } catch (err) {
        return { ok: false, error: errorMessage(err) };
      }
    }

    // no SMTP: write to the outbox directory
    try {
      await fs.promises.mkdir(this.opts.outboxDir, { recursive: true });
      const stamp = (this.opts.clock ?? (() => new Date()))().toISOString().replace(/[:.]/g, "-");
      const fn = path.join(this.opts.outboxDir, `email_${stamp}_${++this.seq}.txt`);
      await fs.promises.writeFile(fn, `TO: ${message.recipient}\nSUBJECT: ${message.subject}\n\n${message.body}\n`);
      return { ok: true, mode: "outbox" };
    } catch (err) {
      return { ok: false, error: errorMessage(err) };
    }
  }
}
