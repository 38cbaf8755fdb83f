import path from "node:path";
import nodemailer, { type SendMailOptions } from "nodemailer";
import { errorMessage } from "./errors.js";
import type { OutgoingMessage, SendOutcome } from "./types.js";

export interface MailTransport {
  send(message: OutgoingMessage): Promise<SendOutcome>;
}

/** The part of a nodemailer transporter the sender uses. */
export type MailSender = {
  sendMail(options: SendMailOptions): Promise<{ messageId?: string; rejected?: unknown[] }>;
};

export type SmtpMailTransportOptions = {
  host: string;
  port: number;
  secure: boolean;
  user: string;
  password: string;
  from?: string | null;
  fromName?: string | null;
  sender?: MailSender;
};

function errorFields(err: unknown): { code?: unknown; responseCode?: unknown; command?: unknown } {
  if (typeof err !== "object" || err === null) {
    return {};
  }
  return {
    code: "code" in err ? err.code : undefined,
    responseCode: "responseCode" in err ? err.responseCode : undefined,
    command: "command" in err ? err.command : undefined,
  };
}

/**
 * Hard bounces (the relay refusing the recipient) retire the contact.
 * Everything else is worth another attempt on a later run.
 */
export function classifySendError(err: unknown): SendOutcome {
  const reason = errorMessage(err);
  const { code, responseCode, command } = errorFields(err);

  if (code === "EENVELOPE") {
    return { kind: "recipient_rejected", reason };
  }
  if (
    typeof responseCode === "number" &&
    responseCode >= 500 &&
    responseCode < 600 &&
    (command === "RCPT TO" || responseCode === 550 || responseCode === 551 || responseCode === 553)
  ) {
    return { kind: "recipient_rejected", reason };
  }
  return { kind: "transient_failure", reason };
}

export class SmtpMailTransport implements MailTransport {
  private readonly sender: MailSender;
  private readonly from: string;

  constructor(opts: SmtpMailTransportOptions) {
    this.sender =
      opts.sender ??
      nodemailer.createTransport({
        host: opts.host,
        port: opts.port,
        secure: opts.secure,
        auth: { user: opts.user, pass: opts.password },
      });
    const address = opts.from || opts.user;
    this.from = opts.fromName ? `"${opts.fromName.replace(/"/g, "")}" <${address}>` : address;
  }

  async send(message: OutgoingMessage): Promise<SendOutcome> {
    const options: SendMailOptions = {
      from: this.from,
      to: message.to,
      subject: message.subject,
      text: message.body,
    };
    if (message.attachmentPath) {
      options.attachments = [
        { filename: path.basename(message.attachmentPath), path: message.attachmentPath },
      ];
    }

    try {
      const info = await this.sender.sendMail(options);
      if (Array.isArray(info.rejected) && info.rejected.length > 0) {
        return { kind: "recipient_rejected", reason: `Recipient refused: ${message.to}` };
      }
      return { kind: "sent", messageId: info.messageId };
    } catch (err) {
      return classifySendError(err);
    }
  }
}
