export interface OutboundMessage {
  recipient: string;
  subject: string;
  body: string;
}

export type SendResult = { ok: true; mode: string } | { ok: false; error: string };

export interface Notifier {
  readonly mode: string;
  send(message: OutboundMessage): Promise<SendResult>;
}
