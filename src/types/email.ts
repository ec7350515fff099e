export interface EmailConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  tls: boolean;
  mailbox: string;
  connTimeoutMs: number;
  authTimeoutMs: number;
}

export interface EmailAttachment {
  filename: string;
  contentType: string;
  size: number;
  content: Buffer;
  // Inline part referenced from the HTML body (logos, signatures)
  related: boolean;
}

export interface EmailMessage {
  uid: number;
  messageId: string;
  from: {
    address: string;
    name?: string;
  };
  to: string[];
  subject: string;
  text: string; // Plain text content
  html?: string; // Original HTML
  date: Date;
  attachments: EmailAttachment[];
}

/**
 * Operations the pipeline needs from a mailbox. Implemented by
 * MailboxClient over IMAP; tests provide an in-memory mailbox.
 */
export interface Mailbox {
  listUnread(): Promise<number[]>;
  fetch(uid: number): Promise<EmailMessage>;
  markRead(uid: number): Promise<void>;
}
