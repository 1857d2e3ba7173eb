/**
 * Connectivity handshakes for SMTP, IMAP and POP3. Each one reads the
 * greeting, asks for the server's capabilities, logs in when credentials
 * are given and signs off.
 */
import { MAIL_CLIENT_NAME } from "../../constants/defaults";
import type { MailSession } from "./mail-session";

export type MailProtocol = "smtp" | "imap" | "pop3";

/** The server answered, but not with what the protocol requires. */
export class MailProtocolError extends Error {
  constructor(
    message: string,
    readonly reply: string,
  ) {
    super(`${message}: ${reply}`);
    this.name = "MailProtocolError";
  }
}

/** Credentials were sent and the server turned them down. */
export class MailAuthError extends MailProtocolError {
  constructor(message: string, reply: string) {
    super(message, reply);
    this.name = "MailAuthError";
  }
}

export interface MailCredentials {
  username: string;
  password: string;
}

export interface HandshakeResult {
  greeting: string;
  /** Capability keywords, in the order the server listed them */
  capabilities: string[];
  details: Record<string, unknown>;
}

export interface SmtpReply {
  code: number;
  lines: string[];
}

/** Reads a possibly multi-line SMTP reply (`250-...` continues, `250 ...` ends). */
export async function readSmtpReply(session: MailSession): Promise<SmtpReply> {
  const lines: string[] = [];
  for (;;) {
    const line = await session.readLine();
    const match = /^(\d{3})([ -])?(.*)$/.exec(line);
    if (!match) {
      throw new MailProtocolError("Malformed SMTP reply", line);
    }
    lines.push(match[3] ?? "");
    if (match[2] !== "-") {
      return { code: Number(match[1]), lines };
    }
  }
}

function base64(value: string): string {
  return Buffer.from(value, "utf8").toString("base64");
}

function replyText(reply: SmtpReply): string {
  return `${reply.code} ${reply.lines.join(" ")}`;
}

/** AUTH PLAIN when offered or when no mechanism is listed, AUTH LOGIN otherwise. */
async function smtpLogin(session: MailSession, credentials: MailCredentials, mechanisms: string[]): Promise<string> {
  const usePlain = mechanisms.includes("PLAIN") || !mechanisms.includes("LOGIN");
  if (usePlain) {
    session.send(`AUTH PLAIN ${base64(`\0${credentials.username}\0${credentials.password}`)}`);
  } else {
    session.send("AUTH LOGIN");
    for (const answer of [credentials.username, credentials.password]) {
      const prompt = await readSmtpReply(session);
      if (prompt.code !== 334) {
        throw new MailAuthError("SMTP authentication failed", replyText(prompt));
      }
      session.send(base64(answer));
    }
  }
  const result = await readSmtpReply(session);
  if (result.code !== 235) {
    throw new MailAuthError("SMTP authentication failed", replyText(result));
  }
  return usePlain ? "PLAIN" : "LOGIN";
}

export async function smtpHandshake(session: MailSession, credentials?: MailCredentials): Promise<HandshakeResult> {
  const greeting = await readSmtpReply(session);
  if (greeting.code !== 220) {
    throw new MailProtocolError("SMTP server refused the connection", replyText(greeting));
  }

  session.send(`EHLO ${MAIL_CLIENT_NAME}`);
  const ehlo = await readSmtpReply(session);
  if (ehlo.code !== 250) {
    throw new MailProtocolError("SMTP server rejected EHLO", replyText(ehlo));
  }

  const extensions: Record<string, string> = {};
  for (const line of ehlo.lines.slice(1)) {
    const [keyword = "", ...params] = line.trim().split(/\s+/);
    if (keyword) extensions[keyword.toUpperCase()] = params.join(" ");
  }

  const details: Record<string, unknown> = {
    ehloCode: ehlo.code,
    ehloMessage: ehlo.lines.join("\n"),
    extensions,
    supportsTls: "STARTTLS" in extensions,
  };
  if (credentials) {
    const mechanisms = (extensions.AUTH ?? "").toUpperCase().split(/\s+/).filter(Boolean);
    details.authMechanism = await smtpLogin(session, credentials, mechanisms);
    details.authenticated = true;
  }

  await session.quit("QUIT");

  return {
    greeting: greeting.lines.join(" "),
    capabilities: Object.keys(extensions),
    details,
  };
}

/** IMAP quoted string */
function quoted(value: string): string {
  return `"${value.replace(/[\\"]/g, (char) => `\\${char}`)}"`;
}

/** Reads untagged lines until the tagged completion for `tag`. */
async function readTagged(session: MailSession, tag: string, onUntagged?: (line: string) => void): Promise<string> {
  for (;;) {
    const line = await session.readLine();
    if (line.startsWith(`${tag} `)) return line;
    onUntagged?.(line);
  }
}

export async function imapHandshake(session: MailSession, credentials?: MailCredentials): Promise<HandshakeResult> {
  const greeting = await session.readLine();
  if (!/^\* (OK|PREAUTH)\b/i.test(greeting)) {
    throw new MailProtocolError("IMAP server refused the connection", greeting);
  }

  session.send("A1 CAPABILITY");
  let capabilities: string[] = [];
  const completion = await readTagged(session, "A1", (line) => {
    const untagged = /^\* CAPABILITY (.*)$/i.exec(line);
    if (untagged) capabilities = (untagged[1] ?? "").trim().split(/\s+/);
  });
  if (!/^A1 OK\b/i.test(completion)) {
    throw new MailProtocolError("IMAP server rejected CAPABILITY", completion);
  }

  const details: Record<string, unknown> = { capabilities: capabilities.join(" ") };
  let logoutTag = "A2";
  if (credentials) {
    session.send(`A2 LOGIN ${quoted(credentials.username)} ${quoted(credentials.password)}`);
    const login = await readTagged(session, "A2");
    if (!/^A2 OK\b/i.test(login)) {
      throw new MailAuthError("IMAP login failed", login);
    }
    details.authenticated = true;
    logoutTag = "A3";
  }

  await session.quit(`${logoutTag} LOGOUT`);

  return { greeting, capabilities, details };
}

export async function pop3Handshake(session: MailSession, credentials?: MailCredentials): Promise<HandshakeResult> {
  const greeting = await session.readLine();
  if (!greeting.startsWith("+OK")) {
    throw new MailProtocolError("POP3 server refused the connection", greeting);
  }

  session.send("CAPA");
  const status = await session.readLine();
  const capabilities: string[] = [];
  const details: Record<string, unknown> = { welcomeMessage: greeting };
  if (status.startsWith("+OK")) {
    for (let line = await session.readLine(); line !== "."; line = await session.readLine()) {
      capabilities.push(line.startsWith("..") ? line.slice(1) : line);
    }
    details.capabilities = capabilities;
  } else {
    details.capabilitiesError = status;
  }

  if (credentials) {
    for (const command of [`USER ${credentials.username}`, `PASS ${credentials.password}`]) {
      session.send(command);
      const reply = await session.readLine();
      if (!reply.startsWith("+OK")) {
        throw new MailAuthError("POP3 login failed", reply);
      }
    }
    details.authenticated = true;
  }

  await session.quit("QUIT");

  return { greeting, capabilities, details };
}

export type Handshake = (session: MailSession, credentials?: MailCredentials) => Promise<HandshakeResult>;

export const HANDSHAKES: Record<MailProtocol, Handshake> = {
  smtp: smtpHandshake,
  imap: imapHandshake,
  pop3: pop3Handshake,
};

const NOTABLE_IMAP_CAPABILITIES = ["AUTH=", "STARTTLS", "IDLE", "UIDPLUS"];

/** Suffix appended to the success message describing what the server offers. */
export function describeCapabilities(protocol: MailProtocol, result: HandshakeResult): string {
  switch (protocol) {
    case "smtp":
      return result.capabilities.length > 0 ? `. Supports: ${result.capabilities.join(", ")}` : "";
    case "imap": {
      const notable = result.capabilities.filter((cap) =>
        NOTABLE_IMAP_CAPABILITIES.some((marker) => cap.toUpperCase().includes(marker)),
      );
      return notable.length > 0 ? `. Notable capabilities: ${notable.join(", ")}` : "";
    }
    case "pop3": {
      const welcome = result.greeting.replace(/^\+OK\s*/, "");
      let suffix = "";
      if (welcome) {
        suffix += `. Welcome: ${welcome.length > 50 ? `${welcome.slice(0, 47)}...` : welcome}`;
      }
      if (result.capabilities.length > 0) {
        suffix += ". Capabilities available";
      }
      return suffix;
    }
  }
}
