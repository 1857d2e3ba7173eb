/**
 * Line-oriented client session for text mail protocols (SMTP, IMAP, POP3).
 */
import net from "node:net";
import tls from "node:tls";

export interface MailSessionOptions {
  host: string;
  port: number;
  useSsl: boolean;
  /** Destroys the connection when aborted */
  signal: AbortSignal;
}

type LineWaiter = {
  resolve: (line: string | undefined) => void;
  reject: (err: Error) => void;
};

export class MailSession {
  private buffer = "";
  private readonly lines: string[] = [];
  private readonly waiters: LineWaiter[] = [];
  private failure?: Error;
  private closed = false;

  private constructor(
    private readonly socket: net.Socket,
    private readonly signal: AbortSignal,
  ) {
    socket.setEncoding("utf8");
    socket.on("data", (chunk: string) => this.onData(chunk));
    socket.on("error", (err) => this.fail(err));
    socket.on("close", () => this.onClose());
    signal.addEventListener("abort", this.onAbort, { once: true });
  }

  /** Connected peer address, once connected */
  get remoteAddress(): string | undefined {
    return this.socket.remoteAddress;
  }

  static connect(options: MailSessionOptions): Promise<MailSession> {
    return new Promise<MailSession>((resolve, reject) => {
      if (options.signal.aborted) {
        reject(abortError(options.signal));
        return;
      }
      const connectEvent = options.useSsl ? "secureConnect" : "connect";
      const socket = options.useSsl
        ? tls.connect({ host: options.host, port: options.port, servername: options.host })
        : net.connect({ host: options.host, port: options.port });

      const onAbort = (): void => {
        socket.destroy();
        reject(abortError(options.signal));
      };
      const onError = (err: Error): void => {
        options.signal.removeEventListener("abort", onAbort);
        socket.destroy();
        reject(err);
      };

      options.signal.addEventListener("abort", onAbort, { once: true });
      socket.once("error", onError);
      socket.once(connectEvent, () => {
        options.signal.removeEventListener("abort", onAbort);
        socket.off("error", onError);
        resolve(new MailSession(socket, options.signal));
      });
    });
  }

  send(command: string): void {
    this.socket.write(`${command}\r\n`);
  }

  /**
   * Next line from the server, without its line ending.
   * @throws Error if the connection closes or fails first
   */
  async readLine(): Promise<string> {
    const line = await this.nextLine();
    if (line === undefined) {
      throw new Error("Connection closed by server");
    }
    return line;
  }

  /**
   * Send a closing command and wait for the server's reply or for it to
   * hang up, whichever comes first. Always releases the socket.
   */
  async quit(command: string): Promise<string | undefined> {
    if (this.closed || this.failure) {
      this.close();
      return undefined;
    }
    this.send(command);
    try {
      return await this.nextLine();
    } finally {
      this.close();
    }
  }

  close(): void {
    this.signal.removeEventListener("abort", this.onAbort);
    this.socket.end();
    this.socket.destroy();
  }

  private nextLine(): Promise<string | undefined> {
    const buffered = this.lines.shift();
    if (buffered !== undefined) return Promise.resolve(buffered);
    if (this.failure) return Promise.reject(this.failure);
    if (this.closed) return Promise.resolve(undefined);
    return new Promise((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  private onData(chunk: string): void {
    this.buffer += chunk;
    let newline = this.buffer.indexOf("\n");
    while (newline !== -1) {
      const line = this.buffer.slice(0, newline).replace(/\r$/, "");
      this.buffer = this.buffer.slice(newline + 1);
      const waiter = this.waiters.shift();
      if (waiter) waiter.resolve(line);
      else this.lines.push(line);
      newline = this.buffer.indexOf("\n");
    }
  }

  private onClose(): void {
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      if (this.failure) waiter.reject(this.failure);
      else waiter.resolve(undefined);
    }
  }

  private fail(err: Error): void {
    this.failure ??= err;
    for (const waiter of this.waiters.splice(0)) {
      waiter.reject(err);
    }
  }

  private readonly onAbort = (): void => {
    this.fail(abortError(this.signal));
    this.socket.destroy();
  };
}

function abortError(signal: AbortSignal): Error {
  const reason: unknown = signal.reason;
  if (reason instanceof Error) {
    return new Error(`Connection aborted: ${reason.message}`);
  }
  return new Error("Connection aborted");
}
