import { escapeHtml } from './escape.js';

export type MessageLevel = 'success' | 'notice' | 'error';

type MessagePart = { separator: string; message: Message | string };

/**
 * A user-facing message with `%s` / `%1$s` placeholders filled from its
 * params, and further messages appended after it.
 */
export class Message {
  private readonly params: string[] = [];
  private readonly appended: MessagePart[] = [];

  constructor(
    private readonly text: string,
    readonly level: MessageLevel = 'notice'
  ) {}

  static success(text = 'Your SQL query has been executed successfully.'): Message {
    return new Message(text, 'success');
  }

  static notice(text: string): Message {
    return new Message(text, 'notice');
  }

  static error(text: string): Message {
    return new Message(text, 'error');
  }

  /** Plain text appended as a message; escaped on output */
  static rawText(text: string, level: MessageLevel = 'notice'): Message {
    return new Message(escapeHtml(text).replaceAll('%', '%%'), level);
  }

  addParam(value: string | number): this {
    this.params.push(String(value));
    return this;
  }

  addMessage(message: Message | string, separator = ' '): this {
    this.appended.push({ separator, message });
    return this;
  }

  /** Appends escaped text */
  addText(text: string, separator = ' '): this {
    return this.addMessage(escapeHtml(text), separator);
  }

  /** Appends HTML as is */
  addHtml(html: string, separator = ' '): this {
    return this.addMessage(html, separator);
  }

  isError(): boolean {
    return this.level === 'error';
  }

  getMessage(): string {
    let sequential = 0;
    let message = this.text.replace(/%(?:(\d+)\$)?s|%%/g, (token, position: string | undefined) => {
      if (token === '%%') return '%';
      const index = position === undefined ? sequential++ : Number(position) - 1;
      return this.params[index] ?? '';
    });
    for (const part of this.appended) {
      const text = typeof part.message === 'string' ? part.message : part.message.getMessage();
      message += part.separator + text;
    }
    return message;
  }

  /** Alert markup */
  getDisplay(): string {
    const context = { success: 'success', notice: 'primary', error: 'danger' }[this.level];
    return `<div class="alert alert-${context}" role="alert">${this.getMessage()}</div>\n`;
  }
}
