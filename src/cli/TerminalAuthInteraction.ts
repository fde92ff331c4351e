import prompts from 'prompts';
import { Readable, Writable } from 'stream';
import { AuthInteraction, LoginRequest } from '../download/core/types';

interface Question {
  type: 'text' | 'password';
  message: string;
  initial?: string;
}

/**
 * AuthInteraction driven from the terminal
 */
export class TerminalAuthInteraction implements AuthInteraction {
  private readonly label: string;
  private readonly input: Readable;
  private readonly output: Writable;

  constructor(label: string, options: { input?: Readable; output?: Writable } = {}) {
    this.label = label;
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stdout;
  }

  async requestCredentials(prefill: { username?: string; sessionFile?: string }): Promise<LoginRequest | null> {
    const answered = await this.ask({ type: 'text', message: `${this.label} username`, initial: prefill.username });
    const username = answered === null ? '' : answered || prefill.username || '';
    if (!username) {
      return null;
    }

    const sessionFile = await this.ask({ type: 'text', message: 'Session file to import (blank to log in with a password)' });
    if (sessionFile === null) {
      return null;
    }
    if (sessionFile) {
      return { username, sessionFile };
    }

    const password = await this.ask({ type: 'password', message: 'Password' });
    if (password === null) {
      return null;
    }
    return { username, password: password || undefined };
  }

  async requestTwoFactorCode(username: string): Promise<string | null> {
    const code = await this.ask({ type: 'text', message: `Verification code for ${username} (blank to cancel)` });
    return code || null;
  }

  async requestExportPath(): Promise<string | null> {
    const exportPath = await this.ask({ type: 'text', message: 'Save a copy of the session to (optional)' });
    return exportPath || null;
  }

  reportError(message: string): void {
    this.output.write(`Error: ${message}\n`);
  }

  /**
   * Trimmed answer, or null when the prompt was cancelled
   */
  private async ask(question: Question): Promise<string | null> {
    let cancelled = false;
    const response = await prompts(
      { ...question, name: 'value', stdin: this.input, stdout: this.output },
      {
        onCancel: () => {
          cancelled = true;
        },
      },
    );
    if (cancelled) {
      return null;
    }
    const value: unknown = response.value;
    return typeof value === 'string' ? value.trim() : '';
  }
}
