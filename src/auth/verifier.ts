/**
 * Verifier entry
 *
 * The handshake hands the authorization URL to a VerifierSource and waits
 * for the code the user copies from the brokerage page. An empty or null
 * answer means the user cancelled. There is no built-in timeout; callers
 * that need one pass an AbortSignal.
 */

import { createInterface } from 'node:readline/promises';
import type { Readable, Writable } from 'node:stream';

export interface VerifierSource {
  requestVerifier(authorizationUrl: string, signal?: AbortSignal): Promise<string | null>;
}

interface ParkedRequest {
  authorizationUrl: string;
  settle: (verifier: string | null) => void;
}

/**
 * Parks the request until another part of the process (an MCP tool, the
 * OAuth callback route) submits or cancels it
 */
export class PendingVerifierSource implements VerifierSource {
  private parked: ParkedRequest | null = null;
  private promptWaiters: Set<(authorizationUrl: string) => void> = new Set();

  requestVerifier(authorizationUrl: string, signal?: AbortSignal): Promise<string | null> {
    if (this.parked) {
      return Promise.reject(new Error('An authorization request is already pending'));
    }

    return new Promise<string | null>((resolve) => {
      const onAbort = (): void => request.settle(null);
      const request: ParkedRequest = {
        authorizationUrl,
        settle: (verifier) => {
          if (this.parked === request) {
            this.parked = null;
          }
          signal?.removeEventListener('abort', onAbort);
          resolve(verifier);
        },
      };

      if (signal?.aborted) {
        resolve(null);
        return;
      }
      signal?.addEventListener('abort', onAbort, { once: true });
      this.parked = request;

      const waiters = [...this.promptWaiters];
      this.promptWaiters.clear();
      waiters.forEach((notify) => notify(authorizationUrl));
    });
  }

  /** Authorization URL awaiting a verifier, if any */
  pending(): string | null {
    return this.parked?.authorizationUrl ?? null;
  }

  /**
   * Resolve once an authorization URL is waiting for a verifier
   */
  nextPrompt(signal?: AbortSignal): Promise<string> {
    if (this.parked) {
      return Promise.resolve(this.parked.authorizationUrl);
    }
    return new Promise<string>((resolve, reject) => {
      const notify = (authorizationUrl: string): void => {
        signal?.removeEventListener('abort', onAbort);
        resolve(authorizationUrl);
      };
      const onAbort = (): void => {
        this.promptWaiters.delete(notify);
        reject(new Error('Stopped waiting for authorization prompt'));
      };
      if (signal?.aborted) {
        onAbort();
        return;
      }
      signal?.addEventListener('abort', onAbort, { once: true });
      this.promptWaiters.add(notify);
    });
  }

  /**
   * Deliver the verifier code. Returns false when nothing is pending.
   */
  submit(verifier: string): boolean {
    if (!this.parked) return false;
    this.parked.settle(verifier.trim());
    return true;
  }

  /**
   * Abandon the pending request. Returns false when nothing is pending.
   */
  cancel(): boolean {
    if (!this.parked) return false;
    this.parked.settle(null);
    return true;
  }
}

export interface ConsoleVerifierOptions {
  input?: Readable;
  output?: Writable;
}

/**
 * Prints the authorization URL and reads the code from a terminal
 */
export class ConsoleVerifierSource implements VerifierSource {
  private input: Readable;
  private output: Writable;

  constructor(options: ConsoleVerifierOptions = {}) {
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stdout;
  }

  async requestVerifier(authorizationUrl: string, signal?: AbortSignal): Promise<string | null> {
    const rl = createInterface({ input: this.input, output: this.output, terminal: false });
    try {
      this.output.write('\n--- E*TRADE API Authentication ---\n');
      this.output.write(`Open this URL in your browser and authorize the application:\n${authorizationUrl}\n`);
      const answer = await rl.question('Enter the verification code (blank to cancel): ', signal ? { signal } : {});
      return answer.trim() || null;
    } catch (error) {
      if (signal?.aborted) {
        return null;
      }
      throw error;
    } finally {
      rl.close();
    }
  }
}
