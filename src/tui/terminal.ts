import terminalKit from 'terminal-kit';
import { TerminalError, describeError } from '../cli/errors.js';

export type KeyListener = (name: string) => void;

/**
 * The part of terminal-kit's terminal the UI draws with.
 */
export interface Screen {
  readonly width: number;
  readonly height: number;
  write(text: string): void;
  bold(text: string): void;
  dim(text: string): void;
  inverse(text: string): void;
  red(text: string): void;
  yellow(text: string): void;
  green(text: string): void;
  cyan(text: string): void;
  styleReset(): void;
  clear(): void;
  moveTo(x: number, y: number): void;
  setCursorVisible(visible: boolean): void;
  fullscreen(enabled: boolean): void;
  grabInput(enabled: boolean): void;
  onKey(listener: KeyListener): void;
  offKey(listener: KeyListener): void;
}

export function createTerminalScreen(): Screen {
  const term = terminalKit.terminal;
  return {
    get width() {
      return term.width || process.stdout.columns || 80;
    },
    get height() {
      return term.height || process.stdout.rows || 24;
    },
    write: (text) => {
      term(text);
    },
    bold: (text) => {
      term.bold(text);
    },
    dim: (text) => {
      term.dim(text);
    },
    inverse: (text) => {
      term.inverse(text);
    },
    red: (text) => {
      term.red(text);
    },
    yellow: (text) => {
      term.yellow(text);
    },
    green: (text) => {
      term.green(text);
    },
    cyan: (text) => {
      term.cyan(text);
    },
    styleReset: () => {
      term.styleReset();
    },
    clear: () => {
      term.clear();
    },
    moveTo: (x, y) => {
      term.moveTo(x, y);
    },
    setCursorVisible: (visible) => {
      term.hideCursor(!visible);
    },
    fullscreen: (enabled) => {
      term.fullscreen(enabled);
    },
    grabInput: (enabled) => {
      term.grabInput(enabled);
    },
    onKey: (listener) => {
      term.on('key', listener);
    },
    offKey: (listener) => {
      term.removeListener('key', listener);
    },
  };
}

/**
 * Buffers key events so the run loop can poll with a timeout.
 */
export class KeyQueue {
  private readonly pending: string[] = [];
  private waiter: ((key: string | null) => void) | null = null;

  readonly push: KeyListener = (name) => {
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      waiter(name);
      return;
    }
    this.pending.push(name);
  };

  /** Drops keys that arrived while nobody was waiting. */
  discardPending(): void {
    this.pending.length = 0;
  }

  /** Resolves with the next key, or null when none arrives within `timeoutMs`. */
  next(timeoutMs: number): Promise<string | null> {
    const queued = this.pending.shift();
    if (queued !== undefined) return Promise.resolve(queued);

    return new Promise<string | null>((resolve) => {
      const timer = setTimeout(() => {
        this.waiter = null;
        resolve(null);
      }, timeoutMs);
      this.waiter = (key) => {
        clearTimeout(timer);
        resolve(key);
      };
    });
  }
}

export type SessionState = 'idle' | 'active' | 'suspended' | 'closed';

/**
 * Fullscreen terminal lifecycle: idle → active ⇄ suspended → closed.
 *
 * While suspended the screen is back in normal mode and keys are not grabbed,
 * so child processes own the terminal. `resume()` must be called to return to
 * the interactive display; a failure there is a TerminalError.
 */
export class TerminalSession {
  private state: SessionState = 'idle';
  private listening = false;
  readonly keys = new KeyQueue();

  constructor(private readonly screen: Screen) {}

  get current(): SessionState {
    return this.state;
  }

  start(): void {
    this.expect('idle', 'start');
    this.enter('start');
  }

  suspend(): void {
    this.expect('active', 'suspend');
    try {
      this.leave();
    } catch (error) {
      throw new TerminalError(`Failed to suspend terminal session: ${describeError(error)}`, { cause: error });
    }
    this.state = 'suspended';
  }

  resume(): void {
    this.expect('suspended', 'resume');
    this.enter('resume');
  }

  /**
   * Waits for Enter while suspended so the user can read command output.
   */
  async waitForAcknowledgement(prompt: string): Promise<void> {
    this.expect('suspended', 'wait for acknowledgement');
    this.keys.discardPending();
    this.screen.write(`\n${prompt}\n`);
    this.screen.grabInput(true);
    try {
      while ((await this.keys.next(60_000)) !== 'ENTER') {
        // keep waiting
      }
    } finally {
      this.screen.grabInput(false);
    }
  }

  /** Best-effort restore; safe to call in any state. */
  close(): void {
    if (this.state === 'closed') return;
    this.state = 'closed';
    if (!this.listening) return;
    this.listening = false;
    this.screen.offKey(this.keys.push);
    this.leave();
  }

  private enter(action: string): void {
    try {
      if (!this.listening) {
        this.screen.onKey(this.keys.push);
        this.listening = true;
      }
      this.screen.fullscreen(true);
      this.screen.grabInput(true);
      this.screen.setCursorVisible(false);
    } catch (error) {
      throw new TerminalError(`Failed to ${action} terminal session: ${describeError(error)}`, { cause: error });
    }
    this.state = 'active';
  }

  private leave(): void {
    this.screen.grabInput(false);
    this.screen.fullscreen(false);
    this.screen.setCursorVisible(true);
    this.screen.styleReset();
  }

  private expect(state: SessionState, action: string): void {
    if (this.state !== state) {
      throw new TerminalError(`Cannot ${action} terminal session while ${this.state}`);
    }
  }
}
