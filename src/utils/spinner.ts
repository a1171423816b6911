/**
 * Text spinner for plain (non-clack) terminal output
 */

const FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];
const FRAME_INTERVAL_MS = 80;

export class Spinner {
  private intervalId: NodeJS.Timeout | null = null;
  private message: string;
  private currentFrame: number = 0;
  private readonly stream: NodeJS.WriteStream;

  constructor(message: string = 'Working...', stream: NodeJS.WriteStream = process.stdout) {
    this.message = message;
    this.stream = stream;
  }

  get isRunning(): boolean {
    return this.intervalId !== null;
  }

  start(): void {
    if (this.isRunning) {
      return;
    }

    // Not a terminal: one line, no animation
    if (!this.stream.isTTY) {
      this.stream.write(`… ${this.message}\n`);
      return;
    }

    this.currentFrame = 0;
    this.stream.write('\x1B[?25l');

    this.intervalId = setInterval(() => {
      const frame = FRAMES[this.currentFrame % FRAMES.length];
      this.stream.write(`\r${frame} ${this.message}`);
      this.currentFrame++;
    }, FRAME_INTERVAL_MS);
  }

  update(message: string): void {
    this.message = message;
  }

  stop(finalMessage?: string): void {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = null;
      this.stream.write('\r' + ' '.repeat(this.stream.columns || 80) + '\r');
      this.stream.write('\x1B[?25h');
    }

    if (finalMessage) {
      this.stream.write(`${finalMessage}\n`);
    }
  }
}
