import { EventEmitter } from 'events';
import { createInterface } from 'readline';
import { PassThrough } from 'stream';

export interface FakeGtpOptions {
  name?: string;
  version?: string;
  /** kata-analyze report lines, emitted one per tick */
  reports?: string[];
  reportDelayMs?: number;
  /** Command word -> GTP error text */
  failures?: Record<string, string>;
  /** Never answer anything */
  silent?: boolean;
  /** Keep running after quit */
  ignoreQuit?: boolean;
}

/**
 * In-process stand-in for a KataGo GTP process
 */
export class FakeGtpProcess extends EventEmitter {
  readonly stdin = new PassThrough();
  readonly stdout = new PassThrough();
  readonly received: string[] = [];
  killed = false;

  private analysis: NodeJS.Timeout | null = null;
  private exited = false;

  constructor(private readonly options: FakeGtpOptions = {}) {
    super();
    createInterface({ input: this.stdin }).on('line', (line: string) => this.handle(line.trim()));
  }

  kill(): boolean {
    this.killed = true;
    this.exit(null, 'SIGTERM');
    return true;
  }

  private exit(code: number | null, signal: string | null): void {
    if (this.exited) return;
    this.exited = true;
    this.stopAnalysis();
    this.emit('exit', code, signal);
  }

  private stopAnalysis(): void {
    if (this.analysis) {
      clearInterval(this.analysis);
      this.analysis = null;
      this.stdout.write('\n');
    }
  }

  private reply(text: string): void {
    this.stdout.write(text ? `= ${text}\n\n` : '=\n\n');
  }

  private handle(command: string): void {
    if (this.exited) return;
    this.received.push(command);
    this.stopAnalysis();
    if (this.options.silent) return;

    const word = command.split(' ')[0] ?? '';
    const failure = this.options.failures?.[word];
    if (failure !== undefined) {
      this.stdout.write(`? ${failure}\n\n`);
      return;
    }

    switch (word) {
      case 'name':
        this.reply(this.options.name ?? 'KataGo');
        break;
      case 'version':
        this.reply(this.options.version ?? '1.15.3');
        break;
      case 'protocol_version':
        this.reply('2');
        break;
      case 'quit':
        this.reply('');
        if (!this.options.ignoreQuit) {
          setImmediate(() => this.exit(0, null));
        }
        break;
      case 'kata-analyze': {
        this.stdout.write('=\n');
        const reports = [...(this.options.reports ?? [])];
        this.analysis = setInterval(() => {
          const next = reports.shift();
          if (next !== undefined) {
            this.stdout.write(`${next}\n`);
          }
        }, this.options.reportDelayMs ?? 2);
        break;
      }
      default:
        this.reply('');
    }
  }
}
