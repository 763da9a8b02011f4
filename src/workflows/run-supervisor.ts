import { spawn } from 'child_process';
import type { ChildProcess } from 'child_process';
import readline from 'readline';
import type { Readable } from 'stream';
import { setTimeout as sleep } from 'timers/promises';
import type { Logger } from 'pino';
import type { PlatformId } from '../types/upload.js';

export type OutputMessage = { type: 'output'; stream: 'stdout' | 'stderr'; line: string };
export type TerminalMessage = { type: 'completed'; code: number } | { type: 'failed'; error: string };
export type SupervisorMessage = OutputMessage | TerminalMessage;

export interface RunSupervisorOptions {
  command: string;
  args: string[];
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  logger: Logger;
}

export interface UploadCommandOptions {
  startDate?: string;
  timezone?: string;
  hourSlots?: number[];
  categoryId?: string;
  description?: string;
  tags?: string[];
  dryRun?: boolean;
  platforms?: PlatformId[];
  targets?: PlatformId[];
}

/** CLI arguments for the `upload` command; options left unset fall back to config.json. */
export function buildUploadArgs(options: UploadCommandOptions): string[] {
  const args = ['upload'];
  if (options.startDate) args.push('--start-date', options.startDate);
  if (options.timezone) args.push('--timezone', options.timezone);
  if (options.hourSlots?.length) args.push('--hour-slots', ...options.hourSlots.map(String));
  if (options.categoryId) args.push('--category-id', options.categoryId);
  if (options.description) args.push('--description', options.description);
  if (options.tags?.length) args.push('--tags', options.tags.join(','));
  if (options.platforms?.length) args.push('--platforms', ...options.platforms);
  if (options.targets?.length) args.push('--targets', ...options.targets);
  if (options.dryRun) args.push('--dry-run');
  return args;
}

/**
 * Runs an upload in a child process and relays its output as a queue of
 * line messages, closed by exactly one `completed` or `failed` message.
 * Consumers drain the queue on their own schedule; nothing here blocks.
 */
export class RunSupervisor {
  private readonly queue: SupervisorMessage[] = [];
  private child: ChildProcess | null = null;
  private finished = false;

  constructor(private readonly options: RunSupervisorOptions) {}

  get running(): boolean {
    return this.child !== null && !this.finished;
  }

  start(): void {
    if (this.child) throw new Error('Run already started');
    const { command, args, cwd, env, logger } = this.options;

    logger.info({ command, args }, 'Starting supervised run');
    const child = spawn(command, args, { cwd, env, stdio: ['ignore', 'pipe', 'pipe'] });
    this.child = child;

    let openStreams = 0;
    let exit: TerminalMessage | null = null;
    const settle = () => {
      if (exit && openStreams === 0) this.finish(exit);
    };

    const relay = (stream: Readable | null, name: OutputMessage['stream']) => {
      if (!stream) return;
      openStreams++;
      const rl = readline.createInterface({ input: stream, crlfDelay: Infinity });
      rl.on('line', (line) => this.queue.push({ type: 'output', stream: name, line }));
      rl.on('close', () => {
        openStreams--;
        settle();
      });
    };
    relay(child.stdout, 'stdout');
    relay(child.stderr, 'stderr');

    child.on('error', (error) => {
      logger.error({ error: error.message }, 'Supervised run failed to start');
      this.finish({ type: 'failed', error: error.message });
    });
    child.on('close', (code, signal) => {
      exit = code !== null ? { type: 'completed', code } : { type: 'failed', error: `Terminated by ${signal ?? 'signal'}` };
      settle();
    });
  }

  /** Every message queued since the last drain, oldest first. */
  drain(): SupervisorMessage[] {
    return this.queue.splice(0, this.queue.length);
  }

  /** Drain every `intervalMs` until the terminal message, which is returned. */
  async poll(onMessage: (message: SupervisorMessage) => void, intervalMs = 100): Promise<TerminalMessage> {
    for (;;) {
      for (const message of this.drain()) {
        onMessage(message);
        if (message.type !== 'output') return message;
      }
      await sleep(intervalMs);
    }
  }

  /** Kills the process; the current file is left unmarked and retried next run. */
  terminate(signal: NodeJS.Signals = 'SIGTERM'): boolean {
    if (!this.child || this.finished) return false;
    this.options.logger.warn({ signal }, 'Terminating supervised run');
    return this.child.kill(signal);
  }

  private finish(message: TerminalMessage): void {
    if (this.finished) return;
    this.finished = true;
    this.queue.push(message);
    this.options.logger.info({ result: message }, 'Supervised run finished');
  }
}
