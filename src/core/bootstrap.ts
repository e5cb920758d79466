import { spawn } from 'node:child_process';
import { once } from 'node:events';
import { createWriteStream, type WriteStream } from 'node:fs';
import path from 'node:path';
import { setTimeout as delay } from 'node:timers/promises';
import type pino from 'pino';
import { requestText } from '../util/fetch.js';
import { BootstrapError } from './errors.js';

export const SERVER_CLASS = 'edu.stanford.nlp.pipeline.StanfordCoreNLPServer';

/** Brings the engine up before the first pipeline is built. */
export interface Bootstrap {
  ensureStarted(): Promise<void>;
}

export class NoopBootstrap implements Bootstrap {
  async ensureStarted(): Promise<void> {}
}

/** The part of a child process the launcher relies on. */
export interface ServerProcess {
  readonly stdout: NodeJS.ReadableStream | null;
  readonly stderr: NodeJS.ReadableStream | null;
  once(event: 'exit', listener: (code: number | null) => void): this;
  once(event: 'error', listener: (err: Error) => void): this;
  kill(signal?: NodeJS.Signals): boolean;
}

export type SpawnServer = (command: string, args: string[]) => ServerProcess;

const spawnJava: SpawnServer = (command, args) =>
  spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });

export interface LauncherOptions {
  jarPath: string;
  jars?: string[];
  jvmArgs: string[];
  port: number;
  timeoutMs: number;
  startTimeoutMs: number;
  host?: string;
  javaCommand?: string;
  logFile?: string;
  pollIntervalMs?: number;
  spawnServer?: SpawnServer;
  log?: pino.Logger;
}

export function buildClasspath(jarPath: string, jars: readonly string[] = ['*']): string {
  return jars.map((jar) => path.join(jarPath, jar)).join(path.delimiter);
}

export function buildJavaArgs(opts: Pick<LauncherOptions, 'jarPath' | 'jars' | 'jvmArgs' | 'port' | 'timeoutMs'>): string[] {
  return [
    ...opts.jvmArgs,
    '-cp',
    buildClasspath(opts.jarPath, opts.jars),
    SERVER_CLASS,
    '-port',
    String(opts.port),
    '-timeout',
    String(opts.timeoutMs),
  ];
}

/**
 * Starts a StanfordCoreNLPServer JVM once and waits for it to answer on
 * /live. Concurrent callers share the same start attempt; a failed start
 * is forgotten so the next call tries again.
 */
export class JvmServerLauncher implements Bootstrap {
  private readonly opts: LauncherOptions;
  private starting: Promise<void> | null = null;
  private child: ServerProcess | null = null;
  private logStream: WriteStream | null = null;

  constructor(opts: LauncherOptions) {
    this.opts = opts;
  }

  get started(): boolean {
    return this.child !== null;
  }

  ensureStarted(): Promise<void> {
    if (!this.starting) {
      this.starting = this.start().catch((err: unknown) => {
        this.starting = null;
        throw err;
      });
    }
    return this.starting;
  }

  stop(): void {
    if (this.child) {
      this.child.kill('SIGTERM');
      this.child = null;
      this.starting = null;
    }
    this.closeLog();
  }

  private async start(): Promise<void> {
    const { log } = this.opts;
    const command = this.opts.javaCommand ?? 'java';
    const args = buildJavaArgs(this.opts);
    log?.info({ command, port: this.opts.port }, 'CoreNLP: starting server');

    if (this.opts.logFile) this.logStream = await openLog(this.opts.logFile, log);

    const spawnServer = this.opts.spawnServer ?? spawnJava;
    let child: ServerProcess;
    try {
      child = spawnServer(command, args);
    } catch (e) {
      this.closeLog();
      throw new BootstrapError(`Could not launch ${command}`, { cause: e });
    }
    this.forwardOutput(child);

    const state: { exited: Error | null } = { exited: null };
    child.once('exit', (code) => {
      state.exited = new BootstrapError(`CoreNLP server exited with code ${code}`);
      if (this.child === child) {
        this.child = null;
        this.starting = null;
      }
    });
    child.once('error', (err) => {
      state.exited = new BootstrapError(`CoreNLP server failed: ${err.message}`, { cause: err });
    });

    const host = this.opts.host ?? 'localhost';
    const liveUrl = `http://${host}:${this.opts.port}/live`;
    const interval = this.opts.pollIntervalMs ?? 500;
    const deadline = Date.now() + this.opts.startTimeoutMs;

    let lastError: unknown = null;
    while (Date.now() < deadline) {
      if (state.exited) {
        this.closeLog();
        throw state.exited;
      }
      try {
        const res = await requestText(liveUrl, { timeoutMs: interval * 2 });
        if (res.ok) {
          this.child = child;
          log?.info({ port: this.opts.port }, 'CoreNLP: server is live');
          return;
        }
      } catch (e) {
        lastError = e;
      }
      await delay(interval);
    }

    child.kill('SIGTERM');
    this.closeLog();
    throw (
      state.exited ??
      new BootstrapError(`CoreNLP server did not come up within ${this.opts.startTimeoutMs}ms`, { cause: lastError })
    );
  }

  private forwardOutput(child: ServerProcess): void {
    const streams = [child.stdout, child.stderr].filter((s): s is NodeJS.ReadableStream => s !== null);
    const file = this.logStream;
    if (file) {
      for (const stream of streams) stream.pipe(file, { end: false });
      return;
    }
    const { log } = this.opts;
    for (const stream of streams) {
      if (!log) {
        stream.resume();
        continue;
      }
      stream.on('data', (chunk: Buffer | string) => {
        const line = chunk.toString().trim();
        if (line) log.debug({ source: 'corenlp-server' }, line);
      });
    }
  }

  private closeLog(): void {
    this.logStream?.end();
    this.logStream = null;
  }
}

async function openLog(file: string, log?: pino.Logger): Promise<WriteStream> {
  const stream = createWriteStream(file, { flags: 'a' });
  try {
    await once(stream, 'open');
  } catch (e) {
    throw new BootstrapError(`Could not open server log ${file}`, { cause: e });
  }
  stream.on('error', (err) => log?.warn({ err, file }, 'CoreNLP: server log write failed'));
  return stream;
}
