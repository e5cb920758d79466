import { EventEmitter } from 'node:events';
import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { PassThrough, Writable } from 'node:stream';
import pino from 'pino';
import {
  JvmServerLauncher,
  NoopBootstrap,
  SERVER_CLASS,
  buildClasspath,
  buildJavaArgs,
  type LauncherOptions,
} from '../../../src/core/bootstrap.js';
import { BootstrapError } from '../../../src/core/errors.js';

class FakeServer extends EventEmitter {
  stdout = new PassThrough();
  stderr = new PassThrough();
  kill = jest.fn((_signal?: NodeJS.Signals) => true);
}

const tick = () => new Promise((resolve) => setImmediate(resolve));

describe('JVM bootstrap', () => {
  describe('command line', () => {
    it('builds the server command', () => {
      const args = buildJavaArgs({
        jarPath: '/opt/corenlp',
        jvmArgs: ['-Xms512M', '-Xmx1024M'],
        port: 9000,
        timeoutMs: 15000,
      });
      expect(args).toEqual([
        '-Xms512M',
        '-Xmx1024M',
        '-cp',
        path.join('/opt/corenlp', '*'),
        SERVER_CLASS,
        '-port',
        '9000',
        '-timeout',
        '15000',
      ]);
    });

    it('joins listed jars with the platform delimiter', () => {
      expect(buildClasspath('/opt/corenlp', ['stanford-corenlp.jar', 'joda-time.jar'])).toBe(
        [path.join('/opt/corenlp', 'stanford-corenlp.jar'), path.join('/opt/corenlp', 'joda-time.jar')].join(
          path.delimiter,
        ),
      );
    });
  });

  describe('JvmServerLauncher', () => {
    let fetchSpy: jest.SpyInstance<ReturnType<typeof fetch>, Parameters<typeof fetch>>;
    let servers: FakeServer[];
    let spawnServer: jest.Mock<FakeServer, [string, string[]]>;

    const launcher = (overrides: Partial<LauncherOptions> = {}) =>
      new JvmServerLauncher({
        jarPath: '/opt/corenlp',
        jvmArgs: ['-Xmx1g'],
        port: 9100,
        timeoutMs: 1000,
        startTimeoutMs: 200,
        pollIntervalMs: 5,
        spawnServer,
        ...overrides,
      });

    beforeEach(() => {
      servers = [];
      spawnServer = jest.fn((_command: string, _args: string[]) => {
        const server = new FakeServer();
        servers.push(server);
        return server;
      });
      fetchSpy = jest.spyOn(globalThis, 'fetch');
    });

    afterEach(() => {
      fetchSpy.mockRestore();
    });

    it('starts the server once for concurrent callers', async () => {
      fetchSpy.mockImplementation(async () => new Response('live', { status: 200 }));
      const boot = launcher();

      await Promise.all([boot.ensureStarted(), boot.ensureStarted()]);
      await boot.ensureStarted();

      expect(spawnServer).toHaveBeenCalledTimes(1);
      expect(spawnServer.mock.calls[0]?.[0]).toBe('java');
      expect(spawnServer.mock.calls[0]?.[1]).toContain(SERVER_CLASS);
      expect(fetchSpy.mock.calls[0]?.[0]).toBe('http://localhost:9100/live');
      expect(boot.started).toBe(true);
    });

    it('fails when the JVM exits before it is live, then retries on the next call', async () => {
      fetchSpy.mockRejectedValue(new TypeError('fetch failed'));
      spawnServer.mockImplementationOnce(() => {
        const server = new FakeServer();
        servers.push(server);
        setImmediate(() => server.emit('exit', 1));
        return server;
      });
      const boot = launcher();

      await expect(boot.ensureStarted()).rejects.toThrow('CoreNLP server exited with code 1');
      expect(boot.started).toBe(false);

      fetchSpy.mockImplementation(async () => new Response('live', { status: 200 }));
      await boot.ensureStarted();
      expect(spawnServer).toHaveBeenCalledTimes(2);
    });

    it('gives up and kills the JVM after the start timeout', async () => {
      fetchSpy.mockImplementation(async () => new Response('starting', { status: 503 }));
      const boot = launcher({ startTimeoutMs: 30 });

      const err = await boot.ensureStarted().catch((e: unknown) => e);

      expect(err).toBeInstanceOf(BootstrapError);
      expect(err instanceof Error && err.message).toBe('CoreNLP server did not come up within 30ms');
      expect(servers[0]?.kill).toHaveBeenCalledWith('SIGTERM');
    });

    it('wraps spawn failures', async () => {
      spawnServer.mockImplementationOnce(() => {
        throw new Error('ENOENT');
      });

      await expect(launcher({ javaCommand: '/no/java' }).ensureStarted()).rejects.toThrow('Could not launch /no/java');
    });

    it('stops the running server', async () => {
      fetchSpy.mockImplementation(async () => new Response('live', { status: 200 }));
      const boot = launcher();
      await boot.ensureStarted();

      boot.stop();

      expect(servers[0]?.kill).toHaveBeenCalledWith('SIGTERM');
      expect(boot.started).toBe(false);
    });

    it('forwards server output to the logger', async () => {
      const lines: string[] = [];
      const sink = new Writable({
        write(chunk: Buffer, _enc, done) {
          lines.push(chunk.toString());
          done();
        },
      });
      fetchSpy.mockImplementation(async () => new Response('live', { status: 200 }));
      const boot = launcher({ log: pino({ level: 'debug' }, sink) });
      await boot.ensureStarted();

      servers[0]?.stderr.write('[main] INFO CoreNLP - StanfordCoreNLPServer listening\n');
      await tick();

      const entries: unknown[] = lines.map((l) => JSON.parse(l));
      expect(entries).toContainEqual(
        expect.objectContaining({
          source: 'corenlp-server',
          msg: '[main] INFO CoreNLP - StanfordCoreNLPServer listening',
        }),
      );
    });
  });

  describe('server log file', () => {
    let dir: string;
    let fetchSpy: jest.SpyInstance<ReturnType<typeof fetch>, Parameters<typeof fetch>>;
    let servers: FakeServer[];
    const spawnServer = () => {
      const server = new FakeServer();
      servers.push(server);
      return server;
    };

    beforeEach(() => {
      dir = mkdtempSync(path.join(os.tmpdir(), 'corenlp-log-'));
      servers = [];
      fetchSpy = jest.spyOn(globalThis, 'fetch').mockImplementation(async () => new Response('live', { status: 200 }));
    });

    afterEach(() => {
      fetchSpy.mockRestore();
      rmSync(dir, { recursive: true, force: true });
    });

    const launcher = (logFile: string) =>
      new JvmServerLauncher({
        jarPath: '/opt/corenlp',
        jvmArgs: [],
        port: 9100,
        timeoutMs: 1000,
        startTimeoutMs: 200,
        pollIntervalMs: 5,
        logFile,
        spawnServer,
      });

    it('refuses to start when the log file cannot be opened', async () => {
      const logFile = path.join(dir, 'missing', 'corenlp.log');

      const err = await launcher(logFile).ensureStarted().catch((e: unknown) => e);

      expect(err).toBeInstanceOf(BootstrapError);
      expect(err instanceof Error && err.message).toBe(`Could not open server log ${logFile}`);
      expect(servers).toHaveLength(0);
    });

    it('appends server output to the log file', async () => {
      const logFile = path.join(dir, 'corenlp.log');
      const boot = launcher(logFile);
      await boot.ensureStarted();

      servers[0]?.stdout.write('StanfordCoreNLPServer listening at /0:0:0:0:0:0:0:0:9100\n');
      await tick();
      boot.stop();

      for (let i = 0; i < 100 && readFileSync(logFile, 'utf8') === ''; i++) {
        await new Promise((resolve) => setTimeout(resolve, 10));
      }
      expect(readFileSync(logFile, 'utf8')).toBe('StanfordCoreNLPServer listening at /0:0:0:0:0:0:0:0:9100\n');
    });
  });

  it('has a no-op bootstrap for external servers', async () => {
    await expect(new NoopBootstrap().ensureStarted()).resolves.toBeUndefined();
  });
});
