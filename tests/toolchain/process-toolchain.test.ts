import { SpawnOptions } from 'child_process';
import { EventEmitter } from 'events';
import { promises as fs } from 'fs';
import path from 'path';
import { PipelineError } from '../../src/domain/errors';
import { VariantSpec } from '../../src/domain/variant';
import { ProcessToolchain, SpawnFn } from '../../src/toolchain/process-toolchain';
import { makeTempDir } from '../helpers/fake-toolchain';

/** Child process stand-in driven by the test. */
class FakeChild extends EventEmitter {
  readonly stderr = new EventEmitter();
  readonly signals: NodeJS.Signals[] = [];

  constructor(private readonly closeOn: NodeJS.Signals[] = ['SIGKILL']) {
    super();
  }

  kill(signal: NodeJS.Signals = 'SIGTERM'): boolean {
    this.signals.push(signal);
    if (this.closeOn.includes(signal)) {
      setImmediate(() => this.emit('close', null, signal));
    }
    return true;
  }
}

interface SpawnCall {
  command: string;
  args: readonly string[];
  options: SpawnOptions;
}

function recordingSpawn(onSpawn: (child: FakeChild, call: SpawnCall) => void, closeOn?: NodeJS.Signals[]) {
  const calls: SpawnCall[] = [];
  const children: FakeChild[] = [];
  const spawnFn: SpawnFn = (command, args, options) => {
    const child = new FakeChild(closeOn);
    const call = { command, args, options };
    calls.push(call);
    children.push(child);
    onSpawn(child, call);
    return child;
  };
  return { spawnFn, calls, children };
}

const variant: VariantSpec = {
  name: 'play-standard',
  channel: 'play',
  cryptoMode: 'standard',
  required: true,
  outputs: ['app.bin', 'app.map'],
  flags: { minify: 'true' },
  tags: [],
};

describe('ProcessToolchain', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  const request = (signal: AbortSignal = new AbortController().signal) => ({
    variant,
    workDir: root,
    outputDir: path.join(root, 'out'),
    dependencies: { files: [], metadata: { directory: '/deps' } },
    signal,
  });

  it('passes the variant through the environment and reports written outputs', async () => {
    const { spawnFn, calls } = recordingSpawn((child, call) => {
      const outDir = call.options.env?.VARIANT_OUTPUT_DIR ?? '';
      void fs.writeFile(path.join(outDir, 'app.bin'), 'built').then(() => child.emit('close', 0, null));
    });
    const toolchain = new ProcessToolchain({ identity: 'sdk@1', command: ['./build.sh', '--release'], killGraceMs: 10, spawnFn });

    const result = await toolchain.build(request());

    expect(calls[0].command).toBe('./build.sh');
    expect(calls[0].args).toEqual(['--release']);
    expect(calls[0].options.cwd).toBe(root);
    expect(calls[0].options.env).toMatchObject({
      VARIANT_NAME: 'play-standard',
      VARIANT_CHANNEL: 'play',
      VARIANT_CRYPTO_MODE: 'standard',
      VARIANT_FLAGS: '{"minify":"true"}',
      VARIANT_OUTPUTS: 'app.bin,app.map',
      VARIANT_OUTPUT_DIR: path.join(root, 'out'),
      DEPS_DIR: '/deps',
    });
    expect(result).toEqual({
      exitCode: 0,
      outputPaths: { 'app.bin': path.join(root, 'out', 'app.bin') },
      stderrTail: '',
    });
  });

  it('keeps only the tail of stderr from a failed build', async () => {
    const { spawnFn } = recordingSpawn((child) => {
      setImmediate(() => {
        child.stderr.emit('data', Buffer.from('first line\n'));
        child.stderr.emit('data', Buffer.from('error: boom'));
        child.emit('close', 2, null);
      });
    });
    const toolchain = new ProcessToolchain({ identity: 'sdk@1', command: ['make'], killGraceMs: 10, stderrTailBytes: 11, spawnFn });

    expect(await toolchain.build(request())).toEqual({ exitCode: 2, outputPaths: {}, stderrTail: 'error: boom' });
  });

  it('sends SIGTERM on abort and SIGKILL once the grace period passes', async () => {
    const { spawnFn, children } = recordingSpawn(() => undefined);
    const toolchain = new ProcessToolchain({ identity: 'sdk@1', command: ['make'], killGraceMs: 10, spawnFn });
    const controller = new AbortController();

    const pending = toolchain.build(request(controller.signal));
    await new Promise((resolve) => setImmediate(resolve));
    controller.abort();
    const result = await pending;

    expect(children[0].signals).toEqual(['SIGTERM', 'SIGKILL']);
    expect(result.exitCode).toBeNull();
  });

  it('does not escalate when the process stops on SIGTERM', async () => {
    const { spawnFn, children } = recordingSpawn(() => undefined, ['SIGTERM']);
    const toolchain = new ProcessToolchain({ identity: 'sdk@1', command: ['make'], killGraceMs: 10, spawnFn });
    const controller = new AbortController();

    const pending = toolchain.build(request(controller.signal));
    await new Promise((resolve) => setImmediate(resolve));
    controller.abort();
    await pending;
    await new Promise((resolve) => setTimeout(resolve, 30));

    expect(children[0].signals).toEqual(['SIGTERM']);
  });

  it('does not launch when already aborted', async () => {
    const { spawnFn, calls } = recordingSpawn(() => undefined);
    const toolchain = new ProcessToolchain({ identity: 'sdk@1', command: ['make'], killGraceMs: 10, spawnFn });
    const controller = new AbortController();
    controller.abort();

    await expect(toolchain.build(request(controller.signal))).rejects.toThrow('Not started: make was aborted before launch');
    expect(calls).toHaveLength(0);
  });

  it('rejects when the command cannot be spawned', async () => {
    const { spawnFn } = recordingSpawn((child) => {
      setImmediate(() => child.emit('error', new Error('spawn make ENOENT')));
    });
    const toolchain = new ProcessToolchain({ identity: 'sdk@1', command: ['make'], killGraceMs: 10, spawnFn });

    await expect(toolchain.build(request())).rejects.toThrow('spawn make ENOENT');
  });

  it('requires a command', () => {
    expect(() => new ProcessToolchain({ identity: 'sdk@1', command: [], killGraceMs: 10 })).toThrow(
      'ProcessToolchain requires a non-empty command',
    );
  });

  describe('resolveDependencies', () => {
    it('is a no-op without a dependency command', async () => {
      const { spawnFn, calls } = recordingSpawn(() => undefined);
      const toolchain = new ProcessToolchain({ identity: 'sdk@1', command: ['make'], killGraceMs: 10, spawnFn });

      const payload = await toolchain.resolveDependencies({ workDir: path.join(root, 'deps'), signal: new AbortController().signal });

      expect(payload).toEqual({ files: [], metadata: {} });
      expect(calls).toHaveLength(0);
    });

    it('runs the dependency command in the dependency directory', async () => {
      const { spawnFn, calls } = recordingSpawn((child) => setImmediate(() => child.emit('close', 0, null)));
      const toolchain = new ProcessToolchain({
        identity: 'sdk@1',
        command: ['make'],
        dependencyCommand: ['make', 'deps'],
        killGraceMs: 10,
        spawnFn,
      });
      const workDir = path.join(root, 'deps');

      const payload = await toolchain.resolveDependencies({ workDir, signal: new AbortController().signal });

      expect(calls[0].args).toEqual(['deps']);
      expect(calls[0].options.cwd).toBe(workDir);
      expect(payload.metadata).toEqual({ directory: workDir });
    });

    it('fails with a typed error when the dependency command fails', async () => {
      const { spawnFn } = recordingSpawn((child) => setImmediate(() => child.emit('close', 1, null)));
      const toolchain = new ProcessToolchain({
        identity: 'sdk@1',
        command: ['make'],
        dependencyCommand: ['make', 'deps'],
        killGraceMs: 10,
        spawnFn,
      });

      const err = await toolchain
        .resolveDependencies({ workDir: path.join(root, 'deps'), signal: new AbortController().signal })
        .catch((e: unknown) => e);

      expect(err).toBeInstanceOf(PipelineError);
      if (err instanceof PipelineError) {
        expect(err.typedError.code).toBe('BUILD.DEPENDENCIES_FAILED');
        expect(err.typedError.message).toBe('Dependency resolution exited with status 1');
      }
    });
  });
});
