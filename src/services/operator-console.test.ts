// Path: src/services/operator-console.test.ts

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { PassThrough, Writable } from 'node:stream';
import { handleConsoleCommand, OperatorConsole, type ConsoleTarget } from './operator-console.js';
import { createRotationPolicy } from './cid-lifecycle/index.js';
import { SimulatedConnection } from '../lib/transport/simulated.js';
import { resetMetrics } from '../lib/metrics.js';

function createTarget(connections: SimulatedConnection[] = []) {
  const rotateAll = vi.fn(async () => ({ attempted: connections.length, succeeded: 1, failed: 1 }));
  const target: ConsoleTarget = {
    getStatus: () => ({
      running: true,
      engine: 'simulated',
      activeConnections: connections.length,
      policy: createRotationPolicy({ rotateIntervalSeconds: 10, jitterSeconds: 1, minGapSeconds: 5 }),
      tickIntervalMs: 200,
    }),
    listConnections: () => connections,
    rotateAll,
    currentCid: (id) => (id === 'conn-1' ? 'aabbccdd00112233' : null),
  };
  return { target, rotateAll };
}

async function run(line: string, target: ConsoleTarget): Promise<{ result: string; lines: string[] }> {
  const lines: string[] = [];
  const result = await handleConsoleCommand(line, target, (text) => lines.push(text));
  return { result, lines };
}

describe('handleConsoleCommand', () => {
  beforeEach(() => {
    resetMetrics();
  });

  it('should list commands for help and ?', async () => {
    const { target } = createTarget();
    const help = await run('help', target);
    const question = await run('?', target);

    expect(help.result).toBe('continue');
    expect(help.lines[0]).toBe('Commands:');
    expect(help.lines).toContain('  rotate, r          Force a connection ID rotation on every connection');
    expect(question.lines).toEqual(help.lines);
  });

  it('should print connection count and policy for status', async () => {
    const connections = [new SimulatedConnection('conn-1', '127.0.0.1:50001', 'none')];
    const { target } = createTarget(connections);

    expect((await run('status', target)).lines).toEqual([
      'Active connections: 1',
      'Policy: interval=10s jitter=1s minGap=5s resetGapOnFailure=true',
      'Tick interval: 200ms',
    ]);
  });

  it('should list connections with their current CID', async () => {
    const first = new SimulatedConnection('conn-1', '127.0.0.1:50001', 'none');
    const second = new SimulatedConnection('conn-2', '127.0.0.1:50002', 'none');
    const { target } = createTarget([first, second]);

    const { lines } = await run('conn', target);

    expect(lines).toEqual([
      `conn-1  127.0.0.1:50001  opened ${first.openedAt.toISOString()} cid=aabbccdd00112233`,
      `conn-2  127.0.0.1:50002  opened ${second.openedAt.toISOString()}`,
    ]);
    expect((await run('connections', target)).lines).toEqual(lines);
  });

  it('should say when there are no connections', async () => {
    const { target } = createTarget();
    expect((await run('connections', target)).lines).toEqual(['No active connections']);
  });

  it('should force rotation for rotate and r', async () => {
    const connections = [
      new SimulatedConnection('conn-1', '127.0.0.1:50001', 'none'),
      new SimulatedConnection('conn-2', '127.0.0.1:50002', 'none'),
    ];
    const { target, rotateAll } = createTarget(connections);

    expect((await run('rotate', target)).lines).toEqual(['Forced rotation on 2 connection(s): 1 ok, 1 failed']);
    await run('r', target);
    expect(rotateAll).toHaveBeenCalledTimes(2);
  });

  it('should quit for quit, exit and q', async () => {
    const { target } = createTarget();
    for (const command of ['quit', 'exit', 'q', 'QUIT']) {
      expect(await run(command, target)).toEqual({ result: 'quit', lines: ['Shutting down...'] });
    }
  });

  it('should print a usage hint for unknown input', async () => {
    const { target, rotateAll } = createTarget();
    expect(await run('  rotat  ', target)).toEqual({
      result: 'continue',
      lines: ['Unknown command: rotat. Type "help" for commands.'],
    });
    expect(rotateAll).not.toHaveBeenCalled();
  });

  it('should ignore blank lines', async () => {
    const { target } = createTarget();
    expect(await run('   ', target)).toEqual({ result: 'continue', lines: [] });
  });

  it('should print metrics in text format', async () => {
    const { target } = createTarget();
    const { lines } = await run('metrics', target);
    expect(lines.some((line) => line.startsWith('# HELP'))).toBe(true);
  });
});

describe('OperatorConsole', () => {
  function collectOutput(): { output: Writable; text: () => string } {
    const chunks: string[] = [];
    const output = new Writable({
      write(chunk: Buffer | string, _encoding, callback) {
        chunks.push(chunk.toString());
        callback();
      },
    });
    return { output, text: () => chunks.join('') };
  }

  it('should run commands in order and call onQuit on quit', async () => {
    const input = new PassThrough();
    const { output, text } = collectOutput();
    const { target } = createTarget();
    let quit: () => void = () => undefined;
    const quitCalled = new Promise<void>((resolve) => {
      quit = resolve;
    });
    const onQuit = vi.fn(() => quit());

    const operatorConsole = new OperatorConsole({ target, input, output, onQuit });
    operatorConsole.start();
    input.write('status\n');
    input.write('quit\n');
    input.write('status\n');
    await quitCalled;
    await operatorConsole.drain();

    expect(onQuit).toHaveBeenCalledTimes(1);
    expect(text()).toBe([
      'Operator console ready. Type "help" for commands.',
      'Active connections: 0',
      'Policy: interval=10s jitter=1s minGap=5s resetGapOnFailure=true',
      'Tick interval: 200ms',
      'Shutting down...',
      '',
    ].join('\n'));
  });

  it('should quit when input ends', async () => {
    const input = new PassThrough();
    const { output } = collectOutput();
    const { target } = createTarget();
    let quit: () => void = () => undefined;
    const quitCalled = new Promise<void>((resolve) => {
      quit = resolve;
    });
    const onQuit = vi.fn(() => quit());

    const operatorConsole = new OperatorConsole({ target, input, output, onQuit });
    operatorConsole.start();
    input.end();
    await quitCalled;

    expect(onQuit).toHaveBeenCalledTimes(1);
  });

  it('should report a failing command and keep reading', async () => {
    const input = new PassThrough();
    const { output, text } = collectOutput();
    const { target, rotateAll } = createTarget();
    rotateAll.mockRejectedValueOnce(new Error('disk full'));
    let quit: () => void = () => undefined;
    const quitCalled = new Promise<void>((resolve) => {
      quit = resolve;
    });

    const operatorConsole = new OperatorConsole({ target, input, output, onQuit: () => quit() });
    operatorConsole.start();
    input.write('rotate\n');
    input.write('q\n');
    await quitCalled;

    expect(text()).toContain('Command failed: Error: disk full\n');
    expect(text()).toContain('Shutting down...\n');
  });
});
