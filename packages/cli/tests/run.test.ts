import { describe, expect, it } from 'vitest';
import { USAGE } from '../src/args.js';
import { run, type CliIO } from '../src/run.js';

function capture(env: NodeJS.ProcessEnv = {}): CliIO & { stdout: string[]; stderr: string[] } {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    stdout,
    stderr,
    env,
    out: (line) => stdout.push(line),
    err: (line) => stderr.push(line),
  };
}

describe('run', () => {
  it('prints usage for --help', async () => {
    const io = capture();

    await expect(run(['--help'], io)).resolves.toBe(0);
    expect(io.stdout).toEqual([USAGE]);
  });

  it('exits 64 on a usage error', async () => {
    const io = capture();

    await expect(run(['verify', '-t', 'orders'], io)).resolves.toBe(64);
    expect(io.stderr).toEqual(['Error: Missing required option(s): -d, -a, -o, -m', USAGE]);
  });

  it('exits 2 when the configuration cannot be loaded', async () => {
    const io = capture({ VERIFICATION_RETRY_ATTEMPTS: '0' });

    await expect(run(['report', '-o', '20250101'], io)).resolves.toBe(2);
    expect(io.stderr).toHaveLength(1);
    expect(io.stderr[0]).toMatch(/^Error: Invalid configuration:\n- verification\.retryAttempts: /);
  });
});
