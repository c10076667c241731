import { CommandOutcome, CommandRunner } from '../src/diagnostics/command-runner';
import { parseLatency, pingArgs, ReachabilityProbe } from '../src/diagnostics/reachability';
import { ProbeUnavailableError } from '../src/types/errors';
import { makeLogger } from './helpers';

function runnerReturning(outcome: CommandOutcome): jest.MockedFunction<CommandRunner> {
  return jest.fn<Promise<CommandOutcome>, Parameters<CommandRunner>>().mockResolvedValue(outcome);
}

const exited = (exitCode: number, stdout: string): CommandOutcome => ({ kind: 'exited', exitCode, stdout, stderr: '' });

// ============================================
// LATENCY PARSING
// ============================================

describe('parseLatency', () => {
  it('reads unix-style time=N', () => {
    expect(parseLatency('64 bytes from 142.250.0.1: icmp_seq=1 ttl=117 time=43.2 ms')).toBe(43.2);
  });

  it('reads windows-style time<N and is case-insensitive', () => {
    expect(parseLatency('Reply from 8.8.8.8: bytes=32 time<1ms TTL=117')).toBe(1);
    expect(parseLatency('REPLY: TIME=12.5MS')).toBe(12.5);
  });

  it('takes the first match', () => {
    expect(parseLatency('time=5 ms\ntime=9 ms')).toBe(5);
  });

  it('returns null when no round-trip time is printed', () => {
    expect(parseLatency('1 packets transmitted, 1 received')).toBeNull();
    expect(parseLatency('time=abc')).toBeNull();
  });
});

describe('pingArgs', () => {
  it('builds per-platform arguments', () => {
    expect(pingArgs('linux', 'example.org', 3)).toEqual(['-c', '1', '-W', '3', 'example.org']);
    expect(pingArgs('win32', 'example.org', 3)).toEqual(['-n', '1', '-w', '3000', 'example.org']);
    expect(pingArgs('darwin', 'example.org', 5)).toEqual(['-c', '1', '-t', '5', 'example.org']);
  });
});

// ============================================
// PROBE OUTCOMES
// ============================================

describe('ReachabilityProbe - checkReachability', () => {
  it('reports latency when ping succeeds with a time token', async () => {
    const run = runnerReturning(exited(0, '64 bytes from 142.250.0.1: icmp_seq=1 ttl=117 time=43.2 ms'));
    const probe = new ReachabilityProbe(makeLogger(), { run, platform: 'linux' });

    await expect(probe.checkReachability('google.com')).resolves.toEqual({
      online: true,
      host: 'google.com',
      latency_ms: 43.2,
      message: 'Online (Ping google.com: 43ms)'
    });
    expect(run).toHaveBeenCalledWith('ping', ['-c', '1', '-W', '3', 'google.com'], {
      timeoutMs: 4000,
      signal: undefined
    });
  });

  it('uses google.com and a 3 second timeout by default', async () => {
    const run = runnerReturning(exited(0, 'time=10 ms'));
    const probe = new ReachabilityProbe(makeLogger(), { run, platform: 'linux', graceSeconds: 2 });

    const result = await probe.checkReachability();
    expect(result.host).toBe('google.com');
    expect(run.mock.calls[0][2].timeoutMs).toBe(5000);
  });

  it('reports success without latency when no time token is found', async () => {
    const probe = new ReachabilityProbe(makeLogger(), { run: runnerReturning(exited(0, 'PING ok')), platform: 'linux' });

    await expect(probe.checkReachability('10.0.0.1')).resolves.toEqual({
      online: true,
      host: '10.0.0.1',
      latency_ms: null,
      message: 'Online (Ping 10.0.0.1: Success)'
    });
  });

  it('keeps a zero latency instead of treating it as unknown', async () => {
    const probe = new ReachabilityProbe(makeLogger(), { run: runnerReturning(exited(0, 'time=0 ms')), platform: 'linux' });
    const result = await probe.checkReachability('localhost');
    expect(result.latency_ms).toBe(0);
    expect(result.message).toBe('Online (Ping localhost: 0ms)');
  });

  it('is offline when ping exits nonzero', async () => {
    const probe = new ReachabilityProbe(makeLogger(), { run: runnerReturning(exited(1, '')), platform: 'linux' });

    await expect(probe.checkReachability('unreachable.test')).resolves.toEqual({
      online: false,
      host: 'unreachable.test',
      latency_ms: null,
      message: 'Offline (Unable to reach unreachable.test)'
    });
  });

  it('is offline on timeout', async () => {
    const probe = new ReachabilityProbe(makeLogger(), { run: runnerReturning({ kind: 'timeout' }), platform: 'linux' });
    const result = await probe.checkReachability('slow.test', 1);
    expect(result.online).toBe(false);
    expect(result.message).toBe('Offline (Timeout connecting to slow.test)');
  });

  it('is offline with the error detail for other failures', async () => {
    const probe = new ReachabilityProbe(makeLogger(), {
      run: runnerReturning({ kind: 'failed', detail: 'spawn EACCES' }),
      platform: 'linux'
    });
    const result = await probe.checkReachability('google.com');
    expect(result).toEqual({
      online: false,
      host: 'google.com',
      latency_ms: null,
      message: 'Offline (Error: spawn EACCES)'
    });
  });

  it('throws ProbeUnavailableError when ping is missing', async () => {
    const probe = new ReachabilityProbe(makeLogger(), { run: runnerReturning({ kind: 'missing' }), platform: 'linux' });
    const attempt = probe.checkReachability('google.com');
    await expect(attempt).rejects.toBeInstanceOf(ProbeUnavailableError);
    await expect(attempt).rejects.toThrow('ping command not found while probing google.com');
  });

  it('returns independent results for repeated offline probes', async () => {
    const run = runnerReturning(exited(2, ''));
    const probe = new ReachabilityProbe(makeLogger(), { run, platform: 'linux' });

    const first = await probe.checkReachability('unreachable.test');
    const second = await probe.checkReachability('unreachable.test');

    expect(first).toEqual(second);
    expect(first).not.toBe(second);
    expect(run).toHaveBeenCalledTimes(2);
  });

  it('forwards the abort signal to the runner', async () => {
    const run = runnerReturning({ kind: 'timeout' });
    const probe = new ReachabilityProbe(makeLogger(), { run, platform: 'linux' });
    const controller = new AbortController();

    await probe.checkReachability('google.com', 3, controller.signal);
    expect(run.mock.calls[0][2].signal).toBe(controller.signal);
  });
});
