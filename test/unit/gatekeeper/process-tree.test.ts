import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { killProcessTree, type KillableProcess } from '@/gatekeeper/process-tree.js';
import { createLogger } from '@/logging/logger.js';

const logger = createLogger({ silent: true });

interface FakeChild extends KillableProcess {
  kill: Mock<(signal?: NodeJS.Signals) => boolean>;
}

function createChild(pid?: number): FakeChild {
  return { pid, kill: vi.fn<(signal?: NodeJS.Signals) => boolean>(() => true) };
}

function systemError(code: string): Error {
  return Object.assign(new Error(`kill ${code}`), { code });
}

describe('killProcessTree on POSIX', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('signals the process group, then escalates to SIGKILL', () => {
    const child = createChild(4242);
    const signal = vi.fn<(pid: number, sig: NodeJS.Signals) => void>();

    killProcessTree(child, { platform: 'linux', graceMs: 50, signal, logger });

    expect(signal).toHaveBeenCalledTimes(1);
    expect(signal).toHaveBeenCalledWith(-4242, 'SIGTERM');

    vi.advanceTimersByTime(50);

    expect(signal).toHaveBeenCalledTimes(2);
    expect(signal).toHaveBeenLastCalledWith(-4242, 'SIGKILL');
    expect(child.kill).not.toHaveBeenCalled();
  });

  it('sends SIGKILL at once when forced', () => {
    const child = createChild(4242);
    const signal = vi.fn<(pid: number, sig: NodeJS.Signals) => void>();

    killProcessTree(child, { platform: 'linux', graceMs: 50, force: true, signal, logger });
    vi.advanceTimersByTime(50);

    expect(signal).toHaveBeenCalledTimes(1);
    expect(signal).toHaveBeenCalledWith(-4242, 'SIGKILL');
  });

  it('treats a vanished group as already terminated', () => {
    const child = createChild(4242);
    const signal = vi.fn<(pid: number, sig: NodeJS.Signals) => void>(() => {
      throw systemError('ESRCH');
    });

    killProcessTree(child, { platform: 'darwin', graceMs: 50, signal, logger });
    vi.advanceTimersByTime(50);

    expect(child.kill).not.toHaveBeenCalled();
  });

  it('falls back to the root process when the group cannot be signalled', () => {
    const child = createChild(4242);
    const signal = vi.fn<(pid: number, sig: NodeJS.Signals) => void>(() => {
      throw systemError('EPERM');
    });

    killProcessTree(child, { platform: 'linux', graceMs: 50, signal, logger });

    expect(child.kill).toHaveBeenCalledWith('SIGTERM');

    vi.advanceTimersByTime(50);

    expect(child.kill).toHaveBeenLastCalledWith('SIGKILL');
  });

  it('does nothing for a process that never started', () => {
    const child = createChild();
    const signal = vi.fn<(pid: number, sig: NodeJS.Signals) => void>();

    killProcessTree(child, { platform: 'linux', signal, logger });
    vi.advanceTimersByTime(5000);

    expect(signal).not.toHaveBeenCalled();
    expect(child.kill).not.toHaveBeenCalled();
  });
});

describe('killProcessTree on Windows', () => {
  it('kills the tree with taskkill', async () => {
    const child = createChild(4242);
    const taskkill = vi.fn<(pid: number) => Promise<void>>().mockResolvedValue(undefined);
    const signal = vi.fn<(pid: number, sig: NodeJS.Signals) => void>();

    killProcessTree(child, { platform: 'win32', taskkill, signal, logger });
    await Promise.resolve();

    expect(taskkill).toHaveBeenCalledWith(4242);
    expect(signal).not.toHaveBeenCalled();
    expect(child.kill).not.toHaveBeenCalled();
  });

  it('kills the root process when taskkill fails', async () => {
    const child = createChild(4242);
    const taskkill = vi.fn<(pid: number) => Promise<void>>().mockRejectedValue(new Error('taskkill exited with code 1'));

    killProcessTree(child, { platform: 'win32', taskkill, logger });

    await vi.waitFor(() => {
      expect(child.kill).toHaveBeenCalledWith('SIGKILL');
    });
  });
});
