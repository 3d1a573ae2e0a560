import fs from 'node:fs/promises';
import { beforeEach, describe, expect, it, vi } from 'vitest';

import { createPlanCommand } from '../src/commands/plan';
import { CommandOrchestrator, createOrchestrator } from '../src/context';

vi.mock('node:fs/promises');
vi.mock('../src/context', async () => {
  const actual = await vi.importActual<typeof import('../src/context')>('../src/context');
  return { ...actual, createOrchestrator: vi.fn() };
});
vi.mock('chalk', async (importOriginal) => ({
  ...(await importOriginal<typeof import('chalk')>()),
  default: {
    blue: vi.fn((m) => m),
    green: vi.fn((m) => m),
    yellow: vi.fn((m) => m),
    red: vi.fn((m) => m),
    cyan: vi.fn((m) => m),
    bold: vi.fn((m) => m),
  },
}));

function mockOrchestrator(plan: CommandOrchestrator['plan']): void {
  vi.mocked(createOrchestrator).mockReturnValue({ plan } as Partial<CommandOrchestrator> as CommandOrchestrator);
}

describe('CLI: plan command', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should fail if netform.json does not exist', async () => {
    vi.mocked(fs.access).mockRejectedValue(new Error('ENOENT'));

    const exitSpy = vi.spyOn(process, 'exit').mockImplementation((() => {}) as never);
    const consoleSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    await createPlanCommand().parseAsync(['node', 'netform']);

    expect(consoleSpy).toHaveBeenCalledWith('Error: netform.json not found.');
    expect(exitSpy).toHaveBeenCalledWith(1);
    expect(createOrchestrator).not.toHaveBeenCalled();

    exitSpy.mockRestore();
    consoleSpy.mockRestore();
  });

  it('should display "No changes" when every resource is up to date', async () => {
    vi.mocked(fs.access).mockResolvedValue(void 0);
    vi.mocked(fs.readFile).mockResolvedValue('{"resources":{}}');

    const planMock = vi.fn().mockResolvedValue([{ address: 'system_scheduler.nightly', actions: [{ type: 'NO_OP', kind: 'system_scheduler' }] }]);
    mockOrchestrator(planMock);

    const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    await createPlanCommand().parseAsync(['node', 'netform']);

    expect(planMock).toHaveBeenCalledWith('{"resources":{}}');
    expect(consoleSpy).toHaveBeenCalledWith('No changes. The device matches the configuration.');

    consoleSpy.mockRestore();
  });

  it('should display created resources with their parameters', async () => {
    vi.mocked(fs.access).mockResolvedValue(void 0);
    vi.mocked(fs.readFile).mockResolvedValue('content');

    mockOrchestrator(
      vi.fn().mockResolvedValue([
        {
          address: 'system_scheduler.nightly',
          actions: [{ type: 'CREATE', kind: 'system_scheduler', params: { name: 'nightly', interval: '1d' } }],
        },
      ])
    );

    const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    await createPlanCommand().parseAsync(['node', 'netform']);

    expect(consoleSpy).toHaveBeenCalledWith('\nNetform will perform the following actions:\n');
    expect(consoleSpy).toHaveBeenCalledWith('  + system_scheduler.nightly will be created');
    expect(consoleSpy).toHaveBeenCalledWith('      interval = "1d"');
    expect(consoleSpy).toHaveBeenCalledWith('\nPlan: 1 to add, 0 to change, 0 to destroy, 0 to move.');

    consoleSpy.mockRestore();
  });

  it('should display UPDATE actions with changes', async () => {
    vi.mocked(fs.access).mockResolvedValue(void 0);
    vi.mocked(fs.readFile).mockResolvedValue('content');

    mockOrchestrator(
      vi.fn().mockResolvedValue([
        {
          address: 'system_scheduler.nightly',
          actions: [{ type: 'UPDATE', kind: 'system_scheduler', changes: { 'on-event': { old: '/log info a', new: '/log info b' } } }],
        },
      ])
    );

    const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    await createPlanCommand().parseAsync(['node', 'netform']);

    expect(consoleSpy).toHaveBeenCalledWith('  ~ system_scheduler.nightly will be updated');
    expect(consoleSpy).toHaveBeenCalledWith('      on-event: "/log info a" -> "/log info b"');
    expect(consoleSpy).toHaveBeenCalledWith('\nPlan: 0 to add, 1 to change, 0 to destroy, 0 to move.');

    consoleSpy.mockRestore();
  });

  it('should display DELETE and MOVE actions', async () => {
    vi.mocked(fs.access).mockResolvedValue(void 0);
    vi.mocked(fs.readFile).mockResolvedValue('content');

    mockOrchestrator(
      vi.fn().mockResolvedValue([
        { address: 'ip_firewall_filter.drop', actions: [{ type: 'MOVE', kind: 'ip_firewall_filter', destination: '*1' }] },
        { address: 'ip_firewall_filter.last', actions: [{ type: 'MOVE', kind: 'ip_firewall_filter', destination: '' }] },
        { address: 'system_scheduler.old', actions: [{ type: 'DELETE', kind: 'system_scheduler' }] },
      ])
    );

    const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    await createPlanCommand().parseAsync(['node', 'netform']);

    expect(consoleSpy).toHaveBeenCalledWith('  > ip_firewall_filter.drop will be moved');
    expect(consoleSpy).toHaveBeenCalledWith('      before *1');
    expect(consoleSpy).toHaveBeenCalledWith('      to the end');
    expect(consoleSpy).toHaveBeenCalledWith('  - system_scheduler.old will be destroyed');
    expect(consoleSpy).toHaveBeenCalledWith('\nPlan: 0 to add, 0 to change, 1 to destroy, 2 to move.');

    consoleSpy.mockRestore();
  });

  it('should read a document given as argument', async () => {
    vi.mocked(fs.access).mockResolvedValue(void 0);
    vi.mocked(fs.readFile).mockResolvedValue('content');
    mockOrchestrator(vi.fn().mockResolvedValue([]));

    const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    await createPlanCommand().parseAsync(['node', 'netform', 'router.json']);

    expect(fs.readFile).toHaveBeenCalledWith(expect.stringMatching(/router\.json$/), 'utf8');

    consoleSpy.mockRestore();
  });

  it('should handle planning errors', async () => {
    vi.mocked(fs.access).mockResolvedValue(void 0);
    vi.mocked(fs.readFile).mockResolvedValue('content');
    mockOrchestrator(vi.fn().mockRejectedValue(new Error('read system_scheduler: connection refused')));

    const exitSpy = vi.spyOn(process, 'exit').mockImplementation((() => {}) as never);
    const consoleSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    await createPlanCommand().parseAsync(['node', 'netform']);

    expect(consoleSpy).toHaveBeenCalledWith('Planning failed:', 'read system_scheduler: connection refused');
    expect(exitSpy).toHaveBeenCalledWith(1);

    exitSpy.mockRestore();
    consoleSpy.mockRestore();
    logSpy.mockRestore();
  });

  it('should handle non-Error exceptions', async () => {
    vi.mocked(fs.access).mockResolvedValue(void 0);
    vi.mocked(fs.readFile).mockResolvedValue('content');
    mockOrchestrator(vi.fn().mockRejectedValue('String Error'));

    const exitSpy = vi.spyOn(process, 'exit').mockImplementation((() => {}) as never);
    const consoleSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    await createPlanCommand().parseAsync(['node', 'netform']);

    expect(consoleSpy).toHaveBeenCalledWith('Planning failed:', 'String Error');
    expect(exitSpy).toHaveBeenCalledWith(1);

    exitSpy.mockRestore();
    consoleSpy.mockRestore();
    logSpy.mockRestore();
  });
});
