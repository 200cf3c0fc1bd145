import { beforeEach, describe, expect, test, vi } from 'vitest';
import { createMockOS, ok, setOS } from '../common/os/index.ts';
import { installLayout } from '../config.ts';
import { RepositorySynchronizer } from './RepositorySynchronizer.ts';

const layout = installLayout('/home/dev/theos');
const CLONE = 'git clone --recursive https://github.com/theos/theos.git /home/dev/theos';

describe('RepositorySynchronizer', () => {
  let mockOs: ReturnType<typeof createMockOS>;

  beforeEach(() => {
    mockOs = createMockOS();
    setOS(mockOs);
    mockOs.proc.setHandler('git', (args) => {
      mockOs.fs.write(`${args[3]}/makefiles/common.mk`, '');
      return ok();
    });
  });

  test('should clone into an empty root', async () => {
    const outcome = await new RepositorySynchronizer(layout).ensureRepository();

    expect(outcome).toBe('acquired');
    expect(mockOs.proc.calls).toEqual([CLONE]);
  });

  test('should update instead of cloning on the second run', async () => {
    const synchronizer = new RepositorySynchronizer(layout);
    await synchronizer.ensureRepository();

    expect(await synchronizer.ensureRepository()).toBe('present');
    expect(mockOs.proc.calls).toEqual([CLONE, '/home/dev/theos/bin/update-theos ']);
  });

  test('should treat an empty root directory as not cloned', async () => {
    mockOs.fs.mkdir('/home/dev/theos', { recursive: true });
    expect(new RepositorySynchronizer(layout).isSatisfied()).toBe(false);
  });

  test('should fail with the clone code when git fails', async () => {
    mockOs.proc.setHandler('git', () => {
      throw new Error('fatal: unable to access');
    });

    await expect(new RepositorySynchronizer(layout).ensureRepository()).rejects.toMatchObject({
      exitCode: 6,
      message: 'Theos clone failed: fatal: unable to access',
    });
  });

  test('should report a root that is not a directory with the clone code', async () => {
    vi.spyOn(mockOs.fs, 'list').mockImplementation(() => {
      throw new Error('ENOTDIR: not a directory');
    });

    await expect(new RepositorySynchronizer(layout).ensureRepository()).rejects.toMatchObject({
      exitCode: 6,
      message: 'Theos: ENOTDIR: not a directory',
    });
    expect(mockOs.proc.calls).toEqual([]);
  });

  test('should fail with the clone code when the updater fails', async () => {
    mockOs.fs.write('/home/dev/theos/Makefile', '');
    mockOs.proc.setHandler(layout.updateScript, () => {
      throw new Error('merge conflict');
    });

    await expect(new RepositorySynchronizer(layout).ensureRepository()).rejects.toMatchObject({
      exitCode: 6,
      message:
        'Updating the existing Theos checkout at /home/dev/theos failed: merge conflict\n' +
        'Fix the checkout (or remove it to clone afresh) and re-run; re-running is safe.',
    });
  });
});
