import { beforeEach, describe, expect, test, vi } from 'vitest';
import { createMockOS, setOS } from '../common/os/index.ts';
import { BootstrapError } from '../errors.ts';
import { EnvironmentConfigurator } from './EnvironmentConfigurator.ts';

describe('EnvironmentConfigurator', () => {
  let mockOs: ReturnType<typeof createMockOS>;

  beforeEach(() => {
    mockOs = createMockOS();
    setOS(mockOs);
  });

  test('should trust an existing THEOS without writing anything', async () => {
    mockOs.env.set('THEOS', '/opt/theos');
    const append = vi.spyOn(mockOs.fs, 'append');
    const configurator = new EnvironmentConfigurator({ dialect: 'unknown' });

    expect(configurator.isSatisfied()).toBe(true);
    expect(await configurator.ensureInstallationRoot()).toBe('/opt/theos');
    expect(append).not.toHaveBeenCalled();
  });

  test('should fail on an unknown shell without writing anything', async () => {
    const append = vi.spyOn(mockOs.fs, 'append');
    const result = new EnvironmentConfigurator({ dialect: 'unknown' }).ensureInstallationRoot();

    await expect(result).rejects.toBeInstanceOf(BootstrapError);
    await expect(result).rejects.toMatchObject({ exitCode: 4 });
    expect(append).not.toHaveBeenCalled();
    expect(mockOs.env.get('THEOS')).toBeUndefined();
  });

  test('should append the export and set THEOS for this run', async () => {
    mockOs.fs.write('/home/dev/.bashrc', '# existing\n');
    const configurator = new EnvironmentConfigurator({
      dialect: 'posix',
      path: '/home/dev/.bashrc',
    });

    expect(await configurator.ensureInstallationRoot()).toBe('/home/dev/theos');
    expect(mockOs.fs.read('/home/dev/.bashrc')).toBe('# existing\n\n# Theos\nexport THEOS=~/theos\n');
    expect(mockOs.env.get('THEOS')).toBe('/home/dev/theos');
  });

  test('should create the fish config file', async () => {
    const configurator = new EnvironmentConfigurator({
      dialect: 'fish',
      path: '/home/dev/.config/fish/config.fish',
    });

    await configurator.ensureInstallationRoot();
    expect(mockOs.fs.read('/home/dev/.config/fish/config.fish')).toBe(
      '\n# Theos\nset -gx THEOS ~/theos\n',
    );
  });

  test('should not append twice', async () => {
    const append = vi.spyOn(mockOs.fs, 'append');
    const configurator = new EnvironmentConfigurator({
      dialect: 'posix',
      path: '/home/dev/.profile',
    });

    await configurator.ensureInstallationRoot();
    expect(await configurator.ensureInstallationRoot()).toBe('/home/dev/theos');
    expect(append).toHaveBeenCalledTimes(1);
  });

  test('should report a profile write failure with its own code', async () => {
    vi.spyOn(mockOs.fs, 'append').mockImplementation(() => {
      throw new Error('EACCES: permission denied');
    });

    await expect(
      new EnvironmentConfigurator({
        dialect: 'posix',
        path: '/home/dev/.profile',
      }).ensureInstallationRoot(),
    ).rejects.toMatchObject({
      exitCode: 5,
      message: 'Failed to write /home/dev/.profile: EACCES: permission denied',
    });
    expect(mockOs.env.get('THEOS')).toBeUndefined();
  });
});
