import { beforeEach, describe, expect, test } from 'vitest';
import { createMockOS, setOS } from './common/os/index.ts';
import { installLayout, resolveOptions } from './config.ts';

describe('resolveOptions', () => {
  let mockOs: ReturnType<typeof createMockOS>;

  beforeEach(() => {
    mockOs = createMockOS();
    setOS(mockOs);
  });

  test('should honour the --ci flag', () => {
    expect(resolveOptions({ ci: true }, mockOs.env)).toEqual({ ci: true });
  });

  test('should treat a non-empty CI variable as CI', () => {
    mockOs.env.set('CI', '1');
    expect(resolveOptions({}, mockOs.env)).toEqual({ ci: true });
  });

  test('should be interactive when CI is unset', () => {
    expect(resolveOptions({}, mockOs.env)).toEqual({ ci: false });
  });

  test('should be interactive when CI is empty', () => {
    mockOs.env.set('CI', '');
    expect(resolveOptions({ ci: false }, mockOs.env)).toEqual({ ci: false });
  });
});

describe('installLayout', () => {
  test('should derive every path from the root', () => {
    expect(installLayout('/opt/theos')).toEqual({
      root: '/opt/theos',
      updateScript: '/opt/theos/bin/update-theos',
      toolchainRoot: '/opt/theos/toolchain',
      toolchainDir: '/opt/theos/toolchain/linux/iphone',
      compiler: '/opt/theos/toolchain/linux/iphone/bin/clang',
      sdkDir: '/opt/theos/sdks',
    });
  });
});
