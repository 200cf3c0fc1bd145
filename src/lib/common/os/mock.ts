import type {
  ExecOptions,
  IEnv,
  IFileSystem,
  IHost,
  IOS,
  IProcessResult,
  IProcessRunner,
} from './interface.ts';

const isUnder = (path: string, dir: string) => path.startsWith(`${dir}/`);

export class MockFileSystem implements IFileSystem {
  private files: Map<string, string> = new Map();
  private dirs: Set<string> = new Set();
  private modes: Map<string, number> = new Map();
  private tempCounter = 0;

  private paths(): string[] {
    return [...this.files.keys(), ...this.dirs];
  }

  exists(path: string): boolean {
    return this.files.has(path) || this.dirs.has(path) || this.paths().some((p) => isUnder(p, path));
  }
  mkdir(path: string, options?: { recursive?: boolean }): void {
    this.dirs.add(path);
    if (options?.recursive) {
      let parent = path.slice(0, path.lastIndexOf('/'));
      while (parent.length > 0) {
        this.dirs.add(parent);
        parent = parent.slice(0, parent.lastIndexOf('/'));
      }
    }
  }
  list(path: string): string[] {
    const names = new Set<string>();
    for (const p of this.paths()) {
      if (isUnder(p, path)) {
        names.add(p.slice(path.length + 1).split('/')[0] ?? '');
      }
    }
    return [...names].sort();
  }
  read(path: string): string {
    const content = this.files.get(path);
    if (content === undefined) throw new Error(`File not found: ${path}`);
    return content;
  }
  append(path: string, content: string): void {
    const existing = this.files.get(path) || '';
    this.files.set(path, existing + content);
  }
  rename(from: string, to: string): void {
    if (!this.exists(from)) throw new Error(`ENOENT: ${from}`);
    const move = (p: string) => (p === from ? to : `${to}${p.slice(from.length)}`);
    for (const [p, content] of [...this.files]) {
      if (p === from || isUnder(p, from)) {
        this.files.delete(p);
        this.files.set(move(p), content);
      }
    }
    for (const p of [...this.dirs]) {
      if (p === from || isUnder(p, from)) {
        this.dirs.delete(p);
        this.dirs.add(move(p));
      }
    }
  }
  remove(path: string, options?: { recursive?: boolean }): void {
    this.files.delete(path);
    this.dirs.delete(path);
    if (options?.recursive) {
      for (const p of this.paths()) {
        if (isUnder(p, path)) {
          this.files.delete(p);
          this.dirs.delete(p);
        }
      }
    }
  }
  stat(path: string): { mode: number } {
    if (!this.exists(path)) throw new Error(`ENOENT: ${path}`);
    const fallback = this.files.has(path) ? 0o644 : 0o755;
    return { mode: this.modes.get(path) ?? fallback };
  }
  mkdtemp(prefix: string): string {
    this.tempCounter += 1;
    const path = `/tmp/${prefix}${this.tempCounter}`;
    this.dirs.add(path);
    return path;
  }

  /**
   * Test helper: creates or replaces a file.
   */
  write(path: string, content: string): void {
    this.files.set(path, content);
  }

  /**
   * Test helper: sets the permission bits returned by stat.
   */
  chmod(path: string, mode: number): void {
    this.modes.set(path, mode);
  }
}

export class MockEnv implements IEnv {
  private vars: Map<string, string> = new Map();
  get(key: string): string | undefined {
    return this.vars.get(key);
  }
  set(key: string, value: string): void {
    this.vars.set(key, value);
  }
}

export class MockHost implements IHost {
  platformName = 'linux';
  archName = 'x64';
  uidValue: number | undefined = 1000;
  home = '/home/dev';

  platform(): string {
    return this.platformName;
  }
  arch(): string {
    return this.archName;
  }
  uid(): number | undefined {
    return this.uidValue;
  }
  homedir(): string {
    return this.home;
  }
}

export class MockProcessRunner implements IProcessRunner {
  private handlers: Map<string, (args: string[]) => IProcessResult> = new Map();
  /**
   * Every command line run so far, sudo ones prefixed with "sudo ".
   */
  calls: string[] = [];

  setHandler(file: string, handler: (args: string[]) => IProcessResult) {
    this.handlers.set(file, handler);
  }

  async run(file: string, args: string[], _options?: ExecOptions): Promise<IProcessResult> {
    const command = `${file} ${args.join(' ')}`;
    this.calls.push(command);
    const handler = this.handlers.get(file);
    if (handler) return handler(args);
    return { stdout: '', stderr: '', exitCode: 0, command };
  }
  async sudo(file: string, args: string[], _options?: ExecOptions): Promise<IProcessResult> {
    const command = `sudo ${file} ${args.join(' ')}`;
    this.calls.push(command);
    const handler = this.handlers.get(file);
    if (handler) return handler(args);
    return { stdout: '', stderr: '', exitCode: 0, command };
  }
}

export const ok = (command = ''): IProcessResult => ({ stdout: '', stderr: '', exitCode: 0, command });

export const createMockOS = (): IOS & {
  proc: MockProcessRunner;
  fs: MockFileSystem;
  host: MockHost;
} => {
  const fs = new MockFileSystem();
  const proc = new MockProcessRunner();
  const env = new MockEnv();
  const host = new MockHost();
  return {
    fs,
    proc,
    env,
    host,
  };
};
