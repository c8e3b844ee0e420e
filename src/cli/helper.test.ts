import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';

import { createHelperProgram, runHelper } from './helper';
import type { HelperIO } from './helper';
import type { SecretStore } from '../store/pass';
import { logger, LogLevel } from '../utils/logger';

describe('runHelper', () => {
  let tmpDir: string;
  let storeDir: string;
  let mappingFile: string;
  let errorSpy: jest.SpyInstance;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'credential-helper-'));
    storeDir = path.join(tmpDir, 'store');
    await fs.ensureDir(path.join(storeDir, 'dev'));
    await fs.writeFile(path.join(storeDir, 'dev', 'mytest.gpg'), 'encrypted');

    const configDir = path.join(tmpDir, 'config', 'pass-credential-helper');
    await fs.ensureDir(configDir);
    mappingFile = path.join(configDir, 'git-pass-mapping.ini');
    await fs.writeFile(
      mappingFile,
      '[mytest.com]\ntarget = dev/mytest\n\n[broken.com]\ntarget = dev/mytest\nusername_extractor = doesntexist\n',
    );

    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    logger.setLevel(LogLevel.WARN);
  });

  afterEach(async () => {
    errorSpy.mockRestore();
    logger.setLevel(LogLevel.WARN);
    await fs.remove(tmpDir);
  });

  function makeIO(input: string, store: SecretStore, env: Record<string, string> = {}) {
    const output: string[] = [];
    const io: HelperIO = {
      readInput: jest.fn().mockResolvedValue(input),
      writeOutput: (text) => {
        output.push(text);
      },
      env: { XDG_CONFIG_HOME: path.join(tmpDir, 'config'), PASSWORD_STORE_DIR: storeDir, ...env },
      homeDir: tmpDir,
      store,
    };
    return { io, output };
  }

  function stderr(): string {
    return errorSpy.mock.calls.map((args: unknown[]) => args.map(String).join(' ')).join('\n');
  }

  const narfStore = (): SecretStore & { show: jest.Mock } => ({
    show: jest.fn().mockResolvedValue(Buffer.from('narf')),
  });

  it('resolves a get request from the XDG mapping', async () => {
    const store = narfStore();
    const { io, output } = makeIO('protocol=https\nhost=mytest.com\n', store);

    expect(await runHelper('get', {}, io)).toBe(0);
    expect(output.join('')).toBe('password=narf\n');
    expect(store.show).toHaveBeenCalledWith('dev/mytest', expect.objectContaining({ PASSWORD_STORE_DIR: storeDir }));
    expect(errorSpy).not.toHaveBeenCalled();
  });

  it('uses a mapping file given on the command line', async () => {
    const custom = path.join(tmpDir, 'custom.ini');
    await fs.writeFile(custom, '[other.com]\ntarget = dev/mytest\n');
    const { io, output } = makeIO('host=other.com\n', narfStore());

    expect(await runHelper('get', { mapping: custom }, io)).toBe(0);
    expect(output.join('')).toBe('password=narf\n');
  });

  it('exits 1 without any output when the skip variable is set', async () => {
    const store = narfStore();
    const { io, output } = makeIO('host=mytest.com\n', store, { PASS_CREDENTIAL_HELPER_SKIP: '1' });

    expect(await runHelper('get', {}, io)).toBe(1);
    expect(output).toEqual([]);
    expect(io.readInput).not.toHaveBeenCalled();
    expect(store.show).not.toHaveBeenCalled();
    expect(errorSpy).not.toHaveBeenCalled();
  });

  it('exits 1 for unsupported actions', async () => {
    const store = narfStore();
    const { io, output } = makeIO('host=mytest.com\n', store);

    expect(await runHelper('store', {}, io)).toBe(1);
    expect(output).toEqual([]);
    expect(store.show).not.toHaveBeenCalled();
  });

  it('reports the unsupported action with logging enabled', async () => {
    const { io } = makeIO('host=mytest.com\n', narfStore());

    expect(await runHelper('erase', { logging: true }, io)).toBe(1);
    expect(stderr()).toContain('Action erase is currently not supported');
  });

  it('reports unmatched requests', async () => {
    const { io, output } = makeIO('protocol=https\nhost=unknown\n', narfStore());

    expect(await runHelper('get', {}, io)).toBe(1);
    expect(output).toEqual([]);
    expect(stderr()).toContain("No mapping section in ['mytest.com', 'broken.com'] matches request unknown");
  });

  it('reports unknown extractors', async () => {
    const { io } = makeIO('host=broken.com\n', narfStore());

    expect(await runHelper('get', {}, io)).toBe(1);
    expect(stderr()).toContain("username_extractor of type 'doesntexist' does not exist");
  });

  it('reports a missing mapping', async () => {
    const { io } = makeIO('host=mytest.com\n', narfStore(), {
      XDG_CONFIG_HOME: path.join(tmpDir, 'nowhere'),
      XDG_CONFIG_DIRS: path.join(tmpDir, 'nowhere-either'),
    });

    expect(await runHelper('get', {}, io)).toBe(1);
    expect(stderr()).toContain('Unable to parse mapping file: No mapping configured so far at any XDG config location');
  });

  it('reports store failures', async () => {
    const store: SecretStore = {
      show: jest.fn().mockRejectedValue(new Error('Unable to retrieve entry dev/mytest from pass: gpg failed')),
    };
    const { io, output } = makeIO('host=mytest.com\n', store);

    expect(await runHelper('get', {}, io)).toBe(1);
    expect(output).toEqual([]);
    expect(stderr()).toContain('Unable to retrieve entry dev/mytest from pass: gpg failed');
  });

  it('reports malformed requests', async () => {
    const { io } = makeIO('host=mytest.com\nnonsense\n', narfStore());

    expect(await runHelper('get', {}, io)).toBe(1);
    expect(stderr()).toContain("Malformed credential request: expected 'key=value', got 'nonsense'");
  });

  it('reports a request without host', async () => {
    const { io } = makeIO('protocol=https\n', narfStore());

    expect(await runHelper('get', {}, io)).toBe(1);
    expect(stderr()).toContain('Request lacks host entry');
  });
});

describe('createHelperProgram', () => {
  it('declares the action argument and options', () => {
    const program = createHelperProgram();
    expect(program.name()).toBe('pass-credential-helper');

    const optionNames = program.options.map((o) => o.long);
    expect(optionNames).toContain('--mapping');
    expect(optionNames).toContain('--logging');
    expect(optionNames).toContain('--version');
    expect(program.registeredArguments.map((a) => a.name())).toEqual(['action']);
  });
});
