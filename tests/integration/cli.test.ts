/**
 * Integration tests for CLI commands.
 *
 * Runs the check, format, get and json handlers against fixture files,
 * including the error path through runCommand.
 */

import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import { copyFile, mkdtemp, readFile, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { fileURLToPath } from 'node:url';
import { handleCheckCommand } from '../../src/cli/commands/check.js';
import { handleFormatCommand } from '../../src/cli/commands/format.js';
import { handleGetCommand } from '../../src/cli/commands/get.js';
import { handleJsonCommand } from '../../src/cli/commands/json.js';
import type { CliContext } from '../../src/cli/types.js';
import { runCommand } from '../../src/cli/utils/errorHandling.js';
import { getDefaultConfig } from '../../src/config/parser.js';
import { Logger } from '../../src/utils/logger.js';

const APP_FIXTURE = fileURLToPath(new URL('../../test-fixtures/app.yini', import.meta.url));
const MALFORMED_FIXTURE = fileURLToPath(
  new URL('../../test-fixtures/malformed.yini', import.meta.url)
);

const CANONICAL_APP = [
  "name = 'demo service'",
  'debug = false',
  '',
  '^ server',
  "    host = 'localhost'",
  '    port = 8080',
  '    timeout = 2.5',
  '',
  '    ^^ tls',
  '        enabled = true',
  "        ciphers = ['aes128', 'aes256']",
  '',
  '^ paths',
  "    root = '/srv/app'",
  '',
].join('\n');

describe('CLI Integration Tests', () => {
  let testDir: string;
  let consoleLogSpy: MockInstance<typeof console.log>;
  let consoleErrorSpy: MockInstance<typeof console.error>;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'yini-cli-test-'));
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(testDir, { recursive: true, force: true });
  });

  function createMockContext(overrides: Partial<CliContext> = {}): CliContext {
    return {
      args: [],
      config: getDefaultConfig(),
      logger: new Logger({ component: 'cli', debugMode: false }),
      display: { colors: false },
      ...overrides,
    };
  }

  describe('check', () => {
    it('reports property and section counts', async () => {
      const result = await handleCheckCommand(createMockContext({ args: [APP_FIXTURE] }));

      expect(result.exitCode).toBe(0);
      expect(consoleLogSpy).toHaveBeenCalledWith(`OK ${APP_FIXTURE}: 8 properties, 3 sections`);
    });

    it('reports the offending line of a malformed file', async () => {
      const context = createMockContext({ args: [MALFORMED_FIXTURE] });

      const result = await runCommand(() => handleCheckCommand(context), context.display);

      expect(result.exitCode).toBe(1);
      expect(consoleErrorSpy).toHaveBeenCalledWith(
        expect.stringContaining(
          'Error: Invalid line format at line 3: broken line\n  Line 3: broken line\n\nSuggestions:'
        )
      );
    });

    it('reports a missing file', async () => {
      const missing = join(testDir, 'missing.yini');
      const context = createMockContext({ args: [missing] });

      const result = await runCommand(() => handleCheckCommand(context), context.display);

      expect(result.exitCode).toBe(1);
      expect(consoleErrorSpy).toHaveBeenCalledWith(
        expect.stringContaining(`\n  File: ${missing}\n\nSuggestions:`)
      );
    });

    it('requires a file argument', async () => {
      const result = await handleCheckCommand(createMockContext());

      expect(result).toEqual({ exitCode: 1, message: 'Missing file argument' });
      expect(consoleErrorSpy).toHaveBeenCalledWith('Error: Missing file argument');
      expect(consoleErrorSpy).toHaveBeenCalledWith(
        '\nRun "yini help check" for usage information.'
      );
    });
  });

  describe('format', () => {
    it('prints the canonical form', async () => {
      const stdoutSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

      const result = await handleFormatCommand(createMockContext({ args: [APP_FIXTURE] }));

      expect(result.exitCode).toBe(0);
      expect(stdoutSpy).toHaveBeenCalledWith(CANONICAL_APP);
    });

    it('uses the configured indent width and quote', async () => {
      const stdoutSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
      const config = getDefaultConfig();
      config.writer = { indent_width: 2, quote: 'double' };

      await handleFormatCommand(createMockContext({ args: [APP_FIXTURE], config }));

      const output = stdoutSpy.mock.calls[0]?.[0];
      expect(output).toContain('\n  ^^ tls\n    enabled = true\n    ciphers = ["aes128", "aes256"]\n');
    });

    it('rewrites the file with --write', async () => {
      vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
      const target = join(testDir, 'app.yini');
      await copyFile(APP_FIXTURE, target);

      const result = await handleFormatCommand(createMockContext({ args: [target, '--write'] }));

      expect(result.exitCode).toBe(0);
      expect(await readFile(target, 'utf-8')).toBe(CANONICAL_APP);
      expect(consoleLogSpy).toHaveBeenCalledWith(`Formatted ${target}`);
    });

    it('produces output that formats to itself', async () => {
      vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
      const target = join(testDir, 'twice.yini');
      await copyFile(APP_FIXTURE, target);

      await handleFormatCommand(createMockContext({ args: [target, '--write'] }));
      await handleFormatCommand(createMockContext({ args: [target, '--write'] }));

      expect(await readFile(target, 'utf-8')).toBe(CANONICAL_APP);
    });
  });

  describe('get', () => {
    it('prints scalars in text form', async () => {
      await handleGetCommand(createMockContext({ args: [APP_FIXTURE, 'server.port'] }));
      await handleGetCommand(createMockContext({ args: [APP_FIXTURE, 'server.timeout'] }));
      await handleGetCommand(createMockContext({ args: [APP_FIXTURE, 'debug'] }));

      expect(consoleLogSpy.mock.calls).toEqual([['8080'], ['2.5'], ['false']]);
    });

    it('prints arrays as literals', async () => {
      const result = await handleGetCommand(
        createMockContext({ args: [APP_FIXTURE, 'server.tls.ciphers'] })
      );

      expect(result.exitCode).toBe(0);
      expect(consoleLogSpy).toHaveBeenCalledWith("['aes128', 'aes256']");
    });

    it('fails for a missing key', async () => {
      const context = createMockContext({ args: [APP_FIXTURE, 'server.missing'] });

      const result = await runCommand(() => handleGetCommand(context), context.display);

      expect(result.exitCode).toBe(1);
      expect(consoleErrorSpy).toHaveBeenCalledWith(
        expect.stringContaining('Error: Key not found: server.missing\n\nSuggestions:')
      );
    });

    it('requires a path argument', async () => {
      const result = await handleGetCommand(createMockContext({ args: [APP_FIXTURE] }));

      expect(result.exitCode).toBe(1);
      expect(consoleErrorSpy).toHaveBeenCalledWith('Error: Expected a file and a dotted path');
    });
  });

  describe('json', () => {
    it('prints the document as JSON', async () => {
      const result = await handleJsonCommand(createMockContext({ args: [APP_FIXTURE] }));

      expect(result.exitCode).toBe(0);
      const printed = consoleLogSpy.mock.calls[0]?.[0];
      expect(typeof printed).toBe('string');
      expect(JSON.parse(String(printed))).toEqual({
        name: 'demo service',
        debug: false,
        server: {
          host: 'localhost',
          port: 8080,
          timeout: 2.5,
          tls: { enabled: true, ciphers: ['aes128', 'aes256'] },
        },
        paths: { root: '/srv/app' },
      });
    });
  });
});
