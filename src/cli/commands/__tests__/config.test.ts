import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { Command } from 'commander';

import { _clearEnvCache } from '../../../config/env.js';
import { createRecordingContext } from '../../../test-utils/index.js';
import type { GlobalOptions } from '../../types.js';
import { createConfigCommand, formatValue } from '../config.js';

let testDir: string;
let configPath: string;
let logSpy: MockInstance<typeof console.log>;

async function runConfig(args: string[], options: Partial<GlobalOptions> = {}) {
  const recording = createRecordingContext(options);
  const program = new Command().exitOverride().addCommand(createConfigCommand(() => recording.ctx));
  await program.parseAsync(['config', ...args], { from: 'user' });
  return recording;
}

function printedJSON(): unknown {
  return JSON.parse(String(logSpy.mock.calls[0]?.[0]));
}

beforeEach(() => {
  testDir = fs.mkdtempSync(path.join(os.tmpdir(), 'helpdesk-config-cmd-'));
  configPath = path.join(testDir, 'config.toml');
  vi.stubEnv('HELPDESK_CONFIG', configPath);
  vi.stubEnv('HELPDESK_LLM_MODEL', '');
  vi.stubEnv('HELPDESK_LLM_PROVIDER', '');
  vi.stubEnv('HELPDESK_TOP_K', '');
  vi.stubEnv('HELPDESK_HYDE', '');
  _clearEnvCache();
  logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
});

afterEach(() => {
  fs.rmSync(testDir, { recursive: true, force: true });
  vi.unstubAllEnvs();
  vi.restoreAllMocks();
  _clearEnvCache();
  process.exitCode = undefined;
});

describe('config get', () => {
  it('prints a value', async () => {
    const { logs } = await runConfig(['get', 'llm.model']);
    expect(logs).toEqual(['gpt-4.1-mini']);
  });

  it('shows escapes in string values', async () => {
    const { logs } = await runConfig(['get', 'knowledge_base.separator']);
    expect(logs).toEqual(['"\\n\\n"']);
  });

  it('reports an unknown key', async () => {
    const { logs, errors } = await runConfig(['get', 'nope.key']);
    expect(errors).toEqual(['Unknown config key: nope.key']);
    expect(logs).toEqual(['', 'Run helpdesk config list to see all available keys.']);
    expect(process.exitCode).toBe(1);
  });

  it('prints JSON with --json', async () => {
    await runConfig(['get', 'search.top_k'], { json: true });
    expect(printedJSON()).toEqual({ key: 'search.top_k', value: 3 });
  });
});

describe('config set', () => {
  it('writes the value to the config file', async () => {
    const { logs } = await runConfig(['set', 'search.top_k', '5']);
    expect(logs).toEqual(['✓ Set search.top_k = 5']);
    expect(fs.readFileSync(configPath, 'utf-8')).toContain('top_k = 5');

    const read = await runConfig(['get', 'search.top_k']);
    expect(read.logs).toEqual(['5']);
  });

  it('reports the saved value with --json', async () => {
    await runConfig(['set', 'rag.hyde', 'true'], { json: true });
    expect(printedJSON()).toEqual({ success: true, key: 'rag.hyde', value: true });
  });

  it('rejects an invalid value without writing', async () => {
    const { errors } = await runConfig(['set', 'search.top_k', '0']);
    expect(errors[0]?.startsWith("Invalid value for 'search.top_k':")).toBe(true);
    expect(fs.existsSync(configPath)).toBe(false);
    expect(process.exitCode).toBe(1);
  });

  it('rejects an unknown key', async () => {
    const { errors } = await runConfig(['set', 'llm.colour', 'blue']);
    expect(errors).toEqual(['Unknown config key: llm.colour']);
  });
});

describe('config list', () => {
  it('prints every key as JSON', async () => {
    await runConfig(['list'], { json: true });
    expect(printedJSON()).toMatchObject({
      'llm.provider': 'openai',
      'search.top_k': 3,
      'rag.rrf_k': 60,
      'server.port': 8000,
    });
  });

  it('groups keys and names the file', async () => {
    const { logs } = await runConfig(['ls']);
    expect(logs[0]).toBe('Configuration:');
    expect(logs).toContain('  llm.provider = openai');
    expect(logs[logs.length - 1]).toBe(`Config file: ${configPath}`);
  });
});

describe('config path', () => {
  it('prints the config file location', async () => {
    const { logs } = await runConfig(['path']);
    expect(logs).toEqual([configPath]);
  });
});

describe('formatValue', () => {
  it.each([
    ['openai', 'openai'],
    ['\n\n', '"\\n\\n"'],
    [true, 'true'],
    [0.2, '0.2'],
    [['a'], '["a"]'],
  ])('formats %j', (value, expected) => {
    expect(formatValue(value)).toBe(expected);
  });
});
