import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import fc from 'fast-check';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  ConfigParseError,
  DEFAULT_CONFIG,
  getDefaultConfig,
  parseConfig,
  readConfigFile,
} from './index.js';

describe('Config Parser', () => {
  describe('parseConfig', () => {
    describe('valid TOML parsing', () => {
      it('should parse empty TOML to default config', () => {
        const config = parseConfig('');
        expect(config).toEqual(DEFAULT_CONFIG);
      });

      it('should parse complete valid configuration', () => {
        const toml = `
[llm]
enabled = false
provider = "command"
api_key = "test-secret"
model = "custom/model"
base_url = "http://localhost:8080/v1/chat/completions"
timeout_seconds = 12.5
temperature = 0.7
max_tokens = 512
app_name = "Mentor Test"
command = "llm-cli"
command_args = ["--json", "--quiet"]

[analysis]
excerpt_limit = 500
dictionary_path = "custom/dictionary.json"

[store]
path = "custom/store.json"

[logging]
debug = true
`;
        const config = parseConfig(toml);

        expect(config.llm).toEqual({
          enabled: false,
          provider: 'command',
          api_key: 'test-secret',
          model: 'custom/model',
          base_url: 'http://localhost:8080/v1/chat/completions',
          timeout_seconds: 12.5,
          temperature: 0.7,
          max_tokens: 512,
          app_name: 'Mentor Test',
          command: 'llm-cli',
          command_args: ['--json', '--quiet'],
        });
        expect(config.analysis).toEqual({
          excerpt_limit: 500,
          dictionary_path: 'custom/dictionary.json',
        });
        expect(config.store.path).toBe('custom/store.json');
        expect(config.logging.debug).toBe(true);
      });
    });

    describe('partial config with defaults', () => {
      it('should fill missing fields in a section with defaults', () => {
        const config = parseConfig(`
[llm]
model = "anthropic/claude-3.5-haiku"
`);
        expect(config.llm.model).toBe('anthropic/claude-3.5-haiku');
        expect(config.llm.timeout_seconds).toBe(DEFAULT_CONFIG.llm.timeout_seconds);
        expect(config.llm.provider).toBe('openrouter');
        expect(config.analysis).toEqual(DEFAULT_CONFIG.analysis);
      });

      it('should ignore unknown sections and keys', () => {
        const config = parseConfig(`
[unknown]
value = 1

[store]
path = "a.json"
extra = "ignored"
`);
        expect(config.store).toEqual({ path: 'a.json' });
      });

      it('should not share command_args with the defaults', () => {
        const config = parseConfig('');
        config.llm.command_args.push('--mutated');
        expect(getDefaultConfig().llm.command_args).toEqual([]);
      });
    });

    describe('invalid TOML', () => {
      it('should throw ConfigParseError for syntax errors', () => {
        expect(() => parseConfig('[llm\nmodel = ')).toThrow(ConfigParseError);
        expect(() => parseConfig('[llm\nmodel = ')).toThrow(/Invalid TOML syntax/);
      });

      it('should throw for wrong field types', () => {
        expect(() => parseConfig('[llm]\ntimeout_seconds = "ten"')).toThrow(
          "Invalid type for 'llm.timeout_seconds': expected number, got string"
        );
        expect(() => parseConfig('[logging]\ndebug = "yes"')).toThrow(
          "Invalid type for 'logging.debug': expected boolean, got string"
        );
        expect(() => parseConfig('[llm]\ncommand_args = [1, 2]')).toThrow(
          "Invalid type for 'llm.command_args': expected array of strings"
        );
      });

      it('should throw when a section is not a table', () => {
        expect(() => parseConfig('store = "x"')).toThrow(
          "Invalid type for 'store': expected table, got string"
        );
      });

      it('should reject unknown providers', () => {
        expect(() => parseConfig('[llm]\nprovider = "other"')).toThrow(
          "Invalid value for 'llm.provider': expected 'openrouter' or 'command', got 'other'"
        );
      });
    });

    it('should round-trip any model name through TOML string escaping', () => {
      fc.assert(
        fc.property(fc.string({ maxLength: 40 }), (model) => {
          const toml = `[llm]\nmodel = ${JSON.stringify(model)}`;
          let parsed: string | undefined;
          try {
            parsed = parseConfig(toml).llm.model;
          } catch (error) {
            // Control characters are not valid in TOML basic strings.
            expect(error).toBeInstanceOf(ConfigParseError);
            return;
          }
          expect(parsed).toBe(model);
        })
      );
    });
  });

  describe('readConfigFile', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'design-mentor-config-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('should return defaults when the file does not exist', async () => {
      const config = await readConfigFile(join(dir, 'missing.toml'));
      expect(config).toEqual(DEFAULT_CONFIG);
    });

    it('should parse an existing file', async () => {
      const file = join(dir, 'design-mentor.toml');
      await writeFile(file, '[analysis]\nexcerpt_limit = 100\n', 'utf-8');
      const config = await readConfigFile(file);
      expect(config.analysis.excerpt_limit).toBe(100);
    });

    it('should surface parse errors from the file', async () => {
      const file = join(dir, 'design-mentor.toml');
      await writeFile(file, '[analysis\n', 'utf-8');
      await expect(readConfigFile(file)).rejects.toBeInstanceOf(ConfigParseError);
    });
  });
});
