import { describe, expect, it } from 'vitest';
import fc from 'fast-check';
import {
  ConfigParseError,
  DEFAULT_CONFIG,
  getDefaultConfig,
  parseConfig,
  toParserOptions,
  toWriterOptions,
} from './index.js';

describe('Config Parser', () => {
  describe('parseConfig', () => {
    describe('valid TOML parsing', () => {
      it('should parse empty TOML to default config', () => {
        expect(parseConfig('')).toEqual(DEFAULT_CONFIG);
      });

      it('should parse complete valid configuration', () => {
        const toml = `
[parser]
strict_depth = true
strict_literals = true
quote_aware_comments = true
unterminated_comment = "error"

[writer]
indent_width = 2
quote = "double"

[logging]
debug = true
`;
        expect(parseConfig(toml)).toEqual({
          parser: {
            strict_depth: true,
            strict_literals: true,
            quote_aware_comments: true,
            unterminated_comment: 'error',
          },
          writer: { indent_width: 2, quote: 'double' },
          logging: { debug: true },
        });
      });

      it('should merge a partial table with defaults', () => {
        const config = parseConfig('[writer]\nquote = "double"\n');

        expect(config.writer).toEqual({ indent_width: 4, quote: 'double' });
        expect(config.parser).toEqual(DEFAULT_CONFIG.parser);
      });

      it('should ignore unknown tables and keys', () => {
        const config = parseConfig('[extra]\nx = 1\n\n[parser]\nunknown = "y"\n');

        expect(config).toEqual(DEFAULT_CONFIG);
      });
    });

    describe('invalid input', () => {
      it('should reject invalid TOML syntax', () => {
        expect(() => parseConfig('[parser\n')).toThrow(ConfigParseError);
        expect(() => parseConfig('[parser\n')).toThrow(/^Invalid TOML syntax: /);
      });

      it('should keep the TOML error as the cause', () => {
        try {
          parseConfig('= 1');
          expect.unreachable('parseConfig should throw');
        } catch (error) {
          expect(error).toBeInstanceOf(ConfigParseError);
          expect(error instanceof ConfigParseError && error.cause).toBeInstanceOf(Error);
        }
      });

      it('should reject a field of the wrong type', () => {
        expect(() => parseConfig('[parser]\nstrict_depth = "yes"\n')).toThrow(
          "Invalid type for 'parser.strict_depth': expected boolean, got string"
        );
        expect(() => parseConfig('[writer]\nindent_width = "4"\n')).toThrow(
          "Invalid type for 'writer.indent_width': expected number, got string"
        );
        expect(() => parseConfig('[logging]\ndebug = 1\n')).toThrow(
          "Invalid type for 'logging.debug': expected boolean, got number"
        );
      });

      it('should reject an unknown choice', () => {
        expect(() => parseConfig('[writer]\nquote = "back"\n')).toThrow(
          "Invalid value for 'writer.quote': expected one of single, double, got 'back'"
        );
        expect(() => parseConfig('[parser]\nunterminated_comment = 1\n')).toThrow(
          "Invalid type for 'parser.unterminated_comment': expected string, got number"
        );
      });

      it('should reject a section that is not a table', () => {
        expect(() => parseConfig('parser = 5\n')).toThrow(
          "Invalid type for 'parser': expected table, got number"
        );
      });
    });

    describe('property-based tests', () => {
      it('should accept any indent width number and boolean flags', () => {
        fc.assert(
          fc.property(fc.integer({ min: 0, max: 64 }), fc.boolean(), (width, flag) => {
            const config = parseConfig(
              `[writer]\nindent_width = ${String(width)}\n[parser]\nstrict_depth = ${String(flag)}\n`
            );
            return config.writer.indent_width === width && config.parser.strict_depth === flag;
          })
        );
      });
    });
  });

  describe('getDefaultConfig', () => {
    it('should return a copy of the defaults', () => {
      const config = getDefaultConfig();
      config.writer.indent_width = 8;

      expect(config).not.toBe(DEFAULT_CONFIG);
      expect(DEFAULT_CONFIG.writer.indent_width).toBe(4);
    });
  });

  describe('option mapping', () => {
    it('should map settings to parser and writer options', () => {
      const config = parseConfig(
        '[parser]\nstrict_literals = true\nunterminated_comment = "error"\n[writer]\nindent_width = 3\n'
      );

      expect(toParserOptions(config)).toEqual({
        strictDepth: false,
        strictLiterals: true,
        quoteAwareComments: false,
        unterminatedComment: 'error',
      });
      expect(toWriterOptions(config)).toEqual({ indentWidth: 3, quote: 'single' });
    });
  });
});
